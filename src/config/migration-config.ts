import { readFile } from 'node:fs/promises';

import { APP_ENV } from '../config.js';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import type { PlaylistJob } from '../migration/types.js';

/**
 * Migration settings from migration.config.json
 */
export interface PlaylistEntry {
  id: string;
  /** Keep only the first N tracks; 0 keeps all */
  limit: number;
}

export interface MigrationConfig {
  playlists: PlaylistEntry[];
  playlistPrefix: string;
  coverImagePath?: string;
  clientId: string;
  clientSecret: string;
}

export interface CredentialDefaults {
  clientId: string;
  clientSecret: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const NUMERIC_ID = /^\d+$/;

function parsePlaylistEntry(value: unknown, index: number): PlaylistEntry {
  const field = `netease_playlists[${index}]`;

  // A bare id is shorthand for { id }
  const entry = isRecord(value) ? value : { id: value };

  const rawId = entry.id;
  const id = typeof rawId === 'number' && Number.isSafeInteger(rawId) && rawId > 0 ? String(rawId) : rawId;
  if (typeof id !== 'string' || !NUMERIC_ID.test(id.trim())) {
    throw new ConfigError(`${field}.id must be a numeric playlist id`);
  }

  const limit = entry.limit ?? 0;
  if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 0) {
    throw new ConfigError(`${field}.limit must be a non-negative integer`);
  }

  return { id: id.trim(), limit };
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${field} must be a string`);
  }
  return value;
}

export function parseMigrationConfig(
  value: unknown,
  defaults: CredentialDefaults = { clientId: APP_ENV.SPOTIFY_CLIENT_ID, clientSecret: APP_ENV.SPOTIFY_CLIENT_SECRET }
): MigrationConfig {
  if (!isRecord(value)) {
    throw new ConfigError('migration config must be a JSON object');
  }

  const rawPlaylists = value.netease_playlists;
  if (!Array.isArray(rawPlaylists) || rawPlaylists.length === 0) {
    throw new ConfigError('netease_playlists must be a non-empty array');
  }

  const clientId = optionalString(value.client_id, 'client_id') || defaults.clientId;
  const clientSecret = optionalString(value.client_secret, 'client_secret') || defaults.clientSecret;
  if (!clientId || !clientSecret) {
    throw new ConfigError('client_id and client_secret are required (config file or SPOTIFY_CLIENT_ID/SPOTIFY_CLIENT_SECRET)');
  }

  const coverImagePath = optionalString(value.cover_image_path, 'cover_image_path');

  return {
    playlists: rawPlaylists.map(parsePlaylistEntry),
    playlistPrefix: optionalString(value.playlist_prefix, 'playlist_prefix') ?? '',
    coverImagePath: coverImagePath ? coverImagePath : undefined,
    clientId,
    clientSecret
  };
}

export async function loadMigrationConfig(configPath: string, defaults?: CredentialDefaults): Promise<MigrationConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read migration config at ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`migration config at ${configPath} is not valid JSON`, { cause: error });
  }

  const config = parseMigrationConfig(parsed, defaults);
  logger.info(
    { path: configPath, playlists: config.playlists.length, prefix: config.playlistPrefix },
    'loaded migration config'
  );
  return config;
}

export function toPlaylistJobs(config: MigrationConfig): PlaylistJob[] {
  return config.playlists.map((entry, index) => ({
    id: `job-${index + 1}-${entry.id}`,
    sourcePlaylistId: entry.id,
    playlistPrefix: config.playlistPrefix,
    limit: entry.limit,
    coverImagePath: config.coverImagePath
  }));
}
