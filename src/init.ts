import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';

import { APP_ENV } from './config.js';
import { logger } from './logger.js';

export interface DirectoryLayout {
  configDir: string;
  dataDir: string;
  logDir: string;
}

export const MIGRATION_CONFIG_FILE = 'migration.config.json';
export const TOKEN_CACHE_FILE = '.spotify_token.json';

export function resolveLayout(): DirectoryLayout {
  return { configDir: APP_ENV.CONFIG_DIR, dataDir: APP_ENV.DATA_DIR, logDir: APP_ENV.LOG_DIR };
}

export function getMigrationConfigPath(layout: DirectoryLayout = resolveLayout()): string {
  return APP_ENV.MIGRATION_CONFIG_PATH || path.join(layout.configDir, MIGRATION_CONFIG_FILE);
}

export function getTokenCachePath(layout: DirectoryLayout = resolveLayout()): string {
  return APP_ENV.TOKEN_CACHE_PATH || path.join(layout.dataDir, TOKEN_CACHE_FILE);
}

/**
 * Create config, data and log directories and write template files on first run.
 * Returns true when a template migration config was created (nothing to migrate yet).
 */
export async function initializeDirectories(
  layout: DirectoryLayout = resolveLayout(),
  configPath: string = getMigrationConfigPath(layout)
): Promise<boolean> {
  await fs.mkdir(layout.configDir, { recursive: true });
  await fs.mkdir(layout.dataDir, { recursive: true });
  await fs.mkdir(layout.logDir, { recursive: true });

  logger.debug(layout, 'ensuring directories exist');

  const createdConfig = await createDefaultIfMissing(configPath, 'migration configuration', getDefaultMigrationConfig());
  await createDefaultIfMissing(path.join(layout.configDir, '.env'), '.env in config directory', getDefaultEnvContent());
  return createdConfig;
}

async function createDefaultIfMissing(destPath: string, description: string, defaultContent: string): Promise<boolean> {
  if (existsSync(destPath)) {
    logger.debug({ path: destPath }, `${description} already exists`);
    return false;
  }

  try {
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.writeFile(destPath, defaultContent, 'utf-8');
    logger.info({ dest: destPath }, `created default ${description}`);
    return true;
  } catch (error) {
    logger.warn({ dest: destPath, err: error }, `failed to create default ${description}`);
    return false;
  }
}

export function getDefaultMigrationConfig(): string {
  return `${JSON.stringify(
    {
      netease_playlists: [{ id: '0', limit: 0 }],
      playlist_prefix: 'NetEase - ',
      cover_image_path: '',
      client_id: '',
      client_secret: ''
    },
    null,
    2
  )}\n`;
}

function getDefaultEnvContent(): string {
  return `# Playlist Bridge Configuration
# This file is auto-generated. Add your environment variables below.

# Required unless set in migration.config.json: Spotify app credentials
# SPOTIFY_CLIENT_ID=your-spotify-client-id
# SPOTIFY_CLIENT_SECRET=your-spotify-client-secret
# SPOTIFY_REDIRECT_URI=http://127.0.0.1:8888/callback
# SPOTIFY_PUBLIC_PLAYLISTS=true

# Optional: matching
# MATCH_THRESHOLD=0.72
# SEARCH_YEAR_WINDOW=4
# RESOLVE_CONCURRENCY=1

# Optional: logging
# LOG_LEVEL=info
# CONSOLE_LOG_LEVEL=warn
# LOG_DIR=./logs
`;
}
