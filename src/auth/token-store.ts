import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { logger } from '../logger.js';
import type { TokenRecord, TokenStore } from './types.js';

interface StoredToken {
  access_token: string;
  refresh_token: string;
  expires_at: number;
  scopes: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export function parseStoredToken(value: unknown): TokenRecord | null {
  if (!isRecord(value)) {
    return null;
  }
  const { access_token, refresh_token, expires_at, scopes } = value;
  if (
    typeof access_token !== 'string' ||
    access_token === '' ||
    typeof refresh_token !== 'string' ||
    refresh_token === '' ||
    typeof expires_at !== 'number' ||
    !Number.isFinite(expires_at)
  ) {
    return null;
  }
  const scopeList = Array.isArray(scopes) ? scopes.filter((scope): scope is string => typeof scope === 'string') : [];
  return { accessToken: access_token, refreshToken: refresh_token, expiresAt: expires_at, scopes: scopeList };
}

export function serializeToken(record: TokenRecord): StoredToken {
  return {
    access_token: record.accessToken,
    refresh_token: record.refreshToken,
    expires_at: record.expiresAt,
    scopes: [...record.scopes]
  };
}

const isMissingFile = (error: unknown): boolean => isRecord(error) && error.code === 'ENOENT';

/**
 * Token cache on disk. Writes go to a temp file that is renamed over the cache,
 * so a crash mid-write leaves the previous credential intact.
 */
export class FileTokenStore implements TokenStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<TokenRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn({ path: this.filePath, err: error }, 'token cache is not valid JSON, ignoring it');
      return null;
    }

    const record = parseStoredToken(parsed);
    if (!record) {
      logger.warn({ path: this.filePath }, 'token cache is missing required fields, ignoring it');
    }
    return record;
  }

  async save(record: TokenRecord): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });

    try {
      await writeFile(tempPath, JSON.stringify(serializeToken(record), null, 2), { encoding: 'utf-8', mode: 0o600 });
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    logger.debug({ path: this.filePath, expiresAt: new Date(record.expiresAt).toISOString() }, 'saved token cache');
  }
}

