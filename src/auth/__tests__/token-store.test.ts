import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileTokenStore, parseStoredToken, serializeToken } from '../token-store.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const record = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: 1_700_000_000_000,
  scopes: ['playlist-modify-public', 'ugc-image-upload']
};

describe('parseStoredToken', () => {
  it('reads the snake_case cache format', () => {
    expect(parseStoredToken(serializeToken(record))).toEqual(record);
  });

  it('rejects records without a refresh token or expiry', () => {
    expect(parseStoredToken({ access_token: 'a', refresh_token: '', expires_at: 1 })).toBeNull();
    expect(parseStoredToken({ access_token: 'a', refresh_token: 'r', expires_at: 'soon' })).toBeNull();
    expect(parseStoredToken('token')).toBeNull();
  });

  it('drops scopes that are not strings', () => {
    expect(parseStoredToken({ access_token: 'a', refresh_token: 'r', expires_at: 5, scopes: ['x', 3] })).toEqual({
      accessToken: 'a',
      refreshToken: 'r',
      expiresAt: 5,
      scopes: ['x']
    });
  });
});

describe('FileTokenStore', () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'token-store-'));
    filePath = path.join(directory, 'nested', '.spotify_token.json');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('returns null when no cache exists', async () => {
    await expect(new FileTokenStore(filePath).load()).resolves.toBeNull();
  });

  it('saves and loads a record', async () => {
    const store = new FileTokenStore(filePath);
    await store.save(record);

    await expect(new FileTokenStore(filePath).load()).resolves.toEqual(record);
    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expires_at: 1_700_000_000_000,
      scopes: ['playlist-modify-public', 'ugc-image-upload']
    });
  });

  it('writes the cache readable by the owner only and leaves no temp file', async () => {
    await new FileTokenStore(filePath).save(record);

    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    expect(await readdir(path.dirname(filePath))).toEqual(['.spotify_token.json']);
  });

  it('ignores a corrupt cache', async () => {
    const store = new FileTokenStore(path.join(directory, 'token.json'));
    await writeFile(store.filePath, '{not json');

    await expect(store.load()).resolves.toBeNull();
  });

  it('ignores a cache missing required fields', async () => {
    const store = new FileTokenStore(path.join(directory, 'token.json'));
    await writeFile(store.filePath, JSON.stringify({ access_token: 'only-access' }));

    await expect(store.load()).resolves.toBeNull();
  });
});
