import 'dotenv/config';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { bool, cleanEnv, num, str, url } from 'envalid';

// CONFIG_DIR/.env wins over ./.env (container setups mount the config directory)
const configEnvPath = path.join(process.env.CONFIG_DIR || './config', '.env');
if (existsSync(configEnvPath)) {
  loadDotenv({ path: configEnvPath, override: true });
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const APP_ENV = cleanEnv(process.env, {
  // Spotify application credentials (can also be set in migration.config.json)
  SPOTIFY_CLIENT_ID: str({ default: '', desc: 'Spotify client ID from https://developer.spotify.com/dashboard' }),
  SPOTIFY_CLIENT_SECRET: str({ default: '', desc: 'Spotify client secret' }),
  SPOTIFY_REDIRECT_URI: url({ default: 'http://127.0.0.1:8888/callback', desc: 'Redirect URI registered for the Spotify app' }),
  SPOTIFY_PUBLIC_PLAYLISTS: bool({ default: true, desc: 'Create migrated playlists as public (false for private)' }),
  // Directories
  CONFIG_DIR: str({ default: './config', desc: 'Directory for config files (default: ./config)' }),
  DATA_DIR: str({ default: './data', desc: 'Directory for data files such as the token cache (default: ./data)' }),
  MIGRATION_CONFIG_PATH: str({ default: '', desc: 'Path to migration.config.json (default: CONFIG_DIR/migration.config.json)' }),
  TOKEN_CACHE_PATH: str({ default: '', desc: 'Path to the Spotify token cache (default: DATA_DIR/.spotify_token.json)' }),
  // HTTP
  HTTP_TIMEOUT: num({ default: 10000, desc: 'Per-request timeout in milliseconds for catalog APIs' }),
  TOKEN_SAFETY_MARGIN_SECONDS: num({ default: 60, desc: 'Refresh the access token this many seconds before it expires' }),
  // Matching parameters
  MATCH_THRESHOLD: num({ default: 0.72, desc: 'Minimum confidence (0.0-1.0) for a search result to count as a match' }),
  MATCH_TITLE_WEIGHT: num({ default: 0.6 }),
  MATCH_ARTIST_WEIGHT: num({ default: 0.3 }),
  MATCH_DURATION_WEIGHT: num({ default: 0.1 }),
  SEARCH_LIMIT: num({ default: 10, desc: 'Number of Spotify search results scored per track' }),
  SEARCH_YEAR_WINDOW: num({ default: 4, desc: 'Release year +/- window added to searches (0 disables)' }),
  RESOLVE_CONCURRENCY: num({ default: 1, desc: 'Tracks resolved in parallel within a playlist (1-4, default: 1)' }),
  APPEND_BATCH_SIZE: num({ default: 100, desc: 'Tracks added per Spotify request (max 100)' }),
  // Retry policy for transient failures (timeouts, 429, 5xx)
  RETRY_ATTEMPTS: num({ default: 3 }),
  RETRY_BASE_DELAY_MS: num({ default: 1000 }),
  RETRY_MAX_DELAY_MS: num({ default: 30000 }),
  // Logging
  LOG_LEVEL: str({ default: 'info', choices: LOG_LEVELS, desc: 'Level written to the log file' }),
  CONSOLE_LOG_LEVEL: str({ default: 'warn', choices: LOG_LEVELS, desc: 'Level written to stdout' }),
  LOG_DIR: str({ default: './logs' }),
  LOG_RETENTION_DAYS: num({ default: 30, desc: 'Delete log files older than this many days (0 disables)' }),
  LOG_RETENTION_MAX_SIZE_MB: num({ default: 5120, desc: 'Keep the newest log files within this total size (0 disables)' })
});

export type AppEnv = typeof APP_ENV;
