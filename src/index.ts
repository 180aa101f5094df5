import { APP_ENV } from './config.js';
import { createBrowserAuthorization } from './auth/authorize.js';
import { TokenManager } from './auth/token-manager.js';
import { FileTokenStore } from './auth/token-store.js';
import type { TokenState, TokenStore } from './auth/types.js';
import type { MigrationConfig } from './config/migration-config.js';
import { toPlaylistJobs } from './config/migration-config.js';
import { getTokenCachePath } from './init.js';
import { logger } from './logger.js';
import { LoggerEventSink, type MigrationEventSink } from './logging/event-sink.js';
import { MigrationOrchestrator } from './migration/orchestrator.js';
import { PlaylistBuilder } from './migration/playlist-builder.js';
import { TrackResolver } from './migration/track-resolver.js';
import type { RunSummary } from './migration/types.js';
import { NeteaseClient } from './netease/client.js';
import { SpotifyAuthClient } from './spotify/auth-client.js';
import { SpotifyClient } from './spotify/client.js';
import { ProgressTracker } from './utils/progress-tracker.js';
import type { RetryOptions } from './utils/retry.js';

export interface AppOptions {
  config: MigrationConfig;
  /** Allow the browser authorization flow when no usable token is stored */
  interactive?: boolean;
  tokenStore?: TokenStore;
  sink?: MigrationEventSink;
  progress?: ProgressTracker;
  /** Prints the consent URL in case the browser cannot be opened */
  onAuthorizeUrl?: (url: string) => void;
}

export interface App {
  readonly progress: ProgressTracker;
  migrate(options?: { dryRun?: boolean; signal?: AbortSignal }): Promise<RunSummary>;
  authorize(): Promise<TokenState>;
  tokenState(): Promise<TokenState>;
}

export function retryOptionsFromEnv(): RetryOptions {
  return {
    attempts: APP_ENV.RETRY_ATTEMPTS,
    baseDelayMs: APP_ENV.RETRY_BASE_DELAY_MS,
    maxDelayMs: APP_ENV.RETRY_MAX_DELAY_MS,
    onRetry: info => {
      logger.warn({ attempt: info.attempt, delayMs: info.delayMs, err: info.error }, 'transient failure, retrying');
    }
  };
}

export const createApp = (options: AppOptions): App => {
  const { config } = options;
  const retry = retryOptionsFromEnv();
  const progress = options.progress ?? new ProgressTracker();

  const tokens = new TokenManager({
    store: options.tokenStore ?? new FileTokenStore(getTokenCachePath()),
    client: new SpotifyAuthClient({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: APP_ENV.SPOTIFY_REDIRECT_URI,
      timeoutMs: APP_ENV.HTTP_TIMEOUT
    }),
    authorizeInteractively: options.interactive
      ? createBrowserAuthorization({
          clientId: config.clientId,
          redirectUri: APP_ENV.SPOTIFY_REDIRECT_URI,
          onUrl: options.onAuthorizeUrl
        })
      : undefined,
    safetyMarginMs: APP_ENV.TOKEN_SAFETY_MARGIN_SECONDS * 1000,
    retry
  });

  const spotify = new SpotifyClient(tokens, {
    timeoutMs: APP_ENV.HTTP_TIMEOUT,
    publicPlaylists: APP_ENV.SPOTIFY_PUBLIC_PLAYLISTS
  });
  const netease = new NeteaseClient({ timeoutMs: APP_ENV.HTTP_TIMEOUT });

  const resolver = new TrackResolver(spotify, {
    matching: {
      threshold: APP_ENV.MATCH_THRESHOLD,
      weights: {
        title: APP_ENV.MATCH_TITLE_WEIGHT,
        artist: APP_ENV.MATCH_ARTIST_WEIGHT,
        duration: APP_ENV.MATCH_DURATION_WEIGHT
      },
      searchLimit: APP_ENV.SEARCH_LIMIT,
      yearWindow: APP_ENV.SEARCH_YEAR_WINDOW
    },
    retry
  });

  const builder = new PlaylistBuilder(spotify, { batchSize: APP_ENV.APPEND_BATCH_SIZE, retry });

  const orchestrator = new MigrationOrchestrator({
    source: netease,
    resolver,
    builder,
    tokens,
    sink: options.sink ?? new LoggerEventSink(),
    progress,
    retry,
    resolveConcurrency: APP_ENV.RESOLVE_CONCURRENCY
  });

  return {
    progress,
    migrate({ dryRun, signal } = {}) {
      const jobs = toPlaylistJobs(config);
      logger.info({ jobs: jobs.length, dryRun: dryRun ?? false }, 'starting migration');
      return orchestrator.run(jobs, { dryRun, signal });
    },
    authorize() {
      logger.info('starting interactive authorization');
      return tokens.authorize();
    },
    tokenState() {
      return tokens.getState();
    }
  };
};
