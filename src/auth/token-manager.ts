/**
 * Owns the single TokenRecord of a run. Every caller goes through getValidToken(),
 * which refreshes inside the safety margin and linearizes concurrent refreshes.
 */

import { AuthTransientError, AuthorizationRequiredError } from '../errors.js';
import { logger } from '../logger.js';
import type { AccessTokenProvider } from '../migration/types.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import {
  REQUIRED_SCOPES,
  type AuthClient,
  type AuthorizationCodeProvider,
  type TokenRecord,
  type TokenState,
  type TokenStore
} from './types.js';

export const DEFAULT_SAFETY_MARGIN_MS = 60_000;

export interface TokenManagerOptions {
  store: TokenStore;
  client: AuthClient;
  /** Absent in non-interactive contexts; a missing token then raises AuthorizationRequiredError */
  authorizeInteractively?: AuthorizationCodeProvider;
  safetyMarginMs?: number;
  requiredScopes?: readonly string[];
  retry?: RetryOptions;
  now?: () => number;
}

export const hasScopes = (record: TokenRecord, required: readonly string[]): boolean =>
  required.every(scope => record.scopes.includes(scope));

export class TokenManager implements AccessTokenProvider {
  private readonly store: TokenStore;
  private readonly client: AuthClient;
  private readonly authorizeInteractively?: AuthorizationCodeProvider;
  private readonly safetyMarginMs: number;
  private readonly requiredScopes: readonly string[];
  private readonly retry: RetryOptions;
  private readonly now: () => number;

  /** undefined until the store has been read */
  private record: TokenRecord | null | undefined;
  private pending: Promise<TokenRecord> | null = null;
  private loading: Promise<TokenRecord | null> | null = null;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.client = options.client;
    this.authorizeInteractively = options.authorizeInteractively;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.requiredScopes = options.requiredScopes ?? REQUIRED_SCOPES;
    this.retry = options.retry ?? {};
    this.now = options.now ?? Date.now;
  }

  async getValidToken(): Promise<string> {
    if (this.pending) {
      return (await this.pending).accessToken;
    }

    const record = await this.loadRecord();
    if (this.pending) {
      return (await this.pending).accessToken;
    }
    if (!record || !hasScopes(record, this.requiredScopes)) {
      return (await this.singleFlight(() => this.authorizeWithCode())).accessToken;
    }

    if (this.now() < record.expiresAt - this.safetyMarginMs) {
      return record.accessToken;
    }

    return (await this.singleFlight(() => this.refresh(record))).accessToken;
  }

  async getState(): Promise<TokenState> {
    const record = await this.loadRecord();
    if (!record || !hasScopes(record, this.requiredScopes)) {
      return { status: 'unauthorized' };
    }
    return { status: 'authorized', expiresAt: record.expiresAt, scopes: [...record.scopes] };
  }

  /**
   * Run the interactive flow even when a usable token is stored
   */
  async authorize(): Promise<TokenState> {
    const record = await this.singleFlight(() => this.authorizeWithCode());
    return { status: 'authorized', expiresAt: record.expiresAt, scopes: [...record.scopes] };
  }

  private async loadRecord(): Promise<TokenRecord | null> {
    if (this.record !== undefined) {
      return this.record;
    }
    this.loading ??= this.store.load();
    const loaded = await this.loading;
    // A record persisted while the load was in flight is newer than the stored one
    if (this.record === undefined) {
      this.record = loaded;
    }
    return this.record;
  }

  private singleFlight(exchange: () => Promise<TokenRecord>): Promise<TokenRecord> {
    if (!this.pending) {
      this.pending = exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async authorizeWithCode(): Promise<TokenRecord> {
    if (!this.authorizeInteractively) {
      throw new AuthorizationRequiredError(
        this.record ? 'stored token lacks required scopes' : 'no stored token'
      );
    }

    logger.info({ scopes: this.requiredScopes }, 'interactive authorization required');
    const code = await this.authorizeInteractively(this.requiredScopes);
    // Authorization codes are single-use, so the exchange is not retried
    const record = await this.client.exchangeAuthCode(code);
    await this.persist(record);
    logger.info({ expiresAt: new Date(record.expiresAt).toISOString() }, 'authorization completed');
    return record;
  }

  private async refresh(current: TokenRecord): Promise<TokenRecord> {
    logger.debug({ expiresAt: new Date(current.expiresAt).toISOString() }, 'refreshing access token');

    const refreshed = await withRetry(() => this.client.refresh(current.refreshToken), {
      ...this.retry,
      isRetryable: error => error instanceof AuthTransientError,
      onRetry: info => {
        logger.warn({ attempt: info.attempt, delayMs: info.delayMs, err: info.error }, 'token refresh failed, retrying');
      }
    });

    const record: TokenRecord = {
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken || current.refreshToken,
      expiresAt: refreshed.expiresAt,
      scopes: refreshed.scopes.length > 0 ? refreshed.scopes : current.scopes
    };
    await this.persist(record);
    logger.info({ expiresAt: new Date(record.expiresAt).toISOString() }, 'access token refreshed');
    return record;
  }

  private async persist(record: TokenRecord): Promise<void> {
    await this.store.save(record);
    this.record = record;
  }
}
