import got from 'got';

import type { AuthClient, TokenRecord } from '../auth/types.js';
import { AuthExpiredError, AuthTransientError, AuthorizationRequiredError, MigrationError } from '../errors.js';
import { logger } from '../logger.js';
import { describeHttpFailure, oauthErrorCode } from '../utils/http-errors.js';
import type { SpotifyTokenResponse } from './types.js';

export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

export interface SpotifyAuthClientOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs?: number;
  now?: () => number;
}

const isTokenResponse = (value: unknown): value is SpotifyTokenResponse =>
  typeof value === 'object' &&
  value !== null &&
  'access_token' in value &&
  typeof value.access_token === 'string' &&
  'expires_in' in value &&
  typeof value.expires_in === 'number';

/**
 * Authorization-code and refresh-token exchanges with HTTP Basic client authentication
 */
export class SpotifyAuthClient implements AuthClient {
  private readonly basicAuth: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(private readonly options: SpotifyAuthClientOptions) {
    this.basicAuth = Buffer.from(`${options.clientId}:${options.clientSecret}`).toString('base64');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.now = options.now ?? Date.now;
  }

  async exchangeAuthCode(code: string): Promise<TokenRecord> {
    try {
      const response = await this.requestToken({
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.options.redirectUri
      });
      if (!response.refresh_token) {
        throw new MigrationError('token response carried no refresh token');
      }
      return this.toRecord(response, response.refresh_token);
    } catch (error) {
      throw this.classify(error, 'authorization code exchange', status => {
        const reason = oauthErrorCode(error) ?? `HTTP ${status}`;
        return new AuthorizationRequiredError(`authorization code rejected (${reason})`, { cause: error });
      });
    }
  }

  async refresh(refreshToken: string): Promise<TokenRecord> {
    try {
      const response = await this.requestToken({ grant_type: 'refresh_token', refresh_token: refreshToken });
      // The accounts service only sometimes rotates the refresh token
      return this.toRecord(response, response.refresh_token ?? refreshToken);
    } catch (error) {
      throw this.classify(error, 'token refresh', status => {
        const reason = oauthErrorCode(error) ?? `HTTP ${status}`;
        return new AuthExpiredError(`refresh token rejected (${reason}), re-run authorization`, { cause: error });
      });
    }
  }

  private async requestToken(form: Record<string, string>): Promise<SpotifyTokenResponse> {
    const body = await got
      .post(SPOTIFY_TOKEN_URL, {
        form,
        headers: {
          Authorization: `Basic ${this.basicAuth}`
        },
        timeout: {
          request: this.timeoutMs
        },
        retry: {
          limit: 0
        }
      })
      .json<unknown>();

    if (!isTokenResponse(body)) {
      throw new MigrationError('malformed token response from accounts service');
    }
    return body;
  }

  private toRecord(response: SpotifyTokenResponse, refreshToken: string): TokenRecord {
    return {
      accessToken: response.access_token,
      refreshToken,
      expiresAt: this.now() + response.expires_in * 1000,
      scopes: response.scope ? response.scope.split(' ').filter(Boolean) : []
    };
  }

  private classify(error: unknown, operation: string, rejected: (status: number) => MigrationError): unknown {
    if (error instanceof MigrationError) {
      return error;
    }

    const failure = describeHttpFailure(error);
    if (failure.transient) {
      logger.warn({ operation, status: failure.status, error: failure.message }, 'accounts service unavailable');
      return new AuthTransientError(`${operation} failed: ${failure.message}`, { cause: error });
    }
    if (failure.status !== null && failure.status >= 400 && failure.status < 500) {
      logger.error({ operation, status: failure.status }, 'accounts service rejected the request');
      return rejected(failure.status);
    }
    return new MigrationError(`${operation} failed: ${failure.message}`, { cause: error });
  }
}
