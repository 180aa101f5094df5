/**
 * Interactive authorization-code flow: open the consent page in a browser and
 * receive the code on a short-lived local callback server.
 */

import { randomBytes } from 'node:crypto';
import type { Server } from 'node:http';
import express from 'express';
import open from 'open';

import { AuthorizationRequiredError } from '../errors.js';
import { logger } from '../logger.js';
import type { AuthorizationCodeProvider } from './types.js';

export const SPOTIFY_AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
export const AUTHORIZATION_TIMEOUT_MS = 5 * 60 * 1000;

export interface AuthorizeUrlParams {
  clientId: string;
  redirectUri: string;
  scopes: readonly string[];
  state: string;
  showDialog?: boolean;
}

export function buildAuthorizeUrl(params: AuthorizeUrlParams): string {
  const url = new URL(SPOTIFY_AUTHORIZE_URL);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('scope', params.scopes.join(' '));
  url.searchParams.set('state', params.state);
  if (params.showDialog) {
    url.searchParams.set('show_dialog', 'true');
  }
  return url.toString();
}

const firstString = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
};

/**
 * Validate the query string of the redirect and extract the authorization code
 */
export function parseAuthorizationCallback(query: Record<string, unknown>, expectedState: string): string {
  const error = firstString(query.error);
  if (error) {
    throw new AuthorizationRequiredError(`authorization denied: ${error}`);
  }
  if (firstString(query.state) !== expectedState) {
    throw new AuthorizationRequiredError('authorization callback state mismatch');
  }
  const code = firstString(query.code);
  if (!code) {
    throw new AuthorizationRequiredError('authorization callback carried no code');
  }
  return code;
}

export interface BrowserAuthorizationOptions {
  clientId: string;
  redirectUri: string;
  timeoutMs?: number;
  openBrowser?: (url: string) => Promise<unknown>;
  /** Called with the consent URL, e.g. to print it when no browser can be opened */
  onUrl?: (url: string) => void;
}

export function createBrowserAuthorization(options: BrowserAuthorizationOptions): AuthorizationCodeProvider {
  const openBrowser = options.openBrowser ?? ((url: string) => open(url));
  const timeoutMs = options.timeoutMs ?? AUTHORIZATION_TIMEOUT_MS;

  return scopes =>
    new Promise<string>((resolve, reject) => {
      const redirect = new URL(options.redirectUri);
      const state = randomBytes(16).toString('hex');
      const authorizeUrl = buildAuthorizeUrl({
        clientId: options.clientId,
        redirectUri: options.redirectUri,
        scopes,
        state
      });

      const app = express();
      let server: Server | undefined;
      let settled = false;

      const finish = (outcome: { code: string } | { error: unknown }): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        server?.close(closeError => {
          if (closeError) {
            logger.debug({ err: closeError }, 'authorization callback server close failed');
          }
        });
        if ('code' in outcome) {
          resolve(outcome.code);
        } else {
          reject(outcome.error);
        }
      };

      const timer = setTimeout(() => {
        finish({ error: new AuthorizationRequiredError(`authorization timed out after ${timeoutMs / 1000}s`) });
      }, timeoutMs);

      app.get(redirect.pathname, (req, res) => {
        try {
          const code = parseAuthorizationCallback(req.query, state);
          res.send('<h2>Authorization complete</h2><p>You can close this tab.</p>');
          finish({ code });
        } catch (error) {
          res.status(400).send('<h2>Authorization failed</h2><p>Check the terminal for details.</p>');
          finish({ error });
        }
      });

      const port = Number(redirect.port || 80);
      server = app.listen(port, redirect.hostname, () => {
        logger.info({ redirectUri: options.redirectUri }, 'waiting for authorization callback');
        options.onUrl?.(authorizeUrl);
        openBrowser(authorizeUrl).catch((error: unknown) => {
          logger.warn({ err: error }, 'could not open a browser, open the authorization URL manually');
        });
      });
      server.on('error', error => finish({ error }));
    });
}
