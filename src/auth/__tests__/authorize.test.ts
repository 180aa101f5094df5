import { describe, it, expect, vi } from 'vitest';
import { AuthorizationRequiredError } from '../../errors.js';
import { buildAuthorizeUrl, createBrowserAuthorization, parseAuthorizationCallback } from '../authorize.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

vi.mock('open', () => ({
  default: vi.fn(async () => undefined)
}));

describe('buildAuthorizeUrl', () => {
  it('requests a code with the scopes space-separated', () => {
    const url = buildAuthorizeUrl({
      clientId: 'test-client-id',
      redirectUri: 'http://127.0.0.1:8888/callback',
      scopes: ['playlist-modify-public', 'ugc-image-upload'],
      state: 'abc'
    });

    expect(url).toBe(
      'https://accounts.spotify.com/authorize?response_type=code&client_id=test-client-id' +
        '&redirect_uri=http%3A%2F%2F127.0.0.1%3A8888%2Fcallback' +
        '&scope=playlist-modify-public+ugc-image-upload&state=abc'
    );
  });

  it('can force the consent dialog', () => {
    const url = new URL(
      buildAuthorizeUrl({ clientId: 'id', redirectUri: 'http://127.0.0.1:8888/callback', scopes: [], state: 's', showDialog: true })
    );

    expect(url.searchParams.get('show_dialog')).toBe('true');
  });
});

describe('parseAuthorizationCallback', () => {
  it('returns the code when the state matches', () => {
    expect(parseAuthorizationCallback({ code: 'test-code', state: 'abc' }, 'abc')).toBe('test-code');
    expect(parseAuthorizationCallback({ code: ['first', 'second'], state: 'abc' }, 'abc')).toBe('first');
  });

  it('reports a denied consent', () => {
    expect(() => parseAuthorizationCallback({ error: 'access_denied', state: 'abc' }, 'abc')).toThrow(
      new AuthorizationRequiredError('authorization denied: access_denied')
    );
  });

  it('rejects a foreign state', () => {
    expect(() => parseAuthorizationCallback({ code: 'test-code', state: 'other' }, 'abc')).toThrow(
      'authorization callback state mismatch'
    );
  });

  it('rejects a callback without a code', () => {
    expect(() => parseAuthorizationCallback({ state: 'abc' }, 'abc')).toThrow('authorization callback carried no code');
  });
});

describe('createBrowserAuthorization', () => {
  it('gives up when no callback arrives in time', async () => {
    const authorize = createBrowserAuthorization({
      clientId: 'test-client-id',
      redirectUri: 'http://127.0.0.1:0/callback',
      timeoutMs: 20,
      openBrowser: async () => undefined
    });

    await expect(authorize(['playlist-modify-public'])).rejects.toThrow(
      new AuthorizationRequiredError('authorization timed out after 0.02s')
    );
  });
});
