import got from 'got';

import { TargetApiError } from '../errors.js';
import { logger } from '../logger.js';
import { MAX_COVER_BASE64_BYTES } from '../migration/cover-image.js';
import type { AccessTokenProvider, Candidate, TargetCatalog } from '../migration/types.js';
import { describeHttpFailure } from '../utils/http-errors.js';
import type { SpotifyPlaylist, SpotifyTrack, SpotifyTrackSearchResponse, SpotifyUser } from './types.js';

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';
/** Spotify caps both search results and add-items requests */
export const MAX_SEARCH_LIMIT = 50;
export const MAX_TRACKS_PER_REQUEST = 100;

export interface SpotifyClientOptions {
  timeoutMs?: number;
  /** Visibility of playlists created by createPlaylist (default public) */
  publicPlaylists?: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isTrack = (value: unknown): value is SpotifyTrack =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.name === 'string' &&
  Array.isArray(value.artists) &&
  typeof value.duration_ms === 'number';

const isSearchResponse = (value: unknown): value is SpotifyTrackSearchResponse =>
  isRecord(value) && isRecord(value.tracks) && Array.isArray(value.tracks.items);

const isUser = (value: unknown): value is SpotifyUser => isRecord(value) && typeof value.id === 'string';

const isPlaylist = (value: unknown): value is SpotifyPlaylist =>
  isRecord(value) && typeof value.id === 'string' && typeof value.name === 'string';

const isAnything = (value: unknown): value is unknown => value !== undefined;

export const toTrackUri = (targetId: string): string => `spotify:track:${targetId}`;

export function toCandidate(track: SpotifyTrack): Candidate {
  return {
    targetId: track.id,
    title: track.name,
    artists: track.artists.map(artist => artist.name),
    album: track.album?.name ?? '',
    durationMs: track.duration_ms,
    popularity: track.popularity ?? 0
  };
}

/**
 * Target catalog over the Spotify Web API. Every call asks the token provider for a
 * valid bearer token first; HTTP failures surface as TargetApiError.
 */
export class SpotifyClient implements TargetCatalog {
  private readonly timeoutMs: number;
  private readonly publicPlaylists: boolean;
  private userId: string | null = null;

  constructor(
    private readonly tokens: AccessTokenProvider,
    options: SpotifyClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.publicPlaylists = options.publicPlaylists ?? true;
  }

  async search(query: string, limit: number): Promise<Candidate[]> {
    const boundedLimit = Math.min(Math.max(1, Math.trunc(limit)), MAX_SEARCH_LIMIT);
    const body = await this.call('search', isSearchResponse, headers =>
      got
        .get(`${SPOTIFY_API_BASE}/search`, {
          searchParams: { q: query, type: 'track', limit: boundedLimit },
          headers,
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 }
        })
        .json<unknown>()
    );

    // Spotify occasionally returns null entries in search results
    const candidates = body.tracks.items.filter(isTrack).map(toCandidate);
    logger.debug({ query, results: candidates.length }, 'spotify search');
    return candidates;
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    return this.call('get current user', isUser, headers =>
      got
        .get(`${SPOTIFY_API_BASE}/me`, {
          headers,
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 }
        })
        .json<unknown>()
    );
  }

  async createPlaylist(name: string, options: { description?: string; public?: boolean } = {}): Promise<string> {
    if (!this.userId) {
      this.userId = (await this.getCurrentUser()).id;
    }
    const userId = this.userId;

    const playlist = await this.call('create playlist', isPlaylist, headers =>
      got
        .post(`${SPOTIFY_API_BASE}/users/${encodeURIComponent(userId)}/playlists`, {
          json: {
            name,
            public: options.public ?? this.publicPlaylists,
            description: options.description ?? ''
          },
          headers,
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 }
        })
        .json<unknown>()
    );
    return playlist.id;
  }

  async uploadCover(playlistId: string, image: Buffer): Promise<void> {
    const encoded = image.toString('base64');
    if (encoded.length > MAX_COVER_BASE64_BYTES) {
      throw new TargetApiError(`cover image is ${encoded.length} bytes encoded, limit is ${MAX_COVER_BASE64_BYTES}`, {
        status: null,
        transient: false
      });
    }

    await this.call('upload cover', isAnything, async headers => {
      await got.put(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/images`, {
        body: encoded,
        headers: { ...headers, 'Content-Type': 'image/jpeg' },
        timeout: { request: this.timeoutMs },
        retry: { limit: 0 }
      });
      return true;
    });
  }

  async appendTracks(playlistId: string, targetIds: string[]): Promise<void> {
    if (targetIds.length === 0) {
      return;
    }
    if (targetIds.length > MAX_TRACKS_PER_REQUEST) {
      throw new TargetApiError(`cannot add ${targetIds.length} tracks in one request (max ${MAX_TRACKS_PER_REQUEST})`, {
        status: null,
        transient: false
      });
    }

    await this.call('append tracks', isAnything, headers =>
      got
        .post(`${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}/tracks`, {
          json: { uris: targetIds.map(toTrackUri) },
          headers,
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 }
        })
        .json<unknown>()
    );
  }

  private async call<T>(
    operation: string,
    isValid: (value: unknown) => value is T,
    send: (headers: Record<string, string>) => Promise<unknown>
  ): Promise<T> {
    // Auth errors from the token provider propagate unchanged
    const token = await this.tokens.getValidToken();

    let body: unknown;
    try {
      body = await send({ Authorization: `Bearer ${token}` });
    } catch (error) {
      const failure = describeHttpFailure(error);
      logger.debug(
        { operation, status: failure.status, transient: failure.transient, retryAfterMs: failure.retryAfterMs },
        'spotify request failed'
      );
      throw new TargetApiError(
        `spotify ${operation} failed: ${failure.message}`,
        { status: failure.status, transient: failure.transient, retryAfterMs: failure.retryAfterMs },
        { cause: error }
      );
    }

    if (!isValid(body)) {
      throw new TargetApiError(`spotify ${operation} returned a malformed response`, { status: null, transient: false });
    }
    return body;
  }
}
