import { getYear, startOfYear, addYears } from 'date-fns';
import got from 'got';

import { SourceApiError, SourceNotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { SourceCatalog, SourcePlaylist, SourceTrack } from '../migration/types.js';
import { describeHttpFailure } from '../utils/http-errors.js';
import type { NeteasePlaylistResponse, NeteaseSong, NeteaseSongDetailResponse } from './types.js';

export const NETEASE_API_BASE = 'https://music.163.com/api';
/** Song detail requests accept at most this many ids */
export const SONG_DETAIL_CHUNK = 1000;
/** publishTime values below this are placeholders */
const MIN_PLAUSIBLE_PUBLISH_MS = 1000;

const REQUEST_HEADERS = {
  Referer: 'https://music.163.com/',
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36'
};

export interface NeteaseClientOptions {
  timeoutMs?: number;
  now?: () => Date;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isPlaylistResponse = (value: unknown): value is NeteasePlaylistResponse =>
  isRecord(value) && typeof value.code === 'number';

const isSongDetailResponse = (value: unknown): value is NeteaseSongDetailResponse =>
  isRecord(value) && typeof value.code === 'number';

/**
 * Release year from a publish timestamp, or undefined when the timestamp is
 * missing or implausible (the API returns placeholder and far-future values)
 */
export function releaseYearOf(publishTime: number | null | undefined, now: Date): number | undefined {
  if (typeof publishTime !== 'number' || !Number.isFinite(publishTime)) {
    return undefined;
  }
  const nextYear = addYears(startOfYear(now), 1).getTime();
  if (publishTime < MIN_PLAUSIBLE_PUBLISH_MS || publishTime > nextYear) {
    return undefined;
  }
  return getYear(publishTime);
}

export function toSourceTrack(song: NeteaseSong, now: Date): SourceTrack {
  const artists = (song.ar ?? [])
    .map(artist => artist.name?.trim() ?? '')
    .filter(name => name.length > 0);

  return {
    sourceId: String(song.id),
    title: song.name?.trim() ?? '',
    artists,
    album: song.al?.name?.trim() ?? '',
    durationMs: typeof song.dt === 'number' && song.dt > 0 ? song.dt : 0,
    releaseYear: releaseYearOf(song.publishTime, now)
  };
}

/**
 * Source catalog over the public NetEase Cloud Music web API
 */
export class NeteaseClient implements SourceCatalog {
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: NeteaseClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.now = options.now ?? (() => new Date());
  }

  async fetchPlaylist(playlistId: string, options: { limit?: number } = {}): Promise<SourcePlaylist> {
    const response = await this.post(`${NETEASE_API_BASE}/v6/playlist/detail`, { id: playlistId, n: '100000' }, 'playlist detail');
    if (!isPlaylistResponse(response)) {
      throw new SourceApiError(`malformed playlist response for ${playlistId}`, null, false);
    }
    const playlist = response.playlist;
    if (response.code !== 200 || !playlist || !Array.isArray(playlist.trackIds)) {
      throw new SourceNotFoundError(playlistId, `netease playlist ${playlistId} not found (code ${response.code})`);
    }

    let trackIds = playlist.trackIds.map(trackId => trackId.id);
    if (options.limit !== undefined && options.limit > 0) {
      trackIds = trackIds.slice(0, options.limit);
    }

    logger.info({ playlistId, name: playlist.name, tracks: trackIds.length }, 'fetched netease playlist');

    return {
      id: String(playlist.id),
      name: playlist.name,
      coverUrl: playlist.coverImgUrl ?? undefined,
      tracks: await this.fetchSongs(trackIds)
    };
  }

  async fetchPlaylistTracks(playlistId: string): Promise<SourceTrack[]> {
    return (await this.fetchPlaylist(playlistId)).tracks;
  }

  /**
   * Song details in playlist order; ids the API does not return are dropped
   */
  private async fetchSongs(trackIds: readonly number[]): Promise<SourceTrack[]> {
    const songs = new Map<number, NeteaseSong>();

    for (let cursor = 0; cursor < trackIds.length; cursor += SONG_DETAIL_CHUNK) {
      const chunk = trackIds.slice(cursor, cursor + SONG_DETAIL_CHUNK);
      const response = await this.post(
        `${NETEASE_API_BASE}/v3/song/detail`,
        { c: JSON.stringify(chunk.map(id => ({ id }))) },
        'song detail'
      );
      if (!isSongDetailResponse(response) || response.code !== 200 || !Array.isArray(response.songs)) {
        throw new SourceApiError('malformed song detail response', null, false);
      }
      for (const song of response.songs) {
        songs.set(song.id, song);
      }
    }

    const now = this.now();
    const tracks: SourceTrack[] = [];
    for (const id of trackIds) {
      const song = songs.get(id);
      if (song) {
        tracks.push(toSourceTrack(song, now));
      } else {
        logger.warn({ songId: id }, 'netease returned no details for song, leaving it out');
      }
    }
    return tracks;
  }

  private async post(url: string, form: Record<string, string>, operation: string): Promise<unknown> {
    try {
      return await got
        .post(url, {
          form,
          headers: REQUEST_HEADERS,
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 }
        })
        .json<unknown>();
    } catch (error) {
      const failure = describeHttpFailure(error);
      throw new SourceApiError(`netease ${operation} failed: ${failure.message}`, failure.status, failure.transient, {
        cause: error
      });
    }
  }
}
