/* eslint-disable @typescript-eslint/no-explicit-any */

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

vi.mock('got', () => ({
  default: {
    post: vi.fn()
  }
}));

import got from 'got';
import { SourceApiError, SourceNotFoundError } from '../../errors.js';
import { NETEASE_API_BASE, NeteaseClient, releaseYearOf, toSourceTrack } from '../client.js';
import type { NeteaseSong } from '../types.js';

const NOW = new Date(2024, 5, 1);

const jsonResponse = (body: unknown) => ({ json: vi.fn().mockResolvedValue(body) });

const song = (id: number): NeteaseSong => ({
  id,
  name: `Song ${id}`,
  ar: [{ id: id * 10, name: `Artist ${id}` }],
  al: { name: `Album ${id}` },
  dt: 200000 + id,
  publishTime: new Date(2010, 0, 1).getTime()
});

/**
 * Serve a playlist of the given ids; song detail answers for every requested id except `missing`
 */
function servePlaylist(trackIds: number[], missing: number[] = []) {
  (got.post as any).mockImplementation((url: string, options: { form: Record<string, string> }) => {
    if (url === `${NETEASE_API_BASE}/v6/playlist/detail`) {
      return jsonResponse({
        code: 200,
        playlist: {
          id: Number(options.form.id),
          name: 'Road Trip',
          coverImgUrl: 'https://p1.music.126.net/cover.jpg',
          trackIds: trackIds.map(id => ({ id }))
        }
      });
    }
    const requested: Array<{ id: number }> = JSON.parse(options.form.c);
    const songs = requested
      .map(entry => entry.id)
      .filter(id => !missing.includes(id))
      .reverse()
      .map(song);
    return jsonResponse({ code: 200, songs });
  });
}

describe('releaseYearOf', () => {
  it('reads the year of a plausible timestamp', () => {
    expect(releaseYearOf(new Date(2003, 6, 15).getTime(), NOW)).toBe(2003);
    expect(releaseYearOf(new Date(2024, 11, 31).getTime(), NOW)).toBe(2024);
  });

  it('drops missing, placeholder and far-future timestamps', () => {
    expect(releaseYearOf(undefined, NOW)).toBeUndefined();
    expect(releaseYearOf(null, NOW)).toBeUndefined();
    expect(releaseYearOf(0, NOW)).toBeUndefined();
    expect(releaseYearOf(new Date(2031, 0, 1).getTime(), NOW)).toBeUndefined();
  });
});

describe('toSourceTrack', () => {
  it('trims names and skips blank artists', () => {
    const track = toSourceTrack(
      { id: 42, name: ' Title ', ar: [{ name: ' A ' }, { name: '' }, { name: null }], al: null, dt: null, publishTime: 0 },
      NOW
    );

    expect(track).toEqual({
      sourceId: '42',
      title: 'Title',
      artists: ['A'],
      album: '',
      durationMs: 0,
      releaseYear: undefined
    });
  });
});

describe('NeteaseClient', () => {
  let client: NeteaseClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new NeteaseClient({ timeoutMs: 5000, now: () => NOW });
  });

  it('returns tracks in playlist order', async () => {
    servePlaylist([3, 1, 2]);

    const playlist = await client.fetchPlaylist('777');

    expect(playlist.id).toBe('777');
    expect(playlist.name).toBe('Road Trip');
    expect(playlist.coverUrl).toBe('https://p1.music.126.net/cover.jpg');
    expect(playlist.tracks.map(track => track.sourceId)).toEqual(['3', '1', '2']);
    expect(playlist.tracks[0]).toEqual({
      sourceId: '3',
      title: 'Song 3',
      artists: ['Artist 3'],
      album: 'Album 3',
      durationMs: 200003,
      releaseYear: 2010
    });
  });

  it('only requests details for the first N tracks of a limited playlist', async () => {
    servePlaylist([3, 1, 2]);

    const playlist = await client.fetchPlaylist('777', { limit: 2 });

    expect(playlist.tracks.map(track => track.sourceId)).toEqual(['3', '1']);
    const detailCall = (got.post as any).mock.calls[1];
    expect(detailCall[0]).toBe(`${NETEASE_API_BASE}/v3/song/detail`);
    expect(detailCall[1].form).toEqual({ c: '[{"id":3},{"id":1}]' });
  });

  it('requests song details in chunks of 1000', async () => {
    const ids = Array.from({ length: 1500 }, (_, index) => index + 1);
    servePlaylist(ids);

    const tracks = await client.fetchPlaylistTracks('777');

    expect(tracks).toHaveLength(1500);
    expect(tracks[1499].sourceId).toBe('1500');
    const chunkSizes = (got.post as any).mock.calls
      .slice(1)
      .map((call: [string, { form: { c: string } }]) => JSON.parse(call[1].form.c).length);
    expect(chunkSizes).toEqual([1000, 500]);
  });

  it('leaves out songs the API has no details for', async () => {
    servePlaylist([1, 2, 3], [2]);

    const tracks = await client.fetchPlaylistTracks('777');

    expect(tracks.map(track => track.sourceId)).toEqual(['1', '3']);
  });

  it('reports a missing playlist', async () => {
    (got.post as any).mockReturnValue(jsonResponse({ code: 404, msg: 'not found' }));

    const error = await client.fetchPlaylist('5').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceNotFoundError);
    expect(error).toMatchObject({ playlistId: '5', message: 'netease playlist 5 not found (code 404)' });
  });

  it('marks transport failures as transient', async () => {
    (got.post as any).mockReturnValue({
      json: vi.fn().mockRejectedValue(Object.assign(new Error('Timeout awaiting request'), { name: 'TimeoutError' }))
    });

    const error = await client.fetchPlaylist('777').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceApiError);
    expect(error).toMatchObject({
      message: 'netease playlist detail failed: Timeout awaiting request',
      status: null,
      transient: true
    });
  });

  it('sends the browser headers the web API expects', async () => {
    servePlaylist([1]);

    await client.fetchPlaylist('777');

    const [url, options] = (got.post as any).mock.calls[0];
    expect(url).toBe(`${NETEASE_API_BASE}/v6/playlist/detail`);
    expect(options.form).toEqual({ id: '777', n: '100000' });
    expect(options.headers.Referer).toBe('https://music.163.com/');
    expect(options.timeout).toEqual({ request: 5000 });
  });
});
