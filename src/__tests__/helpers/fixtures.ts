/**
 * Builders for domain objects used across tests
 */

import type { Candidate, PlaylistJob, SourcePlaylist, SourceTrack } from '../../migration/types.js';

export function createSourceTrack(overrides: Partial<SourceTrack> = {}): SourceTrack {
  return {
    sourceId: '1001',
    title: 'Test Song',
    artists: ['Test Artist'],
    album: 'Test Album',
    durationMs: 200000,
    ...overrides
  };
}

/**
 * Tracks "Song 1".."Song n" by "Artist 1".."Artist n", ids 1..n
 */
export function createSourceTracks(count: number): SourceTrack[] {
  return Array.from({ length: count }, (_, index) =>
    createSourceTrack({
      sourceId: String(index + 1),
      title: `Song ${index + 1}`,
      artists: [`Artist ${index + 1}`],
      durationMs: 180000 + index * 1000
    })
  );
}

/**
 * A candidate identical to the source track in title, artists and duration
 */
export function createPerfectCandidate(track: SourceTrack, targetId: string, popularity = 50): Candidate {
  return {
    targetId,
    title: track.title,
    artists: [...track.artists],
    album: track.album,
    durationMs: track.durationMs,
    popularity
  };
}

export function createCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    targetId: 'sp-1',
    title: 'Test Song',
    artists: ['Test Artist'],
    album: 'Test Album',
    durationMs: 200000,
    popularity: 50,
    ...overrides
  };
}

export function createSourcePlaylist(tracks: SourceTrack[], overrides: Partial<SourcePlaylist> = {}): SourcePlaylist {
  return {
    id: '777',
    name: 'Road Trip',
    tracks,
    ...overrides
  };
}

export function createJob(overrides: Partial<PlaylistJob> = {}): PlaylistJob {
  return {
    id: 'job-1-777',
    sourcePlaylistId: '777',
    playlistPrefix: 'NE - ',
    ...overrides
  };
}
