import { describe, it, expect } from 'vitest';
import { createJob, createSourceTrack } from '../../__tests__/helpers/index.js';
import { countOutcomes, formatJobSummary, formatRunTotals, isMatched } from '../report.js';
import type { JobResult, MigrationReport, ResolutionOutcome } from '../types.js';

const report = (overrides: Partial<MigrationReport> = {}): MigrationReport => ({
  job: createJob(),
  sourcePlaylistName: 'Road Trip',
  targetPlaylistName: 'NE - Road Trip',
  targetPlaylistId: 'pl-1',
  outcomes: [],
  counts: { matched: 2, unmatched: 1, skipped: 0 },
  appended: 2,
  ...overrides
});

const completed = (overrides: Partial<MigrationReport> = {}): JobResult => ({
  state: { status: 'completed' },
  history: ['pending', 'fetching', 'resolving', 'building', 'completed'],
  report: report(overrides)
});

const failed = (reason: string, overrides: Partial<MigrationReport> = {}): JobResult => ({
  state: { status: 'failed', reason },
  history: ['pending', 'fetching', 'failed'],
  report: report(overrides)
});

describe('countOutcomes', () => {
  it('tallies each status', () => {
    const track = createSourceTrack();
    const outcomes: ResolutionOutcome[] = [
      { status: 'unmatched', track, reason: 'no search results' },
      { status: 'skipped', track, reason: 'missing title' },
      { status: 'unmatched', track, reason: 'search failed' }
    ];
    expect(countOutcomes(outcomes)).toEqual({ matched: 0, unmatched: 2, skipped: 1 });
    expect(outcomes.filter(isMatched)).toHaveLength(0);
  });
});

describe('formatJobSummary', () => {
  it('renders a completed job with its target playlist', () => {
    expect(formatJobSummary(completed())).toBe(
      '[completed] NE - Road Trip (netease 777): matched=2 unmatched=1 skipped=0 -> spotify pl-1'
    );
  });

  it('marks dry runs', () => {
    expect(formatJobSummary(completed({ targetPlaylistId: null }))).toBe(
      '[completed] NE - Road Trip (netease 777): matched=2 unmatched=1 skipped=0 (dry run)'
    );
  });

  it('renders the failure reason', () => {
    const result = failed('source playlist 777 not found', {
      sourcePlaylistName: null,
      targetPlaylistName: null,
      targetPlaylistId: null,
      counts: { matched: 0, unmatched: 0, skipped: 0 }
    });
    expect(formatJobSummary(result)).toBe(
      '[failed] (unknown playlist) (netease 777): matched=0 unmatched=0 skipped=0 | source playlist 777 not found'
    );
  });

  it('keeps the target playlist on a partial append', () => {
    expect(formatJobSummary(failed('append failed after 100 of 150 tracks'))).toBe(
      '[failed] NE - Road Trip (netease 777): matched=2 unmatched=1 skipped=0 -> spotify pl-1 | append failed after 100 of 150 tracks'
    );
  });
});

describe('formatRunTotals', () => {
  const summary = {
    results: [
      completed(),
      failed('boom', { counts: { matched: 0, unmatched: 0, skipped: 0 }, targetPlaylistId: null })
    ],
    stopped: false,
    startedAt: new Date(0),
    finishedAt: new Date(125000)
  };

  it('sums counts across jobs', () => {
    expect(formatRunTotals(summary)).toBe(
      '2 playlist(s): 1 completed, 1 failed, matched=2 unmatched=1 skipped=0 in 2m 5s'
    );
  });

  it('notes an early stop', () => {
    expect(formatRunTotals({ ...summary, stopped: true })).toBe(
      '2 playlist(s): 1 completed, 1 failed, matched=2 unmatched=1 skipped=0 in 2m 5s (stopped early)'
    );
  });
});
