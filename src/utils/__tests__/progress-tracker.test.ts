import { describe, it, expect, vi } from 'vitest';
import { ProgressTracker, formatETA, type ProgressUpdate } from '../progress-tracker.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('ProgressTracker', () => {
  it('tallies outcomes and estimates the remaining time', () => {
    let clock = 0;
    const tracker = new ProgressTracker(() => clock);
    tracker.startTracking('job-1', 4, 'resolving 777');

    clock = 2000;
    tracker.advance('job-1', 'matched');
    clock = 4000;
    tracker.advance('job-1', 'unmatched');

    expect(tracker.getProgress('job-1')).toEqual({
      jobId: 'job-1',
      current: 2,
      total: 4,
      message: 'resolving 777',
      percent: 50,
      eta: 4,
      tally: { matched: 1, unmatched: 1, skipped: 0 }
    });
  });

  it('broadcasts every update and the stop', () => {
    const tracker = new ProgressTracker(() => 0);
    const updates: ProgressUpdate[] = [];
    const stopped: string[] = [];
    tracker.on('progress', (update: ProgressUpdate) => updates.push(update));
    tracker.on('stopped', (jobId: string) => stopped.push(jobId));

    tracker.startTracking('job-1', 2, 'resolving');
    tracker.advance('job-1', 'skipped', 'almost done');
    tracker.stopTracking('job-1');

    expect(updates.map(update => [update.current, update.message])).toEqual([
      [0, 'resolving'],
      [1, 'almost done']
    ]);
    expect(updates[0].eta).toBeNull();
    expect(stopped).toEqual(['job-1']);
    expect(tracker.getProgress('job-1')).toBeNull();
  });

  it('never counts past the total', () => {
    const tracker = new ProgressTracker(() => 0);
    tracker.startTracking('job-1', 1, 'resolving');
    tracker.advance('job-1');
    tracker.advance('job-1');

    expect(tracker.getProgress('job-1')?.current).toBe(1);
    expect(tracker.getProgress('job-1')?.percent).toBe(100);
  });

  it('ignores updates for untracked jobs', () => {
    const tracker = new ProgressTracker();
    const listener = vi.fn();
    tracker.on('progress', listener);

    tracker.advance('missing', 'matched');
    tracker.stopTracking('missing');

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('formatETA', () => {
  it('formats seconds, minutes and hours', () => {
    expect(formatETA(null)).toBe('calculating...');
    expect(formatETA(45)).toBe('45s');
    expect(formatETA(120)).toBe('2m');
    expect(formatETA(125)).toBe('2m 5s');
    expect(formatETA(3660)).toBe('1h 1m');
    expect(formatETA(7200)).toBe('2h');
  });
});
