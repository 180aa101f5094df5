/**
 * Progress tracking for running migration jobs
 * Keeps in-memory state per job and broadcasts updates to listeners (the CLI progress line)
 */

import { EventEmitter } from 'node:events';
import { logger } from '../logger.js';

export interface OutcomeTally {
  matched: number;
  unmatched: number;
  skipped: number;
}

interface JobProgress {
  jobId: string;
  current: number;
  total: number;
  message: string;
  startTime: number;
  lastUpdateTime: number;
  tally: OutcomeTally;
}

export interface ProgressUpdate {
  jobId: string;
  current: number;
  total: number;
  message: string;
  percent: number;
  eta: number | null; // seconds remaining
  tally: OutcomeTally;
}

export class ProgressTracker extends EventEmitter {
  private jobs: Map<string, JobProgress> = new Map();

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  startTracking(jobId: string, total: number, message: string): void {
    const now = this.now();
    this.jobs.set(jobId, {
      jobId,
      current: 0,
      total,
      message,
      startTime: now,
      lastUpdateTime: now,
      tally: { matched: 0, unmatched: 0, skipped: 0 }
    });

    logger.debug({ jobId, total, message }, 'started progress tracking');
    this.emitUpdate(jobId);
  }

  /**
   * Record one more processed item, optionally counting its outcome
   */
  advance(jobId: string, outcome?: keyof OutcomeTally, message?: string): void {
    const progress = this.jobs.get(jobId);
    if (!progress) {
      logger.warn({ jobId }, 'attempted to update progress for untracked job');
      return;
    }

    progress.current = Math.min(progress.current + 1, progress.total);
    progress.lastUpdateTime = this.now();
    if (outcome) {
      progress.tally[outcome]++;
    }
    if (message) {
      progress.message = message;
    }

    this.emitUpdate(jobId);
  }

  getProgress(jobId: string): ProgressUpdate | null {
    const progress = this.jobs.get(jobId);
    if (!progress) {
      return null;
    }

    return {
      jobId: progress.jobId,
      current: progress.current,
      total: progress.total,
      message: progress.message,
      percent: progress.total > 0 ? Math.floor((progress.current / progress.total) * 100) : 100,
      eta: this.calculateETA(progress),
      tally: { ...progress.tally }
    };
  }

  stopTracking(jobId: string): void {
    if (this.jobs.delete(jobId)) {
      logger.debug({ jobId }, 'stopped progress tracking');
      this.emit('stopped', jobId);
    }
  }

  /**
   * Calculate ETA in seconds based on current progress rate
   */
  private calculateETA(progress: JobProgress): number | null {
    if (progress.current === 0) {
      return null;
    }

    const elapsed = (progress.lastUpdateTime - progress.startTime) / 1000;
    if (elapsed <= 0) {
      return null;
    }

    const rate = progress.current / elapsed; // items per second
    return Math.ceil((progress.total - progress.current) / rate);
  }

  private emitUpdate(jobId: string): void {
    const update = this.getProgress(jobId);
    if (update) {
      this.emit('progress', update);
    }
  }
}

/**
 * Helper to format ETA as human-readable string
 */
export function formatETA(seconds: number | null): string {
  if (seconds === null) {
    return 'calculating...';
  }

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}
