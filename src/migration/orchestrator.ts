/**
 * Drives each playlist job through Pending → Fetching → Resolving → Building → Completed,
 * or into Failed from any of those states.
 *
 * Jobs run one after another. A failed job never stops its siblings; only auth errors
 * (no usable token) halt the whole run.
 */

import pLimit from 'p-limit';

import { PartialAppendError, isRunHaltingError } from '../errors.js';
import type { EventLevel, MigrationEventSink } from '../logging/event-sink.js';
import type { ProgressTracker } from '../utils/progress-tracker.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import type { PlaylistBuilder } from './playlist-builder.js';
import { countOutcomes, formatJobSummary, isMatched } from './report.js';
import type { TrackResolver } from './track-resolver.js';
import type {
  AccessTokenProvider,
  JobResult,
  JobStatus,
  MigrationReport,
  PlaylistJob,
  ResolutionOutcome,
  RunSummary,
  SourceCatalog,
  SourcePlaylist,
  SourceTrack
} from './types.js';

export const MAX_RESOLVE_CONCURRENCY = 4;

export interface OrchestratorDeps {
  source: SourceCatalog;
  resolver: Pick<TrackResolver, 'resolve'>;
  builder: Pick<PlaylistBuilder, 'createPlaylist' | 'appendTracks'>;
  tokens: AccessTokenProvider;
  sink: MigrationEventSink;
  progress?: ProgressTracker;
  retry?: RetryOptions;
  /** Tracks resolved in parallel within a job (1..4) */
  resolveConcurrency?: number;
  now?: () => Date;
}

export interface RunOptions {
  /** Abort to stop after the current job (tracks not yet resolved are skipped) */
  signal?: AbortSignal;
  /** Resolve and report without creating playlists */
  dryRun?: boolean;
}

/**
 * Keep the first `limit` tracks; absent or 0 keeps all
 */
export function applyLimit<T>(tracks: readonly T[], limit?: number): T[] {
  return limit !== undefined && limit > 0 ? tracks.slice(0, limit) : [...tracks];
}

/**
 * A target track matched twice in one playlist is only added once
 */
export function markDuplicates(outcomes: readonly ResolutionOutcome[]): ResolutionOutcome[] {
  const seen = new Set<string>();
  return outcomes.map(outcome => {
    if (!isMatched(outcome)) {
      return outcome;
    }
    if (seen.has(outcome.targetId)) {
      return { status: 'skipped', track: outcome.track, reason: 'duplicate of an earlier track' };
    }
    seen.add(outcome.targetId);
    return outcome;
  });
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class MigrationOrchestrator {
  private readonly now: () => Date;
  private readonly concurrency: number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    const requested = Math.trunc(deps.resolveConcurrency ?? 1);
    this.concurrency = Math.min(Math.max(1, requested), MAX_RESOLVE_CONCURRENCY);
  }

  async run(jobs: readonly PlaylistJob[], options: RunOptions = {}): Promise<RunSummary> {
    const startedAt = this.now();
    const results: JobResult[] = [];

    // Nothing can proceed without a token, so surface auth problems before touching any playlist
    try {
      await this.deps.tokens.getValidToken();
    } catch (error) {
      if (isRunHaltingError(error)) {
        this.emit('error', undefined, 'migration halted before any job started', { error: errorMessage(error) });
        return { results, halted: { error }, stopped: false, startedAt, finishedAt: this.now() };
      }
      // Transient failures are retried again by each job
      this.emit('warn', undefined, 'authorization check failed, continuing', { error: errorMessage(error) });
    }

    this.emit('info', undefined, 'migration run started', { jobs: jobs.length, dryRun: options.dryRun ?? false });

    let halted: RunSummary['halted'];
    let stopped = false;

    for (const job of jobs) {
      if (options.signal?.aborted) {
        stopped = true;
        this.emit('warn', undefined, 'migration stopped before all jobs ran', {
          remaining: jobs.length - results.length
        });
        break;
      }

      const result = await this.runJob(job, options);
      results.push(result);

      if (result.state.status === 'failed' && isRunHaltingError(result.error)) {
        halted = { error: result.error };
        this.emit('error', undefined, 'migration halted by authorization failure', {
          error: errorMessage(result.error),
          remaining: jobs.length - results.length
        });
        break;
      }
    }

    const summary: RunSummary = { results, halted, stopped, startedAt, finishedAt: this.now() };
    const completed = results.filter(result => result.state.status === 'completed').length;
    this.emit('info', undefined, 'migration run finished', {
      completed,
      failed: results.length - completed,
      stopped,
      halted: halted !== undefined
    });
    return summary;
  }

  async runJob(job: PlaylistJob, options: RunOptions = {}): Promise<JobResult> {
    const history: JobStatus[] = ['pending'];
    const report: MigrationReport = {
      job,
      sourcePlaylistName: null,
      targetPlaylistName: job.targetPlaylistName ?? null,
      targetPlaylistId: null,
      outcomes: [],
      counts: { matched: 0, unmatched: 0, skipped: 0 },
      appended: 0
    };

    const enter = (status: JobStatus): void => {
      history.push(status);
      this.emit('debug', job.id, `job ${status}`, { state: status, sourcePlaylistId: job.sourcePlaylistId });
    };

    try {
      enter('fetching');
      const playlist = await withRetry(
        () => this.deps.source.fetchPlaylist(job.sourcePlaylistId, { limit: job.limit }),
        this.deps.retry
      );
      const tracks = applyLimit(playlist.tracks, job.limit);
      report.sourcePlaylistName = playlist.name;
      report.targetPlaylistName = job.targetPlaylistName ?? `${job.playlistPrefix}${playlist.name}`;

      enter('resolving');
      report.outcomes = await this.resolveTracks(job, tracks, options.signal);
      report.counts = countOutcomes(report.outcomes);
      this.emitOutcomes(job, report.outcomes);

      if (!options.dryRun) {
        enter('building');
        report.targetPlaylistId = await this.deps.builder.createPlaylist(
          report.targetPlaylistName,
          coverFor(job, playlist),
          `Migrated from NetEase Cloud Music playlist ${job.sourcePlaylistId}`
        );
        const targetIds = report.outcomes.filter(isMatched).map(outcome => outcome.targetId);
        report.appended = await this.deps.builder.appendTracks(report.targetPlaylistId, targetIds);
      }

      history.push('completed');
      return this.finish({ state: { status: 'completed' }, history, report });
    } catch (error) {
      if (error instanceof PartialAppendError) {
        report.appended = error.appended;
      }
      history.push('failed');
      return this.finish({ state: { status: 'failed', reason: errorMessage(error) }, history, report, error });
    } finally {
      this.deps.progress?.stopTracking(job.id);
    }
  }

  private async resolveTracks(
    job: PlaylistJob,
    tracks: readonly SourceTrack[],
    signal?: AbortSignal
  ): Promise<ResolutionOutcome[]> {
    const limit = pLimit(this.concurrency);
    this.deps.progress?.startTracking(job.id, tracks.length, `resolving ${job.sourcePlaylistId}`);

    const resolveOne = async (track: SourceTrack): Promise<ResolutionOutcome> => {
      // Tracks already in flight finish; the rest are skipped so the playlist is built from what matched
      const outcome: ResolutionOutcome = signal?.aborted
        ? { status: 'skipped', track, reason: 'migration stopped' }
        : await this.deps.resolver.resolve(track);
      this.deps.progress?.advance(job.id, outcome.status);
      return outcome;
    };

    try {
      const outcomes = await Promise.all(tracks.map(track => limit(() => resolveOne(track))));
      return markDuplicates(outcomes);
    } catch (error) {
      limit.clearQueue();
      throw error;
    }
  }

  private emitOutcomes(job: PlaylistJob, outcomes: readonly ResolutionOutcome[]): void {
    outcomes.forEach((outcome, index) => {
      const fields: Record<string, unknown> = {
        position: index + 1,
        sourceId: outcome.track.sourceId,
        title: outcome.track.title,
        artists: outcome.track.artists
      };

      switch (outcome.status) {
        case 'matched':
          this.emit('info', job.id, 'track matched', {
            ...fields,
            targetId: outcome.targetId,
            confidence: Number(outcome.confidence.toFixed(3))
          });
          break;
        case 'unmatched':
          this.emit('info', job.id, 'track unmatched', {
            ...fields,
            reason: outcome.reason,
            bestConfidence: outcome.bestConfidence === undefined ? undefined : Number(outcome.bestConfidence.toFixed(3))
          });
          break;
        case 'skipped':
          this.emit('info', job.id, 'track skipped', { ...fields, reason: outcome.reason });
          break;
      }
    });
  }

  private finish(result: JobResult): JobResult {
    const { report, state } = result;
    this.emit(state.status === 'completed' ? 'info' : 'error', report.job.id, formatJobSummary(result), {
      state: state.status,
      reason: state.status === 'failed' ? state.reason : undefined,
      sourcePlaylistId: report.job.sourcePlaylistId,
      targetPlaylistName: report.targetPlaylistName,
      targetPlaylistId: report.targetPlaylistId,
      ...report.counts,
      appended: report.appended
    });
    return result;
  }

  private emit(level: EventLevel, jobId: string | undefined, message: string, fields: Record<string, unknown>): void {
    this.deps.sink.emit({ timestamp: this.now(), level, jobId, message, fields });
  }
}

function coverFor(job: PlaylistJob, playlist: SourcePlaylist) {
  return { path: job.coverImagePath, url: playlist.coverUrl };
}
