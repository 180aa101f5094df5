import { formatDuration } from '../utils/format-duration.js';
import type { JobResult, MatchedOutcome, OutcomeCounts, ResolutionOutcome, RunSummary } from './types.js';

export const isMatched = (outcome: ResolutionOutcome): outcome is MatchedOutcome => outcome.status === 'matched';

export function countOutcomes(outcomes: readonly ResolutionOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { matched: 0, unmatched: 0, skipped: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * The single status line printed for every job, completed or failed
 */
export function formatJobSummary(result: JobResult): string {
  const { report, state } = result;
  const name = report.targetPlaylistName ?? '(unknown playlist)';
  const { matched, unmatched, skipped } = report.counts;

  let line = `[${state.status}] ${name} (netease ${report.job.sourcePlaylistId}): matched=${matched} unmatched=${unmatched} skipped=${skipped}`;

  if (report.targetPlaylistId) {
    line += ` -> spotify ${report.targetPlaylistId}`;
  } else if (state.status === 'completed') {
    line += ' (dry run)';
  }

  if (state.status === 'failed') {
    line += ` | ${state.reason}`;
  }

  return line;
}

export function formatRunTotals(summary: RunSummary): string {
  const completed = summary.results.filter(result => result.state.status === 'completed').length;
  const failed = summary.results.length - completed;
  const totals = summary.results.reduce<OutcomeCounts>(
    (acc, result) => ({
      matched: acc.matched + result.report.counts.matched,
      unmatched: acc.unmatched + result.report.counts.unmatched,
      skipped: acc.skipped + result.report.counts.skipped
    }),
    { matched: 0, unmatched: 0, skipped: 0 }
  );
  const elapsed = formatDuration(summary.finishedAt.getTime() - summary.startedAt.getTime());

  let line = `${summary.results.length} playlist(s): ${completed} completed, ${failed} failed, ` +
    `matched=${totals.matched} unmatched=${totals.unmatched} skipped=${totals.skipped} in ${elapsed}`;
  if (summary.stopped) {
    line += ' (stopped early)';
  }
  return line;
}
