/**
 * Resolve a source track to the best-matching target catalog track
 *
 * confidence = weighted mean of
 *   title similarity    (Dice bigram coefficient over normalized titles)
 *   artist overlap      (|A ∩ B| / min(|A|, |B|) over normalized names)
 *   duration closeness  (1 - min(1, |Δms| / tolerance))
 * Terms without data on the source side are dropped and the remaining weights renormalized.
 */

import { stringSimilarity } from 'string-similarity-js';

import { isRunHaltingError } from '../errors.js';
import { logger } from '../logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { buildSearchQueries, normalizeForComparison, stripBracketed } from './normalize.js';
import type { Candidate, ResolutionOutcome, SourceTrack, TargetCatalog } from './types.js';

export interface MatchWeights {
  title: number;
  artist: number;
  duration: number;
}

export interface MatchingOptions {
  threshold: number;
  weights: MatchWeights;
  searchLimit: number;
  durationToleranceMs: number;
  yearWindow: number;
}

export const DEFAULT_MATCHING_OPTIONS: MatchingOptions = {
  threshold: 0.72,
  weights: { title: 0.6, artist: 0.3, duration: 0.1 },
  searchLimit: 10,
  durationToleranceMs: 15000,
  yearWindow: 4
};

export interface CandidateScore {
  confidence: number;
  title: number;
  artist: number | null;
  duration: number | null;
}

export interface RankedCandidate {
  candidate: Candidate;
  score: CandidateScore;
  index: number;
}

export function resolveMatchingOptions(
  overrides: Partial<Omit<MatchingOptions, 'weights'>> & { weights?: Partial<MatchWeights> } = {}
): MatchingOptions {
  return {
    ...DEFAULT_MATCHING_OPTIONS,
    ...overrides,
    weights: { ...DEFAULT_MATCHING_OPTIONS.weights, ...overrides.weights }
  };
}

export function textSimilarity(a: string, b: string): number {
  const left = normalizeForComparison(a);
  const right = normalizeForComparison(b);
  if (left.length === 0 || right.length === 0) {
    return 0;
  }
  if (left === right) {
    return 1;
  }
  return stringSimilarity(left, right);
}

export function titleSimilarity(sourceTitle: string, candidateTitle: string): number {
  return Math.max(
    textSimilarity(sourceTitle, candidateTitle),
    textSimilarity(stripBracketed(sourceTitle), stripBracketed(candidateTitle))
  );
}

/**
 * Returns null when the source lists no artists (term is skipped)
 */
export function artistOverlap(sourceArtists: readonly string[], candidateArtists: readonly string[]): number | null {
  const source = new Set(sourceArtists.map(normalizeForComparison).filter(name => name.length > 0));
  if (source.size === 0) {
    return null;
  }
  const candidate = new Set(candidateArtists.map(normalizeForComparison).filter(name => name.length > 0));
  if (candidate.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const name of source) {
    if (candidate.has(name)) {
      shared++;
    }
  }
  return shared / Math.min(source.size, candidate.size);
}

/**
 * Returns null when either side has no duration (term is skipped)
 */
export function durationCloseness(sourceMs: number, candidateMs: number, toleranceMs: number): number | null {
  if (sourceMs <= 0 || candidateMs <= 0) {
    return null;
  }
  return 1 - Math.min(1, Math.abs(sourceMs - candidateMs) / toleranceMs);
}

export function scoreCandidate(
  track: SourceTrack,
  candidate: Candidate,
  options: MatchingOptions = DEFAULT_MATCHING_OPTIONS
): CandidateScore {
  const title = titleSimilarity(track.title, candidate.title);
  const artist = artistOverlap(track.artists, candidate.artists);
  const duration = durationCloseness(track.durationMs, candidate.durationMs, options.durationToleranceMs);

  const terms: Array<[weight: number, value: number]> = [[options.weights.title, title]];
  if (artist !== null) terms.push([options.weights.artist, artist]);
  if (duration !== null) terms.push([options.weights.duration, duration]);

  let weighted = 0;
  let totalWeight = 0;
  for (const [weight, value] of terms) {
    weighted += weight * value;
    totalWeight += weight;
  }

  const confidence = totalWeight > 0 ? Math.min(1, Math.max(0, weighted / totalWeight)) : 0;
  return { confidence, title, artist, duration };
}

/**
 * Highest confidence wins; ties go to higher popularity, then to the earlier search result
 */
export function selectBestCandidate(
  track: SourceTrack,
  candidates: readonly Candidate[],
  options: MatchingOptions = DEFAULT_MATCHING_OPTIONS
): RankedCandidate | null {
  let best: RankedCandidate | null = null;

  for (const [index, candidate] of candidates.entries()) {
    const score = scoreCandidate(track, candidate, options);
    if (
      best === null ||
      score.confidence > best.score.confidence ||
      (score.confidence === best.score.confidence && candidate.popularity > best.candidate.popularity)
    ) {
      best = { candidate, score, index };
    }
  }

  return best;
}

export interface TrackResolverOptions {
  matching?: Partial<Omit<MatchingOptions, 'weights'>> & { weights?: Partial<MatchWeights> };
  retry?: RetryOptions;
}

export class TrackResolver {
  private readonly options: MatchingOptions;
  private readonly retry: RetryOptions;

  constructor(
    private readonly catalog: Pick<TargetCatalog, 'search'>,
    options: TrackResolverOptions = {}
  ) {
    this.options = resolveMatchingOptions(options.matching);
    this.retry = options.retry ?? {};
  }

  async resolve(track: SourceTrack): Promise<ResolutionOutcome> {
    if (track.title.trim().length === 0) {
      return { status: 'skipped', track, reason: 'missing title' };
    }

    const queries = buildSearchQueries(track, { yearWindow: this.options.yearWindow });
    let candidates: Candidate[];

    try {
      candidates = await this.search(queries.primary);
      if (candidates.length === 0 && queries.fallback) {
        logger.debug({ query: queries.primary }, 'no results with year filter, retrying without it');
        candidates = await this.search(queries.fallback);
      }
    } catch (error) {
      if (isRunHaltingError(error)) {
        throw error;
      }
      logger.warn(
        { sourceId: track.sourceId, title: track.title, query: queries.primary, err: error },
        'track search failed'
      );
      return { status: 'unmatched', track, reason: 'search failed' };
    }

    const best = selectBestCandidate(track, candidates, this.options);
    if (best === null) {
      return { status: 'unmatched', track, reason: 'no search results' };
    }

    logger.debug(
      {
        source: `${track.artists.join(', ')} - ${track.title}`,
        candidate: `${best.candidate.artists.join(', ')} - ${best.candidate.title}`,
        confidence: best.score.confidence.toFixed(3),
        title: best.score.title.toFixed(3),
        artist: best.score.artist?.toFixed(3),
        duration: best.score.duration?.toFixed(3)
      },
      'best candidate scored'
    );

    if (best.score.confidence >= this.options.threshold) {
      return {
        status: 'matched',
        track,
        targetId: best.candidate.targetId,
        confidence: best.score.confidence,
        candidate: best.candidate
      };
    }

    return {
      status: 'unmatched',
      track,
      reason: 'no candidate above threshold',
      bestConfidence: best.score.confidence
    };
  }

  private search(query: string): Promise<Candidate[]> {
    return withRetry(() => this.catalog.search(query, this.options.searchLimit), {
      ...this.retry,
      onRetry: info => {
        logger.debug({ query, attempt: info.attempt, delayMs: info.delayMs }, 'retrying search');
        this.retry.onRetry?.(info);
      }
    });
  }
}
