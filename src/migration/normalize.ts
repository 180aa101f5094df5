import type { SourceTrack } from './types.js';

// (...)  （...）  [...]  【...】
const BRACKETED_SEGMENT = /\([^)]*\)|（[^）]*）|\[[^\]]*\]|【[^】]*】/g;
const PUNCTUATION = /[^\p{L}\p{M}\p{N}\s]/gu;

/**
 * Remove qualifiers such as "(Live)" or "（伴奏）"; they rarely appear
 * in the target's titles and shrink search results.
 */
export const stripBracketed = (text: string): string => text.replace(BRACKETED_SEGMENT, ' ');

/**
 * Strip punctuation and collapse whitespace, keeping the original casing
 */
export const cleanText = (text: string): string => {
  return text
    .normalize('NFKC')
    .replace(PUNCTUATION, '')
    .replace(/\s+/g, ' ')
    .trim();
};

/**
 * Comparison form: cleaned and lower-cased
 */
export const normalizeForComparison = (text: string): string => cleanText(text).toLowerCase();

export interface SearchQueryOptions {
  /** +/- years around the release year; 0 disables the year filter */
  yearWindow: number;
}

export interface SearchQueries {
  primary: string;
  /** Same query without the year filter, tried when the primary one finds nothing */
  fallback?: string;
}

export function buildSearchQueries(track: SourceTrack, options: SearchQueryOptions): SearchQueries {
  const title = cleanText(stripBracketed(track.title)) || cleanText(track.title);
  const primaryArtist = track.artists.length > 0 ? cleanText(track.artists[0]) : '';
  const base = [title, primaryArtist].filter(part => part.length > 0).join(' ');

  if (track.releaseYear === undefined || options.yearWindow <= 0) {
    return { primary: base };
  }

  const from = track.releaseYear - options.yearWindow;
  const to = track.releaseYear + options.yearWindow;
  return { primary: `year:${from}-${to} ${base}`, fallback: base };
}
