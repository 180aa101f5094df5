/**
 * Domain types shared by the resolver, the builder and the orchestrator
 */

export interface SourceTrack {
  readonly sourceId: string;
  readonly title: string;
  readonly artists: readonly string[];
  readonly album: string;
  /** 0 when the source catalog does not know the duration */
  readonly durationMs: number;
  readonly releaseYear?: number;
}

export interface SourcePlaylist {
  id: string;
  name: string;
  coverUrl?: string;
  tracks: SourceTrack[];
}

export interface Candidate {
  targetId: string;
  title: string;
  artists: string[];
  album: string;
  durationMs: number;
  popularity: number;
}

export type UnmatchedReason = 'no search results' | 'no candidate above threshold' | 'search failed';

export type ResolutionOutcome =
  | { status: 'matched'; track: SourceTrack; targetId: string; confidence: number; candidate: Candidate }
  | { status: 'unmatched'; track: SourceTrack; reason: UnmatchedReason; bestConfidence?: number }
  | { status: 'skipped'; track: SourceTrack; reason: string };

export type MatchedOutcome = Extract<ResolutionOutcome, { status: 'matched' }>;

export interface PlaylistJob {
  id: string;
  sourcePlaylistId: string;
  /** Prepended to the source playlist name to form the target name */
  playlistPrefix: string;
  /** Explicit target name; overrides prefix + source name */
  targetPlaylistName?: string;
  /** Keep only the first N source tracks; absent or 0 keeps all */
  limit?: number;
  coverImagePath?: string;
}

export type JobState =
  | { status: 'pending' }
  | { status: 'fetching' }
  | { status: 'resolving' }
  | { status: 'building' }
  | { status: 'completed' }
  | { status: 'failed'; reason: string };

export type JobStatus = JobState['status'];

export interface OutcomeCounts {
  matched: number;
  unmatched: number;
  skipped: number;
}

export interface MigrationReport {
  job: PlaylistJob;
  sourcePlaylistName: string | null;
  targetPlaylistName: string | null;
  targetPlaylistId: string | null;
  outcomes: ResolutionOutcome[];
  counts: OutcomeCounts;
  /** Tracks actually appended to the target playlist */
  appended: number;
}

export interface JobResult {
  state: Extract<JobState, { status: 'completed' | 'failed' }>;
  history: JobStatus[];
  report: MigrationReport;
  error?: unknown;
}

export interface RunSummary {
  results: JobResult[];
  /** Set when an auth failure stopped the run */
  halted?: { error: unknown };
  /** True when a stop was requested before every job ran */
  stopped: boolean;
  startedAt: Date;
  finishedAt: Date;
}

/** Read side of the source catalog */
export interface SourceCatalog {
  fetchPlaylist(playlistId: string, options?: { limit?: number }): Promise<SourcePlaylist>;
}

/** Write side of the target catalog */
export interface TargetCatalog {
  search(query: string, limit: number): Promise<Candidate[]>;
  createPlaylist(name: string, options?: { description?: string }): Promise<string>;
  uploadCover(playlistId: string, image: Buffer): Promise<void>;
  appendTracks(playlistId: string, targetIds: string[]): Promise<void>;
}

export interface AccessTokenProvider {
  getValidToken(): Promise<string>;
}
