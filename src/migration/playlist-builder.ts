import { PartialAppendError, isRunHaltingError } from '../errors.js';
import { logger } from '../logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { loadCoverImage, type CoverSource } from './cover-image.js';
import type { TargetCatalog } from './types.js';

/** Spotify caps items per add-tracks request */
export const MAX_APPEND_BATCH = 100;

export interface PlaylistBuilderOptions {
  batchSize?: number;
  retry?: RetryOptions;
  loadCover?: (source: CoverSource) => Promise<Buffer | null>;
}

const normalizeBatchSize = (batchSize: number | undefined): number => {
  if (!batchSize || Number.isNaN(batchSize) || batchSize <= 0) {
    return MAX_APPEND_BATCH;
  }
  return Math.min(Math.trunc(batchSize), MAX_APPEND_BATCH);
};

export class PlaylistBuilder {
  private readonly batchSize: number;
  private readonly retry: RetryOptions;
  private readonly loadCover: (source: CoverSource) => Promise<Buffer | null>;

  constructor(
    private readonly catalog: Pick<TargetCatalog, 'createPlaylist' | 'uploadCover' | 'appendTracks'>,
    options: PlaylistBuilderOptions = {}
  ) {
    this.batchSize = normalizeBatchSize(options.batchSize);
    this.retry = options.retry ?? {};
    this.loadCover = options.loadCover ?? (source => loadCoverImage(source));
  }

  /**
   * Create the target playlist. The cover is best-effort: failures are logged, never thrown.
   */
  async createPlaylist(name: string, cover?: CoverSource, description?: string): Promise<string> {
    const playlistId = await withRetry(() => this.catalog.createPlaylist(name, { description }), this.retry);
    logger.info({ name, playlistId }, 'created target playlist');

    if (cover && (cover.path || cover.url)) {
      await this.setCover(playlistId, cover);
    }

    return playlistId;
  }

  /**
   * Append in source order, one batch at a time. Returns the number of tracks appended.
   * A batch that still fails after retries raises PartialAppendError; earlier batches stay in place.
   */
  async appendTracks(playlistId: string, targetIds: readonly string[]): Promise<number> {
    let appended = 0;

    for (let cursor = 0; cursor < targetIds.length; cursor += this.batchSize) {
      const batch = targetIds.slice(cursor, cursor + this.batchSize);
      try {
        await withRetry(() => this.catalog.appendTracks(playlistId, batch), this.retry);
      } catch (error) {
        if (isRunHaltingError(error)) {
          throw error;
        }
        logger.error(
          { playlistId, appended, total: targetIds.length, err: error },
          'append batch failed, playlist left partially populated'
        );
        throw new PartialAppendError(appended, targetIds.length, { cause: error });
      }
      appended += batch.length;
      logger.debug({ playlistId, appended, total: targetIds.length }, 'appended batch');
    }

    return appended;
  }

  private async setCover(playlistId: string, cover: CoverSource): Promise<void> {
    try {
      const image = await this.loadCover(cover);
      if (!image) {
        logger.warn({ playlistId }, 'no usable cover image, keeping default cover');
        return;
      }
      await withRetry(() => this.catalog.uploadCover(playlistId, image), this.retry);
      logger.debug({ playlistId }, 'uploaded playlist cover image');
    } catch (error) {
      if (isRunHaltingError(error)) {
        throw error;
      }
      logger.warn({ playlistId, err: error }, 'failed to set playlist cover image');
    }
  }
}
