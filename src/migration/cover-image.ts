import { readFile } from 'node:fs/promises';
import got from 'got';

import { logger } from '../logger.js';

/** Spotify rejects cover uploads whose base64 payload exceeds 256 KB */
export const MAX_COVER_BASE64_BYTES = 256 * 1024;

export interface CoverSource {
  /** Cover of the source playlist; preferred when present */
  url?: string;
  /** Local image configured by the user; used when the source cover is unusable */
  path?: string;
}

export const base64Length = (byteLength: number): number => 4 * Math.ceil(byteLength / 3);

const fitsUploadLimit = (image: Buffer): boolean => base64Length(image.length) <= MAX_COVER_BASE64_BYTES;

/**
 * Load the first usable cover image, or null when none can be used
 */
export async function loadCoverImage(source: CoverSource, timeoutMs = 10000): Promise<Buffer | null> {
  if (source.url) {
    try {
      const image = await got.get(source.url, { timeout: { request: timeoutMs } }).buffer();
      if (fitsUploadLimit(image)) {
        return image;
      }
      logger.warn({ url: source.url, bytes: base64Length(image.length) }, 'source cover image too large to upload');
    } catch (error) {
      logger.warn({ url: source.url, err: error }, 'failed to fetch source cover image');
    }
  }

  if (source.path) {
    try {
      const image = await readFile(source.path);
      if (fitsUploadLimit(image)) {
        return image;
      }
      logger.warn({ path: source.path, bytes: base64Length(image.length) }, 'cover image too large to upload');
    } catch (error) {
      logger.warn({ path: source.path, err: error }, 'failed to read cover image');
    }
  }

  return null;
}
