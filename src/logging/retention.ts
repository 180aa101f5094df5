import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { subDays } from 'date-fns';

import { logger } from '../logger.js';

const LOG_FILE_PATTERN = /\.log(\.gz)?$/;

export interface RetentionPolicy {
  directory: string;
  /** Delete files last modified more than this many days ago; 0 disables */
  maxDays: number;
  /** Keep the newest files whose combined size fits; 0 disables */
  maxSizeBytes: number;
  now?: Date;
}

export interface RetentionResult {
  removed: string[];
  failed: string[];
}

interface LogFile {
  path: string;
  size: number;
  modifiedAt: number;
}

async function listLogFiles(directory: string): Promise<LogFile[]> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    logger.debug({ directory, err: error }, 'log directory not readable, skipping retention');
    return [];
  }

  const files: LogFile[] = [];
  for (const name of names.filter(entry => LOG_FILE_PATTERN.test(entry))) {
    const filePath = path.join(directory, name);
    const info = await stat(filePath);
    if (info.isFile()) {
      files.push({ path: filePath, size: info.size, modifiedAt: info.mtimeMs });
    }
  }

  // Newest first
  return files.sort((a, b) => b.modifiedAt - a.modifiedAt);
}

/**
 * Age pass first, then size pass over what is left. The newest files are kept.
 */
export async function applyRetentionPolicy(policy: RetentionPolicy): Promise<RetentionResult> {
  const files = await listLogFiles(policy.directory);
  const now = policy.now ?? new Date();

  const expired = new Set<string>();
  if (policy.maxDays > 0) {
    const cutoff = subDays(now, policy.maxDays).getTime();
    for (const file of files) {
      if (file.modifiedAt < cutoff) {
        expired.add(file.path);
      }
    }
  }

  const oversized = new Set<string>();
  if (policy.maxSizeBytes > 0) {
    let total = 0;
    for (const file of files.filter(candidate => !expired.has(candidate.path))) {
      total += file.size;
      if (total > policy.maxSizeBytes) {
        oversized.add(file.path);
      }
    }
  }

  const result: RetentionResult = { removed: [], failed: [] };
  for (const file of files) {
    const reason = expired.has(file.path) ? 'age' : oversized.has(file.path) ? 'size' : null;
    if (!reason) {
      continue;
    }
    try {
      await rm(file.path);
      result.removed.push(file.path);
      logger.debug({ path: file.path, reason }, 'removed old log file');
    } catch (error) {
      result.failed.push(file.path);
      logger.warn({ path: file.path, err: error }, 'failed to remove old log file');
    }
  }

  return result;
}
