import path from 'node:path';
import { format } from 'date-fns';
import pino from 'pino';

import { APP_ENV } from './config.js';

const ACTIVE_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const isActiveLevel = (value: string): value is pino.Level => ACTIVE_LEVELS.includes(value);

const consoleLevel = APP_ENV.CONSOLE_LOG_LEVEL;

const destinations = pino.multistream(
  isActiveLevel(consoleLevel) ? [{ level: consoleLevel, stream: process.stdout }] : []
);

export const logger = pino(
  {
    level: isActiveLevel(consoleLevel) ? consoleLevel : 'silent',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  },
  destinations
);

/**
 * Start writing logs to LOG_DIR/yyyy-MM-dd.log in addition to stdout.
 * Returns the file path, or null when file logging is silenced.
 */
export function enableFileLogging(directory: string, now: Date = new Date()): string | null {
  const fileLevel = APP_ENV.LOG_LEVEL;
  if (!isActiveLevel(fileLevel)) {
    return null;
  }

  const filePath = path.join(directory, `${format(now, 'yyyy-MM-dd')}.log`);
  destinations.add({
    level: fileLevel,
    stream: pino.destination({ dest: filePath, mkdir: true, sync: true })
  });

  // The root level gates every stream, so it must be the most verbose of the two
  const current = pino.levels.values[logger.level] ?? Number.POSITIVE_INFINITY;
  if (pino.levels.values[fileLevel] < current) {
    logger.level = fileLevel;
  }

  logger.debug({ filePath, level: fileLevel }, 'file logging enabled');
  return filePath;
}

export type Logger = typeof logger;
