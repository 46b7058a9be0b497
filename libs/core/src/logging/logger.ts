/**
 * Logger factory
 *
 * The dashboard owns the terminal, so logs go to a file as JSON lines.
 */

import * as path from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
  /** Log file path; the parent directory is created when missing */
  file: string;
  /** Write synchronously (default: false) */
  sync?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const destination = pino.destination({
    dest: path.resolve(options.file),
    mkdir: true,
    sync: options.sync ?? false,
  });

  return pino(
    {
      name: 'opsdeck',
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ['authorization', 'headers.authorization', 'headers.Authorization', '*.apiToken', '*.bearerToken'],
        censor: '<redacted>',
      },
    },
    destination,
  );
}

/** Logger that drops everything, used where no log file is configured */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
