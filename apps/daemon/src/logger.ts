/**
 * Logger for the orchestrator process.
 * Logs go to stderr so stdout stays free for the operator console, and to
 * $SQUADRON_STATE_DIR/daemon-debug.log for post-mortem debugging.
 *
 * Uses process.env directly (not daemonConfig): config.ts is loaded lazily by
 * the entry point, and tests import modules that log without any config.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';

const LOG_DIR = process.env.SQUADRON_STATE_DIR || join(homedir(), '.squadron');
const LOG_FILE = join(LOG_DIR, 'daemon-debug.log');

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

export function getLogFilePath(): string {
  return LOG_FILE;
}

/** Skip file logging in test environment to avoid filesystem side effects. */
const isTest = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
let fileLoggingEnabled = !isTest;
if (fileLoggingEnabled && !existsSync(LOG_DIR)) {
  try {
    mkdirSync(LOG_DIR, { recursive: true });
  } catch {
    process.stderr.write(
      `[squadron] Warning: Failed to create log directory ${LOG_DIR}, file logging disabled\n`
    );
    fileLoggingEnabled = false;
  }
}

/** Streams accept everything; the logger's own level does the filtering. */
const streams: pino.StreamEntry[] = fileLoggingEnabled
  ? [
      { level: 'trace', stream: pino.destination(2) },
      { level: 'trace', stream: pino.destination(LOG_FILE) },
    ]
  : [{ level: 'trace', stream: pino.destination(2) }];

export const logger = pino(
  {
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
