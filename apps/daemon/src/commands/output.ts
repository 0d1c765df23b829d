import { appendFileSync } from 'node:fs';
import { toErrorMessage } from '../errors.js';
import { getLogFilePath } from '../logger.js';

/**
 * Output helpers for the operator console.
 * Uses process.stdout/stderr directly to avoid pino JSON formatting.
 * Also appends a structured JSON line to the daemon log file for forensics.
 */

let logFileWarningShown = false;

function appendToLogFile(level: 'info' | 'error', message: string): void {
  try {
    const entry = JSON.stringify({
      level: level === 'error' ? 50 : 30,
      time: Date.now(),
      source: 'console',
      msg: message,
    });
    appendFileSync(getLogFilePath(), `${entry}\n`);
  } catch (error) {
    if (logFileWarningShown) return;
    logFileWarningShown = true;
    process.stderr.write(
      `[squadron] Warning: console output is not being logged (${toErrorMessage(error)})\n`
    );
  }
}

export function print(message: string): void {
  process.stdout.write(`${message}\n`);
  appendToLogFile('info', message);
}

export function printError(message: string): void {
  process.stderr.write(`${message}\n`);
  appendToLogFile('error', message);
}
