import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { type Logger, logger as defaultLogger } from '../logger.js';

/**
 * Read the most recently modified `*.md` file in the CLI's plans directory.
 * Returns null when the directory is missing, empty or unreadable.
 */
export function readLatestPlanFile(dir: string, log: Logger = defaultLogger): string | null {
  let names: string[];
  try {
    names = readdirSync(dir).filter((name) => name.endsWith('.md'));
  } catch (error) {
    log.debug({ dir, error }, 'Plans directory not readable');
    return null;
  }

  let latest: { path: string; mtimeMs: number } | null = null;
  for (const name of names) {
    const path = join(dir, name);
    try {
      const stats = statSync(path);
      if (!stats.isFile()) continue;
      if (!latest || stats.mtimeMs > latest.mtimeMs) {
        latest = { path, mtimeMs: stats.mtimeMs };
      }
    } catch (error) {
      log.debug({ path, error }, 'Skipping unreadable plan file');
    }
  }

  if (!latest) return null;

  try {
    return readFileSync(latest.path, 'utf-8');
  } catch (error) {
    log.warn({ path: latest.path, error }, 'Failed to read plan file');
    return null;
  }
}
