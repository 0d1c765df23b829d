import { execFileSync } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';
import { SpawnError } from './errors.js';

const EXECUTABLE_NAME = 'claude';

/** Install locations the CLI uses that are often missing from a daemon's PATH. */
export function knownBinDirectories(): string[] {
  return [
    '/usr/local/bin',
    '/opt/homebrew/bin',
    join(homedir(), '.local', 'bin'),
    join(homedir(), '.claude', 'bin'),
  ];
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function whichClaude(): string | null {
  try {
    const found = execFileSync('which', [EXECUTABLE_NAME], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return found.length > 0 ? found : null;
  } catch {
    return null;
  }
}

/**
 * Locate the CLI executable.
 *
 * Order: explicit path (must exist) → `which claude` → known install
 * directories. Throws SpawnError when nothing is found.
 */
export function resolveClaudeExecutable(explicitPath?: string): string {
  if (explicitPath) {
    if (isExecutableFile(explicitPath)) return explicitPath;
    throw new SpawnError(`Configured claude executable is not runnable: ${explicitPath}`);
  }

  const onPath = whichClaude();
  if (onPath && isExecutableFile(onPath)) return onPath;

  for (const dir of knownBinDirectories()) {
    const candidate = join(dir, EXECUTABLE_NAME);
    if (isExecutableFile(candidate)) return candidate;
  }

  throw new SpawnError(
    'Could not find the claude executable. Install it or set SQUADRON_CLAUDE_PATH.'
  );
}

/** PATH for spawned agents: known install directories first, then the inherited PATH. */
export function buildAgentPath(inheritedPath: string | undefined): string {
  const parts = [...knownBinDirectories()];
  if (inheritedPath) parts.push(inheritedPath);
  return parts.join(delimiter);
}

export function assertWorkingDirectory(cwd: string): void {
  let isDirectory = false;
  try {
    isDirectory = statSync(cwd).isDirectory();
  } catch {
    throw new SpawnError(`Working directory does not exist: ${cwd}`);
  }
  if (!isDirectory) {
    throw new SpawnError(`Working directory is not a directory: ${cwd}`);
  }
}
