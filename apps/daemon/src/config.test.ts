import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseDaemonConfig } from './config.js';

describe('parseDaemonConfig', () => {
  it('applies defaults for every optional setting', () => {
    const config = parseDaemonConfig({});

    expect(config).toEqual({
      SQUADRON_CLAUDE_PATH: undefined,
      SQUADRON_CLAUDE_ARGS: [],
      LOG_LEVEL: 'info',
      SQUADRON_STATE_DIR: join(homedir(), '.squadron'),
      SQUADRON_DISBAND_DELAY_MS: 8000,
      SQUADRON_TEAM_SIZE: 2,
      SQUADRON_PROGRESS_TOOL_CALLS: 20,
      SQUADRON_STALL_TIMEOUT_MS: 0,
      CLAUDE_PLANS_DIR: join(homedir(), '.claude', 'plans'),
    });
  });

  it('splits extra CLI arguments on whitespace', () => {
    const config = parseDaemonConfig({ SQUADRON_CLAUDE_ARGS: '  --model   sonnet ' });
    expect(config.SQUADRON_CLAUDE_ARGS).toEqual(['--model', 'sonnet']);
  });

  it('parses integer settings and treats blanks as unset', () => {
    const config = parseDaemonConfig({
      SQUADRON_TEAM_SIZE: '0',
      SQUADRON_DISBAND_DELAY_MS: ' ',
      SQUADRON_STALL_TIMEOUT_MS: '120000',
    });

    expect(config.SQUADRON_TEAM_SIZE).toBe(0);
    expect(config.SQUADRON_DISBAND_DELAY_MS).toBe(8000);
    expect(config.SQUADRON_STALL_TIMEOUT_MS).toBe(120000);
  });

  it('rejects out-of-range integers', () => {
    expect(() => parseDaemonConfig({ SQUADRON_TEAM_SIZE: '-1' })).toThrow(
      ' - SQUADRON_TEAM_SIZE: SQUADRON_TEAM_SIZE must be an integer >= 0'
    );
    expect(() => parseDaemonConfig({ SQUADRON_PROGRESS_TOOL_CALLS: 'many' })).toThrow(
      'SQUADRON_PROGRESS_TOOL_CALLS must be an integer >= 1'
    );
  });

  it('reports every invalid variable in one error', () => {
    let message = '';
    try {
      parseDaemonConfig({ LOG_LEVEL: 'verbose', SQUADRON_PROGRESS_TOOL_CALLS: '0' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).toMatch(/^Environment variable validation failed:\n/);
    expect(message).toContain(' - LOG_LEVEL: ');
    expect(message).toContain(
      ' - SQUADRON_PROGRESS_TOOL_CALLS: SQUADRON_PROGRESS_TOOL_CALLS must be an integer >= 1'
    );
  });
});
