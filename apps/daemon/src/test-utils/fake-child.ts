import { EventEmitter } from 'node:events';
import { vi } from 'vitest';

/**
 * Stand-in for a spawned CLI process. Tests write stream-json lines to
 * stdout and end the process explicitly; every emit is synchronous.
 */
export class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  pid: number | undefined = 4242;
  kill = vi.fn((_signal?: NodeJS.Signals) => true);

  writeJson(value: unknown): void {
    this.stdout.emit('data', Buffer.from(`${JSON.stringify(value)}\n`));
  }

  writeRaw(text: string): void {
    this.stdout.emit('data', Buffer.from(text));
  }

  writeStderr(text: string): void {
    this.stderr.emit('data', Buffer.from(text));
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('close', code, signal);
  }
}

export const systemInit = (sessionId = 'sess-1') => ({
  type: 'system',
  subtype: 'init',
  session_id: sessionId,
});

export function toolUse(name: string, input: Record<string, unknown>) {
  return {
    type: 'assistant',
    message: { content: [{ type: 'tool_use', id: `tu-${name}`, name, input }] },
  };
}

export function assistantText(text: string) {
  return { type: 'assistant', message: { content: [{ type: 'text', text }] } };
}

export function successResult(result: string) {
  return { type: 'result', subtype: 'success', result };
}
