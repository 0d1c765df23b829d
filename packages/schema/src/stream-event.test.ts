import { describe, expect, it } from 'vitest';
import { parseStreamLine } from './stream-event.js';

describe('parseStreamLine', () => {
  describe('malformed input', () => {
    it('returns null for non-JSON lines', () => {
      expect(parseStreamLine('Loading configuration...')).toBeNull();
    });

    it('returns null for blank lines', () => {
      expect(parseStreamLine('   ')).toBeNull();
    });

    it('returns null when type is missing or not a string', () => {
      expect(parseStreamLine('{"session_id":"abc"}')).toBeNull();
      expect(parseStreamLine('{"type":42}')).toBeNull();
    });

    it('returns null for JSON arrays', () => {
      expect(parseStreamLine('[{"type":"system"}]')).toBeNull();
    });
  });

  describe('system lines', () => {
    it('extracts the session id', () => {
      const line = JSON.stringify({ type: 'system', subtype: 'init', session_id: 'sess-1' });
      expect(parseStreamLine(line)).toEqual([{ kind: 'system', sessionId: 'sess-1' }]);
    });

    it('yields a null session id when absent', () => {
      expect(parseStreamLine('{"type":"system"}')).toEqual([{ kind: 'system', sessionId: null }]);
    });
  });

  describe('assistant lines', () => {
    it('emits one event per recognized content block in order', () => {
      const line = JSON.stringify({
        type: 'assistant',
        message: {
          content: [
            { type: 'text', text: 'Let me look at the file.' },
            { type: 'tool_use', id: 'tu-1', name: 'Read', input: { file_path: 'src/a.ts' } },
          ],
        },
      });

      expect(parseStreamLine(line)).toEqual([
        { kind: 'assistantText', text: 'Let me look at the file.' },
        {
          kind: 'assistantToolUse',
          toolUseId: 'tu-1',
          tool: 'Read',
          input: { file_path: 'src/a.ts' },
        },
      ]);
    });

    it('defaults missing tool input to an empty object', () => {
      const line = JSON.stringify({
        type: 'assistant',
        message: { content: [{ type: 'tool_use', id: 'tu-2', name: 'EnterPlanMode' }] },
      });

      expect(parseStreamLine(line)).toEqual([
        { kind: 'assistantToolUse', toolUseId: 'tu-2', tool: 'EnterPlanMode', input: {} },
      ]);
    });

    it('treats thinking blocks as assistant text', () => {
      const line = JSON.stringify({
        type: 'assistant',
        message: { content: [{ type: 'thinking', thinking: 'Considering options' }] },
      });

      expect(parseStreamLine(line)).toEqual([{ kind: 'assistantText', text: 'Considering options' }]);
    });

    it('reports unknown when no block is recognized', () => {
      const line = JSON.stringify({
        type: 'assistant',
        message: { content: [{ type: 'redacted_thinking', data: 'x' }] },
      });

      expect(parseStreamLine(line)).toEqual([{ kind: 'unknown', type: 'assistant' }]);
    });
  });

  describe('user lines', () => {
    it('extracts string tool results', () => {
      const line = JSON.stringify({
        type: 'user',
        message: { content: [{ type: 'tool_result', tool_use_id: 'tu-1', content: 'file contents' }] },
      });

      expect(parseStreamLine(line)).toEqual([
        { kind: 'toolResult', toolUseId: 'tu-1', output: 'file contents' },
      ]);
    });

    it('joins text parts of structured tool results', () => {
      const line = JSON.stringify({
        type: 'user',
        message: {
          content: [
            {
              type: 'tool_result',
              content: [
                { type: 'text', text: 'line one' },
                { type: 'image', source: {} },
                { type: 'text', text: 'line two' },
              ],
            },
          ],
        },
      });

      expect(parseStreamLine(line)).toEqual([
        { kind: 'toolResult', toolUseId: null, output: 'line one\nline two' },
      ]);
    });

    it('reports unknown for plain user prompts', () => {
      const line = JSON.stringify({ type: 'user', message: { content: 'hello' } });
      expect(parseStreamLine(line)).toEqual([{ kind: 'unknown', type: 'user' }]);
    });
  });

  describe('result lines', () => {
    it('parses successful results with metadata', () => {
      const line = JSON.stringify({
        type: 'result',
        subtype: 'success',
        is_error: false,
        result: 'All tests pass.',
        total_cost_usd: 0.0123,
        duration_ms: 4200,
        session_id: 'sess-9',
      });

      expect(parseStreamLine(line)).toEqual([
        {
          kind: 'resultSuccess',
          result: 'All tests pass.',
          costUsd: 0.0123,
          durationMs: 4200,
          sessionId: 'sess-9',
        },
      ]);
    });

    it('prefers cost_usd over total_cost_usd', () => {
      const line = JSON.stringify({ type: 'result', result: 'ok', cost_usd: 1, total_cost_usd: 2 });
      const events = parseStreamLine(line);
      expect(events?.[0]).toMatchObject({ kind: 'resultSuccess', costUsd: 1 });
    });

    it('detects errors from the subtype', () => {
      const line = JSON.stringify({ type: 'result', subtype: 'error_max_turns', result: 'Max turns' });
      expect(parseStreamLine(line)).toEqual([{ kind: 'resultError', error: 'Max turns' }]);
    });

    it('detects errors from a numeric is_error flag', () => {
      const line = JSON.stringify({ type: 'result', is_error: 1, error_message: 'Rate limited' });
      expect(parseStreamLine(line)).toEqual([{ kind: 'resultError', error: 'Rate limited' }]);
    });

    it('falls back to a generic error message', () => {
      const line = JSON.stringify({ type: 'result', subtype: 'error' });
      expect(parseStreamLine(line)).toEqual([{ kind: 'resultError', error: 'Unknown error' }]);
    });

    it('ignores malformed metadata instead of failing the result', () => {
      const line = JSON.stringify({ type: 'result', result: 'done', duration_ms: 'soon' });
      expect(parseStreamLine(line)).toEqual([
        { kind: 'resultSuccess', result: 'done', costUsd: null, durationMs: null, sessionId: null },
      ]);
    });
  });

  it('passes other line types through as unknown', () => {
    expect(parseStreamLine('{"type":"stream_event"}')).toEqual([
      { kind: 'unknown', type: 'stream_event' },
    ]);
  });
});
