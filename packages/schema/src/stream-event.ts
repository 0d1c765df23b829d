import { z } from 'zod';

/**
 * Normalized events carried by one line of `claude -p --output-format stream-json`.
 *
 * The CLI writes one JSON object per line. Assistant and user lines wrap a
 * message whose content blocks may each map to their own event, so a single
 * line can yield several events (e.g. text followed by a tool call).
 */
export type StreamEvent =
  | { kind: 'system'; sessionId: string | null }
  | { kind: 'assistantText'; text: string }
  | {
      kind: 'assistantToolUse';
      toolUseId: string;
      tool: string;
      input: Record<string, unknown>;
    }
  | { kind: 'toolResult'; toolUseId: string | null; output: string }
  | {
      kind: 'resultSuccess';
      result: string;
      costUsd: number | null;
      durationMs: number | null;
      sessionId: string | null;
    }
  | { kind: 'resultError'; error: string }
  | { kind: 'unknown'; type: string };

export type StreamEventKind = StreamEvent['kind'];

const LineEnvelopeSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

const SystemLineSchema = z.object({
  session_id: z.string().optional(),
});

const MessageLineSchema = z.object({
  message: z
    .object({
      content: z.union([z.string(), z.array(z.unknown())]).default([]),
    })
    .optional(),
});

const TextBlockSchema = z.object({ type: z.literal('text'), text: z.string() });

const ThinkingBlockSchema = z.object({ type: z.literal('thinking'), thinking: z.string() });

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string().default(''),
  name: z.string().default('unknown'),
  input: z.record(z.string(), z.unknown()).default({}),
});

const TextPartSchema = z.object({ type: z.literal('text'), text: z.string() });

const ToolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  tool_use_id: z.string().optional(),
  content: z.union([z.string(), z.array(z.unknown())]).optional(),
});

const ResultLineSchema = z.object({
  subtype: z.string().optional().catch(undefined),
  is_error: z.union([z.boolean(), z.number()]).optional().catch(undefined),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
  error_message: z.unknown().optional(),
  message: z.unknown().optional(),
  cost_usd: z.number().optional().catch(undefined),
  total_cost_usd: z.number().optional().catch(undefined),
  duration_ms: z.number().optional().catch(undefined),
  session_id: z.string().optional().catch(undefined),
});

function firstString(...candidates: unknown[]): string | undefined {
  return candidates.find((value): value is string => typeof value === 'string');
}

function toolResultText(content: string | unknown[] | undefined): string {
  if (content === undefined) return '';
  if (typeof content === 'string') return content;
  const texts: string[] = [];
  for (const part of content) {
    const parsed = TextPartSchema.safeParse(part);
    if (parsed.success) texts.push(parsed.data.text);
  }
  return texts.join('\n');
}

function parseAssistantBlocks(content: string | unknown[]): StreamEvent[] {
  if (typeof content === 'string') {
    return content.length > 0 ? [{ kind: 'assistantText', text: content }] : [];
  }

  const events: StreamEvent[] = [];
  for (const block of content) {
    const text = TextBlockSchema.safeParse(block);
    if (text.success) {
      events.push({ kind: 'assistantText', text: text.data.text });
      continue;
    }
    const thinking = ThinkingBlockSchema.safeParse(block);
    if (thinking.success) {
      events.push({ kind: 'assistantText', text: thinking.data.thinking });
      continue;
    }
    const toolUse = ToolUseBlockSchema.safeParse(block);
    if (toolUse.success) {
      events.push({
        kind: 'assistantToolUse',
        toolUseId: toolUse.data.id,
        tool: toolUse.data.name,
        input: toolUse.data.input,
      });
    }
  }
  return events;
}

function parseUserBlocks(content: string | unknown[]): StreamEvent[] {
  if (typeof content === 'string') return [];

  const events: StreamEvent[] = [];
  for (const block of content) {
    const toolResult = ToolResultBlockSchema.safeParse(block);
    if (toolResult.success) {
      events.push({
        kind: 'toolResult',
        toolUseId: toolResult.data.tool_use_id ?? null,
        output: toolResultText(toolResult.data.content),
      });
    }
  }
  return events;
}

function parseResult(record: Record<string, unknown>): StreamEvent {
  const parsed = ResultLineSchema.safeParse(record);
  if (!parsed.success) {
    return { kind: 'resultError', error: 'Unknown error' };
  }
  const line = parsed.data;
  const isError =
    line.subtype === 'error' ||
    (line.subtype?.startsWith('error') ?? false) ||
    Boolean(line.is_error);

  if (isError) {
    const error = firstString(line.error, line.error_message, line.result, line.message);
    return { kind: 'resultError', error: error ?? 'Unknown error' };
  }

  return {
    kind: 'resultSuccess',
    result: firstString(line.result) ?? '',
    costUsd: line.cost_usd ?? line.total_cost_usd ?? null,
    durationMs: line.duration_ms ?? null,
    sessionId: line.session_id ?? null,
  };
}

function parseMessageContent(record: Record<string, unknown>): string | unknown[] | null {
  const parsed = MessageLineSchema.safeParse(record);
  if (!parsed.success || !parsed.data.message) return null;
  return parsed.data.message.content;
}

/**
 * Parse one stdout line into the events it carries.
 *
 * Returns null when the line is not a JSON object with a string `type`;
 * callers drop such lines. Recognized lines with nothing actionable yield
 * a single `unknown` event.
 */
export function parseStreamLine(line: string): StreamEvent[] | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return null;

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const envelope = LineEnvelopeSchema.safeParse(json);
  if (!envelope.success) return null;
  const record = envelope.data;

  switch (record.type) {
    case 'system': {
      const system = SystemLineSchema.safeParse(record);
      const sessionId = system.success ? (system.data.session_id ?? null) : null;
      return [{ kind: 'system', sessionId }];
    }
    case 'assistant': {
      const content = parseMessageContent(record);
      const events = content === null ? [] : parseAssistantBlocks(content);
      return events.length > 0 ? events : [{ kind: 'unknown', type: 'assistant' }];
    }
    case 'user': {
      const content = parseMessageContent(record);
      const events = content === null ? [] : parseUserBlocks(content);
      return events.length > 0 ? events : [{ kind: 'unknown', type: 'user' }];
    }
    case 'result':
      return [parseResult(record)];
    default:
      return [{ kind: 'unknown', type: record.type }];
  }
}
