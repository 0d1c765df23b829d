import { z } from 'zod';

export const TaskStatusValues = ['pending', 'inProgress', 'completed', 'failed'] as const;
export type TaskStatus = (typeof TaskStatusValues)[number];

export const TASK_TITLE_MAX_LENGTH = 80;

export const TaskSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  prompt: z.string().min(1, 'Prompt cannot be empty'),
  /** Commander agent that owns the task's process/session */
  assignedAgentId: z.string(),
  /** Commander first, then its descendants, as they were when the task was created */
  teamAgentIds: z.array(z.string()).readonly(),
  status: z.enum(TaskStatusValues),
  progress: z.number().min(0).max(1),
  sessionId: z.string().optional(),
  result: z.string().optional(),
  error: z.string().optional(),
  /** false for simulated tasks that never start a CLI process */
  isRealExecution: z.boolean(),
  costUsd: z.number().optional(),
  durationMs: z.number().optional(),
  createdAt: z.number(),
  completedAt: z.number().optional(),
});
export type Task = z.infer<typeof TaskSchema>;

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/**
 * Derive a task title from its prompt: the first non-blank line,
 * truncated with an ellipsis.
 */
export function titleFromPrompt(prompt: string): string {
  const firstLine = prompt
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) return '';
  if (firstLine.length <= TASK_TITLE_MAX_LENGTH) return firstLine;
  return `${firstLine.slice(0, TASK_TITLE_MAX_LENGTH - 3)}...`;
}
