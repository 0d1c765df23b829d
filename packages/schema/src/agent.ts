import { z } from 'zod';

/**
 * Lifecycle status of an agent.
 * - idle: Nothing assigned, or paused while its commander waits on the operator
 * - thinking: Producing assistant text / planning
 * - working: Running tools
 * - completed: Last task finished successfully
 * - error: Last task failed
 * - requestingPermission: Commander raised a dangerous-command alert
 * - waitingForAnswer: Commander asked the operator a question
 * - reviewingPlan: Commander submitted a plan for approval
 * - suspended: Parked by the operator; no work is dispatched
 */
export const AgentStatusValues = [
  'idle',
  'thinking',
  'working',
  'completed',
  'error',
  'requestingPermission',
  'waitingForAnswer',
  'reviewingPlan',
  'suspended',
] as const;
export type AgentStatus = (typeof AgentStatusValues)[number];

export const AgentRoleValues = [
  'commander',
  'developer',
  'researcher',
  'reviewer',
  'tester',
  'designer',
] as const;
export type AgentRole = (typeof AgentRoleValues)[number];

export const AgentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1, 'Agent name cannot be empty'),
  role: z.enum(AgentRoleValues),
  status: z.enum(AgentStatusValues),
  /** null marks a commander (top-level) agent */
  parentId: z.string().nullable(),
  createdAt: z.number(),
});
export type Agent = z.infer<typeof AgentSchema>;

export function isCommander(agent: Pick<Agent, 'parentId'>): boolean {
  return agent.parentId === null;
}

/** Statuses during which an agent's team counts as active. */
export function isActiveStatus(status: AgentStatus): boolean {
  return status === 'working' || status === 'thinking';
}
