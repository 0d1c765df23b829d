import type { AgentStatus } from '@squadron/schema';

/**
 * Status each descendant takes when its commander enters a status.
 * Only the commander owns a process/session, so descendants never hold
 * an interactive status themselves.
 */
export const DESCENDANT_STATUS = {
  thinking: 'thinking',
  working: 'working',
  completed: 'completed',
  error: 'idle',
  idle: 'idle',
  requestingPermission: 'idle',
  waitingForAnswer: 'idle',
  reviewingPlan: 'thinking',
  suspended: 'idle',
} as const satisfies Record<AgentStatus, AgentStatus>;

export function descendantStatusFor(commanderStatus: AgentStatus): AgentStatus {
  return DESCENDANT_STATUS[commanderStatus];
}
