import {
  AskUserQuestionInputSchema,
  type AskUserQuestionRequest,
  type DangerousCommandAlert,
  PlanReviewInputSchema,
  type PlanReviewRequest,
} from '@squadron/schema';
import type { DangerousCommandPayload } from '../process-supervisor.js';

/**
 * Translate supervisor callbacks into pending interactive requests.
 * Payloads come straight from tool_use inputs, so they are validated here;
 * an unusable payload yields null and nothing is raised.
 */

export function createDangerousCommandAlert(
  taskId: string,
  agentId: string,
  payload: DangerousCommandPayload,
  raisedAt: number = Date.now()
): DangerousCommandAlert {
  return {
    kind: 'dangerousCommand',
    taskId,
    agentId,
    tool: payload.tool,
    input: payload.input,
    reason: payload.reason,
    raisedAt,
  };
}

export function createAskUserQuestionRequest(
  taskId: string,
  agentId: string,
  sessionId: string,
  input: unknown,
  raisedAt: number = Date.now()
): AskUserQuestionRequest | null {
  const parsed = AskUserQuestionInputSchema.safeParse(input);
  if (!parsed.success || parsed.data.questions.length === 0) {
    return null;
  }
  return {
    kind: 'askUserQuestion',
    taskId,
    agentId,
    sessionId,
    questions: parsed.data.questions,
    raisedAt,
  };
}

/**
 * Build a plan review. The plan text comes from the tool input; when the
 * input carries none, `fallbackPlan` is consulted (the CLI also writes the
 * plan to a file in plan mode).
 */
export function createPlanReviewRequest(
  taskId: string,
  agentId: string,
  sessionId: string,
  input: unknown,
  fallbackPlan: () => string | null,
  raisedAt: number = Date.now()
): PlanReviewRequest | null {
  const parsed = PlanReviewInputSchema.safeParse(input);
  const planInput = parsed.success ? parsed.data : { plan: undefined, allowedPrompts: [] };

  const inlinePlan = planInput.plan ?? '';
  const planContent = inlinePlan.trim().length > 0 ? inlinePlan : fallbackPlan();
  if (planContent === null || planContent.trim().length === 0) {
    return null;
  }

  return {
    kind: 'planReview',
    taskId,
    agentId,
    sessionId,
    planContent,
    allowedPrompts: planInput.allowedPrompts,
    raisedAt,
  };
}
