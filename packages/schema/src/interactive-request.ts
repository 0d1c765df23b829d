import { z } from 'zod';

/**
 * Payload schemas for the CLI tools that pause a run for the operator,
 * and the pending-request shapes the orchestrator keeps for them.
 */

export const QuestionOptionSchema = z.object({
  label: z.string().min(1),
  description: z.string().optional(),
});
export type QuestionOption = z.infer<typeof QuestionOptionSchema>;

export const UserQuestionSchema = z.object({
  question: z.string().min(1),
  header: z.string().default(''),
  /** Entries without a label are dropped rather than failing the whole question */
  options: z
    .array(z.unknown())
    .default([])
    .transform((raw) =>
      raw.flatMap((option) => {
        const parsed = QuestionOptionSchema.safeParse(option);
        return parsed.success ? [parsed.data] : [];
      })
    ),
  multiSelect: z.boolean().default(false),
});
export type UserQuestion = z.infer<typeof UserQuestionSchema>;

/** Input of the `AskUserQuestion` tool call. */
export const AskUserQuestionInputSchema = z.object({
  questions: z
    .array(z.unknown())
    .transform((raw) =>
      raw.flatMap((question) => {
        const parsed = UserQuestionSchema.safeParse(question);
        return parsed.success ? [parsed.data] : [];
      })
    ),
});
export type AskUserQuestionInput = z.infer<typeof AskUserQuestionInputSchema>;

export const PlanAllowedPromptSchema = z.object({
  tool: z.string(),
  prompt: z.string(),
});
export type PlanAllowedPrompt = z.infer<typeof PlanAllowedPromptSchema>;

/** Input of the `ExitPlanMode` tool call. */
export const PlanReviewInputSchema = z.object({
  plan: z.string().optional(),
  allowedPrompts: z
    .array(z.unknown())
    .default([])
    .transform((raw) =>
      raw.flatMap((entry) => {
        const parsed = PlanAllowedPromptSchema.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    ),
});
export type PlanReviewInput = z.infer<typeof PlanReviewInputSchema>;

/** Operator's answer to one question, matched by its position in the request. */
export interface QuestionAnswer {
  questionIndex: number;
  selectedOptions: string[];
  customText?: string;
}

interface InteractiveRequestBase {
  taskId: string;
  agentId: string;
  /** Unix timestamp in ms */
  raisedAt: number;
}

export interface DangerousCommandAlert extends InteractiveRequestBase {
  kind: 'dangerousCommand';
  tool: string;
  input: string;
  reason: string;
}

export interface AskUserQuestionRequest extends InteractiveRequestBase {
  kind: 'askUserQuestion';
  sessionId: string;
  questions: UserQuestion[];
}

export interface PlanReviewRequest extends InteractiveRequestBase {
  kind: 'planReview';
  sessionId: string;
  planContent: string;
  allowedPrompts: PlanAllowedPrompt[];
}

export type InteractiveRequest = DangerousCommandAlert | AskUserQuestionRequest | PlanReviewRequest;

export type InteractiveRequestKind = InteractiveRequest['kind'];

/** Requests that park the CLI run until the operator answers and a resume starts. */
export function isCheckpointRequest(
  request: InteractiveRequest
): request is AskUserQuestionRequest | PlanReviewRequest {
  return request.kind === 'askUserQuestion' || request.kind === 'planReview';
}
