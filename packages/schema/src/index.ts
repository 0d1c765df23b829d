// Agents
export type { Agent, AgentRole, AgentStatus } from './agent.js';
export {
  AgentRoleValues,
  AgentSchema,
  AgentStatusValues,
  isActiveStatus,
  isCommander,
} from './agent.js';
export { assertNever } from './assert-never.js';
// Dangerous command detection
export type { CommandDangerLevel } from './dangerous-command.js';
export { classifyCommand, commandText, isShellTool } from './dangerous-command.js';
// Interactive requests (AskUserQuestion / ExitPlanMode / permission alerts)
export type {
  AskUserQuestionInput,
  AskUserQuestionRequest,
  DangerousCommandAlert,
  InteractiveRequest,
  InteractiveRequestKind,
  PlanAllowedPrompt,
  PlanReviewInput,
  PlanReviewRequest,
  QuestionAnswer,
  QuestionOption,
  UserQuestion,
} from './interactive-request.js';
export {
  AskUserQuestionInputSchema,
  isCheckpointRequest,
  PlanAllowedPromptSchema,
  PlanReviewInputSchema,
  QuestionOptionSchema,
  UserQuestionSchema,
} from './interactive-request.js';
// CLI stream-json protocol
export type { StreamEvent, StreamEventKind } from './stream-event.js';
export { parseStreamLine } from './stream-event.js';
// Tasks
export type { Task, TaskStatus } from './task.js';
export {
  isTerminalTaskStatus,
  TASK_TITLE_MAX_LENGTH,
  TaskSchema,
  TaskStatusValues,
  titleFromPrompt,
} from './task.js';
export type { CliToolName } from './tool-names.js';
export { CLI_TOOL_NAMES } from './tool-names.js';
