/**
 * Names of the CLI's built-in tools that the orchestrator reacts to.
 * Tool names are matched exactly as they appear in `tool_use` blocks.
 */
export const CLI_TOOL_NAMES = {
  ASK_USER_QUESTION: 'AskUserQuestion',
  ENTER_PLAN_MODE: 'EnterPlanMode',
  EXIT_PLAN_MODE: 'ExitPlanMode',
} as const;

export type CliToolName = (typeof CLI_TOOL_NAMES)[keyof typeof CLI_TOOL_NAMES];
