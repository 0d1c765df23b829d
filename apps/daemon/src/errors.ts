/**
 * Raised synchronously when a CLI process cannot be started at all:
 * the executable is missing or the working directory is unusable.
 */
export class SpawnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpawnError';
  }
}

/**
 * A caller broke a precondition of the orchestration contract, e.g. resuming
 * a task that is not parked at a checkpoint or starting a second process for
 * the same task. These are programming errors, not runtime conditions.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export class UnknownTaskError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Unknown task: ${taskId}`);
    this.name = 'UnknownTaskError';
    this.taskId = taskId;
  }
}

export class UnknownAgentError extends Error {
  readonly agentId: string;

  constructor(agentId: string) {
    super(`Unknown agent: ${agentId}`);
    this.name = 'UnknownAgentError';
    this.agentId = agentId;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
