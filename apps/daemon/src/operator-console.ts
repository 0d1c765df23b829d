/**
 * Terminal front end for interactive requests.
 *
 * Requests raised by the coordinator are queued and handled one at a time:
 * the operator sees the alert, question or plan on stdout and answers on
 * stdin. A request that was cleared while the operator was typing (the task
 * was cancelled, or finished) is skipped instead of resolved.
 */

import { createInterface } from 'node:readline/promises';
import {
  type AskUserQuestionRequest,
  assertNever,
  type DangerousCommandAlert,
  type InteractiveRequest,
  type PlanReviewRequest,
  type QuestionAnswer,
  type UserQuestion,
} from '@squadron/schema';
import { print } from './commands/output.js';
import type { AgentTaskCoordinator } from './coordinator.js';
import { toErrorMessage } from './errors.js';
import { type Logger, logger as defaultLogger } from './logger.js';

export interface Prompter {
  ask(query: string): Promise<string>;
  close(): void;
}

/** Prompter on the process's stdin/stdout; pending questions reject once `signal` aborts. */
export function createReadlinePrompter(signal?: AbortSignal): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (query) => rl.question(query, { signal }),
    close: () => rl.close(),
  };
}

/**
 * Turn one line of operator input into an answer.
 * Comma-separated option numbers (1-based) select options; anything else is
 * free text. A single-select question keeps only the first pick.
 */
export function parseQuestionAnswer(
  question: UserQuestion,
  index: number,
  line: string
): QuestionAnswer {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { questionIndex: index, selectedOptions: [] };
  }

  const tokens = trimmed
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
  const picks = tokens.map((token) => (/^\d+$/.test(token) ? Number.parseInt(token, 10) : 0));
  const allOptionNumbers =
    picks.length > 0 && picks.every((pick) => pick >= 1 && pick <= question.options.length);
  if (!allOptionNumbers) {
    return { questionIndex: index, selectedOptions: [], customText: trimmed };
  }

  const labels = [...new Set(picks)].flatMap((pick) => {
    const option = question.options[pick - 1];
    return option ? [option.label] : [];
  });
  return {
    questionIndex: index,
    selectedOptions: question.multiSelect ? labels : labels.slice(0, 1),
  };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function isYes(reply: string): boolean {
  const normalized = reply.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export interface OperatorConsoleConfig {
  coordinator: AgentTaskCoordinator;
  prompter: Prompter;
  /** Defaults to print() */
  write?: (line: string) => void;
  logger?: Logger;
}

export class OperatorConsole {
  readonly #coordinator: AgentTaskCoordinator;
  readonly #prompter: Prompter;
  readonly #write: (line: string) => void;
  readonly #log: Logger;
  #queue: Promise<void> = Promise.resolve();
  #unsubscribe: (() => void) | null = null;

  constructor(config: OperatorConsoleConfig) {
    this.#coordinator = config.coordinator;
    this.#prompter = config.prompter;
    this.#write = config.write ?? print;
    this.#log = (config.logger ?? defaultLogger).child({ component: 'operator-console' });
  }

  start(): void {
    if (this.#unsubscribe) return;
    this.#unsubscribe = this.#coordinator.subscribe((event) => {
      if (event.type === 'request-raised') {
        this.#enqueue(event.request);
      }
    });
  }

  stop(): void {
    this.#unsubscribe?.();
    this.#unsubscribe = null;
    this.#prompter.close();
  }

  /** Resolves once every request queued so far has been handled. */
  idle(): Promise<void> {
    return this.#queue;
  }

  #enqueue(request: InteractiveRequest): void {
    this.#queue = this.#queue
      .then(() => this.#handle(request))
      .catch((error: unknown) => {
        if (isAbortError(error)) {
          this.#log.debug({ taskId: request.taskId }, 'Operator prompt aborted');
          return;
        }
        this.#log.error(
          { taskId: request.taskId, kind: request.kind, error: toErrorMessage(error) },
          'Failed to resolve interactive request'
        );
      });
  }

  #isPending(request: InteractiveRequest): boolean {
    return this.#coordinator.getPendingRequest(request.taskId) === request;
  }

  #skipIfStale(request: InteractiveRequest): boolean {
    if (this.#isPending(request)) return false;
    this.#write(`Request for task ${request.taskId} is no longer pending, skipping.`);
    return true;
  }

  async #handle(request: InteractiveRequest): Promise<void> {
    if (this.#skipIfStale(request)) return;

    switch (request.kind) {
      case 'dangerousCommand':
        return this.#handleDangerousCommand(request);
      case 'askUserQuestion':
        return this.#handleQuestion(request);
      case 'planReview':
        return this.#handlePlanReview(request);
      default:
        assertNever(request);
    }
  }

  async #handleDangerousCommand(request: DangerousCommandAlert): Promise<void> {
    this.#write(`Dangerous command in task ${request.taskId} (${request.reason})`);
    this.#write(`  ${request.tool}: ${request.input}`);
    const reply = await this.#prompter.ask('Let it continue? [y/N] ');

    if (this.#skipIfStale(request)) return;
    if (isYes(reply)) {
      this.#coordinator.dismissDangerousCommand(request.taskId);
    } else {
      this.#coordinator.cancelDangerousCommand(request.taskId);
    }
  }

  async #handleQuestion(request: AskUserQuestionRequest): Promise<void> {
    const answers: QuestionAnswer[] = [];

    for (const [index, question] of request.questions.entries()) {
      this.#write(question.header ? `[${question.header}] ${question.question}` : question.question);
      for (const [optionIndex, option] of question.options.entries()) {
        const description = option.description ? ` - ${option.description}` : '';
        this.#write(`  ${optionIndex + 1}. ${option.label}${description}`);
      }
      const hint = question.multiSelect ? 'numbers separated by commas, or text' : 'number or text';
      const line = await this.#prompter.ask(`Answer (${hint}): `);
      answers.push(parseQuestionAnswer(question, index, line));
    }

    if (this.#skipIfStale(request)) return;
    await this.#coordinator.answerQuestion(request.taskId, answers);
  }

  async #handlePlanReview(request: PlanReviewRequest): Promise<void> {
    this.#write('--- Proposed plan ---');
    this.#write(request.planContent);
    this.#write('---------------------');
    const reply = await this.#prompter.ask('Approve this plan? [y/N] ');

    if (isYes(reply)) {
      if (this.#skipIfStale(request)) return;
      await this.#coordinator.approvePlan(request.taskId);
      return;
    }

    const feedback = await this.#prompter.ask('What should change? ');
    if (this.#skipIfStale(request)) return;
    await this.#coordinator.rejectPlan(request.taskId, feedback);
  }
}
