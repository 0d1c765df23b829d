/**
 * Agent/task coordinator - owns the agent hierarchy, the task list and the
 * pending interactive requests.
 *
 * Every mutation happens synchronously on the event loop: supervisor
 * callbacks, operator calls and disband jobs all funnel through this class,
 * so no locking is needed. Agents live in a flat map keyed by id with a
 * parentId back-reference; descendants are found by filtering.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  type Agent,
  type AgentRole,
  type AgentStatus,
  type InteractiveRequest,
  type InteractiveRequestKind,
  isActiveStatus,
  isCommander,
  type QuestionAnswer,
  type Task,
  titleFromPrompt,
} from '@squadron/schema';
import { nanoid } from 'nanoid';
import {
  DEFAULT_DISBAND_DELAY_MS,
  DisbandScheduler,
  type PresentationLayer,
} from './disband-scheduler.js';
import {
  ContractViolationError,
  UnknownAgentError,
  UnknownTaskError,
  toErrorMessage,
} from './errors.js';
import {
  formatPlanApproval,
  formatPlanRejection,
  formatQuestionAnswers,
} from './interactive/format-answers.js';
import { readLatestPlanFile } from './interactive/plan-file.js';
import {
  createAskUserQuestionRequest,
  createDangerousCommandAlert,
  createPlanReviewRequest,
} from './interactive/requests.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import {
  type CompletionDetails,
  DEFAULT_EXIT_GRACE_MS,
  type OutputEntry,
  type ProcessRunner,
  type SupervisorCallbacks,
} from './process-supervisor.js';
import { descendantStatusFor } from './status-propagation.js';
import { createTeamRoster } from './team-factory.js';

export const DEFAULT_TEAM_SIZE = 2;
export const CANCELLED_ERROR = 'Cancelled by operator';
export const SIMULATED_RESULT = 'Simulated task completed';

/** Statuses that mirror a pending interactive request and are never set by hand */
const REQUEST_HELD_STATUSES: ReadonlySet<AgentStatus> = new Set([
  'requestingPermission',
  'waitingForAnswer',
  'reviewingPlan',
]);

export type RequestClearReason = 'resolved' | 'cancelled' | 'superseded' | 'terminal';

export type CoordinatorEvent =
  | { type: 'agent-added'; agent: Agent }
  | { type: 'agent-status-changed'; agent: Agent; previous: AgentStatus }
  | { type: 'task-updated'; task: Task }
  | { type: 'request-raised'; request: InteractiveRequest }
  | { type: 'request-cleared'; request: InteractiveRequest; reason: RequestClearReason }
  | { type: 'team-disbanded'; commanderId: string; agentIds: string[]; taskIds: string[] }
  | { type: 'output'; taskId: string; entry: OutputEntry };

export type CoordinatorListener = (event: CoordinatorEvent) => void;

export interface AddAgentInput {
  name: string;
  role: AgentRole;
  /** Omit for a commander */
  parentId?: string | null;
}

export interface SubmitTaskOptions {
  /** Defaults to the coordinator's working directory */
  workingDirectory?: string;
}

export interface ConnectionPair {
  parentId: string;
  childId: string;
}

export interface CoordinatorConfig {
  supervisor: ProcessRunner;
  /** Default working directory for submitted tasks */
  workingDirectory: string;
  /** Sub-agents per new team. Defaults to 2. */
  teamSize?: number;
  disbandDelayMs?: number;
  presentation?: PresentationLayer;
  /** Where the CLI writes plan files. Defaults to ~/.claude/plans */
  plansDir?: string;
  /** Fallback plan lookup. Defaults to the newest file in plansDir. */
  readPlanFile?: () => string | null;
  /** How long a parked process may linger before a resume terminates it */
  resumeGraceMs?: number;
  logger?: Logger;
  now?: () => number;
}

type RequestOfKind<K extends InteractiveRequestKind> = Extract<InteractiveRequest, { kind: K }>;

function isRequestOfKind<K extends InteractiveRequestKind>(
  request: InteractiveRequest,
  kind: K
): request is RequestOfKind<K> {
  return request.kind === kind;
}

export class AgentTaskCoordinator {
  readonly #agents = new Map<string, Agent>();
  readonly #tasks = new Map<string, Task>();
  readonly #pending = new Map<string, InteractiveRequest>();
  readonly #workingDirectories = new Map<string, string>();
  /** Bumped per resume so a stale resume never starts a process */
  readonly #resumeTokens = new Map<string, number>();
  readonly #listeners = new Set<CoordinatorListener>();
  readonly #supervisor: ProcessRunner;
  readonly #scheduler: DisbandScheduler;
  readonly #workingDirectory: string;
  readonly #teamSize: number;
  readonly #readPlanFile: () => string | null;
  readonly #resumeGraceMs: number;
  readonly #log: Logger;
  readonly #now: () => number;
  #teamCounter = 0;

  constructor(config: CoordinatorConfig) {
    this.#supervisor = config.supervisor;
    this.#workingDirectory = config.workingDirectory;
    this.#teamSize = config.teamSize ?? DEFAULT_TEAM_SIZE;
    this.#resumeGraceMs = config.resumeGraceMs ?? DEFAULT_EXIT_GRACE_MS;
    this.#log = (config.logger ?? defaultLogger).child({ component: 'coordinator' });
    this.#now = config.now ?? Date.now;

    const plansDir = config.plansDir ?? join(homedir(), '.claude', 'plans');
    this.#readPlanFile = config.readPlanFile ?? (() => readLatestPlanFile(plansDir, this.#log));

    this.#scheduler = new DisbandScheduler({
      delayMs: config.disbandDelayMs ?? DEFAULT_DISBAND_DELAY_MS,
      isTeamCompleted: (commanderId) => this.#isTeamCompleted(commanderId),
      teamMembers: (commanderId) => [commanderId, ...this.#descendantIds(commanderId)],
      onDisband: (commanderId) => this.#disbandTeam(commanderId),
      presentation: config.presentation,
      logger: this.#log,
    });
  }

  subscribe(listener: CoordinatorListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  // Agents

  addAgent(input: AddAgentInput): Agent {
    const name = input.name.trim();
    if (name.length === 0) {
      throw new ContractViolationError('Agent name cannot be empty');
    }

    const parentId = input.parentId ?? null;
    const commanderShaped = isCommander({ parentId });
    if (commanderShaped && input.role !== 'commander') {
      throw new ContractViolationError('An agent without a parent must be a commander');
    }
    if (!commanderShaped && input.role === 'commander') {
      throw new ContractViolationError('A commander cannot have a parent');
    }

    let status: AgentStatus = 'idle';
    if (parentId !== null) {
      if (!this.#agents.has(parentId)) {
        throw new UnknownAgentError(parentId);
      }
      const commander = this.#rootCommander(parentId);
      status = commander ? descendantStatusFor(commander.status) : 'idle';
    }

    const agent: Agent = {
      id: nanoid(),
      name,
      role: input.role,
      status,
      parentId,
      createdAt: this.#now(),
    };
    this.#insertAgent(agent);
    return { ...agent };
  }

  /** Create a commander with `subAgentCount` sub-agents. Returns the commander first. */
  createTeam(subAgentCount: number = this.#teamSize): Agent[] {
    if (!Number.isInteger(subAgentCount) || subAgentCount < 0) {
      throw new ContractViolationError(`Invalid team size: ${subAgentCount}`);
    }
    this.#teamCounter += 1;
    const roster = createTeamRoster(this.#teamCounter, subAgentCount, { now: this.#now() });
    for (const agent of roster) {
      this.#insertAgent(agent);
    }
    this.#log.info({ commanderId: roster[0]?.id, size: roster.length }, 'Team created');
    return roster.map((agent) => ({ ...agent }));
  }

  /**
   * Operator-driven status change for an idle commander (e.g. suspending it).
   * Propagates to the commander's current descendants.
   */
  updateAgentStatus(agentId: string, status: AgentStatus): Agent {
    const commander = this.#requireCommander(agentId);
    if (REQUEST_HELD_STATUSES.has(status)) {
      throw new ContractViolationError(
        `Status ${status} is only set while an interactive request is pending`
      );
    }
    if (this.#activeTaskFor(agentId)) {
      throw new ContractViolationError(
        `Agent ${agentId} has a task in progress; its status is driven by that task`
      );
    }
    this.#applyCommanderStatus(agentId, status, this.#descendantIds(agentId));
    return { ...(this.#agents.get(agentId) ?? commander) };
  }

  // Tasks

  submitTask(prompt: string, targetAgentId: string, options: SubmitTaskOptions = {}): Task {
    const task = this.#createTask(prompt, targetAgentId, true);
    const workingDirectory = options.workingDirectory ?? this.#workingDirectory;
    this.#workingDirectories.set(task.id, workingDirectory);

    try {
      this.#supervisor.start(
        { taskId: task.id, agentId: targetAgentId, prompt: task.prompt, workingDirectory },
        this.#callbacksFor(task.id)
      );
    } catch (error) {
      this.#log.error({ taskId: task.id, error: toErrorMessage(error) }, 'Failed to start task');
      this.#failTask(task.id, toErrorMessage(error));
      throw error;
    }

    return this.#snapshotTask(task.id);
  }

  submitTaskWithNewTeam(prompt: string, options: SubmitTaskOptions = {}): Task {
    if (prompt.trim().length === 0) {
      throw new ContractViolationError('Prompt cannot be empty');
    }
    const [commander] = this.createTeam();
    if (!commander) {
      throw new ContractViolationError('Team has no commander');
    }
    return this.submitTask(prompt, commander.id, options);
  }

  /** A task that never starts a process; driven by reportSimulatedProgress. */
  addSimulatedTask(prompt: string, targetAgentId: string): Task {
    const task = this.#createTask(prompt, targetAgentId, false);
    return { ...task };
  }

  reportSimulatedProgress(taskId: string, progress: number): void {
    const task = this.#requireTask(taskId);
    if (task.isRealExecution) {
      throw new ContractViolationError(`Task ${taskId} is backed by a process`);
    }
    if (task.status !== 'inProgress') return;

    const clamped = Math.min(Math.max(progress, 0), 1);
    if (clamped >= 1) {
      this.#completeTask(taskId, SIMULATED_RESULT, {
        costUsd: null,
        durationMs: null,
        sessionId: null,
      });
      return;
    }
    if (clamped > task.progress) {
      this.#updateTask(taskId, { progress: clamped });
    }
  }

  /**
   * Cancel an in-progress task. The task ends `failed` and its commander
   * goes back to idle. Returns false when the task was already terminal.
   */
  cancelTask(taskId: string): boolean {
    const task = this.#requireTask(taskId);
    if (task.status !== 'inProgress') return false;

    if (task.isRealExecution) {
      this.#supervisor.cancel(taskId);
    }
    this.#resumeTokens.set(taskId, (this.#resumeTokens.get(taskId) ?? 0) + 1);
    this.#clearPending(taskId, 'cancelled');

    this.#updateTask(taskId, {
      status: 'failed',
      error: CANCELLED_ERROR,
      completedAt: this.#now(),
    });
    this.#applyCommanderStatus(task.assignedAgentId, 'idle', task.teamAgentIds);
    this.#log.info({ taskId }, 'Task cancelled');
    return true;
  }

  // Interactive resolution

  /** Acknowledge a dangerous-command alert. The process keeps running. */
  dismissDangerousCommand(taskId: string): void {
    const { task, request } = this.#requirePending(taskId, 'dangerousCommand');
    this.#pending.delete(taskId);
    this.#emit({ type: 'request-cleared', request, reason: 'resolved' });
    this.#applyCommanderStatus(task.assignedAgentId, 'working', task.teamAgentIds);
  }

  cancelDangerousCommand(taskId: string): boolean {
    this.#requirePending(taskId, 'dangerousCommand');
    return this.cancelTask(taskId);
  }

  async answerQuestion(taskId: string, answers: readonly QuestionAnswer[]): Promise<void> {
    const { task, request } = this.#requirePending(taskId, 'askUserQuestion');
    await this.#resume(task, request, formatQuestionAnswers(request.questions, answers));
  }

  async approvePlan(taskId: string): Promise<void> {
    const { task, request } = this.#requirePending(taskId, 'planReview');
    await this.#resume(task, request, formatPlanApproval());
  }

  async rejectPlan(taskId: string, feedback?: string): Promise<void> {
    const { task, request } = this.#requirePending(taskId, 'planReview');
    await this.#resume(task, request, formatPlanRejection(feedback));
  }

  // Queries

  getAgent(agentId: string): Agent | undefined {
    const agent = this.#agents.get(agentId);
    return agent ? { ...agent } : undefined;
  }

  getTask(taskId: string): Task | undefined {
    const task = this.#tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  listAgents(): Agent[] {
    return [...this.#agents.values()].map((agent) => ({ ...agent }));
  }

  listTasks(): Task[] {
    return [...this.#tasks.values()].map((task) => ({ ...task }));
  }

  getPendingRequest(taskId: string): InteractiveRequest | undefined {
    return this.#pending.get(taskId);
  }

  listPendingRequests(): InteractiveRequest[] {
    return [...this.#pending.values()];
  }

  /** Breadth-first descendants of an agent. */
  descendantsOf(agentId: string): Agent[] {
    return this.#descendantIds(agentId).flatMap((id) => {
      const agent = this.#agents.get(id);
      return agent ? [{ ...agent }] : [];
    });
  }

  /** The commander followed by its descendants. */
  teamOf(commanderId: string): Agent[] {
    const commander = this.#requireCommander(commanderId);
    return [{ ...commander }, ...this.descendantsOf(commanderId)];
  }

  /** Mean progress of tasks assigned to the agent or its descendants; 0 when none. */
  aggregateProgress(agentId: string): number {
    const ids = new Set([agentId, ...this.#descendantIds(agentId)]);
    const tasks = [...this.#tasks.values()].filter((task) => ids.has(task.assignedAgentId));
    if (tasks.length === 0) return 0;
    return tasks.reduce((sum, task) => sum + task.progress, 0) / tasks.length;
  }

  connectionPairs(): ConnectionPair[] {
    const pairs: ConnectionPair[] = [];
    for (const agent of this.#agents.values()) {
      if (agent.parentId !== null && this.#agents.has(agent.parentId)) {
        pairs.push({ parentId: agent.parentId, childId: agent.id });
      }
    }
    return pairs;
  }

  isDisbandScheduled(commanderId: string): boolean {
    return this.#scheduler.isScheduled(commanderId);
  }

  /** Stop every process and pending disband. */
  shutdown(): void {
    this.#scheduler.cancelAll();
    this.#supervisor.cancelAll();
  }

  // Internals

  #emit(event: CoordinatorEvent): void {
    for (const listener of this.#listeners) {
      try {
        listener(event);
      } catch (error) {
        this.#log.error({ error, event: event.type }, 'Coordinator listener threw');
      }
    }
  }

  #insertAgent(agent: Agent): void {
    this.#agents.set(agent.id, agent);
    this.#emit({ type: 'agent-added', agent: { ...agent } });
  }

  #requireTask(taskId: string): Task {
    const task = this.#tasks.get(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    return task;
  }

  #requireCommander(agentId: string): Agent {
    const agent = this.#agents.get(agentId);
    if (!agent) throw new UnknownAgentError(agentId);
    if (!isCommander(agent)) {
      throw new ContractViolationError(`Agent ${agentId} is not a commander`);
    }
    return agent;
  }

  #requirePending<K extends InteractiveRequestKind>(
    taskId: string,
    kind: K
  ): { task: Task; request: RequestOfKind<K> } {
    const task = this.#requireTask(taskId);
    const request = this.#pending.get(taskId);
    if (!request || !isRequestOfKind(request, kind)) {
      throw new ContractViolationError(
        `Task ${taskId} has no pending ${kind} request (pending: ${request?.kind ?? 'none'})`
      );
    }
    return { task, request };
  }

  #rootCommander(agentId: string): Agent | undefined {
    let current = this.#agents.get(agentId);
    const seen = new Set<string>();
    while (current && current.parentId !== null && !seen.has(current.id)) {
      seen.add(current.id);
      current = this.#agents.get(current.parentId);
    }
    return current;
  }

  #descendantIds(agentId: string): string[] {
    const result: string[] = [];
    const queue = [agentId];
    const visited = new Set([agentId]);
    while (queue.length > 0) {
      const parentId = queue.shift();
      for (const agent of this.#agents.values()) {
        if (agent.parentId === parentId && !visited.has(agent.id)) {
          visited.add(agent.id);
          result.push(agent.id);
          queue.push(agent.id);
        }
      }
    }
    return result;
  }

  #activeTaskFor(commanderId: string): Task | undefined {
    for (const task of this.#tasks.values()) {
      if (task.assignedAgentId === commanderId && task.status === 'inProgress') {
        return task;
      }
    }
    return undefined;
  }

  #createTask(prompt: string, targetAgentId: string, isRealExecution: boolean): Task {
    if (prompt.trim().length === 0) {
      throw new ContractViolationError('Prompt cannot be empty');
    }
    this.#requireCommander(targetAgentId);
    const active = this.#activeTaskFor(targetAgentId);
    if (active) {
      throw new ContractViolationError(
        `Agent ${targetAgentId} already has task ${active.id} in progress`
      );
    }

    const task: Task = {
      id: nanoid(),
      title: titleFromPrompt(prompt),
      prompt,
      assignedAgentId: targetAgentId,
      teamAgentIds: Object.freeze([targetAgentId, ...this.#descendantIds(targetAgentId)]),
      status: 'inProgress',
      progress: 0,
      isRealExecution,
      createdAt: this.#now(),
    };
    this.#tasks.set(task.id, task);
    this.#emit({ type: 'task-updated', task: { ...task } });
    this.#log.info(
      { taskId: task.id, agentId: targetAgentId, real: isRealExecution },
      'Task submitted'
    );

    this.#scheduler.cancel(targetAgentId);
    this.#applyCommanderStatus(targetAgentId, 'working', task.teamAgentIds);
    return task;
  }

  #snapshotTask(taskId: string): Task {
    return { ...this.#requireTask(taskId) };
  }

  #updateTask(taskId: string, patch: Partial<Omit<Task, 'id'>>): void {
    const current = this.#tasks.get(taskId);
    if (!current) return;
    const next: Task = { ...current, ...patch };
    this.#tasks.set(taskId, next);
    this.#emit({ type: 'task-updated', task: { ...next } });
  }

  #setAgentStatus(agentId: string, status: AgentStatus): void {
    const agent = this.#agents.get(agentId);
    if (!agent || agent.status === status) return;
    const next: Agent = { ...agent, status };
    this.#agents.set(agentId, next);
    this.#emit({ type: 'agent-status-changed', agent: { ...next }, previous: agent.status });
  }

  /**
   * Set a commander's status and propagate it to `members` (the task's team
   * snapshot) and to every current descendant, including agents that joined
   * after the task started.
   */
  #applyCommanderStatus(
    commanderId: string,
    status: AgentStatus,
    members: readonly string[]
  ): void {
    if (!this.#agents.has(commanderId)) return;

    this.#setAgentStatus(commanderId, status);
    const descendantStatus = descendantStatusFor(status);
    const targets = new Set([...members, ...this.#descendantIds(commanderId)]);
    for (const memberId of targets) {
      if (memberId !== commanderId) {
        this.#setAgentStatus(memberId, descendantStatus);
      }
    }

    if (isActiveStatus(status)) {
      this.#scheduler.cancel(commanderId);
    } else if (status === 'completed') {
      this.#scheduler.scheduleIfNeeded(commanderId);
    }
  }

  #isTeamCompleted(commanderId: string): boolean {
    const commander = this.#agents.get(commanderId);
    if (!commander || commander.status !== 'completed') return false;
    if (this.#activeTaskFor(commanderId)) return false;
    return this.#descendantIds(commanderId).every(
      (id) => this.#agents.get(id)?.status === 'completed'
    );
  }

  #disbandTeam(commanderId: string): void {
    const agentIds = [commanderId, ...this.#descendantIds(commanderId)];
    const members = new Set(agentIds);
    const taskIds: string[] = [];

    for (const task of this.#tasks.values()) {
      if (members.has(task.assignedAgentId) && task.status === 'completed') {
        taskIds.push(task.id);
      }
    }
    for (const taskId of taskIds) {
      this.#tasks.delete(taskId);
      this.#pending.delete(taskId);
      this.#workingDirectories.delete(taskId);
      this.#resumeTokens.delete(taskId);
      this.#supervisor.forget(taskId);
    }
    for (const agentId of agentIds) {
      this.#agents.delete(agentId);
    }

    this.#log.info({ commanderId, agentIds, taskIds }, 'Team disbanded');
    this.#emit({ type: 'team-disbanded', commanderId, agentIds, taskIds });
  }

  #clearPending(taskId: string, reason: RequestClearReason): void {
    const request = this.#pending.get(taskId);
    if (!request) return;
    this.#pending.delete(taskId);
    this.#emit({ type: 'request-cleared', request, reason });
  }

  #completeTask(taskId: string, result: string, details: CompletionDetails): void {
    const task = this.#tasks.get(taskId);
    if (!task || task.status !== 'inProgress') return;

    this.#clearPending(taskId, 'terminal');
    const patch: Partial<Omit<Task, 'id'>> = {
      status: 'completed',
      progress: 1,
      result,
      completedAt: this.#now(),
    };
    if (details.costUsd !== null) patch.costUsd = details.costUsd;
    if (details.durationMs !== null) patch.durationMs = details.durationMs;
    if (details.sessionId !== null) patch.sessionId = details.sessionId;
    this.#updateTask(taskId, patch);
    this.#log.info({ taskId }, 'Task completed');
    this.#applyCommanderStatus(task.assignedAgentId, 'completed', task.teamAgentIds);
  }

  #failTask(taskId: string, error: string): void {
    const task = this.#tasks.get(taskId);
    if (!task || task.status !== 'inProgress') return;

    this.#clearPending(taskId, 'terminal');
    this.#updateTask(taskId, { status: 'failed', error, completedAt: this.#now() });
    this.#log.warn({ taskId, error }, 'Task failed');
    this.#applyCommanderStatus(task.assignedAgentId, 'error', task.teamAgentIds);
  }

  /** The task while it is in progress, else undefined. */
  #liveTask(taskId: string): Task | undefined {
    const task = this.#tasks.get(taskId);
    if (!task || task.status !== 'inProgress') return undefined;
    return task;
  }

  /** Raise a request, enforcing at most one per task. */
  #raise(task: Task, request: InteractiveRequest, status: AgentStatus): void {
    const existing = this.#pending.get(task.id);
    if (existing) {
      if (existing.kind === 'dangerousCommand' && request.kind !== 'dangerousCommand') {
        this.#clearPending(task.id, 'superseded');
      } else {
        this.#log.warn(
          { taskId: task.id, pending: existing.kind, incoming: request.kind },
          'Ignoring interactive request while another is pending'
        );
        return;
      }
    }

    if (request.kind !== 'dangerousCommand') {
      this.#updateTask(task.id, { sessionId: request.sessionId });
    }
    this.#pending.set(task.id, request);
    this.#applyCommanderStatus(task.assignedAgentId, status, task.teamAgentIds);
    this.#emit({ type: 'request-raised', request });
  }

  async #resume(
    task: Task,
    request: RequestOfKind<'askUserQuestion' | 'planReview'>,
    prompt: string
  ): Promise<void> {
    if (!task.isRealExecution || request.sessionId.length === 0) {
      throw new ContractViolationError(`Task ${task.id} has no session to resume`);
    }

    this.#pending.delete(task.id);
    this.#emit({ type: 'request-cleared', request, reason: 'resolved' });
    this.#applyCommanderStatus(task.assignedAgentId, 'working', task.teamAgentIds);

    const token = (this.#resumeTokens.get(task.id) ?? 0) + 1;
    this.#resumeTokens.set(task.id, token);

    try {
      await this.#supervisor.waitForExit(task.id, this.#resumeGraceMs);
    } catch (error) {
      this.#failTask(task.id, toErrorMessage(error));
      throw error;
    }

    if (this.#resumeTokens.get(task.id) !== token || !this.#liveTask(task.id)) {
      this.#log.info({ taskId: task.id }, 'Task changed while waiting to resume, not resuming');
      return;
    }

    const workingDirectory = this.#workingDirectories.get(task.id) ?? this.#workingDirectory;
    this.#log.info({ taskId: task.id, sessionId: request.sessionId }, 'Resuming session');
    try {
      this.#supervisor.start(
        {
          taskId: task.id,
          agentId: task.assignedAgentId,
          prompt,
          workingDirectory,
          resumeSessionId: request.sessionId,
        },
        this.#callbacksFor(task.id)
      );
    } catch (error) {
      this.#failTask(task.id, toErrorMessage(error));
      throw error;
    }
  }

  /** Supervisor callbacks bound to one task. Events for other tasks or finished tasks are dropped. */
  #callbacksFor(taskId: string): SupervisorCallbacks {
    return {
      onStatusChange: (agentId, status) => {
        const task = this.#liveTask(taskId);
        if (!task || agentId !== task.assignedAgentId) return;
        if (this.#pending.has(taskId)) return;
        this.#applyCommanderStatus(agentId, status, task.teamAgentIds);
      },
      onProgress: (id, progress) => {
        const task = this.#liveTask(id);
        if (!task || id !== taskId) return;
        if (progress > task.progress) {
          this.#updateTask(id, { progress: Math.min(progress, 1) });
        }
      },
      onCompleted: (id, result, details) => {
        if (id !== taskId) return;
        this.#completeTask(id, result, details);
      },
      onFailed: (id, error) => {
        if (id !== taskId) return;
        this.#failTask(id, error);
      },
      onDangerousCommand: (id, agentId, payload) => {
        const task = this.#liveTask(id);
        if (!task || id !== taskId) return;
        const alert = createDangerousCommandAlert(id, agentId, payload, this.#now());
        this.#raise(task, alert, 'requestingPermission');
      },
      onAskUserQuestion: (id, agentId, sessionId, input) => {
        const task = this.#liveTask(id);
        if (!task || id !== taskId) return;
        const request = createAskUserQuestionRequest(id, agentId, sessionId, input, this.#now());
        if (!request) {
          this.#abandonCheckpoint(id, 'Agent asked a question without any valid questions');
          return;
        }
        this.#raise(task, request, 'waitingForAnswer');
      },
      onPlanReview: (id, agentId, sessionId, input) => {
        const task = this.#liveTask(id);
        if (!task || id !== taskId) return;
        const request = createPlanReviewRequest(
          id,
          agentId,
          sessionId,
          input,
          this.#readPlanFile,
          this.#now()
        );
        if (!request) {
          this.#abandonCheckpoint(id, 'Agent submitted a plan review without a plan');
          return;
        }
        this.#raise(task, request, 'reviewingPlan');
      },
      onOutput: (id, entry) => {
        this.#emit({ type: 'output', taskId: id, entry });
      },
    };
  }

  /**
   * The handle parked at a checkpoint that cannot be shown; nothing would
   * ever resume it, so the task fails.
   */
  #abandonCheckpoint(taskId: string, error: string): void {
    this.#supervisor.cancel(taskId);
    this.#failTask(taskId, error);
  }
}
