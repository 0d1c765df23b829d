/**
 * Process supervisor - runs claude CLI child processes for tasks
 *
 * One child process per task, started with `-p --output-format stream-json`.
 * Stdout is split into lines and parsed as stream events; each event is
 * translated into a callback on the handle's callback set. Callbacks fire
 * synchronously from the stream handlers, so per-task ordering follows the
 * order the CLI wrote its lines.
 *
 * A per-task generation counter guards every callback: cancelling a task
 * bumps the generation, and nothing from the superseded handle is delivered
 * afterwards.
 */

import { type ChildProcess, type SpawnOptions, spawn } from 'node:child_process';
import type { AgentStatus, StreamEvent } from '@squadron/schema';
import { CLI_TOOL_NAMES, classifyCommand, commandText, parseStreamLine } from '@squadron/schema';
import {
  assertWorkingDirectory,
  buildAgentPath,
  resolveClaudeExecutable,
} from './claude-executable.js';
import { ContractViolationError, SpawnError, toErrorMessage } from './errors.js';
import { LineSplitter } from './line-splitter.js';
import { type Logger, logger as defaultLogger } from './logger.js';

export const DEFAULT_PROGRESS_TOOL_CALLS = 20;
/** Tool-call progress never reaches 1.0; only a result does. */
export const MAX_ESTIMATED_PROGRESS = 0.9;
export const MAX_OUTPUT_ENTRIES = 500;
/** How long a parked process may keep running once a resume is requested. */
export const DEFAULT_EXIT_GRACE_MS = 5_000;

const STDERR_CONTEXT_LINES = 3;
const TEXT_PREVIEW_LENGTH = 300;
const TOOL_OUTPUT_PREVIEW_LENGTH = 200;
const RESULT_PREVIEW_LENGTH = 500;

export type OutputEntryKind =
  | 'assistantThinking'
  | 'toolInvocation'
  | 'toolOutput'
  | 'finalResult'
  | 'error'
  | 'systemInfo'
  | 'askQuestion'
  | 'planMode'
  | 'dangerousWarning';

export interface OutputEntry {
  timestamp: number;
  kind: OutputEntryKind;
  text: string;
}

export interface CompletionDetails {
  costUsd: number | null;
  durationMs: number | null;
  sessionId: string | null;
}

export interface DangerousCommandPayload {
  tool: string;
  input: string;
  reason: string;
}

export interface SupervisorCallbacks {
  onStatusChange: (agentId: string, status: AgentStatus) => void;
  onProgress: (taskId: string, progress: number) => void;
  onCompleted: (taskId: string, result: string, details: CompletionDetails) => void;
  onFailed: (taskId: string, error: string) => void;
  onDangerousCommand: (taskId: string, agentId: string, payload: DangerousCommandPayload) => void;
  onAskUserQuestion: (
    taskId: string,
    agentId: string,
    sessionId: string,
    input: Record<string, unknown>
  ) => void;
  onPlanReview: (
    taskId: string,
    agentId: string,
    sessionId: string,
    input: Record<string, unknown>
  ) => void;
  onOutput?: (taskId: string, entry: OutputEntry) => void;
}

export interface StartProcessOptions {
  taskId: string;
  agentId: string;
  prompt: string;
  workingDirectory: string;
  resumeSessionId?: string;
}

export interface ProcessHandleInfo {
  taskId: string;
  agentId: string;
  generation: number;
  pid: number | null;
  resumeSessionId: string | null;
  startedAt: number;
}

/** What the coordinator needs from a process runner. */
export interface ProcessRunner {
  start(options: StartProcessOptions, callbacks: SupervisorCallbacks): ProcessHandleInfo;
  cancel(taskId: string): boolean;
  cancelAll(): void;
  isRunning(taskId: string): boolean;
  waitForExit(taskId: string, graceMs?: number): Promise<void>;
  forget(taskId: string): void;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ProcessSupervisorConfig {
  /** Explicit executable path; looked up when omitted */
  claudePath?: string;
  /** Appended to every invocation */
  extraArgs?: string[];
  /** Tool calls that map to full estimated progress. Defaults to 20. */
  progressToolCallScale?: number;
  /** Kill and fail a process silent on stdout for this long. 0 disables. */
  stallTimeoutMs?: number;
  /** Defaults to node:child_process spawn */
  spawnProcess?: SpawnProcess;
  /** Defaults to resolveClaudeExecutable */
  resolveExecutable?: (explicitPath?: string) => string;
  logger?: Logger;
}

interface ProcessHandle {
  readonly taskId: string;
  readonly agentId: string;
  readonly generation: number;
  readonly child: ChildProcess;
  readonly callbacks: SupervisorCallbacks;
  readonly resumeSessionId: string | null;
  readonly startedAt: number;
  readonly log: Logger;
  readonly stdout: LineSplitter;
  readonly stderr: LineSplitter;
  readonly exited: Promise<void>;
  markExited: () => void;
  sessionId: string | null;
  toolCallCount: number;
  lastProgress: number;
  lastAssistantText: string | null;
  stderrErrors: string[];
  /** Set once a question/plan checkpoint was raised; the run continues on resume. */
  parked: boolean;
  /** Set once completion or failure was reported. */
  terminal: boolean;
  cancelled: boolean;
  finished: boolean;
  watchdog: ReturnType<typeof setTimeout> | null;
}

function isDebugNoise(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    lower.startsWith('debug:') ||
    lower.startsWith('[debug]') ||
    lower.startsWith('trace:') ||
    lower.includes('loading config') ||
    lower.includes('resolving')
  );
}

export function buildCliArgs(
  prompt: string,
  resumeSessionId: string | undefined,
  extraArgs: readonly string[]
): string[] {
  const args = [
    '-p',
    prompt,
    '--output-format',
    'stream-json',
    '--verbose',
    '--dangerously-skip-permissions',
  ];
  if (resumeSessionId) {
    args.push('--resume', resumeSessionId);
  }
  args.push(...extraArgs);
  return args;
}

export class ProcessSupervisor implements ProcessRunner {
  readonly #handles = new Map<string, ProcessHandle>();
  readonly #generations = new Map<string, number>();
  readonly #outputs = new Map<string, OutputEntry[]>();
  readonly #claudePath: string | undefined;
  readonly #extraArgs: readonly string[];
  readonly #progressScale: number;
  readonly #stallTimeoutMs: number;
  readonly #spawnProcess: SpawnProcess;
  readonly #resolveExecutable: (explicitPath?: string) => string;
  readonly #log: Logger;
  #executable: string | null = null;

  constructor(config: ProcessSupervisorConfig = {}) {
    this.#claudePath = config.claudePath;
    this.#extraArgs = config.extraArgs ?? [];
    this.#progressScale = Math.max(1, config.progressToolCallScale ?? DEFAULT_PROGRESS_TOOL_CALLS);
    this.#stallTimeoutMs = config.stallTimeoutMs ?? 0;
    this.#spawnProcess = config.spawnProcess ?? spawn;
    this.#resolveExecutable = config.resolveExecutable ?? resolveClaudeExecutable;
    this.#log = config.logger ?? defaultLogger;
  }

  /**
   * Start a CLI process for a task.
   *
   * Throws synchronously: SpawnError when the executable or working directory
   * is unusable, ContractViolationError when the task still has a process.
   */
  start(options: StartProcessOptions, callbacks: SupervisorCallbacks): ProcessHandleInfo {
    const { taskId, agentId, prompt, workingDirectory, resumeSessionId } = options;

    if (this.#handles.has(taskId)) {
      throw new ContractViolationError(
        `Task ${taskId} already has a live process; wait for it to exit before starting another`
      );
    }

    assertWorkingDirectory(workingDirectory);
    const executable = this.#executablePath();
    const args = buildCliArgs(prompt, resumeSessionId, this.#extraArgs);

    const log = this.#log.child({ taskId, agentId });
    log.info(
      { command: executable, cwd: workingDirectory, resume: resumeSessionId ?? null },
      'Spawning claude CLI'
    );

    let child: ChildProcess;
    try {
      child = this.#spawnProcess(executable, args, {
        cwd: workingDirectory,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: {
          ...process.env,
          PATH: buildAgentPath(process.env.PATH),
          SQUADRON_TASK_ID: taskId,
        },
      });
    } catch (error) {
      throw new SpawnError(`Failed to start claude CLI: ${toErrorMessage(error)}`);
    }

    const { stdout, stderr } = child;
    if (!stdout || !stderr) {
      child.kill('SIGTERM');
      throw new SpawnError('Spawned process has no stdout/stderr pipes');
    }

    const generation = (this.#generations.get(taskId) ?? 0) + 1;
    this.#generations.set(taskId, generation);

    let markExited: () => void = () => {};
    const exited = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    const handle: ProcessHandle = {
      taskId,
      agentId,
      generation,
      child,
      callbacks,
      resumeSessionId: resumeSessionId ?? null,
      startedAt: Date.now(),
      log,
      stdout: new LineSplitter(),
      stderr: new LineSplitter(),
      exited,
      markExited,
      sessionId: null,
      toolCallCount: 0,
      lastProgress: 0,
      lastAssistantText: null,
      stderrErrors: [],
      parked: false,
      terminal: false,
      cancelled: false,
      finished: false,
      watchdog: null,
    };
    this.#handles.set(taskId, handle);

    stdout.on('data', (chunk: Buffer | string) => {
      this.#armWatchdog(handle);
      for (const line of handle.stdout.push(chunk)) {
        this.#processLine(handle, line);
      }
    });

    stderr.on('data', (chunk: Buffer | string) => {
      for (const line of handle.stderr.push(chunk)) {
        this.#processStderrLine(handle, line);
      }
    });

    child.on('error', (err) => {
      log.error({ err: err.message }, 'Spawn error');
      this.#reportFailure(handle, `Failed to start: ${err.message}`);
      if (child.pid === undefined) {
        this.#finish(handle);
      }
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      for (const line of handle.stdout.flush()) {
        this.#processLine(handle, line);
      }
      for (const line of handle.stderr.flush()) {
        this.#processStderrLine(handle, line);
      }
      this.#handleTermination(handle, code, signal);
      this.#finish(handle);
    });

    this.#appendEntry(handle.taskId, handle.callbacks, 'systemInfo', `CLI: ${executable}`);
    this.#appendEntry(handle.taskId, handle.callbacks, 'systemInfo', `Working dir: ${workingDirectory}`);
    this.#appendEntry(handle.taskId, handle.callbacks, 'systemInfo', `Process started: ${prompt}`);
    this.#armWatchdog(handle);

    return {
      taskId,
      agentId,
      generation,
      pid: child.pid ?? null,
      resumeSessionId: handle.resumeSessionId,
      startedAt: handle.startedAt,
    };
  }

  /**
   * Terminate a task's process. No callback for the task fires after this
   * returns. Returns false when there was no live process.
   */
  cancel(taskId: string): boolean {
    this.#generations.set(taskId, (this.#generations.get(taskId) ?? 0) + 1);

    const handle = this.#handles.get(taskId);
    if (!handle || handle.cancelled) {
      return false;
    }

    handle.cancelled = true;
    this.#clearWatchdog(handle);
    this.#appendEntry(taskId, undefined, 'systemInfo', 'Process cancelled by operator');
    handle.child.kill('SIGTERM');
    handle.log.info('Cancelled process');
    return true;
  }

  cancelAll(): void {
    for (const taskId of [...this.#handles.keys()]) {
      this.cancel(taskId);
    }
  }

  isRunning(taskId: string): boolean {
    return this.#handles.has(taskId);
  }

  /**
   * Resolve once the task's current process has fully terminated (immediately
   * when there is none). With a grace period, a process still running after
   * it is terminated silently, as if cancelled, and killed with SIGKILL after
   * a second grace period. A process that survives that too is dropped and
   * the call rejects with SpawnError, since no resume can safely start.
   */
  async waitForExit(taskId: string, graceMs?: number): Promise<void> {
    const handle = this.#handles.get(taskId);
    if (!handle) return;
    if (graceMs === undefined) {
      await handle.exited;
      return;
    }

    if (await this.#exitsWithin(handle, graceMs)) return;
    handle.log.warn({ graceMs }, 'Process did not exit in time, terminating');
    this.cancel(taskId);

    if (await this.#exitsWithin(handle, graceMs)) return;
    handle.log.warn({ graceMs }, 'Process ignored SIGTERM, killing');
    handle.child.kill('SIGKILL');

    if (await this.#exitsWithin(handle, graceMs)) return;
    handle.log.error({ pid: handle.child.pid }, 'Process survived SIGKILL, abandoning it');
    this.#finish(handle);
    throw new SpawnError(`Previous process for task ${taskId} did not exit after SIGKILL`);
  }

  async #exitsWithin(handle: ProcessHandle, ms: number): Promise<boolean> {
    if (handle.finished) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    const exited = await Promise.race([handle.exited.then(() => true), expired]);
    clearTimeout(timer);
    return exited;
  }

  listProcesses(): Array<{ taskId: string; agentId: string; pid: number | null; uptime: number }> {
    const now = Date.now();
    return [...this.#handles.values()].map((handle) => ({
      taskId: handle.taskId,
      agentId: handle.agentId,
      pid: handle.child.pid ?? null,
      uptime: now - handle.startedAt,
    }));
  }

  outputEntries(taskId: string): OutputEntry[] {
    return [...(this.#outputs.get(taskId) ?? [])];
  }

  /** Drop retained output for a task that is no longer tracked. */
  forget(taskId: string): void {
    if (this.#handles.has(taskId)) return;
    this.#outputs.delete(taskId);
    this.#generations.delete(taskId);
  }

  #executablePath(): string {
    if (!this.#executable) {
      this.#executable = this.#resolveExecutable(this.#claudePath);
    }
    return this.#executable;
  }

  #isCurrent(handle: ProcessHandle): boolean {
    return !handle.cancelled && this.#generations.get(handle.taskId) === handle.generation;
  }

  /** Lifecycle callbacks are delivered only by a current, unparked, non-terminal handle. */
  #canEmit(handle: ProcessHandle): boolean {
    return this.#isCurrent(handle) && !handle.parked && !handle.terminal;
  }

  #processLine(handle: ProcessHandle, line: string): void {
    const events = parseStreamLine(line);
    if (!events) {
      const text = line.trim();
      if (text.startsWith('{')) {
        handle.log.debug({ line: text.slice(0, 500) }, 'Dropping unparseable JSON line');
      }
      if (text.length > 0) {
        this.#appendEntry(handle.taskId, handle.callbacks, 'systemInfo', text);
      }
      return;
    }
    for (const event of events) {
      this.#handleEvent(handle, event);
    }
  }

  #processStderrLine(handle: ProcessHandle, line: string): void {
    const text = line.trim();
    if (text.length === 0) return;
    if (isDebugNoise(text)) {
      this.#appendEntry(handle.taskId, handle.callbacks, 'systemInfo', text);
      return;
    }
    handle.stderrErrors.push(text);
    if (handle.stderrErrors.length > STDERR_CONTEXT_LINES) {
      handle.stderrErrors.shift();
    }
    this.#appendEntry(handle.taskId, handle.callbacks, 'error', text);
  }

  #handleEvent(handle: ProcessHandle, event: StreamEvent): void {
    const { taskId, agentId, callbacks } = handle;

    switch (event.kind) {
      case 'system':
        if (event.sessionId && !handle.sessionId) {
          handle.sessionId = event.sessionId;
          this.#appendEntry(taskId, callbacks, 'systemInfo', `Session: ${event.sessionId}`);
        }
        return;

      case 'assistantText':
        handle.lastAssistantText = event.text;
        this.#appendEntry(
          taskId,
          callbacks,
          'assistantThinking',
          event.text.slice(0, TEXT_PREVIEW_LENGTH)
        );
        if (this.#canEmit(handle)) callbacks.onStatusChange(agentId, 'thinking');
        return;

      case 'assistantToolUse':
        this.#handleToolUse(handle, event.tool, event.input);
        return;

      case 'toolResult':
        this.#appendEntry(
          taskId,
          callbacks,
          'toolOutput',
          event.output.slice(0, TOOL_OUTPUT_PREVIEW_LENGTH)
        );
        return;

      case 'resultSuccess': {
        if (event.sessionId && !handle.sessionId) {
          handle.sessionId = event.sessionId;
        }
        this.#appendEntry(
          taskId,
          callbacks,
          'finalResult',
          event.result.slice(0, RESULT_PREVIEW_LENGTH)
        );
        if (event.costUsd !== null) {
          this.#appendEntry(taskId, callbacks, 'systemInfo', `Cost: $${event.costUsd.toFixed(4)}`);
        }
        if (event.durationMs !== null) {
          this.#appendEntry(taskId, callbacks, 'systemInfo', `Duration: ${event.durationMs}ms`);
        }
        if (!this.#canEmit(handle)) {
          handle.log.debug({ parked: handle.parked }, 'Ignoring result from inactive handle');
          return;
        }
        handle.terminal = true;
        callbacks.onProgress(taskId, 1);
        callbacks.onCompleted(taskId, event.result, {
          costUsd: event.costUsd,
          durationMs: event.durationMs,
          sessionId: handle.sessionId,
        });
        return;
      }

      case 'resultError':
        this.#appendEntry(taskId, callbacks, 'error', event.error);
        this.#reportFailure(handle, event.error);
        return;

      case 'unknown':
        handle.log.debug({ type: event.type }, 'Unhandled stream event type');
        return;
    }
  }

  #handleToolUse(handle: ProcessHandle, tool: string, input: Record<string, unknown>): void {
    const { taskId, agentId, callbacks } = handle;

    handle.toolCallCount += 1;
    this.#appendEntry(taskId, callbacks, 'toolInvocation', `Using tool: ${tool}`);
    if (this.#canEmit(handle)) {
      callbacks.onStatusChange(agentId, 'working');
      const estimate = Math.min(handle.toolCallCount / this.#progressScale, MAX_ESTIMATED_PROGRESS);
      if (estimate > handle.lastProgress) {
        handle.lastProgress = estimate;
        callbacks.onProgress(taskId, estimate);
      }
    }

    if (tool === CLI_TOOL_NAMES.ASK_USER_QUESTION) {
      this.#appendEntry(taskId, callbacks, 'askQuestion', 'Agent is asking a question...');
      this.#raiseCheckpoint(handle, 'question', (sessionId) =>
        callbacks.onAskUserQuestion(taskId, agentId, sessionId, input)
      );
      return;
    }

    if (tool === CLI_TOOL_NAMES.ENTER_PLAN_MODE) {
      this.#appendEntry(taskId, callbacks, 'planMode', 'Entering plan mode...');
      if (this.#canEmit(handle)) callbacks.onStatusChange(agentId, 'thinking');
      return;
    }

    if (tool === CLI_TOOL_NAMES.EXIT_PLAN_MODE) {
      this.#appendEntry(taskId, callbacks, 'planMode', 'Plan ready for review');
      this.#raiseCheckpoint(handle, 'plan', (sessionId) =>
        callbacks.onPlanReview(taskId, agentId, sessionId, input)
      );
      return;
    }

    const command = commandText(input);
    const classification = classifyCommand(tool, command);
    if (classification.level === 'dangerous') {
      this.#appendEntry(taskId, callbacks, 'dangerousWarning', `WARNING: ${classification.reason}`);
      if (this.#canEmit(handle)) {
        callbacks.onDangerousCommand(taskId, agentId, {
          tool,
          input: command,
          reason: classification.reason,
        });
      }
    }
  }

  #raiseCheckpoint(
    handle: ProcessHandle,
    label: 'question' | 'plan',
    raise: (sessionId: string) => void
  ): void {
    const { sessionId } = handle;
    if (!sessionId) {
      this.#appendEntry(
        handle.taskId,
        handle.callbacks,
        'error',
        `Cannot show ${label}: no session ID available`
      );
      return;
    }
    if (!this.#canEmit(handle)) return;
    handle.parked = true;
    raise(sessionId);
  }

  #reportFailure(handle: ProcessHandle, error: string): void {
    if (!this.#canEmit(handle)) return;
    handle.terminal = true;
    handle.callbacks.onFailed(handle.taskId, error);
  }

  #handleTermination(
    handle: ProcessHandle,
    code: number | null,
    signal: NodeJS.Signals | null
  ): void {
    const { taskId, callbacks, log } = handle;

    if (handle.cancelled) {
      this.#appendEntry(taskId, undefined, 'systemInfo', 'Process was cancelled');
      return;
    }
    if (handle.terminal) {
      this.#appendEntry(taskId, callbacks, 'systemInfo', `Process exited with code: ${code}`);
      return;
    }
    if (handle.parked) {
      this.#appendEntry(taskId, callbacks, 'systemInfo', 'Process paused for operator input');
      log.info({ code }, 'Process exited at checkpoint');
      return;
    }

    if (code === 0) {
      this.#appendEntry(taskId, callbacks, 'systemInfo', 'Process exited successfully');
      if (!this.#canEmit(handle)) return;
      handle.terminal = true;
      callbacks.onProgress(taskId, 1);
      callbacks.onCompleted(taskId, handle.lastAssistantText ?? '', {
        costUsd: null,
        durationMs: null,
        sessionId: handle.sessionId,
      });
      return;
    }

    const base = signal
      ? `Process terminated by signal ${signal}`
      : `Process exited with code ${code}`;
    const message =
      handle.stderrErrors.length > 0 ? `${base}: ${handle.stderrErrors.join('; ')}` : base;
    this.#appendEntry(taskId, callbacks, 'error', message);
    log.warn({ code, signal }, 'Process failed');
    this.#reportFailure(handle, message);
  }

  #finish(handle: ProcessHandle): void {
    if (handle.finished) return;
    handle.finished = true;
    this.#clearWatchdog(handle);
    if (this.#handles.get(handle.taskId) === handle) {
      this.#handles.delete(handle.taskId);
    }
    handle.log.info('Process exited');
    handle.markExited();
  }

  #armWatchdog(handle: ProcessHandle): void {
    if (this.#stallTimeoutMs <= 0 || handle.finished || handle.cancelled) return;
    this.#clearWatchdog(handle);
    handle.watchdog = setTimeout(() => {
      handle.watchdog = null;
      if (handle.finished || handle.cancelled) return;
      const message = `Process stalled: no output for ${this.#stallTimeoutMs}ms`;
      handle.log.warn({ stallTimeoutMs: this.#stallTimeoutMs }, 'Process stalled');
      this.#appendEntry(handle.taskId, handle.callbacks, 'error', message);
      this.#reportFailure(handle, message);
      handle.child.kill('SIGTERM');
    }, this.#stallTimeoutMs);
  }

  #clearWatchdog(handle: ProcessHandle): void {
    if (handle.watchdog) {
      clearTimeout(handle.watchdog);
      handle.watchdog = null;
    }
  }

  /**
   * Record an output entry. Entries are retained per task across resumes;
   * the onOutput callback is skipped for cancelled handles.
   */
  #appendEntry(
    taskId: string,
    callbacks: SupervisorCallbacks | undefined,
    kind: OutputEntryKind,
    text: string
  ): void {
    const entry: OutputEntry = { timestamp: Date.now(), kind, text };
    const entries = this.#outputs.get(taskId) ?? [];
    entries.push(entry);
    if (entries.length > MAX_OUTPUT_ENTRIES) {
      entries.splice(0, entries.length - MAX_OUTPUT_ENTRIES);
    }
    this.#outputs.set(taskId, entries);

    const handle = this.#handles.get(taskId);
    if (callbacks?.onOutput && handle && this.#isCurrent(handle)) {
      callbacks.onOutput(taskId, entry);
    }
  }
}
