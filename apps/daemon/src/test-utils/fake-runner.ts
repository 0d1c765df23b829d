import { vi } from 'vitest';
import type {
  ProcessHandleInfo,
  ProcessRunner,
  StartProcessOptions,
  SupervisorCallbacks,
} from '../process-supervisor.js';

export interface RecordedStart {
  options: StartProcessOptions;
  callbacks: SupervisorCallbacks;
}

/**
 * ProcessRunner that records starts and lets tests drive the callbacks the
 * coordinator handed over.
 */
export class FakeRunner implements ProcessRunner {
  readonly starts: RecordedStart[] = [];
  readonly running = new Set<string>();

  start = vi.fn((options: StartProcessOptions, callbacks: SupervisorCallbacks): ProcessHandleInfo => {
    this.starts.push({ options, callbacks });
    this.running.add(options.taskId);
    return {
      taskId: options.taskId,
      agentId: options.agentId,
      generation: this.starts.length,
      pid: 1000 + this.starts.length,
      resumeSessionId: options.resumeSessionId ?? null,
      startedAt: 0,
    };
  });

  cancel = vi.fn((taskId: string): boolean => this.running.delete(taskId));

  cancelAll = vi.fn((): void => {
    this.running.clear();
  });

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  waitForExit = vi.fn(async (taskId: string, _graceMs?: number): Promise<void> => {
    this.running.delete(taskId);
  });

  forget = vi.fn((_taskId: string): void => {});

  /** Callbacks from the most recent start of a task */
  callbacksFor(taskId: string): SupervisorCallbacks {
    const recorded = this.starts.filter((start) => start.options.taskId === taskId).at(-1);
    if (!recorded) throw new Error(`Task ${taskId} was never started`);
    return recorded.callbacks;
  }

  lastStart(): RecordedStart {
    const recorded = this.starts.at(-1);
    if (!recorded) throw new Error('Nothing was started');
    return recorded;
  }
}
