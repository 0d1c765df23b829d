import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LifecycleManager } from './lifecycle.js';
import { logger } from './logger.js';

vi.mock('./logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
  },
}));

type Listener = (...args: unknown[]) => void;

describe('LifecycleManager', () => {
  let registered: Array<{ event: string | symbol; listener: Listener }>;
  let lifecycle: LifecycleManager;

  function listenerFor(event: string): Listener {
    const found = registered.find((entry) => entry.event === event);
    if (!found) throw new Error(`No listener registered for ${event}`);
    return found.listener;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    registered = [];

    const originalOn = process.on.bind(process);
    vi.spyOn(process, 'on').mockImplementation(
      // process.on overloads require a broad signature
      ((event: string, listener: Listener) => {
        registered.push({ event, listener });
        return originalOn(event, listener);
      }) as typeof process.on
    );
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    lifecycle = new LifecycleManager();
  });

  afterEach(() => {
    lifecycle.destroy();
    vi.useRealTimers();
    vi.restoreAllMocks();
    vi.mocked(logger.error).mockClear();
  });

  it('logs unhandled rejections without shutting down', async () => {
    const onRejection = listenerFor('unhandledRejection');

    onRejection(new Error('test rejection'));
    onRejection('string reason');
    await vi.advanceTimersByTimeAsync(500);

    expect(process.exit).not.toHaveBeenCalled();
    expect(lifecycle.isShuttingDown).toBe(false);
    expect(logger.error).toHaveBeenCalledWith({ reason: 'string reason' }, 'Unhandled rejection');
  });

  it('shuts down with exit code 1 on an uncaught exception', async () => {
    listenerFor('uncaughtException')(new Error('test exception'));

    await vi.advanceTimersByTimeAsync(500);

    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('waits for the log flush before exiting on SIGTERM', async () => {
    listenerFor('SIGTERM')();

    expect(process.exit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(150);

    expect(process.exit).toHaveBeenCalledWith(0);
  });

  it('runs shutdown callbacks in order and survives one that hangs', async () => {
    const order: string[] = [];
    lifecycle.onShutdown(async () => {
      order.push('first');
    });
    lifecycle.onShutdown(() => new Promise<void>(() => {}));
    lifecycle.onShutdown(async () => {
      order.push('third');
    });

    const done = lifecycle.shutdown('test');
    await vi.advanceTimersByTimeAsync(5_200);
    await done;

    expect(order).toEqual(['first', 'third']);
    expect(logger.error).toHaveBeenCalledWith(
      { error: new Error('Shutdown callback timed out') },
      'Error during shutdown callback'
    );
    expect(process.exit).toHaveBeenCalledWith(0);
  });

  it('aborts tracked controllers on shutdown', async () => {
    const controller = lifecycle.createAbortController();

    const done = lifecycle.shutdown('SIGINT');
    await vi.advanceTimersByTimeAsync(150);
    await done;

    expect(controller.signal.aborted).toBe(true);
  });

  it('only shuts down once', async () => {
    const callback = vi.fn(async () => {});
    lifecycle.onShutdown(callback);

    const first = lifecycle.shutdown('task failed', 1);
    const second = lifecycle.shutdown('SIGTERM');
    await vi.advanceTimersByTimeAsync(150);
    await Promise.all([first, second]);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(process.exit).toHaveBeenCalledTimes(1);
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('removes its process listeners on destroy', () => {
    const onTerm = listenerFor('SIGTERM');
    const onRejection = listenerFor('unhandledRejection');

    lifecycle.destroy();

    expect(process.listeners('SIGTERM')).not.toContain(onTerm);
    expect(process.listeners('unhandledRejection')).not.toContain(onRejection);
  });
});
