import { logger } from './logger.js';

const HARD_KILL_MS = 15_000;
const CALLBACK_TIMEOUT_MS = 5_000;
/** Gives pino's destinations a moment to drain before the process exits. */
const FLUSH_DELAY_MS = 100;

/**
 * Manages graceful shutdown for the orchestrator process.
 *
 * Tracks AbortControllers so pending operator prompts are abandoned on
 * SIGTERM/SIGINT, and runs registered shutdown callbacks (e.g. stopping every
 * CLI process) before exiting.
 */
export class LifecycleManager {
  #abortControllers = new Set<AbortController>();
  #shutdownCallbacks: Array<() => Promise<void>> = [];
  #isShuttingDown = false;
  #disposers: Array<() => void> = [];

  constructor() {
    const termHandler = () => void this.shutdown('SIGTERM');
    const intHandler = () => void this.shutdown('SIGINT');
    process.on('SIGTERM', termHandler);
    process.on('SIGINT', intHandler);

    const exceptionHandler = (error: Error) => {
      logger.error({ error }, 'Uncaught exception, initiating shutdown');
      void this.shutdown('uncaughtException', 1);
    };

    /** A stray rejection is a bug worth seeing, not a reason to kill running agents. */
    const rejectionHandler = (reason: unknown) => {
      logger.error({ reason }, 'Unhandled rejection');
    };

    process.on('uncaughtException', exceptionHandler);
    process.on('unhandledRejection', rejectionHandler);

    this.#disposers = [
      () => process.removeListener('SIGTERM', termHandler),
      () => process.removeListener('SIGINT', intHandler),
      () => process.removeListener('uncaughtException', exceptionHandler),
      () => process.removeListener('unhandledRejection', rejectionHandler),
    ];
  }

  destroy(): void {
    for (const dispose of this.#disposers) {
      dispose();
    }
    this.#disposers = [];
    this.#isShuttingDown = false;
    this.#shutdownCallbacks = [];
    this.#abortControllers.clear();
  }

  get isShuttingDown(): boolean {
    return this.#isShuttingDown;
  }

  /**
   * Create an AbortController tracked by this manager.
   * On shutdown, all tracked controllers are aborted.
   * Controllers self-remove from tracking when aborted.
   */
  createAbortController(): AbortController {
    const controller = new AbortController();
    this.#abortControllers.add(controller);
    controller.signal.addEventListener('abort', () => {
      this.#abortControllers.delete(controller);
    });
    return controller;
  }

  /**
   * Register a callback to run during shutdown.
   * Callbacks run sequentially in registration order.
   */
  onShutdown(callback: () => Promise<void>): void {
    this.#shutdownCallbacks.push(callback);
  }

  /** Run the shutdown callbacks and exit. Only the first call has any effect. */
  async shutdown(reason: string, exitCode = 0): Promise<void> {
    if (this.#isShuttingDown) return;
    this.#isShuttingDown = true;

    logger.info({ reason, exitCode }, 'Shutting down');

    const forceExit = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, HARD_KILL_MS);
    forceExit.unref();

    for (const controller of this.#abortControllers) {
      controller.abort();
    }
    this.#abortControllers.clear();

    for (const callback of this.#shutdownCallbacks) {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      try {
        await Promise.race([
          callback(),
          new Promise<void>((_, reject) => {
            timeoutId = setTimeout(
              () => reject(new Error('Shutdown callback timed out')),
              CALLBACK_TIMEOUT_MS
            );
          }),
        ]).finally(() => clearTimeout(timeoutId));
      } catch (error) {
        logger.error({ error }, 'Error during shutdown callback');
      }
    }

    clearTimeout(forceExit);
    logger.info('Shutdown complete');
    await new Promise((resolve) => setTimeout(resolve, FLUSH_DELAY_MS));
    process.exit(exitCode);
  }
}
