import { type Logger, logger as defaultLogger } from './logger.js';

/** Default grace period between a team completing and its removal. */
export const DEFAULT_DISBAND_DELAY_MS = 8_000;

/**
 * The UI side of a disband. The returned promise settles when the teardown
 * transition has finished playing.
 */
export interface PresentationLayer {
  playDisbandTransition(commanderId: string, memberIds: readonly string[]): Promise<void>;
}

export interface DisbandSchedulerConfig {
  delayMs?: number;
  /** Every member of the commander's team (commander included) is completed */
  isTeamCompleted: (commanderId: string) => boolean;
  /** Commander id followed by its current descendants */
  teamMembers: (commanderId: string) => string[];
  /** Remove the team from the model */
  onDisband: (commanderId: string) => void;
  presentation?: PresentationLayer;
  logger?: Logger;
}

type DisbandJob =
  | { state: 'armed'; timer: ReturnType<typeof setTimeout> }
  | { state: 'inFlight'; cancelled: boolean };

const noTransition: PresentationLayer = {
  playDisbandTransition: () => Promise.resolve(),
};

/**
 * Delays and then finalizes removal of fully completed teams.
 *
 * At most one job exists per commander. A job re-checks that the team is
 * still completed both before and after the teardown transition, so a team
 * that picks up new work in the meantime is left alone.
 */
export class DisbandScheduler {
  readonly #jobs = new Map<string, DisbandJob>();
  readonly #delayMs: number;
  readonly #isTeamCompleted: (commanderId: string) => boolean;
  readonly #teamMembers: (commanderId: string) => string[];
  readonly #onDisband: (commanderId: string) => void;
  readonly #presentation: PresentationLayer;
  readonly #log: Logger;

  constructor(config: DisbandSchedulerConfig) {
    this.#delayMs = config.delayMs ?? DEFAULT_DISBAND_DELAY_MS;
    this.#isTeamCompleted = config.isTeamCompleted;
    this.#teamMembers = config.teamMembers;
    this.#onDisband = config.onDisband;
    this.#presentation = config.presentation ?? noTransition;
    this.#log = config.logger ?? defaultLogger;
  }

  /** Arm a disband job. Returns true when a new job was armed. */
  scheduleIfNeeded(commanderId: string): boolean {
    if (this.#jobs.has(commanderId)) return false;
    if (!this.#isTeamCompleted(commanderId)) return false;

    const timer = setTimeout(() => {
      this.#fire(commanderId).catch((error: unknown) => {
        this.#log.error({ commanderId, error }, 'Disband job failed');
      });
    }, this.#delayMs);
    this.#jobs.set(commanderId, { state: 'armed', timer });
    this.#log.debug({ commanderId, delayMs: this.#delayMs }, 'Disband armed');
    return true;
  }

  cancel(commanderId: string): void {
    const job = this.#jobs.get(commanderId);
    if (!job) return;

    if (job.state === 'armed') {
      clearTimeout(job.timer);
    } else {
      job.cancelled = true;
    }
    this.#jobs.delete(commanderId);
    this.#log.debug({ commanderId, state: job.state }, 'Disband cancelled');
  }

  isScheduled(commanderId: string): boolean {
    return this.#jobs.has(commanderId);
  }

  cancelAll(): void {
    for (const commanderId of [...this.#jobs.keys()]) {
      this.cancel(commanderId);
    }
  }

  async #fire(commanderId: string): Promise<void> {
    if (!this.#isTeamCompleted(commanderId)) {
      this.#jobs.delete(commanderId);
      this.#log.debug({ commanderId }, 'Team no longer completed, disband skipped');
      return;
    }

    const job: DisbandJob = { state: 'inFlight', cancelled: false };
    this.#jobs.set(commanderId, job);

    try {
      await this.#presentation.playDisbandTransition(commanderId, this.#teamMembers(commanderId));
    } catch (error) {
      this.#log.warn({ commanderId, error }, 'Disband transition failed, removing team anyway');
    }

    if (job.cancelled || this.#jobs.get(commanderId) !== job) return;
    this.#jobs.delete(commanderId);

    if (!this.#isTeamCompleted(commanderId)) {
      this.#log.debug({ commanderId }, 'Team reactivated during transition, disband skipped');
      return;
    }

    this.#log.info({ commanderId }, 'Disbanding team');
    this.#onDisband(commanderId);
  }
}
