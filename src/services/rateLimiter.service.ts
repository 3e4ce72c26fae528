/**
 * Rate Limiter Service
 *
 * Spaces out calls to the field-service API. Tasks run one after
 * another and each start waits until minIntervalMs has passed since the
 * previous start. One limiter is shared by the whole process, so
 * concurrent webhook requests queue behind each other.
 */

import logger from '../config/logger';

export interface LimiterClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: LimiterClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateLimiter {
  private log = logger.child({ service: 'rate-limiter' });
  private tail: Promise<void> = Promise.resolve();
  private lastStart: number | null = null;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: LimiterClock = systemClock
  ) {}

  /**
   * Run a task once its slot comes up
   *
   * The task's own result or rejection is returned to the caller; a
   * failed task does not hold up the queue.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.waitForSlot();
      return task();
    });

    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStart !== null) {
      const waitMs = this.lastStart + this.minIntervalMs - this.clock.now();
      if (waitMs > 0) {
        this.log.debug({ waitMs }, 'Waiting for rate limit slot');
        await this.clock.sleep(waitMs);
      }
    }

    this.lastStart = this.clock.now();
  }
}
