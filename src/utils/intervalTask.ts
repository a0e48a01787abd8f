import { logger } from './logger.js';

/**
 * Runs `task` on a fixed interval. The next run is scheduled only once the
 * previous one has finished, so runs never overlap.
 */
export class IntervalTask<T> {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<T> | null = null;
  private active = false;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly task: () => Promise<T>
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    logger.info({ task: this.name, intervalMs: this.intervalMs }, 'Interval task started');
    this.schedule();
  }

  /**
   * Run immediately. Resolves to null without running if a run is already in flight.
   */
  async runOnce(): Promise<T | null> {
    if (this.inFlight) {
      return null;
    }

    const run = this.task();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Cancel the timer and wait for the current run to finish
   */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    logger.info({ task: this.name }, 'Interval task stopped');
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce()
        .catch((error: unknown) => {
          logger.error({ err: error, task: this.name }, 'Interval task run failed');
        })
        .finally(() => {
          if (this.active) {
            this.schedule();
          }
        });
    }, this.intervalMs);
  }
}
