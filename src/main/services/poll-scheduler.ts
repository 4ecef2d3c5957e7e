import { createLogger } from './logger';

const log = createLogger('Scheduler');

export type TaskFn = () => void | Promise<void>;

/**
 * PeriodicTask runs a task on a fixed interval.
 *
 * A run that is still in flight when the next interval fires causes that
 * interval to be skipped, so runs never overlap. Errors thrown by the task
 * are logged and do not stop the schedule.
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private skipped = 0;

  constructor(
    private readonly name: string,
    private readonly task: TaskFn,
    private intervalMs: number,
  ) {}

  start(): void {
    // Restart cleanly if already running
    this.stop();
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    log.info(`${this.name} started, every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info(`${this.name} stopped`);
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }

  /** Change the interval; a running schedule is restarted with it */
  setIntervalMs(intervalMs: number): void {
    this.intervalMs = intervalMs;
    if (this.isRunning()) this.start();
  }

  /** Number of intervals skipped because the previous run was still busy */
  getSkippedCount(): number {
    return this.skipped;
  }

  /**
   * Run the task now. Returns false without running when a run is in flight.
   */
  async runOnce(): Promise<boolean> {
    if (this.inFlight) {
      this.skipped++;
      log.debug(`${this.name} still running, skipping this interval`);
      return false;
    }

    this.inFlight = true;
    try {
      await this.task();
    } catch (err) {
      log.error(`${this.name} failed:`, err);
    } finally {
      this.inFlight = false;
    }
    return true;
  }
}
