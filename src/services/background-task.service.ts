import { Logger } from '../utils/logger';

export interface BackgroundTaskOptions {
  name: string;
  /** Delay between runs after a successful run, in ms */
  intervalMs: number;
  /** Delay before retrying after a failed run, in ms */
  retryDelayMs: number;
  /** Run once immediately on start instead of waiting one interval */
  runOnStart?: boolean;
}

export type BackgroundJob = (signal: AbortSignal) => Promise<void>;

/**
 * Runs a job periodically on its own timer. A failed run is logged and retried
 * after `retryDelayMs`; stopping aborts the signal handed to the job in flight.
 */
export class BackgroundTask {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private options: BackgroundTaskOptions, private job: BackgroundJob) {}

  start(): void {
    if (this.controller) {
      Logger.warn(`${this.options.name} is already running`);
      return;
    }

    this.controller = new AbortController();
    Logger.info(`Starting ${this.options.name}`, {
      intervalMs: this.options.intervalMs,
      retryDelayMs: this.options.retryDelayMs,
    });
    this.schedule(this.options.runOnStart ? 0 : this.options.intervalMs);
  }

  /**
   * Stop scheduling and wait for a run in flight to settle
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;

    this.controller = null;
    controller.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }
    Logger.info(`${this.options.name} stopped`);
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  private schedule(delayMs: number): void {
    const timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
    timer.unref();
    this.timer = timer;
  }

  private async runOnce(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;

    let nextDelay = this.options.intervalMs;
    try {
      await this.job(controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        Logger.info(`${this.options.name} cancelled`);
        return;
      }
      Logger.error(`${this.options.name} failed, retrying later`, error, {
        retryDelayMs: this.options.retryDelayMs,
      });
      nextDelay = this.options.retryDelayMs;
    }

    if (this.controller === controller) {
      this.schedule(nextDelay);
    }
  }
}
