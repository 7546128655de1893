import type { BaseLogger } from 'pino';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  logger: BaseLogger;
}

/**
 * Runs `run` every `intervalMs`. A tick that arrives while the previous run is
 * still going is skipped, so runs of one task never overlap. An interval of 0
 * schedules nothing.
 */
export class PeriodicTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly options: PeriodicTaskOptions) {}

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  get scheduled(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.stopped || this.timer || this.options.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    this.timer.unref();
  }

  /** Stops future runs and waits for the one in flight, if any. */
  async cancel(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (this.stopped || this.inFlight) {
      return;
    }
    this.inFlight = this.options
      .run()
      .catch((err: unknown) => {
        this.options.logger.error({ err, task: this.options.name }, 'periodic task failed');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
