import { logger } from "./logger.js";

export type ScheduledTask = (signal: AbortSignal) => Promise<void>;

/**
 * Runs a task now and then on a fixed period measured from each run's start.
 * Runs never overlap; a run that overshoots its period is followed immediately by the next.
 */
export class Ticker {
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private inFlight: Promise<void> | undefined;
  private nextRun: Date | null = null;
  private started = false;

  constructor(
    private task: ScheduledTask,
    private intervalMs: number,
    private now: () => Date = () => new Date(),
  ) {}

  get isRunning(): boolean {
    return this.started && !this.controller.signal.aborted;
  }

  /** When the next run is due. A run that overshoots moves this to when it finishes. */
  nextRunAt(): Date | null {
    return this.nextRun;
  }

  start(): void {
    if (this.controller.signal.aborted) throw new Error("ticker already stopped");
    if (this.started) return;
    this.started = true;
    this.tick();
  }

  private tick(): void {
    const startedAt = this.now().getTime();
    this.nextRun = new Date(startedAt + this.intervalMs);
    this.inFlight = this.task(this.controller.signal)
      .catch((err: unknown) => logger.error("scheduled task failed", err))
      .finally(() => {
        this.inFlight = undefined;
        if (this.controller.signal.aborted) return;
        const delay = Math.max(0, startedAt + this.intervalMs - this.now().getTime());
        this.nextRun = new Date(this.now().getTime() + delay);
        this.timer = setTimeout(() => this.tick(), delay);
      });
  }

  /** Cancels the timer and waits for a run in progress to finish. */
  async stop(): Promise<void> {
    this.controller.abort();
    clearTimeout(this.timer);
    this.timer = undefined;
    this.nextRun = null;
    await this.inFlight;
  }
}
