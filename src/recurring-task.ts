import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export type TaskBody = (signal: AbortSignal) => Promise<unknown>;

/**
 * Runs an async body every `intervalMs`, never overlapping itself. The next
 * run is scheduled only once the previous one settles. A failing run is
 * logged; the next tick is the retry.
 *
 * `stop()` aborts the signal handed to the body and waits for the in-flight
 * run, so a body that checks the signal between steps finishes the step it
 * is on.
 */
export class RecurringTask {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private runs = 0;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly body: TaskBody,
    private readonly logger: Logger = silentLogger,
  ) {}

  get running(): boolean {
    return this.controller !== null;
  }

  /** Completed runs, successful or not. */
  get completedRuns(): number {
    return this.runs;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    this.schedule();
    this.logger.debug(`${this.name}: started (every ${this.intervalMs}ms)`);
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    this.controller = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    controller.abort();
    if (this.inFlight) await this.inFlight;
    this.logger.debug(`${this.name}: stopped`);
  }

  /** Run once now, outside the schedule. Waits for any in-flight run first. */
  async runNow(): Promise<void> {
    if (this.inFlight) await this.inFlight;
    await this.execute(this.controller?.signal ?? new AbortController().signal);
  }

  private schedule(): void {
    const controller = this.controller;
    if (!controller) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.execute(controller.signal).then(() => this.schedule());
    }, this.intervalMs);
    this.timer.unref();
  }

  private execute(signal: AbortSignal): Promise<void> {
    const run = this.body(signal)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(`${this.name}: run failed, retrying next interval: ${errorMessage(error)}`);
        },
      )
      .finally(() => {
        this.runs++;
        if (this.inFlight === run) this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }
}
