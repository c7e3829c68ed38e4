/**
 * ReportLoop — runs report passes on a schedule, one at a time.
 *
 * Passes are queued on a single promise chain, so a scheduled tick and a manual
 * `runNow()` never overlap. A tick that fires while the previous tick's pass is
 * still queued or running is skipped. `stop()` cancels the schedule before it
 * queues the final pass, and resolves once that pass has finished.
 */

import type { CancelSchedule, Scheduler } from "@scopemeter/sdk";
import { errorDetails, type Logger } from "@scopemeter/shared";

export class ReportLoop {
  private cancel: CancelSchedule | null = null;
  private chain: Promise<void> = Promise.resolve();
  private tickPending = false;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly pass: () => Promise<void>,
    private readonly logger: Logger,
  ) {}

  get isStopped(): boolean {
    return this.stopping !== null;
  }

  get isScheduled(): boolean {
    return this.cancel !== null;
  }

  start(scheduler: Scheduler, intervalMs: number): void {
    if (this.cancel || this.stopping) return;
    this.cancel = scheduler.scheduleRepeating(() => this.tick(), intervalMs);
    this.logger.debug("Report loop started", { intervalMs });
  }

  /** One scheduled iteration. Failures are logged; the loop keeps running. */
  tick(): void {
    if (this.stopping) return;
    if (this.tickPending) {
      this.logger.warn("Previous report pass still running, skipping tick");
      return;
    }
    this.tickPending = true;
    void this.enqueue()
      .catch((err: unknown) => {
        this.logger.error("Report pass failed", errorDetails(err));
      })
      .finally(() => {
        this.tickPending = false;
      });
  }

  /** Queue one pass and wait for it. Rejects with the pass's error. No-op once stopped. */
  runNow(): Promise<void> {
    if (this.stopping) {
      this.logger.debug("Report requested after stop, ignoring");
      return Promise.resolve();
    }
    return this.enqueue();
  }

  /** Cancel the schedule, then run the final pass. Later calls return the same promise. */
  stop(): Promise<void> {
    this.stopping ??= this.stopAndFlush();
    return this.stopping;
  }

  private async stopAndFlush(): Promise<void> {
    this.cancel?.();
    this.cancel = null;
    this.logger.debug("Report loop stopped, running final pass");
    await this.enqueue();
  }

  private enqueue(): Promise<void> {
    const run = this.chain.then(() => this.pass());
    this.chain = run.catch(() => undefined);
    return run;
  }
}
