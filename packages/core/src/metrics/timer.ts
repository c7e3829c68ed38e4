/**
 * Timer cell. Durations are forwarded at record time; nothing is buffered for the report loop.
 * Without any reporter the most recent values are kept so snapshots can show them.
 */

import type { CachedTimer, IStatsReporter, Stopwatch, Tags, Timer } from "@scopemeter/sdk";
import { startStopwatch } from "./stopwatch.js";

/** Values a reporter-less timer keeps for snapshots; older values are dropped first. */
export const TIMER_BUFFER_LIMIT = 1024;

export interface TimerCellOptions {
  /** Fully-qualified name, resolved once at allocation. */
  name: string;
  tags: Tags;
  reporter?: IStatsReporter;
  cached?: CachedTimer;
  /** Samples recorded once this returns true are dropped. */
  isClosed: () => boolean;
}

export class TimerCell implements Timer {
  private readonly buffered: number[] = [];

  constructor(private readonly options: TimerCellOptions) {}

  record(durationMs: number): void {
    const { name, tags, reporter, cached, isClosed } = this.options;
    if (isClosed()) return;

    if (cached) {
      cached.reportTimer(durationMs);
    } else if (reporter) {
      reporter.reportTimer(name, tags, durationMs);
    } else {
      if (this.buffered.length >= TIMER_BUFFER_LIMIT) this.buffered.shift();
      this.buffered.push(durationMs);
    }
  }

  start(): Stopwatch {
    return startStopwatch((elapsed) => this.record(elapsed));
  }

  snapshot(): number[] {
    return [...this.buffered];
  }
}
