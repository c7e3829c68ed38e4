/**
 * Counter cell — delta reporting: each report sends what was added since the previous one.
 */

import type { CachedCount, Counter, IStatsReporter, Tags } from "@scopemeter/sdk";
import { DeltaTotal, type ReportChannel } from "./delta.js";

export class CounterCell implements Counter {
  private readonly total: DeltaTotal;

  constructor(
    channels: readonly ReportChannel[],
    private readonly cached?: CachedCount,
  ) {
    this.total = new DeltaTotal(channels);
  }

  inc(delta = 1): void {
    this.total.add(delta);
  }

  report(name: string, tags: Tags, reporter: IStatsReporter): void {
    const delta = this.total.consume("plain");
    if (delta !== 0) {
      reporter.reportCounter(name, tags, delta);
    }
  }

  cachedReport(): void {
    if (!this.cached) return;
    const delta = this.total.consume("cached");
    if (delta !== 0) {
      this.cached.reportCount(delta);
    }
  }

  /** Un-reported delta. Does not move any report mark. */
  snapshot(): number {
    return this.total.pending();
  }
}
