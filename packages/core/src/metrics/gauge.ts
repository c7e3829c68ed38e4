/**
 * Gauge cell — last write wins; reported only when written since the previous report.
 */

import type { CachedGauge, Gauge, IStatsReporter, Tags } from "@scopemeter/sdk";
import type { ReportChannel } from "./delta.js";

export class GaugeCell implements Gauge {
  private value = 0;
  private readonly unreported = new Set<ReportChannel>();

  constructor(
    private readonly channels: readonly ReportChannel[],
    private readonly cached?: CachedGauge,
  ) {}

  update(value: number): void {
    this.value = value;
    for (const channel of this.channels) {
      this.unreported.add(channel);
    }
  }

  report(name: string, tags: Tags, reporter: IStatsReporter): void {
    if (this.unreported.delete("plain")) {
      reporter.reportGauge(name, tags, this.value);
    }
  }

  cachedReport(): void {
    if (this.cached && this.unreported.delete("cached")) {
      this.cached.reportGauge(this.value);
    }
  }

  snapshot(): number {
    return this.value;
  }
}
