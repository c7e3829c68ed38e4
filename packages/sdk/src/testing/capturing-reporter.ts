/**
 * Reporter fakes that record every call, for asserting what a scope tree reported.
 */

import type { Buckets } from "../types/buckets.js";
import { CapableOf, type Capabilities } from "../types/metrics.js";
import type {
  CachedCount,
  CachedGauge,
  CachedHistogram,
  CachedTimer,
  ICachedStatsReporter,
  IStatsReporter,
} from "../types/reporter.js";
import type { Tags } from "../types/tags.js";

export type ReportedMetric =
  | { kind: "counter"; name: string; tags: Tags; value: number }
  | { kind: "gauge"; name: string; tags: Tags; value: number }
  | { kind: "timer"; name: string; tags: Tags; value: number }
  | {
      kind: "histogram-value" | "histogram-duration";
      name: string;
      tags: Tags;
      lowerBound: number;
      upperBound: number;
      samples: number;
    };

export type ReportedKind = ReportedMetric["kind"];

export interface CapturingReporterOptions {
  /** Advertised capabilities. Default: CapableOf.REPORTING_TAGGING */
  capabilities?: Capabilities;
  /** Called on every flush; may throw or return a promise to simulate backend behavior. */
  onFlush?: () => void | Promise<void>;
}

abstract class CapturingBase {
  protected readonly reports: ReportedMetric[] = [];
  flushCount = 0;
  closeCount = 0;

  constructor(private readonly options: CapturingReporterOptions) {}

  capabilities(): Capabilities {
    return this.options.capabilities ?? CapableOf.REPORTING_TAGGING;
  }

  flush(): void | Promise<void> {
    this.flushCount++;
    return this.options.onFlush?.();
  }

  close(): void {
    this.closeCount++;
  }

  /** Every captured report, optionally filtered by kind. */
  getReports(kind?: ReportedKind): ReportedMetric[] {
    return kind ? this.reports.filter((r) => r.kind === kind) : [...this.reports];
  }

  /** Clear captured reports. Flush and close counts are kept. */
  clearReports(): void {
    this.reports.length = 0;
  }
}

/**
 * Plain-protocol reporter that captures calls.
 *
 * @example
 * ```typescript
 * const reporter = new CapturingStatsReporter();
 * const scope = createRootScope({ prefix: "svc" }, { reporter });
 * scope.counter("requests").inc();
 * await scope.reportNow();
 * reporter.getReports("counter"); // [{ kind: "counter", name: "svc.requests", tags: {}, value: 1 }]
 * ```
 */
export class CapturingStatsReporter extends CapturingBase implements IStatsReporter {
  constructor(options: CapturingReporterOptions = {}) {
    super(options);
  }

  reportCounter(name: string, tags: Tags, value: number): void {
    this.reports.push({ kind: "counter", name, tags, value });
  }

  reportGauge(name: string, tags: Tags, value: number): void {
    this.reports.push({ kind: "gauge", name, tags, value });
  }

  reportTimer(name: string, tags: Tags, durationMs: number): void {
    this.reports.push({ kind: "timer", name, tags, value: durationMs });
  }

  reportHistogramValueSamples(
    name: string,
    tags: Tags,
    _buckets: Buckets,
    bucketLowerBound: number,
    bucketUpperBound: number,
    samples: number,
  ): void {
    this.reports.push({
      kind: "histogram-value",
      name,
      tags,
      lowerBound: bucketLowerBound,
      upperBound: bucketUpperBound,
      samples,
    });
  }

  reportHistogramDurationSamples(
    name: string,
    tags: Tags,
    _buckets: Buckets,
    bucketLowerBoundMs: number,
    bucketUpperBoundMs: number,
    samples: number,
  ): void {
    this.reports.push({
      kind: "histogram-duration",
      name,
      tags,
      lowerBound: bucketLowerBoundMs,
      upperBound: bucketUpperBoundMs,
      samples,
    });
  }
}

export interface CachedAllocation {
  kind: "counter" | "gauge" | "timer" | "histogram";
  name: string;
  tags: Tags;
  buckets?: Buckets;
}

/** Cached-protocol reporter that captures allocations and handle reports. */
export class CapturingCachedStatsReporter extends CapturingBase implements ICachedStatsReporter {
  private readonly allocations: CachedAllocation[] = [];

  constructor(options: CapturingReporterOptions = {}) {
    super(options);
  }

  allocateCounter(name: string, tags: Tags): CachedCount {
    this.allocations.push({ kind: "counter", name, tags });
    return {
      reportCount: (value) => {
        this.reports.push({ kind: "counter", name, tags, value });
      },
    };
  }

  allocateGauge(name: string, tags: Tags): CachedGauge {
    this.allocations.push({ kind: "gauge", name, tags });
    return {
      reportGauge: (value) => {
        this.reports.push({ kind: "gauge", name, tags, value });
      },
    };
  }

  allocateTimer(name: string, tags: Tags): CachedTimer {
    this.allocations.push({ kind: "timer", name, tags });
    return {
      reportTimer: (durationMs) => {
        this.reports.push({ kind: "timer", name, tags, value: durationMs });
      },
    };
  }

  allocateHistogram(name: string, tags: Tags, buckets: Buckets): CachedHistogram {
    this.allocations.push({ kind: "histogram", name, tags, buckets });
    const bucket = (kind: "histogram-value" | "histogram-duration", lowerBound: number, upperBound: number) => ({
      reportSamples: (samples: number) => {
        this.reports.push({ kind, name, tags, lowerBound, upperBound, samples });
      },
    });
    return {
      valueBucket: (lower, upper) => bucket("histogram-value", lower, upper),
      durationBucket: (lower, upper) => bucket("histogram-duration", lower, upper),
    };
  }

  getAllocations(kind?: CachedAllocation["kind"]): CachedAllocation[] {
    return kind ? this.allocations.filter((a) => a.kind === kind) : [...this.allocations];
  }
}
