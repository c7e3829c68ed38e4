/**
 * Histogram cell — per-bucket value and duration sample counts, delta-reported like counters.
 */

import type {
  Buckets,
  CachedHistogram,
  CachedHistogramBucket,
  Histogram,
  IStatsReporter,
  Stopwatch,
  Tags,
} from "@scopemeter/sdk";
import { bucketIndexOf, bucketLowerBound, bucketUpperBounds } from "../buckets/buckets.js";
import { DeltaTotal, type ReportChannel } from "./delta.js";
import { startStopwatch } from "./stopwatch.js";

interface BucketSeries {
  lowerBound: number;
  upperBound: number;
  samples: DeltaTotal;
  cached?: CachedHistogramBucket;
}

export class HistogramCell implements Histogram {
  private readonly valueSeries: BucketSeries[];
  private readonly durationSeries: BucketSeries[];

  constructor(
    readonly buckets: Buckets,
    channels: readonly ReportChannel[],
    cached?: CachedHistogram,
  ) {
    const upperBounds = bucketUpperBounds(buckets);
    this.valueSeries = upperBounds.map((upperBound, i) => {
      const lowerBound = bucketLowerBound(buckets, i);
      return {
        lowerBound,
        upperBound,
        samples: new DeltaTotal(channels),
        cached: cached?.valueBucket(lowerBound, upperBound),
      };
    });
    this.durationSeries = upperBounds.map((upperBound, i) => {
      const lowerBound = bucketLowerBound(buckets, i);
      return {
        lowerBound,
        upperBound,
        samples: new DeltaTotal(channels),
        cached: cached?.durationBucket(lowerBound, upperBound),
      };
    });
  }

  recordValue(value: number): void {
    this.valueSeries[bucketIndexOf(this.buckets, value)].samples.add(1);
  }

  recordDuration(durationMs: number): void {
    this.durationSeries[bucketIndexOf(this.buckets, durationMs)].samples.add(1);
  }

  start(): Stopwatch {
    return startStopwatch((elapsed) => this.recordDuration(elapsed));
  }

  report(name: string, tags: Tags, reporter: IStatsReporter): void {
    for (const series of this.valueSeries) {
      const samples = series.samples.consume("plain");
      if (samples !== 0) {
        reporter.reportHistogramValueSamples(name, tags, this.buckets, series.lowerBound, series.upperBound, samples);
      }
    }
    for (const series of this.durationSeries) {
      const samples = series.samples.consume("plain");
      if (samples !== 0) {
        reporter.reportHistogramDurationSamples(
          name,
          tags,
          this.buckets,
          series.lowerBound,
          series.upperBound,
          samples,
        );
      }
    }
  }

  cachedReport(): void {
    for (const series of [...this.valueSeries, ...this.durationSeries]) {
      if (!series.cached) continue;
      const samples = series.samples.consume("cached");
      if (samples !== 0) {
        series.cached.reportSamples(samples);
      }
    }
  }

  /** Bucket upper bound → un-reported value samples, for every bucket. */
  snapshotValues(): Map<number, number> {
    return new Map(this.valueSeries.map((s) => [s.upperBound, s.samples.pending()]));
  }

  /** Bucket upper bound (ms) → un-reported duration samples, for every bucket. */
  snapshotDurations(): Map<number, number> {
    return new Map(this.durationSeries.map((s) => [s.upperBound, s.samples.pending()]));
  }
}
