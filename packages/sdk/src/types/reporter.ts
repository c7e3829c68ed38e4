/**
 * Reporter protocols. The core calls these; transport is up to the implementation.
 */

import type { Buckets } from "./buckets.js";
import type { Capabilities } from "./metrics.js";
import type { Tags } from "./tags.js";

/** Members shared by both reporter protocols. */
export interface IBaseStatsReporter {
  capabilities(): Capabilities;
  flush(): void | Promise<void>;
  close(): void | Promise<void>;
}

/** Plain protocol: values are pushed with their name and tags on every report. */
export interface IStatsReporter extends IBaseStatsReporter {
  reportCounter(name: string, tags: Tags, value: number): void;
  reportGauge(name: string, tags: Tags, value: number): void;
  reportTimer(name: string, tags: Tags, durationMs: number): void;
  reportHistogramValueSamples(
    name: string,
    tags: Tags,
    buckets: Buckets,
    bucketLowerBound: number,
    bucketUpperBound: number,
    samples: number,
  ): void;
  reportHistogramDurationSamples(
    name: string,
    tags: Tags,
    buckets: Buckets,
    bucketLowerBoundMs: number,
    bucketUpperBoundMs: number,
    samples: number,
  ): void;
}

export interface CachedCount {
  reportCount(value: number): void;
}

export interface CachedGauge {
  reportGauge(value: number): void;
}

export interface CachedTimer {
  reportTimer(durationMs: number): void;
}

export interface CachedHistogramBucket {
  reportSamples(samples: number): void;
}

export interface CachedHistogram {
  valueBucket(bucketLowerBound: number, bucketUpperBound: number): CachedHistogramBucket;
  durationBucket(bucketLowerBoundMs: number, bucketUpperBoundMs: number): CachedHistogramBucket;
}

/**
 * Cached protocol: backend handles are allocated once per metric,
 * so reporting does not resolve names or tags again.
 */
export interface ICachedStatsReporter extends IBaseStatsReporter {
  allocateCounter(name: string, tags: Tags): CachedCount;
  allocateGauge(name: string, tags: Tags): CachedGauge;
  allocateTimer(name: string, tags: Tags): CachedTimer;
  allocateHistogram(name: string, tags: Tags, buckets: Buckets): CachedHistogram;
}
