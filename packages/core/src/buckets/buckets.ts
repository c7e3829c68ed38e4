/**
 * Histogram bucket layouts.
 */

import { BucketsError, type BucketKind, type Buckets } from "@scopemeter/sdk";

function buildBuckets(kind: BucketKind, upperBounds: readonly number[]): Buckets {
  if (upperBounds.length === 0) {
    throw new BucketsError("at least one bound is required");
  }
  for (let i = 0; i < upperBounds.length; i++) {
    if (!Number.isFinite(upperBounds[i])) {
      throw new BucketsError(`bound ${i} is not a finite number`);
    }
    if (i > 0 && upperBounds[i] <= upperBounds[i - 1]) {
      throw new BucketsError("bounds must be strictly ascending");
    }
  }
  return Object.freeze({ kind, upperBounds: Object.freeze([...upperBounds]) });
}

export function valueBuckets(upperBounds: readonly number[]): Buckets {
  return buildBuckets("value", upperBounds);
}

/** Duration bounds are milliseconds. */
export function durationBuckets(upperBoundsMs: readonly number[]): Buckets {
  return buildBuckets("duration", upperBoundsMs);
}

function linear(start: number, width: number, count: number): number[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new BucketsError("count must be a positive integer");
  }
  if (width <= 0) {
    throw new BucketsError("width must be positive");
  }
  return Array.from({ length: count }, (_, i) => start + width * i);
}

function exponential(start: number, factor: number, count: number): number[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new BucketsError("count must be a positive integer");
  }
  if (start <= 0) {
    throw new BucketsError("start must be positive");
  }
  if (factor <= 1) {
    throw new BucketsError("factor must be greater than 1");
  }
  const bounds: number[] = [];
  let bound = start;
  for (let i = 0; i < count; i++) {
    bounds.push(bound);
    bound *= factor;
  }
  return bounds;
}

/** `count` bounds: start, start + width, start + 2 * width, ... */
export function linearValueBuckets(start: number, width: number, count: number): Buckets {
  return valueBuckets(linear(start, width, count));
}

/** `count` bounds: start, start * factor, start * factor², ... */
export function exponentialValueBuckets(start: number, factor: number, count: number): Buckets {
  return valueBuckets(exponential(start, factor, count));
}

export function linearDurationBuckets(startMs: number, widthMs: number, count: number): Buckets {
  return durationBuckets(linear(startMs, widthMs, count));
}

export function exponentialDurationBuckets(startMs: number, factor: number, count: number): Buckets {
  return durationBuckets(exponential(startMs, factor, count));
}

export const DEFAULT_BUCKETS: Buckets = durationBuckets([
  1, 2, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000,
]);

/** Upper bounds including the implicit final `Infinity` bucket. */
export function bucketUpperBounds(buckets: Buckets): number[] {
  return [...buckets.upperBounds, Infinity];
}

/** Lower bound of bucket `index`: the previous upper bound, or `-Infinity` for the first. */
export function bucketLowerBound(buckets: Buckets, index: number): number {
  return index === 0 ? -Infinity : buckets.upperBounds[index - 1];
}

/** Index of the first bucket whose upper bound is `>=` the sample. */
export function bucketIndexOf(buckets: Buckets, sample: number): number {
  const bounds = buckets.upperBounds;
  let low = 0;
  let high = bounds.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (bounds[mid] >= sample) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}
