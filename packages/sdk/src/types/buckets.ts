/**
 * Histogram bucket configuration.
 */

export type BucketKind = "value" | "duration";

/**
 * Ordered bucket upper bounds. Duration bounds are milliseconds.
 * An implicit final bucket with upper bound `Infinity` catches everything above the last bound.
 */
export interface Buckets {
  readonly kind: BucketKind;
  readonly upperBounds: readonly number[];
}
