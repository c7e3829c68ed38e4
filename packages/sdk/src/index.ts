// Types
export type { Tags, TagSet } from "./types/tags.js";
export type { Buckets, BucketKind } from "./types/buckets.js";

export type {
  Counter,
  Gauge,
  Timer,
  Histogram,
  Stopwatch,
  Capabilities,
} from "./types/metrics.js";

export { CapableOf } from "./types/metrics.js";

export type { IScope } from "./types/scope.js";

export type {
  IBaseStatsReporter,
  IStatsReporter,
  ICachedStatsReporter,
  CachedCount,
  CachedGauge,
  CachedTimer,
  CachedHistogram,
  CachedHistogramBucket,
} from "./types/reporter.js";

export type {
  Snapshot,
  CounterSnapshot,
  GaugeSnapshot,
  TimerSnapshot,
  HistogramSnapshot,
} from "./types/snapshot.js";

export type { Scheduler, CancelSchedule } from "./types/scheduler.js";

// Errors
export {
  MetricsError,
  ConfigError,
  BucketsError,
  ReporterError,
  AllocationError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
