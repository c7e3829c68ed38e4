// Tags
export { mergeTags, canonicalKey, tagSetOf, EMPTY_TAGS } from "./tags/tag-set.js";

// Buckets
export {
  valueBuckets,
  durationBuckets,
  linearValueBuckets,
  exponentialValueBuckets,
  linearDurationBuckets,
  exponentialDurationBuckets,
  DEFAULT_BUCKETS,
} from "./buckets/buckets.js";

// Scopes
export { createRootScope, createTestScope } from "./scope/root-scope.js";
export type { RootScopeOptions, RootScopeDeps } from "./scope/root-scope.js";
export { Scope } from "./scope/scope.js";
export type { ScopeRegistry } from "./scope/registry.js";
export { ReadonlyMapView } from "./scope/readonly-map.js";
export { intervalScheduler } from "./scope/scheduler.js";
export { noopScope } from "./scope/noop-scope.js";

// Reporters
export { LoggingStatsReporter } from "./reporters/logging-reporter.js";
export type { LoggingStatsReporterOptions } from "./reporters/logging-reporter.js";
