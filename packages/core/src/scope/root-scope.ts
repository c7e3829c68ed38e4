/**
 * Root scope factories.
 */

import {
  ConfigError,
  type Buckets,
  type ICachedStatsReporter,
  type IStatsReporter,
  type Scheduler,
} from "@scopemeter/sdk";
import { RootScopeOptionsSchema, validateInput, type ValidatedRootScopeOptions } from "@scopemeter/shared";
import { DEFAULT_BUCKETS, durationBuckets, valueBuckets } from "../buckets/buckets.js";
import { canonicalKey, tagSetOf } from "../tags/tag-set.js";
import { intervalScheduler } from "./scheduler.js";
import { Scope } from "./scope.js";
import { ScopeTree } from "./tree.js";

export interface RootScopeOptions {
  /** Default: "" */
  prefix?: string;
  /** Default: "." */
  separator?: string;
  tags?: Readonly<Record<string, string>> | null;
  /** Default: 1000 */
  reportIntervalMs?: number;
  /** Used by `histogram(name)` calls without buckets. */
  defaultBuckets?: Buckets;
}

export interface RootScopeDeps {
  reporter?: IStatsReporter;
  cachedReporter?: ICachedStatsReporter;
  /** Default: setInterval, unref'd */
  scheduler?: Scheduler;
}

/**
 * Create the root of a new scope tree with its own registry and report loop.
 * The loop starts immediately when at least one reporter is given.
 *
 * @example
 * ```typescript
 * const root = createRootScope({ prefix: "svc", reportIntervalMs: 5000 }, { reporter });
 * root.subScope("db").counter("queries").inc();
 * await root.close();
 * ```
 *
 * @throws ConfigError when the options fail validation
 */
export function createRootScope(options: RootScopeOptions = {}, deps: RootScopeDeps = {}): Scope {
  const result = validateInput(RootScopeOptionsSchema, options);
  if (!result.success || !result.data) {
    throw new ConfigError(`Invalid root scope options: ${result.error ?? "unknown error"}`);
  }
  const config: ValidatedRootScopeOptions = result.data;

  const tags = tagSetOf(config.tags);
  const identityKey = canonicalKey(config.prefix, tags);
  const defaultBuckets = config.defaultBuckets
    ? config.defaultBuckets.kind === "value"
      ? valueBuckets(config.defaultBuckets.upperBounds)
      : durationBuckets(config.defaultBuckets.upperBounds)
    : DEFAULT_BUCKETS;

  const tree = new ScopeTree({
    identityKey,
    reporter: deps.reporter,
    cachedReporter: deps.cachedReporter,
  });

  const root = tree.registry.getOrCreate(
    identityKey,
    () =>
      new Scope(tree, {
        prefix: config.prefix,
        separator: config.separator,
        tags,
        defaultBuckets,
      }),
  );

  tree.start(deps.scheduler ?? intervalScheduler, config.reportIntervalMs);
  return root;
}

/** Root scope without reporters: nothing is reported, everything is visible through `snapshot()`. */
export function createTestScope(prefix = "", tags?: Readonly<Record<string, string>>): Scope {
  return createRootScope({ prefix, tags });
}
