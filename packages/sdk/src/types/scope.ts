/**
 * Scope interface — a named, tagged namespace for metrics.
 */

import type { Buckets } from "./buckets.js";
import type { Capabilities, Counter, Gauge, Histogram, Timer } from "./metrics.js";
import type { TagSet } from "./tags.js";

export interface IScope {
  readonly prefix: string;
  readonly separator: string;
  readonly tags: TagSet;

  /** Returns the counter for `name`, allocating it on first use. */
  counter(name: string): Counter;

  /** Returns the gauge for `name`, allocating it on first use. */
  gauge(name: string): Gauge;

  /** Returns the timer for `name`, allocating it on first use. */
  timer(name: string): Timer;

  /**
   * Returns the histogram for `name`, allocating it on first use.
   * Buckets are fixed by the first call; later buckets for the same name are ignored.
   * Without buckets the scope's default buckets are used.
   */
  histogram(name: string, buckets?: Buckets | null): Histogram;

  /** Scope with the same prefix and these tags merged over the current ones. */
  tagged(tags: Readonly<Record<string, string>> | null | undefined): IScope;

  /** Scope whose prefix is this scope's fully-qualified `name`. */
  subScope(name: string): IScope;

  capabilities(): Capabilities;

  /** Stop reporting, flush what was recorded since the last report, close the reporter. */
  close(): Promise<void>;
}
