/**
 * A scope whose metrics discard everything. For code paths that require a scope but should not emit.
 */

import {
  CapableOf,
  type Buckets,
  type Capabilities,
  type Counter,
  type Gauge,
  type Histogram,
  type IScope,
  type Stopwatch,
  type TagSet,
  type Timer,
} from "@scopemeter/sdk";
import { EMPTY_TAGS } from "../tags/tag-set.js";

const noopStopwatch: Stopwatch = { stop: () => 0 };

const noopCounter: Counter = { inc: () => {} };
const noopGauge: Gauge = { update: () => {} };
const noopTimer: Timer = { record: () => {}, start: () => noopStopwatch };
const noopHistogram: Histogram = {
  recordValue: () => {},
  recordDuration: () => {},
  start: () => noopStopwatch,
};

class NoopScope implements IScope {
  readonly prefix = "";
  readonly separator = ".";
  readonly tags: TagSet = EMPTY_TAGS;

  counter(_name: string): Counter {
    return noopCounter;
  }

  gauge(_name: string): Gauge {
    return noopGauge;
  }

  timer(_name: string): Timer {
    return noopTimer;
  }

  histogram(_name: string, _buckets?: Buckets | null): Histogram {
    return noopHistogram;
  }

  tagged(_tags: Readonly<Record<string, string>> | null | undefined): IScope {
    return this;
  }

  subScope(_name: string): IScope {
    return this;
  }

  capabilities(): Capabilities {
    return CapableOf.NONE;
  }

  async close(): Promise<void> {}
}

export const noopScope: IScope = new NoopScope();
