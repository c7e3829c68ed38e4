/**
 * Scope — a prefix and tag set with lazily allocated metric cells.
 */

import type {
  Buckets,
  Capabilities,
  Counter,
  Gauge,
  Histogram,
  ICachedStatsReporter,
  IScope,
  IStatsReporter,
  Snapshot,
  TagSet,
  Timer,
} from "@scopemeter/sdk";
import { CounterCell } from "../metrics/counter.js";
import type { ReportChannel } from "../metrics/delta.js";
import { GaugeCell } from "../metrics/gauge.js";
import { HistogramCell } from "../metrics/histogram.js";
import { TimerCell } from "../metrics/timer.js";
import { canonicalKey, mergeTags } from "../tags/tag-set.js";
import { AllocationMap } from "./allocation-map.js";
import type { ScopeRegistry } from "./registry.js";
import { buildSnapshot } from "./snapshot.js";

/** Tree-wide state every scope of one root shares. */
export interface ScopeTreeContext {
  readonly registry: ScopeRegistry;
  readonly reporter?: IStatsReporter;
  readonly cachedReporter?: ICachedStatsReporter;
  /** Report channels in use, plain first. */
  readonly channels: readonly ReportChannel[];
  isClosed(): boolean;
  capabilities(): Capabilities;
  reportNow(): Promise<void>;
  close(): Promise<void>;
}

export interface ScopeConfig {
  prefix: string;
  separator: string;
  tags: TagSet;
  defaultBuckets: Buckets;
}

/** Cells of one scope keyed by local name, as read by snapshots. */
export interface ScopeCells {
  counters: Array<[string, CounterCell]>;
  gauges: Array<[string, GaugeCell]>;
  timers: Array<[string, TimerCell]>;
  histograms: Array<[string, HistogramCell]>;
}

export class Scope implements IScope {
  readonly prefix: string;
  readonly separator: string;
  readonly tags: TagSet;
  private readonly defaultBuckets: Buckets;

  private readonly counters = new AllocationMap<CounterCell>("counter");
  private readonly gauges = new AllocationMap<GaugeCell>("gauge");
  private readonly timers = new AllocationMap<TimerCell>("timer");
  private readonly histograms = new AllocationMap<HistogramCell>("histogram");

  constructor(
    private readonly tree: ScopeTreeContext,
    config: ScopeConfig,
  ) {
    this.prefix = config.prefix;
    this.separator = config.separator;
    this.tags = config.tags;
    this.defaultBuckets = config.defaultBuckets;
  }

  counter(name: string): Counter {
    return this.counters.getOrAllocate(name, () => {
      const cached = this.tree.cachedReporter?.allocateCounter(this.fullyQualifiedName(name), this.tags.toRecord());
      return new CounterCell(this.tree.channels, cached);
    });
  }

  gauge(name: string): Gauge {
    return this.gauges.getOrAllocate(name, () => {
      const cached = this.tree.cachedReporter?.allocateGauge(this.fullyQualifiedName(name), this.tags.toRecord());
      return new GaugeCell(this.tree.channels, cached);
    });
  }

  timer(name: string): Timer {
    return this.timers.getOrAllocate(name, () => {
      const fullName = this.fullyQualifiedName(name);
      const tags = this.tags.toRecord();
      return new TimerCell({
        name: fullName,
        tags,
        reporter: this.tree.reporter,
        cached: this.tree.cachedReporter?.allocateTimer(fullName, tags),
        isClosed: () => this.tree.isClosed(),
      });
    });
  }

  histogram(name: string, buckets?: Buckets | null): Histogram {
    return this.histograms.getOrAllocate(name, () => {
      const layout = buckets ?? this.defaultBuckets;
      const cached = this.tree.cachedReporter?.allocateHistogram(
        this.fullyQualifiedName(name),
        this.tags.toRecord(),
        layout,
      );
      return new HistogramCell(layout, this.tree.channels, cached);
    });
  }

  tagged(tags: Readonly<Record<string, string>> | null | undefined): Scope {
    return this.subScopeFor(this.prefix, mergeTags(this.tags, tags));
  }

  subScope(name: string): Scope {
    return this.subScopeFor(this.fullyQualifiedName(name), this.tags);
  }

  capabilities(): Capabilities {
    return this.tree.capabilities();
  }

  /** Closes the whole tree this scope belongs to. */
  close(): Promise<void> {
    return this.tree.close();
  }

  /** Run one report pass over the whole tree now. Does nothing once the tree is closed. */
  reportNow(): Promise<void> {
    return this.tree.reportNow();
  }

  /** Side-effect-free capture of every metric in the tree. */
  snapshot(): Snapshot {
    return buildSnapshot(this.tree.registry.scopes());
  }

  fullyQualifiedName(name: string): string {
    if (this.prefix.length === 0) return name;
    return `${this.prefix}${this.separator}${name}`;
  }

  /** Plain protocol pass over this scope's buffered cells, then a reporter flush. */
  report(reporter: IStatsReporter): void | Promise<void> {
    const tags = this.tags.toRecord();
    for (const [name, counter] of this.counters.entries()) {
      counter.report(this.fullyQualifiedName(name), tags, reporter);
    }
    for (const [name, gauge] of this.gauges.entries()) {
      gauge.report(this.fullyQualifiedName(name), tags, reporter);
    }
    // timers report at record time
    for (const [name, histogram] of this.histograms.entries()) {
      histogram.report(this.fullyQualifiedName(name), tags, reporter);
    }
    return reporter.flush();
  }

  /** Cached protocol pass: every cached handle reports its own delta, then the reporter flushes. */
  cachedReport(cachedReporter: ICachedStatsReporter): void | Promise<void> {
    for (const counter of this.counters.values()) counter.cachedReport();
    for (const gauge of this.gauges.values()) gauge.cachedReport();
    for (const histogram of this.histograms.values()) histogram.cachedReport();
    return cachedReporter.flush();
  }

  cells(): ScopeCells {
    return {
      counters: this.counters.entries(),
      gauges: this.gauges.entries(),
      timers: this.timers.entries(),
      histograms: this.histograms.entries(),
    };
  }

  private subScopeFor(prefix: string, tags: TagSet): Scope {
    return this.tree.registry.getOrCreate(
      canonicalKey(prefix, tags),
      () =>
        new Scope(this.tree, {
          prefix,
          separator: this.separator,
          tags,
          defaultBuckets: this.defaultBuckets,
        }),
    );
  }
}
