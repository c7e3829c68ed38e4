/**
 * Immutable point-in-time capture of every metric in a scope tree.
 */

import type { Tags } from "./tags.js";

export interface CounterSnapshot {
  readonly name: string;
  readonly tags: Tags;
  /** Un-reported delta at capture time. */
  readonly value: number;
}

export interface GaugeSnapshot {
  readonly name: string;
  readonly tags: Tags;
  readonly value: number;
}

export interface TimerSnapshot {
  readonly name: string;
  readonly tags: Tags;
  /** Buffered durations; empty when the timer forwards to a reporter. */
  readonly values: readonly number[];
}

export interface HistogramSnapshot {
  readonly name: string;
  readonly tags: Tags;
  /** Bucket upper bound → un-reported value samples. */
  readonly values: ReadonlyMap<number, number>;
  /** Bucket upper bound (ms) → un-reported duration samples. */
  readonly durations: ReadonlyMap<number, number>;
}

export interface Snapshot {
  readonly counters: ReadonlyMap<string, CounterSnapshot>;
  readonly gauges: ReadonlyMap<string, GaugeSnapshot>;
  readonly timers: ReadonlyMap<string, TimerSnapshot>;
  readonly histograms: ReadonlyMap<string, HistogramSnapshot>;
}
