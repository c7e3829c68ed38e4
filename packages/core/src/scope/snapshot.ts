/**
 * Snapshot builder. Reads every cell of every scope; never moves a report mark.
 */

import type {
  CounterSnapshot,
  GaugeSnapshot,
  HistogramSnapshot,
  Snapshot,
  TimerSnapshot,
} from "@scopemeter/sdk";
import { canonicalKey } from "../tags/tag-set.js";
import { ReadonlyMapView } from "./readonly-map.js";
import type { Scope } from "./scope.js";

export function buildSnapshot(scopes: readonly Scope[]): Snapshot {
  const counters = new Map<string, CounterSnapshot>();
  const gauges = new Map<string, GaugeSnapshot>();
  const timers = new Map<string, TimerSnapshot>();
  const histograms = new Map<string, HistogramSnapshot>();

  for (const scope of scopes) {
    const tags = scope.tags.toRecord();
    const cells = scope.cells();

    for (const [local, cell] of cells.counters) {
      const name = scope.fullyQualifiedName(local);
      counters.set(canonicalKey(name, scope.tags), Object.freeze({ name, tags, value: cell.snapshot() }));
    }

    for (const [local, cell] of cells.gauges) {
      const name = scope.fullyQualifiedName(local);
      gauges.set(canonicalKey(name, scope.tags), Object.freeze({ name, tags, value: cell.snapshot() }));
    }

    for (const [local, cell] of cells.timers) {
      const name = scope.fullyQualifiedName(local);
      timers.set(
        canonicalKey(name, scope.tags),
        Object.freeze({ name, tags, values: Object.freeze(cell.snapshot()) }),
      );
    }

    for (const [local, cell] of cells.histograms) {
      const name = scope.fullyQualifiedName(local);
      histograms.set(
        canonicalKey(name, scope.tags),
        Object.freeze({
          name,
          tags,
          values: new ReadonlyMapView(cell.snapshotValues()),
          durations: new ReadonlyMapView(cell.snapshotDurations()),
        }),
      );
    }
  }

  return Object.freeze({
    counters: new ReadonlyMapView(counters),
    gauges: new ReadonlyMapView(gauges),
    timers: new ReadonlyMapView(timers),
    histograms: new ReadonlyMapView(histograms),
  });
}
