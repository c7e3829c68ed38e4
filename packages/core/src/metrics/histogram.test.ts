import { describe, it, expect } from "vitest";
import { CapturingCachedStatsReporter, CapturingStatsReporter } from "@scopemeter/sdk/testing";
import { valueBuckets } from "../buckets/buckets.js";
import { HistogramCell } from "./histogram.js";

const buckets = valueBuckets([10, 20]);

describe("HistogramCell", () => {
  it("counts samples per bucket", () => {
    const histogram = new HistogramCell(buckets, []);
    histogram.recordValue(5);
    histogram.recordValue(10);
    histogram.recordValue(15);
    histogram.recordValue(99);

    expect(histogram.snapshotValues()).toEqual(
      new Map([
        [10, 2],
        [20, 1],
        [Infinity, 1],
      ]),
    );
    expect(histogram.snapshotDurations()).toEqual(
      new Map([
        [10, 0],
        [20, 0],
        [Infinity, 0],
      ]),
    );
  });

  it("reports non-zero bucket deltas with their bounds", () => {
    const reporter = new CapturingStatsReporter();
    const histogram = new HistogramCell(buckets, ["plain"]);

    histogram.recordValue(15);
    histogram.recordValue(16);
    histogram.recordDuration(3);
    histogram.report("size", {}, reporter);

    expect(reporter.getReports()).toEqual([
      { kind: "histogram-value", name: "size", tags: {}, lowerBound: 10, upperBound: 20, samples: 2 },
      { kind: "histogram-duration", name: "size", tags: {}, lowerBound: -Infinity, upperBound: 10, samples: 1 },
    ]);

    reporter.clearReports();
    histogram.report("size", {}, reporter);
    expect(reporter.getReports()).toEqual([]);
  });

  it("reports through cached bucket handles", () => {
    const cachedReporter = new CapturingCachedStatsReporter();
    const histogram = new HistogramCell(buckets, ["cached"], cachedReporter.allocateHistogram("size", {}, buckets));

    histogram.recordValue(25);
    histogram.cachedReport();

    expect(cachedReporter.getReports()).toEqual([
      { kind: "histogram-value", name: "size", tags: {}, lowerBound: 20, upperBound: Infinity, samples: 1 },
    ]);
  });
});
