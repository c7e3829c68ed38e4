import { describe, it, expect } from "vitest";
import { BucketsError } from "@scopemeter/sdk";
import {
  bucketIndexOf,
  bucketLowerBound,
  bucketUpperBounds,
  durationBuckets,
  exponentialDurationBuckets,
  exponentialValueBuckets,
  linearDurationBuckets,
  linearValueBuckets,
  valueBuckets,
} from "./buckets.js";

describe("bucket generators", () => {
  it("builds linear value buckets", () => {
    expect(linearValueBuckets(0, 10, 4)).toEqual({ kind: "value", upperBounds: [0, 10, 20, 30] });
  });

  it("builds exponential value buckets", () => {
    expect(exponentialValueBuckets(1, 2, 5).upperBounds).toEqual([1, 2, 4, 8, 16]);
  });

  it("builds duration buckets in milliseconds", () => {
    expect(linearDurationBuckets(5, 5, 3)).toEqual({ kind: "duration", upperBounds: [5, 10, 15] });
    expect(exponentialDurationBuckets(10, 10, 3).upperBounds).toEqual([10, 100, 1000]);
  });

  it("freezes the layout", () => {
    const buckets = valueBuckets([1, 2]);
    expect(Object.isFrozen(buckets)).toBe(true);
    expect(Object.isFrozen(buckets.upperBounds)).toBe(true);
  });

  it.each([
    ["zero count", () => linearValueBuckets(0, 1, 0), "Invalid buckets: count must be a positive integer"],
    ["zero width", () => linearValueBuckets(0, 0, 3), "Invalid buckets: width must be positive"],
    ["factor of one", () => exponentialValueBuckets(1, 1, 3), "Invalid buckets: factor must be greater than 1"],
    ["zero start", () => exponentialDurationBuckets(0, 2, 3), "Invalid buckets: start must be positive"],
    ["unsorted bounds", () => durationBuckets([5, 1]), "Invalid buckets: bounds must be strictly ascending"],
    ["no bounds", () => valueBuckets([]), "Invalid buckets: at least one bound is required"],
  ])("rejects %s", (_label, build, message) => {
    expect(build).toThrow(BucketsError);
    expect(build).toThrow(message);
  });
});

describe("bucket lookup", () => {
  const buckets = valueBuckets([10, 20, 30]);

  it("places a sample in the first bucket whose bound is >= the sample", () => {
    expect(bucketIndexOf(buckets, -5)).toBe(0);
    expect(bucketIndexOf(buckets, 10)).toBe(0);
    expect(bucketIndexOf(buckets, 10.5)).toBe(1);
    expect(bucketIndexOf(buckets, 30)).toBe(2);
    expect(bucketIndexOf(buckets, 31)).toBe(3);
  });

  it("exposes bounds including the overflow bucket", () => {
    expect(bucketUpperBounds(buckets)).toEqual([10, 20, 30, Infinity]);
    expect(bucketLowerBound(buckets, 0)).toBe(-Infinity);
    expect(bucketLowerBound(buckets, 3)).toBe(30);
  });
});
