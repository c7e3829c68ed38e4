import { describe, it, expect } from "vitest";
import { CapableOf } from "@scopemeter/sdk";
import { noopScope } from "./noop-scope.js";

describe("noopScope", () => {
  it("accepts recordings without effect", () => {
    noopScope.counter("c").inc(5);
    noopScope.gauge("g").update(1);
    noopScope.timer("t").record(3);
    noopScope.histogram("h").recordValue(2);

    expect(noopScope.timer("t").start().stop()).toBe(0);
  });

  it("returns itself for subscopes", () => {
    expect(noopScope.subScope("x")).toBe(noopScope);
    expect(noopScope.tagged({ a: "1" })).toBe(noopScope);
    expect(noopScope.tags.size).toBe(0);
  });

  it("has no capabilities and closes cleanly", async () => {
    expect(noopScope.capabilities()).toBe(CapableOf.NONE);
    await expect(noopScope.close()).resolves.toBeUndefined();
  });
});
