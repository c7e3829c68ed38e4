import { describe, it, expect, vi } from "vitest";
import { AllocationError } from "@scopemeter/sdk";
import { AllocationMap } from "./allocation-map.js";

describe("AllocationMap", () => {
  it("allocates once per key", () => {
    const map = new AllocationMap<{ id: number }>("counter");
    const allocate = vi.fn(() => ({ id: 1 }));

    const first = map.getOrAllocate("x", allocate);
    const second = map.getOrAllocate("x", allocate);

    expect(second).toBe(first);
    expect(allocate).toHaveBeenCalledTimes(1);
    expect(map.size).toBe(1);
  });

  it("gives every concurrent caller the same instance", async () => {
    const map = new AllocationMap<object>("counter");
    const allocate = vi.fn(() => ({}));

    const results = await Promise.all(
      Array.from({ length: 50 }, async (_, i) => {
        await new Promise((resolve) => setTimeout(resolve, i % 3));
        return map.getOrAllocate("x", allocate);
      }),
    );

    expect(allocate).toHaveBeenCalledTimes(1);
    expect(new Set(results).size).toBe(1);
  });

  it("rejects re-entrant allocation of the same key", () => {
    const map = new AllocationMap<string>("gauge");

    expect(() => map.getOrAllocate("x", () => map.getOrAllocate("x", () => "inner"))).toThrow(AllocationError);
    expect(map.get("x")).toBeUndefined();
  });

  it("allows re-entrant allocation of a different key", () => {
    const map = new AllocationMap<string>("gauge");
    const outer = map.getOrAllocate("a", () => `a:${map.getOrAllocate("b", () => "b")}`);

    expect(outer).toBe("a:b");
    expect(map.entries()).toEqual([
      ["b", "b"],
      ["a", "a:b"],
    ]);
  });

  it("leaves the allocation section when allocate throws", () => {
    const map = new AllocationMap<string>("timer");

    expect(() =>
      map.getOrAllocate("x", () => {
        throw new Error("backend down");
      }),
    ).toThrow("backend down");
    expect(map.getOrAllocate("x", () => "ok")).toBe("ok");
  });
});
