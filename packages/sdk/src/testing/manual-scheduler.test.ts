import { describe, it, expect, vi } from "vitest";
import { ManualScheduler } from "./manual-scheduler.js";

describe("ManualScheduler", () => {
  it("runs scheduled tasks on tick", () => {
    const scheduler = new ManualScheduler();
    const task = vi.fn();
    scheduler.scheduleRepeating(task, 500);

    scheduler.tick();
    scheduler.tick();

    expect(task).toHaveBeenCalledTimes(2);
    expect(scheduler.intervals).toEqual([500]);
  });

  it("does not run cancelled tasks", () => {
    const scheduler = new ManualScheduler();
    const task = vi.fn();
    const cancel = scheduler.scheduleRepeating(task, 100);

    cancel();
    scheduler.tick();

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.activeCount).toBe(0);
  });
});
