import type { Scheduler } from "@scopemeter/sdk";

/** Default scheduler: a `setInterval` that does not keep the process alive. */
export const intervalScheduler: Scheduler = {
  scheduleRepeating(task, intervalMs) {
    const handle = setInterval(task, intervalMs);
    handle.unref();
    return () => clearInterval(handle);
  },
};
