import { performance } from "node:perf_hooks";
import type { Stopwatch } from "@scopemeter/sdk";

export function startStopwatch(record: (durationMs: number) => void): Stopwatch {
  const startedAt = performance.now();
  let elapsed: number | null = null;

  return {
    stop(): number {
      if (elapsed === null) {
        elapsed = performance.now() - startedAt;
        record(elapsed);
      }
      return elapsed;
    },
  };
}
