/**
 * Metric handle types returned by a scope.
 */

/** Measures elapsed time from creation until `stop()`. */
export interface Stopwatch {
  /** Record the elapsed milliseconds. Only the first call records. */
  stop(): number;
}

export interface Counter {
  inc(delta?: number): void;
}

export interface Gauge {
  update(value: number): void;
}

export interface Timer {
  record(durationMs: number): void;
  start(): Stopwatch;
}

export interface Histogram {
  recordValue(value: number): void;
  recordDuration(durationMs: number): void;
  start(): Stopwatch;
}

/** What a reporter backend advertises about itself. */
export interface Capabilities {
  readonly reporting: boolean;
  readonly tagging: boolean;
}

export const CapableOf = {
  NONE: Object.freeze({ reporting: false, tagging: false }),
  REPORTING: Object.freeze({ reporting: true, tagging: false }),
  REPORTING_TAGGING: Object.freeze({ reporting: true, tagging: true }),
} as const satisfies Record<string, Capabilities>;
