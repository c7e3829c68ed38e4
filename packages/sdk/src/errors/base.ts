/**
 * Error hierarchy for the metrics library.
 */

import { ErrorCode } from "./codes.js";

export class MetricsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "MetricsError";
  }
}

/**
 * Error thrown when root scope options fail validation.
 */
export class ConfigError extends MetricsError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * Error thrown by bucket generators for arguments that cannot describe a bucket layout.
 */
export class BucketsError extends MetricsError {
  constructor(message: string) {
    super(`Invalid buckets: ${message}`, ErrorCode.INVALID_BUCKETS);
    this.name = "BucketsError";
  }
}

/**
 * Wraps a failure raised by a reporter backend during a report pass.
 */
export class ReporterError extends MetricsError {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly cause?: Error,
  ) {
    super(`Reporter ${operation} failed: ${message}`, ErrorCode.REPORTER_ERROR, { cause });
    this.name = "ReporterError";
  }
}

/**
 * Error thrown when allocating a metric or scope re-enters the allocation of the same key,
 * e.g. a cached reporter calling back into the scope from `allocateCounter`.
 */
export class AllocationError extends MetricsError {
  constructor(
    public readonly kind: string,
    public readonly key: string,
  ) {
    super(`Re-entrant allocation of ${kind} "${key}"`, ErrorCode.REENTRANT_ALLOCATION);
    this.name = "AllocationError";
  }
}
