/**
 * Error codes carried by MetricsError subclasses.
 */

export const ErrorCode = {
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_BUCKETS: "INVALID_BUCKETS",
  REPORTER_ERROR: "REPORTER_ERROR",
  REENTRANT_ALLOCATION: "REENTRANT_ALLOCATION",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
