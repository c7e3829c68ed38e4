export { createLogger, errorDetails } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  RootScopeOptionsSchema,
  BucketsSchema,
  DEFAULT_SEPARATOR,
  DEFAULT_REPORT_INTERVAL_MS,
} from "./utils/config-schema.js";
export type { ValidatedRootScopeOptions } from "./utils/config-schema.js";
