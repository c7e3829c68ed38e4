/**
 * LoggingStatsReporter — plain reporter that writes every report to a logger.
 * Useful while developing instrumentation; not meant for production volumes.
 */

import { CapableOf, type Buckets, type Capabilities, type IStatsReporter, type Tags } from "@scopemeter/sdk";
import { createLogger, type Logger, type LogLevel } from "@scopemeter/shared";

export interface LoggingStatsReporterOptions {
  logger?: Logger;
  /** Level report entries are written at. Default: "info" */
  level?: LogLevel;
}

export class LoggingStatsReporter implements IStatsReporter {
  private readonly logger: Logger;
  private readonly level: LogLevel;

  constructor(options: LoggingStatsReporterOptions = {}) {
    this.logger = options.logger ?? createLogger("LoggingStatsReporter");
    this.level = options.level ?? "info";
  }

  capabilities(): Capabilities {
    return CapableOf.REPORTING_TAGGING;
  }

  reportCounter(name: string, tags: Tags, value: number): void {
    this.write(`counter ${name}`, { tags, value });
  }

  reportGauge(name: string, tags: Tags, value: number): void {
    this.write(`gauge ${name}`, { tags, value });
  }

  reportTimer(name: string, tags: Tags, durationMs: number): void {
    this.write(`timer ${name}`, { tags, durationMs });
  }

  reportHistogramValueSamples(
    name: string,
    tags: Tags,
    _buckets: Buckets,
    bucketLowerBound: number,
    bucketUpperBound: number,
    samples: number,
  ): void {
    this.write(`histogram ${name}`, {
      tags,
      bucket: formatBucket(bucketLowerBound, bucketUpperBound),
      samples,
    });
  }

  reportHistogramDurationSamples(
    name: string,
    tags: Tags,
    _buckets: Buckets,
    bucketLowerBoundMs: number,
    bucketUpperBoundMs: number,
    samples: number,
  ): void {
    this.write(`histogram ${name}`, {
      tags,
      bucketMs: formatBucket(bucketLowerBoundMs, bucketUpperBoundMs),
      samples,
    });
  }

  flush(): void {
    this.logger.debug("flush");
  }

  close(): void {
    this.logger.debug("close");
  }

  private write(message: string, data: Record<string, unknown>): void {
    this.logger[this.level](message, data);
  }
}

// JSON has no Infinity
function formatBucket(lower: number, upper: number): string {
  return `${lower === -Infinity ? "-inf" : lower}..${upper === Infinity ? "+inf" : upper}`;
}
