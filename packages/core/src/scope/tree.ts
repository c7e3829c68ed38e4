/**
 * ScopeTree — the reporters, registry and report loop shared by one root scope and its descendants.
 */

import {
  CapableOf,
  ReporterError,
  type Capabilities,
  type IBaseStatsReporter,
  type ICachedStatsReporter,
  type IStatsReporter,
  type Scheduler,
} from "@scopemeter/sdk";
import { createLogger, errorDetails, type Logger } from "@scopemeter/shared";
import type { ReportChannel } from "../metrics/delta.js";
import { createScopeRegistry, type ScopeRegistry } from "./registry.js";
import { ReportLoop } from "./report-loop.js";
import type { ScopeTreeContext } from "./scope.js";

export interface ScopeTreeOptions {
  identityKey: string;
  reporter?: IStatsReporter;
  cachedReporter?: ICachedStatsReporter;
}

export class ScopeTree implements ScopeTreeContext {
  readonly registry: ScopeRegistry;
  readonly reporter?: IStatsReporter;
  readonly cachedReporter?: ICachedStatsReporter;
  readonly channels: readonly ReportChannel[];

  private readonly logger: Logger;
  private readonly loop: ReportLoop;
  private closed = false;
  private closing: Promise<void> | null = null;

  constructor(options: ScopeTreeOptions) {
    this.reporter = options.reporter;
    this.cachedReporter = options.cachedReporter;

    const channels: ReportChannel[] = [];
    if (this.reporter) channels.push("plain");
    if (this.cachedReporter) channels.push("cached");
    this.channels = channels;

    this.logger = createLogger("ScopeTree");
    this.logger.setContext({ scopeId: options.identityKey });
    this.registry = createScopeRegistry(this.logger.child("registry"));
    this.loop = new ReportLoop(() => this.reportPass(), this.logger.child("report-loop"));
  }

  /** Start periodic reporting. Without any reporter there is nothing to report and no loop runs. */
  start(scheduler: Scheduler, intervalMs: number): void {
    if (this.channels.length === 0) return;
    this.loop.start(scheduler, intervalMs);
  }

  isClosed(): boolean {
    return this.closed;
  }

  capabilities(): Capabilities {
    const base = this.reporter ?? this.cachedReporter;
    return base ? base.capabilities() : CapableOf.NONE;
  }

  reportNow(): Promise<void> {
    return this.loop.runNow();
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    let failure: ReporterError | undefined;
    try {
      await this.loop.stop();
    } catch (err) {
      failure = toReporterError("report", err);
    }

    this.closed = true;
    try {
      await this.closeReporters();
    } catch (err) {
      const closeFailure = toReporterError("close", err);
      if (failure) {
        this.logger.error("Reporter close failed after a failed final report", errorDetails(closeFailure));
      } else {
        failure = closeFailure;
      }
    }

    if (failure) throw failure;
  }

  private async reportPass(): Promise<void> {
    const stop = this.logger.time("Report pass");
    const scopes = this.registry.scopes();

    const { reporter, cachedReporter } = this;
    if (reporter) {
      for (const scope of scopes) {
        await scope.report(reporter);
      }
    }

    if (cachedReporter) {
      for (const scope of scopes) {
        await scope.cachedReport(cachedReporter);
      }
    }
    stop();
  }

  /** Closes every reporter once, even when an earlier one fails. Rethrows the first failure. */
  private async closeReporters(): Promise<void> {
    const reporters = new Set<IBaseStatsReporter>();
    if (this.reporter) reporters.add(this.reporter);
    if (this.cachedReporter) reporters.add(this.cachedReporter);

    let firstError: unknown;
    let failed = false;
    for (const reporter of reporters) {
      try {
        await reporter.close();
      } catch (err) {
        if (!failed) firstError = err;
        failed = true;
      }
    }
    this.logger.debug("Scope tree closed", { reporters: reporters.size });
    if (failed) throw firstError;
  }
}

function toReporterError(operation: string, err: unknown): ReporterError {
  const cause = err instanceof Error ? err : undefined;
  return new ReporterError(operation, cause ? cause.message : String(err), cause);
}
