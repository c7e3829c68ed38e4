/**
 * Running totals that each report channel reads as deltas.
 */

/** Which reporter protocol is reading a cell. */
export type ReportChannel = "plain" | "cached";

/**
 * A running total with an independent report mark per channel, so the plain
 * and cached protocols can both consume the same accumulation.
 */
export class DeltaTotal {
  private total = 0;
  private readonly marks = new Map<ReportChannel, number>();

  constructor(private readonly channels: readonly ReportChannel[]) {
    for (const channel of channels) {
      this.marks.set(channel, 0);
    }
  }

  add(amount: number): void {
    this.total += amount;
  }

  /** Amount not yet reported on the first channel (the whole total when there is none). */
  pending(): number {
    const primary = this.channels[0];
    return primary === undefined ? this.total : this.total - (this.marks.get(primary) ?? 0);
  }

  /** Amount added since `channel` last consumed, and move that channel's mark. */
  consume(channel: ReportChannel): number {
    const mark = this.marks.get(channel) ?? 0;
    this.marks.set(channel, this.total);
    return this.total - mark;
  }
}
