/**
 * Linkage Tracing System
 *
 * Tracks call-site bindings of generated proxy types for debugging and
 * introspection.
 *
 * Features:
 * - Records every bind attempt with its outcome
 * - Per-type summaries
 * - Plain-text output for terminals
 */

import { config } from "./config.js";

/**
 * Outcome of one bind attempt.
 */
export type LinkageOutcome = "bound" | "failed";

/**
 * A single linkage event record.
 */
export interface LinkageRecord {
  /** Name of the generated proxy type */
  typeName: string;
  /** Contract that declares the method */
  contract: string;
  method: string;
  /** Method type, e.g. `(int,int)int` */
  descriptor: string;
  outcome: LinkageOutcome;
  /** Why the bind failed */
  reason?: string;
  /** Timestamp for ordering */
  timestamp: number;
}

/**
 * Summary of linkage events for one generated type.
 */
export interface TypeSummary {
  typeName: string;
  totalLinkages: number;
  byOutcome: Record<LinkageOutcome, number>;
  byContract: Record<string, number>;
}

/**
 * Tracks all linkage events of the process.
 */
export class LinkageTracer {
  private records: LinkageRecord[] = [];
  private forced: boolean | undefined;

  /**
   * Tracing follows the `tracing` configuration flag unless it was switched
   * on or off programmatically.
   */
  isEnabled(): boolean {
    return this.forced ?? config.get("tracing") === true;
  }

  enable(): void {
    this.forced = true;
  }

  disable(): void {
    this.forced = false;
  }

  record(event: Omit<LinkageRecord, "timestamp">): void {
    if (!this.isEnabled()) return;

    this.records.push({ ...event, timestamp: Date.now() });
  }

  getRecordsForType(typeName: string): LinkageRecord[] {
    return this.records.filter((r) => r.typeName === typeName);
  }

  getAllRecords(): LinkageRecord[] {
    return [...this.records];
  }

  getSummary(typeName: string): TypeSummary {
    const typeRecords = this.getRecordsForType(typeName);

    const byOutcome: Record<LinkageOutcome, number> = { bound: 0, failed: 0 };
    const byContract: Record<string, number> = {};

    for (const record of typeRecords) {
      byOutcome[record.outcome]++;
      byContract[record.contract] = (byContract[record.contract] ?? 0) + 1;
    }

    return {
      typeName,
      totalLinkages: typeRecords.length,
      byOutcome,
      byContract,
    };
  }

  /**
   * Format trace output for a terminal.
   */
  formatForCLI(typeName?: string): string {
    const records = typeName ? this.getRecordsForType(typeName) : this.records;

    if (records.length === 0) {
      return "No linkages recorded.";
    }

    const byType = new Map<string, LinkageRecord[]>();
    for (const record of records) {
      const group = byType.get(record.typeName);
      if (group) {
        group.push(record);
      } else {
        byType.set(record.typeName, [record]);
      }
    }

    const lines: string[] = [];
    for (const [type, typeRecords] of byType) {
      lines.push(`== ${type} ==`);

      for (const record of typeRecords) {
        const reason = record.reason ? ` (${record.reason})` : "";
        lines.push(
          `  [${record.outcome}] ${record.contract}.${record.method}${record.descriptor}${reason}`
        );
      }
    }

    return lines.join("\n");
  }

  clear(): void {
    this.records = [];
  }

  /**
   * Drop the programmatic override and clear all records (mainly for testing).
   */
  reset(): void {
    this.records = [];
    this.forced = undefined;
  }
}

/**
 * Global linkage tracer instance.
 */
export const globalLinkageTracer = new LinkageTracer();
