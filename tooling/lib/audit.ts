/**
 * Translation audit trail
 * Tracks which corpus tests were generated or skipped, and why, per operation
 */

import { RejectionCode, SkipRecord } from "../../src/types";

export type AuditEntryType = "test_generated" | "test_skipped" | "package_emitted" | "package_removed";

export interface AuditEntry {
  timestamp: string;
  type: AuditEntryType;
  operationId: string;
  details: Record<string, string | number>;
}

export interface OperationAudit {
  operationId: string;
  identified: number;
  generated: number;
  skipped: number;
  skipsByCode: Partial<Record<RejectionCode, number>>;
  packageName?: string;
}

export class TranslationAudit {
  private entries: AuditEntry[] = [];
  private operations: Map<string, OperationAudit> = new Map();
  private skips: SkipRecord[] = [];

  private operationAudit(operationId: string): OperationAudit {
    let audit = this.operations.get(operationId);
    if (!audit) {
      audit = { operationId, identified: 0, generated: 0, skipped: 0, skipsByCode: {} };
      this.operations.set(operationId, audit);
    }
    return audit;
  }

  recordGenerated(operationId: string, testName: string, identifier: string): void {
    const audit = this.operationAudit(operationId);
    audit.identified += 1;
    audit.generated += 1;

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "test_generated",
      operationId,
      details: { testName, identifier },
    });
  }

  recordSkip(skip: SkipRecord): void {
    const audit = this.operationAudit(skip.operationId);
    audit.identified += 1;
    audit.skipped += 1;
    audit.skipsByCode[skip.code] = (audit.skipsByCode[skip.code] ?? 0) + 1;
    this.skips.push(skip);

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "test_skipped",
      operationId: skip.operationId,
      details: { testName: skip.testName, code: skip.code, reason: skip.reason },
    });
  }

  /**
   * Record the package outcome for an operation; `packageName` is omitted
   * when the package was removed
   */
  recordPackage(operationId: string, packageName: string, written: boolean, testCount: number): void {
    const audit = this.operationAudit(operationId);
    if (written) {
      audit.packageName = packageName;
    }

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: written ? "package_emitted" : "package_removed",
      operationId,
      details: { packageName, testCount },
    });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getOperationAudit(operationId: string): OperationAudit | undefined {
    return this.operations.get(operationId);
  }

  getSkips(operationId?: string): SkipRecord[] {
    return operationId === undefined ? [...this.skips] : this.skips.filter((skip) => skip.operationId === operationId);
  }

  /**
   * Skip counts per rejection code across all operations
   */
  getSkipCounts(): Partial<Record<RejectionCode, number>> {
    const counts: Partial<Record<RejectionCode, number>> = {};
    for (const skip of this.skips) {
      counts[skip.code] = (counts[skip.code] ?? 0) + 1;
    }
    return counts;
  }

  getSummary(): {
    operations: number;
    identified: number;
    generated: number;
    skipped: number;
    coverage: number;
  } {
    const audits = Array.from(this.operations.values());
    const identified = audits.reduce((sum, audit) => sum + audit.identified, 0);
    const generated = audits.reduce((sum, audit) => sum + audit.generated, 0);

    return {
      operations: audits.length,
      identified,
      generated,
      skipped: identified - generated,
      coverage: identified > 0 ? generated / identified : 0,
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): {
    summary: ReturnType<TranslationAudit["getSummary"]>;
    skipCounts: Partial<Record<RejectionCode, number>>;
    operations: OperationAudit[];
    skips: SkipRecord[];
  } {
    return {
      summary: this.getSummary(),
      skipCounts: this.getSkipCounts(),
      operations: Array.from(this.operations.values()).sort((a, b) =>
        a.operationId < b.operationId ? -1 : a.operationId > b.operationId ? 1 : 0
      ),
      skips: [...this.skips],
    };
  }

  clear(): void {
    this.entries = [];
    this.operations.clear();
    this.skips = [];
  }
}
