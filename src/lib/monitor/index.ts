import type { AssessmentService } from "@/lib/assessment";
import type { AssessVendorRequestInput } from "@/lib/schemas/api";
import {
  RiskLevelSchema,
  type AssessmentResult,
  type AuditLogEntry,
  type RiskLevel,
} from "@/lib/schemas/assessment";
import { createAuditEntry } from "@/lib/workflow";
import { diffAssessments, type AssessmentDiff } from "./diff";

export const BATCH_SIZE = 2;
export const STALE_THRESHOLD_MS = 24 * 60 * 60 * 1000; // 24 hours

export interface MonitoredVendor {
  id: string;
  request: AssessVendorRequestInput;
  latestResult: AssessmentResult | null;
  latestAssessedAt: Date | null;
  previousResult: AssessmentResult | null;
  previousAssessedAt: Date | null;
}

/**
 * Persistence used by the monitor. Vendors never assessed, or last
 * assessed before `staleBefore`, come back oldest first.
 */
export interface MonitorStore {
  listStale(staleBefore: Date, limit: number): Promise<MonitoredVendor[]>;
  saveResult(vendorId: string, result: AssessmentResult, assessedAt: Date): Promise<void>;
  appendAudit(vendorId: string, entry: AuditLogEntry): Promise<void>;
}

export interface MonitorDeps {
  store: MonitorStore;
  service: Pick<AssessmentService, "assessVendor">;
  now?: () => Date;
}

export interface MonitorCycleResult {
  scanned: number;
  changed: number;
  errors: { vendorId: string; message: string }[];
}

export type MonitorEventType =
  | "initial_assessment"
  | "risk_increased"
  | "risk_decreased"
  | "new_finding"
  | "finding_removed";

function riskOrdinal(level: RiskLevel): number {
  return RiskLevelSchema.options.indexOf(level);
}

function hasMaterialChange(diff: AssessmentDiff): boolean {
  return (
    diff.overallRiskChanged ||
    diff.componentChanges.length > 0 ||
    diff.newFindings.length > 0 ||
    diff.removedFindings.length > 0
  );
}

export function classifyChange(diff: AssessmentDiff): MonitorEventType {
  if (diff.previousRisk === null) return "initial_assessment";
  if (diff.overallRiskChanged) {
    return riskOrdinal(diff.currentRisk) > riskOrdinal(diff.previousRisk) ? "risk_increased" : "risk_decreased";
  }
  if (diff.newFindings.length > 0) return "new_finding";
  if (diff.removedFindings.length > 0) return "finding_removed";
  // Only component scores moved
  return diff.currentScore >= (diff.previousScore ?? 0) ? "risk_increased" : "risk_decreased";
}

function buildSummary(eventType: MonitorEventType, diff: AssessmentDiff): string {
  switch (eventType) {
    case "initial_assessment":
      return `Initial assessment completed. Overall risk: ${diff.currentRisk} (${diff.currentScore}).`;
    case "risk_increased":
      return `Overall risk increased from ${diff.previousRisk} (${diff.previousScore}) to ${diff.currentRisk} (${diff.currentScore}).`;
    case "risk_decreased":
      return `Overall risk decreased from ${diff.previousRisk} (${diff.previousScore}) to ${diff.currentRisk} (${diff.currentScore}).`;
    case "new_finding":
      return `New findings detected: ${diff.newFindings.join(", ")}.`;
    case "finding_removed":
      return `Findings removed: ${diff.removedFindings.join(", ")}.`;
  }
}

/**
 * Runs a single drip-feed monitor cycle.
 * Re-assesses up to BATCH_SIZE stale vendors, diffs against the previous
 * result and records material changes.
 */
export async function runMonitorCycle(deps: MonitorDeps): Promise<MonitorCycleResult> {
  const now = deps.now ?? (() => new Date());
  const staleBefore = new Date(now().getTime() - STALE_THRESHOLD_MS);
  const vendors = await deps.store.listStale(staleBefore, BATCH_SIZE);

  const result: MonitorCycleResult = { scanned: 0, changed: 0, errors: [] };

  for (const vendor of vendors) {
    try {
      const current = await deps.service.assessVendor(vendor.request);
      const diff = diffAssessments(vendor.latestResult, current);

      if (hasMaterialChange(diff)) {
        const eventType = classifyChange(diff);
        await deps.store.appendAudit(
          vendor.id,
          createAuditEntry(eventType, "vendor", vendor.id, buildSummary(eventType, diff), { diff }, now())
        );
        console.log(`[monitor] ${vendor.id}: ${eventType}`);
        result.changed++;
      }

      await deps.store.saveResult(vendor.id, current, now());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[monitor] Re-assessment of ${vendor.id} failed: ${message}`);
      result.errors.push({ vendorId: vendor.id, message });
    }
    result.scanned++;
  }

  return result;
}

/**
 * Process-local store. Saving rotates the latest result into `previous`.
 */
export class InMemoryMonitorStore implements MonitorStore {
  readonly vendors = new Map<string, MonitoredVendor>();
  readonly auditLog: { vendorId: string; entry: AuditLogEntry }[] = [];

  constructor(requests: { id: string; request: AssessVendorRequestInput }[] = []) {
    for (const { id, request } of requests) {
      this.vendors.set(id, {
        id,
        request,
        latestResult: null,
        latestAssessedAt: null,
        previousResult: null,
        previousAssessedAt: null,
      });
    }
  }

  async listStale(staleBefore: Date, limit: number): Promise<MonitoredVendor[]> {
    return [...this.vendors.values()]
      .filter((v) => v.latestAssessedAt === null || v.latestAssessedAt < staleBefore)
      .sort((a, b) => (a.latestAssessedAt?.getTime() ?? 0) - (b.latestAssessedAt?.getTime() ?? 0))
      .slice(0, limit);
  }

  async saveResult(vendorId: string, result: AssessmentResult, assessedAt: Date): Promise<void> {
    const vendor = this.vendors.get(vendorId);
    if (!vendor) {
      throw new Error(`Unknown vendor: ${vendorId}`);
    }
    this.vendors.set(vendorId, {
      ...vendor,
      previousResult: vendor.latestResult,
      previousAssessedAt: vendor.latestAssessedAt,
      latestResult: result,
      latestAssessedAt: assessedAt,
    });
  }

  async appendAudit(vendorId: string, entry: AuditLogEntry): Promise<void> {
    this.auditLog.push({ vendorId, entry });
  }
}
