import type { ActionPriority, Finding } from "@/lib/schemas/assessment";
import type { TemplateKey } from "./templates";

export interface FollowUpRule {
  id: string;
  actionType: string;
  priority: ActionPriority;
  dueDays: number;
  template: TemplateKey;
  /** Set on document requests; used to fold them into consolidated requests */
  category?: string;
  trigger(findings: readonly Finding[]): boolean;
  relevant(findings: readonly Finding[]): Finding[];
}

function missingIn(category: string) {
  return (findings: readonly Finding[]) =>
    findings.filter((f) => f.category === category && f.findingType === "missing");
}

function documentRequest(
  id: string,
  category: string,
  priority: ActionPriority,
  dueDays: number
): FollowUpRule {
  const relevant = missingIn(category);
  return {
    id,
    actionType: "document_request",
    priority,
    dueDays,
    template: "document_request",
    category,
    trigger: (findings) => relevant(findings).length > 0,
    relevant,
  };
}

const isSevere = (f: Finding) => f.riskLevel === "high" || f.riskLevel === "critical";
const unclearEncryption = (findings: readonly Finding[]) =>
  findings.filter((f) => f.category === "encryption" && f.findingType === "unclear");
const critical = (findings: readonly Finding[]) => findings.filter((f) => f.riskLevel === "critical");

export const FOLLOW_UP_RULES: FollowUpRule[] = [
  documentRequest("missing_attestation_report", "attestation_report", "high", 5),
  documentRequest("missing_privacy_policy", "privacy_compliance", "medium", 7),
  documentRequest("missing_compliance_frameworks", "compliance_frameworks", "high", 5),
  {
    id: "unclear_encryption",
    actionType: "clarification",
    priority: "high",
    dueDays: 3,
    template: "clarification_request",
    trigger: (findings) => unclearEncryption(findings).length > 0,
    relevant: unclearEncryption,
  },
  {
    id: "critical_compliance_gaps",
    actionType: "urgent_clarification",
    priority: "urgent",
    dueDays: 2,
    template: "compliance_gaps",
    trigger: (findings) => critical(findings).length > 0,
    relevant: critical,
  },
  {
    id: "high_risk_vendor",
    actionType: "risk_review",
    priority: "high",
    dueDays: 5,
    template: "compliance_gaps",
    trigger: (findings) => findings.filter(isSevere).length >= 3,
    relevant: (findings) => findings.filter(isSevere),
  },
];

/** Missing findings per category at or above this count get one combined request. */
export const CONSOLIDATION_MIN_MISSING = 2;
export const CONSOLIDATED_PRIORITY: ActionPriority = "medium";
export const CONSOLIDATED_DUE_DAYS = 7;
