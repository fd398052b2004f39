import type { FindingType, RiskCriteria, RiskLevel } from "@/lib/schemas/assessment";

export interface ComponentWeights {
  dataSecurity: number;
  privacy: number;
  compliance: number;
  operational: number;
}

export const DEFAULT_COMPONENT_WEIGHTS: ComponentWeights = {
  dataSecurity: 0.3,
  privacy: 0.25,
  compliance: 0.2,
  operational: 0.25,
};

/** Higher is riskier. */
export const FINDING_TYPE_SCORE: Record<FindingType, number> = {
  compliant: 20,
  unclear: 60,
  non_compliant: 80,
  missing: 90,
};

export const NEUTRAL_SCORE = 50;

export const DATA_SECURITY_CATEGORIES = [
  "encryption",
  "access_control",
  "network_security",
  "data_protection",
] as const;

export const PRIVACY_CATEGORIES = [
  "privacy_compliance",
  "data_subject_rights",
  "consent_management",
] as const;

export const COMPLIANCE_CATEGORIES = ["compliance_frameworks", "attestation_report", "iso27001"] as const;

export const OPERATIONAL_CATEGORIES = [
  "incident_response",
  "business_continuity",
  "vendor_management",
] as const;

/** Regulations that add a privacy penalty, 10 points each up to 30. */
export const PRIVACY_REGULATIONS = new Set(["GDPR", "CCPA", "PIPEDA"]);
export const PRIVACY_PENALTY_PER_REGULATION = 10;
export const PRIVACY_PENALTY_CAP = 30;

export const COMPLIANCE_BASE = 60;
export const COMPLIANCE_CREDIT_PER_COMPLIANT = 5;
export const COMPLIANCE_PENALTY_PER_MISSING = 8;

export const CRITICALITY_MULTIPLIER: Record<RiskLevel, number> = {
  low: 0.8,
  medium: 1.0,
  high: 1.2,
  critical: 1.4,
};

/** Keys are upper-case; unknown locations use `UNKNOWN_GEOGRAPHY`. */
export const GEOGRAPHY_MULTIPLIER: Record<string, number> = {
  US: 1.0,
  EU: 1.0,
  UK: 1.0,
  CA: 1.0,
  AU: 1.0,
  MEDIUM_RISK: 1.4,
  HIGH_RISK: 1.8,
};
export const UNKNOWN_GEOGRAPHY = 1.2;

/** Keys are upper-case with underscores; unknown regulations use `UNKNOWN_REGULATION`. */
export const REGULATORY_MULTIPLIER: Record<string, number> = {
  GDPR: 1.3,
  HIPAA: 1.4,
  PCI_DSS: 1.2,
  SOX: 1.3,
  CCPA: 1.1,
  SOC2: 1.0,
  ISO27001: 0.9,
};
export const UNKNOWN_REGULATION = 1.1;

export const SENSITIVITY_MULTIPLIER: Record<RiskLevel, number> = {
  low: 0.8,
  medium: 1.0,
  high: 1.3,
  critical: 1.6,
};

export const ACCESS_MULTIPLIER: Record<RiskCriteria["vendorAccessLevel"], number> = {
  read_only: 0.9,
  limited: 1.0,
  full: 1.2,
  admin: 1.4,
};

/** Lower bounds of each risk category, checked from the top. */
export const RISK_CATEGORY_THRESHOLDS: { min: number; level: RiskLevel }[] = [
  { min: 80, level: "critical" },
  { min: 65, level: "high" },
  { min: 40, level: "medium" },
];

export const DEFAULT_HIGH_RISK_THRESHOLD = 85;
