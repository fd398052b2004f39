import { ConfigError } from "@/lib/config";
import type {
  Finding,
  FindingSummary,
  RiskCriteria,
  RiskLevel,
  ScoreBreakdown,
} from "@/lib/schemas/assessment";
import {
  ACCESS_MULTIPLIER,
  COMPLIANCE_BASE,
  COMPLIANCE_CATEGORIES,
  COMPLIANCE_CREDIT_PER_COMPLIANT,
  COMPLIANCE_PENALTY_PER_MISSING,
  CRITICALITY_MULTIPLIER,
  DATA_SECURITY_CATEGORIES,
  DEFAULT_COMPONENT_WEIGHTS,
  DEFAULT_HIGH_RISK_THRESHOLD,
  FINDING_TYPE_SCORE,
  GEOGRAPHY_MULTIPLIER,
  NEUTRAL_SCORE,
  OPERATIONAL_CATEGORIES,
  PRIVACY_CATEGORIES,
  PRIVACY_PENALTY_CAP,
  PRIVACY_PENALTY_PER_REGULATION,
  PRIVACY_REGULATIONS,
  REGULATORY_MULTIPLIER,
  RISK_CATEGORY_THRESHOLDS,
  SENSITIVITY_MULTIPLIER,
  UNKNOWN_GEOGRAPHY,
  UNKNOWN_REGULATION,
  type ComponentWeights,
} from "./tables";

export interface ScoringOptions {
  weights?: Partial<ComponentWeights>;
  highRiskThreshold?: number;
}

export interface ScoreResult {
  overallScore: number;
  components: ScoreBreakdown;
  riskCategory: RiskLevel;
  keyRiskFactors: string[];
  recommendations: string[];
  requiresHumanReview: boolean;
  findingSummary: FindingSummary;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function normalizeKey(value: string): string {
  return value.trim().toUpperCase().replace(/[\s-]+/g, "_");
}

/**
 * Confidence- and impact-weighted mean of finding-type scores.
 * Neutral when there is nothing to weigh.
 */
export function scoreCategory(findings: readonly Finding[]): number {
  let total = 0;
  let totalWeight = 0;
  for (const finding of findings) {
    const weight = finding.confidence * (finding.impactScore / 10);
    total += FINDING_TYPE_SCORE[finding.findingType] * weight;
    totalWeight += weight;
  }
  return totalWeight > 0 ? total / totalWeight : NEUTRAL_SCORE;
}

function categoryScores(
  findings: readonly Finding[],
  categories: readonly string[]
): Map<string, number> {
  return new Map(
    categories.map((category) => [
      category,
      scoreCategory(findings.filter((f) => f.category === category)),
    ])
  );
}

function mean(values: Iterable<number>): number {
  const list = Array.from(values);
  return list.length > 0 ? list.reduce((sum, v) => sum + v, 0) / list.length : NEUTRAL_SCORE;
}

function dataSecurityScore(findings: readonly Finding[], criteria: RiskCriteria): number {
  const scores = categoryScores(findings, DATA_SECURITY_CATEGORIES);
  const sensitive = criteria.dataSensitivity === "high" || criteria.dataSensitivity === "critical";
  const encryptionWeight = sensitive ? 0.4 : 0.3;
  const otherWeight = (1 - encryptionWeight) / 3;

  let score = 0;
  for (const [category, value] of scores) {
    score += value * (category === "encryption" ? encryptionWeight : otherWeight);
  }
  return clamp(score);
}

function privacyScore(findings: readonly Finding[], criteria: RiskCriteria): number {
  const base = mean(categoryScores(findings, PRIVACY_CATEGORIES).values());
  const exposures = new Set(criteria.regulatoryExposure.map(normalizeKey));
  const penalty = Array.from(exposures).filter((r) => PRIVACY_REGULATIONS.has(r)).length *
    PRIVACY_PENALTY_PER_REGULATION;
  return clamp(base + Math.min(penalty, PRIVACY_PENALTY_CAP));
}

function complianceScore(findings: readonly Finding[]): number {
  const relevant = findings.filter((f) =>
    (COMPLIANCE_CATEGORIES as readonly string[]).includes(f.category)
  );
  if (relevant.length === 0) return NEUTRAL_SCORE;

  const compliant = relevant.filter((f) => f.findingType === "compliant").length;
  const missing = relevant.filter((f) => f.findingType === "missing").length;
  return clamp(
    COMPLIANCE_BASE -
      compliant * COMPLIANCE_CREDIT_PER_COMPLIANT +
      missing * COMPLIANCE_PENALTY_PER_MISSING
  );
}

function operationalScore(findings: readonly Finding[], criteria: RiskCriteria): number {
  const base = mean(categoryScores(findings, OPERATIONAL_CATEGORIES).values());
  return clamp(base * CRITICALITY_MULTIPLIER[criteria.businessCriticality]);
}

function maxOf(values: number[]): number {
  return values.length > 0 ? Math.max(...values) : 1.0;
}

/**
 * Largest of the geography, regulatory, sensitivity and access multipliers.
 * An empty list contributes 1.0.
 */
export function riskMultiplier(criteria: RiskCriteria): number {
  const geography = maxOf(
    criteria.geographicLocations.map((l) => GEOGRAPHY_MULTIPLIER[normalizeKey(l)] ?? UNKNOWN_GEOGRAPHY)
  );
  const regulatory = maxOf(
    criteria.regulatoryExposure.map((r) => REGULATORY_MULTIPLIER[normalizeKey(r)] ?? UNKNOWN_REGULATION)
  );
  return Math.max(
    geography,
    regulatory,
    SENSITIVITY_MULTIPLIER[criteria.dataSensitivity],
    ACCESS_MULTIPLIER[criteria.vendorAccessLevel]
  );
}

export function riskCategoryFor(score: number): RiskLevel {
  return RISK_CATEGORY_THRESHOLDS.find(({ min }) => score >= min)?.level ?? "low";
}

function resolveWeights(overrides: Partial<ComponentWeights> = {}): ComponentWeights {
  const weights = { ...DEFAULT_COMPONENT_WEIGHTS, ...overrides };
  const values = Object.values(weights);
  if (values.some((w) => w < 0) || Math.abs(values.reduce((sum, w) => sum + w, 0) - 1) > 1e-6) {
    throw new ConfigError("Component weights must be non-negative and sum to 1.0");
  }
  return weights;
}

export function requiresHumanReview(
  overallScore: number,
  findings: readonly Finding[],
  highRiskThreshold = DEFAULT_HIGH_RISK_THRESHOLD
): boolean {
  if (overallScore >= highRiskThreshold) return true;
  if (findings.some((f) => f.riskLevel === "critical")) return true;
  if (findings.filter((f) => f.riskLevel === "high").length >= 3) return true;
  return findings.filter((f) => f.confidence < 0.6 && f.impactScore >= 7).length >= 2;
}

export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const summary: FindingSummary = { total: findings.length, byType: {}, byRiskLevel: {}, byCategory: {} };
  for (const f of findings) {
    summary.byType[f.findingType] = (summary.byType[f.findingType] ?? 0) + 1;
    summary.byRiskLevel[f.riskLevel] = (summary.byRiskLevel[f.riskLevel] ?? 0) + 1;
    summary.byCategory[f.category] = (summary.byCategory[f.category] ?? 0) + 1;
  }
  return summary;
}

function keyRiskFactors(findings: readonly Finding[], criteria: RiskCriteria): string[] {
  const factors: string[] = [];
  const critical = findings.filter((f) => f.riskLevel === "critical").length;
  const high = findings.filter((f) => f.riskLevel === "high").length;
  const missing = findings.filter((f) => f.findingType === "missing");

  if (critical > 0) factors.push(`${critical} critical security finding(s)`);
  if (high > 0) factors.push(`${high} high-risk finding(s)`);
  if (missing.some((f) => f.category.includes("encryption") || f.category.includes("access_control"))) {
    factors.push("Missing critical security controls");
  }
  const gdpr = criteria.regulatoryExposure.some((r) => normalizeKey(r) === "GDPR");
  if (gdpr && missing.some((f) => f.category.includes("privacy"))) {
    factors.push("GDPR compliance gaps identified");
  }
  const sensitive = criteria.dataSensitivity === "high" || criteria.dataSensitivity === "critical";
  if (sensitive && findings.some((f) => f.category === "encryption" && f.findingType !== "compliant")) {
    factors.push("Inadequate encryption for sensitive data");
  }
  return factors;
}

function recommendationsFor(
  findings: readonly Finding[],
  components: ScoreBreakdown,
  criteria: RiskCriteria
): string[] {
  const recommendations: string[] = [];
  if (components.dataSecurity > 60) {
    recommendations.push("Strengthen data security controls and encryption practices");
  }
  if (components.privacy > 60) {
    recommendations.push("Improve privacy compliance and data subject rights implementation");
  }
  if (components.compliance > 60) {
    recommendations.push("Obtain additional compliance certifications (SOC 2, ISO 27001)");
  }
  if (findings.some((f) => f.category === "attestation_report" && f.findingType === "missing")) {
    recommendations.push("Request current SOC 2 Type II report");
  }
  if (findings.some((f) => f.category === "encryption" && f.findingType === "missing")) {
    recommendations.push("Clarify data encryption practices and key management procedures");
  }
  if (criteria.dataSensitivity === "high" || criteria.dataSensitivity === "critical") {
    recommendations.push("Conduct enhanced due diligence given high data sensitivity");
  }
  if (criteria.regulatoryExposure.some((r) => normalizeKey(r) === "GDPR")) {
    recommendations.push("Verify GDPR compliance and DPA execution");
  }
  return recommendations;
}

/**
 * Scores a vendor's findings against the assessment criteria. Pure: the same
 * input always gives the same result. Higher scores mean more risk.
 */
export function scoreFindings(
  findings: readonly Finding[],
  criteria: RiskCriteria,
  options: ScoringOptions = {}
): ScoreResult {
  const weights = resolveWeights(options.weights);

  const components: ScoreBreakdown = {
    dataSecurity: round2(dataSecurityScore(findings, criteria)),
    privacy: round2(privacyScore(findings, criteria)),
    compliance: round2(complianceScore(findings)),
    operational: round2(operationalScore(findings, criteria)),
  };

  const base =
    components.dataSecurity * weights.dataSecurity +
    components.privacy * weights.privacy +
    components.compliance * weights.compliance +
    components.operational * weights.operational;
  const overallScore = round2(clamp(base * riskMultiplier(criteria)));

  return {
    overallScore,
    components,
    riskCategory: riskCategoryFor(overallScore),
    keyRiskFactors: keyRiskFactors(findings, criteria),
    recommendations: recommendationsFor(findings, components, criteria),
    requiresHumanReview: requiresHumanReview(
      overallScore,
      findings,
      options.highRiskThreshold ?? DEFAULT_HIGH_RISK_THRESHOLD
    ),
    findingSummary: summarizeFindings(findings),
  };
}
