import type { AssessmentResult, Finding, RiskLevel, ScoreBreakdown } from "@/lib/schemas/assessment";

export interface AssessmentDiff {
  overallRiskChanged: boolean;
  previousRisk: RiskLevel | null;
  currentRisk: RiskLevel;
  previousScore: number | null;
  currentScore: number;
  componentChanges: {
    component: keyof ScoreBreakdown;
    previousScore: number | null;
    currentScore: number;
  }[];
  newFindings: string[];
  removedFindings: string[];
}

/** Component moves smaller than this are noise between runs. */
export const COMPONENT_CHANGE_THRESHOLD = 5;

const COMPONENT_KEYS = ["dataSecurity", "privacy", "compliance", "operational"] as const;

export function findingKey(finding: Finding): string {
  return `${finding.category}:${finding.findingType}:${finding.description}`;
}

function findingKeys(result: AssessmentResult): Set<string> {
  return new Set(result.findings.map(findingKey));
}

/**
 * Compares two assessments of the same vendor.
 * If `previous` is null (initial assessment), every component and finding is new.
 */
export function diffAssessments(
  previous: AssessmentResult | null,
  current: AssessmentResult
): AssessmentDiff {
  const overallRiskChanged = previous ? previous.riskCategory !== current.riskCategory : true;

  const componentChanges: AssessmentDiff["componentChanges"] = [];
  for (const key of COMPONENT_KEYS) {
    const prevScore = previous?.components[key] ?? null;
    const currScore = current.components[key];
    if (prevScore === null || Math.abs(currScore - prevScore) >= COMPONENT_CHANGE_THRESHOLD) {
      componentChanges.push({ component: key, previousScore: prevScore, currentScore: currScore });
    }
  }

  const previousKeys = previous ? findingKeys(previous) : new Set<string>();
  const currentKeys = findingKeys(current);

  return {
    overallRiskChanged,
    previousRisk: previous?.riskCategory ?? null,
    currentRisk: current.riskCategory,
    previousScore: previous?.overallScore ?? null,
    currentScore: current.overallScore,
    componentChanges,
    newFindings: [...currentKeys].filter((k) => !previousKeys.has(k)),
    removedFindings: [...previousKeys].filter((k) => !currentKeys.has(k)),
  };
}
