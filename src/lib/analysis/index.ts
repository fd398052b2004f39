import type { CompletionClient } from "@/lib/ai";
import type { PipelineConfig } from "@/lib/config";
import {
  createFinding,
  type DocumentType,
  type Finding,
  type FindingType,
  type RiskLevel,
} from "@/lib/schemas/assessment";
import {
  ATTESTATION_PATTERNS,
  COMPLIANCE_INDICATORS,
  CONTROL_EXCEPTION_LABEL,
  EXPECTED_ELEMENTS,
  PRIVACY_REQUIREMENTS,
} from "./indicators";
import { runNarrativePass } from "./narrative";

export interface AnalysisContext {
  sourceUrl?: string;
  signal?: AbortSignal;
}

export interface AnalysisDeps {
  config: PipelineConfig;
  completion?: CompletionClient;
  /** Per-run queue that keeps one completion request in flight */
  enqueue?: <T>(task: () => Promise<T>) => Promise<T>;
}

export interface AnalysisEngine {
  analyze(text: string, documentType: DocumentType, context?: AnalysisContext): Promise<Finding[]>;
}

interface Scope {
  sourceUrl?: string;
  documentType: DocumentType;
}

function clampImpact(value: number): number {
  return Math.min(10, Math.max(1, Math.round(value)));
}

/**
 * Keyword and regex screening against the indicator table. Emits one
 * finding per indicator category.
 */
export function analyzePatterns(text: string, scope: Scope): Finding[] {
  const lower = text.toLowerCase();

  return COMPLIANCE_INDICATORS.map((indicator) => {
    const matches = indicator.strictPatterns.flatMap((pattern) =>
      Array.from(text.matchAll(pattern), (match) => match[0])
    );
    const keywordsFound = indicator.keywords.filter((keyword) =>
      lower.includes(keyword.toLowerCase())
    );

    let findingType: FindingType;
    let riskLevel: RiskLevel;
    let confidence: number;
    let description: string;
    let evidence: string;

    if (matches.length > 0) {
      findingType = "compliant";
      riskLevel = "low";
      confidence = 0.8;
      description = `Found compliance indicators for ${indicator.description}`;
      evidence = matches.slice(0, 3).join("; ");
    } else if (keywordsFound.length >= Math.floor(indicator.keywords.length / 2)) {
      findingType = "unclear";
      riskLevel = "medium";
      confidence = 0.6;
      description = `Partial compliance indicators found for ${indicator.description}`;
      evidence = `Keywords found: ${keywordsFound.join(", ")}`;
    } else {
      findingType = "missing";
      riskLevel = "high";
      confidence = 0.7;
      description = `Missing compliance indicators for ${indicator.description}`;
      evidence = "No relevant patterns or keywords found";
    }

    return createFinding({
      category: indicator.category,
      findingType,
      riskLevel,
      confidence,
      impactScore: clampImpact(indicator.riskWeight * 10),
      description,
      evidence,
      ...scope,
    });
  });
}

export function analyzeAttestation(text: string, scope: Scope): Finding[] {
  const findings: Finding[] = [];

  for (const { label, pattern } of ATTESTATION_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;

    findings.push(
      createFinding({
        category: "attestation_report",
        findingType: "compliant",
        riskLevel: "low",
        confidence: 0.9,
        impactScore: 3,
        description: `Attestation ${label} identified`,
        evidence: match[0],
        ...scope,
      })
    );

    if (label === CONTROL_EXCEPTION_LABEL) {
      findings.push(
        createFinding({
          category: "attestation_report",
          findingType: "unclear",
          riskLevel: "medium",
          confidence: 0.7,
          impactScore: 6,
          description: "Attestation report mentions control exceptions or deviations",
          evidence: surrounding(text, match.index ?? 0, match[0].length),
          ...scope,
        })
      );
    }
  }

  return findings;
}

export function analyzePrivacy(text: string, scope: Scope): Finding[] {
  return PRIVACY_REQUIREMENTS.map(({ label, patterns }) => {
    const addressed = patterns.some((pattern) => pattern.test(text));
    return createFinding({
      category: "privacy_compliance",
      findingType: addressed ? "compliant" : "missing",
      riskLevel: addressed ? "low" : "medium",
      confidence: 0.7,
      impactScore: addressed ? 2 : 5,
      description: addressed
        ? `Privacy requirement addressed: ${label}`
        : `Missing privacy requirement: ${label}`,
      evidence: "Pattern analysis",
      ...scope,
    });
  });
}

export function checkMissingElements(text: string, scope: Scope): Finding[] {
  const expected = EXPECTED_ELEMENTS[scope.documentType] ?? [];
  const lower = text.toLowerCase().replace(/[‘’]/g, "'");

  return expected
    .filter((element) => !lower.includes(element))
    .map((element) =>
      createFinding({
        category: "missing_elements",
        findingType: "missing",
        riskLevel: "medium",
        confidence: 0.8,
        impactScore: 6,
        description: `Missing expected element: ${element}`,
        evidence: "Element not found in document",
        ...scope,
      })
    );
}

function surrounding(text: string, index: number, length: number): string {
  const start = Math.max(0, index - 80);
  const end = Math.min(text.length, index + length + 80);
  return text.slice(start, end).replace(/\s+/g, " ").trim();
}

function undetermined(scope: Scope, reason: string): Finding {
  return createFinding({
    category: "document_content",
    findingType: "unclear",
    riskLevel: "medium",
    confidence: 0.5,
    impactScore: 5,
    description: reason,
    evidence: "",
    ...scope,
  });
}

const RISK_LEVEL_SCORE: Record<RiskLevel, number> = { low: 10, medium: 40, high: 70, critical: 90 };
const FINDING_TYPE_WEIGHT: Record<FindingType, number> = {
  compliant: 0.5,
  unclear: 1,
  non_compliant: 1.5,
  missing: 2,
};

/**
 * Risk score (0-100, higher is riskier) of one document's findings.
 * 50 when there is nothing to weigh.
 */
export function documentRiskScore(findings: readonly Finding[]): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const finding of findings) {
    const weight = FINDING_TYPE_WEIGHT[finding.findingType] * finding.confidence;
    weighted += RISK_LEVEL_SCORE[finding.riskLevel] * weight;
    totalWeight += weight;
  }
  if (totalWeight === 0) return 50;
  const score = Math.min(100, Math.max(0, weighted / totalWeight));
  return Math.round(score * 100) / 100;
}

export function createAnalysisEngine(deps: AnalysisDeps): AnalysisEngine {
  const { config, completion, enqueue } = deps;

  async function analyze(
    text: string,
    documentType: DocumentType,
    context: AnalysisContext = {}
  ): Promise<Finding[]> {
    const scope: Scope = { sourceUrl: context.sourceUrl, documentType };

    if (!text.trim()) {
      return [undetermined(scope, "Document contained no analyzable text")];
    }

    try {
      const findings = [...analyzePatterns(text, scope)];

      if (completion && config.analysis.narrativePass) {
        findings.push(
          ...(await runNarrativePass(text, documentType, context.sourceUrl, {
            completion,
            chunkThreshold: config.analysis.chunkThreshold,
            chunkSize: config.analysis.chunkSize,
            chunkOverlap: config.analysis.chunkOverlap,
            enqueue,
            signal: context.signal,
          }))
        );
      }

      if (documentType === "attestation_report") {
        findings.push(...analyzeAttestation(text, scope));
      } else if (documentType === "privacy_policy") {
        findings.push(...analyzePrivacy(text, scope));
      }

      findings.push(...checkMissingElements(text, scope));

      console.log(
        `[analysis] ${findings.length} finding(s) for ${context.sourceUrl ?? documentType}`
      );
      return findings.length > 0
        ? findings
        : [undetermined(scope, "No compliance indicators could be determined")];
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[analysis] Analysis failed for ${context.sourceUrl ?? documentType}: ${message}`);
      return [undetermined(scope, "Analysis could not complete for this document")];
    }
  }

  return { analyze };
}
