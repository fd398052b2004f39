import { describe, it, expect } from "vitest";
import { ConfigError } from "@/lib/config";
import {
  RiskCriteriaSchema,
  type Finding,
  type RiskCriteria,
} from "@/lib/schemas/assessment";
import {
  requiresHumanReview,
  riskCategoryFor,
  riskMultiplier,
  scoreCategory,
  scoreFindings,
  summarizeFindings,
} from "../index";

const defaults: RiskCriteria = RiskCriteriaSchema.parse({});

function finding(overrides: Partial<Finding> = {}): Finding {
  return {
    category: "encryption",
    findingType: "missing",
    riskLevel: "high",
    confidence: 0.8,
    impactScore: 8,
    description: "test finding",
    evidence: "",
    ...overrides,
  };
}

describe("scoreCategory", () => {
  it("is neutral without findings", () => {
    expect(scoreCategory([])).toBe(50);
  });

  it("weights type scores by confidence and impact", () => {
    const score = scoreCategory([
      finding({ findingType: "compliant", confidence: 1, impactScore: 10 }),
      finding({ findingType: "missing", confidence: 0.5, impactScore: 4 }),
    ]);
    // (20 * 1 + 90 * 0.2) / 1.2
    expect(score).toBeCloseTo(31.667, 3);
  });
});

describe("riskMultiplier", () => {
  it("takes the largest multiplier across families", () => {
    expect(riskMultiplier(defaults)).toBe(1);
    expect(riskMultiplier({ ...defaults, regulatoryExposure: ["GDPR", "ISO27001"] })).toBe(1.3);
    expect(riskMultiplier({ ...defaults, geographicLocations: ["US", "high_risk"] })).toBe(1.8);
    expect(riskMultiplier({ ...defaults, vendorAccessLevel: "admin" })).toBe(1.4);
    expect(riskMultiplier({ ...defaults, dataSensitivity: "critical" })).toBe(1.6);
  });

  it("uses fallback values for unknown entries", () => {
    expect(riskMultiplier({ ...defaults, geographicLocations: ["BR"] })).toBe(1.2);
    expect(riskMultiplier({ ...defaults, regulatoryExposure: ["LGPD"] })).toBe(1.1);
  });

  it("treats empty lists as 1.0", () => {
    expect(
      riskMultiplier({
        ...defaults,
        geographicLocations: [],
        regulatoryExposure: [],
        dataSensitivity: "low",
        vendorAccessLevel: "read_only",
      })
    ).toBe(1);
  });

  it("normalizes regulation spelling", () => {
    expect(riskMultiplier({ ...defaults, regulatoryExposure: ["pci-dss"] })).toBe(1.2);
  });
});

describe("riskCategoryFor", () => {
  it("maps score bands", () => {
    expect(riskCategoryFor(80)).toBe("critical");
    expect(riskCategoryFor(79.99)).toBe("high");
    expect(riskCategoryFor(65)).toBe("high");
    expect(riskCategoryFor(40)).toBe("medium");
    expect(riskCategoryFor(39.99)).toBe("low");
  });
});

describe("requiresHumanReview", () => {
  it("flags a single critical finding", () => {
    expect(requiresHumanReview(10, [finding({ riskLevel: "critical" })])).toBe(true);
  });

  it("flags three high findings but not two", () => {
    expect(requiresHumanReview(10, [finding(), finding()])).toBe(false);
    expect(requiresHumanReview(10, [finding(), finding(), finding()])).toBe(true);
  });

  it("flags two low-confidence high-impact findings", () => {
    const unsure = finding({ riskLevel: "medium", confidence: 0.5, impactScore: 7 });
    expect(requiresHumanReview(10, [unsure])).toBe(false);
    expect(requiresHumanReview(10, [unsure, unsure])).toBe(true);
  });

  it("flags scores at the threshold", () => {
    expect(requiresHumanReview(85, [])).toBe(true);
    expect(requiresHumanReview(84.99, [])).toBe(false);
    expect(requiresHumanReview(70, [], 70)).toBe(true);
  });
});

describe("summarizeFindings", () => {
  it("counts by type, risk level and category", () => {
    expect(
      summarizeFindings([
        finding(),
        finding({ category: "access_control", findingType: "compliant", riskLevel: "low" }),
      ])
    ).toEqual({
      total: 2,
      byType: { missing: 1, compliant: 1 },
      byRiskLevel: { high: 1, low: 1 },
      byCategory: { encryption: 1, access_control: 1 },
    });
  });
});

describe("scoreFindings", () => {
  it("gives neutral scores for no findings and default criteria", () => {
    const result = scoreFindings([], defaults);

    expect(result.components).toEqual({ dataSecurity: 50, privacy: 50, compliance: 50, operational: 50 });
    expect(result.overallScore).toBe(50);
    expect(result.riskCategory).toBe("medium");
    expect(result.requiresHumanReview).toBe(false);
    expect(result.keyRiskFactors).toEqual([]);
    expect(result.recommendations).toEqual([]);
  });

  it("rates missing controls under sensitive GDPR criteria as critical", () => {
    const criteria = RiskCriteriaSchema.parse({
      dataSensitivity: "high",
      regulatoryExposure: ["GDPR"],
      businessCriticality: "high",
    });
    const findings = [
      finding({ category: "encryption" }),
      finding({ category: "data_protection" }),
      finding({ category: "compliance_frameworks" }),
    ];

    const result = scoreFindings(findings, criteria);

    expect(result.components).toEqual({ dataSecurity: 74, privacy: 60, compliance: 68, operational: 60 });
    expect(result.overallScore).toBe(85.54);
    expect(result.riskCategory).toBe("critical");
    expect(result.requiresHumanReview).toBe(true);
    expect(result.keyRiskFactors).toEqual([
      "3 high-risk finding(s)",
      "Missing critical security controls",
      "Inadequate encryption for sensitive data",
    ]);
    expect(result.recommendations).toEqual([
      "Strengthen data security controls and encryption practices",
      "Obtain additional compliance certifications (SOC 2, ISO 27001)",
      "Clarify data encryption practices and key management procedures",
      "Conduct enhanced due diligence given high data sensitivity",
      "Verify GDPR compliance and DPA execution",
    ]);
  });

  it("credits compliant attestation findings", () => {
    const result = scoreFindings(
      [
        finding({ category: "attestation_report", findingType: "compliant", riskLevel: "low" }),
        finding({ category: "compliance_frameworks", findingType: "compliant", riskLevel: "low" }),
      ],
      defaults
    );
    expect(result.components.compliance).toBe(50);
  });

  it("caps the privacy regulation penalty", () => {
    const criteria = { ...defaults, regulatoryExposure: ["GDPR", "CCPA", "PIPEDA", "gdpr"] };
    expect(scoreFindings([], criteria).components.privacy).toBe(80);
  });

  it("scales operational risk by business criticality", () => {
    const critical = { ...defaults, businessCriticality: "critical" as const };
    expect(scoreFindings([], critical).components.operational).toBe(70);
  });

  it("keeps every score within [0, 100]", () => {
    const categories = ["encryption", "compliance_frameworks", "incident_response", "privacy_compliance"];
    const worst = Array.from({ length: 20 }, (_, i) =>
      finding({ category: categories[i % 4] ?? "encryption" })
    );
    const criteria = RiskCriteriaSchema.parse({
      dataSensitivity: "critical",
      geographicLocations: ["high_risk"],
      regulatoryExposure: ["GDPR", "CCPA", "PIPEDA", "HIPAA"],
      vendorAccessLevel: "admin",
      businessCriticality: "critical",
    });

    const result = scoreFindings(worst, criteria);

    for (const value of [result.overallScore, ...Object.values(result.components)]) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
    expect(result.overallScore).toBe(100);
  });

  it("is pure", () => {
    const findings = [finding(), finding({ category: "privacy_compliance", findingType: "unclear" })];
    const snapshot = JSON.stringify(findings);

    const first = scoreFindings(findings, defaults);
    const second = scoreFindings(findings, defaults);

    expect(second).toEqual(first);
    expect(JSON.stringify(findings)).toBe(snapshot);
  });

  it("never lowers the score when a compliant finding turns missing", () => {
    const categories = ["encryption", "privacy_compliance", "compliance_frameworks", "incident_response"];
    for (const category of categories) {
      const before = scoreFindings([finding({ category, findingType: "compliant" })], defaults);
      const after = scoreFindings([finding({ category, findingType: "missing" })], defaults);
      expect(after.overallScore).toBeGreaterThanOrEqual(before.overallScore);
    }
  });

  it("rejects weights that do not sum to 1.0", () => {
    expect(() => scoreFindings([], defaults, { weights: { privacy: 0.5 } })).toThrow(ConfigError);
  });

  it("accepts custom weights and threshold", () => {
    const result = scoreFindings([], defaults, {
      weights: { dataSecurity: 0.25, privacy: 0.25, compliance: 0.25, operational: 0.25 },
      highRiskThreshold: 50,
    });
    expect(result.overallScore).toBe(50);
    expect(result.requiresHumanReview).toBe(true);
  });
});
