import { z } from "zod";

export const RiskLevelSchema = z.enum(["low", "medium", "high", "critical"]);

export const FindingTypeSchema = z.enum([
  "compliant",
  "non_compliant",
  "missing",
  "unclear",
]);

export const DocumentTypeSchema = z.enum([
  "attestation_report",
  "privacy_policy",
  "data_processing_agreement",
  "security_policy",
  "incident_response",
  "other",
]);

export const DiscoveryMethodSchema = z.enum(["pattern", "scrape", "llm", "map"]);

export const ActionPrioritySchema = z.enum(["low", "medium", "high", "urgent"]);

export const ActionStatusSchema = z.enum(["pending", "sent", "failed", "escalated"]);

export const VendorProfileSchema = z.object({
  domain: z.string().min(1).describe("Normalized vendor domain, e.g. 'acme.com'"),
  name: z.string().min(1).describe("Display name shown in follow-up messages"),
  trustCenterUrl: z.string().url().optional(),
  contactEmail: z.string().email().optional(),
  contactName: z.string().optional(),
});

export const DocumentCandidateSchema = z.object({
  documentType: DocumentTypeSchema,
  title: z.string(),
  url: z.string().url(),
  method: DiscoveryMethodSchema.describe("How the candidate was found"),
  confidence: z.number().min(0).max(1),
});

export const FindingSchema = z.object({
  category: z
    .string()
    .min(1)
    .describe("Indicator category, e.g. 'encryption' or 'privacy_compliance'"),
  findingType: FindingTypeSchema,
  riskLevel: RiskLevelSchema,
  confidence: z.number().min(0).max(1),
  impactScore: z.number().int().min(1).max(10),
  description: z.string(),
  evidence: z.string().describe("Quote or match list supporting the finding"),
  sourceUrl: z.string().optional(),
  documentType: DocumentTypeSchema.optional(),
});

export const RiskCriteriaSchema = z.object({
  dataSensitivity: RiskLevelSchema.default("medium"),
  geographicLocations: z.array(z.string().min(1)).default(["US"]),
  regulatoryExposure: z.array(z.string().min(1)).default(["SOC2"]),
  vendorAccessLevel: z.enum(["read_only", "limited", "full", "admin"]).default("limited"),
  businessCriticality: RiskLevelSchema.default("medium"),
  dataTypes: z.array(z.string()).default(["business_data"]),
});

export const ScoreBreakdownSchema = z.object({
  dataSecurity: z.number().min(0).max(100),
  privacy: z.number().min(0).max(100),
  compliance: z.number().min(0).max(100),
  operational: z.number().min(0).max(100),
});

export const FindingSummarySchema = z.object({
  total: z.number().int().min(0),
  byType: z.record(z.string(), z.number().int()),
  byRiskLevel: z.record(z.string(), z.number().int()),
  byCategory: z.record(z.string(), z.number().int()),
});

export const FollowUpActionSchema = z.object({
  id: z.string(),
  ruleId: z.string().describe("Rule or consolidation key that produced the action"),
  actionType: z.string(),
  priority: ActionPrioritySchema,
  subject: z.string(),
  message: z.string(),
  recipient: z.string(),
  dueDate: z.string().describe("ISO 8601 due date"),
  attemptCount: z.number().int().min(0),
  escalated: z.boolean(),
  status: ActionStatusSchema,
  category: z.string().optional(),
});

export const AuditLogEntrySchema = z.object({
  eventType: z.string(),
  entityType: z.string(),
  entityId: z.string(),
  actor: z.string(),
  description: z.string(),
  metadata: z.record(z.string(), z.unknown()),
  timestamp: z.string(),
});

export const DocumentSummarySchema = z.object({
  documentType: DocumentTypeSchema,
  title: z.string(),
  url: z.string(),
  method: DiscoveryMethodSchema,
  contentHash: z.string().nullable(),
  byteLength: z.number().int().min(0),
  storageLocation: z.string().nullable(),
  riskScore: z
    .number()
    .min(0)
    .max(100)
    .nullable()
    .describe("Risk score of this document's findings; null when it was not analyzed"),
});

export const AssessmentResultSchema = z.object({
  vendor: VendorProfileSchema,
  assessedAt: z.string(),
  overallScore: z.number().min(0).max(100),
  components: ScoreBreakdownSchema,
  riskCategory: RiskLevelSchema,
  keyRiskFactors: z.array(z.string()),
  recommendations: z.array(z.string()),
  requiresHumanReview: z.boolean(),
  followUpActions: z.array(FollowUpActionSchema),
  findings: z.array(FindingSchema),
  findingSummary: FindingSummarySchema,
  documents: z.array(DocumentSummarySchema),
  auditLog: z.array(AuditLogEntrySchema),
  cancelled: z.boolean(),
});

export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type FindingType = z.infer<typeof FindingTypeSchema>;
export type DocumentType = z.infer<typeof DocumentTypeSchema>;
export type DiscoveryMethod = z.infer<typeof DiscoveryMethodSchema>;
export type ActionPriority = z.infer<typeof ActionPrioritySchema>;
export type VendorProfile = z.infer<typeof VendorProfileSchema>;
export type DocumentCandidate = z.infer<typeof DocumentCandidateSchema>;
export type Finding = z.infer<typeof FindingSchema>;
export type RiskCriteria = z.infer<typeof RiskCriteriaSchema>;
export type RiskCriteriaInput = z.input<typeof RiskCriteriaSchema>;
export type ScoreBreakdown = z.infer<typeof ScoreBreakdownSchema>;
export type FindingSummary = z.infer<typeof FindingSummarySchema>;
export type FollowUpAction = z.infer<typeof FollowUpActionSchema>;
export type AuditLogEntry = z.infer<typeof AuditLogEntrySchema>;
export type DocumentSummary = z.infer<typeof DocumentSummarySchema>;
export type AssessmentResult = z.infer<typeof AssessmentResultSchema>;

/**
 * Fetched and extracted document. Kept out of the zod schemas because the
 * text is never part of a persisted result.
 */
export interface RetrievedDocument {
  candidate: DocumentCandidate;
  text: string;
  title: string | null;
  contentHash: string;
  byteLength: number;
  contentType: "html" | "pdf" | "text";
  storageLocation: string | null;
}

/**
 * Returns a frozen finding. Findings are never mutated after analysis.
 */
export function createFinding(finding: Finding): Readonly<Finding> {
  return Object.freeze({ ...finding });
}
