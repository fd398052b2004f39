import type { DocumentType } from "@/lib/schemas/assessment";

export interface ComplianceIndicator {
  category: string;
  /** Plain keywords, matched case-insensitively as substrings */
  keywords: string[];
  /** Any match marks the category as compliant */
  strictPatterns: RegExp[];
  riskWeight: number;
  description: string;
}

export const COMPLIANCE_INDICATORS: ComplianceIndicator[] = [
  {
    category: "encryption",
    keywords: ["encryption", "encrypted", "TLS", "SSL", "AES", "RSA"],
    strictPatterns: [
      /AES[-\s]?256/gi,
      /TLS\s*1\.[23]/gi,
      /encryption\s+at\s+rest/gi,
      /encryption\s+in\s+transit/gi,
    ],
    riskWeight: 0.25,
    description: "data encryption standards and implementation",
  },
  {
    category: "access_control",
    keywords: ["access control", "authentication", "authorization", "MFA", "2FA"],
    strictPatterns: [
      /multi[-\s]?factor\s+authentication/gi,
      /role[-\s]?based\s+access/gi,
      /principle\s+of\s+least\s+privilege/gi,
      /access\s+reviews?/gi,
    ],
    riskWeight: 0.2,
    description: "access control and authentication mechanisms",
  },
  {
    category: "data_protection",
    keywords: ["data protection", "GDPR", "CCPA", "personal data", "PII"],
    strictPatterns: [
      /GDPR\s+complian(t|ce)/gi,
      /data\s+subject\s+rights/gi,
      /data\s+retention\s+policy/gi,
      /right\s+to\s+erasure/gi,
    ],
    riskWeight: 0.2,
    description: "data protection and privacy compliance",
  },
  {
    category: "incident_response",
    keywords: ["incident response", "breach notification", "security incident"],
    strictPatterns: [
      /incident\s+response\s+plan/gi,
      /breach\s+notification/gi,
      /security\s+incident\s+management/gi,
      /72\s+hours?\s+notification/gi,
    ],
    riskWeight: 0.15,
    description: "incident response and breach notification procedures",
  },
  {
    category: "compliance_frameworks",
    keywords: ["SOC 2", "ISO 27001", "PCI DSS", "HIPAA", "FedRAMP"],
    strictPatterns: [
      /SOC\s*2\s*Type\s*II/gi,
      /ISO\s*27001/gi,
      /PCI[-\s]?DSS/gi,
      /HIPAA\s+complian(t|ce)/gi,
    ],
    riskWeight: 0.2,
    description: "industry compliance frameworks",
  },
];

export const ATTESTATION_PATTERNS: { label: string; pattern: RegExp }[] = [
  { label: "type II report", pattern: /type\s*ii\s*report/i },
  { label: "trust services criteria", pattern: /trust\s+services?\s+criteria/i },
  { label: "control exceptions", pattern: /\b(exceptions?|deviations?|deficienc(y|ies))\b/i },
  { label: "testing results", pattern: /testing\s+results?|test\s+work\s+performed/i },
];

/** Attestation language that warrants a closer look by a reviewer. */
export const CONTROL_EXCEPTION_LABEL = "control exceptions";

export const PRIVACY_REQUIREMENTS: { label: string; patterns: RegExp[] }[] = [
  { label: "legal basis", patterns: [/legal\s+basis/i, /legitimate\s+interests?/i] },
  { label: "data retention", patterns: [/retention\s+period/i, /how\s+long\s+we\s+keep/i] },
  {
    label: "international transfers",
    patterns: [/international\s+transfers?/i, /adequacy\s+decision/i, /standard\s+contractual\s+clauses/i],
  },
  {
    label: "data subject rights",
    patterns: [
      /right\s+to\s+access/i,
      /right\s+to\s+rectification/i,
      /right\s+to\s+erasure/i,
      /right\s+to\s+(data\s+)?portability/i,
    ],
  },
];

/** Terms a document of each type is expected to mention. */
export const EXPECTED_ELEMENTS: Partial<Record<DocumentType, string[]>> = {
  attestation_report: [
    "management assertion",
    "auditor's report",
    "description of controls",
    "testing procedures",
  ],
  privacy_policy: [
    "data collection",
    "purpose of processing",
    "data sharing",
    "user rights",
    "contact information",
  ],
  security_policy: [
    "access control",
    "encryption",
    "incident response",
    "security monitoring",
    "employee training",
  ],
  data_processing_agreement: ["sub-processor", "data subject", "security measures", "audit rights"],
};
