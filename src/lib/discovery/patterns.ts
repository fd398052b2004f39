import type { DocumentType } from "@/lib/schemas/assessment";

/** Separator between words in link text or URL slugs ("soc 2", "soc-2", "soc_2"). */
const SEP = "[\\s_-]*";

function words(...parts: string[]): RegExp {
  return new RegExp(parts.join(SEP), "i");
}

/**
 * Link classification table. The first document type with a matching pattern
 * wins, so more specific types come first.
 */
export const DOCUMENT_PATTERNS: { type: DocumentType; patterns: RegExp[] }[] = [
  {
    type: "attestation_report",
    patterns: [
      words("soc", "2"),
      words("soc", "ii"),
      words("service", "organization", "control"),
      words("ssae", "18"),
      words("type", "ii"),
      words("iso", "27001"),
    ],
  },
  {
    type: "data_processing_agreement",
    patterns: [words("data", "processing", "(agreement|addendum)"), /\bdpa\b/i],
  },
  {
    type: "privacy_policy",
    patterns: [
      words("privacy", "polic(y|ies)"),
      words("privacy", "(statement|notice)"),
      words("data", "protection", "policy"),
    ],
  },
  {
    type: "incident_response",
    patterns: [
      words("incident", "response"),
      words("breach", "notification"),
      words("security", "incident"),
    ],
  },
  {
    type: "security_policy",
    patterns: [
      words("security", "policy"),
      words("information", "security"),
      /cybersecurity/i,
      words("security", "(overview|practices)"),
    ],
  },
];

/** Keywords that mark a page as a trust center, with their weight. */
export const TRUST_CENTER_INDICATORS: { keyword: string; weight: number }[] = [
  { keyword: "soc 2", weight: 1 },
  { keyword: "soc ii", weight: 1 },
  { keyword: "iso 27001", weight: 1 },
  { keyword: "gdpr", weight: 1 },
  { keyword: "compliance", weight: 1 },
  { keyword: "trust center", weight: 2 },
  { keyword: "security controls", weight: 1 },
  { keyword: "data protection", weight: 1 },
  { keyword: "privacy policy", weight: 1 },
  { keyword: "security certification", weight: 1 },
];

/** Link text or URL fragments that point at a trust center from the site root. */
export const TRUST_LINK_KEYWORDS = ["trust", "security", "compliance"];

export function trustCenterCandidateUrls(domain: string): string[] {
  return [
    `https://trust.${domain}`,
    `https://security.${domain}`,
    `https://compliance.${domain}`,
    `https://${domain}/trust`,
    `https://${domain}/security`,
    `https://${domain}/compliance`,
    `https://${domain}/trust-center`,
    `https://www.${domain}/trust`,
    `https://www.${domain}/security`,
  ];
}

/**
 * Conventional locations of compliance pages. The type is a first guess;
 * page content can refine it.
 */
export const COMMON_PATHS: { path: string; type: DocumentType }[] = [
  { path: "/privacy", type: "privacy_policy" },
  { path: "/privacy-policy", type: "privacy_policy" },
  { path: "/legal/privacy", type: "privacy_policy" },
  { path: "/security", type: "security_policy" },
  { path: "/security-policy", type: "security_policy" },
  { path: "/legal/security", type: "security_policy" },
  { path: "/compliance", type: "attestation_report" },
  { path: "/certifications", type: "attestation_report" },
  { path: "/legal/compliance", type: "attestation_report" },
  { path: "/gdpr", type: "privacy_policy" },
  { path: "/legal/gdpr", type: "privacy_policy" },
  { path: "/legal/dpa", type: "data_processing_agreement" },
  { path: "/dpa", type: "data_processing_agreement" },
  { path: "/trust", type: "security_policy" },
  { path: "/incident-response", type: "incident_response" },
];

/** Frameworks used to build vendor-specific legal paths such as `/legal/acme-gdpr`. */
export const VENDOR_PATH_FRAMEWORKS: { framework: string; type: DocumentType }[] = [
  { framework: "gdpr", type: "privacy_policy" },
  { framework: "ccpa", type: "privacy_policy" },
  { framework: "hipaa", type: "security_policy" },
  { framework: "soc2", type: "attestation_report" },
  { framework: "dpa", type: "data_processing_agreement" },
];

export const MAP_SEARCH_QUERY =
  "trust security compliance soc 2 iso 27001 privacy policy data processing agreement incident response";

export const CONFIDENCE = {
  trustCenterLink: 0.85,
  rootLink: 0.75,
  map: 0.7,
  commonPath: 0.6,
  vendorPath: 0.65,
  llm: 0.5,
} as const;

/** Candidates at or above this confidence count towards the early stop. */
export const CONFIDENT = 0.7;

/**
 * Classifies a link by its text and URL. `.pdf` links that match no table
 * entry are typed `other`; anything else unmatched returns null.
 */
export function classifyLink(text: string, url: string): DocumentType | null {
  const combined = `${text} ${url}`;
  for (const { type, patterns } of DOCUMENT_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(combined))) {
      return type;
    }
  }

  let pathname = "";
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return null;
  }
  return pathname.endsWith(".pdf") ? "other" : null;
}

/**
 * Weighted count of trust-center indicators in page text.
 */
export function trustCenterScore(text: string): number {
  const lower = text.toLowerCase();
  return TRUST_CENTER_INDICATORS.reduce(
    (sum, { keyword, weight }) => (lower.includes(keyword) ? sum + weight : sum),
    0
  );
}
