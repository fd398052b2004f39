import { z } from "zod";

// Refinements still run after an earlier issue, so they must tolerate unparseable input
function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

const VENDOR_DOMAIN_SCHEMA = z
  .string()
  .trim()
  .min(1, "Domain is required")
  .transform((val) => {
    // A bare domain like "acme.com" is the common input; give it a scheme so URL can parse it
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(val)) {
      return `https://${val}`;
    }
    return val;
  })
  .pipe(z.string().url("Input must be a valid domain or URL"))
  .refine(
    (val) => {
      const protocol = parseUrl(val)?.protocol ?? "https:";
      return protocol === "https:" || protocol === "http:";
    },
    { message: "Only HTTP(S) URLs are allowed" }
  )
  .refine(
    (val) => {
      const hostname = parseUrl(val)?.hostname;
      return hostname === undefined || !isPrivateHostname(hostname);
    },
    { message: "Private or internal hosts are not allowed" }
  )
  .refine(
    (val) => parseUrl(val)?.hostname.includes(".") ?? true,
    { message: "Domain must include a top-level domain" }
  );

/**
 * Returns true if the hostname is a private/internal IP range
 * or a known internal hostname pattern.
 */
export function isPrivateHostname(hostname: string): boolean {
  if (
    hostname === "localhost" ||
    hostname === "0.0.0.0" ||
    hostname.endsWith(".local") ||
    hostname.endsWith(".internal")
  ) {
    return true;
  }

  const ipv4Match = hostname.match(
    /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/
  );
  if (ipv4Match) {
    const [, a, b] = ipv4Match.map(Number);
    // 10.x.x.x
    if (a === 10) return true;
    // 172.16.x.x - 172.31.x.x
    if (a === 172 && b !== undefined && b >= 16 && b <= 31) return true;
    // 192.168.x.x
    if (a === 192 && b === 168) return true;
    // 127.x.x.x
    if (a === 127) return true;
    // 0.x.x.x
    if (a === 0) return true;
    // 169.254.x.x (link-local)
    if (a === 169 && b === 254) return true;
  }

  if (hostname === "[::1]" || hostname === "::1") {
    return true;
  }

  return false;
}

export interface NormalizedDomain {
  /** Lowercase host without a leading "www." */
  domain: string;
  /** HTTPS origin of the bare domain */
  rootUrl: string;
}

/**
 * Validates a user-supplied vendor domain or URL and reduces it to the bare
 * domain. Path, query, port and a leading "www." are dropped.
 *
 * Throws a descriptive error if validation fails.
 */
export function normalizeDomain(input: string): NormalizedDomain {
  const result = VENDOR_DOMAIN_SCHEMA.safeParse(input);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new Error(`Invalid domain: ${firstIssue?.message ?? "Unknown error"}`);
  }

  const hostname = new URL(result.data).hostname.toLowerCase();
  const domain = hostname.startsWith("www.") ? hostname.slice(4) : hostname;

  return {
    domain,
    rootUrl: `https://${domain}`,
  };
}

/**
 * Key used to deduplicate document URLs: lowercased, trailing slashes removed.
 */
export function normalizeUrlKey(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}

/** Second-level labels that sit in front of a country code, e.g. "co.uk". */
const GENERIC_SECOND_LEVEL = new Set(["co", "com", "org", "net", "ac", "gov", "edu"]);

/**
 * Vendor short name used in vendor-specific legal paths: the domain with
 * "www.", subdomains and the TLD stripped ("app.acme.co.uk" -> "acme").
 */
export function vendorShortName(domain: string): string {
  const labels = domain.toLowerCase().replace(/^www\./, "").split(".").filter(Boolean);
  if (labels.length <= 1) {
    return labels[0] ?? "";
  }

  labels.pop();
  const last = labels[labels.length - 1];
  if (labels.length > 1 && last !== undefined && GENERIC_SECOND_LEVEL.has(last)) {
    labels.pop();
  }

  return labels[labels.length - 1] ?? "";
}

/**
 * Title-cased short name ("acme.com" -> "Acme"), the default display name.
 */
export function defaultVendorName(domain: string): string {
  const short = vendorShortName(domain);
  return short ? short.charAt(0).toUpperCase() + short.slice(1) : domain;
}

/**
 * True when `url` points at `domain` itself or one of its subdomains.
 */
export function isOnDomain(url: string, domain: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return hostname === domain || hostname.endsWith(`.${domain}`);
}
