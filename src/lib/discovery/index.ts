import Firecrawl from "@mendable/firecrawl-js";
import { z } from "zod";
import type { CompletionClient } from "@/lib/ai";
import { DISCOVERY_SYSTEM_PROMPT, buildDiscoveryPrompt } from "@/lib/ai/prompt";
import type { PipelineConfig } from "@/lib/config";
import { detectContentKind, extractHtmlTitle, extractLinks, htmlToText } from "@/lib/extract";
import { bodyText, type FetchClient } from "@/lib/fetch";
import type {
  DiscoveryMethod,
  DocumentCandidate,
  DocumentType,
  VendorProfile,
} from "@/lib/schemas/assessment";
import { fulfilledValues, mapWithConcurrency } from "@/lib/utils/concurrency";
import { isOnDomain, normalizeDomain, normalizeUrlKey, vendorShortName } from "@/lib/utils/url";
import {
  COMMON_PATHS,
  CONFIDENCE,
  CONFIDENT,
  MAP_SEARCH_QUERY,
  TRUST_LINK_KEYWORDS,
  VENDOR_PATH_FRAMEWORKS,
  classifyLink,
  trustCenterCandidateUrls,
  trustCenterScore,
} from "./patterns";

export class DiscoveryConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiscoveryConfigError";
  }
}

/**
 * Lists URLs on a site that match a search query. Backed by Firecrawl's
 * map endpoint in production.
 */
export interface SiteMapper {
  map(rootUrl: string, search: string): Promise<string[]>;
}

export function createFirecrawlSiteMapper(apiKey: string): SiteMapper {
  const client = new Firecrawl({ apiKey });

  return {
    async map(rootUrl, search) {
      const mapResult = await client.map(rootUrl, { search, limit: 200 });
      return (mapResult.links ?? []).map((link) => link.url);
    },
  };
}

export interface DiscoveryDeps {
  fetchClient: FetchClient;
  config: PipelineConfig;
  completion?: CompletionClient;
  siteMapper?: SiteMapper;
}

export interface DiscoveryEngine {
  discover(vendor: VendorProfile, signal?: AbortSignal): Promise<DocumentCandidate[]>;
}

interface FetchedPage {
  url: string;
  html: string;
  text: string;
  title: string | null;
}

const LlmUrlListSchema = z.array(z.string());

function isCandidate(value: DocumentCandidate | null): value is DocumentCandidate {
  return value !== null;
}

/**
 * Deduplicates by normalized URL (the more confident entry wins and keeps the
 * position of the first sighting), orders by confidence and caps each type.
 */
export function rankCandidates(
  candidates: DocumentCandidate[],
  maxPerType: number
): DocumentCandidate[] {
  const byKey = new Map<string, { candidate: DocumentCandidate; order: number }>();

  candidates.forEach((candidate, order) => {
    const key = normalizeUrlKey(candidate.url);
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, { candidate, order });
    } else if (candidate.confidence > existing.candidate.confidence) {
      byKey.set(key, { candidate, order: existing.order });
    }
  });

  const sorted = Array.from(byKey.values()).sort(
    (a, b) => b.candidate.confidence - a.candidate.confidence || a.order - b.order
  );

  const perType = new Map<DocumentType, number>();
  const ranked: DocumentCandidate[] = [];
  for (const { candidate } of sorted) {
    const count = perType.get(candidate.documentType) ?? 0;
    if (count >= maxPerType) continue;
    perType.set(candidate.documentType, count + 1);
    ranked.push(candidate);
  }
  return ranked;
}

/**
 * Pulls a JSON array of URLs out of a completion response, tolerating prose
 * or code fences around it.
 */
export function parseUrlList(response: string): string[] {
  const match = response.match(/\[[\s\S]*\]/);
  if (!match) return [];
  try {
    const parsed = LlmUrlListSchema.safeParse(JSON.parse(match[0]));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

export function createDiscoveryEngine(deps: DiscoveryDeps): DiscoveryEngine {
  const { fetchClient, config, completion, siteMapper } = deps;
  const lookupTimeoutMs = config.http.lookupTimeoutMs;
  const concurrency = config.concurrency.discovery;

  /**
   * GETs an HTML page. Anything other than a 2xx HTML response, and any
   * fetch failure, is treated as "no page".
   */
  async function fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage | null> {
    try {
      const response = await fetchClient.get(url, { timeoutMs: lookupTimeoutMs, signal });
      if (!response.ok) return null;
      const kind = detectContentKind(response.body, response.headers["content-type"], response.url);
      if (kind !== "html") return null;
      const html = bodyText(response);
      return { url: response.url, html, text: htmlToText(html), title: extractHtmlTitle(html) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`[discovery] Lookup failed for ${url}: ${message}`);
      return null;
    }
  }

  /** True when a GET returns 2xx, whatever the content. */
  async function exists(url: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await fetchClient.get(url, { timeoutMs: lookupTimeoutMs, signal });
      return response.ok;
    } catch {
      return false;
    }
  }

  function isTrustCenter(page: FetchedPage): boolean {
    return trustCenterScore(page.text) >= config.discovery.trustCenterThreshold;
  }

  async function findTrustCenter(
    vendor: VendorProfile,
    domain: string,
    root: FetchedPage | null,
    signal?: AbortSignal
  ): Promise<FetchedPage | null> {
    if (vendor.trustCenterUrl) {
      return fetchPage(vendor.trustCenterUrl, signal);
    }

    const lookups = await mapWithConcurrency(
      trustCenterCandidateUrls(domain),
      concurrency,
      async (url) => {
        const page = await fetchPage(url, signal);
        return page && isTrustCenter(page) ? page : null;
      },
      signal
    );
    const trustPage = fulfilledValues(lookups).find((page) => page !== null);
    if (trustPage) return trustPage;

    if (!root || signal?.aborted) return null;
    const link = extractLinks(root.html, root.url).find((candidate) => {
      const haystack = `${candidate.url} ${candidate.text}`.toLowerCase();
      return TRUST_LINK_KEYWORDS.some((keyword) => haystack.includes(keyword));
    });
    if (!link) return null;

    const page = await fetchPage(link.url, signal);
    return page && isTrustCenter(page) ? page : null;
  }

  function scrapeLinks(page: FetchedPage, confidence: number): DocumentCandidate[] {
    const found: DocumentCandidate[] = [];
    for (const link of extractLinks(page.html, page.url)) {
      const text = link.text.trim();
      const documentType =
        text.length >= 3 ? classifyLink(text, link.url) : classifyLink("", link.url);
      if (!documentType) continue;
      found.push({
        documentType,
        title: (text || link.url).slice(0, 500),
        url: link.url,
        method: "scrape",
        confidence,
      });
    }
    return found;
  }

  async function checkCommonPaths(domain: string, signal?: AbortSignal): Promise<DocumentCandidate[]> {
    const short = vendorShortName(domain);
    const entries: { path: string; type: DocumentType; confidence: number }[] = [
      ...COMMON_PATHS.map((entry) => ({ ...entry, confidence: CONFIDENCE.commonPath })),
      ...(short
        ? VENDOR_PATH_FRAMEWORKS.map(({ framework, type }) => ({
            path: `/legal/${short}-${framework}`,
            type,
            confidence: CONFIDENCE.vendorPath,
          }))
        : []),
    ];
    const attempts = [`https://${domain}`, `https://www.${domain}`].flatMap((base) =>
      entries.map((entry) => ({ ...entry, url: `${base}${entry.path}` }))
    );

    const results = await mapWithConcurrency(
      attempts,
      concurrency,
      async (attempt): Promise<DocumentCandidate | null> => {
        const page = await fetchPage(attempt.url, signal);
        if (!page) return null;
        const refined = page.title ? classifyLink(page.title, attempt.url) : null;
        return {
          documentType: refined && refined !== "other" ? refined : attempt.type,
          title: (page.title ?? `Document from ${attempt.path}`).slice(0, 500),
          url: attempt.url,
          method: "pattern",
          confidence: attempt.confidence,
        };
      },
      signal
    );
    return fulfilledValues(results).filter(isCandidate);
  }

  async function mapSite(
    mapper: SiteMapper,
    rootUrl: string,
    domain: string
  ): Promise<DocumentCandidate[]> {
    try {
      const urls = await mapper.map(rootUrl, MAP_SEARCH_QUERY);
      return toCandidates(urls, domain, "map", CONFIDENCE.map);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[discovery] Site map failed for ${rootUrl}: ${message}`);
      return [];
    }
  }

  async function askCompletion(
    client: CompletionClient,
    vendor: VendorProfile,
    domain: string,
    signal?: AbortSignal
  ): Promise<DocumentCandidate[]> {
    let response: string;
    try {
      response = await client.complete(
        DISCOVERY_SYSTEM_PROMPT,
        buildDiscoveryPrompt(vendor.name, domain),
        { signal }
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[discovery] URL suggestion failed for ${domain}: ${message}`);
      return [];
    }

    const suggested = toCandidates(parseUrlList(response), domain, "llm", CONFIDENCE.llm, true);
    const verified = await mapWithConcurrency(
      suggested,
      concurrency,
      async (candidate) => ((await exists(candidate.url, signal)) ? candidate : null),
      signal
    );
    return fulfilledValues(verified).filter(isCandidate);
  }

  async function discover(vendor: VendorProfile, signal?: AbortSignal): Promise<DocumentCandidate[]> {
    let domain: string;
    let rootUrl: string;
    try {
      ({ domain, rootUrl } = normalizeDomain(vendor.domain));
    } catch (err) {
      throw new DiscoveryConfigError(err instanceof Error ? err.message : String(err));
    }

    const found: DocumentCandidate[] = [];
    // Repeated sightings and candidates past the per-type cap do not count
    const enough = () =>
      rankCandidates(found, config.discovery.maxPerType).filter(
        (candidate) => candidate.confidence >= CONFIDENT
      ).length >= config.discovery.sufficientCandidates;
    const done = () => enough() || Boolean(signal?.aborted);
    const finish = () => {
      const ranked = rankCandidates(found, config.discovery.maxPerType);
      console.log(`[discovery] ${domain}: ${ranked.length} candidate(s) from ${found.length} sighting(s)`);
      return ranked;
    };

    if (signal?.aborted) return finish();

    const root = await fetchPage(rootUrl, signal);
    const trustCenter = await findTrustCenter(vendor, domain, root, signal);

    if (trustCenter) {
      console.log(`[discovery] Trust center for ${domain}: ${trustCenter.url}`);
      found.push(...scrapeLinks(trustCenter, CONFIDENCE.trustCenterLink));
    } else if (root) {
      found.push(...scrapeLinks(root, CONFIDENCE.rootLink));
    }
    if (done()) return finish();

    found.push(...(await checkCommonPaths(domain, signal)));
    if (done()) return finish();

    if (siteMapper) {
      found.push(...(await mapSite(siteMapper, rootUrl, domain)));
      if (done()) return finish();
    }

    if (config.discovery.llmDiscovery && completion) {
      found.push(...(await askCompletion(completion, vendor, domain, signal)));
    }

    return finish();
  }

  return { discover };
}

/**
 * Keeps on-domain http(s) URLs and types them with the link table. With
 * `fallbackOther`, unclassified URLs are kept as `other` instead of dropped.
 */
function toCandidates(
  urls: string[],
  domain: string,
  method: DiscoveryMethod,
  confidence: number,
  fallbackOther = false
): DocumentCandidate[] {
  const candidates: DocumentCandidate[] = [];
  for (const url of urls) {
    if (!/^https?:\/\//i.test(url) || !isOnDomain(url, domain)) continue;
    const documentType = classifyLink("", url) ?? (fallbackOther ? "other" : null);
    if (!documentType) continue;
    candidates.push({ documentType, title: url, url, method, confidence });
  }
  return candidates;
}
