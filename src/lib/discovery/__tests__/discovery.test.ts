import { describe, it, expect, vi, beforeEach } from "vitest";

const mockMap = vi.fn();

vi.mock("@mendable/firecrawl-js", () => {
  const MockFirecrawl = vi.fn(function () {
    return { map: mockMap };
  });
  return { default: MockFirecrawl };
});

import { createStubCompletionClient } from "@/lib/ai";
import { createConfig } from "@/lib/config";
import { createStubFetchClient, type StubRoute } from "@/lib/fetch/stub";
import type { DocumentCandidate, VendorProfile } from "@/lib/schemas/assessment";
import {
  DiscoveryConfigError,
  createDiscoveryEngine,
  createFirecrawlSiteMapper,
  parseUrlList,
  rankCandidates,
  type SiteMapper,
} from "../index";
import { MAP_SEARCH_QUERY, classifyLink, trustCenterScore } from "../patterns";

const vendor: VendorProfile = { domain: "acme.com", name: "Acme" };

const TRUST_CENTER_HTML = `
<html><head><title>Acme Trust Center</title></head><body>
  <h1>Trust Center</h1>
  <p>We maintain SOC 2 and GDPR programs.</p>
  <a href="/soc2-report.pdf">SOC 2 Type II Report</a>
  <a href="https://acme.com/privacy-policy">Privacy Policy</a>
  <a href="https://acme.com/Privacy-Policy/">Privacy Policy (EU)</a>
  <a href="/dpa">DPA</a>
  <a href="/x">Go</a>
</body></html>`;

function trustCenterRoutes(): Record<string, StubRoute> {
  return {
    "https://acme.com": { body: '<html><a href="/about">About us</a></html>' },
    "https://trust.acme.com": { body: TRUST_CENTER_HTML },
    "https://acme.com/privacy-policy": { body: "<title>Privacy Policy</title><p>...</p>" },
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("classifyLink", () => {
  it("types links by text and URL", () => {
    expect(classifyLink("SOC 2 Type II Report", "https://acme.com/r")).toBe("attestation_report");
    expect(classifyLink("", "https://acme.com/legal/data-processing-addendum")).toBe(
      "data_processing_agreement"
    );
    expect(classifyLink("Privacy Notice", "https://acme.com/p")).toBe("privacy_policy");
    expect(classifyLink("Breach notification", "https://acme.com/b")).toBe("incident_response");
    expect(classifyLink("Information Security", "https://acme.com/s")).toBe("security_policy");
  });

  it("types unmatched PDFs as other and ignores the rest", () => {
    expect(classifyLink("Download", "https://acme.com/files/whitepaper.pdf")).toBe("other");
    expect(classifyLink("Careers", "https://acme.com/jobs")).toBeNull();
  });
});

describe("trustCenterScore", () => {
  it("weights 'trust center' double", () => {
    expect(trustCenterScore("Welcome to our Trust Center")).toBe(2);
    expect(trustCenterScore("Trust center: SOC 2, GDPR")).toBe(4);
  });
});

describe("rankCandidates", () => {
  const candidate = (url: string, confidence: number, title = url): DocumentCandidate => ({
    documentType: "attestation_report",
    title,
    url,
    method: "scrape",
    confidence,
  });

  it("keeps the more confident duplicate at its first position", () => {
    const ranked = rankCandidates(
      [
        candidate("https://acme.com/a", 0.6, "first"),
        candidate("https://acme.com/b", 0.6),
        candidate("https://ACME.com/a/", 0.85, "second"),
      ],
      5
    );

    expect(ranked.map((c) => [c.url, c.title])).toEqual([
      ["https://ACME.com/a/", "second"],
      ["https://acme.com/b", "https://acme.com/b"],
    ]);
  });

  it("caps each document type", () => {
    const many = Array.from({ length: 7 }, (_, i) => candidate(`https://acme.com/${i}`, 0.7));
    expect(rankCandidates(many, 5)).toHaveLength(5);
  });
});

describe("parseUrlList", () => {
  it("reads a JSON array wrapped in prose", () => {
    expect(parseUrlList('Sure:\n```json\n["https://acme.com/a"]\n```')).toEqual(["https://acme.com/a"]);
  });

  it("returns nothing for malformed output", () => {
    expect(parseUrlList("no idea")).toEqual([]);
    expect(parseUrlList("[not json]")).toEqual([]);
    expect(parseUrlList("[1, 2]")).toEqual([]);
  });
});

describe("createDiscoveryEngine", () => {
  it("scrapes the trust center and deduplicates URLs", async () => {
    const fetchClient = createStubFetchClient(trustCenterRoutes());
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover(vendor);

    expect(candidates).toEqual([
      {
        documentType: "attestation_report",
        title: "SOC 2 Type II Report",
        url: "https://trust.acme.com/soc2-report.pdf",
        method: "scrape",
        confidence: 0.85,
      },
      {
        documentType: "privacy_policy",
        title: "Privacy Policy",
        url: "https://acme.com/privacy-policy",
        method: "scrape",
        confidence: 0.85,
      },
      {
        documentType: "data_processing_agreement",
        title: "DPA",
        url: "https://trust.acme.com/dpa",
        method: "scrape",
        confidence: 0.85,
      },
    ]);
  });

  it("is deterministic for identical fetch responses", async () => {
    const config = createConfig();
    const first = await createDiscoveryEngine({
      fetchClient: createStubFetchClient(trustCenterRoutes()),
      config,
    }).discover(vendor);
    const second = await createDiscoveryEngine({
      fetchClient: createStubFetchClient(trustCenterRoutes()),
      config,
    }).discover(vendor);

    expect(second).toEqual(first);
  });

  it("never returns two candidates with the same normalized URL", async () => {
    const candidates = await createDiscoveryEngine({
      fetchClient: createStubFetchClient(trustCenterRoutes()),
      config: createConfig(),
    }).discover(vendor);

    const keys = candidates.map((c) => c.url.toLowerCase().replace(/\/+$/, ""));
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("uses a configured trust center URL without scoring it", async () => {
    const fetchClient = createStubFetchClient({
      "https://portal.acme.com/security": {
        body: '<a href="/iso27001.pdf">ISO 27001 certificate</a>',
      },
    });
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover({
      ...vendor,
      trustCenterUrl: "https://portal.acme.com/security",
    });

    expect(candidates[0]).toEqual({
      documentType: "attestation_report",
      title: "ISO 27001 certificate",
      url: "https://portal.acme.com/iso27001.pdf",
      method: "scrape",
      confidence: 0.85,
    });
    expect(fetchClient.requests).not.toContain("https://trust.acme.com");
  });

  it("follows a trust link from the site root when no candidate page qualifies", async () => {
    const fetchClient = createStubFetchClient({
      "https://acme.com": { body: '<a href="/about">About</a><a href="/security-hub">Security</a>' },
      "https://acme.com/security-hub": {
        body: '<p>Trust Center with SOC 2 details</p><a href="/report.pdf">SOC 2 report</a>',
      },
    });
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover(vendor);

    expect(candidates[0]?.url).toBe("https://acme.com/report.pdf");
    expect(candidates[0]?.confidence).toBe(0.85);
  });

  it("checks conventional and vendor-specific paths", async () => {
    const fetchClient = createStubFetchClient({
      "https://acme.com/legal/acme-gdpr": { body: "<title>GDPR Commitment</title>" },
      "https://www.acme.com/security": { body: "<title>Security Overview</title>" },
    });
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover(vendor);

    expect(candidates).toEqual([
      {
        documentType: "privacy_policy",
        title: "GDPR Commitment",
        url: "https://acme.com/legal/acme-gdpr",
        method: "pattern",
        confidence: 0.65,
      },
      {
        documentType: "security_policy",
        title: "Security Overview",
        url: "https://www.acme.com/security",
        method: "pattern",
        confidence: 0.6,
      },
    ]);
  });

  it("drops failing lookups without failing discovery", async () => {
    const fetchClient = createStubFetchClient({
      "https://acme.com": new Error("connection reset"),
      "https://acme.com/dpa": { body: "<title>Data Processing Addendum</title>" },
    });
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover(vendor);

    expect(candidates.map((c) => [c.documentType, c.url])).toEqual([
      ["data_processing_agreement", "https://acme.com/dpa"],
    ]);
  });

  it("stops once enough confident candidates are found", async () => {
    const fetchClient = createStubFetchClient(trustCenterRoutes());
    const engine = createDiscoveryEngine({
      fetchClient,
      config: createConfig({ discovery: { sufficientCandidates: 2 } }),
    });

    await engine.discover(vendor);

    expect(fetchClient.requests).not.toContain("https://acme.com/privacy");
  });

  it("counts a repeated link once towards the early stop", async () => {
    const repeated = '<a href="/privacy-policy">Privacy Policy</a>'.repeat(12);
    const fetchClient = createStubFetchClient({
      "https://trust.acme.com": { body: `<h1>Trust Center</h1>${repeated}` },
      "https://acme.com/legal/acme-soc2": { body: "<title>SOC 2 Report</title>" },
    });
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    const candidates = await engine.discover({ ...vendor, trustCenterUrl: "https://trust.acme.com" });

    expect(candidates.map((c) => [c.documentType, c.url, c.confidence])).toEqual([
      ["privacy_policy", "https://trust.acme.com/privacy-policy", 0.85],
      ["attestation_report", "https://acme.com/legal/acme-soc2", 0.65],
    ]);
  });

  it("issues no request when the signal is already aborted", async () => {
    const fetchClient = createStubFetchClient(trustCenterRoutes());
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });
    const controller = new AbortController();
    controller.abort();

    const candidates = await engine.discover(
      { ...vendor, trustCenterUrl: "https://trust.acme.com" },
      controller.signal
    );

    expect(candidates).toEqual([]);
    expect(fetchClient.requests).toEqual([]);
  });

  it("classifies site-map URLs on the vendor's domain", async () => {
    const siteMapper: SiteMapper = {
      map: vi.fn().mockResolvedValue([
        "https://acme.com/legal/soc-2-report",
        "https://other.com/privacy-policy",
        "https://acme.com/about",
      ]),
    };
    const engine = createDiscoveryEngine({
      fetchClient: createStubFetchClient({}),
      config: createConfig(),
      siteMapper,
    });

    const candidates = await engine.discover(vendor);

    expect(siteMapper.map).toHaveBeenCalledWith("https://acme.com", MAP_SEARCH_QUERY);
    expect(candidates).toEqual([
      {
        documentType: "attestation_report",
        title: "https://acme.com/legal/soc-2-report",
        url: "https://acme.com/legal/soc-2-report",
        method: "map",
        confidence: 0.7,
      },
    ]);
  });

  it("ignores site-map failures", async () => {
    const engine = createDiscoveryEngine({
      fetchClient: createStubFetchClient({}),
      config: createConfig(),
      siteMapper: { map: vi.fn().mockRejectedValue(new Error("quota exceeded")) },
    });

    await expect(engine.discover(vendor)).resolves.toEqual([]);
  });

  it("verifies completion-suggested URLs when enabled", async () => {
    const completion = createStubCompletionClient(
      'Candidates: ["https://acme.com/security-whitepaper.pdf", "https://evil.com/x", "https://acme.com/missing"]'
    );
    const engine = createDiscoveryEngine({
      fetchClient: createStubFetchClient({
        "https://acme.com/security-whitepaper.pdf": { body: "%PDF-1.7", contentType: "application/pdf" },
      }),
      config: createConfig({ discovery: { llmDiscovery: true } }),
      completion,
    });

    const candidates = await engine.discover(vendor);

    expect(candidates).toEqual([
      {
        documentType: "other",
        title: "https://acme.com/security-whitepaper.pdf",
        url: "https://acme.com/security-whitepaper.pdf",
        method: "llm",
        confidence: 0.5,
      },
    ]);
  });

  it("does not ask the completion client unless enabled", async () => {
    const completion = createStubCompletionClient("[]");
    const engine = createDiscoveryEngine({
      fetchClient: createStubFetchClient({}),
      config: createConfig(),
      completion,
    });

    await engine.discover(vendor);

    expect(completion.calls).toHaveLength(0);
  });

  it("degrades to nothing when the completion client fails", async () => {
    const engine = createDiscoveryEngine({
      fetchClient: createStubFetchClient({}),
      config: createConfig({ discovery: { llmDiscovery: true } }),
      completion: createStubCompletionClient(new Error("model overloaded")),
    });

    await expect(engine.discover(vendor)).resolves.toEqual([]);
  });

  it("rejects an invalid domain before any request", async () => {
    const fetchClient = createStubFetchClient({});
    const engine = createDiscoveryEngine({ fetchClient, config: createConfig() });

    await expect(engine.discover({ domain: "localhost", name: "x" })).rejects.toBeInstanceOf(
      DiscoveryConfigError
    );
    expect(fetchClient.requests).toEqual([]);
  });
});

describe("createFirecrawlSiteMapper", () => {
  it("returns the mapped URLs", async () => {
    mockMap.mockResolvedValue({ links: [{ url: "https://acme.com/trust" }, { url: "https://acme.com/dpa" }] });
    const mapper = createFirecrawlSiteMapper("test-key");

    const urls = await mapper.map("https://acme.com", "security");

    expect(mockMap).toHaveBeenCalledWith("https://acme.com", { search: "security", limit: 200 });
    expect(urls).toEqual(["https://acme.com/trust", "https://acme.com/dpa"]);
  });
});
