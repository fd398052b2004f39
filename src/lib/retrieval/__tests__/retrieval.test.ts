import { describe, it, expect, vi } from "vitest";
import { createConfig } from "@/lib/config";
import { FetchError } from "@/lib/fetch";
import { createStubFetchClient } from "@/lib/fetch/stub";
import type { DocumentCandidate } from "@/lib/schemas/assessment";
import { MemoryStorage, NoopStorage, type Storage } from "@/lib/storage";
import { createRetriever, sha256Hex } from "../index";

const PRIVACY_HTML = "<title>Privacy</title><p>We retain data for 30 days.</p>";
const PRIVACY_HASH = "ee9e527485c76adeed2fe6a8c9ff8e1d87655dac4d1e7cdb2e107b55344a819c";

function candidate(url: string): DocumentCandidate {
  return { documentType: "privacy_policy", title: "Privacy", url, method: "scrape", confidence: 0.85 };
}

describe("sha256Hex", () => {
  it("hashes raw bytes", () => {
    expect(sha256Hex(new TextEncoder().encode(PRIVACY_HTML))).toBe(PRIVACY_HASH);
  });
});

describe("createRetriever", () => {
  it("fetches, extracts, hashes and archives a document", async () => {
    const storage = new MemoryStorage();
    const retriever = createRetriever({
      fetchClient: createStubFetchClient({ "https://acme.com/privacy": { body: PRIVACY_HTML } }),
      storage,
      config: createConfig(),
    });
    const privacy = candidate("https://acme.com/privacy");

    const doc = await retriever.retrieveDocument(privacy);

    expect(doc).toEqual({
      candidate: privacy,
      text: "Privacy\nWe retain data for 30 days.",
      title: "Privacy",
      contentHash: PRIVACY_HASH,
      byteLength: 56,
      contentType: "html",
      storageLocation: "memory://acme.com_ee9e527485c76ade.html",
    });
  });

  it("leaves the storage location empty when nothing is archived", async () => {
    const retriever = createRetriever({
      fetchClient: createStubFetchClient({ "https://acme.com/privacy": { body: PRIVACY_HTML } }),
      storage: new NoopStorage(),
      config: createConfig(),
    });

    const doc = await retriever.retrieveDocument(candidate("https://acme.com/privacy"));

    expect(doc?.storageLocation).toBeNull();
  });

  it("keeps the document when archiving fails", async () => {
    const failing: Storage = {
      save: vi.fn().mockRejectedValue(new Error("disk full")),
      read: vi.fn().mockResolvedValue(null),
    };
    const retriever = createRetriever({
      fetchClient: createStubFetchClient({ "https://acme.com/privacy": { body: PRIVACY_HTML } }),
      storage: failing,
      config: createConfig(),
    });

    const doc = await retriever.retrieveDocument(candidate("https://acme.com/privacy"));

    expect(doc?.contentHash).toBe(PRIVACY_HASH);
    expect(doc?.storageLocation).toBeNull();
  });

  it("drops non-2xx, unreadable and failing candidates", async () => {
    const retriever = createRetriever({
      fetchClient: createStubFetchClient({
        "https://acme.com/privacy": { body: PRIVACY_HTML },
        "https://acme.com/gone": { status: 410, body: "" },
        "https://acme.com/logo": { body: new Uint8Array([137, 80, 78, 71]), contentType: "image/png" },
        "https://acme.com/empty": { body: "<p> </p>" },
        "https://acme.com/slow": new FetchError("timeout", "https://acme.com/slow", "timed out"),
      }),
      storage: new NoopStorage(),
      config: createConfig(),
    });

    const docs = await retriever.retrieveAll([
      candidate("https://acme.com/gone"),
      candidate("https://acme.com/logo"),
      candidate("https://acme.com/privacy"),
      candidate("https://acme.com/empty"),
      candidate("https://acme.com/slow"),
    ]);

    expect(docs.map((doc) => doc.candidate.url)).toEqual(["https://acme.com/privacy"]);
  });

  it("starts nothing once cancelled", async () => {
    const fetchClient = createStubFetchClient({ "https://acme.com/privacy": { body: PRIVACY_HTML } });
    const retriever = createRetriever({ fetchClient, storage: new NoopStorage(), config: createConfig() });
    const controller = new AbortController();
    controller.abort();

    const docs = await retriever.retrieveAll([candidate("https://acme.com/privacy")], controller.signal);

    expect(docs).toEqual([]);
    expect(fetchClient.requests).toEqual([]);
  });
});
