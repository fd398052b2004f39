import { createHash } from "node:crypto";
import type { PipelineConfig } from "@/lib/config";
import { extractContent, type ExtractedContent } from "@/lib/extract";
import type { FetchClient, FetchResponse } from "@/lib/fetch";
import type { DocumentCandidate, RetrievedDocument } from "@/lib/schemas/assessment";
import type { Storage } from "@/lib/storage";
import { fulfilledValues, mapWithConcurrency } from "@/lib/utils/concurrency";

export interface RetrievalDeps {
  fetchClient: FetchClient;
  storage: Storage;
  config: PipelineConfig;
}

export interface Retriever {
  retrieveDocument(candidate: DocumentCandidate, signal?: AbortSignal): Promise<RetrievedDocument | null>;
  retrieveAll(candidates: DocumentCandidate[], signal?: AbortSignal): Promise<RetrievedDocument[]>;
}

export function sha256Hex(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

function storageKey(url: string, hash: string, kind: RetrievedDocument["contentType"]): string {
  const host = new URL(url).hostname;
  const ext = kind === "pdf" ? "pdf" : kind === "html" ? "html" : "txt";
  return `${host}_${hash.slice(0, 16)}.${ext}`;
}

/**
 * Fetches candidates, extracts their text and archives the raw bytes.
 * A candidate that cannot be fetched or read yields no document.
 */
export function createRetriever(deps: RetrievalDeps): Retriever {
  const { fetchClient, storage, config } = deps;

  async function retrieveDocument(
    candidate: DocumentCandidate,
    signal?: AbortSignal
  ): Promise<RetrievedDocument | null> {
    let response: FetchResponse;
    try {
      response = await fetchClient.get(candidate.url, {
        timeoutMs: config.http.fetchTimeoutMs,
        signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[retrieval] ${message}`);
      return null;
    }

    if (!response.ok) {
      console.log(`[retrieval] Skipping ${candidate.url}: HTTP ${response.status}`);
      return null;
    }

    let content: ExtractedContent | null;
    try {
      content = await extractContent(response.body, response.headers["content-type"], response.url);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[retrieval] Could not read ${candidate.url}: ${message}`);
      return null;
    }

    if (!content || !content.text.trim()) {
      console.log(`[retrieval] Skipping ${candidate.url}: no readable text`);
      return null;
    }

    const contentHash = sha256Hex(response.body);
    let storageLocation: string | null = null;
    try {
      storageLocation = await storage.save(
        storageKey(response.url, contentHash, content.kind),
        response.body
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[retrieval] Archiving ${candidate.url} failed: ${message}`);
    }

    return {
      candidate,
      text: content.text,
      title: content.title,
      contentHash,
      byteLength: response.body.byteLength,
      contentType: content.kind,
      storageLocation,
    };
  }

  async function retrieveAll(
    candidates: DocumentCandidate[],
    signal?: AbortSignal
  ): Promise<RetrievedDocument[]> {
    const results = await mapWithConcurrency(
      candidates,
      config.concurrency.retrieval,
      (candidate) => retrieveDocument(candidate, signal),
      signal
    );
    const documents = fulfilledValues(results).filter(
      (doc): doc is RetrievedDocument => doc !== null
    );
    console.log(`[retrieval] Retrieved ${documents.length}/${candidates.length} document(s)`);
    return documents;
  }

  return { retrieveDocument, retrieveAll };
}
