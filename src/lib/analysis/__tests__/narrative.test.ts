import { describe, it, expect } from "vitest";
import { createStubCompletionClient } from "@/lib/ai";
import { parseNarrativeResponse, runNarrativePass, splitIntoChunks } from "../narrative";

const context = { documentType: "security_policy" as const, label: "chunk 1" };

describe("splitIntoChunks", () => {
  it("returns short text unchanged", () => {
    expect(splitIntoChunks("short", 4000, 200)).toEqual(["short"]);
  });

  it("cuts long text at word boundaries with overlap", () => {
    const text = "word ".repeat(2000);

    const chunks = splitIntoChunks(text, 4000, 200);

    expect(chunks.map((chunk) => chunk.length)).toEqual([4000, 4000, 2400]);
    expect(chunks[1]).toBe(text.slice(3800, 7800));
  });

  it("prefers paragraph breaks", () => {
    const text = "a".repeat(3000) + "\n\n" + "b".repeat(3000);

    const chunks = splitIntoChunks(text, 4000, 200);

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toBe("a".repeat(3000) + "\n\n");
    expect(chunks[1]).toBe("a".repeat(198) + "\n\n" + "b".repeat(3000));
  });
});

describe("parseNarrativeResponse", () => {
  it("maps structured findings and derives impact from risk", () => {
    const response = JSON.stringify({
      findings: [
        {
          category: "incident_response",
          findingType: "missing",
          riskLevel: "critical",
          confidence: 0.8,
          description: "No breach notification timeline",
          evidence: "",
        },
      ],
    });

    const [finding] = parseNarrativeResponse(response, context);

    expect(finding).toMatchObject({
      category: "incident_response",
      findingType: "missing",
      riskLevel: "critical",
      impactScore: 9,
      documentType: "security_policy",
    });
  });

  it("reads fenced JSON and bare arrays", () => {
    const fenced =
      '```json\n[{"category": "encryption", "findingType": "compliant", "riskLevel": "low", "impactScore": 2}]\n```';

    const [finding] = parseNarrativeResponse(fenced, context);

    expect(finding).toMatchObject({ category: "encryption", impactScore: 2, confidence: 0.7 });
  });

  it("drops invalid entries", () => {
    const response = JSON.stringify({
      findings: [
        { category: "encryption", findingType: "bogus", riskLevel: "low" },
        { category: "access_control", findingType: "unclear", riskLevel: "medium" },
      ],
    });

    expect(parseNarrativeResponse(response, context).map((f) => f.category)).toEqual(["access_control"]);
  });

  it("accepts an empty finding list", () => {
    expect(parseNarrativeResponse('{"findings": []}', context)).toEqual([]);
  });

  it("yields nothing for an empty response", () => {
    expect(parseNarrativeResponse("  \n", context)).toEqual([]);
  });

  it("keeps free text as a single ai_analysis finding", () => {
    const response = "The vendor describes encryption but gives no details. ".repeat(20);

    const findings = parseNarrativeResponse(response, context);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      category: "ai_analysis",
      findingType: "unclear",
      riskLevel: "medium",
      confidence: 0.7,
      impactScore: 5,
      description: "Narrative analysis result (chunk 1)",
    });
    expect(findings[0]?.evidence).toBe(response.trim().slice(0, 500));
  });

  it("treats JSON with no valid entries as free text", () => {
    const [finding] = parseNarrativeResponse('{"findings": [{"note": "x"}]}', context);
    expect(finding?.category).toBe("ai_analysis");
  });
});

describe("runNarrativePass", () => {
  const options = { chunkThreshold: 8000, chunkSize: 4000, chunkOverlap: 200 };

  it("sends each chunk with its position", async () => {
    const completion = createStubCompletionClient('{"findings": []}');

    await runNarrativePass("word ".repeat(2000), "privacy_policy", undefined, {
      ...options,
      completion,
    });

    expect(completion.calls).toHaveLength(3);
    expect(completion.calls[1]?.userPrompt).toContain("Document content (part 2 of 3):");
  });

  it("does not chunk text under the threshold", async () => {
    const completion = createStubCompletionClient('{"findings": []}');

    await runNarrativePass("x".repeat(8000), "other", undefined, { ...options, completion });

    expect(completion.calls).toHaveLength(1);
  });

  it("routes calls through the queue", async () => {
    let queued = 0;
    const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
      queued += 1;
      return task();
    };
    const completion = createStubCompletionClient("noted");

    const findings = await runNarrativePass("text", "other", "https://acme.com/x", {
      ...options,
      completion,
      enqueue,
    });

    expect(queued).toBe(1);
    expect(findings[0]?.sourceUrl).toBe("https://acme.com/x");
  });

  it("yields nothing when the completion client fails", async () => {
    let calls = 0;
    const completion = createStubCompletionClient(() => {
      calls += 1;
      return calls === 1 ? "first chunk ok" : new Error("rate limited");
    });

    const findings = await runNarrativePass("word ".repeat(2000), "other", undefined, {
      ...options,
      completion,
    });

    expect(findings).toEqual([]);
  });

  it("stops issuing calls once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const completion = createStubCompletionClient("unused");

    await runNarrativePass("text", "other", undefined, {
      ...options,
      completion,
      signal: controller.signal,
    });

    expect(completion.calls).toHaveLength(0);
  });
});
