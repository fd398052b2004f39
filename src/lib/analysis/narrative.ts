import { z } from "zod";
import type { CompletionClient } from "@/lib/ai";
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from "@/lib/ai/prompt";
import {
  FindingTypeSchema,
  RiskLevelSchema,
  createFinding,
  type DocumentType,
  type Finding,
  type RiskLevel,
} from "@/lib/schemas/assessment";

const IMPACT_BY_RISK: Record<RiskLevel, number> = {
  low: 3,
  medium: 5,
  high: 7,
  critical: 9,
};

/** One finding as the model is asked to return it. */
export const NarrativeFindingSchema = z.object({
  category: z.string().trim().min(1),
  findingType: FindingTypeSchema,
  riskLevel: RiskLevelSchema,
  confidence: z.number().min(0).max(1).default(0.7),
  impactScore: z.number().int().min(1).max(10).optional(),
  description: z.string().default(""),
  evidence: z.string().default(""),
});

const NarrativeEnvelopeSchema = z.union([
  z.object({ findings: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export interface NarrativeContext {
  documentType: DocumentType;
  sourceUrl?: string;
  /** Label used in fallback finding descriptions, e.g. "chunk 2" */
  label: string;
}

/**
 * Splits long text into overlapping chunks, preferring to cut at a paragraph,
 * then a line, a sentence and finally a word boundary.
 */
export function splitIntoChunks(text: string, chunkSize: number, overlap: number): string[] {
  if (text.length <= chunkSize) return [text];

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      end = findBreak(text, start, end);
    }
    const chunk = text.slice(start, end);
    if (chunk.trim()) chunks.push(chunk);
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
}

function findBreak(text: string, start: number, end: number): number {
  const window = text.slice(start, end);
  const earliest = Math.floor(window.length / 2);
  for (const separator of ["\n\n", "\n", ". ", " "]) {
    const index = window.lastIndexOf(separator);
    if (index >= earliest) return start + index + separator.length;
  }
  return end;
}

function parseJson(response: string): unknown {
  const unfenced = response
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  try {
    return JSON.parse(unfenced);
  } catch {
    const first = unfenced.search(/[[{]/);
    const last = Math.max(unfenced.lastIndexOf("}"), unfenced.lastIndexOf("]"));
    if (first === -1 || last <= first) return undefined;
    try {
      return JSON.parse(unfenced.slice(first, last + 1));
    } catch {
      return undefined;
    }
  }
}

/**
 * Turns a completion response into findings. Structured JSON yields one
 * finding per valid entry; anything else is kept as a single `ai_analysis`
 * finding so the reviewer still sees it.
 */
export function parseNarrativeResponse(response: string, context: NarrativeContext): Finding[] {
  const trimmed = response.trim();
  if (!trimmed) return [];

  const envelope = NarrativeEnvelopeSchema.safeParse(parseJson(trimmed));
  if (envelope.success) {
    const entries = Array.isArray(envelope.data) ? envelope.data : envelope.data.findings;
    const findings: Finding[] = [];
    for (const entry of entries) {
      const parsed = NarrativeFindingSchema.safeParse(entry);
      if (!parsed.success) continue;
      const { impactScore, ...rest } = parsed.data;
      findings.push(
        createFinding({
          ...rest,
          evidence: rest.evidence.slice(0, 500),
          impactScore: impactScore ?? IMPACT_BY_RISK[rest.riskLevel],
          sourceUrl: context.sourceUrl,
          documentType: context.documentType,
        })
      );
    }
    if (findings.length > 0 || entries.length === 0) {
      return findings;
    }
  }

  return [
    createFinding({
      category: "ai_analysis",
      findingType: "unclear",
      riskLevel: "medium",
      confidence: 0.7,
      impactScore: 5,
      description: `Narrative analysis result (${context.label})`,
      evidence: trimmed.slice(0, 500),
      sourceUrl: context.sourceUrl,
      documentType: context.documentType,
    }),
  ];
}

export interface NarrativePassOptions {
  completion: CompletionClient;
  chunkThreshold: number;
  chunkSize: number;
  chunkOverlap: number;
  /** Serializes completion calls; runs them directly when absent */
  enqueue?: <T>(task: () => Promise<T>) => Promise<T>;
  signal?: AbortSignal;
}

/**
 * Sends the document, chunked when long, to the completion client. A
 * completion failure discards the whole pass.
 */
export async function runNarrativePass(
  text: string,
  documentType: DocumentType,
  sourceUrl: string | undefined,
  options: NarrativePassOptions
): Promise<Finding[]> {
  const chunks =
    text.length > options.chunkThreshold
      ? splitIntoChunks(text, options.chunkSize, options.chunkOverlap)
      : [text];
  const enqueue = options.enqueue ?? (<T>(task: () => Promise<T>) => task());

  const findings: Finding[] = [];
  for (const [index, chunk] of chunks.entries()) {
    if (options.signal?.aborted) break;

    let response: string;
    try {
      response = await enqueue(() =>
        options.completion.complete(
          ANALYSIS_SYSTEM_PROMPT,
          buildAnalysisPrompt(documentType, chunk, index, chunks.length),
          { signal: options.signal }
        )
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[analysis] Narrative pass failed for ${sourceUrl ?? documentType}: ${message}`);
      return [];
    }

    findings.push(
      ...parseNarrativeResponse(response, { documentType, sourceUrl, label: `chunk ${index + 1}` })
    );
  }
  return findings;
}
