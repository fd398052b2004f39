import { createAiCompletionClient, type CompletionClient } from "@/lib/ai";
import { createAnalysisEngine, documentRiskScore } from "@/lib/analysis";
import { loadConfig, type PipelineConfig } from "@/lib/config";
import { createDiscoveryEngine, createFirecrawlSiteMapper, type SiteMapper } from "@/lib/discovery";
import { createFetchClient, type FetchClient } from "@/lib/fetch";
import { createRetriever } from "@/lib/retrieval";
import { AssessVendorRequestSchema, type AssessVendorRequestInput } from "@/lib/schemas/api";
import type {
  AssessmentResult,
  AuditLogEntry,
  DocumentCandidate,
  DocumentSummary,
  Finding,
  RetrievedDocument,
  RiskCriteriaInput,
  VendorProfile,
} from "@/lib/schemas/assessment";
import { scoreFindings } from "@/lib/scoring";
import { createStorage, type Storage } from "@/lib/storage";
import { createSerialQueue, fulfilledValues, mapWithConcurrency } from "@/lib/utils/concurrency";
import { defaultVendorName, normalizeDomain } from "@/lib/utils/url";
import { createAuditEntry, generateActions, processQueue, type ProcessQueueResult, type SendFn } from "@/lib/workflow";

export class AssessmentConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssessmentConfigError";
  }
}

export interface AssessmentDeps {
  config: PipelineConfig;
  fetchClient?: FetchClient;
  storage?: Storage;
  completion?: CompletionClient;
  siteMapper?: SiteMapper;
  /** Clock for timestamps and due dates */
  now?: () => Date;
}

export interface AssessOptions {
  signal?: AbortSignal;
}

export interface AssessmentService {
  assessVendor(input: AssessVendorRequestInput, options?: AssessOptions): Promise<AssessmentResult>;
  /** One pass over a result's follow-up queue, with the configured attempt limit. */
  processFollowUps(result: AssessmentResult, options?: { send?: SendFn }): Promise<ProcessQueueResult>;
}

function summarizeDocuments(
  candidates: readonly DocumentCandidate[],
  documents: readonly RetrievedDocument[],
  findingsByUrl: ReadonlyMap<string, readonly Finding[]>
): DocumentSummary[] {
  const byUrl = new Map(documents.map((doc) => [doc.candidate.url, doc]));
  return candidates.map((candidate) => {
    const doc = byUrl.get(candidate.url);
    const docFindings = findingsByUrl.get(candidate.url);
    return {
      documentType: candidate.documentType,
      title: doc?.title ?? candidate.title,
      url: candidate.url,
      method: candidate.method,
      contentHash: doc?.contentHash ?? null,
      byteLength: doc?.byteLength ?? 0,
      storageLocation: doc?.storageLocation ?? null,
      riskScore: docFindings ? documentRiskScore(docFindings) : null,
    };
  });
}

/**
 * Wires discovery, retrieval, analysis, scoring and follow-up generation
 * into a single assessment run. Only invalid input throws; every other
 * failure degrades the result.
 */
export function createAssessmentService(deps: AssessmentDeps): AssessmentService {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const fetchClient =
    deps.fetchClient ??
    createFetchClient({
      userAgent: config.http.userAgent,
      timeoutMs: config.http.fetchTimeoutMs,
      maxBodyBytes: config.http.maxBodyBytes,
    });
  const storage = deps.storage ?? createStorage(config.storage.directory);
  const completion =
    deps.completion ??
    (config.completion.apiKey
      ? createAiCompletionClient({
          apiKey: config.completion.apiKey,
          model: config.completion.model,
          timeoutMs: config.completion.timeoutMs,
          maxOutputTokens: config.completion.maxOutputTokens,
        })
      : undefined);
  const siteMapper =
    deps.siteMapper ?? (config.firecrawl.apiKey ? createFirecrawlSiteMapper(config.firecrawl.apiKey) : undefined);

  const discovery = createDiscoveryEngine({ fetchClient, config, completion, siteMapper });
  const retriever = createRetriever({ fetchClient, storage, config });

  async function assessVendor(
    input: AssessVendorRequestInput,
    options: AssessOptions = {}
  ): Promise<AssessmentResult> {
    const { signal } = options;

    const parsed = AssessVendorRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new AssessmentConfigError(`Invalid assessment request: ${issue?.message ?? "Unknown error"}`);
    }
    const request = parsed.data;

    let domain: string;
    try {
      domain = normalizeDomain(request.domain).domain;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new AssessmentConfigError(message);
    }

    const vendor: VendorProfile = {
      domain,
      name: request.vendor.name ?? defaultVendorName(domain),
      trustCenterUrl: request.vendor.trustCenterUrl,
      contactEmail: request.vendor.contactEmail,
      contactName: request.vendor.contactName,
    };
    const criteria = request.criteria;

    const auditLog: AuditLogEntry[] = [];
    const audit = (eventType: string, description: string, metadata: Record<string, unknown> = {}) => {
      auditLog.push(createAuditEntry(eventType, "vendor", domain, description, metadata, now()));
    };

    console.log(`[assessment] Starting assessment of ${domain}`);
    audit("assessment_started", `Assessment started for ${vendor.name}`, { criteria });

    const candidates = await discovery.discover(vendor, signal);
    audit("documents_discovered", `Discovered ${candidates.length} candidate document(s)`, {
      count: candidates.length,
    });

    const documents = signal?.aborted ? [] : await retriever.retrieveAll(candidates, signal);
    audit("documents_retrieved", `Retrieved ${documents.length} document(s)`, {
      count: documents.length,
      dropped: candidates.length - documents.length,
    });

    const analysis = createAnalysisEngine({ config, completion, enqueue: createSerialQueue() });
    const perDocument = await mapWithConcurrency(
      documents,
      config.concurrency.analysis,
      (doc) =>
        analysis.analyze(doc.text, doc.candidate.documentType, {
          sourceUrl: doc.candidate.url,
          signal,
        }),
      signal
    );
    const findingsByUrl = new Map<string, Finding[]>();
    perDocument.forEach((settled, index) => {
      const doc = documents[index];
      if (doc && settled.status === "fulfilled") {
        findingsByUrl.set(doc.candidate.url, settled.value);
      }
    });
    const findings: Finding[] = fulfilledValues(perDocument).flat();
    audit("findings_generated", `Generated ${findings.length} finding(s)`, { count: findings.length });

    const score = scoreFindings(findings, criteria, {
      highRiskThreshold: config.scoring.highRiskThreshold,
    });
    audit("assessment_scored", `Overall risk score ${score.overallScore} (${score.riskCategory})`, {
      overallScore: score.overallScore,
      riskCategory: score.riskCategory,
      requiresHumanReview: score.requiresHumanReview,
    });

    const followUpActions = generateActions(
      findings,
      { overallScore: score.overallScore, riskCategory: score.riskCategory },
      { vendor, defaultRecipient: config.workflow.defaultRecipient, now: now() }
    );
    audit("follow_ups_generated", `Generated ${followUpActions.length} follow-up action(s)`, {
      count: followUpActions.length,
    });

    const cancelled = signal?.aborted ?? false;
    if (cancelled) {
      console.warn(`[assessment] Assessment of ${domain} was cancelled; partial results scored`);
      audit("assessment_cancelled", "Assessment cancelled before all work completed");
    } else {
      console.log(
        `[assessment] Completed ${domain}: score ${score.overallScore} (${score.riskCategory})`
      );
      audit("assessment_completed", "Assessment completed");
    }

    return {
      vendor,
      assessedAt: now().toISOString(),
      overallScore: score.overallScore,
      components: score.components,
      riskCategory: score.riskCategory,
      keyRiskFactors: score.keyRiskFactors,
      recommendations: score.recommendations,
      requiresHumanReview: score.requiresHumanReview,
      followUpActions,
      findings,
      findingSummary: score.findingSummary,
      documents: summarizeDocuments(candidates, documents, findingsByUrl),
      auditLog,
      cancelled,
    };
  }

  async function processFollowUps(
    result: AssessmentResult,
    options: { send?: SendFn } = {}
  ): Promise<ProcessQueueResult> {
    return processQueue(result.followUpActions, {
      now: now(),
      maxAttempts: config.workflow.maxFollowUpAttempts,
      send: options.send,
      vendorName: result.vendor.name,
      contactName: result.vendor.contactName,
    });
  }

  return { assessVendor, processFollowUps };
}

/**
 * Runs one assessment with configuration read from the environment.
 */
export async function assessVendor(
  domain: string,
  criteria: RiskCriteriaInput = {},
  options: AssessOptions = {}
): Promise<AssessmentResult> {
  const service = createAssessmentService({ config: loadConfig() });
  return service.assessVendor({ domain, criteria }, options);
}
