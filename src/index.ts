export { assessVendor, createAssessmentService, AssessmentConfigError } from "@/lib/assessment";
export type { AssessmentDeps, AssessmentService, AssessOptions } from "@/lib/assessment";

export { createConfig, loadConfig, ConfigError } from "@/lib/config";
export type { PipelineConfig, PipelineConfigInput } from "@/lib/config";

export { createAiCompletionClient, createStubCompletionClient } from "@/lib/ai";
export type { CompletionClient } from "@/lib/ai";

export { createFetchClient, FetchError } from "@/lib/fetch";
export type { FetchClient, FetchResponse } from "@/lib/fetch";

export { createStorage, FileStorage, MemoryStorage, NoopStorage } from "@/lib/storage";
export type { Storage } from "@/lib/storage";

export { createDiscoveryEngine, createFirecrawlSiteMapper, DiscoveryConfigError } from "@/lib/discovery";
export type { DiscoveryEngine, SiteMapper } from "@/lib/discovery";

export { createRetriever } from "@/lib/retrieval";
export { createAnalysisEngine } from "@/lib/analysis";
export { scoreFindings } from "@/lib/scoring";
export type { ScoreResult } from "@/lib/scoring";
export { createAuditEntry, generateActions, processQueue, FOLLOW_UP_RULES } from "@/lib/workflow";
export type { ProcessQueueResult, SendFn } from "@/lib/workflow";

export { diffAssessments } from "@/lib/monitor/diff";
export { InMemoryMonitorStore, runMonitorCycle } from "@/lib/monitor";
export type { MonitorStore, MonitorCycleResult } from "@/lib/monitor";

export * from "@/lib/schemas/assessment";
export * from "@/lib/schemas/api";
