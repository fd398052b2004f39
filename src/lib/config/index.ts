import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((val) => val === "true" || val === "1" || val === "yes");

/**
 * Environment variables read by the pipeline. Everything is optional;
 * defaults live in `PipelineConfigSchema`.
 */
const EnvSchema = z.object({
  VENDOR_RISK_USER_AGENT: z.string().min(1).optional(),
  VENDOR_RISK_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VENDOR_RISK_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VENDOR_RISK_COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VENDOR_RISK_CONCURRENCY: z.coerce.number().int().min(1).max(32).optional(),
  VENDOR_RISK_HIGH_RISK_THRESHOLD: z.coerce.number().min(0).max(100).optional(),
  VENDOR_RISK_MAX_FOLLOWUP_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  VENDOR_RISK_STORAGE_DIR: z.string().min(1).optional(),
  VENDOR_RISK_LLM_DISCOVERY: booleanFlag.optional(),
  VENDOR_RISK_MODEL: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  FIRECRAWL_API_KEY: z.string().min(1).optional(),
});

export const PipelineConfigSchema = z.object({
  http: z
    .object({
      userAgent: z.string().min(1).default("Vendor-Risk-Agent/1.0"),
      lookupTimeoutMs: z.number().int().positive().default(10_000),
      fetchTimeoutMs: z.number().int().positive().default(30_000),
      maxBodyBytes: z.number().int().positive().default(50_000_000),
    })
    .default({}),
  concurrency: z
    .object({
      discovery: z.number().int().min(1).default(6),
      retrieval: z.number().int().min(1).default(6),
      analysis: z.number().int().min(1).default(4),
    })
    .default({}),
  discovery: z
    .object({
      maxPerType: z.number().int().min(1).default(5),
      sufficientCandidates: z.number().int().min(1).default(12),
      trustCenterThreshold: z.number().min(1).default(3),
      llmDiscovery: z.boolean().default(false),
    })
    .default({}),
  analysis: z
    .object({
      chunkThreshold: z.number().int().positive().default(8_000),
      chunkSize: z.number().int().positive().default(4_000),
      chunkOverlap: z.number().int().min(0).default(200),
      narrativePass: z.boolean().default(true),
    })
    .default({}),
  completion: z
    .object({
      model: z.string().min(1).default("claude-sonnet-4-5-20250929"),
      timeoutMs: z.number().int().positive().default(30_000),
      maxOutputTokens: z.number().int().positive().default(2_048),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
  scoring: z
    .object({
      highRiskThreshold: z.number().min(0).max(100).default(85),
    })
    .default({}),
  workflow: z
    .object({
      maxFollowUpAttempts: z.number().int().min(1).default(3),
      defaultRecipient: z.string().min(1).default("vendor-contact@unknown"),
    })
    .default({}),
  storage: z
    .object({
      directory: z.string().min(1).optional(),
    })
    .default({}),
  firecrawl: z
    .object({
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function firstIssueMessage(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Unknown error";
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Builds a frozen config from explicit overrides. Components receive this
 * object through their factories; nothing reads a global settings instance.
 */
export function createConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(`Invalid pipeline config: ${firstIssueMessage(parsed.error)}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Reads the pipeline config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment: ${firstIssueMessage(parsedEnv.error)}`);
  }
  const e = parsedEnv.data;

  return createConfig({
    http: {
      userAgent: e.VENDOR_RISK_USER_AGENT,
      lookupTimeoutMs: e.VENDOR_RISK_LOOKUP_TIMEOUT_MS,
      fetchTimeoutMs: e.VENDOR_RISK_FETCH_TIMEOUT_MS,
    },
    concurrency: {
      discovery: e.VENDOR_RISK_CONCURRENCY,
      retrieval: e.VENDOR_RISK_CONCURRENCY,
    },
    discovery: {
      llmDiscovery: e.VENDOR_RISK_LLM_DISCOVERY,
    },
    completion: {
      model: e.VENDOR_RISK_MODEL,
      timeoutMs: e.VENDOR_RISK_COMPLETION_TIMEOUT_MS,
      apiKey: e.ANTHROPIC_API_KEY,
    },
    scoring: {
      highRiskThreshold: e.VENDOR_RISK_HIGH_RISK_THRESHOLD,
    },
    workflow: {
      maxFollowUpAttempts: e.VENDOR_RISK_MAX_FOLLOWUP_ATTEMPTS,
    },
    storage: {
      directory: e.VENDOR_RISK_STORAGE_DIR,
    },
    firecrawl: {
      apiKey: e.FIRECRAWL_API_KEY,
    },
  });
}
