import { generateText } from "ai";
import { createAnthropic } from "@ai-sdk/anthropic";

export interface CompleteOptions {
  signal?: AbortSignal;
}

/**
 * Free-text completion. Implementations may throw; callers in the pipeline
 * treat any failure as "no output".
 */
export interface CompletionClient {
  complete(systemPrompt: string, userPrompt: string, options?: CompleteOptions): Promise<string>;
}

export interface AiCompletionOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  maxOutputTokens: number;
}

/**
 * Completion client backed by the Vercel AI SDK and the Anthropic provider.
 */
export function createAiCompletionClient(options: AiCompletionOptions): CompletionClient {
  const anthropic = createAnthropic(options.apiKey ? { apiKey: options.apiKey } : {});

  return {
    async complete(systemPrompt, userPrompt, completeOptions = {}) {
      const timeout = AbortSignal.timeout(options.timeoutMs);
      const abortSignal = completeOptions.signal
        ? AbortSignal.any([timeout, completeOptions.signal])
        : timeout;

      const { text } = await generateText({
        model: anthropic(options.model),
        system: systemPrompt,
        prompt: userPrompt,
        maxOutputTokens: options.maxOutputTokens,
        temperature: 0,
        maxRetries: 0,
        abortSignal,
      });
      return text;
    },
  };
}

export type StubResponder = (systemPrompt: string, userPrompt: string) => string | Error;

/**
 * Deterministic completion client. A string (or a responder returning one)
 * is answered verbatim; an Error is thrown.
 */
export function createStubCompletionClient(
  response: string | Error | StubResponder = ""
): CompletionClient & { calls: { systemPrompt: string; userPrompt: string }[] } {
  const calls: { systemPrompt: string; userPrompt: string }[] = [];

  return {
    calls,
    async complete(systemPrompt, userPrompt) {
      calls.push({ systemPrompt, userPrompt });
      const result = typeof response === "function" ? response(systemPrompt, userPrompt) : response;
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  };
}
