/**
 * TextGenerator backed by the Vercel AI SDK.
 *
 * The SDK's own retry loop is switched off. Retry and spacing belong to
 * RateLimitedInvoker.
 */

import { generateText, type LanguageModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import type { TextGenerator } from "./types";
import { errorMessage } from "./errors";
import type { LlmLogEntry } from "../llm-log";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export const LLM_PROVIDERS = ["openai", "anthropic", "google"] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

export function isLLMProvider(value: string): value is LLMProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

/**
 * Resolve "model-id" (on the default provider) or "provider:model-id".
 */
export function resolveLanguageModel(
  provider: LLMProvider,
  modelId: string
): LanguageModel {
  const colonIdx = modelId.indexOf(":");
  if (colonIdx !== -1) {
    const prefix = modelId.slice(0, colonIdx);
    if (isLLMProvider(prefix)) {
      return MODEL_FACTORIES[prefix](modelId.slice(colonIdx + 1));
    }
  }
  return MODEL_FACTORIES[provider](modelId);
}

// ============================================================================
// Generator factory
// ============================================================================

export interface CreateTextGeneratorOptions {
  provider: LLMProvider;
  /** Transport-level timeout per call; surfaces as a timeout error */
  timeoutMs?: number;
  temperature?: number;
  maxOutputTokens?: number;
  onLog?: (entry: LlmLogEntry) => void;
}

export function createTextGenerator(
  options: CreateTextGeneratorOptions
): TextGenerator {
  return {
    async generate(modelId: string, prompt: string): Promise<string> {
      const t0 = Date.now();
      const base = {
        timestamp: new Date(t0).toISOString(),
        modelId,
        promptChars: prompt.length,
      };

      try {
        const result = await generateText({
          model: resolveLanguageModel(options.provider, modelId),
          prompt,
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
          maxRetries: 0,
          abortSignal: options.timeoutMs
            ? AbortSignal.timeout(options.timeoutMs)
            : undefined,
        });

        options.onLog?.({
          ...base,
          outputChars: result.text.length,
          durationMs: Date.now() - t0,
          usage: {
            inputTokens: result.usage.inputTokens ?? 0,
            outputTokens: result.usage.outputTokens ?? 0,
          },
        });

        return result.text;
      } catch (err) {
        options.onLog?.({
          ...base,
          durationMs: Date.now() - t0,
          error: errorMessage(err),
        });
        throw err;
      }
    },
  };
}
