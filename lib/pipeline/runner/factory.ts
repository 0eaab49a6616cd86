/**
 * Runner Factory
 *
 * Creates a fully configured AnalysisRunner from the app config.
 * This is the main entry point for setting up the pipeline.
 */

import type { AppConfig } from "@/lib/config";
import { toRetryPolicy } from "@/lib/config";
import { createFileResultSink } from "@/lib/results";
import type { Clock, OutputMode, TextGenerator } from "../core/types";
import { RateLimitedInvoker } from "../core/invoker";
import { createTextGenerator } from "../core/llm";
import { errorMessage } from "../core/errors";
import { appendLogEntry, logPath } from "../llm-log";
import type { AnalysisRunner, Progress, ResultSink } from "./types";
import { nullProgress } from "./types";

// ============================================================================
// Factory options
// ============================================================================

export interface CreateAnalysisRunnerOptions {
  progress?: Progress;
  outputMode?: OutputMode;
  /** Replaces the AI SDK generator (tests, other transports) */
  generator?: TextGenerator;
  clock?: Clock;
  /** Defaults to a file sink under config.output_dir; null disables saving */
  sink?: ResultSink | null;
}

// ============================================================================
// Factory function
// ============================================================================

/**
 * Wire config → generator → invoker → runner.
 *
 * Every LLM call is appended to <output_dir>/llm-log.jsonl.
 */
export function createAnalysisRunner(
  config: AppConfig,
  options: CreateAnalysisRunnerOptions = {}
): AnalysisRunner {
  const progress = options.progress ?? nullProgress;
  const llmLogFile = logPath(config.output_dir);

  const generator =
    options.generator ??
    createTextGenerator({
      provider: config.provider,
      timeoutMs: Math.round(config.request_timeout_seconds * 1000),
      onLog: (entry) => {
        try {
          appendLogEntry(llmLogFile, entry);
        } catch (err) {
          console.warn(`[llm-log] Failed to write ${llmLogFile}: ${errorMessage(err)}`);
        }
      },
    });

  const policies = {
    extraction: toRetryPolicy(config.retry.extraction),
    generation: toRetryPolicy(config.retry.generation),
  };

  const invoker = new RateLimitedInvoker({
    generator,
    spacingMs: Math.round(config.spacing_seconds * 1000),
    clock: options.clock,
    defaultPolicy: policies.generation,
  });

  const sink =
    options.sink === undefined
      ? createFileResultSink(config.output_dir)
      : options.sink ?? undefined;

  return {
    invoker,
    models: { fast: config.models.fast, advanced: config.models.advanced },
    policies,
    outputMode: options.outputMode ?? config.output_mode,
    language: config.language,
    maxInputChars: config.max_input_chars,
    progress,
    sink,
  };
}
