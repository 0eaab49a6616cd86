/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure pipeline steps
 * and the infrastructure around them (result storage, progress emission).
 */

import type {
  AnalysisArtifact,
  ArtifactStatus,
  ExtractionResult,
  OutputMode,
  PaperDocument,
  RetryPolicy,
} from "../core/types";
import type { RateLimitedInvoker } from "../core/invoker";

// ============================================================================
// Analyzer states
// ============================================================================

export type AnalyzerState =
  | "start"
  | "extracting"
  | "extracted"
  | "summarizing"
  | "slides-generating"
  | "done"
  | "errored";

export type StageName = "extraction" | "summary" | "slides";

export interface AnalysisOutcome {
  artifact: AnalysisArtifact;
  /** Kept even when Stage 2 fails, so a later run can skip Stage 1 */
  extraction?: ExtractionResult;
  /** Every state the analyzer passed through, in order */
  states: AnalyzerState[];
}

// ============================================================================
// Result sink
// ============================================================================

/**
 * Receives each document's outcome for storage.
 *
 * Implementations can write files, push to a database, etc.
 */
export interface ResultSink {
  save(document: PaperDocument, outcome: AnalysisOutcome): Promise<void>;
}

// ============================================================================
// Progress Interface
// ============================================================================

export type ProgressEvent =
  | { type: "document-start"; index: number; total: number; documentId: string; title: string }
  | { type: "state"; documentId: string; state: AnalyzerState }
  | { type: "stage-start"; documentId: string; stage: StageName; modelId: string }
  | { type: "stage-complete"; documentId: string; stage: StageName; chars: number; reused?: boolean }
  | { type: "stage-error"; documentId: string; stage: StageName; error: string }
  | {
      type: "retry";
      documentId: string;
      stage: StageName;
      modelId: string;
      attempt: number;
      maxAttempts: number;
      delayMs: number;
      error: string;
    }
  | {
      type: "document-complete";
      index: number;
      total: number;
      documentId: string;
      title: string;
      status: ArtifactStatus;
      error?: string;
    }
  | { type: "save-error"; documentId: string; error: string };

/**
 * Progress emitter interface.
 *
 * Emission is fire-and-forget: nothing an emitter does can steer the run.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return createCallbackProgress((message, level) => {
    if (level === "error") console.error(message);
    else if (level === "warn") console.warn(message);
    else console.log(message);
  });
}

export type ProgressLevel = "info" | "warn" | "error";

/**
 * Callback-based progress emitter; receives one formatted line per event.
 * State transitions are not reported, only stage and document events.
 */
export function createCallbackProgress(
  callback: (message: string, level: ProgressLevel) => void
): Progress {
  return {
    emit(event) {
      const message = formatProgressEvent(event);
      if (message === null) return;
      const level: ProgressLevel =
        event.type === "stage-error" || event.type === "save-error"
          ? "error"
          : event.type === "retry"
            ? "warn"
            : "info";
      callback(message, level);
    },
  };
}

export function formatProgressEvent(event: ProgressEvent): string | null {
  switch (event.type) {
    case "document-start":
      return `[${event.documentId}] (${event.index + 1}/${event.total}) ${event.title}`;
    case "state":
      return null;
    case "stage-start":
      return `[${event.documentId}] Starting ${formatStageName(event.stage)} (${event.modelId})...`;
    case "stage-complete":
      return event.reused
        ? `[${event.documentId}] Reusing saved ${formatStageName(event.stage)}`
        : `[${event.documentId}] Completed ${formatStageName(event.stage)} (${event.chars} chars)`;
    case "stage-error":
      return `[${event.documentId}] Error in ${formatStageName(event.stage)}: ${event.error}`;
    case "retry":
      return `[${event.documentId}] ${formatStageName(event.stage)} attempt ${event.attempt}/${event.maxAttempts} failed (${event.modelId}), retrying in ${Math.round(event.delayMs / 1000)}s: ${event.error}`;
    case "document-complete":
      return `[${event.documentId}] ${event.status}${event.error ? `: ${event.error}` : ""}`;
    case "save-error":
      return `[${event.documentId}] Failed to save results: ${event.error}`;
  }
}

function formatStageName(stage: StageName): string {
  switch (stage) {
    case "extraction":
      return "extraction";
    case "summary":
      return "summary generation";
    case "slides":
      return "slide generation";
  }
}

// ============================================================================
// Runner Configuration
// ============================================================================

export interface ModelConfig {
  /** Low-latency tier used for Stage 1 */
  fast: string;
  /** High-quality tier used for Stage 2 */
  advanced: string;
}

export interface PolicyConfig {
  extraction: RetryPolicy;
  generation: RetryPolicy;
}

/**
 * Everything the analyzer and batch runner need, passed in explicitly.
 */
export interface AnalysisRunner {
  invoker: RateLimitedInvoker;
  models: ModelConfig;
  policies: PolicyConfig;
  outputMode: OutputMode;
  language?: string;
  maxInputChars?: number;
  progress: Progress;
  sink?: ResultSink;
}
