/**
 * Core types for the two-stage analysis pipeline.
 *
 * These types define the data that flows between the prompt builder,
 * the invoker, the analyzer and the batch runner. They are independent
 * of storage, the CLI, or any provider SDK.
 */

// ============================================================================
// Documents - the unit of work
// ============================================================================

export interface PaperDocument {
  readonly id: string;
  readonly title: string;
  readonly authors: readonly string[];
  /** Source text after PDF conversion (Markdown or plain text) */
  readonly text: string;
  /** Extraction from an earlier run; Stage 1 is skipped when present */
  readonly extraction?: ExtractionResult;
}

/** Stage-1 output: a compressed but lossless restatement of the source */
export interface ExtractionResult {
  readonly documentId: string;
  readonly text: string;
  readonly modelId: string;
  readonly createdAt: string;
}

// ============================================================================
// Artifacts
// ============================================================================

export type OutputMode = "summary" | "slides" | "both";

export type ArtifactStatus = "success" | "partial" | "failed";

export interface AnalysisArtifact {
  readonly status: ArtifactStatus;
  readonly summary?: string;
  readonly slides?: string;
  readonly error?: string;
}

export interface BatchEntry {
  readonly documentId: string;
  readonly title: string;
  readonly artifact: AnalysisArtifact;
}

export interface BatchCounts {
  success: number;
  partial: number;
  failed: number;
}

export interface BatchReport {
  readonly entries: readonly BatchEntry[];
  readonly counts: BatchCounts;
  readonly total: number;
}

// ============================================================================
// Remote generation
// ============================================================================

/**
 * Capability for "generate text given a model identifier and a prompt".
 * Implementations signal throttling with a distinguishable error.
 */
export interface TextGenerator {
  generate(modelId: string, prompt: string): Promise<string>;
}

export interface RetryPolicy {
  /** Total attempts, the first call included */
  readonly maxAttempts: number;
  /** Fixed wait between attempts */
  readonly waitMs: number;
  readonly isRetryable: (error: unknown) => boolean;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
