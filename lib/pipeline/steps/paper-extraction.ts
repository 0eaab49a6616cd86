/**
 * Paper Extraction Step (Stage 1)
 *
 * Turns the raw paper text into a detailed, lossless extraction using the
 * fast model tier. The extraction is what every Stage-2 step reads.
 */

import type { ExtractionResult, PaperDocument, RetryPolicy } from "../core/types";
import type { InvokerRetryEvent, RateLimitedInvoker } from "../core/invoker";
import { buildExtractionPrompt } from "../prompt";

// ============================================================================
// Input type
// ============================================================================

export interface ExtractPaperInput {
  document: PaperDocument;
  invoker: RateLimitedInvoker;
  modelId: string;
  policy: RetryPolicy;
  language?: string;
  onRetry?: (event: InvokerRetryEvent) => void;
  maxInputChars?: number;
}

// ============================================================================
// Pure step function
// ============================================================================

export async function extractPaper(
  input: ExtractPaperInput
): Promise<ExtractionResult> {
  const { document, invoker, modelId, policy } = input;

  const prompt = buildExtractionPrompt({
    title: document.title,
    authors: document.authors,
    text: document.text,
    maxChars: input.maxInputChars,
    language: input.language,
  });

  const text = await invoker.invoke(modelId, prompt, policy, { onRetry: input.onRetry });

  return {
    documentId: document.id,
    text,
    modelId,
    createdAt: new Date().toISOString(),
  };
}
