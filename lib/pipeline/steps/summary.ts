/**
 * Summary Step (Stage 2)
 *
 * Writes a structured Markdown summary from a Stage-1 extraction using
 * the advanced model tier.
 */

import type { ExtractionResult, PaperDocument, RetryPolicy } from "../core/types";
import type { InvokerRetryEvent, RateLimitedInvoker } from "../core/invoker";
import { buildSummaryPrompt } from "../prompt";

export interface SummarizePaperInput {
  document: PaperDocument;
  extraction: ExtractionResult;
  invoker: RateLimitedInvoker;
  modelId: string;
  policy: RetryPolicy;
  language?: string;
  onRetry?: (event: InvokerRetryEvent) => void;
}

export async function summarizePaper(input: SummarizePaperInput): Promise<string> {
  const { document, extraction, invoker, modelId, policy } = input;

  const prompt = buildSummaryPrompt({
    title: document.title,
    authors: document.authors,
    extraction: extraction.text,
    language: input.language,
  });

  return invoker.invoke(modelId, prompt, policy, { onRetry: input.onRetry });
}
