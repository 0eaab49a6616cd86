/**
 * Slides Step (Stage 2)
 *
 * Generates a Marp slide deck from a Stage-1 extraction. The model is
 * asked for Marp front matter; it is added when the model leaves it out.
 */

import type { ExtractionResult, PaperDocument, RetryPolicy } from "../core/types";
import type { InvokerRetryEvent, RateLimitedInvoker } from "../core/invoker";
import { buildSlidesPrompt, ensureMarpHeader } from "../prompt";

export interface GenerateSlidesInput {
  document: PaperDocument;
  extraction: ExtractionResult;
  invoker: RateLimitedInvoker;
  modelId: string;
  policy: RetryPolicy;
  language?: string;
  onRetry?: (event: InvokerRetryEvent) => void;
}

export async function generateSlides(input: GenerateSlidesInput): Promise<string> {
  const { document, extraction, invoker, modelId, policy } = input;

  const prompt = buildSlidesPrompt({
    title: document.title,
    authors: document.authors,
    extraction: extraction.text,
    language: input.language,
  });

  const slides = await invoker.invoke(modelId, prompt, policy, { onRetry: input.onRetry });
  return ensureMarpHeader(slides);
}
