import type { ExtractionResult, PaperDocument, RetryPolicy } from "../core/types";
import type { InvokerRetryEvent, RateLimitedInvoker } from "../core/invoker";
import { buildQuestionPrompt } from "../prompt";

export interface AnswerQuestionInput {
  document: PaperDocument;
  extraction: ExtractionResult;
  question: string;
  invoker: RateLimitedInvoker;
  modelId: string;
  policy: RetryPolicy;
  language?: string;
  onRetry?: (event: InvokerRetryEvent) => void;
}

/**
 * Answer a free-form question about a paper from its extraction.
 */
export async function answerQuestion(input: AnswerQuestionInput): Promise<string> {
  const { document, extraction, question, invoker, modelId, policy } = input;

  if (!question.trim()) {
    throw new Error("Question must not be empty");
  }

  const prompt = buildQuestionPrompt({
    title: document.title,
    authors: document.authors,
    extraction: extraction.text,
    question,
    language: input.language,
  });

  return invoker.invoke(modelId, prompt, policy, { onRetry: input.onRetry });
}
