/**
 * Prompt builder.
 *
 * Renders the .liquid templates in prompts/ into the prompt strings sent
 * to the model. Rendering is synchronous and deterministic: the same
 * input always yields the same string, and missing metadata degrades to
 * a placeholder instead of failing.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid } from "liquidjs";

export type PromptPurpose = "extraction" | "summary" | "slides" | "question";

export const DEFAULT_MAX_INPUT_CHARS = 100_000;
export const DEFAULT_LANGUAGE = "English";

const UNTITLED = "Untitled";
const UNKNOWN_AUTHORS = "Unknown";

const PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts"
);

const engine = new Liquid({
  root: [PROMPTS_DIR],
  extname: ".liquid",
  strictVariables: false,
  cache: true,
});

// ============================================================================
// Inputs
// ============================================================================

export interface PromptMetadata {
  title?: string;
  authors?: readonly string[];
  /** Output language for the model's answer */
  language?: string;
}

export interface ExtractionPromptInput extends PromptMetadata {
  text: string;
  maxChars?: number;
}

export interface DerivedPromptInput extends PromptMetadata {
  /** Stage-1 extraction text */
  extraction: string;
}

export interface QuestionPromptInput extends DerivedPromptInput {
  question: string;
}

export interface PromptInputs {
  extraction: ExtractionPromptInput;
  summary: DerivedPromptInput;
  slides: DerivedPromptInput;
  question: QuestionPromptInput;
}

// ============================================================================
// Builders
// ============================================================================

export function buildPrompt<P extends PromptPurpose>(
  purpose: P,
  input: PromptInputs[P]
): string {
  return renderPrompt(purpose, { ...metadataContext(input), ...bodyContext(input) });
}

export function buildExtractionPrompt(input: ExtractionPromptInput): string {
  return buildPrompt("extraction", input);
}

export function buildSummaryPrompt(input: DerivedPromptInput): string {
  return buildPrompt("summary", input);
}

export function buildSlidesPrompt(input: DerivedPromptInput): string {
  return buildPrompt("slides", input);
}

export function buildQuestionPrompt(input: QuestionPromptInput): string {
  return buildPrompt("question", input);
}

/**
 * Render a template from prompts/ with the given context.
 */
export function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): string {
  return String(engine.renderFileSync(templateName, context)).trim();
}

// ============================================================================
// Text helpers
// ============================================================================

const REFERENCE_HEADING =
  /\n#+\s*(?:references?|bibliography|参考文献)\s*\n/i;

/**
 * Drop the reference list: everything from the first References,
 * Bibliography or 参考文献 Markdown heading onwards.
 */
export function stripReferences(text: string): string {
  const match = REFERENCE_HEADING.exec(text);
  return (match ? text.slice(0, match.index) : text).trim();
}

const MARP_FRONT_MATTER = "---\nmarp: true\ntheme: default\n---\n\n";

/**
 * Prepend Marp front matter unless the deck already declares it near the top.
 */
export function ensureMarpHeader(slides: string): string {
  if (slides.slice(0, 100).includes("marp:")) return slides;
  return MARP_FRONT_MATTER + slides;
}

// ============================================================================
// Helpers
// ============================================================================

function metadataContext(input: PromptMetadata): Record<string, string> {
  const title = input.title?.trim();
  const authors = (input.authors ?? [])
    .map((a) => a.trim())
    .filter(Boolean);
  return {
    title: title || UNTITLED,
    authors: authors.length > 0 ? authors.join(", ") : UNKNOWN_AUTHORS,
    language: input.language?.trim() || DEFAULT_LANGUAGE,
  };
}

/** Cut to `maxChars` UTF-16 units without splitting a surrogate pair */
function truncateText(text: string, maxChars: number): string {
  let end = Math.max(0, Math.min(text.length, maxChars));
  if (end > 0 && end < text.length) {
    const last = text.charCodeAt(end - 1);
    if (last >= 0xd800 && last <= 0xdbff) end--;
  }
  return text.slice(0, end);
}

function bodyContext(
  input: PromptInputs[PromptPurpose]
): Record<string, string> {
  if ("text" in input) {
    const maxChars = input.maxChars ?? DEFAULT_MAX_INPUT_CHARS;
    return { text: truncateText(input.text, maxChars) };
  }
  if ("question" in input) {
    return { extraction: input.extraction, question: input.question };
  }
  return { extraction: input.extraction };
}
