/**
 * Pipeline step functions.
 *
 * Each step renders its prompt, makes one logical call through the
 * invoker it is given, and returns the result. Steps do no storage and
 * emit no progress; the runner layer does both.
 */

// Stage 1
export { extractPaper, type ExtractPaperInput } from "./paper-extraction";

// Stage 2
export { summarizePaper, type SummarizePaperInput } from "./summary";
export { generateSlides, type GenerateSlidesInput } from "./slides";
export { answerQuestion, type AnswerQuestionInput } from "./question";
