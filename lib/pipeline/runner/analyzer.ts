/**
 * Two-Stage Analyzer
 *
 * Drives one document through the pipeline:
 *
 *   start → extracting → extracted → summarizing → slides-generating → done
 *
 * with `errored` reachable from any non-terminal state. Sub-stages the
 * output mode does not request are skipped, and a document that already
 * carries an extraction skips `extracting`.
 *
 * Holds no state between calls; everything it needs comes in through the
 * runner.
 */

import type {
  AnalysisArtifact,
  ExtractionResult,
  OutputMode,
  PaperDocument,
} from "../core/types";
import { errorMessage } from "../core/errors";
import type { InvokerRetryEvent } from "../core/invoker";
import { extractPaper, generateSlides, summarizePaper } from "../steps";
import type {
  AnalysisOutcome,
  AnalysisRunner,
  AnalyzerState,
  Progress,
  ProgressEvent,
  StageName,
} from "./types";

type DerivedStage = Exclude<StageName, "extraction">;

const STAGE_STATE: Record<DerivedStage, AnalyzerState> = {
  summary: "summarizing",
  slides: "slides-generating",
};

export function requestedStages(mode: OutputMode): DerivedStage[] {
  switch (mode) {
    case "summary":
      return ["summary"];
    case "slides":
      return ["slides"];
    case "both":
      return ["summary", "slides"];
  }
}

/**
 * Run Stage 1 (unless a prior extraction is attached) and the requested
 * Stage-2 sub-stages for a single document.
 *
 * Never throws for a remote failure: those end up in the artifact's
 * status and error.
 */
export async function analyzeDocument(
  document: PaperDocument,
  runner: AnalysisRunner
): Promise<AnalysisOutcome> {
  const { progress } = runner;
  const documentId = document.id;
  const states: AnalyzerState[] = [];

  const enter = (state: AnalyzerState) => {
    states.push(state);
    emitSafely(progress, { type: "state", documentId, state });
  };

  const retryReporter = (stage: StageName) => (event: InvokerRetryEvent) =>
    emitSafely(progress, {
      type: "retry",
      documentId,
      stage,
      modelId: event.modelId,
      attempt: event.attempt,
      maxAttempts: event.maxAttempts,
      delayMs: event.delayMs,
      error: errorMessage(event.error),
    });

  enter("start");

  // Stage 1: extraction
  let extraction: ExtractionResult;
  if (document.extraction) {
    extraction = document.extraction;
    emitSafely(progress, {
      type: "stage-complete",
      documentId,
      stage: "extraction",
      chars: extraction.text.length,
      reused: true,
    });
  } else {
    enter("extracting");
    emitSafely(progress, {
      type: "stage-start",
      documentId,
      stage: "extraction",
      modelId: runner.models.fast,
    });

    try {
      extraction = await extractPaper({
        document,
        invoker: runner.invoker,
        modelId: runner.models.fast,
        policy: runner.policies.extraction,
        language: runner.language,
        maxInputChars: runner.maxInputChars,
        onRetry: retryReporter("extraction"),
      });
    } catch (err) {
      const error = errorMessage(err);
      emitSafely(progress, { type: "stage-error", documentId, stage: "extraction", error });
      enter("errored");
      return {
        artifact: { status: "failed", error: `extraction: ${error}` },
        states,
      };
    }

    emitSafely(progress, {
      type: "stage-complete",
      documentId,
      stage: "extraction",
      chars: extraction.text.length,
    });
  }
  enter("extracted");

  // Stage 2: summary and/or slides
  const outputs: Partial<Record<DerivedStage, string>> = {};
  const errors: string[] = [];

  for (const stage of requestedStages(runner.outputMode)) {
    enter(STAGE_STATE[stage]);
    emitSafely(progress, {
      type: "stage-start",
      documentId,
      stage,
      modelId: runner.models.advanced,
    });

    try {
      const input = {
        document,
        extraction,
        invoker: runner.invoker,
        modelId: runner.models.advanced,
        policy: runner.policies.generation,
        language: runner.language,
        onRetry: retryReporter(stage),
      };
      const text =
        stage === "summary" ? await summarizePaper(input) : await generateSlides(input);
      outputs[stage] = text;
      emitSafely(progress, { type: "stage-complete", documentId, stage, chars: text.length });
    } catch (err) {
      const error = errorMessage(err);
      errors.push(`${stage}: ${error}`);
      emitSafely(progress, { type: "stage-error", documentId, stage, error });
    }
  }

  const succeeded = Object.keys(outputs).length;
  let artifact: AnalysisArtifact;

  if (errors.length === 0) {
    enter("done");
    artifact = { status: "success", ...outputs };
  } else {
    enter("errored");
    artifact = {
      status: succeeded > 0 ? "partial" : "failed",
      ...outputs,
      error: errors.join("; "),
    };
  }

  return { artifact, extraction, states };
}

/**
 * Emit without letting a broken emitter affect the run.
 */
export function emitSafely(progress: Progress, event: ProgressEvent): void {
  try {
    progress.emit(event);
  } catch (err) {
    console.warn(`[progress] Emitter failed on ${event.type}: ${errorMessage(err)}`);
  }
}
