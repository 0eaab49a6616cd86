/**
 * Batch Runner
 *
 * Runs the analyzer over an ordered list of documents, one at a time.
 * All documents share the runner's invoker and its spacing clock.
 *
 * Every input document yields exactly one report entry, in input order,
 * whatever happens to it.
 */

import { Observable } from "rxjs";
import type {
  BatchCounts,
  BatchEntry,
  BatchReport,
  PaperDocument,
} from "../core/types";
import { errorMessage } from "../core/errors";
import { analyzeDocument, emitSafely } from "./analyzer";
import type { AnalysisOutcome, AnalysisRunner, ProgressEvent } from "./types";

// ============================================================================
// Batch runner
// ============================================================================

export async function runBatch(
  documents: readonly PaperDocument[],
  runner: AnalysisRunner
): Promise<BatchReport> {
  const { progress, sink } = runner;
  const total = documents.length;
  const entries: BatchEntry[] = [];
  const counts: BatchCounts = { success: 0, partial: 0, failed: 0 };

  for (const [index, document] of documents.entries()) {
    emitSafely(progress, {
      type: "document-start",
      index,
      total,
      documentId: document.id,
      title: document.title,
    });

    let outcome: AnalysisOutcome;
    try {
      outcome = await analyzeDocument(document, runner);
    } catch (err) {
      outcome = {
        artifact: { status: "failed", error: errorMessage(err) },
        states: ["errored"],
      };
    }

    if (sink) {
      try {
        await sink.save(document, outcome);
      } catch (err) {
        emitSafely(progress, {
          type: "save-error",
          documentId: document.id,
          error: errorMessage(err),
        });
      }
    }

    const { artifact } = outcome;
    entries.push({ documentId: document.id, title: document.title, artifact });
    counts[artifact.status]++;

    emitSafely(progress, {
      type: "document-complete",
      index,
      total,
      documentId: document.id,
      title: document.title,
      status: artifact.status,
      error: artifact.error,
    });
  }

  return { entries, counts, total };
}

// ============================================================================
// Observable wrapper
// ============================================================================

export type BatchUpdate =
  | ProgressEvent
  | { type: "batch-complete"; report: BatchReport };

/**
 * Run a batch as a stream: every progress event, then a final
 * `batch-complete` carrying the report. Events also reach the runner's
 * own progress emitter.
 *
 * Unsubscribing stops the stream, not the run: there is no mid-call abort.
 */
export function observeBatch(
  documents: readonly PaperDocument[],
  runner: AnalysisRunner
): Observable<BatchUpdate> {
  return new Observable<BatchUpdate>((subscriber) => {
    const forwarding: AnalysisRunner = {
      ...runner,
      progress: {
        emit(event) {
          emitSafely(runner.progress, event);
          subscriber.next(event);
        },
      },
    };

    runBatch(documents, forwarding).then(
      (report) => {
        subscriber.next({ type: "batch-complete", report });
        subscriber.complete();
      },
      (err: unknown) => subscriber.error(err)
    );
  });
}

// ============================================================================
// Report helpers
// ============================================================================

export interface ReportSummary {
  total: number;
  counts: BatchCounts;
  /** Documents worth re-running: anything not fully successful */
  rerunIds: string[];
  allSucceeded: boolean;
}

export function summarizeReport(report: BatchReport): ReportSummary {
  const rerunIds = report.entries
    .filter((e) => e.artifact.status !== "success")
    .map((e) => e.documentId);
  return {
    total: report.total,
    counts: { ...report.counts },
    rerunIds,
    allSucceeded: rerunIds.length === 0,
  };
}
