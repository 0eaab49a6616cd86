/**
 * Runner layer: the per-document analyzer, the batch loop around it, and
 * the factory that wires both from config.
 */

export {
  type AnalysisOutcome,
  type AnalysisRunner,
  type AnalyzerState,
  type ModelConfig,
  type PolicyConfig,
  type Progress,
  type ProgressEvent,
  type ProgressLevel,
  type ResultSink,
  type StageName,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  formatProgressEvent,
} from "./types";

// Per-document analysis
export { analyzeDocument, requestedStages } from "./analyzer";

// Batch orchestration
export {
  runBatch,
  observeBatch,
  summarizeReport,
  type BatchUpdate,
  type ReportSummary,
} from "./batch-runner";

// Re-export factory for convenient setup
export { createAnalysisRunner, type CreateAnalysisRunnerOptions } from "./factory";
