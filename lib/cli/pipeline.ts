/**
 * Pipeline CLI
 *
 * Run the paper pipeline from the command line.
 *
 * Usage:
 *   npm run pipeline -- run <manifest>                   Analyze every paper in a manifest
 *   npm run pipeline -- ask <manifest> <id> <question>   Ask a question about one paper
 */

import { loadConfig } from "../config";
import { loadDocuments } from "../documents";
import { writeExtraction } from "../results";
import type { BatchReport } from "../pipeline/core/types";
import { errorMessage } from "../pipeline/core/errors";
import type { InvokerRetryEvent } from "../pipeline/core/invoker";
import {
  createAnalysisRunner,
  formatProgressEvent,
  nullProgress,
  observeBatch,
  summarizeReport,
  type BatchUpdate,
} from "../pipeline/runner";
import { answerQuestion, extractPaper } from "../pipeline/steps";
import { formatReport, runWithProgress, type ProgressFrame } from "./progress";

const USAGE = `Usage: npm run pipeline -- <command> [args] [options]

Commands:
  run <manifest>                   Extract, summarize and/or build slides for every paper
  ask <manifest> <id> <question>   Answer a question from one paper's extraction

Options:
  --mode <summary|slides|both>   Stage-2 outputs to produce (run command)
  --config <path>                Config file (default: ./config.yaml)
  --fresh                        Ignore saved extractions and re-run Stage 1`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const positional = flags.positional;

  switch (command) {
    case "run": {
      const [manifestPath] = positional;
      if (!manifestPath) {
        console.error("Usage: npm run pipeline -- run <manifest> [--mode <mode>]");
        process.exit(1);
      }

      const config = loadConfig(flags.configPath, { output_mode: flags.mode });
      const { documents, missing } = loadDocuments(manifestPath, {
        outputRoot: config.output_dir,
        reuseExtractions: !flags.fresh,
      });

      for (const doc of missing) {
        console.warn(`[${doc.id}] Skipped: ${doc.reason}`);
      }
      if (documents.length === 0) {
        console.error("No papers to analyze.");
        process.exit(1);
      }

      const runner = createAnalysisRunner(config, { progress: nullProgress });
      console.log(
        `\nAnalyzing ${documents.length} papers (${config.output_mode}) into ${config.output_dir}...\n`
      );

      const result: { report?: BatchReport } = {};
      let completed = 0;
      const total = documents.length;

      await runWithProgress(
        observeBatch(documents, runner),
        (update: BatchUpdate): ProgressFrame | null => {
          switch (update.type) {
            case "batch-complete":
              result.report = update.report;
              return { current: total, total, step: "" };
            case "document-start":
              return { current: completed, total, step: update.documentId };
            case "stage-start":
              return { current: completed, total, step: `${update.documentId}: ${update.stage}` };
            case "document-complete":
              completed++;
              return { current: completed, total, log: formatProgressEvent(update) ?? undefined };
            case "retry":
            case "stage-error":
            case "save-error":
              return { current: completed, total, log: formatProgressEvent(update) ?? undefined };
            default:
              return null;
          }
        },
        { label: "Analyzing", unit: "papers" }
      );

      const { report } = result;
      if (!report) {
        throw new Error("Batch ended without a report");
      }
      console.log(formatReport(report, missing));

      const summary = summarizeReport(report);
      if (!summary.allSucceeded) {
        console.log(`\nRe-run candidates: ${summary.rerunIds.join(", ")}`);
      }
      if (summary.counts.failed > 0) process.exit(1);
      break;
    }

    case "ask": {
      const [manifestPath, documentId, ...questionWords] = positional;
      const question = questionWords.join(" ").trim();
      if (!manifestPath || !documentId || !question) {
        console.error("Usage: npm run pipeline -- ask <manifest> <id> <question>");
        process.exit(1);
      }

      const config = loadConfig(flags.configPath);
      const { documents, missing } = loadDocuments(manifestPath, {
        outputRoot: config.output_dir,
        reuseExtractions: !flags.fresh,
      });

      const document = documents.find((d) => d.id === documentId);
      if (!document) {
        const skipped = missing.find((d) => d.id === documentId);
        console.error(skipped ? `[${documentId}] ${skipped.reason}` : `Paper not found: ${documentId}`);
        process.exit(1);
      }

      const runner = createAnalysisRunner(config, { sink: null });
      const onRetry = (event: InvokerRetryEvent) =>
        console.warn(
          `[${event.modelId}] Attempt ${event.attempt}/${event.maxAttempts} failed, retrying in ${Math.round(event.delayMs / 1000)}s: ${errorMessage(event.error)}`
        );

      let extraction = document.extraction;
      if (extraction) {
        console.log(`[${document.id}] Reusing saved extraction`);
      } else {
        console.log(`[${document.id}] Starting extraction (${runner.models.fast})...`);
        extraction = await extractPaper({
          document,
          invoker: runner.invoker,
          modelId: runner.models.fast,
          policy: runner.policies.extraction,
          language: runner.language,
          maxInputChars: runner.maxInputChars,
          onRetry,
        });
        const file = await writeExtraction(config.output_dir, document, extraction);
        console.log(`[${document.id}] Saved extraction to ${file}`);
      }

      console.log(`[${document.id}] Asking ${runner.models.advanced}...\n`);
      const answer = await answerQuestion({
        document,
        extraction,
        question,
        invoker: runner.invoker,
        modelId: runner.models.advanced,
        policy: runner.policies.generation,
        language: runner.language,
        onRetry,
      });
      console.log(answer);
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

interface ParsedFlags {
  positional: string[];
  mode?: string;
  configPath?: string;
  fresh: boolean;
}

function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  let mode: string | undefined;
  let configPath: string | undefined;
  let fresh = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--mode" && args[i + 1]) {
      mode = args[++i];
    } else if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--fresh") {
      fresh = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, mode, configPath, fresh };
}

main().catch((err: unknown) => {
  console.error("\nPipeline failed:", errorMessage(err));
  process.exit(1);
});
