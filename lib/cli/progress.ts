/**
 * CLI Progress Display
 *
 * A single spinner line with a progress bar, driven by an Observable.
 * Log lines reported by the mapper are printed above the bar.
 */

import type { Observable } from "rxjs";
import type { BatchReport } from "../pipeline/core/types";
import type { MissingDocument } from "../documents";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/** The part of a TTY stream the display writes to */
export interface ProgressStream {
  write(chunk: string): unknown;
}

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: ProgressStream;
}

export interface ProgressFrame {
  current: number;
  total: number;
  /** Shown after the counter until the next frame replaces it */
  step?: string;
  /** Printed on its own line above the bar */
  log?: string;
}

// ============================================================================
// Observable-based progress
// ============================================================================

/**
 * Render `source` until it completes. Values the mapper returns null for
 * leave the display unchanged.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => ProgressFrame | null,
  options: ProgressOptions
): Promise<void> {
  const { label, unit = "papers", barWidth = 20, stream = process.stderr } = options;

  let current = 0;
  let total = 0;
  let step = "";
  let frame = 0;
  const startTime = Date.now();

  function bar(filledCount: number): string {
    return `${GREEN}${"█".repeat(filledCount)}${RESET}${DIM}${"░".repeat(barWidth - filledCount)}${RESET}`;
  }

  function render() {
    const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
    const filled = total > 0 ? Math.round((Math.min(current, total) / total) * barWidth) : 0;
    const elapsed = formatDuration(Date.now() - startTime);
    const suffix = step ? `  ${DIM}${step}${RESET}` : "";
    stream.write(
      `\r${CLEAR_LINE}${BOLD}${CYAN}${spinner}${RESET} ${label}  ${bar(filled)}  ${current}/${total} ${unit}  ${DIM}${elapsed}${RESET}${suffix}`
    );
  }

  return new Promise<void>((resolve, reject) => {
    stream.write(HIDE_CURSOR);
    const timer = setInterval(() => {
      render();
      frame++;
    }, 80);

    function finish() {
      clearInterval(timer);
      stream.write(`\r${CLEAR_LINE}`);
      stream.write(SHOW_CURSOR);
    }

    source.subscribe({
      next(value) {
        const update = mapper(value);
        if (!update) return;
        current = update.current;
        total = update.total;
        if (update.step !== undefined) step = update.step;
        if (update.log) {
          stream.write(`\r${CLEAR_LINE}${update.log}\n`);
          render();
        }
      },
      error(err: unknown) {
        finish();
        stream.write(`${RED}✗${RESET} ${label}  ${err instanceof Error ? err.message : String(err)}\n`);
        reject(err);
      },
      complete() {
        finish();
        stream.write(
          `${GREEN}✔${RESET} ${label}  ${bar(barWidth)}  ${current}/${total} ${unit} in ${formatDuration(Date.now() - startTime)}\n`
        );
        resolve();
      },
    });
  });
}

// ============================================================================
// Final report
// ============================================================================

const STATUS_ICON = {
  success: `${GREEN}✔${RESET}`,
  partial: `${YELLOW}⚠${RESET}`,
  failed: `${RED}✗${RESET}`,
} as const;

/**
 * One line per document, in input order, followed by the totals.
 */
export function formatReport(
  report: BatchReport,
  missing: readonly MissingDocument[] = []
): string {
  const lines: string[] = [""];
  const idWidth = Math.max(0, ...report.entries.map((e) => e.documentId.length));

  for (const entry of report.entries) {
    const { status, error } = entry.artifact;
    const detail = error ? `  ${DIM}${error}${RESET}` : "";
    lines.push(
      `  ${STATUS_ICON[status]} ${entry.documentId.padEnd(idWidth)}  ${status.padEnd(7)}  ${entry.title}${detail}`
    );
  }

  for (const doc of missing) {
    lines.push(`  ${DIM}-${RESET} ${doc.id.padEnd(idWidth)}  skipped  ${DIM}${doc.reason}${RESET}`);
  }

  const { success, partial, failed } = report.counts;
  lines.push("");
  lines.push(
    `${BOLD}Done${RESET} ${report.total} papers: ${GREEN}${success} succeeded${RESET}, ${YELLOW}${partial} partial${RESET}, ${RED}${failed} failed${RESET}` +
      (missing.length > 0 ? `, ${missing.length} skipped` : "")
  );
  return lines.join("\n");
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
