import fs from "node:fs";
import path from "node:path";

export interface LlmLogTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmLogEntry {
  timestamp: string;
  modelId: string;
  promptChars: number;
  outputChars?: number;
  durationMs: number;
  usage?: LlmLogTokenUsage;
  error?: string;
}

const MAX_LOG_ENTRIES = 250;

/**
 * Resolve the log file path for an output root.
 */
export function logPath(outputRoot: string): string {
  return path.join(path.resolve(outputRoot), "llm-log.jsonl");
}

/**
 * Append a log entry to the JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(
      filePath,
      lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n"
    );
  }
}

export function readLogEntries(filePath: string): LlmLogEntry[] {
  if (!fs.existsSync(filePath)) return [];
  return fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter(Boolean)
    .map((line): LlmLogEntry => JSON.parse(line));
}
