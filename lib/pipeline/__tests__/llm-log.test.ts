import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { appendLogEntry, logPath, readLogEntries, type LlmLogEntry } from "../llm-log";

function entry(i: number): LlmLogEntry {
  return {
    timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, i)).toISOString(),
    modelId: "test-model",
    promptChars: i,
    durationMs: 10,
  };
}

describe("llm-log", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("puts the log at the output root", () => {
    expect(logPath(tmpDir)).toBe(path.join(tmpDir, "llm-log.jsonl"));
  });

  it("appends entries as JSON lines", () => {
    const file = path.join(tmpDir, "nested", "llm-log.jsonl");
    appendLogEntry(file, entry(1));
    appendLogEntry(file, { ...entry(2), error: "quota exceeded" });

    expect(readLogEntries(file)).toEqual([entry(1), { ...entry(2), error: "quota exceeded" }]);
    expect(fs.readFileSync(file, "utf-8").split("\n")).toHaveLength(3);
  });

  it("keeps only the newest 250 entries", () => {
    const file = logPath(tmpDir);
    for (let i = 0; i < 252; i++) appendLogEntry(file, entry(i));

    const entries = readLogEntries(file);
    expect(entries).toHaveLength(250);
    expect(entries[0].promptChars).toBe(2);
    expect(entries[249].promptChars).toBe(251);
  });

  it("reads nothing from a missing file", () => {
    expect(readLogEntries(path.join(tmpDir, "absent.jsonl"))).toEqual([]);
  });
});
