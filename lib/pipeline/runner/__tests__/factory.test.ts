import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseConfig } from "@/lib/config";
import { createAnalysisRunner } from "../factory";
import { runBatch } from "../batch-runner";
import { FakeClock, scriptedGenerator } from "../../__tests__/fakes";

describe("createAnalysisRunner", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("maps config onto models, policies and mode", () => {
    const config = parseConfig({
      models: { fast: "small", advanced: "large" },
      output_mode: "slides",
      retry: {
        extraction: { max_attempts: 3, wait_seconds: 2 },
        generation: { max_attempts: 4, wait_seconds: 30 },
      },
      language: "French",
      max_input_chars: 5000,
    });
    const { generator } = scriptedGenerator({});

    const runner = createAnalysisRunner(config, { generator, sink: null });

    expect(runner.models).toEqual({ fast: "small", advanced: "large" });
    expect(runner.policies.extraction).toMatchObject({ maxAttempts: 3, waitMs: 2000 });
    expect(runner.policies.generation).toMatchObject({ maxAttempts: 4, waitMs: 30_000 });
    expect(runner.outputMode).toBe("slides");
    expect(runner.language).toBe("French");
    expect(runner.maxInputChars).toBe(5000);
    expect(runner.sink).toBeUndefined();
  });

  it("lets options override the output mode", () => {
    const { generator } = scriptedGenerator({});
    const runner = createAnalysisRunner(parseConfig({}), { generator, outputMode: "summary", sink: null });
    expect(runner.outputMode).toBe("summary");
  });

  it("spaces calls by spacing_seconds on the given clock", async () => {
    const clock = new FakeClock();
    const { generator } = scriptedGenerator({});
    const runner = createAnalysisRunner(parseConfig({ spacing_seconds: 2, output_mode: "summary" }), {
      generator,
      clock,
      sink: null,
    });

    await runBatch([{ id: "a", title: "A", authors: [], text: "body" }], runner);

    expect(clock.sleeps).toEqual([2000]);
  });

  it("saves results under output_dir by default", async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "factory-test-"));
    const { generator } = scriptedGenerator({ summary: "SUMMARY" });
    const runner = createAnalysisRunner(
      parseConfig({ output_dir: tmpDir, output_mode: "summary", spacing_seconds: 0 }),
      { generator }
    );

    await runBatch([{ id: "a", title: "My Paper", authors: [], text: "body" }], runner);

    expect(fs.readFileSync(path.join(tmpDir, "My_Paper_a", "summary.md"), "utf-8")).toBe(
      "# My Paper\n\nSUMMARY\n"
    );
  });
});
