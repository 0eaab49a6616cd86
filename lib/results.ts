/**
 * Filesystem result sink.
 *
 * Layout, one folder per document under the output root:
 *
 *   <output>/<safe title>_<safe id>/summary.md
 *   <output>/<safe title>_<safe id>/slides.md
 *   <output>/<safe title>_<safe id>/extraction.md
 *   <output>/<safe title>_<safe id>/result.json
 *
 * The id keeps papers that share a title apart. A summary or slides file
 * the current outcome lacks is removed so the folder matches result.json.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod/v4";
import type { ExtractionResult, PaperDocument } from "./pipeline/core/types";
import type { AnalysisOutcome, ResultSink } from "./pipeline/runner/types";

const resultRecordSchema = z.object({
  documentId: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  status: z.enum(["success", "partial", "failed"]),
  error: z.string().optional(),
  extraction: z
    .object({
      modelId: z.string(),
      createdAt: z.string(),
    })
    .optional(),
  savedAt: z.string(),
});

export type ResultRecord = z.infer<typeof resultRecordSchema>;

/**
 * Make a folder name from a paper title.
 */
export function safeFilename(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, "")
    .replace(/ /g, "_")
    .slice(0, 100);
}

export function resolveResultDir(outputRoot: string, document: PaperDocument): string {
  const id = safeFilename(document.id);
  const title = safeFilename(document.title.trim());
  return path.join(path.resolve(outputRoot), title ? `${title}_${id}` : id);
}

export function createFileResultSink(outputRoot: string): ResultSink {
  return {
    async save(document: PaperDocument, outcome: AnalysisOutcome): Promise<void> {
      const dir = resolveResultDir(outputRoot, document);
      await fs.promises.mkdir(dir, { recursive: true });

      const { artifact, extraction } = outcome;

      await writeOrRemove(
        path.join(dir, "summary.md"),
        artifact.summary === undefined
          ? undefined
          : `# ${document.title}\n\n${artifact.summary}\n`
      );
      await writeOrRemove(path.join(dir, "slides.md"), artifact.slides);
      if (extraction) {
        await writeExtraction(outputRoot, document, extraction);
      }

      const record: ResultRecord = {
        documentId: document.id,
        title: document.title,
        authors: [...document.authors],
        status: artifact.status,
        error: artifact.error,
        extraction: extraction
          ? { modelId: extraction.modelId, createdAt: extraction.createdAt }
          : undefined,
        savedAt: new Date().toISOString(),
      };
      await fs.promises.writeFile(
        path.join(dir, "result.json"),
        JSON.stringify(record, null, 2) + "\n",
        "utf-8"
      );
    },
  };
}

async function writeOrRemove(file: string, content: string | undefined): Promise<void> {
  if (content === undefined) {
    await fs.promises.rm(file, { force: true });
    return;
  }
  await fs.promises.writeFile(file, content, "utf-8");
}

export async function writeExtraction(
  outputRoot: string,
  document: PaperDocument,
  extraction: ExtractionResult
): Promise<string> {
  const dir = resolveResultDir(outputRoot, document);
  await fs.promises.mkdir(dir, { recursive: true });
  const file = path.join(dir, "extraction.md");
  await fs.promises.writeFile(file, extraction.text, "utf-8");
  return file;
}

export function readResultRecord(
  outputRoot: string,
  document: PaperDocument
): ResultRecord | null {
  const file = path.join(resolveResultDir(outputRoot, document), "result.json");
  if (!fs.existsSync(file)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    // Truncated by an interrupted save
    return null;
  }
  const parsed = resultRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Read back the extraction a previous run saved for this document, if any.
 */
export function readSavedExtraction(
  outputRoot: string,
  document: PaperDocument
): ExtractionResult | null {
  const file = path.join(resolveResultDir(outputRoot, document), "extraction.md");
  if (!fs.existsSync(file)) return null;

  const text = fs.readFileSync(file, "utf-8");
  if (!text.trim()) return null;

  const record = readResultRecord(outputRoot, document);
  if (record && record.documentId !== document.id) return null;

  return {
    documentId: document.id,
    text,
    modelId: record?.extraction?.modelId ?? "unknown",
    createdAt: record?.extraction?.createdAt ?? fs.statSync(file).mtime.toISOString(),
  };
}
