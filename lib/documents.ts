/**
 * Document manifest loading.
 *
 * A manifest lists the papers of one batch. Each `source` points at the
 * paper's text, already converted from PDF (Markdown or plain text), and
 * is resolved relative to the manifest file.
 *
 *   documents:
 *     - id: vaswani2017
 *       title: Attention Is All You Need
 *       authors: [Ashish Vaswani, Noam Shazeer]
 *       source: papers/vaswani2017.md
 */

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import type { PaperDocument } from "./pipeline/core/types";
import { stripReferences } from "./pipeline/prompt";
import { readSavedExtraction } from "./results";

const manifestEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  authors: z.union([z.array(z.string()), z.string()]).optional(),
  source: z.string().min(1),
});

const manifestSchema = z.object({
  documents: z.array(manifestEntrySchema),
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

export interface MissingDocument {
  id: string;
  title: string;
  reason: string;
}

export interface LoadedDocuments {
  documents: PaperDocument[];
  /** Entries whose source text could not be read; never sent to the pipeline */
  missing: MissingDocument[];
}

export interface LoadDocumentsOptions {
  /** Where earlier runs saved their results */
  outputRoot?: string;
  /** Attach saved extractions so Stage 1 is skipped (default true) */
  reuseExtractions?: boolean;
}

export function readManifest(manifestPath: string): ManifestEntry[] {
  const resolved = path.resolve(manifestPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Manifest not found: ${resolved}`);
  }
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  const manifest = manifestSchema.parse(raw);

  const seen = new Set<string>();
  for (const entry of manifest.documents) {
    if (seen.has(entry.id)) {
      throw new Error(`Duplicate document id in manifest: ${entry.id}`);
    }
    seen.add(entry.id);
  }
  return manifest.documents;
}

export function loadDocuments(
  manifestPath: string,
  options: LoadDocumentsOptions = {}
): LoadedDocuments {
  const { outputRoot, reuseExtractions = true } = options;
  const baseDir = path.dirname(path.resolve(manifestPath));
  const documents: PaperDocument[] = [];
  const missing: MissingDocument[] = [];

  for (const entry of readManifest(manifestPath)) {
    const title = entry.title?.trim() || entry.id;
    const sourcePath = path.resolve(baseDir, entry.source);

    if (!fs.existsSync(sourcePath)) {
      missing.push({ id: entry.id, title, reason: `Source not found: ${sourcePath}` });
      continue;
    }

    const text = stripReferences(fs.readFileSync(sourcePath, "utf-8"));
    if (!text) {
      missing.push({ id: entry.id, title, reason: `Source is empty: ${sourcePath}` });
      continue;
    }

    const document: PaperDocument = {
      id: entry.id,
      title,
      authors: normalizeAuthors(entry.authors),
      text,
    };

    const saved =
      reuseExtractions && outputRoot ? readSavedExtraction(outputRoot, document) : null;
    documents.push(saved ? { ...document, extraction: saved } : document);
  }

  return { documents, missing };
}

function normalizeAuthors(authors: ManifestEntry["authors"]): string[] {
  if (authors === undefined) return [];
  const list = typeof authors === "string" ? authors.split(/[,;]/) : authors;
  return list.map((a) => a.trim()).filter(Boolean);
}
