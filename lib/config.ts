import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import type { RetryPolicy } from "./pipeline/core/types";
import { isTransientError } from "./pipeline/core/errors";

const retrySchema = z.object({
  max_attempts: z.number().int().min(1),
  wait_seconds: z.number().min(0),
});

const configSchema = z.object({
  provider: z.enum(["openai", "anthropic", "google"]).default("google"),
  models: z
    .object({
      fast: z.string().min(1).default("gemini-2.0-flash"),
      advanced: z.string().min(1).default("gemini-2.5-pro"),
    })
    .prefault({}),
  output_mode: z.enum(["summary", "slides", "both"]).default("both"),
  retry: z
    .object({
      extraction: retrySchema.default({ max_attempts: 5, wait_seconds: 10 }),
      generation: retrySchema.default({ max_attempts: 5, wait_seconds: 40 }),
    })
    .prefault({}),
  spacing_seconds: z.number().min(0).default(4),
  request_timeout_seconds: z.number().positive().default(300),
  max_input_chars: z.number().int().positive().default(100_000),
  language: z.string().min(1).default("English"),
  output_dir: z.string().min(1).default("output"),
});

export type AppConfig = z.infer<typeof configSchema>;
export type RetryConfig = z.infer<typeof retrySchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (overVal === undefined) continue;
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result as T;
}

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw ?? {});
}

/**
 * Load config.yaml (from the working directory unless a path is given),
 * layer `overrides` on top, then apply environment overrides.
 */
export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (configPath && !fs.existsSync(resolved)) {
    throw new Error(`Config file not found: ${resolved}`);
  }

  const fromFile = fs.existsSync(resolved)
    ? yaml.load(fs.readFileSync(resolved, "utf-8"))
    : {};
  const base = isPlainObject(fromFile) ? fromFile : {};
  const config = parseConfig(deepMerge(base, overrides));

  return {
    ...config,
    output_dir: process.env.OUTPUT_ROOT ?? config.output_dir,
  };
}

export function toRetryPolicy(
  retry: RetryConfig,
  isRetryable: (error: unknown) => boolean = isTransientError
): RetryPolicy {
  return {
    maxAttempts: retry.max_attempts,
    waitMs: Math.round(retry.wait_seconds * 1000),
    isRetryable,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
