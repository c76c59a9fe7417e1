import { parse } from "smol-toml";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import * as z from "zod";

import { ConfigError } from "./errors";
import { DEFAULT_ANTHROPIC_MODEL } from "./providers/anthropic";

export const CONFIG_PATH = join(".lectern", "config.toml");

const MODEL_ALIASES: Record<string, string> = {
  sonnet: "claude-sonnet-4-20250514",
  opus: "claude-opus-4-20250514",
  haiku: "claude-3-5-haiku-20241022",
};

export function resolveModel(model: string | undefined): string | undefined {
  if (model === undefined) return undefined;
  return MODEL_ALIASES[model] ?? model;
}

const fileSchema = z
  .object({
    model: z.string().min(1).optional(),
    max_rounds: z.number().int().min(1).max(10).optional(),
    max_output_tokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(1).optional(),
    timeout_ms: z.number().int().positive().optional(),
    max_history: z.number().int().nonnegative().optional(),
    max_results: z.number().int().positive().optional(),
    catalog: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof fileSchema>;

export interface LecternConfig {
  apiKey: string;
  model: string;
  maxRounds: number;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs?: number;
  maxHistory: number;
  maxResults: number;
  catalogPath: string;
}

/** Flag values from the CLI; anything set here beats the file. */
export interface ConfigOverrides {
  model?: string;
  maxRounds?: number;
  timeoutMs?: number;
  catalog?: string;
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === "unrecognized_keys") {
    return `unknown field "${issue.keys.join('", "')}"`;
  }
  const path = issue.path.join(".");
  return path ? `"${path}" ${issue.message}` : issue.message;
}

/** Parse and validate config TOML text. */
export function parseConfig(text: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${CONFIG_PATH}: ${message}`);
  }

  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `${CONFIG_PATH}: ${result.error.issues.map(describeIssue).join("; ")}`,
    );
  }
  return result.data;
}

/** Reads .lectern/config.toml under `root`. Missing file means defaults. */
export function loadConfigFile(root: string = process.cwd()): ConfigFile {
  const path = join(root, CONFIG_PATH);
  if (!existsSync(path)) return {};
  return parseConfig(readFileSync(path, "utf-8"));
}

/**
 * Merge file, environment and flags. Reads the environment only through
 * `env`, never process.env.
 */
export function resolveConfig(
  file: ConfigFile,
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
): LecternConfig {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY environment variable is required");
  }

  const maxRounds = overrides.maxRounds ?? file.max_rounds ?? 2;
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new ConfigError("--max-rounds must be a positive integer (at least 1)");
  }

  const timeoutMs = overrides.timeoutMs ?? file.timeout_ms;
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new ConfigError("--timeout must be a positive number of milliseconds");
  }

  const model =
    resolveModel(overrides.model ?? env.LECTERN_MODEL ?? file.model) ?? DEFAULT_ANTHROPIC_MODEL;

  return {
    apiKey,
    model,
    maxRounds,
    maxOutputTokens: file.max_output_tokens ?? 800,
    temperature: file.temperature ?? 0,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    maxHistory: file.max_history ?? 2,
    maxResults: file.max_results ?? 5,
    catalogPath: overrides.catalog ?? file.catalog ?? join("data", "courses.json"),
  };
}
