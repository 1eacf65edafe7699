/**
 * Crisis keyword list resolution.
 *
 * Order: CRISIS_KEYWORDS env value → keyword file → built-in defaults.
 * An override that is empty, unreadable or not a list of strings is skipped.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { logger } from "../lib/logger.js";

export const DEFAULT_CRISIS_KEYWORDS: readonly string[] = [
  "suicide",
  "suicidal",
  "kill myself",
  "end it all",
  "end my life",
  "take my life",
  "hurt myself",
  "self harm",
  "self-harm",
  "want to die",
  "can't go on",
  "better off dead",
  "no point living",
  "no point in living",
  "not worth living",
  "no reason to live",
  "give up on life",
  "want to give up",
  "going to give up",
  "no point anymore",
  "no point going on",
];

export type CrisisKeywordSource = "env" | "file" | "default";

export interface CrisisKeywordList {
  keywords: string[];
  source: CrisisKeywordSource;
}

export interface CrisisKeywordOptions {
  /** Raw CRISIS_KEYWORDS value: JSON array or comma-separated list. */
  envValue?: string;
  /** Path to a .json array or a newline-separated word list. */
  filePath?: string;
}

const keywordListSchema = z.array(z.string().trim().min(1)).min(1);

function normalize(keywords: string[]): string[] {
  const seen = new Set<string>();
  for (const kw of keywords) {
    const cleaned = kw.trim().toLowerCase();
    if (cleaned) seen.add(cleaned);
  }
  return [...seen];
}

/** Parse the env form. Returns undefined when the value yields no usable keywords. */
export function parseKeywordEnv(value: string): string[] | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    // Not JSON: comma-separated
    const list = normalize(trimmed.split(","));
    return list.length > 0 ? list : undefined;
  }

  const result = keywordListSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn("crisis_keywords_env_invalid", {
      reason: "expected a non-empty JSON array of strings",
    });
    return undefined;
  }
  return normalize(result.data);
}

/** Read a keyword file. Returns undefined when missing, unreadable or empty. */
export function readKeywordFile(filePath: string): string[] | undefined {
  if (!fs.existsSync(filePath)) {
    logger.warn("crisis_keywords_file_missing", { filePath });
    return undefined;
  }

  try {
    const content = fs.readFileSync(filePath, "utf-8");

    if (path.extname(filePath).toLowerCase() === ".json") {
      const result = keywordListSchema.safeParse(JSON.parse(content));
      if (!result.success) {
        logger.warn("crisis_keywords_file_invalid", { filePath });
        return undefined;
      }
      return normalize(result.data);
    }

    const lines = normalize(content.split(/\r?\n/));
    return lines.length > 0 ? lines : undefined;
  } catch (err) {
    logger.error("crisis_keywords_file_unreadable", { filePath, error: String(err) });
    return undefined;
  }
}

export function loadCrisisKeywords(options: CrisisKeywordOptions = {}): CrisisKeywordList {
  if (options.envValue !== undefined) {
    const fromEnv = parseKeywordEnv(options.envValue);
    if (fromEnv) {
      logger.info("crisis_keywords_loaded", { source: "env", count: fromEnv.length });
      return { keywords: fromEnv, source: "env" };
    }
  }

  if (options.filePath) {
    const fromFile = readKeywordFile(options.filePath);
    if (fromFile) {
      logger.info("crisis_keywords_loaded", {
        source: "file",
        filePath: options.filePath,
        count: fromFile.length,
      });
      return { keywords: fromFile, source: "file" };
    }
  }

  logger.info("crisis_keywords_loaded", { source: "default", count: DEFAULT_CRISIS_KEYWORDS.length });
  return { keywords: [...DEFAULT_CRISIS_KEYWORDS], source: "default" };
}
