/**
 * Keyword-based emotion classifier for caller transcripts.
 *
 * - Crisis phrases are checked first and short-circuit everything else.
 * - Each category is scored by whole-word keyword matches (case-insensitive).
 * - Ties resolve through EMOTION_PRIORITY; no matches → the default category.
 */

import fs from "fs";
import { z } from "zod";
import { config } from "../lib/config.js";
import { logger, truncateForLog } from "../lib/logger.js";
import { metrics } from "../observability/metrics.js";
import {
  CRISIS,
  EMOTION_CATEGORIES,
  EMOTION_PRIORITY,
  type ClassificationResult,
  type Emotion,
  type EmotionCategory,
} from "../lib/types.js";
import { loadCrisisKeywords } from "./crisis-keywords.js";

export type EmotionKeywordTable = Record<EmotionCategory, readonly string[]>;

export interface EmotionClassifierOptions {
  /** Explicit crisis list. When omitted, resolved from env/file/defaults. */
  crisisKeywords?: readonly string[];
  defaultEmotion?: EmotionCategory;
  keywordTable?: EmotionKeywordTable;
  /** JSON file with the per-category keyword table (ignored when keywordTable is given). */
  keywordsPath?: string;
}

export interface IEmotionClassifier {
  classify(text?: string | null): Emotion;
  classifyWithConfidence(text?: string | null): ClassificationResult;
  isCrisis(text?: string | null): boolean;
  supportedEmotions(): Emotion[];
  crisisKeywords(): string[];
  readonly defaultEmotion: EmotionCategory;
}

const keywordList = z.array(z.string().trim().min(1)).min(1);

const keywordTableSchema = z
  .object({
    anxiety: keywordList,
    sadness: keywordList,
    frustration: keywordList,
    uncertainty: keywordList,
    overwhelm: keywordList,
  })
  .strict();

/** Read and validate the per-category keyword table. Throws on a missing or malformed file. */
export function loadEmotionKeywordTable(filePath: string): EmotionKeywordTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new Error(`Unable to read emotion keywords from ${filePath}: ${String(err)}`);
  }

  const result = keywordTableSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid emotion keyword table at '${issue.path.join(".") || "root"}': ${issue.message}`
    );
  }
  return result.data;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a global, case-insensitive pattern that only matches whole words/phrases.
 * Longer phrases come first so "too much" wins over any single-word overlap.
 */
export function compileKeywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = [...new Set(keywords.map((k) => k.trim().toLowerCase()).filter(Boolean))]
    .sort((a, b) => b.length - a.length)
    .map((k) => escapeRegExp(k).replace(/\s+/g, "\\s+"));

  // An empty alternation would match everywhere
  if (alternatives.length === 0) return /(?!)/g;

  return new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi");
}

/** Lowercase and fold typographic apostrophes so "can’t" matches "can't". */
function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/[‘’ʼ]/g, "'");
}

function findMatches(pattern: RegExp, text: string): string[] {
  return text.match(pattern) ?? [];
}

function emptyScores(): Record<EmotionCategory, number> {
  return { anxiety: 0, sadness: 0, frustration: 0, uncertainty: 0, overwhelm: 0 };
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Pick the highest score; ties go to the earliest category in EMOTION_PRIORITY. */
export function resolveTopEmotion(
  scores: Record<EmotionCategory, number>
): EmotionCategory | undefined {
  const max = Math.max(...EMOTION_CATEGORIES.map((e) => scores[e]));
  if (max <= 0) return undefined;
  return EMOTION_PRIORITY.find((e) => scores[e] === max);
}

export function createEmotionClassifier(options: EmotionClassifierOptions = {}): IEmotionClassifier {
  const defaultEmotion = options.defaultEmotion ?? config.defaultEmotion;
  const table = options.keywordTable ?? loadEmotionKeywordTable(options.keywordsPath ?? config.emotionKeywordsPath);

  const crisisList = options.crisisKeywords
    ? [...options.crisisKeywords]
    : loadCrisisKeywords({
        envValue: config.crisisKeywords,
        filePath: config.crisisKeywordsFile,
      }).keywords;

  const crisisPattern = compileKeywordPattern(crisisList);
  const emotionPatterns = new Map<EmotionCategory, RegExp>(
    EMOTION_CATEGORIES.map((e) => [e, compileKeywordPattern(table[e])])
  );

  logger.info("emotion_classifier_ready", {
    crisisKeywords: crisisList.length,
    defaultEmotion,
  });

  function score(normalized: string): Record<EmotionCategory, number> {
    const scores = emptyScores();
    for (const [emotion, pattern] of emotionPatterns) {
      scores[emotion] = findMatches(pattern, normalized).length;
    }
    return scores;
  }

  return {
    defaultEmotion,

    classify(text) {
      if (!text || !text.trim()) {
        logger.warn("emotion_input_empty", { fallback: defaultEmotion });
        return defaultEmotion;
      }

      const normalized = normalizeText(text);

      const crisisMatches = findMatches(crisisPattern, normalized);
      if (crisisMatches.length > 0) {
        logger.critical("crisis_detected", {
          keywords: [...new Set(crisisMatches)],
          input: truncateForLog(text, 500),
          detectedAt: new Date().toISOString(),
          severity: "critical",
        });
        metrics.increment("voiceback_crisis_detections_total");
        return CRISIS;
      }

      const scores = score(normalized);
      for (const emotion of EMOTION_CATEGORIES) {
        if (scores[emotion] > 0) {
          logger.debug("emotion_scored", { emotion, matches: scores[emotion] });
        }
      }

      const top = resolveTopEmotion(scores);
      if (!top) {
        logger.info("emotion_no_keywords", { fallback: defaultEmotion, input: truncateForLog(text) });
        return defaultEmotion;
      }

      logger.info("emotion_detected", { emotion: top, input: truncateForLog(text) });
      return top;
    },

    classifyWithConfidence(text) {
      if (!text || !text.trim()) {
        return { emotion: defaultEmotion, isCrisis: false, confidence: 0, scores: emptyScores() };
      }

      const normalized = normalizeText(text);
      const words = countWords(normalized);
      const scores = score(normalized);
      const crisisCount = findMatches(crisisPattern, normalized).length;

      if (crisisCount > 0) {
        return { emotion: CRISIS, isCrisis: true, confidence: crisisCount / words, scores };
      }

      const top = resolveTopEmotion(scores);
      if (!top) {
        return { emotion: defaultEmotion, isCrisis: false, confidence: 0, scores };
      }

      return { emotion: top, isCrisis: false, confidence: scores[top] / words, scores };
    },

    isCrisis(text) {
      if (!text || !text.trim()) return false;
      return findMatches(crisisPattern, normalizeText(text)).length > 0;
    },

    supportedEmotions() {
      return [...EMOTION_CATEGORIES, CRISIS];
    },

    crisisKeywords() {
      return [...crisisList];
    },
  };
}
