/**
 * Turns a classification and a quote record into the script the caller hears.
 *
 * Standard template:
 *   It sounds like you're feeling {emotion}. {acknowledgment} You remind me of
 *   {figure}, {contextLine}. [pause] '{quote}' {encouragementLine}
 * followed by the service disclaimer. Crisis replies are the fixed safety
 * script and never carry the disclaimer.
 */

import { logger, truncateForLog } from "../lib/logger.js";
import { metrics } from "../observability/metrics.js";
import {
  CRISIS,
  isEmotionCategory,
  pickOne,
  type Emotion,
  type EmotionCategory,
  type QuoteRecord,
  type RandomSource,
  type ResponseSegments,
} from "../lib/types.js";

export const CRISIS_SCRIPT =
  "I'm really concerned about you right now, and I'm glad you said something. You're not alone, " +
  "and there are people who want to help. Voiceback can't support you through a crisis, but trained " +
  "counselors can, right now. If you're in the US, call or text 988 to reach the Suicide and Crisis Lifeline, " +
  "any time, day or night. In Canada, call Talk Suicide Canada at 1-833-456-4566. In India, call AASRA at " +
  "9152987821. If you are in immediate danger, please call your local emergency number. " +
  "You don't have to go through this alone.";

/** Hotline identifiers the crisis script must always contain. */
export const CRISIS_HOTLINES: readonly string[] = ["988", "1-833-456-4566", "9152987821"];

export const DEFAULT_SERVICE_NAME = "Voiceback";

export function buildDisclaimer(serviceName = DEFAULT_SERVICE_NAME): string {
  return (
    ` Thank you for calling ${serviceName}. Please remember, this service ` +
    "offers inspiration, not professional advice. Goodbye."
  );
}

export const EMOTION_ACKNOWLEDGMENTS: Readonly<Record<EmotionCategory, readonly string[]>> = {
  anxiety: [
    "That's completely understandable.",
    "Many people experience this feeling.",
    "You're not alone in feeling this way.",
    "It's natural to feel anxious sometimes.",
  ],
  sadness: [
    "I can hear the heaviness in that.",
    "Sadness is a natural part of the human experience.",
    "It's okay to feel this deeply.",
    "Your feelings are valid and important.",
  ],
  frustration: [
    "That frustration sounds really difficult.",
    "It's clear this has been weighing on you.",
    "Frustration can be so draining.",
    "I can understand why you'd feel that way.",
  ],
  uncertainty: [
    "Uncertainty can feel unsettling.",
    "Not knowing what's ahead is challenging.",
    "It's hard when the path isn't clear.",
    "Feeling uncertain is part of being human.",
  ],
  overwhelm: [
    "That sounds like so much to handle.",
    "Being overwhelmed is exhausting.",
    "It's understandable to feel swamped.",
    "Sometimes life can feel like too much.",
  ],
};

export const GENERIC_ACKNOWLEDGMENT = "I hear you.";

/** Built-in record used whenever the corpus can't supply one. */
export const FALLBACK_RECORD: QuoteRecord = Object.freeze({
  figure: "Seneca",
  contextLines: Object.freeze(["who believed we have the strength to face any challenge"]),
  quote: "We suffer more often in imagination than in reality.",
  encouragementLines: Object.freeze(["You have the power to overcome this moment."]),
});

export interface ResponseCompositorOptions {
  random?: RandomSource;
  serviceName?: string;
}

export interface IResponseCompositor {
  compose(emotion: Emotion, record: QuoteRecord | undefined, originalText?: string): string;
  composeSegments(emotion: Emotion, record: QuoteRecord | undefined, originalText?: string): ResponseSegments;
  acknowledgmentsFor(emotion: string): string[];
  readonly disclaimer: string;
}

class MalformedRecordError extends Error {
  constructor(field: string) {
    super(`Quote record field '${field}' is missing or malformed`);
    this.name = "MalformedRecordError";
  }
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) throw new MalformedRecordError(field);
  return value.trim();
}

function requireLine(lines: unknown, field: string, random: RandomSource): string {
  if (!Array.isArray(lines)) throw new MalformedRecordError(field);
  const usable = lines.filter((l): l is string => typeof l === "string" && l.trim().length > 0);
  const line = pickOne(usable, random);
  if (line === undefined) throw new MalformedRecordError(field);
  return line.trim();
}

/** Context lines read as a clause after the figure's name, so drop a trailing period. */
function asClause(line: string): string {
  return line.replace(/[.\s]+$/, "");
}

/** Flatten speech segments back into the single spoken script. */
export function joinSegments(segments: ResponseSegments): string {
  if (!segments.quote) {
    return [segments.intro, segments.conclusion].filter(Boolean).join(" ");
  }
  return `${segments.intro} [pause] '${segments.quote}' ${segments.conclusion}`;
}

interface Parts {
  acknowledgment: string;
  figure: string;
  contextLine: string;
  quote: string;
  encouragementLine: string;
}

export function createResponseCompositor(options: ResponseCompositorOptions = {}): IResponseCompositor {
  const random = options.random ?? Math.random;
  const disclaimer = buildDisclaimer(options.serviceName);

  function acknowledgmentsFor(emotion: string): readonly string[] {
    return isEmotionCategory(emotion) ? EMOTION_ACKNOWLEDGMENTS[emotion] : [GENERIC_ACKNOWLEDGMENT];
  }

  function acknowledge(emotion: string): string {
    return pickOne(acknowledgmentsFor(emotion), random) ?? GENERIC_ACKNOWLEDGMENT;
  }

  function extract(emotion: string, record: QuoteRecord): Parts {
    return {
      acknowledgment: acknowledge(emotion),
      figure: requireText(record.figure, "figure"),
      contextLine: asClause(requireLine(record.contextLines, "contextLines", random)),
      quote: requireText(record.quote, "quote"),
      encouragementLine: requireLine(record.encouragementLines, "encouragementLines", random),
    };
  }

  function intro(emotion: string, parts: Parts): string {
    return (
      `It sounds like you're feeling ${emotion}. ${parts.acknowledgment} ` +
      `You remind me of ${parts.figure}, ${parts.contextLine}.`
    );
  }

  function render(emotion: string, parts: Parts): string {
    return `${intro(emotion, parts)} [pause] '${parts.quote}' ${parts.encouragementLine}`;
  }

  /** Degraded reply: FALLBACK_RECORD with the first acknowledgment, no random choice. */
  function fallbackParts(emotion: string, reason: string, originalText?: string): Parts {
    logger.warn("response_degraded", {
      emotion,
      reason,
      input: originalText ? truncateForLog(originalText) : undefined,
    });
    metrics.increment("voiceback_degraded_responses_total");
    return {
      acknowledgment: acknowledgmentsFor(emotion)[0] ?? GENERIC_ACKNOWLEDGMENT,
      figure: FALLBACK_RECORD.figure,
      contextLine: FALLBACK_RECORD.contextLines[0],
      quote: FALLBACK_RECORD.quote,
      encouragementLine: FALLBACK_RECORD.encouragementLines[0],
    };
  }

  function resolveParts(
    emotion: string,
    record: QuoteRecord | undefined,
    originalText?: string
  ): { parts: Parts; degraded: boolean } {
    if (!record) {
      return { parts: fallbackParts(emotion, "no_record", originalText), degraded: true };
    }
    try {
      return { parts: extract(emotion, record), degraded: false };
    } catch (err) {
      return {
        parts: fallbackParts(emotion, err instanceof Error ? err.message : String(err), originalText),
        degraded: true,
      };
    }
  }

  function composeSegments(
    emotion: Emotion,
    record: QuoteRecord | undefined,
    originalText?: string
  ): ResponseSegments {
    if (emotion === CRISIS) {
      logger.warn("crisis_response_built", {
        input: originalText ? truncateForLog(originalText) : undefined,
      });
      return { intro: "", quote: "", conclusion: CRISIS_SCRIPT };
    }

    const { parts, degraded } = resolveParts(emotion, record, originalText);
    if (degraded) {
      return { intro: render(emotion, parts) + disclaimer, quote: "", conclusion: "" };
    }

    logger.info("response_built", { emotion, figure: parts.figure });
    return {
      intro: intro(emotion, parts),
      quote: parts.quote,
      conclusion: parts.encouragementLine + disclaimer,
    };
  }

  return {
    disclaimer,
    composeSegments,

    compose(emotion, record, originalText) {
      return joinSegments(composeSegments(emotion, record, originalText));
    },

    acknowledgmentsFor(emotion) {
      return [...acknowledgmentsFor(emotion)];
    },
  };
}
