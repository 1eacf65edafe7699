/**
 * Response corpus store.
 *
 * Loads the emotion → quote-record mapping from a JSON file, validates it
 * (zod schema + business rules) and caches it in memory. A cached load is
 * returned until the file's mtime moves past the one recorded at the last
 * successful load, or a reload is forced. A failed reload keeps the
 * previous configuration and throws ConfigurationError.
 */

import fs from "fs";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { pickOne, type QuoteRecord, type RandomSource, type ResponseConfiguration } from "../lib/types.js";

export class ConfigurationError extends Error {
  /** Dotted location of the offending value, e.g. "anxiety.0.quote". */
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.path = path;
  }
}

export const EMOTION_KEY_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
export const MAX_EMOTION_KEY_LENGTH = 50;
/** Keys that name Object.prototype members rather than emotions. */
export const RESERVED_EMOTION_KEYS: readonly string[] = ["__proto__", "constructor", "prototype"];
export const PLACEHOLDER_FIGURES: readonly string[] = ["unknown", "anonymous", "n/a", "none"];

const boundedText = (max: number) =>
  z
    .string()
    .min(1)
    .max(max)
    .refine((v) => v.trim().length > 0, { message: "must not be blank" });

const lineList = z.array(boundedText(500)).min(1).max(10);

const quoteRecordSchema = z
  .object({
    figure: boundedText(100),
    context_lines: lineList,
    quote: boundedText(1000),
    encouragement_lines: lineList,
  })
  .strict();

const responseFileSchema = z.record(z.string(), z.array(quoteRecordSchema).min(1));

type RawQuoteRecord = z.infer<typeof quoteRecordSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(raw: RawQuoteRecord): QuoteRecord {
  return Object.freeze({
    figure: raw.figure.trim(),
    contextLines: Object.freeze(raw.context_lines.map((l) => l.trim())),
    quote: raw.quote.trim(),
    encouragementLines: Object.freeze(raw.encouragement_lines.map((l) => l.trim())),
  });
}

/**
 * Validate a parsed document and convert it to a frozen configuration.
 * Throws ConfigurationError naming the first problem found.
 */
export function parseResponseConfiguration(data: unknown): ResponseConfiguration {
  if (!isPlainObject(data)) {
    throw new ConfigurationError("Configuration root must be an object mapping emotions to responses", "root");
  }

  const keys = Object.keys(data);
  if (keys.length === 0) {
    throw new ConfigurationError("Configuration must contain at least one emotion", "root");
  }

  for (const emotion of keys) {
    if (!emotion.trim()) {
      throw new ConfigurationError("Emotion names cannot be empty or whitespace", emotion);
    }
    if (emotion.length > MAX_EMOTION_KEY_LENGTH) {
      throw new ConfigurationError(
        `Emotion name '${emotion}' is too long (max ${MAX_EMOTION_KEY_LENGTH} characters)`,
        emotion
      );
    }
    if (RESERVED_EMOTION_KEYS.includes(emotion)) {
      throw new ConfigurationError(`Emotion name '${emotion}' is reserved`, emotion);
    }
    if (!EMOTION_KEY_PATTERN.test(emotion)) {
      throw new ConfigurationError(
        `Emotion name '${emotion}' must start with a letter or underscore and contain only letters, digits and underscores`,
        emotion
      );
    }
  }

  const result = responseFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.join(".") || "root";
    throw new ConfigurationError(`Configuration validation failed at '${location}': ${issue.message}`, location);
  }

  if (Object.keys(result.data).length === 0) {
    throw new ConfigurationError("Configuration must contain at least one emotion", "root");
  }

  const configuration: Record<string, readonly QuoteRecord[]> = {};

  for (const [emotion, responses] of Object.entries(result.data)) {
    responses.forEach((response, i) => {
      const figure = response.figure.trim();
      if (PLACEHOLDER_FIGURES.includes(figure.toLowerCase())) {
        throw new ConfigurationError(
          `Response ${i} for emotion '${emotion}': figure name '${figure}' is not allowed`,
          `${emotion}.${i}.figure`
        );
      }
    });
    configuration[emotion] = Object.freeze(responses.map(toRecord));
  }

  return Object.freeze(configuration);
}

/** Read, parse and validate a response file. Every failure surfaces as ConfigurationError. */
export function readResponseFile(filePath: string): ResponseConfiguration {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`);
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Error reading config file: ${String(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseResponseConfiguration(data);
}

export type ResponseFileCheck =
  | { valid: true; configuration: ResponseConfiguration }
  | { valid: false; error: ConfigurationError };

/** Validate a file without loading it into any store. */
export function validateResponseFile(filePath: string): ResponseFileCheck {
  try {
    return { valid: true, configuration: readResponseFile(filePath) };
  } catch (err) {
    const error = err instanceof ConfigurationError ? err : new ConfigurationError(String(err));
    logger.error("responses_validation_failed", { filePath, error: error.message });
    return { valid: false, error };
  }
}

export interface ResponseConfigStoreOptions {
  path: string;
}

export interface IResponseConfigStore {
  load(forceReload?: boolean): ResponseConfiguration;
  reload(): ResponseConfiguration;
  /**
   * Pick up an edited source file. Returns true when a new configuration was
   * swapped in; a broken file is logged and the previous one stays in service.
   */
  refresh(): boolean;
  getRecordsFor(emotion: string): readonly QuoteRecord[];
  pickRecordFor(emotion: string, random: RandomSource): QuoteRecord | undefined;
  isLoaded(): boolean;
  listEmotions(): string[];
  /** Source mtime (ms) recorded at the last successful load. */
  loadedAt(): number | undefined;
  /** Number of times the source has been parsed successfully. */
  loadCount(): number;
  readonly path: string;
}

export function createResponseConfigStore(options: ResponseConfigStoreOptions): IResponseConfigStore {
  const filePath = options.path;

  // Single reference swapped only after a full successful parse
  let cache: { configuration: ResponseConfiguration; mtimeMs: number } | undefined;
  let parses = 0;

  function currentMtime(): number | undefined {
    try {
      return fs.statSync(filePath).mtimeMs;
    } catch {
      return undefined;
    }
  }

  function load(forceReload = false): ResponseConfiguration {
    if (!forceReload && cache) {
      const mtime = currentMtime();
      if (mtime !== undefined && mtime <= cache.mtimeMs) {
        logger.debug("responses_cache_hit", { path: filePath });
        return cache.configuration;
      }
      logger.info("responses_source_changed", { path: filePath });
    }

    // stat before reading so a write landing mid-load is picked up next time
    const mtimeMs = currentMtime() ?? Date.now();

    let configuration: ResponseConfiguration;
    try {
      configuration = readResponseFile(filePath);
    } catch (err) {
      logger.error("responses_load_failed", {
        path: filePath,
        error: err instanceof Error ? err.message : String(err),
        keptPrevious: cache !== undefined,
      });
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to load configuration: ${String(err)}`);
    }

    cache = { configuration, mtimeMs };
    parses++;

    logger.info("responses_loaded", {
      path: filePath,
      emotions: Object.keys(configuration),
      records: Object.values(configuration).reduce((n, list) => n + list.length, 0),
    });

    return configuration;
  }

  function getRecordsFor(emotion: string): readonly QuoteRecord[] {
    if (!cache) return [];
    return Object.prototype.hasOwnProperty.call(cache.configuration, emotion)
      ? cache.configuration[emotion]
      : [];
  }

  return {
    path: filePath,
    load,

    reload() {
      logger.info("responses_force_reload", { path: filePath });
      return load(true);
    },

    refresh() {
      const previous = cache;
      try {
        load();
      } catch (err) {
        logger.warn("responses_refresh_kept_previous", {
          path: filePath,
          error: err instanceof Error ? err.message : String(err),
        });
        return false;
      }
      return cache !== previous;
    },

    getRecordsFor,

    pickRecordFor(emotion, random) {
      return pickOne(getRecordsFor(emotion), random);
    },

    isLoaded() {
      return cache !== undefined;
    },

    listEmotions() {
      return cache ? Object.keys(cache.configuration) : [];
    },

    loadedAt() {
      return cache?.mtimeMs;
    },

    loadCount() {
      return parses;
    },
  };
}
