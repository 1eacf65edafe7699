import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.toLowerCase() === "true");

const configSchema = z.object({
  // Server
  port: z.coerce.number().default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["debug", "info", "warn", "error", "critical"]).optional(),

  // Response corpus
  responsesPath: z.string().default("config/responses.json"),
  emotionKeywordsPath: z.string().default("data/emotion-keywords.json"),
  // Seconds between checks for an edited response file; 0 turns polling off
  responsesRefreshSeconds: z.coerce.number().int().nonnegative().default(30),

  // Crisis detection overrides (JSON array or comma-separated list)
  crisisKeywords: z.string().optional(),
  crisisKeywordsFile: z.string().optional(),

  // Classification
  defaultEmotion: z
    .enum(["anxiety", "sadness", "frustration", "uncertainty", "overwhelm"])
    .default("anxiety"),

  // Call bookkeeping: "remove" drops ended calls, "retain" keeps them with status=ended
  callRetention: z.enum(["remove", "retain"]).default("remove"),

  // Voice delivery
  emotionResponsesEnabled: booleanFlag("true"),
  voiceDefaultGreeting: z
    .string()
    .default("Hello, I'm here to listen. How are you feeling today?"),
  voiceProvider: z.string().default("openai"),
  voiceId: z.string().default("alloy"),
  silenceTimeoutSeconds: z.coerce.number().int().positive().default(30),
  maxDurationSeconds: z.coerce.number().int().positive().default(300),
});

function loadConfig() {
  const raw = {
    port: process.env.PORT,
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL?.toLowerCase(),
    responsesPath: process.env.RESPONSES_PATH,
    emotionKeywordsPath: process.env.EMOTION_KEYWORDS_PATH,
    responsesRefreshSeconds: process.env.RESPONSES_REFRESH_SECONDS,
    crisisKeywords: process.env.CRISIS_KEYWORDS,
    crisisKeywordsFile: process.env.CRISIS_KEYWORDS_FILE,
    defaultEmotion: process.env.DEFAULT_EMOTION,
    callRetention: process.env.CALL_RETENTION,
    emotionResponsesEnabled: process.env.EMOTION_RESPONSES_ENABLED,
    voiceDefaultGreeting: process.env.VOICE_DEFAULT_GREETING,
    voiceProvider: process.env.VOICE_PROVIDER,
    voiceId: process.env.VOICE_ID,
    silenceTimeoutSeconds: process.env.SILENCE_TIMEOUT_SECONDS,
    maxDurationSeconds: process.env.MAX_DURATION_SECONDS,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    console.error("Invalid configuration:", result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
