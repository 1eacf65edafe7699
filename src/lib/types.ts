/**
 * Shared types for the voice relay core.
 */

export const EMOTION_CATEGORIES = [
  "anxiety",
  "sadness",
  "frustration",
  "uncertainty",
  "overwhelm",
] as const;

export type EmotionCategory = (typeof EMOTION_CATEGORIES)[number];

/** Classifier output: a normal category or the crisis override. */
export type Emotion = EmotionCategory | "crisis";

export const CRISIS = "crisis" as const;

/** Tie-break order among equally-scored categories, most specific first. */
export const EMOTION_PRIORITY: readonly EmotionCategory[] = [
  "uncertainty",
  "overwhelm",
  "frustration",
  "sadness",
  "anxiety",
];

export function isEmotionCategory(value: string): value is EmotionCategory {
  return (EMOTION_CATEGORIES as readonly string[]).includes(value);
}

/** Uniform source in [0, 1). Injected so tests can make choices deterministic. */
export type RandomSource = () => number;

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[Math.max(index, 0)];
}

export interface QuoteRecord {
  figure: string;
  contextLines: readonly string[];
  quote: string;
  encouragementLines: readonly string[];
}

export type ResponseConfiguration = Readonly<Record<string, readonly QuoteRecord[]>>;

export interface ClassificationResult {
  emotion: Emotion;
  isCrisis: boolean;
  /** Winning category's match count over the input's word count. */
  confidence: number;
  scores: Record<EmotionCategory, number>;
}

export interface ResponseSegments {
  intro: string;
  quote: string;
  conclusion: string;
}

// ── Call lifecycle ───────────────────────────────────────────────────

export type CallStatus = "active" | "ended";

export interface CallSession {
  id: string;
  startedAt: Date;
  endedAt?: Date;
  status: CallStatus;
  fromNumber?: string;
  toNumber?: string;
  durationSeconds?: number;
}

/** What happens to a session once the call ends. */
export type CallRetention = "remove" | "retain";

export type KnownEventType =
  | "assistant-request"
  | "call-started"
  | "call-ended"
  | "speech-started"
  | "speech-ended"
  | "user-utterance"
  | "function-call";

export interface WebhookEvent {
  eventType: KnownEventType | (string & {});
  callId?: string;
  fromNumber?: string;
  toNumber?: string;
  transcript?: string;
}

export interface AssistantConfig {
  firstMessage: string;
  voice: { provider: string; voiceId: string };
  endCallMessage: string;
  endCallPhrases: string[];
  recordingEnabled: boolean;
  silenceTimeoutSeconds: number;
  maxDurationSeconds: number;
}

export type WebhookResult =
  | { kind: "assistant"; assistant: AssistantConfig }
  | { kind: "reply"; result: string; segments: ResponseSegments; emotion: Emotion }
  | { kind: "status"; status: "received" }
  | { kind: "error"; status: "error"; message: string };
