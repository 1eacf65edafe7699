/**
 * Call session register: the single owner of live call state.
 *
 * Built once at startup and handed to the webhook router. Every operation
 * is synchronous, so events for one call are applied in the order they
 * arrive and never interleave; calls for different ids only share the
 * map mutation itself.
 *
 * Retention policy ("remove" | "retain") decides whether an ended call
 * leaves the map or stays in it with status=ended and a duration.
 */

import { config } from "../lib/config.js";
import { logger, truncateForLog } from "../lib/logger.js";
import { metrics } from "../observability/metrics.js";
import type { IEmotionClassifier } from "../emotion/classifier.js";
import type { IResponseConfigStore } from "../responses/config-store.js";
import { buildDisclaimer, joinSegments, type IResponseCompositor } from "../responses/compositor.js";
import {
  CRISIS,
  type AssistantConfig,
  type CallRetention,
  type CallSession,
  type Emotion,
  type RandomSource,
  type ResponseSegments,
  type WebhookEvent,
  type WebhookResult,
} from "../lib/types.js";

export const APOLOGY_REPLY =
  "I'm sorry, I'm having trouble understanding right now. You're not alone, and I'm glad you called. " +
  "Thank you for calling Voiceback.";

export const END_CALL_PHRASES = ["goodbye", "thank you", "end call", "bye"];

export interface CallSessionRegisterOptions {
  classifier: IEmotionClassifier;
  store: IResponseConfigStore;
  compositor: IResponseCompositor;
  retention?: CallRetention;
  /** When false, call setup always answers with the fixed greeting. */
  emotionResponses?: boolean;
  greeting?: string;
  voice?: { provider: string; voiceId: string };
  silenceTimeoutSeconds?: number;
  maxDurationSeconds?: number;
  clock?: () => Date;
  random?: RandomSource;
}

export interface SpokenReply {
  result: string;
  segments: ResponseSegments;
  emotion: Emotion;
}

export interface ICallSessionRegister {
  handleEvent(event: WebhookEvent): WebhookResult;
  onAssistantRequestOrCallStarted(
    callId: string,
    fromNumber?: string,
    toNumber?: string,
    transcript?: string
  ): WebhookResult;
  onCallEnded(callId: string): WebhookResult;
  onUserUtterance(callId: string, transcript: string | undefined): WebhookResult;
  onSpeechStarted(callId: string): WebhookResult;
  onSpeechEnded(callId: string): WebhookResult;
  listActive(): CallSession[];
  listAll(): CallSession[];
  getSession(callId: string): CallSession | undefined;
  size(): number;
  readonly retention: CallRetention;
}

const RECEIVED: WebhookResult = { kind: "status", status: "received" };

function copySession(session: CallSession): CallSession {
  return {
    ...session,
    startedAt: new Date(session.startedAt.getTime()),
    endedAt: session.endedAt ? new Date(session.endedAt.getTime()) : undefined,
  };
}

export function createCallSessionRegister(options: CallSessionRegisterOptions): ICallSessionRegister {
  const { classifier, store, compositor } = options;
  const retention = options.retention ?? config.callRetention;
  const emotionResponses = options.emotionResponses ?? config.emotionResponsesEnabled;
  const greeting = options.greeting ?? config.voiceDefaultGreeting;
  const voice = options.voice ?? { provider: config.voiceProvider, voiceId: config.voiceId };
  const silenceTimeoutSeconds = options.silenceTimeoutSeconds ?? config.silenceTimeoutSeconds;
  const maxDurationSeconds = options.maxDurationSeconds ?? config.maxDurationSeconds;
  const clock = options.clock ?? (() => new Date());
  const random = options.random ?? Math.random;

  const sessions = new Map<string, CallSession>();

  function publishActiveGauge(): void {
    let active = 0;
    for (const s of sessions.values()) {
      if (s.status === "active") active++;
    }
    metrics.gauge("voiceback_active_calls", active);
  }

  function buildAssistant(firstMessage: string): AssistantConfig {
    return {
      firstMessage,
      voice: { ...voice },
      endCallMessage: buildDisclaimer().trim(),
      endCallPhrases: [...END_CALL_PHRASES],
      recordingEnabled: false,
      silenceTimeoutSeconds,
      maxDurationSeconds,
    };
  }

  /** classify → corpus lookup (skipped for crisis) → compose. */
  function speak(transcript: string | undefined): SpokenReply {
    const emotion = classifier.classify(transcript);
    const record = emotion === CRISIS ? undefined : store.pickRecordFor(emotion, random);
    const segments = compositor.composeSegments(emotion, record, transcript);
    metrics.increment("voiceback_emotions_total", { emotion });
    return { result: joinSegments(segments), segments, emotion };
  }

  function onAssistantRequestOrCallStarted(
    callId: string,
    fromNumber?: string,
    toNumber?: string,
    transcript?: string
  ): WebhookResult {
    const existing = sessions.get(callId);

    if (existing && existing.status === "active") {
      // The platform sends both assistant-request and call-started for one call
      existing.fromNumber = existing.fromNumber ?? fromNumber;
      existing.toNumber = existing.toNumber ?? toNumber;
      logger.info("call_session_refreshed", { callId });
    } else {
      sessions.set(callId, {
        id: callId,
        startedAt: clock(),
        status: "active",
        fromNumber,
        toNumber,
      });
      logger.info("call_session_started", { callId, from: fromNumber, to: toNumber });
    }
    publishActiveGauge();

    let firstMessage = greeting;
    if (emotionResponses && transcript && transcript.trim()) {
      try {
        firstMessage = speak(transcript).result;
      } catch (err) {
        logger.error("call_setup_reply_failed", { callId, error: String(err) });
      }
    }

    return { kind: "assistant", assistant: buildAssistant(firstMessage) };
  }

  function onCallEnded(callId: string): WebhookResult {
    const session = sessions.get(callId);

    if (!session) {
      logger.warn("call_end_unknown", { callId });
      return RECEIVED;
    }

    if (session.status === "ended") {
      logger.info("call_end_duplicate", { callId });
      return RECEIVED;
    }

    const endedAt = clock();
    session.endedAt = endedAt;
    session.status = "ended";
    session.durationSeconds = (endedAt.getTime() - session.startedAt.getTime()) / 1000;

    if (retention === "remove") {
      sessions.delete(callId);
    }
    publishActiveGauge();

    logger.info("call_ended", {
      callId,
      durationSeconds: Number(session.durationSeconds.toFixed(2)),
      retention,
    });

    return RECEIVED;
  }

  function onUserUtterance(callId: string, transcript: string | undefined): WebhookResult {
    if (!sessions.has(callId)) {
      logger.warn("utterance_unknown_call", { callId });
    }

    logger.info("utterance_received", { callId, transcript: truncateForLog(transcript ?? "") });

    try {
      const reply = speak(transcript);
      logger.info("utterance_replied", {
        callId,
        emotion: reply.emotion,
        response: truncateForLog(reply.result),
      });
      return { kind: "reply", ...reply };
    } catch (err) {
      metrics.increment("voiceback_utterance_failures_total");
      logger.error("utterance_failed", { callId, error: err instanceof Error ? err.message : String(err) });
      return {
        kind: "reply",
        result: APOLOGY_REPLY,
        segments: { intro: APOLOGY_REPLY, quote: "", conclusion: "" },
        emotion: classifier.defaultEmotion,
      };
    }
  }

  function onSpeechStarted(callId: string): WebhookResult {
    logger.debug("speech_started", { callId });
    return RECEIVED;
  }

  function onSpeechEnded(callId: string): WebhookResult {
    logger.debug("speech_ended", { callId });
    return RECEIVED;
  }

  function route(event: WebhookEvent & { callId: string }): WebhookResult {
    switch (event.eventType) {
      case "assistant-request":
      case "call-started":
        return onAssistantRequestOrCallStarted(event.callId, event.fromNumber, event.toNumber, event.transcript);
      case "call-ended":
        return onCallEnded(event.callId);
      case "user-utterance":
      case "function-call":
        return onUserUtterance(event.callId, event.transcript);
      case "speech-started":
        return onSpeechStarted(event.callId);
      case "speech-ended":
        return onSpeechEnded(event.callId);
      default:
        logger.info("webhook_unhandled_type", { eventType: event.eventType, callId: event.callId });
        return RECEIVED;
    }
  }

  return {
    retention,

    handleEvent(event) {
      const callId = event.callId?.trim();
      if (!callId) {
        logger.warn("webhook_missing_call_id", { eventType: event.eventType });
        return { kind: "error", status: "error", message: "Missing call ID" };
      }

      metrics.increment("voiceback_webhook_events_total", { type: event.eventType || "unknown" });
      logger.info("webhook_event", { eventType: event.eventType, callId });

      try {
        return route({ ...event, callId });
      } catch (err) {
        logger.error("webhook_event_failed", {
          eventType: event.eventType,
          callId,
          error: err instanceof Error ? err.message : String(err),
        });
        return { kind: "error", status: "error", message: "Webhook processing failed" };
      }
    },

    onAssistantRequestOrCallStarted,
    onCallEnded,
    onUserUtterance,
    onSpeechStarted,
    onSpeechEnded,

    listActive() {
      return [...sessions.values()].filter((s) => s.status === "active").map(copySession);
    },

    listAll() {
      return [...sessions.values()].map(copySession);
    },

    getSession(callId) {
      const session = sessions.get(callId);
      return session ? copySession(session) : undefined;
    },

    size() {
      return sessions.size;
    },
  };
}
