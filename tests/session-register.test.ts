/**
 * Dry test for the call session register.
 *
 * Tests:
 * 1. Call setup creates one active session and returns the assistant config
 * 2. A second setup event for the same call only refreshes it
 * 3. Utterances get the composed reply (standard and crisis)
 * 4. Call end under "remove" and "retain" retention
 * 5. Unknown / duplicate call ends, missing call ids, unknown event types
 * 6. Snapshots are copies
 * 7. Emotion-aware first message
 * 8. A failing classifier yields the apology reply
 *
 * Prerequisites: None (fake clock, shipped corpus)
 * Usage: npx tsx tests/session-register.test.ts
 */

import path from "path";
import { fileURLToPath } from "url";
import { setLogLevel } from "../src/lib/logger.js";
import { metrics } from "../src/observability/metrics.js";
import type { CallRetention, WebhookResult } from "../src/lib/types.js";
import { DEFAULT_CRISIS_KEYWORDS } from "../src/emotion/crisis-keywords.js";
import {
  createEmotionClassifier,
  loadEmotionKeywordTable,
  type IEmotionClassifier,
} from "../src/emotion/classifier.js";
import { createResponseConfigStore } from "../src/responses/config-store.js";
import { CRISIS_SCRIPT, createResponseCompositor } from "../src/responses/compositor.js";
import {
  APOLOGY_REPLY,
  END_CALL_PHRASES,
  createCallSessionRegister,
} from "../src/calls/session-register.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.join(__dirname, "..");

let passed = 0;
let failed = 0;

function assert(condition: boolean, label: string) {
  if (condition) {
    console.log(`  ✓ ${label}`);
    passed++;
  } else {
    console.error(`  ✗ ${label}`);
    failed++;
  }
}

const DISCLAIMER =
  " Thank you for calling Voiceback. Please remember, this service offers inspiration, not professional advice. Goodbye.";
const GREETING = "Hello, test caller.";
const SENECA_REPLY =
  "It sounds like you're feeling anxiety. That's completely understandable. " +
  "You remind me of Seneca, who advised an emperor while living under constant threat of exile and death. " +
  "[pause] 'We suffer more often in imagination than in reality.' " +
  "Most of what you fear may never arrive, and you can meet today as it comes." +
  DISCLAIMER;

function isReceived(result: WebhookResult): boolean {
  return result.kind === "status" && result.status === "received";
}

const classifier = createEmotionClassifier({
  keywordTable: loadEmotionKeywordTable(path.join(ROOT, "data", "emotion-keywords.json")),
  crisisKeywords: DEFAULT_CRISIS_KEYWORDS,
  defaultEmotion: "anxiety",
});
const store = createResponseConfigStore({ path: path.join(ROOT, "config", "responses.json") });
store.load();
const compositor = createResponseCompositor({ random: () => 0 });

let now = new Date("2024-03-01T10:00:00.000Z").getTime();
const clock = () => new Date(now);

function makeRegister(retention: CallRetention, emotionResponses = false, brokenClassifier?: IEmotionClassifier) {
  return createCallSessionRegister({
    classifier: brokenClassifier ?? classifier,
    store,
    compositor,
    retention,
    emotionResponses,
    greeting: GREETING,
    voice: { provider: "openai", voiceId: "alloy" },
    silenceTimeoutSeconds: 30,
    maxDurationSeconds: 300,
    clock,
    random: () => 0,
  });
}

async function main() {
  console.log("\n=== Call session register tests ===\n");
  setLogLevel("critical");
  metrics.resetMetrics();

  // ------------------------------------------------------------------
  // 1–2. Call setup
  // ------------------------------------------------------------------
  console.log("Test: call setup");
  {
    const register = makeRegister("remove");
    const startedAt = now;
    const result = register.handleEvent({
      eventType: "assistant-request",
      callId: "call-1",
      fromNumber: "+15550000001",
      toNumber: "+15550000002",
    });

    assert(result.kind === "assistant", "assistant-request → assistant config");
    if (result.kind === "assistant") {
      const a = result.assistant;
      assert(a.firstMessage === GREETING, "first message is the greeting");
      assert(a.endCallMessage === DISCLAIMER.trim(), "end-call message is the disclaimer");
      assert(a.endCallPhrases.join(",") === END_CALL_PHRASES.join(","), "end-call phrases");
      assert(a.recordingEnabled === false, "recording disabled");
      assert(a.silenceTimeoutSeconds === 30 && a.maxDurationSeconds === 300, "timeouts");
      assert(a.voice.provider === "openai" && a.voice.voiceId === "alloy", "voice settings");
    }

    const session = register.getSession("call-1");
    assert(session?.status === "active", "session is active");
    assert(session?.startedAt.getTime() === startedAt, "startedAt from the clock");
    assert(session?.fromNumber === "+15550000001", "caller number recorded");
    assert(metrics.getGauge("voiceback_active_calls") === 1, "active gauge = 1");

    now += 5_000;
    const again = register.handleEvent({ eventType: "call-started", callId: "call-1" });
    assert(again.kind === "assistant", "call-started → assistant config");
    assert(register.size() === 1, "still one session");
    assert(register.getSession("call-1")?.startedAt.getTime() === startedAt, "startedAt unchanged");
    assert(register.getSession("call-1")?.fromNumber === "+15550000001", "numbers kept");
    assert(
      metrics.getCounter("voiceback_webhook_events_total", { type: "assistant-request" }) === 1 &&
        metrics.getCounter("voiceback_webhook_events_total", { type: "call-started" }) === 1,
      "events counted by type"
    );
  }

  // ------------------------------------------------------------------
  // 3. Utterances
  // ------------------------------------------------------------------
  console.log("\nTest: utterances");
  {
    const register = makeRegister("remove");
    register.handleEvent({ eventType: "call-started", callId: "call-2" });

    const reply = register.handleEvent({
      eventType: "user-utterance",
      callId: "call-2",
      transcript: "I'm really anxious about my interview tomorrow",
    });
    assert(reply.kind === "reply", "utterance → reply");
    if (reply.kind === "reply") {
      assert(reply.emotion === "anxiety", "classified as anxiety");
      assert(reply.result === SENECA_REPLY, "exact composed reply");
      assert(reply.segments.quote === "We suffer more often in imagination than in reality.", "quote segment");
    }

    const viaFunction = register.handleEvent({
      eventType: "function-call",
      callId: "call-2",
      transcript: "I'm really anxious about my interview tomorrow",
    });
    assert(viaFunction.kind === "reply" && viaFunction.result === SENECA_REPLY, "function-call handled like an utterance");

    const crisis = register.handleEvent({
      eventType: "user-utterance",
      callId: "call-2",
      transcript: "I want to kill myself",
    });
    assert(crisis.kind === "reply" && crisis.result === CRISIS_SCRIPT, "crisis → safety script");
    assert(crisis.kind === "reply" && crisis.emotion === "crisis", "crisis emotion reported");
    assert(metrics.getCounter("voiceback_emotions_total", { emotion: "crisis" }) === 1, "crisis reply counted");

    const stranger = register.onUserUtterance("call-unknown", "I feel so lonely");
    assert(stranger.kind === "reply" && stranger.emotion === "sadness", "utterance for unknown call still answered");
    assert(register.getSession("call-unknown") === undefined, "utterance does not create a session");

    const silent = register.onUserUtterance("call-2", undefined);
    assert(silent.kind === "reply" && silent.emotion === "anxiety", "empty utterance → default emotion");
    assert(silent.kind === "reply" && silent.result === SENECA_REPLY, "empty utterance → default reply");
  }

  // ------------------------------------------------------------------
  // 4. Call end and retention
  // ------------------------------------------------------------------
  console.log("\nTest: call end under each retention policy");
  {
    const removing = makeRegister("remove");
    removing.handleEvent({ eventType: "call-started", callId: "call-3" });
    now += 90_500;
    const ended = removing.handleEvent({ eventType: "call-ended", callId: "call-3" });
    assert(isReceived(ended), "call-ended → received");
    assert(removing.getSession("call-3") === undefined, "remove: session dropped");
    assert(removing.size() === 0, "remove: register empty");
    assert(removing.retention === "remove", "retention exposed");
    assert(metrics.getGauge("voiceback_active_calls") === 0, "active gauge back to 0");

    const retaining = makeRegister("retain");
    const startedAt = now;
    retaining.handleEvent({ eventType: "call-started", callId: "call-4" });
    retaining.handleEvent({ eventType: "call-started", callId: "call-5" });
    now += 90_500;
    retaining.handleEvent({ eventType: "call-ended", callId: "call-4" });

    const kept = retaining.getSession("call-4");
    assert(kept?.status === "ended", "retain: status ended");
    assert(kept?.durationSeconds === 90.5, "retain: duration 90.5 s");
    assert(kept?.endedAt?.getTime() === startedAt + 90_500, "retain: endedAt from the clock");
    assert(retaining.size() === 2, "retain: session kept");
    assert(retaining.listActive().map((s) => s.id).join(",") === "call-5", "listActive excludes ended calls");
    assert(retaining.listAll().length === 2, "listAll includes ended calls");

    now += 10_000;
    const duplicate = retaining.handleEvent({ eventType: "call-ended", callId: "call-4" });
    assert(isReceived(duplicate), "duplicate end → received");
    assert(retaining.getSession("call-4")?.durationSeconds === 90.5, "duplicate end leaves duration alone");

    const restarted = retaining.handleEvent({ eventType: "call-started", callId: "call-4" });
    assert(restarted.kind === "assistant", "ended id can start again");
    assert(retaining.getSession("call-4")?.status === "active", "restarted session active");
    assert(retaining.getSession("call-4")?.durationSeconds === undefined, "restarted session has no duration");
  }

  // ------------------------------------------------------------------
  // 5. Edge events
  // ------------------------------------------------------------------
  console.log("\nTest: edge events");
  {
    const register = makeRegister("remove");
    assert(isReceived(register.handleEvent({ eventType: "call-ended", callId: "never-seen" })), "unknown call end → received");
    assert(register.size() === 0, "unknown call end changes nothing");

    const noId = register.handleEvent({ eventType: "call-started" });
    assert(noId.kind === "error" && noId.message === "Missing call ID", "missing call id → error");
    const blankId = register.handleEvent({ eventType: "call-started", callId: "   " });
    assert(blankId.kind === "error" && blankId.message === "Missing call ID", "blank call id → error");
    assert(register.size() === 0, "no session for a missing id");

    register.handleEvent({ eventType: "call-started", callId: "call-6" });
    assert(isReceived(register.handleEvent({ eventType: "speech-started", callId: "call-6" })), "speech-started → received");
    assert(isReceived(register.handleEvent({ eventType: "speech-ended", callId: "call-6" })), "speech-ended → received");
    assert(isReceived(register.handleEvent({ eventType: "hang", callId: "call-7" })), "unknown type → received");
    assert(register.getSession("call-7") === undefined, "unknown type creates no session");
    assert(register.size() === 1, "only call-6 registered");
  }

  // ------------------------------------------------------------------
  // 6. Snapshots
  // ------------------------------------------------------------------
  console.log("\nTest: snapshots are copies");
  {
    const register = makeRegister("retain");
    register.handleEvent({ eventType: "call-started", callId: "call-8" });
    const snapshot = register.getSession("call-8");
    if (snapshot) {
      snapshot.status = "ended";
      snapshot.startedAt.setTime(0);
    }
    const listed = register.listActive()[0];
    listed.fromNumber = "+19999999999";

    const fresh = register.getSession("call-8");
    assert(fresh?.status === "active", "status unaffected by snapshot mutation");
    assert(fresh?.startedAt.getTime() !== 0, "startedAt unaffected by snapshot mutation");
    assert(fresh?.fromNumber === undefined, "listActive entries are copies");
  }

  // ------------------------------------------------------------------
  // 7. Emotion-aware first message
  // ------------------------------------------------------------------
  console.log("\nTest: emotion-aware first message");
  {
    const register = makeRegister("remove", true);
    const withText = register.handleEvent({
      eventType: "assistant-request",
      callId: "call-9",
      transcript: "I'm really anxious about my interview tomorrow",
    });
    assert(withText.kind === "assistant" && withText.assistant.firstMessage === SENECA_REPLY, "transcript → composed first message");

    const withoutText = register.handleEvent({ eventType: "assistant-request", callId: "call-10" });
    assert(withoutText.kind === "assistant" && withoutText.assistant.firstMessage === GREETING, "no transcript → greeting");

    const disabled = makeRegister("remove", false).handleEvent({
      eventType: "assistant-request",
      callId: "call-11",
      transcript: "I'm really anxious about my interview tomorrow",
    });
    assert(disabled.kind === "assistant" && disabled.assistant.firstMessage === GREETING, "feature off → greeting");
  }

  // ------------------------------------------------------------------
  // 8. Failing classifier
  // ------------------------------------------------------------------
  console.log("\nTest: classifier failure");
  {
    const broken: IEmotionClassifier = {
      defaultEmotion: "sadness",
      classify() {
        throw new Error("keyword table unavailable");
      },
      classifyWithConfidence() {
        throw new Error("keyword table unavailable");
      },
      isCrisis() {
        return false;
      },
      supportedEmotions() {
        return [];
      },
      crisisKeywords() {
        return [];
      },
    };

    metrics.resetMetrics();
    const register = makeRegister("remove", true, broken);
    const reply = register.handleEvent({ eventType: "user-utterance", callId: "call-12", transcript: "hello" });
    assert(reply.kind === "reply" && reply.result === APOLOGY_REPLY, "apology reply");
    assert(reply.kind === "reply" && reply.emotion === "sadness", "apology reports the default emotion");
    assert(metrics.getCounter("voiceback_utterance_failures_total") === 1, "failure counted");
    assert(APOLOGY_REPLY.includes("You're not alone"), "apology is supportive");

    const setup = register.handleEvent({ eventType: "assistant-request", callId: "call-13", transcript: "hello" });
    assert(setup.kind === "assistant" && setup.assistant.firstMessage === GREETING, "setup falls back to greeting");
    assert(register.getSession("call-13")?.status === "active", "session still created");
    metrics.resetMetrics();
  }

  console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);
  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error("Test runner error:", err);
  process.exit(1);
});
