/**
 * Voice platform webhook payload → typed WebhookEvent.
 *
 * The platform wraps events as { message: { type, call, ... } }; older
 * deployments and local test scripts post the bare { type, call, ... } form.
 * Both are accepted. Event names are normalized to the register's vocabulary.
 */

import { z } from "zod";
import type { WebhookEvent } from "../lib/types.js";

// Platforms send null for fields they have no value for
const numberHolder = z.object({ number: z.string().nullish() }).passthrough();

const callSchema = z
  .object({
    id: z.string().nullish(),
    customer: numberHolder.nullish(),
    phoneNumber: numberHolder.nullish(),
  })
  .passthrough();

const functionCallSchema = z
  .object({
    name: z.string().nullish(),
    parameters: z.union([z.record(z.unknown()), z.string()]).nullish(),
  })
  .passthrough();

const messageSchema = z
  .object({
    type: z.string().nullish(),
    status: z.string().nullish(),
    role: z.string().nullish(),
    transcriptType: z.string().nullish(),
    transcript: z.string().nullish(),
    callId: z.string().nullish(),
    call: callSchema.nullish(),
    functionCall: functionCallSchema.nullish(),
  })
  .passthrough();

const envelopeSchema = z.object({ message: messageSchema }).passthrough();

type PlatformMessage = z.infer<typeof messageSchema>;

export type ParsedWebhook =
  | { ok: true; event: WebhookEvent }
  | { ok: false; message: string };

/** Map platform event names onto the register's event types. */
export function normalizeEventType(message: PlatformMessage): string {
  const type = (message.type ?? "").trim();

  switch (type) {
    case "call.started":
      return "call-started";
    case "call.ended":
    case "end-of-call-report":
      return "call-ended";
    case "status-update":
      if (message.status === "in-progress") return "call-started";
      if (message.status === "ended") return "call-ended";
      return type;
    case "speech-update":
      if (message.status === "started") return "speech-started";
      if (message.status === "stopped") return "speech-ended";
      return type;
    case "transcript":
      if (message.role === "user" && (message.transcriptType ?? "final") === "final") return "user-utterance";
      return type;
    default:
      return type || "unknown";
  }
}

function transcriptFromParameters(
  parameters: Record<string, unknown> | string | null | undefined
): string | undefined {
  let params: unknown = parameters;
  if (typeof parameters === "string") {
    try {
      params = JSON.parse(parameters);
    } catch {
      return undefined;
    }
  }
  const parsed = z.object({ transcript: z.string() }).passthrough().safeParse(params);
  return parsed.success ? parsed.data.transcript : undefined;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseWebhookPayload(body: unknown): ParsedWebhook {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, message: "Invalid webhook payload" };
  }

  let message: PlatformMessage;
  if ("message" in body) {
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) return { ok: false, message: "Invalid webhook payload" };
    message = envelope.data.message;
  } else {
    const bare = messageSchema.safeParse(body);
    if (!bare.success) return { ok: false, message: "Invalid webhook payload" };
    message = bare.data;
  }

  const eventType = normalizeEventType(message);
  const transcript =
    transcriptFromParameters(message.functionCall?.parameters) ?? message.transcript ?? undefined;

  return {
    ok: true,
    event: {
      eventType,
      callId: nonEmpty(message.call?.id) ?? nonEmpty(message.callId),
      fromNumber: message.call?.customer?.number ?? undefined,
      toNumber: message.call?.phoneNumber?.number ?? undefined,
      transcript,
    },
  };
}
