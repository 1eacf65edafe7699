import { Router } from "express";
import type { Request, Response } from "express";
import { config } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { metrics } from "../observability/metrics.js";
import { APOLOGY_REPLY, type ICallSessionRegister } from "../calls/session-register.js";
import { ConfigurationError, type IResponseConfigStore } from "../responses/config-store.js";
import type { CallSession, WebhookResult } from "../lib/types.js";
import { parseWebhookPayload } from "./payload.js";

const VERSION = "0.1.0";

/** Shape the register's result the way the voice platform expects it. */
export function toResponseBody(result: WebhookResult): { status: number; body: Record<string, unknown> } {
  switch (result.kind) {
    case "assistant":
      return { status: 200, body: { assistant: result.assistant } };
    case "reply":
      return { status: 200, body: { result: result.result } };
    case "status":
      return { status: 200, body: { status: result.status } };
    case "error":
      return { status: 400, body: { status: "error", message: result.message } };
  }
}

function serializeSession(session: CallSession): Record<string, unknown> {
  return {
    id: session.id,
    status: session.status,
    startedAt: session.startedAt.toISOString(),
    endedAt: session.endedAt?.toISOString(),
    fromNumber: session.fromNumber,
    toNumber: session.toNumber,
    durationSeconds: session.durationSeconds,
  };
}

export function createWebhookRouter(register: ICallSessionRegister, store: IResponseConfigStore): Router {
  const router = Router();

  // Liveness probe
  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      uptime: process.uptime(),
      version: VERSION,
      environment: config.nodeEnv,
      responsesLoaded: store.isLoaded(),
      emotions: store.listEmotions(),
      activeCalls: register.listActive().length,
    });
  });

  router.get("/calls", (_req: Request, res: Response) => {
    res.json({ calls: register.listActive().map(serializeSession) });
  });

  router.get("/metrics", (_req: Request, res: Response) => {
    res.type("text/plain").send(metrics.getPrometheusText());
  });

  // Voice platform webhook, every call event lands here
  router.post("/webhook", (req: Request, res: Response) => {
    const parsed = parseWebhookPayload(req.body);

    if (!parsed.ok) {
      logger.warn("webhook_invalid_payload", { reason: parsed.message });
      res.status(400).json({ status: "error", message: parsed.message });
      return;
    }

    try {
      const { status, body } = toResponseBody(register.handleEvent(parsed.event));
      res.status(status).json(body);
    } catch (err) {
      // The register does not throw; answer the caller anyway if it ever does
      logger.error("webhook_dispatch_failed", { error: String(err), eventType: parsed.event.eventType });
      res.status(200).json({ result: APOLOGY_REPLY });
    }
  });

  // Re-read the response corpus; a bad file keeps the previous corpus in service
  router.post("/admin/reload-responses", (_req: Request, res: Response) => {
    try {
      store.reload();
      metrics.increment("voiceback_responses_reloads_total");
      res.json({ status: "ok", emotions: store.listEmotions() });
    } catch (err) {
      const message = err instanceof ConfigurationError ? err.message : "Reload failed";
      res.status(500).json({ status: "error", message, emotions: store.listEmotions() });
    }
  });

  return router;
}
