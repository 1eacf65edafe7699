import http from "http";
import express from "express";
import type { ErrorRequestHandler } from "express";
import path from "path";
import { config } from "./lib/config.js";
import { logger } from "./lib/logger.js";
import { metrics } from "./observability/metrics.js";
import { createEmotionClassifier } from "./emotion/classifier.js";
import { createResponseConfigStore } from "./responses/config-store.js";
import { createResponseCompositor } from "./responses/compositor.js";
import { createCallSessionRegister } from "./calls/session-register.js";
import { createWebhookRouter } from "./webhooks/router.js";

async function main() {
  // 1. Response corpus (a bad file fails startup)
  const store = createResponseConfigStore({ path: path.resolve(config.responsesPath) });
  store.load();

  // 2. Core pipeline, built once and shared by every request
  const classifier = createEmotionClassifier({ keywordsPath: path.resolve(config.emotionKeywordsPath) });
  const compositor = createResponseCompositor();
  const register = createCallSessionRegister({ classifier, store, compositor });

  // 3. Express app
  const app = express();
  app.set("trust proxy", 1);
  app.use(express.json({ limit: "1mb" }));
  app.use(createWebhookRouter(register, store));

  // Malformed JSON bodies and anything else thrown past the routes
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    logger.error("http_request_failed", { error: err instanceof Error ? err.message : String(err) });
    res.status(400).json({ status: "error", message: "Invalid webhook payload" });
  };
  app.use(onError);

  const server = http.createServer(app);

  server.listen(config.port, () => {
    logger.info("server_started", {
      port: config.port,
      webhookEndpoint: "/webhook",
      healthEndpoint: "/health",
      environment: config.nodeEnv,
      callRetention: register.retention,
      emotions: store.listEmotions(),
    });

    // Uptime gauge, refreshed every 15 seconds
    setInterval(() => {
      metrics.gauge("voiceback_uptime_seconds", process.uptime());
    }, 15_000).unref();
    metrics.gauge("voiceback_uptime_seconds", process.uptime());

    // Edited response files are picked up between calls, not inside a reply
    if (config.responsesRefreshSeconds > 0) {
      setInterval(() => {
        if (store.refresh()) {
          metrics.increment("voiceback_responses_reloads_total");
        }
      }, config.responsesRefreshSeconds * 1000).unref();
    }
  });

  const shutdown = (signal: string) => {
    logger.info("server_stopping", { signal, activeCalls: register.listActive().length });
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.error("startup_failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
