import dotenv from "dotenv";
dotenv.config();

import path from "node:path";
import type { RawEvent } from "../types";
import { createApp, type ActiveProvider } from "./app";
import type { ModelClient } from "./lib/analyzer";
import { collectSecrets, loadConfig } from "./lib/config";
import { createDemoModelClient } from "./lib/demo";
import { createEventCache } from "./lib/eventCache";
import { createEventFetcher } from "./lib/eventFetcher";
import { asMessage } from "./lib/errors";
import { createGeminiClient } from "./lib/gemini";
import { loadKnowledgeDocs } from "./lib/knowledge";
import { createLogger } from "./lib/logger";
import { createTriagePipeline } from "./lib/pipeline";
import { withTimeout } from "./lib/retry";
import { createSlackGateway, deliverSlackMessage } from "./lib/slack";
import { TaskQueue } from "./lib/taskQueue";

const RATE_BUCKET_GC_INTERVAL_MS = 60_000;
const SHUTDOWN_DRAIN_TIMEOUT_MS = 30_000;

const cfg = loadConfig();
const logger = createLogger("api", { level: cfg.logLevel, format: cfg.logFormat, secrets: collectSecrets(cfg) });

function selectModel(): { provider: ActiveProvider; model: ModelClient } {
  if (cfg.mode === "live" && cfg.geminiApiKey) {
    return {
      provider: "gemini",
      model: createGeminiClient({
        apiKey: cfg.geminiApiKey,
        model: cfg.modelAnalyze,
        timeoutMs: cfg.geminiTimeoutMs,
        logger: logger.child("gemini"),
      }),
    };
  }
  if (cfg.llmProvider === "gemini") {
    logger.warn("LLM_PROVIDER=gemini but GEMINI_API_KEY is missing; falling back to demo answers");
  }
  return { provider: "demo", model: createDemoModelClient() };
}

const { provider, model } = selectModel();

if (!cfg.appPassword) logger.warn("APP_PASSWORD not set; /api/analyze is open to anyone who can reach it");
if (!cfg.sentryAuthToken) logger.warn("SENTRY_AUTH_TOKEN not set; analyses will fail until it is configured");
if (!cfg.slackSigningSecret) logger.warn("SLACK_SIGNING_SECRET not set; /slack/commands will reject every request");

const cache = createEventCache<RawEvent[]>({ maxEntries: cfg.eventCacheMaxEntries });
const fetcher = createEventFetcher({
  baseUrl: cfg.sentryBaseUrl,
  authToken: cfg.sentryAuthToken,
  org: cfg.sentryOrg,
  project: cfg.sentryProject,
  timeoutMs: cfg.sentryTimeoutMs,
  retry: { maxAttempts: cfg.sentryRetryMaxAttempts, baseDelayMs: cfg.sentryRetryBaseDelayMs },
  cache,
  logger: logger.child("events"),
});

const knowledgeDir = path.resolve(cfg.knowledgeDir);
const knowledgeLogger = logger.child("knowledge");
const pipeline = createTriagePipeline({
  fetcher,
  model,
  loadKnowledge: () => loadKnowledgeDocs(knowledgeDir, knowledgeLogger),
  modelRetry: { maxAttempts: cfg.geminiRetryMaxAttempts, baseDelayMs: cfg.geminiRetryBaseDelayMs },
  windowMinutes: cfg.eventWindowMinutes,
  maxEvidenceChars: cfg.maxEvidenceChars,
  logger: logger.child("triage"),
});

const queue = new TaskQueue({
  concurrency: cfg.taskQueueConcurrency,
  maxPending: cfg.taskQueueMaxPending,
  logger: logger.child("queue"),
});

const slackLogger = logger.child("slack");
const gateway = createSlackGateway({
  signingSecret: cfg.slackSigningSecret,
  toleranceSec: cfg.slackTimestampToleranceSec,
  pipeline,
  queue,
  deliver: (url, message) =>
    deliverSlackMessage(url, message, { timeoutMs: cfg.slackDeliveryTimeoutMs, logger: slackLogger }),
  logger: slackLogger,
});

const { app, sweepRateBuckets } = createApp({
  cfg,
  provider,
  modelName: model.name,
  pipeline,
  gateway,
  queue,
  cache,
  logger,
});

const maintenanceTimer = setInterval(sweepRateBuckets, RATE_BUCKET_GC_INTERVAL_MS);
if (typeof maintenanceTimer.unref === "function") {
  maintenanceTimer.unref();
}

const server = app.listen(cfg.port, cfg.host, () => {
  logger.info(`listening on http://${cfg.host}:${cfg.port}`, {
    mode: cfg.mode,
    provider: cfg.llmProvider,
    activeProvider: provider,
    model: model.name,
  });
});

async function drainQueue(): Promise<void> {
  try {
    await withTimeout(queue.idle(), SHUTDOWN_DRAIN_TIMEOUT_MS, "Background task drain");
  } catch (error) {
    logger.warn("background tasks still running at exit", { error: asMessage(error), ...queue.snapshot() });
  }
}

function shutdown(signal: string): void {
  logger.info(`received ${signal}; shutting down gracefully`);
  clearInterval(maintenanceTimer);
  server.close((err) => {
    if (err) {
      logger.error("graceful shutdown failed", { error: err });
      process.exit(1);
    }
    drainQueue().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
