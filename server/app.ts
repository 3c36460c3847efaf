import { createHash, randomUUID, timingSafeEqual } from "node:crypto";
import express from "express";
import type { ServerConfig } from "./lib/config";
import type { EventCache } from "./lib/eventCache";
import { toErrorResponse, toTriageError } from "./lib/errors";
import { parseAnalyzeRequest } from "./lib/incident";
import type { Logger } from "./lib/logger";
import type { TriagePipeline } from "./lib/pipeline";
import type { SlackGateway } from "./lib/slack";
import type { TaskQueue } from "./lib/taskQueue";
import type { RawEvent } from "../types";

export type ActiveProvider = "demo" | "gemini";

export type AppDeps = {
  cfg: ServerConfig;
  provider: ActiveProvider;
  modelName: string;
  pipeline: TriagePipeline;
  gateway: SlackGateway;
  queue: TaskQueue;
  cache: EventCache<RawEvent[]>;
  logger: Logger;
};

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const ANALYZE_RATE_LIMIT = 40;
const RATE_WINDOW_MS = 60_000;
const RATE_BUCKET_MAX_SIZE = 10_000;

function nextRequestId(): string {
  return `req-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/** Constant-time match of the `X-Auth-Token` header; the gate is open when no password is set. */
export function isAuthorized(token: string | undefined, expected: string | undefined): boolean {
  if (!expected) return true;
  if (!token) return false;
  return timingSafeEqual(digest(token), digest(expected));
}

export function createApp(deps: AppDeps) {
  const { cfg, logger } = deps;
  const rateBuckets = new Map<string, { count: number; resetAt: number }>();
  const startedAt = new Date().toISOString();

  function normalizeIp(req: express.Request): string {
    return String(req.ip || req.socket.remoteAddress || "unknown").replace(/[:.]/g, "_");
  }

  function cleanExpiredRateBuckets(now = Date.now()): void {
    for (const [key, bucket] of rateBuckets.entries()) {
      if (bucket.resetAt <= now) rateBuckets.delete(key);
    }
  }

  function isRateLimited(key: string, limit: number, windowMs: number): boolean {
    const now = Date.now();
    if (rateBuckets.size > RATE_BUCKET_MAX_SIZE) cleanExpiredRateBuckets(now);

    const bucket = rateBuckets.get(key);
    if (!bucket || bucket.resetAt <= now) {
      rateBuckets.set(key, { count: 1, resetAt: now + windowMs });
      return false;
    }
    if (bucket.count >= limit) return true;
    bucket.count += 1;
    return false;
  }

  function requestIdOf(req: express.Request): string {
    return req.requestId || nextRequestId();
  }

  function sendError(req: express.Request, res: express.Response, error: unknown): express.Response {
    const requestId = requestIdOf(req);
    const e = toTriageError(error);
    const meta = { requestId, kind: e.kind, path: req.path, error: e.message };
    if (e.status >= 500) logger.error("request failed", meta);
    else logger.warn("request rejected", meta);

    const { status, body } = toErrorResponse(e, requestId);
    if (body.error.retryAfterSec) res.setHeader("retry-after", String(body.error.retryAfterSec));
    return res.status(status).json(body);
  }

  function sendPlainError(req: express.Request, res: express.Response, status: number, kind: string, message: string) {
    return res.status(status).json({ error: { kind, message, requestId: requestIdOf(req) } });
  }

  const app = express();
  app.disable("x-powered-by");
  if (cfg.trustProxy) app.set("trust proxy", true);

  app.use((req, res, next) => {
    req.requestId = String(req.headers["x-request-id"] || nextRequestId());
    res.setHeader("x-request-id", req.requestId);
    res.setHeader("cache-control", "no-store");
    res.setHeader("x-content-type-options", "nosniff");
    res.setHeader("x-frame-options", "DENY");
    res.setHeader("referrer-policy", "no-referrer");

    const started = Date.now();
    res.on("finish", () => {
      const elapsedMs = Date.now() - started;
      if (res.statusCode >= 400 || elapsedMs >= 4_000) {
        logger.warn(`${req.method} ${req.originalUrl}`, { status: res.statusCode, ms: elapsedMs, requestId: req.requestId });
      }
    });
    next();
  });

  app.use("/api", express.json({ limit: `${cfg.requestBodyLimitMb}mb` }));
  app.use("/slack", express.text({ type: "application/x-www-form-urlencoded", limit: "64kb" }));
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    const type = typeof err === "object" && err !== null && "type" in err ? err.type : undefined;
    if (type === "entity.too.large") {
      return sendPlainError(req, res, 413, "input_invalid", "Payload too large.");
    }
    if (err instanceof SyntaxError && "body" in err) {
      return sendPlainError(req, res, 400, "input_invalid", "Invalid JSON payload.");
    }
    return next(err);
  });

  app.get("/api/healthz", (req, res) => {
    res.json({
      ok: true,
      requestId: req.requestId,
      startedAt,
      serverTime: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      provider: deps.provider,
      mode: deps.provider === "demo" ? "demo" : "live",
      model: deps.modelName,
      integrations: {
        events: Boolean(cfg.sentryAuthToken && cfg.sentryOrg && cfg.sentryProject),
        slack: Boolean(cfg.slackSigningSecret),
        passwordGate: Boolean(cfg.appPassword),
      },
      limits: {
        eventWindowMinutes: cfg.eventWindowMinutes,
        maxEvidenceChars: cfg.maxEvidenceChars,
        maxDescriptionChars: cfg.maxDescriptionChars,
        geminiTimeoutMs: cfg.geminiTimeoutMs,
        geminiRetryMaxAttempts: cfg.geminiRetryMaxAttempts,
        sentryRetryMaxAttempts: cfg.sentryRetryMaxAttempts,
      },
      caches: {
        events: { enabled: deps.cache.enabled(), entries: deps.cache.size(), capacity: deps.cache.capacity() },
      },
      queue: deps.queue.snapshot(),
    });
  });

  app.post("/api/analyze", async (req, res) => {
    if (!isAuthorized(req.header("x-auth-token"), cfg.appPassword)) {
      return sendPlainError(req, res, 401, "unauthorized", "Unauthorized");
    }
    if (isRateLimited(`analyze:${normalizeIp(req)}`, ANALYZE_RATE_LIMIT, RATE_WINDOW_MS)) {
      return sendPlainError(req, res, 429, "rate_limited", "Too many analyze requests. Please slow down.");
    }

    try {
      const { report, windowMinutes } = parseAnalyzeRequest(req.body, {
        maxDescriptionChars: cfg.maxDescriptionChars,
      });
      const result = await deps.pipeline(report, { windowMinutes });
      return res.json(result);
    } catch (error) {
      return sendError(req, res, error);
    }
  });

  app.post("/slack/commands", (req, res) => {
    const rawBody = typeof req.body === "string" ? req.body : "";
    try {
      const outcome = deps.gateway.handle({
        rawBody,
        signature: String(req.headers["x-slack-signature"] || ""),
        timestamp: String(req.headers["x-slack-request-timestamp"] || ""),
      });
      const deferred = outcome.deferred;
      // Enqueue only after the ack has gone out; the task is not tied to this connection.
      if (deferred) res.once("close", () => deps.gateway.dispatch(deferred));
      return res.status(outcome.status).json(outcome.body);
    } catch (error) {
      return sendError(req, res, error);
    }
  });

  app.all("/api/*", (req, res) => sendPlainError(req, res, 404, "not_found", `Not found: ${req.path}`));

  return {
    app,
    sweepRateBuckets: () => cleanExpiredRateBuckets(),
  };
}
