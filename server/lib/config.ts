export type DemoMode = "demo" | "live";
export type LlmProvider = "auto" | "demo" | "gemini";
export type LogFormat = "text" | "json";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ServerConfig {
  host: string;
  port: number;
  mode: DemoMode;
  llmProvider: LlmProvider;
  trustProxy: boolean;
  requestBodyLimitMb: number;
  appPassword?: string;
  geminiApiKey?: string;
  modelAnalyze: string;
  geminiTimeoutMs: number;
  geminiRetryMaxAttempts: number;
  geminiRetryBaseDelayMs: number;
  sentryBaseUrl: string;
  sentryAuthToken?: string;
  sentryOrg: string;
  sentryProject: string;
  sentryTimeoutMs: number;
  sentryRetryMaxAttempts: number;
  sentryRetryBaseDelayMs: number;
  eventWindowMinutes: number;
  eventCacheMaxEntries: number;
  maxEvidenceChars: number;
  maxDescriptionChars: number;
  knowledgeDir: string;
  slackSigningSecret?: string;
  slackTimestampToleranceSec: number;
  slackDeliveryTimeoutMs: number;
  taskQueueConcurrency: number;
  taskQueueMaxPending: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

type IntBounds = {
  min?: number;
  max?: number;
};

function clampInt(value: number, bounds: IntBounds): number {
  let result = value;
  if (typeof bounds.min === "number") result = Math.max(bounds.min, result);
  if (typeof bounds.max === "number") result = Math.min(bounds.max, result);
  return result;
}

function readInt(name: string, fallback: number, bounds: IntBounds = {}): number {
  const v = process.env[name];
  if (!v) return clampInt(fallback, bounds);
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? clampInt(n, bounds) : clampInt(fallback, bounds);
}

function readBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  const s = String(v).trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return fallback;
}

function readSecret(name: string): string | undefined {
  return process.env[name]?.trim() || undefined;
}

function readProvider(name: string, fallback: LlmProvider): LlmProvider {
  const raw = String(process.env[name] || "").trim().toLowerCase();
  if (raw === "auto" || raw === "demo" || raw === "gemini") return raw;
  return fallback;
}

function readLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = String(process.env[name] || "").trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw;
  return fallback;
}

function readLogFormat(name: string, fallback: LogFormat): LogFormat {
  const raw = String(process.env[name] || "").trim().toLowerCase();
  if (raw === "text" || raw === "json") return raw;
  return fallback;
}

function readHost(name: string, fallback: string): string {
  const raw = String(process.env[name] || "").trim();
  if (!raw) return fallback;
  return /\s/.test(raw) ? fallback : raw;
}

function readBaseUrl(name: string, fallback: string): string {
  const raw = String(process.env[name] || "").trim();
  const value = raw || fallback;
  if (/\s/.test(value)) return fallback;
  return value.replace(/\/+$/, "");
}

export function loadConfig(): ServerConfig {
  const llmProvider = readProvider("LLM_PROVIDER", "auto");
  const geminiApiKey = readSecret("GEMINI_API_KEY");
  const mode: DemoMode = llmProvider === "demo" ? "demo" : geminiApiKey ? "live" : "demo";

  return {
    host: readHost("HOST", "127.0.0.1"),
    port: readInt("PORT", 8787, { min: 1, max: 65535 }),
    mode,
    llmProvider,
    trustProxy: readBool("TRUST_PROXY", false),
    requestBodyLimitMb: readInt("REQUEST_BODY_LIMIT_MB", 1, { min: 1, max: 10 }),
    appPassword: readSecret("APP_PASSWORD"),
    geminiApiKey,
    modelAnalyze: process.env.GEMINI_MODEL_ANALYZE?.trim() || "gemini-2.5-flash",
    geminiTimeoutMs: readInt("GEMINI_TIMEOUT_MS", 25_000, { min: 5_000, max: 180_000 }),
    geminiRetryMaxAttempts: readInt("GEMINI_RETRY_MAX_ATTEMPTS", 3, { min: 1, max: 6 }),
    geminiRetryBaseDelayMs: readInt("GEMINI_RETRY_BASE_DELAY_MS", 400, { min: 50, max: 5_000 }),
    sentryBaseUrl: readBaseUrl("SENTRY_BASE_URL", "https://sentry.io"),
    sentryAuthToken: readSecret("SENTRY_AUTH_TOKEN"),
    sentryOrg: process.env.SENTRY_ORG?.trim() || "",
    sentryProject: process.env.SENTRY_PROJECT?.trim() || "",
    sentryTimeoutMs: readInt("SENTRY_TIMEOUT_MS", 10_000, { min: 1_000, max: 60_000 }),
    sentryRetryMaxAttempts: readInt("SENTRY_RETRY_MAX_ATTEMPTS", 3, { min: 1, max: 6 }),
    sentryRetryBaseDelayMs: readInt("SENTRY_RETRY_BASE_DELAY_MS", 500, { min: 50, max: 5_000 }),
    eventWindowMinutes: readInt("EVENT_WINDOW_MINUTES", 5, { min: 1, max: 1_440 }),
    eventCacheMaxEntries: readInt("EVENT_CACHE_MAX_ENTRIES", 100, { min: 0, max: 5_000 }),
    maxEvidenceChars: readInt("MAX_EVIDENCE_CHARS", 30_000, { min: 1_000, max: 200_000 }),
    maxDescriptionChars: readInt("MAX_DESCRIPTION_CHARS", 4_000, { min: 200, max: 20_000 }),
    knowledgeDir: process.env.KNOWLEDGE_DIR?.trim() || "knowledge",
    slackSigningSecret: readSecret("SLACK_SIGNING_SECRET"),
    slackTimestampToleranceSec: readInt("SLACK_TIMESTAMP_TOLERANCE_SEC", 300, { min: 30, max: 900 }),
    slackDeliveryTimeoutMs: readInt("SLACK_DELIVERY_TIMEOUT_MS", 10_000, { min: 1_000, max: 30_000 }),
    taskQueueConcurrency: readInt("TASK_QUEUE_CONCURRENCY", 4, { min: 1, max: 32 }),
    taskQueueMaxPending: readInt("TASK_QUEUE_MAX_PENDING", 100, { min: 1, max: 5_000 }),
    logLevel: readLogLevel("LOG_LEVEL", "info"),
    logFormat: readLogFormat("LOG_FORMAT", "text"),
  };
}

/** Secret values the logger must never print. */
export function collectSecrets(cfg: ServerConfig): string[] {
  return [cfg.appPassword, cfg.geminiApiKey, cfg.sentryAuthToken, cfg.slackSigningSecret].filter(
    (v): v is string => typeof v === "string" && v.length > 0
  );
}
