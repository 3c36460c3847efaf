import type { LogFormat, LogLevel } from "./config";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  secrets?: string[];
  sink?: (level: LogLevel, line: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACTIONS: [RegExp, string][] = [
  [/Bearer\s+[^\s,"'}]+/gi, "Bearer ***"],
  [/\b(token|password|secret|api[_-]?key|authorization)(["']?\s*[:=]\s*["']?)[^\s,"'}&]+/gi, "$1$2***"],
  [/\bv0=[0-9a-f]{16,}/gi, "v0=***"],
];

export function redactSecrets(text: string, secrets: string[] = []): string {
  let out = text;
  for (const secret of secrets) {
    if (secret.length < 4) continue;
    out = out.split(secret).join("***");
  }
  for (const [pattern, replacement] of REDACTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

function describeValue(value: unknown): string {
  if (value instanceof Error) return value.message || value.name;
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function consoleSink(level: LogLevel, line: string): void {
  /* eslint-disable no-console */
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
  /* eslint-enable no-console */
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const format = options.format ?? "text";
  const secrets = options.secrets ?? [];
  const sink = options.sink ?? consoleSink;

  function emit(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < threshold) return;

    let line: string;
    if (format === "json") {
      const fields: LogMeta = {};
      for (const [key, value] of Object.entries(meta ?? {})) {
        fields[key] = value instanceof Error ? value.message : value;
      }
      line = JSON.stringify({ level, scope, message, ...fields, timestamp: new Date().toISOString() });
    } else {
      const pairs = Object.entries(meta ?? {}).map(([key, value]) => `${key}=${describeValue(value)}`);
      line = [`[${scope}]`, message, ...pairs].join(" ");
    }
    sink(level, redactSecrets(line, secrets));
  }

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

/** Logger that drops everything; handy default for library callers. */
export const silentLogger: Logger = createLogger("silent", { sink: () => undefined });
