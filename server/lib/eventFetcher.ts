import type { EventWindow, RawEvent } from "../../types";
import { buildEventCacheKey, type EventCache } from "./eventCache";
import {
  AuthError,
  ConfigurationError,
  EventServiceError,
  InputValidationError,
  RateLimitError,
  TransientNetworkError,
  asMessage,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import { withRetry, type RetryPolicy } from "./retry";

export type EventFetcherOptions = {
  baseUrl: string;
  authToken?: string;
  org: string;
  project: string;
  timeoutMs: number;
  retry: RetryPolicy;
  cache: EventCache<RawEvent[]>;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export interface EventFetcher {
  fetch(subjectId: string, occurredAt: Date, windowMinutes?: number): Promise<RawEvent[]>;
  endpoint(): string;
  eventLink(eventId: string): string;
}

const DEFAULT_RETRY_AFTER_SEC = 60;

export function computeWindow(occurredAt: Date, windowMinutes: number): EventWindow {
  const at = occurredAt.getTime();
  if (!Number.isFinite(at)) {
    throw new InputValidationError("occurredAt must be a valid timestamp.");
  }
  if (!Number.isFinite(windowMinutes) || windowMinutes <= 0) {
    throw new InputValidationError("windowMinutes must be a positive number.");
  }
  const spanMs = windowMinutes * 60_000;
  return { start: new Date(at - spanMs), end: new Date(at + spanMs) };
}

export function buildEventQuery(subjectId: string, window: EventWindow): URLSearchParams {
  return new URLSearchParams({
    query: `user.id:${subjectId}`,
    start: window.start.toISOString(),
    end: window.end.toISOString(),
    full: "true",
  });
}

function parseRetryAfter(value: string | null): number {
  const n = Number.parseInt(String(value || ""), 10);
  return Number.isFinite(n) && n > 0 ? n : DEFAULT_RETRY_AFTER_SEC;
}

function isRetriableFetchError(error: unknown): boolean {
  return error instanceof TransientNetworkError;
}

export function createEventFetcher(options: EventFetcherOptions): EventFetcher {
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const url = `${baseUrl}/api/0/projects/${encodeURIComponent(options.org)}/${encodeURIComponent(options.project)}/events/`;
  const inFlight = new Map<string, Promise<RawEvent[]>>();

  async function requestOnce(query: URLSearchParams): Promise<RawEvent[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    let res: Response;
    try {
      res = await fetchImpl(`${url}?${query.toString()}`, {
        method: "GET",
        headers: { Authorization: `Bearer ${options.authToken ?? ""}`, Accept: "application/json" },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransientNetworkError(`Event request timed out after ${Math.round(options.timeoutMs / 1000)}s.`);
      }
      throw new TransientNetworkError(`Network request failed while calling the event service: ${asMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`Event service rejected credentials (${res.status}).`);
    }
    if (res.status === 429) {
      const retryAfterSec = parseRetryAfter(res.headers.get("retry-after"));
      throw new RateLimitError(`Event service rate limit exceeded (retry after ${retryAfterSec}s).`, retryAfterSec);
    }
    if (res.status === 404) {
      logger.warn("event project not found; treating as zero events", { status: res.status });
      return [];
    }
    if (res.status >= 500) {
      throw new TransientNetworkError(`Event service failed (${res.status} ${res.statusText}).`);
    }
    if (!res.ok) {
      throw new EventServiceError(`Event service request failed (${res.status} ${res.statusText}).`);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (error) {
      throw new EventServiceError(`Event service returned invalid JSON: ${asMessage(error)}`);
    }
    if (!Array.isArray(payload)) return [];
    return payload.filter((item): item is RawEvent => typeof item === "object" && item !== null);
  }

  async function fetchEvents(subjectId: string, occurredAt: Date, windowMinutes = 5): Promise<RawEvent[]> {
    const subject = subjectId.trim();
    if (!subject) throw new InputValidationError("subjectId must not be empty.");
    if (!options.authToken) {
      throw new ConfigurationError("Server misconfigured: SENTRY_AUTH_TOKEN missing.");
    }

    const window = computeWindow(occurredAt, windowMinutes);
    const cacheKey = buildEventCacheKey({
      subjectId: subject,
      windowStart: window.start,
      windowEnd: window.end,
      endpoint: url,
    });

    const cached = options.cache.get(cacheKey);
    if (cached) {
      logger.debug("using cached events", { key: cacheKey.slice(0, 16), count: cached.length });
      return cached;
    }

    const pending = inFlight.get(cacheKey);
    if (pending) return pending;

    const query = buildEventQuery(subject, window);
    logger.info("fetching events", {
      subject,
      start: window.start.toISOString(),
      end: window.end.toISOString(),
    });

    const work = withRetry({
      label: "Event fetch",
      policy: options.retry,
      isRetriable: isRetriableFetchError,
      sleep: options.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        logger.warn("event fetch failed; retrying", { attempt, delayMs, error: asMessage(error) }),
      op: () => requestOnce(query),
    });
    inFlight.set(cacheKey, work);

    try {
      const events = await work;
      options.cache.set(cacheKey, events);
      logger.info("events fetched", { subject, count: events.length });
      return events;
    } finally {
      inFlight.delete(cacheKey);
    }
  }

  return {
    fetch: fetchEvents,
    endpoint: () => url,
    eventLink: (eventId) =>
      `${baseUrl}/organizations/${encodeURIComponent(options.org)}/issues/?project=${encodeURIComponent(
        options.project
      )}&query=${encodeURIComponent(eventId)}`,
  };
}
