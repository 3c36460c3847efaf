import { afterEach, describe, expect, it, vi } from "vitest";
import type { RawEvent } from "../types";
import { createEventCache } from "../server/lib/eventCache";
import { computeWindow, createEventFetcher, type EventFetcherOptions } from "../server/lib/eventFetcher";
import {
  AuthError,
  ConfigurationError,
  EventServiceError,
  InputValidationError,
  RateLimitError,
  TransientNetworkError,
} from "../server/lib/errors";

afterEach(() => {
  vi.restoreAllMocks();
});

const OCCURRED_AT = new Date("2025-01-19T14:30:00Z");

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function makeFetcher(overrides: Partial<EventFetcherOptions> = {}) {
  return createEventFetcher({
    baseUrl: "https://events.test/",
    authToken: "test-token",
    org: "acme",
    project: "web",
    timeoutMs: 1_000,
    retry: { maxAttempts: 3, baseDelayMs: 10, jitter: false },
    cache: createEventCache<RawEvent[]>({ maxEntries: 10 }),
    sleep: async () => undefined,
    ...overrides,
  });
}

describe("computeWindow", () => {
  it("spans windowMinutes on both sides of the reported time", () => {
    const window = computeWindow(OCCURRED_AT, 5);
    expect(window.start.toISOString()).toBe("2025-01-19T14:25:00.000Z");
    expect(window.end.toISOString()).toBe("2025-01-19T14:35:00.000Z");
  });

  it("rejects a non-positive window", () => {
    expect(() => computeWindow(OCCURRED_AT, 0)).toThrow(InputValidationError);
  });
});

describe("event fetcher", () => {
  it("queries the project events endpoint for the subject and window", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse([{ id: "evt-1" }]));

    const events = await makeFetcher().fetch("cust-42", OCCURRED_AT, 5);

    expect(events).toEqual([{ id: "evt-1" }]);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetchSpy.mock.calls[0]?.[0]));
    expect(url.origin).toBe("https://events.test");
    expect(url.pathname).toBe("/api/0/projects/acme/web/events/");
    expect(url.searchParams.get("query")).toBe("user.id:cust-42");
    expect(url.searchParams.get("start")).toBe("2025-01-19T14:25:00.000Z");
    expect(url.searchParams.get("end")).toBe("2025-01-19T14:35:00.000Z");
    expect(url.searchParams.get("full")).toBe("true");
    expect(new Headers(fetchSpy.mock.calls[0]?.[1]?.headers).get("authorization")).toBe("Bearer test-token");
  });

  it("serves repeated lookups from the cache", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse([{ id: "evt-1" }]));
    const fetcher = makeFetcher();

    const first = await fetcher.fetch("cust-42", OCCURRED_AT);
    const second = await fetcher.fetch("cust-42", OCCURRED_AT);

    expect(second).toEqual(first);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("shares one upstream call between concurrent identical lookups", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse([{ id: "evt-1" }]));
    const fetcher = makeFetcher();

    const [a, b] = await Promise.all([fetcher.fetch("cust-42", OCCURRED_AT), fetcher.fetch("cust-42", OCCURRED_AT)]);

    expect(a).toEqual(b);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("fails authentication without retrying or leaking the token", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => jsonResponse({ detail: "Invalid token" }, 401));

    const error = await makeFetcher()
      .fetch("cust-42", OCCURRED_AT)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(String(error)).not.toContain("test-token");
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("surfaces rate limits with the upstream Retry-After", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({}, 429, { "Retry-After": "17" }));

    const error = await makeFetcher()
      .fetch("cust-42", OCCURRED_AT)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterSec: 17 });
  });

  it("defaults Retry-After to 60 seconds", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({}, 429));
    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).rejects.toMatchObject({ retryAfterSec: 60 });
  });

  it("treats a missing project as zero events", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({ detail: "Not found" }, 404));
    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).resolves.toEqual([]);
  });

  it("retries server errors and returns the eventual success", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(jsonResponse({}, 502))
      .mockResolvedValueOnce(jsonResponse([{ id: "evt-9" }]));

    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).resolves.toEqual([{ id: "evt-9" }]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("gives up on persistent network failures", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));

    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).rejects.toBeInstanceOf(TransientNetworkError);
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it("does not cache failures", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse([{ id: "evt-2" }]));
    const fetcher = makeFetcher({ retry: { maxAttempts: 1, baseDelayMs: 10 } });

    await expect(fetcher.fetch("cust-42", OCCURRED_AT)).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(fetcher.fetch("cust-42", OCCURRED_AT)).resolves.toEqual([{ id: "evt-2" }]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("reports other client errors without retrying", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({}, 400));

    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).rejects.toBeInstanceOf(EventServiceError);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("keeps only object records from the payload", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse([{ id: "a" }, 3, null, "x"]));
    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).resolves.toEqual([{ id: "a" }]);
  });

  it("treats a non-list payload as zero events", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({ detail: "unexpected" }));
    await expect(makeFetcher().fetch("cust-42", OCCURRED_AT)).resolves.toEqual([]);
  });

  it("validates the subject and credentials before calling out", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch");

    await expect(makeFetcher().fetch("  ", OCCURRED_AT)).rejects.toBeInstanceOf(InputValidationError);
    await expect(makeFetcher({ authToken: undefined }).fetch("cust-42", OCCURRED_AT)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("builds deep links to events", () => {
    expect(makeFetcher().eventLink("abc123")).toBe("https://events.test/organizations/acme/issues/?project=web&query=abc123");
  });
});
