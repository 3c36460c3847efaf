import { describe, expect, it, vi } from "vitest";
import type { FormattedEvidence, IncidentReport } from "../types";
import {
  EXPECTED_CAUSES,
  GAP_CAUSE,
  ModelProviderError,
  analyzeIncident,
  buildUserPrompt,
  isRetriableProviderError,
  type ModelClient,
} from "../server/lib/analyzer";
import { NO_EVENTS_TEXT } from "../server/lib/eventFormatter";
import {
  AnalysisError,
  InputValidationError,
  ProviderUnavailableError,
  ResponseFormatError,
} from "../server/lib/errors";
import { createLogger } from "../server/lib/logger";
import { TimeoutError } from "../server/lib/retry";

const report: IncidentReport = {
  description: "Checkout shows a blank page",
  occurredAt: new Date("2025-01-19T14:30:00Z"),
  subjectId: "cust-42",
};

const knowledge = { workflow: "Checkout recalculates totals.", knownErrors: "card_declined means the bank refused." };

const oneEvent: FormattedEvidence = {
  text: "Event 1:\n- Time: 2025-01-19T14:29:58Z\n- Error: TypeError\n- Link: https://events.test/e/evt-1",
  links: ["https://events.test/e/evt-1"],
};

function modelOutput(causeCount: number, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    causes: Array.from({ length: causeCount }, (_, i) => ({
      rank: i + 1,
      cause: `Cause ${i + 1}`,
      explanation: `Why ${i + 1}`,
      confidence: "High",
    })),
    suggested_response: "We found the problem and are fixing it.",
    logs_summary: "One TypeError in the cart.",
    ...overrides,
  });
}

function stubModel(...replies: (string | Error)[]) {
  const generate = vi.fn<ModelClient["generate"]>();
  for (const reply of replies) {
    if (reply instanceof Error) generate.mockRejectedValueOnce(reply);
    else generate.mockResolvedValueOnce(reply);
  }
  const model: ModelClient = { name: "stub", generate };
  return { model, generate };
}

function run(model: ModelClient, evidence = oneEvent, eventsFound = 1) {
  return analyzeIncident({
    report,
    evidence,
    eventsFound,
    knowledge,
    model,
    retry: { maxAttempts: 3, baseDelayMs: 1, jitter: false },
    sleep: async () => undefined,
  });
}

describe("analyzeIncident", () => {
  it("returns three ranked causes with the evidence links and event count", async () => {
    const { model } = stubModel(modelOutput(3));

    const result = await run(model);

    expect(result.causes).toEqual([
      { rank: 1, cause: "Cause 1", explanation: "Why 1", confidence: "high" },
      { rank: 2, cause: "Cause 2", explanation: "Why 2", confidence: "high" },
      { rank: 3, cause: "Cause 3", explanation: "Why 3", confidence: "high" },
    ]);
    expect(result.suggestedReply).toBe("We found the problem and are fixing it.");
    expect(result.evidenceSummary).toBe("One TypeError in the cart.");
    expect(result.evidenceLinks).toEqual(["https://events.test/e/evt-1"]);
    expect(result.eventsFound).toBe(1);
  });

  it("always returns exactly three causes", async () => {
    for (const count of [0, 1, 2, 5, 10]) {
      const { model } = stubModel(modelOutput(count));
      const result = await run(model);
      expect(result.causes).toHaveLength(EXPECTED_CAUSES);
    }
  });

  it("fills missing slots with explicit gap entries", async () => {
    const { model } = stubModel(modelOutput(1));

    const result = await run(model);

    expect(result.causes[1]).toEqual({ rank: 2, ...GAP_CAUSE });
    expect(result.causes[2]).toEqual({ rank: 3, ...GAP_CAUSE });
  });

  it("keeps the first three when the model returns more", async () => {
    const { model } = stubModel(modelOutput(5));
    const result = await run(model);
    expect(result.causes.map((c) => c.cause)).toEqual(["Cause 1", "Cause 2", "Cause 3"]);
  });

  it("keeps unknown confidence values and warns", async () => {
    const lines: string[] = [];
    const logger = createLogger("test", { sink: (_level, line) => lines.push(line) });
    const { model } = stubModel(
      JSON.stringify({
        causes: [
          { rank: 1, cause: "A", explanation: "a", confidence: "certain" },
          { rank: "first", cause: "B", explanation: "b", confidence: "LOW" },
          { rank: 3, cause: "C", explanation: "c", confidence: "medium" },
        ],
        suggested_response: "Reply",
        logs_summary: "Summary",
      })
    );

    const result = await analyzeIncident({
      report,
      evidence: oneEvent,
      eventsFound: 1,
      knowledge,
      model,
      retry: { maxAttempts: 1, baseDelayMs: 1 },
      logger,
    });

    expect(result.causes.map((c) => c.confidence)).toEqual(["certain", "low", "medium"]);
    expect(result.causes[1]?.rank).toBe(2);
    expect(lines).toContain("[test] unrecognized confidence value kept as-is index=0 confidence=certain");
  });

  it("rejects output missing required keys without retrying", async () => {
    const { model, generate } = stubModel(JSON.stringify({ causes: [] }));

    await expect(run(model)).rejects.toBeInstanceOf(ResponseFormatError);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("rejects output that is not JSON", async () => {
    const { model } = stubModel("I think the cart is broken.");
    await expect(run(model)).rejects.toBeInstanceOf(ResponseFormatError);
  });

  it("retries transient provider failures", async () => {
    const transient = new ModelProviderError("503 unavailable", { retriable: true, status: 503 });
    const { model, generate } = stubModel(transient, transient, modelOutput(3));

    const result = await run(model);

    expect(result.causes).toHaveLength(3);
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it("reports the provider as unavailable once retries run out", async () => {
    const transient = new ModelProviderError("429 rate limit", { retriable: true, status: 429 });
    const { model, generate } = stubModel(transient, transient, transient);

    await expect(run(model)).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent provider failures", async () => {
    const { model, generate } = stubModel(new ModelProviderError("400 bad request", { retriable: false, status: 400 }));

    await expect(run(model)).rejects.toBeInstanceOf(AnalysisError);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("sends the no-events sentence to the model and reports zero events", async () => {
    const { model, generate } = stubModel(modelOutput(3));

    const result = await run(model, { text: NO_EVENTS_TEXT, links: [] }, 0);

    expect(result.eventsFound).toBe(0);
    expect(result.evidenceLinks).toEqual([]);
    expect(generate.mock.calls[0]?.[0].prompt).toContain(`## Error Events\n${NO_EVENTS_TEXT}\n`);
  });
});

describe("buildUserPrompt", () => {
  it("embeds the knowledge documents, evidence and report", () => {
    const prompt = buildUserPrompt(report, oneEvent.text, knowledge);

    expect(prompt.startsWith("## Workflow Documentation\nCheckout recalculates totals.\n")).toBe(true);
    expect(prompt).toContain("## Known Error Patterns\ncard_declined means the bank refused.\n");
    expect(prompt).toContain("- Description: Checkout shows a blank page\n");
    expect(prompt).toContain("- Occurred at: 2025-01-19T14:30:00.000Z\n");
    expect(prompt).toContain("- Customer ID: cust-42\n");
  });
});

describe("isRetriableProviderError", () => {
  it("classifies common failures", () => {
    expect(isRetriableProviderError(new TimeoutError("Gemini", 1_000))).toBe(true);
    expect(isRetriableProviderError(new Error("503 Service Unavailable"))).toBe(true);
    expect(isRetriableProviderError(new Error("API key not valid"))).toBe(false);
    expect(isRetriableProviderError(new InputValidationError("timeout is not a valid field"))).toBe(false);
  });
});
