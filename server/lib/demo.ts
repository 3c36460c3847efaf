import type { ModelClient, ModelRequest } from "./analyzer";
import { NO_EVENTS_TEXT } from "./eventFormatter";

function countEvents(prompt: string): number {
  return (prompt.match(/^Event \d+:/gm) ?? []).length;
}

function firstErrorLine(prompt: string): string | undefined {
  const m = prompt.match(/^- Error: (.+)$/m);
  return m?.[1]?.trim();
}

/**
 * Offline stand-in used when no model key is configured. Produces a
 * well-formed answer from what it can read off the prompt.
 */
export function createDemoModelClient(): ModelClient {
  async function generate(request: ModelRequest): Promise<string> {
    const noEvents = request.prompt.includes(NO_EVENTS_TEXT);
    const eventCount = noEvents ? 0 : countEvents(request.prompt);
    const error = firstErrorLine(request.prompt);

    const causes = noEvents
      ? [
          {
            rank: 1,
            cause: "No error events recorded in the search window",
            explanation: "The event service returned nothing for this customer; the issue may be client-side or outside the window.",
            confidence: "low",
          },
          {
            rank: 2,
            cause: "Timestamp or customer id mismatch",
            explanation: "Confirm the reported time zone and the customer id used in telemetry.",
            confidence: "low",
          },
          {
            rank: 3,
            cause: "Error not instrumented",
            explanation: "The failing path may not report errors to the event service.",
            confidence: "low",
          },
        ]
      : [
          {
            rank: 1,
            cause: error ? `Application error: ${error}` : "Application error in the reported flow",
            explanation: `The most recent of ${eventCount} event(s) near the reported time points at this failure.`,
            confidence: "medium",
          },
          {
            rank: 2,
            cause: "Upstream dependency failure",
            explanation: "Errors close together often come from a dependency timing out.",
            confidence: "low",
          },
          {
            rank: 3,
            cause: "Invalid client input",
            explanation: "Check the request payload recorded in the breadcrumbs.",
            confidence: "low",
          },
        ];

    return JSON.stringify({
      causes,
      suggested_response:
        "Thanks for reporting this. We are looking into what happened around that time and will follow up shortly.",
      logs_summary: noEvents ? "No error events were found." : `${eventCount} error event(s) found around the reported time.`,
    });
  }

  return { name: "demo", generate };
}
