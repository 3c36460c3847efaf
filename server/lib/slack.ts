import { createHmac, timingSafeEqual } from "node:crypto";
import type {
  AnalysisResult,
  CommandEnvelope,
  IncidentReport,
  ParsedCommand,
  SlackBlock,
  SlackMessage,
} from "../../types";
import {
  ConfigurationError,
  RateLimitError,
  SignatureError,
  TriageError,
  UsageError,
  asMessage,
  toTriageError,
} from "./errors";
import { toIncidentReport } from "./incident";
import { silentLogger, type Logger } from "./logger";
import type { TriagePipeline } from "./pipeline";
import { withRetry } from "./retry";
import type { BackgroundTask, TaskQueue } from "./taskQueue";

export const SIGNATURE_VERSION = "v0";
export const COMMAND_USAGE = "Use format: /triage [description] | [timestamp] | [customer_id]";
export const TIMESTAMP_HINT = "Use ISO 8601 format, e.g. 2025-01-19T14:30:00Z";

const SECTION_MAX_CHARS = 3_000;

export function computeSlackSignature(signingSecret: string, timestamp: string, rawBody: string): string {
  const digest = createHmac("sha256", signingSecret)
    .update(`${SIGNATURE_VERSION}:${timestamp}:${rawBody}`, "utf8")
    .digest("hex");
  return `${SIGNATURE_VERSION}=${digest}`;
}

/**
 * Rejects requests whose timestamp is more than `toleranceSec` away from now,
 * then compares the recomputed HMAC in constant time.
 */
export function verifySlackSignature(input: {
  rawBody: string;
  timestamp: string;
  signature: string;
  signingSecret: string;
  toleranceSec: number;
  nowSec?: number;
}): void {
  const timestamp = input.timestamp.trim();
  if (!timestamp || !input.signature) throw new SignatureError("Missing signature headers.");
  if (!/^\d+$/.test(timestamp)) throw new SignatureError(`Invalid request timestamp: ${timestamp.slice(0, 32)}`);

  const nowSec = input.nowSec ?? Math.floor(Date.now() / 1000);
  if (Math.abs(nowSec - Number(timestamp)) > input.toleranceSec) {
    throw new SignatureError(`Request timestamp outside the ${input.toleranceSec}s window.`);
  }

  const expected = Buffer.from(computeSlackSignature(input.signingSecret, timestamp, input.rawBody), "utf8");
  const received = Buffer.from(input.signature.trim(), "utf8");
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new SignatureError("Signature mismatch.");
  }
}

/** Literal `|` inside a field is not supported; it always splits. */
export function parseSlackCommand(text: string): ParsedCommand {
  const parts = text.split("|").map((p) => p.trim());
  if (parts.length !== 3) {
    throw new UsageError("Invalid command format.", COMMAND_USAGE);
  }
  const [description, timestamp, subjectId] = parts;
  if (!description) throw new UsageError("Description cannot be empty.", COMMAND_USAGE);
  if (!timestamp) throw new UsageError("Timestamp cannot be empty.", COMMAND_USAGE);
  if (!subjectId) throw new UsageError("Customer ID cannot be empty.", COMMAND_USAGE);
  return { description, timestamp, subjectId };
}

export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function clampSection(text: string): string {
  if (text.length <= SECTION_MAX_CHARS) return text;
  return `${text.slice(0, SECTION_MAX_CHARS - 3)}...`;
}

function section(text: string): SlackBlock {
  return { type: "section", text: { type: "mrkdwn", text: clampSection(text) } };
}

export function pluralizeEvents(count: number): string {
  return `${count} ${count === 1 ? "event" : "events"}`;
}

export function renderAnalysisMessage(result: AnalysisResult): SlackMessage {
  const blocks: SlackBlock[] = [{ type: "header", text: { type: "plain_text", text: "🔍 Incident Analysis" } }];

  const causeLines = result.causes.map(
    (c, i) =>
      `${i + 1}. *[${String(c.confidence).toUpperCase()}]* ${escapeMrkdwn(c.cause)}\n    ${escapeMrkdwn(c.explanation)}`
  );
  blocks.push(section(`*Probable Causes:*\n\n${causeLines.join("\n\n")}`));
  blocks.push({ type: "divider" });

  const quoted = escapeMrkdwn(result.suggestedReply)
    .split("\n")
    .map((line) => `> ${line}`)
    .join("\n");
  blocks.push(section(`*Suggested Response:*\n${quoted}`));
  if (result.evidenceSummary) blocks.push(section(`*Log Findings:*\n${escapeMrkdwn(result.evidenceSummary)}`));
  blocks.push({ type: "divider" });

  blocks.push(section(`*Events:* Found ${pluralizeEvents(result.eventsFound)} in the search window`));
  if (result.evidenceLinks.length > 0) {
    const links = result.evidenceLinks.map((link, i) => `• <${escapeMrkdwn(link)}|Event ${i + 1}>`);
    blocks.push(section(`*Evidence Links:*\n${links.join("\n")}`));
  }

  const top = result.causes[0];
  return {
    response_type: "in_channel",
    text: `Incident analysis: ${top ? top.cause : "no causes"} (${pluralizeEvents(result.eventsFound)} found)`,
    blocks,
  };
}

export function renderErrorMessage(message: string, suggestion = ""): SlackMessage {
  const text = suggestion ? `❌ *Error:* ${message}\n\n💡 *Suggestion:* ${suggestion}` : `❌ *Error:* ${message}`;
  return { response_type: "ephemeral", text };
}

export function renderErrorForChannel(error: unknown): SlackMessage {
  const e = toTriageError(error);
  switch (e.kind) {
    case "usage":
      return renderErrorMessage(e.publicMessage, e instanceof UsageError ? e.hint : COMMAND_USAGE);
    case "input_invalid":
      return renderErrorMessage(e.publicMessage, TIMESTAMP_HINT);
    case "upstream_auth":
      return renderErrorMessage(
        "Event tracking authentication failed",
        "Please verify the event-tracking credentials are configured correctly."
      );
    case "rate_limited":
      return renderErrorMessage(
        "Event tracking rate limit exceeded",
        e instanceof RateLimitError ? `Please try again in ${e.retryAfterSec} seconds.` : "Please try again in a few minutes."
      );
    case "upstream_unavailable":
    case "upstream_error":
      return renderErrorMessage(
        "Could not fetch error events",
        "The event-tracking service failed, so no events were checked. Try again shortly."
      );
    case "provider_unavailable":
      return renderErrorMessage("Analysis failed: AI service unavailable", "Please try again in a few moments.");
    case "malformed_output":
      return renderErrorMessage("Analysis failed: Invalid response from AI", "Please try again or contact support.");
    case "misconfigured":
      return renderErrorMessage("Slack integration is not fully configured", "Please contact support.");
    default:
      return renderErrorMessage("Analysis failed: Unexpected error", "Please try again or contact support.");
  }
}

export function renderAckMessage(command: ParsedCommand): SlackMessage {
  return {
    response_type: "ephemeral",
    text: `🔍 Analyzing events for \`${escapeMrkdwn(command.subjectId)}\` around ${escapeMrkdwn(
      command.timestamp
    )}. Results will be posted here shortly.`,
  };
}

export type DeliverOptions = {
  timeoutMs: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

/** POSTs a message to a response URL. One retry; failures are logged, never thrown. */
export async function deliverSlackMessage(url: string, message: SlackMessage, options: DeliverOptions): Promise<boolean> {
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetchImpl ?? fetch;
  try {
    await withRetry({
      label: "Slack delivery",
      policy: { maxAttempts: 2, baseDelayMs: 500, jitter: false },
      isRetriable: () => true,
      sleep: options.sleep,
      onRetry: ({ error }) => logger.warn("delivery failed; retrying once", { error: asMessage(error) }),
      op: async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
        try {
          const res = await fetchImpl(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(message),
            signal: controller.signal,
          });
          if (!res.ok) throw new Error(`Delivery failed (${res.status} ${res.statusText})`);
        } finally {
          clearTimeout(timeoutId);
        }
      },
    });
    return true;
  } catch (error) {
    logger.error("delivery failed; giving up", { error: asMessage(error) });
    return false;
  }
}

export function readCallbackUrl(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return undefined;
  }
  return url.protocol === "https:" || url.protocol === "http:" ? url.toString() : undefined;
}

export type GatewayOutcome = {
  status: number;
  body: SlackMessage;
  deferred?: { task: BackgroundTask; callbackUrl: string };
};

export type SlackGatewayDeps = {
  signingSecret?: string;
  toleranceSec: number;
  pipeline: TriagePipeline;
  queue: TaskQueue;
  deliver: (url: string, message: SlackMessage) => Promise<boolean>;
  logger?: Logger;
  nowSec?: () => number;
};

export interface SlackGateway {
  /** Verifies and parses a command. Throws SignatureError before any other work. */
  handle(envelope: CommandEnvelope): GatewayOutcome;
  /** Hands the deferred pipeline to the queue; call once the ack is sent. */
  dispatch(deferred: NonNullable<GatewayOutcome["deferred"]>): void;
}

export function createSlackGateway(deps: SlackGatewayDeps): SlackGateway {
  const logger = deps.logger ?? silentLogger;

  function handle(envelope: CommandEnvelope): GatewayOutcome {
    if (!deps.signingSecret) {
      throw new ConfigurationError("Slack integration not configured: SLACK_SIGNING_SECRET missing.");
    }
    verifySlackSignature({
      rawBody: envelope.rawBody,
      timestamp: envelope.timestamp,
      signature: envelope.signature,
      signingSecret: deps.signingSecret,
      toleranceSec: deps.toleranceSec,
      nowSec: deps.nowSec?.(),
    });

    const form = new URLSearchParams(envelope.rawBody);
    let parsed: { command: ParsedCommand; report: IncidentReport };
    try {
      const command = parseSlackCommand(form.get("text") ?? "");
      parsed = {
        command,
        report: toIncidentReport({
          description: command.description,
          occurredAt: command.timestamp,
          subjectId: command.subjectId,
        }),
      };
    } catch (error) {
      if (error instanceof TriageError) {
        logger.info("command rejected", { kind: error.kind, reason: error.message });
        return { status: 200, body: renderErrorForChannel(error) };
      }
      throw error;
    }
    const { command, report } = parsed;

    const callbackUrl = readCallbackUrl(envelope.callbackUrl ?? form.get("response_url"));
    if (!callbackUrl) {
      return { status: 200, body: renderErrorMessage("Missing or invalid response_url", "Invoke the command from Slack.") };
    }

    const task: BackgroundTask = {
      label: `slack:${report.subjectId}`,
      run: async () => {
        let message: SlackMessage;
        try {
          message = renderAnalysisMessage(await deps.pipeline(report));
        } catch (error) {
          logger.error("pipeline failed", { subject: report.subjectId, kind: toTriageError(error).kind, error: asMessage(error) });
          message = renderErrorForChannel(error);
        }
        await deps.deliver(callbackUrl, message);
      },
    };

    logger.info("command accepted", { subject: report.subjectId });
    return { status: 200, body: renderAckMessage(command), deferred: { task, callbackUrl } };
  }

  function dispatch(deferred: NonNullable<GatewayOutcome["deferred"]>): void {
    if (deps.queue.enqueue(deferred.task)) return;
    deps
      .deliver(deferred.callbackUrl, renderErrorMessage("Too many analyses in progress", "Please try again in a minute."))
      .catch((error: unknown) => logger.error("busy reply failed", { error: asMessage(error) }));
  }

  return { handle, dispatch };
}
