import { z } from "zod";
import type {
  AnalysisResult,
  FormattedEvidence,
  IncidentReport,
  KnowledgeDocs,
  KnownConfidence,
  ProbableCause,
} from "../../types";
import {
  AnalysisError,
  ProviderUnavailableError,
  ResponseFormatError,
  TriageError,
  asMessage,
} from "./errors";
import { parseModelJson } from "./json";
import { silentLogger, type Logger } from "./logger";
import { TimeoutError, withRetry, type RetryPolicy } from "./retry";

export type ModelRequest = {
  systemInstruction: string;
  prompt: string;
};

export interface ModelClient {
  readonly name: string;
  generate(request: ModelRequest): Promise<string>;
}

/** Raised by model clients; `retriable` marks transient and rate-limit failures. */
export class ModelProviderError extends Error {
  readonly retriable: boolean;
  readonly status?: number;

  constructor(message: string, options: { retriable: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "ModelProviderError";
    this.retriable = options.retriable;
    this.status = options.status;
  }
}

const RETRIABLE_PATTERNS = [
  "429",
  "rate limit",
  "resource exhausted",
  "internal error",
  "unavailable",
  "timed out",
  "timeout",
  "deadline exceeded",
  "network",
  "econnreset",
  "socket hang up",
  "502",
  "503",
  "504",
];

export function isRetriableProviderError(error: unknown): boolean {
  if (error instanceof ModelProviderError) return error.retriable;
  if (error instanceof TimeoutError) return true;
  if (error instanceof TriageError) return false;
  const msg = asMessage(error).toLowerCase();
  return msg.length > 0 && RETRIABLE_PATTERNS.some((p) => msg.includes(p));
}

export const SYSTEM_INSTRUCTION = `You are a support triage assistant. You read application error events and explain why a customer ran into a problem.

You receive:
1. Workflow documentation describing how the product is supposed to behave
2. Known error patterns and how they are resolved
3. Error events recorded for the customer around the reported time
4. The problem description written by customer support

Respond with:
1. The three most likely causes, most likely first
2. A confidence of "high", "medium" or "low" for each
3. A reply that support can send to the customer
4. A short summary of what the events show

Quote real error messages from the events. If the events do not explain the problem, say so and recommend next steps.
Output ONLY raw valid JSON. No markdown fences, no commentary.`;

const RESPONSE_SHAPE = `{
  "causes": [{"rank": 1, "cause": "", "explanation": "", "confidence": "high|medium|low"}],
  "suggested_response": "",
  "logs_summary": ""
}`;

export function buildUserPrompt(report: IncidentReport, evidenceText: string, knowledge: KnowledgeDocs): string {
  return [
    "## Workflow Documentation",
    knowledge.workflow,
    "",
    "## Known Error Patterns",
    knowledge.knownErrors,
    "",
    "## Error Events",
    evidenceText,
    "",
    "## Problem Report",
    `- Description: ${report.description}`,
    `- Occurred at: ${report.occurredAt.toISOString()}`,
    `- Customer ID: ${report.subjectId}`,
    "",
    "Respond with a single JSON object of this shape:",
    RESPONSE_SHAPE,
  ].join("\n");
}

const KNOWN_CONFIDENCES: readonly KnownConfidence[] = ["high", "medium", "low"];

function isKnownConfidence(value: string): value is KnownConfidence {
  return KNOWN_CONFIDENCES.some((c) => c === value);
}

const CauseSchema = z.object({
  rank: z.union([z.number(), z.string()]),
  cause: z.string(),
  explanation: z.string(),
  confidence: z.string(),
});

const ModelOutputSchema = z.object({
  causes: z.array(CauseSchema),
  suggested_response: z.string().trim().min(1, "must not be empty"),
  logs_summary: z.string().trim().min(1, "must not be empty"),
});

export type ModelOutput = z.infer<typeof ModelOutputSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function normalizeRank(value: number | string, position: number): number {
  const n = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isInteger(n) && n > 0 ? n : position;
}

/**
 * Checks the parsed model output against the expected shape. Unknown
 * confidence values pass with a warning and are kept as written.
 */
export function validateModelOutput(data: unknown, logger: Logger = silentLogger): {
  causes: ProbableCause[];
  suggestedReply: string;
  evidenceSummary: string;
} {
  const parsed = ModelOutputSchema.safeParse(data);
  if (!parsed.success) {
    throw new ResponseFormatError(`Model response failed validation: ${describeIssues(parsed.error)}`);
  }

  const causes = parsed.data.causes.map((c, i): ProbableCause => {
    const raw = c.confidence.trim();
    const lowered = raw.toLowerCase();
    if (!isKnownConfidence(lowered)) {
      logger.warn("unrecognized confidence value kept as-is", { index: i, confidence: raw });
    }
    return {
      rank: normalizeRank(c.rank, i + 1),
      cause: c.cause.trim(),
      explanation: c.explanation.trim(),
      confidence: isKnownConfidence(lowered) ? lowered : raw,
    };
  });

  return {
    causes,
    suggestedReply: parsed.data.suggested_response,
    evidenceSummary: parsed.data.logs_summary,
  };
}

export const EXPECTED_CAUSES = 3;

export const GAP_CAUSE = {
  cause: "No further cause identified",
  explanation: "The available evidence did not support another distinct hypothesis.",
  confidence: "low",
} as const;

/** Truncates to the first three causes, or fills missing slots with explicit gap entries. */
export function repairCauses(causes: ProbableCause[], logger: Logger = silentLogger): ProbableCause[] {
  if (causes.length === EXPECTED_CAUSES) return causes;
  logger.warn("model returned unexpected number of causes", { expected: EXPECTED_CAUSES, received: causes.length });

  const kept = causes.slice(0, EXPECTED_CAUSES);
  while (kept.length < EXPECTED_CAUSES) {
    kept.push({ rank: kept.length + 1, ...GAP_CAUSE });
  }
  return kept;
}

export type AnalyzeInput = {
  report: IncidentReport;
  evidence: FormattedEvidence;
  eventsFound: number;
  knowledge: KnowledgeDocs;
  model: ModelClient;
  retry: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

async function invokeModel(input: AnalyzeInput, prompt: string, logger: Logger): Promise<string> {
  try {
    return await withRetry({
      label: "Model analyze request",
      policy: input.retry,
      isRetriable: isRetriableProviderError,
      sleep: input.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        logger.warn("model call failed; retrying", { model: input.model.name, attempt, delayMs, error: asMessage(error) }),
      op: () => input.model.generate({ systemInstruction: SYSTEM_INSTRUCTION, prompt }),
    });
  } catch (error) {
    if (error instanceof TriageError) throw error;
    if (isRetriableProviderError(error)) {
      throw new ProviderUnavailableError(`Model provider unavailable: ${asMessage(error)}`, { cause: error });
    }
    throw new AnalysisError(`Model call failed: ${asMessage(error)}`, { cause: error });
  }
}

export async function analyzeIncident(input: AnalyzeInput): Promise<AnalysisResult> {
  const logger = input.logger ?? silentLogger;
  const prompt = buildUserPrompt(input.report, input.evidence.text, input.knowledge);

  const text = await invokeModel(input, prompt, logger);
  logger.debug("model response received", { model: input.model.name, chars: text.length });

  let data: unknown;
  try {
    data = parseModelJson(text);
  } catch (error) {
    logger.error("model response is not valid JSON", { preview: text.slice(0, 500) });
    throw error;
  }

  let validated: ReturnType<typeof validateModelOutput>;
  try {
    validated = validateModelOutput(data, logger);
  } catch (error) {
    logger.error("model response has an invalid structure", { error: asMessage(error) });
    throw error;
  }

  return {
    causes: repairCauses(validated.causes, logger),
    suggestedReply: validated.suggestedReply,
    evidenceLinks: [...input.evidence.links],
    evidenceSummary: validated.evidenceSummary,
    eventsFound: Math.max(0, Math.floor(input.eventsFound)),
  };
}
