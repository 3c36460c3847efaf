import { z } from "zod";
import type { IncidentReport } from "../../types";
import { InputValidationError } from "./errors";

const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/** Rejects days past the end of the month, which `Date.parse` would roll forward. */
function isCalendarDate(ymd: string): boolean {
  const [year, month, day] = ymd.split("-").map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/**
 * Parses an ISO-8601 date-time. A value without an offset is read as UTC.
 * Returns undefined for anything else, including date-only strings.
 */
export function parseOccurredAt(value: string): Date | undefined {
  const raw = value.trim();
  const m = raw.match(ISO_DATETIME);
  if (!m || !isCalendarDate(raw.slice(0, 10))) return undefined;
  const normalized = (m[1] ? raw : `${raw}Z`)
    .toUpperCase()
    .replace(" ", "T")
    .replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const ms = Date.parse(normalized);
  return Number.isFinite(ms) ? new Date(ms) : undefined;
}

export const AnalyzeRequestSchema = z.object({
  description: z.string().trim().min(1, "description must not be empty"),
  occurredAt: z.string().trim().min(1, "occurredAt must not be empty"),
  subjectId: z.string().trim().min(1, "subjectId must not be empty"),
  windowMinutes: z.number().positive().max(1_440).optional(),
});

export type AnalyzeRequest = {
  report: IncidentReport;
  windowMinutes?: number;
};

export function toIncidentReport(fields: { description: string; occurredAt: string; subjectId: string }): IncidentReport {
  const description = fields.description.trim();
  const subjectId = fields.subjectId.trim();
  if (!description) throw new InputValidationError("description must not be empty");
  if (!subjectId) throw new InputValidationError("subjectId must not be empty");

  const occurredAt = parseOccurredAt(fields.occurredAt);
  if (!occurredAt) {
    throw new InputValidationError("occurredAt must be an ISO 8601 date-time, e.g. 2025-01-19T14:30:00Z");
  }
  return Object.freeze({ description, occurredAt, subjectId });
}

export function parseAnalyzeRequest(body: unknown, options: { maxDescriptionChars: number }): AnalyzeRequest {
  const parsed = AnalyzeRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const field = first?.path.join(".");
    const detail = first?.message ?? "invalid request";
    throw new InputValidationError(field && !detail.startsWith(field) ? `${field}: ${detail}` : detail);
  }

  const report = toIncidentReport({
    ...parsed.data,
    description: parsed.data.description.slice(0, options.maxDescriptionChars),
  });
  return { report, windowMinutes: parsed.data.windowMinutes };
}
