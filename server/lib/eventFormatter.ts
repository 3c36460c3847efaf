import type { FormattedEvidence, RawEvent } from "../../types";

export type FormatOptions = {
  /** Builds the deep link for an event id. Events without an id get no link. */
  linkFor?: (eventId: string) => string;
  maxChars?: number;
};

export const NO_EVENTS_TEXT = "No events found in the search window.";

const MAX_FRAMES = 5;
const MAX_BREADCRUMBS = 5;
const MAX_CRUMB_PAIRS = 3;
const CONTEXT_TAGS = ["environment", "release", "browser", "os", "platform"];

type Rec = Record<string, unknown>;

function isRecord(value: unknown): value is Rec {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Rec | undefined {
  return isRecord(value) ? value : undefined;
}

function isTuple(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function scalar(value: unknown): string {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null) return "null";
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return "";
  }
}

function clampText(s: string, max: number): string {
  if (s.length <= max) return s;
  const kept = s.slice(0, Math.max(0, max - 40));
  return `${kept}\n\n...[truncated ${s.length - kept.length} chars]`;
}

export function eventId(event: RawEvent): string {
  return text(event.id) || text(event.eventID);
}

function entriesOfType(event: RawEvent, type: string): Rec[] {
  return asArray(event.entries)
    .map(asRecord)
    .filter((e): e is Rec => e !== undefined && e.type === type);
}

function exceptionValues(event: RawEvent): Rec[] {
  return entriesOfType(event, "exception").flatMap((entry) =>
    asArray(asRecord(entry.data)?.values)
      .map(asRecord)
      .filter((v): v is Rec => v !== undefined)
  );
}

function sourceLine(frame: Rec, lineNo: string): string {
  const direct = text(frame.contextLine) || text(frame.context_line);
  if (direct) return direct;

  const context = asArray(frame.context).filter(isTuple);
  if (context.length === 0) return "";
  const exact = context.find((pair) => String(pair[0]) === lineNo);
  const chosen = exact ?? context[Math.floor(context.length / 2)];
  return text(chosen?.[1]);
}

/** Frames across all exception values, most recent call first. */
export function extractStackFrames(event: RawEvent): string[] {
  const frames: string[] = [];
  for (const value of exceptionValues(event)) {
    for (const raw of asArray(asRecord(value.stacktrace)?.frames)) {
      const frame = asRecord(raw);
      if (!frame) continue;
      const file = text(frame.filename) || text(frame.absPath) || text(frame.module) || "unknown";
      const fn = text(frame.function) || "unknown";
      const lineNo = text(frame.lineNo) || text(frame.lineno) || "?";
      const code = sourceLine(frame, lineNo);
      frames.push(code ? `${file}:${lineNo} in ${fn}() -> ${code}` : `${file}:${lineNo} in ${fn}()`);
    }
  }
  return frames.reverse();
}

export function extractBreadcrumbs(event: RawEvent): string[] {
  const crumbs: string[] = [];
  for (const entry of entriesOfType(event, "breadcrumbs")) {
    for (const raw of asArray(asRecord(entry.data)?.values)) {
      const crumb = asRecord(raw);
      if (!crumb) continue;
      const level = text(crumb.level) || "info";
      const category = text(crumb.category) || "default";
      const message = text(crumb.message);
      if (message) {
        crumbs.push(`[${level}] ${category}: ${message}`);
        continue;
      }
      const pairs = Object.entries(asRecord(crumb.data) ?? {})
        .slice(0, MAX_CRUMB_PAIRS)
        .map(([k, v]) => `${k}=${scalar(v)}`);
      crumbs.push(pairs.length > 0 ? `[${level}] ${category}: ${pairs.join(", ")}` : `[${level}] ${category}`);
    }
  }
  return crumbs;
}

export function extractContextTags(event: RawEvent): string[] {
  const found = new Map<string, string>();
  const tags = event.tags;
  if (Array.isArray(tags)) {
    for (const raw of tags) {
      const tag = asRecord(raw);
      const key = text(tag?.key);
      if (tag && CONTEXT_TAGS.includes(key) && !found.has(key)) found.set(key, scalar(tag.value));
    }
  } else {
    for (const [key, value] of Object.entries(asRecord(tags) ?? {})) {
      if (CONTEXT_TAGS.includes(key)) found.set(key, scalar(value));
    }
  }
  const platform = text(event.platform);
  if (platform && !found.has("platform")) found.set("platform", platform);

  return CONTEXT_TAGS.filter((key) => found.has(key)).map((key) => `${key}=${found.get(key)}`);
}

function errorType(event: RawEvent): string {
  const metadata = asRecord(event.metadata);
  const firstException = exceptionValues(event)[0];
  return text(metadata?.type) || text(firstException?.type) || text(event.type) || "";
}

function errorMessage(event: RawEvent): string {
  const metadata = asRecord(event.metadata);
  const firstException = exceptionValues(event)[0];
  return text(metadata?.value) || text(event.message) || text(firstException?.value);
}

function formatEvent(event: RawEvent, position: number, linkFor?: (id: string) => string): { block: string; link?: string } {
  const id = eventId(event);
  const time = text(event.dateCreated) || text(event.datetime) || text(event.timestamp);
  const type = errorType(event);
  const title = text(event.title);
  const message = errorMessage(event);

  if (!id && !time && !type && !title && !message) {
    return { block: `Event ${position}: (no identifying details)` };
  }

  const lines = [`Event ${position}:`, `- Time: ${time || "Unknown"}`, `- Error: ${type || title || "Unknown"}`];
  if (message && message !== title) lines.push(`- Message: "${message}"`);
  else if (title) lines.push(`- Message: "${title}"`);

  const frames = extractStackFrames(event);
  if (frames.length > 0) {
    lines.push("- Stack Trace (most recent call first):");
    for (const frame of frames.slice(0, MAX_FRAMES)) lines.push(`  ${frame}`);
    if (frames.length > MAX_FRAMES) lines.push(`  ... (${frames.length - MAX_FRAMES} more frames)`);
  }

  const crumbs = extractBreadcrumbs(event);
  if (crumbs.length > 0) {
    lines.push("- Breadcrumbs (leading up to the error):");
    for (const crumb of crumbs.slice(-MAX_BREADCRUMBS)) lines.push(`  ${crumb}`);
  }

  const context = extractContextTags(event);
  if (context.length > 0) lines.push(`- Context: ${context.join(", ")}`);

  const link = id && linkFor ? linkFor(id) : undefined;
  if (link) lines.push(`- Link: ${link}`);

  return { block: lines.join("\n"), ...(link ? { link } : {}) };
}

export function formatEvents(events: RawEvent[], options: FormatOptions = {}): FormattedEvidence {
  if (events.length === 0) return { text: NO_EVENTS_TEXT, links: [] };

  const blocks: string[] = [];
  const links: string[] = [];
  events.forEach((event, i) => {
    const { block, link } = formatEvent(event, i + 1, options.linkFor);
    blocks.push(block);
    if (link) links.push(link);
  });

  const joined = blocks.join("\n\n");
  return {
    text: options.maxChars ? clampText(joined, options.maxChars) : joined,
    links,
  };
}
