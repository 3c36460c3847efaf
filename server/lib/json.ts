import { ResponseFormatError, asMessage } from "./errors";

/** Strips markdown fences and any prose around the outermost JSON object. */
export function extractJsonBlock(text: string): string {
  const clean = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/```\s*$/i, "")
    .trim();

  const start = clean.indexOf("{");
  const end = clean.lastIndexOf("}");
  if (start === -1 || end === -1 || start >= end) return clean;
  return clean.slice(start, end + 1);
}

function repairJson(jsonStr: string): string {
  return (
    jsonStr
      // trailing commas
      .replace(/,(\s*[}\]])/g, "$1")
      // { key: "v" } -> { "key": "v" }
      .replace(/([{,]\s*)([a-zA-Z0-9_]+?)\s*:/g, '$1"$2":')
      // control chars other than newline/tab
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "")
  );
}

/**
 * Parses model output as JSON, trying one best-effort repair pass before
 * giving up with a ResponseFormatError.
 */
export function parseModelJson(text: string): unknown {
  const block = extractJsonBlock(text);
  if (!block) throw new ResponseFormatError("Empty response from model.");
  try {
    return JSON.parse(block);
  } catch (firstError) {
    try {
      return JSON.parse(repairJson(block));
    } catch {
      throw new ResponseFormatError(`Invalid JSON in model response: ${asMessage(firstError)}`, { cause: firstError });
    }
  }
}
