import { readFile } from "node:fs/promises";
import path from "node:path";
import type { KnowledgeDocs } from "../../types";
import { asMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";

export const WORKFLOW_PLACEHOLDER = "No workflow documentation available.";
export const KNOWN_ERRORS_PLACEHOLDER = "No known error patterns available.";

async function readDoc(file: string, placeholder: string, logger: Logger): Promise<string> {
  try {
    const content = (await readFile(file, "utf8")).trim();
    if (content) return content;
    logger.warn("knowledge document is empty; using placeholder", { file });
  } catch (error) {
    logger.warn("knowledge document unavailable; using placeholder", { file, error: asMessage(error) });
  }
  return placeholder;
}

/**
 * Reads `workflow.md` and `known_errors.md` from the knowledge directory.
 * Read on every call so edits show up without a restart.
 */
export async function loadKnowledgeDocs(dir: string, logger: Logger = silentLogger): Promise<KnowledgeDocs> {
  const [workflow, knownErrors] = await Promise.all([
    readDoc(path.join(dir, "workflow.md"), WORKFLOW_PLACEHOLDER, logger),
    readDoc(path.join(dir, "known_errors.md"), KNOWN_ERRORS_PLACEHOLDER, logger),
  ]);
  return { workflow, knownErrors };
}
