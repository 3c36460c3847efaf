import type { AnalysisResult, IncidentReport, KnowledgeDocs } from "../../types";
import { analyzeIncident, type ModelClient } from "./analyzer";
import type { EventFetcher } from "./eventFetcher";
import { formatEvents } from "./eventFormatter";
import { silentLogger, type Logger } from "./logger";
import type { RetryPolicy } from "./retry";

export type TriagePipelineDeps = {
  fetcher: EventFetcher;
  model: ModelClient;
  loadKnowledge: () => Promise<KnowledgeDocs>;
  modelRetry: RetryPolicy;
  windowMinutes: number;
  maxEvidenceChars: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type TriagePipeline = (report: IncidentReport, options?: { windowMinutes?: number }) => Promise<AnalysisResult>;

/**
 * Event Fetcher → Event Formatter → Analysis Orchestrator. Shared by the JSON
 * endpoint and the slash-command gateway.
 */
export function createTriagePipeline(deps: TriagePipelineDeps): TriagePipeline {
  const logger = deps.logger ?? silentLogger;

  return async (report, options = {}) => {
    const started = Date.now();
    const windowMinutes = options.windowMinutes ?? deps.windowMinutes;

    const events = await deps.fetcher.fetch(report.subjectId, report.occurredAt, windowMinutes);
    const evidence = formatEvents(events, {
      linkFor: deps.fetcher.eventLink,
      maxChars: deps.maxEvidenceChars,
    });
    const knowledge = await deps.loadKnowledge();

    const result = await analyzeIncident({
      report,
      evidence,
      eventsFound: events.length,
      knowledge,
      model: deps.model,
      retry: deps.modelRetry,
      logger,
      sleep: deps.sleep,
    });

    logger.info("triage complete", {
      subject: report.subjectId,
      eventsFound: result.eventsFound,
      ms: Date.now() - started,
    });
    return result;
  };
}
