export type KnownConfidence = 'high' | 'medium' | 'low';
// Unrecognized values from the model are kept verbatim.
export type CauseConfidence = KnownConfidence | (string & {});

export interface IncidentReport {
  description: string;
  occurredAt: Date;
  subjectId: string;
}

export interface ProbableCause {
  rank: number;
  cause: string;
  explanation: string;
  confidence: CauseConfidence;
}

export interface AnalysisResult {
  causes: ProbableCause[];
  suggestedReply: string;
  evidenceLinks: string[];
  evidenceSummary: string;
  eventsFound: number;
}

export interface FormattedEvidence {
  text: string;
  links: string[];
}

export interface KnowledgeDocs {
  workflow: string;
  knownErrors: string;
}

export interface EventWindow {
  start: Date;
  end: Date;
}

/**
 * Event record as returned by the event-tracking API. Every field is optional
 * and only the ones the formatter consumes are listed; anything else passes
 * through untouched.
 */
export interface RawEvent {
  id?: unknown;
  eventID?: unknown;
  dateCreated?: unknown;
  datetime?: unknown;
  timestamp?: unknown;
  type?: unknown;
  title?: unknown;
  message?: unknown;
  platform?: unknown;
  metadata?: unknown;
  entries?: unknown;
  tags?: unknown;
  [key: string]: unknown;
}

export interface CommandEnvelope {
  rawBody: string;
  signature: string;
  timestamp: string;
  callbackUrl?: string;
}

export interface ParsedCommand {
  description: string;
  timestamp: string;
  subjectId: string;
}

export type SlackTextObject = { type: 'plain_text' | 'mrkdwn'; text: string };

export type SlackBlock =
  | { type: 'header'; text: SlackTextObject }
  | { type: 'section'; text: SlackTextObject }
  | { type: 'context'; elements: SlackTextObject[] }
  | { type: 'divider' };

export interface SlackMessage {
  response_type: 'ephemeral' | 'in_channel';
  text: string;
  blocks?: SlackBlock[];
  replace_original?: boolean;
}
