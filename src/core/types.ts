/**
 * Pipeline data types.
 */

export const DOCUMENT_CATEGORIES = [
  "slides",
  "report",
  "transcript",
  "audio",
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

/** One event as reported by the data provider, normalised. */
export interface CompanyEvent {
  /** Calendar date (YYYY-MM-DD), the provider timestamp truncated at "T". */
  date: string;
  /** Raw provider timestamp. */
  timestamp: string;
  title: string;
  typeLabel: string;
  urls: Partial<Record<DocumentCategory, string>>;
  /** Location of the raw transcript JSON, when the provider has one. */
  transcriptUrl?: string;
}

export interface CompanyRecord {
  displayName: string;
  /** First entry is the canonical identifier. */
  identifiers: string[];
  events: CompanyEvent[];
}

/** Unit of work: one document of one event of one company. */
export interface Candidate {
  company: CompanyRecord;
  event: CompanyEvent;
  category: DocumentCategory;
  url: string;
}

/** Bytes ready to be uploaded. */
export interface Artifact {
  data: Uint8Array;
  contentType: string;
  filename: string;
}

export type ArtifactResult =
  | { ok: true; artifact: Artifact }
  | { ok: false; reason: string };

/** Row written to the metadata store after a successful upload. */
export interface MetadataRow {
  company: string;
  identifier: string;
  storageUrl: string;
  /** YYYY-MM-DD */
  eventDate: string;
  eventType: string;
  documentType: DocumentCategory;
}

export type CandidateOutcome =
  | { kind: "no-artifact"; reason: string }
  | { kind: "upload-failed"; key: string }
  | { kind: "metadata-failed"; key: string; storageUrl: string }
  | { kind: "success"; key: string; storageUrl: string }
  | { kind: "error"; message: string };

export interface CandidateReport {
  company: string;
  eventTitle: string;
  eventDate: string;
  category: DocumentCategory;
  url: string;
  outcome: CandidateOutcome;
}

export interface RunCounters {
  total: number;
  processed: number;
  successful: number;
  failed: number;
}

export interface ProgressEvent extends RunCounters {
  done: boolean;
}

export type DiagnosticLevel = "info" | "warn" | "error";

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
}

export type RunStatus =
  | "completed"
  | "no-valid-identifiers"
  | "no-matching-documents";

/** Result returned from a pipeline run. */
export interface RunResult {
  status: RunStatus;
  counters: RunCounters;
  validIdentifiers: string[];
  invalidIdentifiers: string[];
  items: CandidateReport[];
  diagnostics: Diagnostic[];
}

export interface RunHooks {
  onProgress?: (event: ProgressEvent) => void;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}
