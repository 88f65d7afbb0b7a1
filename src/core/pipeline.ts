/**
 * Document pipeline – validates identifiers, counts candidate documents,
 * then fetches, uploads and catalogs each one.
 */
import { setTimeout as sleep } from "node:timers/promises";

import type { StrategyRegistry } from "../documents/registry.js";
import { buildStrategyRegistry } from "../documents/registry.js";
import { HttpSession, type HttpSessionOptions } from "../http/session.js";
import type { MetadataRecorder } from "../metadata/recorder.js";
import type { ProviderClient } from "../provider/client.js";
import type { StorageBackend } from "../storage/backend.js";
import { countCandidates, enumerateCandidates, type DateWindow } from "./candidates.js";
import { RunFailedError } from "./exceptions.js";
import { formatKey } from "./keys.js";
import { parseRunRequest, type RunRequestInput } from "./request.js";
import type {
  Artifact,
  Candidate,
  CandidateOutcome,
  CandidateReport,
  CompanyRecord,
  Diagnostic,
  DiagnosticLevel,
  RunCounters,
  RunHooks,
  RunResult,
  RunStatus,
} from "./types.js";

type Report = (level: DiagnosticLevel, message: string) => void;

export interface ValidationResult {
  valid: string[];
  invalid: string[];
  companies: Map<string, CompanyRecord>;
}

export interface DocumentPipelineOptions {
  provider: ProviderClient;
  storage: StorageBackend;
  recorder: MetadataRecorder;
  strategies?: StrategyRegistry;
  http?: HttpSessionOptions;
  /** Pause after each candidate, for progress display only. */
  pauseMs?: number;
  /** Serve the processing pass from validation responses instead of re-querying. */
  reuseValidationResponses?: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class DocumentPipeline {
  private provider: ProviderClient;
  private storage: StorageBackend;
  private recorder: MetadataRecorder;
  private strategies: StrategyRegistry;
  private http: HttpSessionOptions;
  private pauseMs: number;
  private reuseValidationResponses: boolean;

  constructor(opts: DocumentPipelineOptions) {
    this.provider = opts.provider;
    this.storage = opts.storage;
    this.recorder = opts.recorder;
    this.strategies = opts.strategies ?? buildStrategyRegistry();
    this.http = opts.http ?? {};
    this.pauseMs = opts.pauseMs ?? 0;
    this.reuseValidationResponses = opts.reuseValidationResponses ?? true;
  }

  async run(input: RunRequestInput, hooks: RunHooks = {}): Promise<RunResult> {
    const request = parseRunRequest(input);
    const window: DateWindow = { start: request.startDate, end: request.endDate };

    const diagnostics: Diagnostic[] = [];
    const report: Report = (level, message) => {
      const diagnostic = { level, message };
      diagnostics.push(diagnostic);
      hooks.onDiagnostic?.(diagnostic);
    };

    const counters: RunCounters = { total: 0, processed: 0, successful: 0, failed: 0 };
    const items: CandidateReport[] = [];
    let validation: ValidationResult = { valid: [], invalid: [], companies: new Map() };

    const finish = (status: RunStatus): RunResult => {
      hooks.onProgress?.({ ...counters, done: true });
      return {
        status,
        counters: { ...counters },
        validIdentifiers: validation.valid,
        invalidIdentifiers: validation.invalid,
        items,
        diagnostics,
      };
    };

    const session = new HttpSession(this.http);
    try {
      let companies: CompanyRecord[];
      try {
        // 1. Validate identifiers
        validation = await this.validate(request.identifiers, session, report);
        if (validation.valid.length === 0) {
          report("error", "No valid identifiers found");
          return finish("no-valid-identifiers");
        }

        // 2. Load company records for processing
        companies = await this.loadCompanies(validation, session, report);

        // 3. Count candidates
        counters.total = countCandidates(companies, window, request.categories);
        if (counters.total === 0) {
          report("warn", "No matching documents found for the specified criteria.");
          return finish("no-matching-documents");
        }
      } catch (err) {
        throw new RunFailedError(`Run aborted: ${errorMessage(err)}`);
      }

      // 4. Process candidates in the same order they were counted
      for (const candidate of enumerateCandidates(companies, window, request.categories)) {
        const outcome = await this.processCandidate(candidate, request.bucket, session, report);
        items.push({
          company: candidate.company.displayName,
          eventTitle: candidate.event.title,
          eventDate: candidate.event.date,
          category: candidate.category,
          url: candidate.url,
          outcome,
        });

        counters.processed++;
        if (outcome.kind === "success") counters.successful++;
        else counters.failed++;
        hooks.onProgress?.({ ...counters, done: false });

        if (this.pauseMs > 0) await sleep(this.pauseMs);
      }

      report(
        "info",
        `Processed ${counters.processed} files: ${counters.successful} successful, ${counters.failed} failed`,
      );
      return finish("completed");
    } finally {
      session.close();
    }
  }

  /** Phase 1: query each identifier once; keep the ones with an event collection. */
  async validate(
    identifiers: string[],
    session: HttpSession,
    report: Report,
  ): Promise<ValidationResult> {
    const result: ValidationResult = { valid: [], invalid: [], companies: new Map() };
    for (const identifier of identifiers) {
      const lookup = await this.provider.getCompany(identifier, session);
      if (lookup.ok) {
        result.valid.push(identifier);
        result.companies.set(identifier, lookup.company);
        for (const message of lookup.skipped) report("warn", message);
      } else {
        result.invalid.push(identifier);
        report("warn", `Skipping invalid identifier ${identifier}: ${lookup.error.message}`);
      }
    }
    return result;
  }

  /** Phase 2: company records for every valid identifier, in request order. */
  async loadCompanies(
    validation: ValidationResult,
    session: HttpSession,
    report: Report,
  ): Promise<CompanyRecord[]> {
    const companies: CompanyRecord[] = [];
    for (const identifier of validation.valid) {
      const cached = this.reuseValidationResponses
        ? validation.companies.get(identifier)
        : undefined;
      if (cached) {
        companies.push(cached);
        continue;
      }

      const lookup = await this.provider.getCompany(identifier, session);
      if (lookup.ok) {
        companies.push(lookup.company);
        for (const message of lookup.skipped) report("warn", message);
      } else {
        report("warn", `No data on re-query for ${identifier}: ${lookup.error.message}`);
      }
    }
    return companies;
  }

  /**
   * Fetch → upload → catalog one candidate. Never throws: every failure
   * becomes an outcome.
   */
  async processCandidate(
    candidate: Candidate,
    bucket: string,
    session: HttpSession,
    report: Report,
  ): Promise<CandidateOutcome> {
    const { company, event, category } = candidate;
    try {
      const produced = await this.strategies[category].fetchArtifact(candidate, session);
      if (!produced.ok) {
        report("warn", produced.reason);
        return { kind: "no-artifact", reason: produced.reason };
      }

      const key = formatKey(company.displayName, event.date, category, produced.artifact.filename);
      if (!(await this.uploadArtifact(produced.artifact, key, bucket, report))) {
        return { kind: "upload-failed", key };
      }

      const url = this.storage.url(bucket, key);
      const recorded = await this.recorder.create(
        {
          company: company.displayName,
          identifier: company.identifiers[0],
          storageUrl: url,
          eventDate: event.date,
          eventType: event.typeLabel || event.title,
          documentType: category,
        },
        (err) => report("error", err.message),
      );
      if (!recorded) {
        report("warn", `Failed to create metadata record for ${key}`);
        return { kind: "metadata-failed", key, storageUrl: url };
      }
      return { kind: "success", key, storageUrl: url };
    } catch (err) {
      const message = `Error processing ${category} for "${event.title}": ${errorMessage(err)}`;
      report("error", message);
      return { kind: "error", message };
    }
  }

  /** Upload one artifact; `false` (with a diagnostic) on any storage error. */
  async uploadArtifact(
    artifact: Artifact,
    key: string,
    bucket: string,
    report: Report,
  ): Promise<boolean> {
    try {
      await this.storage.write(bucket, key, artifact.data, artifact.contentType);
      return true;
    } catch (err) {
      report("error", errorMessage(err));
      return false;
    }
  }
}
