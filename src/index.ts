/**
 * eventdocs – corporate-event document retrieval, upload and cataloging.
 */
import { parseConfig } from "./config.js";
import { DocumentPipeline, type DocumentPipelineOptions } from "./core/pipeline.js";
import type { RunRequestInput } from "./core/request.js";
import type { RunHooks, RunResult } from "./core/types.js";
import type { MetadataRecorder } from "./metadata/recorder.js";
import type { StorageBackend } from "./storage/backend.js";

export { configFromEnv, parseConfig, ConfigSchema } from "./config.js";
export { DocumentPipeline } from "./core/pipeline.js";
export { formatKey, storageUrl } from "./core/keys.js";
export { RunRequestSchema, parseRunRequest } from "./core/request.js";
export * from "./core/exceptions.js";
export * from "./core/types.js";
export type { RunRequest, RunRequestInput } from "./core/request.js";
export { ProviderClient } from "./provider/client.js";
export { DiskStorage } from "./storage/disk.js";
export { S3Storage } from "./storage/s3.js";
export { SqlMetadataRecorder } from "./metadata/sql.js";
export { AirtableRecorder } from "./metadata/airtable.js";
export { renderTranscriptPdf } from "./render/transcript-pdf.js";

export interface EventDocsOptions extends DocumentPipelineOptions {
  /** Bucket used when a run request names none. */
  defaultBucket?: string;
}

export type EventDocsRunRequest = Omit<RunRequestInput, "bucket"> & {
  bucket?: string;
};

export class EventDocs {
  private pipeline: DocumentPipeline;
  private storage: StorageBackend;
  private recorder: MetadataRecorder;
  private defaultBucket: string;

  constructor(opts: EventDocsOptions) {
    this.pipeline = new DocumentPipeline(opts);
    this.storage = opts.storage;
    this.recorder = opts.recorder;
    this.defaultBucket = opts.defaultBucket ?? "";
  }

  /** Construct from a configuration dict (validates with Zod). */
  static async fromConfig(
    config: unknown,
    overrides: Partial<EventDocsOptions> = {},
  ): Promise<EventDocs> {
    const backends = parseConfig(config);
    const docs = new EventDocs({
      provider: backends.provider,
      storage: backends.storage,
      recorder: backends.recorder,
      pauseMs: backends.pipeline.pauseMs,
      reuseValidationResponses: backends.pipeline.reuseValidationResponses,
      defaultBucket: backends.pipeline.defaultBucket,
      ...overrides,
      http: { timeoutMs: backends.timeoutMs, ...overrides.http },
    });
    await docs.initialize();
    return docs;
  }

  /** Prepare the metadata store. Call once after construction. */
  async initialize(): Promise<void> {
    await this.recorder.initialize();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Run the pipeline; a missing or blank bucket falls back to the configured default. */
  async run(request: EventDocsRunRequest, hooks: RunHooks = {}): Promise<RunResult> {
    const bucket = request.bucket?.trim() ? request.bucket : this.defaultBucket;
    return this.pipeline.run({ ...request, bucket }, hooks);
  }

  /** Release the storage client and the metadata connection. */
  async close(): Promise<void> {
    await Promise.all([this.storage.close(), this.recorder.close()]);
  }

  // Expose for tests
  get _storage(): StorageBackend {
    return this.storage;
  }
  get _recorder(): MetadataRecorder {
    return this.recorder;
  }
}
