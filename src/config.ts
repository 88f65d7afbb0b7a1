/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigError } from "./core/exceptions.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DEFAULT_TIMEOUT_MS } from "./http/session.js";
import { AirtableRecorder } from "./metadata/airtable.js";
import type { MetadataRecorder } from "./metadata/recorder.js";
import { SqlMetadataRecorder } from "./metadata/sql.js";
import { DEFAULT_PROVIDER_BASE_URL, ProviderClient } from "./provider/client.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const BackendConfig = z.record(z.unknown()).default({});

const ProviderConfigSchema = z.object({
  apiKey: z.string().min(1, "provider API key is required"),
  baseUrl: z.string().url().default(DEFAULT_PROVIDER_BASE_URL),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

const StorageConfigSchema = z.object({
  provider: z.enum(["disk", "s3"]).default("disk"),
  config: BackendConfig,
});

const MetadataConfigSchema = z.object({
  provider: z.enum(["sqlite", "postgres", "airtable"]).default("sqlite"),
  config: BackendConfig,
});

const PipelineConfigSchema = z.object({
  pauseMs: z.coerce.number().int().nonnegative().default(0),
  reuseValidationResponses: z.boolean().default(true),
  defaultBucket: z.string().optional(),
});

export const ConfigSchema = z.object({
  provider: ProviderConfigSchema,
  storage: StorageConfigSchema.default({}),
  metadata: MetadataConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// Per-backend settings

const DiskConfigSchema = z.object({
  basePath: z.string().default("./data"),
});

const S3ConfigSchema = z.object({
  region: z.string().optional(),
  endpoint: z.string().optional(),
  accessKeyId: z.string().optional(),
  secretAccessKey: z.string().optional(),
  forcePathStyle: z.boolean().optional(),
  prefix: z.string().optional(),
});

const SqliteConfigSchema = z.object({
  path: z.string().default("./eventdocs.db"),
});

const PostgresConfigSchema = z.object({
  connectionString: z.string().min(1, "postgres connection string is required"),
});

const AirtableConfigSchema = z.object({
  apiKey: z.string().min(1, "Airtable API key is required"),
  baseId: z.string().min(1, "Airtable base id is required"),
  tableName: z.string().min(1, "Airtable table name is required"),
  apiUrl: z.string().url().optional(),
  fields: z
    .object({
      company: z.string(),
      identifier: z.string(),
      storageUrl: z.string(),
      eventDate: z.string(),
      eventType: z.string(),
      documentType: z.string(),
    })
    .partial()
    .optional(),
});

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new ConfigError(`Invalid ${what} configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Storage factories
// ---------------------------------------------------------------------------

export function buildStorage(
  provider: Config["storage"]["provider"],
  config: Record<string, unknown>,
): StorageBackend {
  switch (provider) {
    case "disk":
      return new DiskStorage(parseWith(DiskConfigSchema, config, "disk storage").basePath);
    case "s3":
      return new S3Storage(parseWith(S3ConfigSchema, config, "s3 storage"));
  }
}

// ---------------------------------------------------------------------------
// Metadata factories
// ---------------------------------------------------------------------------

export function buildRecorder(
  provider: Config["metadata"]["provider"],
  config: Record<string, unknown>,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): MetadataRecorder {
  switch (provider) {
    case "sqlite":
      return new SqlMetadataRecorder(
        new SQLiteBackend(parseWith(SqliteConfigSchema, config, "sqlite").path),
      );
    case "postgres":
      return new SqlMetadataRecorder(
        new PostgresBackend(
          parseWith(PostgresConfigSchema, config, "postgres").connectionString,
        ),
      );
    case "airtable":
      return new AirtableRecorder({
        ...parseWith(AirtableConfigSchema, config, "airtable"),
        timeoutMs,
      });
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export interface Backends {
  provider: ProviderClient;
  storage: StorageBackend;
  recorder: MetadataRecorder;
  timeoutMs: number;
  pipeline: PipelineConfig;
}

export function parseConfig(raw: unknown): Backends {
  const config = parseWith(ConfigSchema, raw, "eventdocs");
  return {
    provider: new ProviderClient({
      apiKey: config.provider.apiKey,
      baseUrl: config.provider.baseUrl,
    }),
    storage: buildStorage(config.storage.provider, config.storage.config),
    recorder: buildRecorder(
      config.metadata.provider,
      config.metadata.config,
      config.provider.timeoutMs,
    ),
    timeoutMs: config.provider.timeoutMs,
    pipeline: config.pipeline,
  };
}

// ---------------------------------------------------------------------------
// Environment → raw config
// ---------------------------------------------------------------------------

/**
 * Raw config from environment variables. Unset variables are left
 * undefined so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    provider: {
      apiKey: env.EVENTDOCS_API_KEY,
      baseUrl: env.EVENTDOCS_API_BASE_URL,
      timeoutMs: env.EVENTDOCS_TIMEOUT_MS,
    },
    storage: {
      provider: env.EVENTDOCS_STORAGE,
      config: {
        basePath: env.EVENTDOCS_STORAGE_PATH,
        region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION,
        endpoint: env.AWS_ENDPOINT_URL_S3,
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
        prefix: env.EVENTDOCS_S3_PREFIX,
      },
    },
    metadata: {
      provider: env.EVENTDOCS_METADATA,
      config: {
        path: env.EVENTDOCS_DB_PATH,
        connectionString: env.DATABASE_URL,
        apiKey: env.AIRTABLE_API_KEY,
        baseId: env.AIRTABLE_BASE_ID,
        tableName: env.AIRTABLE_TABLE_NAME,
      },
    },
    pipeline: {
      pauseMs: env.EVENTDOCS_PAUSE_MS,
      defaultBucket: env.EVENTDOCS_DEFAULT_BUCKET,
    },
  };
}
