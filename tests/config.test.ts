/**
 * Unit tests for configuration parsing and the EventDocs facade.
 */
import { join } from "node:path";
import { describe, test, expect } from "vitest";
import { configFromEnv, parseConfig } from "../src/config.js";
import { ConfigError, InvalidRunRequestError } from "../src/core/exceptions.js";
import { buildStrategyRegistry } from "../src/documents/registry.js";
import { EventDocs } from "../src/index.js";
import { AirtableRecorder } from "../src/metadata/airtable.js";
import { SqlMetadataRecorder } from "../src/metadata/sql.js";
import { DiskStorage } from "../src/storage/disk.js";
import { S3Storage } from "../src/storage/s3.js";
import { API_KEY, PROVIDER_BASE, makeTmpDir, standardWeb, textRenderer } from "./fixtures.js";

const inMemory = { provider: "sqlite", config: { path: ":memory:" } };

describe("parseConfig", () => {
  test("defaults", async () => {
    const backends = parseConfig({ provider: { apiKey: API_KEY }, metadata: inMemory });
    expect(backends.storage).toBeInstanceOf(DiskStorage);
    expect(backends.storage.url("docs", "a.pdf")).toBe("file://docs/a.pdf");
    expect(backends.recorder).toBeInstanceOf(SqlMetadataRecorder);
    expect(backends.timeoutMs).toBe(30_000);
    expect(backends.pipeline).toEqual({ pauseMs: 0, reuseValidationResponses: true });
    expect(backends.provider.companyUrl("US0000000001")).toBe(
      "https://api.quartr.com/public/v1/companies/isin/US0000000001",
    );
    await backends.recorder.close();
  });

  test("missing API key", () => {
    expect(() => parseConfig({})).toThrow(ConfigError);
    expect(() => parseConfig({ provider: { apiKey: "" } })).toThrow(
      "Invalid eventdocs configuration: provider.apiKey: provider API key is required",
    );
  });

  test("unknown backend names are rejected", () => {
    expect(() => parseConfig({ provider: { apiKey: API_KEY }, storage: { provider: "ftp" } })).toThrow(
      ConfigError,
    );
  });

  test("postgres requires a connection string", () => {
    expect(() =>
      parseConfig({ provider: { apiKey: API_KEY }, metadata: { provider: "postgres" } }),
    ).toThrow(/^Invalid postgres configuration: connectionString: /);
  });

  test("airtable and s3 backends", () => {
    const backends = parseConfig({
      provider: { apiKey: API_KEY },
      storage: { provider: "s3", config: { region: "eu-west-1", prefix: "archive" } },
      metadata: {
        provider: "airtable",
        config: { apiKey: "test-key", baseId: "appBase", tableName: "docs" },
      },
    });
    expect(backends.storage).toBeInstanceOf(S3Storage);
    expect(backends.storage.url("docs", "a.pdf")).toBe("s3://docs/archive/a.pdf");
    expect(backends.recorder).toBeInstanceOf(AirtableRecorder);
  });

  test("airtable requires its credentials", () => {
    expect(() =>
      parseConfig({ provider: { apiKey: API_KEY }, metadata: { provider: "airtable" } }),
    ).toThrow(ConfigError);
  });
});

describe("configFromEnv", () => {
  test("maps environment variables", async () => {
    const backends = parseConfig(
      configFromEnv({
        EVENTDOCS_API_KEY: API_KEY,
        EVENTDOCS_API_BASE_URL: PROVIDER_BASE,
        EVENTDOCS_TIMEOUT_MS: "5000",
        EVENTDOCS_STORAGE: "disk",
        EVENTDOCS_STORAGE_PATH: makeTmpDir(),
        EVENTDOCS_METADATA: "sqlite",
        EVENTDOCS_DB_PATH: ":memory:",
        EVENTDOCS_PAUSE_MS: "250",
        EVENTDOCS_DEFAULT_BUCKET: "docs",
      }),
    );
    expect(backends.timeoutMs).toBe(5000);
    expect(backends.pipeline).toEqual({
      pauseMs: 250,
      reuseValidationResponses: true,
      defaultBucket: "docs",
    });
    expect(backends.provider.companyUrl("X1")).toBe(`${PROVIDER_BASE}/companies/isin/X1`);
    await backends.recorder.close();
  });

  test("unset variables fall back to defaults", () => {
    const raw = configFromEnv({ EVENTDOCS_API_KEY: API_KEY, AWS_DEFAULT_REGION: "us-east-2" });
    expect(raw.storage).toEqual({
      provider: undefined,
      config: {
        basePath: undefined,
        region: "us-east-2",
        endpoint: undefined,
        accessKeyId: undefined,
        secretAccessKey: undefined,
        prefix: undefined,
      },
    });
  });
});

describe("EventDocs", () => {
  test("runs from config with the default bucket", async () => {
    const web = standardWeb();
    const base = makeTmpDir();
    const docs = await EventDocs.fromConfig(
      {
        provider: { apiKey: API_KEY, baseUrl: PROVIDER_BASE },
        storage: { provider: "disk", config: { basePath: join(base, "storage") } },
        metadata: inMemory,
        pipeline: { defaultBucket: "docs" },
      },
      {
        http: { fetch: web.fetch },
        strategies: buildStrategyRegistry({ renderTranscript: textRenderer }),
      },
    );

    const result = await docs.run({
      identifiers: ["FR0000000003"],
      startDate: "2024-01-01",
      endDate: "2024-12-31",
      categories: ["report"],
    });

    expect(result.status).toBe("completed");
    expect(await docs._storage.list("docs")).toEqual(["globex___holdings/2024-12-31/report/ye.pdf"]);
    expect(web.calls[0].headers["x-api-key"]).toBe(API_KEY);
    await docs.close();
  });

  test("an injected fetch keeps the configured timeout", async () => {
    const docs = await EventDocs.fromConfig(
      {
        provider: { apiKey: API_KEY, baseUrl: PROVIDER_BASE, timeoutMs: 20 },
        metadata: inMemory,
      },
      { http: { fetch: () => new Promise<Response>(() => {}) } },
    );

    const result = await docs.run({
      identifiers: ["FR0000000003"],
      startDate: "2024-01-01",
      endDate: "2024-12-31",
      categories: ["report"],
      bucket: "docs",
    });

    expect(result.status).toBe("no-valid-identifiers");
    expect(result.diagnostics[0]).toEqual({
      level: "warn",
      message: `Skipping invalid identifier FR0000000003: Provider request for FR0000000003 failed: Fetch of ${PROVIDER_BASE}/companies/isin/FR0000000003 failed: timed out after 20ms`,
    });
    await docs.close();
  });

  test("a blank bucket with no default is rejected", async () => {
    const docs = await EventDocs.fromConfig(
      { provider: { apiKey: API_KEY }, metadata: inMemory },
      { http: { fetch: standardWeb().fetch } },
    );
    await expect(
      docs.run({
        identifiers: ["FR0000000003"],
        startDate: "2024-01-01",
        endDate: "2024-12-31",
        categories: ["report"],
        bucket: " ",
      }),
    ).rejects.toThrow(InvalidRunRequestError);
    await docs.close();
  });
});
