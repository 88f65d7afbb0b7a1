/**
 * Shared test fixtures: provider payloads, an in-process fake web, and a
 * pre-configured pipeline over disk storage + in-memory SQLite.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { DocumentPipeline, type DocumentPipelineOptions } from "../src/core/pipeline.js";
import type { ProgressEvent, RunHooks, Diagnostic } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { buildStrategyRegistry } from "../src/documents/registry.js";
import type { FetchLike } from "../src/http/session.js";
import { SqlMetadataRecorder } from "../src/metadata/sql.js";
import { ProviderClient } from "../src/provider/client.js";
import type { TranscriptRenderer } from "../src/render/transcript-pdf.js";
import { DiskStorage } from "../src/storage/disk.js";

export const PROVIDER_BASE = "https://provider.test/v1";
export const API_KEY = "test-key";

// ---------------------------------------------------------------------------
// Provider payloads
// ---------------------------------------------------------------------------

export const ACME = {
  displayName: "Acme Corp",
  isins: ["US0000000001", "US0000000002"],
  events: [
    {
      eventDate: "2024-03-01T10:00:00Z",
      eventTitle: "Q4 Results",
      eventType: { type: "Earnings" },
      slidesUrl: "https://cdn.test/acme/q4-slides.pdf",
      reportUrl: "https://cdn.test/acme/q4-report.pdf",
      transcriptUrl: "https://cdn.test/acme/q4-transcript",
      audioUrl: "https://cdn.test/acme/q4.mp3",
      transcripts: { transcriptUrl: "https://cdn.test/acme/q4-transcript.json" },
    },
    {
      eventDate: "2024-06-15T08:00:00Z",
      eventTitle: "Capital Markets Day",
      eventType: { type: "Investor Day" },
      slidesUrl: "https://cdn.test/acme/cmd.pdf",
    },
    {
      eventDate: "2023-12-31T09:00:00Z",
      eventTitle: "Old Event",
      slidesUrl: "https://cdn.test/acme/old.pdf",
    },
  ],
};

export const GLOBEX = {
  displayName: "Globex / Holdings",
  isins: ["FR0000000003"],
  events: [
    {
      eventDate: "2024-12-31T23:00:00Z",
      eventTitle: "Year End Call",
      eventType: { type: "Call" },
      reportUrl: "https://cdn.test/globex/ye.pdf?sig=abc",
    },
  ],
};

export const TRANSCRIPT_TEXT = "Welcome everyone. Revenue grew. Thank you";

// ---------------------------------------------------------------------------
// Fake web
// ---------------------------------------------------------------------------

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function fileResponse(text: string, contentType?: string): Response {
  return new Response(bytes(text), {
    status: 200,
    headers: contentType ? { "content-type": contentType } : {},
  });
}

/** Routes GET requests to canned responses; unknown URLs answer 404. */
export class FakeWeb {
  routes = new Map<string, () => Response | Promise<Response>>();
  calls: Array<{ url: string; headers: Record<string, string> }> = [];

  on(url: string, respond: () => Response | Promise<Response>): this {
    this.routes.set(url, respond);
    return this;
  }

  company(identifier: string, body: unknown): this {
    return this.on(`${PROVIDER_BASE}/companies/isin/${identifier}`, () => jsonResponse(body));
  }

  get urls(): string[] {
    return this.calls.map((c) => c.url);
  }

  fetch: FetchLike = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    this.calls.push({ url, headers });
    const route = this.routes.get(url);
    if (!route) return new Response("not found", { status: 404 });
    return route();
  };
}

/** Web serving ACME (US0000000001), GLOBEX (FR0000000003) and all their files. */
export function standardWeb(): FakeWeb {
  return new FakeWeb()
    .company("US0000000001", ACME)
    .company("FR0000000003", GLOBEX)
    .on("https://cdn.test/acme/q4-slides.pdf", () => fileResponse("q4 slides", "application/pdf"))
    .on("https://cdn.test/acme/q4-report.pdf", () => fileResponse("q4 report"))
    .on("https://cdn.test/acme/q4-transcript.json", () =>
      jsonResponse({ transcript: { text: TRANSCRIPT_TEXT } }),
    )
    .on("https://cdn.test/acme/q4.mp3", () => fileResponse("q4 audio", "audio/mpeg"))
    .on("https://cdn.test/acme/cmd.pdf", () => fileResponse("cmd slides", "application/pdf"))
    .on("https://cdn.test/globex/ye.pdf?sig=abc", () => fileResponse("ye report", "application/pdf"));
}

/** Renders the transcript text as plain bytes so tests can read it back. */
export const textRenderer: TranscriptRenderer = async (doc) =>
  bytes(`${doc.companyName}|${doc.eventTitle}|${doc.eventDate}\n${doc.text}`);

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "eventdocs-test-"));
}

export interface TestRig {
  pipeline: DocumentPipeline;
  storage: DiskStorage;
  recorder: SqlMetadataRecorder;
  web: FakeWeb;
}

export async function makeRig(
  web: FakeWeb,
  overrides: Partial<DocumentPipelineOptions> = {},
): Promise<TestRig> {
  const storage = new DiskStorage(join(makeTmpDir(), "storage"));
  const recorder = new SqlMetadataRecorder(new SQLiteBackend(":memory:"));
  await recorder.initialize();
  const pipeline = new DocumentPipeline({
    provider: new ProviderClient({ apiKey: API_KEY, baseUrl: PROVIDER_BASE }),
    storage,
    recorder,
    strategies: buildStrategyRegistry({ renderTranscript: textRenderer }),
    http: { fetch: web.fetch, timeoutMs: 1000 },
    ...overrides,
  });
  return { pipeline, storage, recorder, web };
}

export interface DocumentRow {
  company: string;
  isin: string;
  storage_url: string;
  event_date: string;
  event_type: string;
  document_type: string;
}

export async function documentRows(recorder: SqlMetadataRecorder): Promise<DocumentRow[]> {
  return recorder._db.query<DocumentRow>(
    "SELECT company, isin, storage_url, event_date, event_type, document_type FROM documents ORDER BY rowid",
  );
}

/** Hooks that record every progress event and diagnostic. */
export function recordingHooks(): RunHooks & {
  progress: ProgressEvent[];
  diagnostics: Diagnostic[];
} {
  const progress: ProgressEvent[] = [];
  const diagnostics: Diagnostic[] = [];
  return {
    progress,
    diagnostics,
    onProgress: (e) => progress.push(e),
    onDiagnostic: (d) => diagnostics.push(d),
  };
}
