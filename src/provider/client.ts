/**
 * Client for the event-data provider.
 */
import { datePrefix } from "../core/keys.js";
import { ArtifactFetchError, ProviderRequestError } from "../core/exceptions.js";
import {
  DOCUMENT_CATEGORIES,
  type CompanyEvent,
  type CompanyRecord,
  type DocumentCategory,
} from "../core/types.js";
import type { HttpSession, SessionResponse } from "../http/session.js";
import {
  ProviderCompanySchema,
  ProviderEventSchema,
  type ProviderCompany,
  type ProviderEvent,
} from "./schemas.js";

export const DEFAULT_PROVIDER_BASE_URL = "https://api.quartr.com/public/v1";

export interface ProviderClientConfig {
  apiKey: string;
  baseUrl?: string;
}

export type CompanyLookup =
  | { ok: true; company: CompanyRecord; skipped: string[] }
  | { ok: false; error: ProviderRequestError };

const URL_FIELDS: Record<DocumentCategory, keyof ProviderEvent> = {
  slides: "slidesUrl",
  report: "reportUrl",
  transcript: "transcriptUrl",
  audio: "audioUrl",
};

function toEvent(raw: ProviderEvent): CompanyEvent {
  const timestamp = raw.eventDate ?? "";
  const urls: Partial<Record<DocumentCategory, string>> = {};
  for (const category of DOCUMENT_CATEGORIES) {
    const value = raw[URL_FIELDS[category]];
    if (typeof value === "string" && value) urls[category] = value;
  }
  const transcriptUrl = raw.transcripts?.transcriptUrl;
  return {
    date: datePrefix(timestamp),
    timestamp,
    title: raw.eventTitle ?? "Unknown Event",
    typeLabel: raw.eventType?.type ?? "",
    urls,
    ...(transcriptUrl ? { transcriptUrl } : {}),
  };
}

export function toCompanyRecord(raw: ProviderCompany): CompanyRecord {
  const identifiers = raw.isins && raw.isins.length > 0 ? raw.isins : ["unknown"];
  return {
    displayName: raw.displayName ?? "unknown",
    identifiers,
    events: raw.events.map(toEvent),
  };
}

/** Keep well-formed events; describe each dropped one. */
export function parseEvents(
  identifier: string,
  raw: unknown[],
): { events: ProviderEvent[]; skipped: string[] } {
  const events: ProviderEvent[] = [];
  const skipped: string[] = [];
  raw.forEach((entry, index) => {
    const parsed = ProviderEventSchema.safeParse(entry);
    if (parsed.success) {
      events.push(parsed.data);
      return;
    }
    const issue = parsed.error.issues[0];
    const detail = issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
    skipped.push(`Skipping malformed event ${index + 1} for ${identifier}: ${detail}`);
  });
  return { events, skipped };
}

export class ProviderClient {
  private apiKey: string;
  private baseUrl: string;

  constructor(config: ProviderClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? DEFAULT_PROVIDER_BASE_URL).replace(/\/$/, "");
  }

  companyUrl(identifier: string): string {
    return `${this.baseUrl}/companies/isin/${encodeURIComponent(identifier)}`;
  }

  /**
   * Look up one identifier. Never throws: non-200 responses, transport
   * errors and bodies without an `events` collection come back as
   * `{ ok: false }`. Malformed events are dropped and listed in `skipped`.
   */
  async getCompany(identifier: string, session: HttpSession): Promise<CompanyLookup> {
    let response: SessionResponse;
    try {
      response = await session.get(this.companyUrl(identifier), {
        "X-Api-Key": this.apiKey,
      });
    } catch (err) {
      return {
        ok: false,
        error: new ProviderRequestError(
          identifier,
          null,
          `Provider request for ${identifier} failed: ${err instanceof Error ? err.message : String(err)}`,
        ),
      };
    }

    if (response.status !== 200) {
      await response.discard();
      return { ok: false, error: new ProviderRequestError(identifier, response.status) };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (err instanceof ArtifactFetchError) {
        return {
          ok: false,
          error: new ProviderRequestError(identifier, 200, `Provider request for ${identifier} failed: ${err.message}`),
        };
      }
      return {
        ok: false,
        error: new ProviderRequestError(identifier, 200, `Provider returned invalid JSON for ${identifier}`),
      };
    }

    const parsed = ProviderCompanySchema.safeParse(body);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ProviderRequestError(identifier, 200, `Provider returned no events for ${identifier}`),
      };
    }
    const { events, skipped } = parseEvents(identifier, parsed.data.events);
    return { ok: true, company: toCompanyRecord({ ...parsed.data, events }), skipped };
  }
}
