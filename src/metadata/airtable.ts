/**
 * Metadata recorder appending rows to an Airtable table over its REST API.
 *
 * Field names must match the table's column names exactly; the defaults
 * can be overridden per field.
 */
import { MetadataWriteException } from "../core/exceptions.js";
import type { MetadataRow } from "../core/types.js";
import type { FetchLike } from "../http/session.js";
import { toError, type MetadataRecorder } from "./recorder.js";

export const DEFAULT_AIRTABLE_URL = "https://api.airtable.com/v0";

export const DEFAULT_AIRTABLE_FIELDS = {
  company: "Company",
  identifier: "ISIN",
  storageUrl: "AWS URL",
  eventDate: "Event Date",
  eventType: "Event Type",
  documentType: "Document Type",
} satisfies Record<keyof MetadataRow, string>;

export type AirtableFieldNames = Record<keyof MetadataRow, string>;

export interface AirtableConfig {
  apiKey: string;
  baseId: string;
  tableName: string;
  apiUrl?: string;
  fields?: Partial<AirtableFieldNames>;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class AirtableRecorder implements MetadataRecorder {
  private apiKey: string;
  private endpoint: string;
  private fields: AirtableFieldNames;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: AirtableConfig) {
    this.apiKey = config.apiKey;
    const apiUrl = (config.apiUrl ?? DEFAULT_AIRTABLE_URL).replace(/\/$/, "");
    this.endpoint = `${apiUrl}/${encodeURIComponent(config.baseId)}/${encodeURIComponent(config.tableName)}`;
    this.fields = { ...DEFAULT_AIRTABLE_FIELDS, ...config.fields };
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.fetchImpl = config.fetch ?? fetch;
  }

  toFields(row: MetadataRow): Record<string, string> {
    return {
      [this.fields.company]: row.company,
      [this.fields.identifier]: row.identifier,
      [this.fields.storageUrl]: row.storageUrl,
      [this.fields.eventDate]: row.eventDate,
      [this.fields.eventType]: row.eventType,
      [this.fields.documentType]: row.documentType,
    };
  }

  async create(row: MetadataRow, onError?: (err: Error) => void): Promise<boolean> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ fields: this.toFields(row) }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new MetadataWriteException(
          `Airtable responded ${response.status}${detail ? `: ${detail}` : ""}`,
        );
      }
      return true;
    } catch (err) {
      onError?.(err instanceof MetadataWriteException ? err : new MetadataWriteException(toError(err).message));
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  async initialize(): Promise<void> {}

  async close(): Promise<void> {}
}
