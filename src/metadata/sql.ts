/**
 * Metadata recorder writing to the `documents` table of a DatabaseBackend.
 */
import { randomUUID } from "node:crypto";
import { MetadataWriteException } from "../core/exceptions.js";
import type { MetadataRow } from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import { toError, type MetadataRecorder } from "./recorder.js";

export class SqlMetadataRecorder implements MetadataRecorder {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  async create(row: MetadataRow, onError?: (err: Error) => void): Promise<boolean> {
    try {
      await this.db.execute(
        `INSERT INTO documents (id, company, isin, storage_url, event_date, event_type, document_type, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          randomUUID(),
          row.company,
          row.identifier,
          row.storageUrl,
          row.eventDate,
          row.eventType,
          row.documentType,
          new Date().toISOString(),
        ],
      );
      return true;
    } catch (err) {
      onError?.(new MetadataWriteException(toError(err).message));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // Expose for tests
  get _db(): DatabaseBackend {
    return this.db;
  }
}
