/**
 * Metadata recorder interface: one row per successfully uploaded artifact.
 */
import type { MetadataRow } from "../core/types.js";

export interface MetadataRecorder {
  /** Prepare the target store (create tables). */
  initialize(): Promise<void>;

  /**
   * Append one row. Never throws; failures are reported as `false` and
   * passed to `onError` when given.
   */
  create(row: MetadataRow, onError?: (err: Error) => void): Promise<boolean>;

  /** Release connections. */
  close(): Promise<void>;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
