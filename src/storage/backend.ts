/**
 * Abstract object storage backend interface.
 */
export interface StorageBackend {
  /** Catalog URL of the object written under `bucket/key`, e.g. "s3://bucket/prefix/key". */
  url(bucket: string, key: string): string;

  /** Write data under `bucket/key`. Throws UploadFailedException on failure. */
  write(
    bucket: string,
    key: string,
    data: Uint8Array,
    contentType: string,
  ): Promise<void>;

  /** Read the object stored under `bucket/key`. */
  read(bucket: string, key: string): Promise<Uint8Array>;

  /** Check if the key exists. */
  exists(bucket: string, key: string): Promise<boolean>;

  /** List all keys in `bucket` with the given prefix. */
  list(bucket: string, prefix?: string): Promise<string[]>;

  /** Release clients / connections. */
  close(): Promise<void>;
}
