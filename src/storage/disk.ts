/**
 * Local filesystem storage backend. Each bucket is a directory under the
 * base path; content types are not stored.
 */
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join, dirname, resolve, sep } from "node:path";
import { storageUrl } from "../core/keys.js";
import { UploadFailedException } from "../core/exceptions.js";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  url(bucket: string, key: string): string {
    return storageUrl(bucket, key, "file");
  }

  /** Bucket directory; the bucket must name a directory directly under the base path. */
  private bucketRoot(bucket: string): string {
    const root = resolve(this.basePath, bucket);
    if (dirname(root) !== this.basePath) {
      throw new Error(`Bucket ${bucket} resolves outside ${this.basePath}`);
    }
    return root;
  }

  /** File path for `bucket/key`; keys may not leave their bucket. */
  private pathFor(bucket: string, key: string): string {
    const root = this.bucketRoot(bucket);
    const fullPath = resolve(root, key);
    if (!fullPath.startsWith(root + sep)) {
      throw new Error(`Key ${key} resolves outside bucket ${bucket}`);
    }
    return fullPath;
  }

  async write(
    bucket: string,
    key: string,
    data: Uint8Array,
    _contentType: string,
  ): Promise<void> {
    try {
      const fullPath = this.pathFor(bucket, key);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, data);
    } catch (err) {
      throw new UploadFailedException(
        `${bucket}/${key}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async read(bucket: string, key: string): Promise<Uint8Array> {
    const buf = await readFile(this.pathFor(bucket, key));
    return new Uint8Array(buf);
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      const s = await stat(this.pathFor(bucket, key));
      return s.isFile();
    } catch {
      return false;
    }
  }

  async list(bucket: string, prefix = ""): Promise<string[]> {
    const root = this.bucketRoot(bucket);
    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Keys are relative to the bucket, always "/"-separated
          keys.push(full.slice(root.length + 1).split(sep).join("/"));
        }
      }
    };

    try {
      await walk(root);
    } catch {
      return [];
    }
    return keys.filter((k) => k.startsWith(prefix)).sort();
  }

  async close(): Promise<void> {}
}
