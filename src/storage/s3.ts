/**
 * S3-compatible storage backend using the AWS SDK v3 client.
 *
 * Works with AWS S3 and S3-compatible endpoints (MinIO, R2, GCS HMAC).
 * Credentials fall back to the SDK's default provider chain.
 */
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { UploadFailedException } from "../core/exceptions.js";
import { storageUrl } from "../core/keys.js";
import type { StorageBackend } from "./backend.js";

export interface S3StorageConfig {
  region?: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle?: boolean;
  prefix?: string;
}

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private prefix: string;

  constructor(config: S3StorageConfig = {}) {
    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? {
              accessKeyId: config.accessKeyId,
              secretAccessKey: config.secretAccessKey,
            }
          : undefined,
    });
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  url(bucket: string, key: string): string {
    return storageUrl(bucket, this.fullKey(key), "s3");
  }

  async write(
    bucket: string,
    key: string,
    data: Uint8Array,
    contentType: string,
  ): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: this.fullKey(key),
          Body: data,
          ContentType: contentType,
        }),
      );
    } catch (err) {
      throw new UploadFailedException(
        `${this.url(bucket, key)}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async read(bucket: string, key: string): Promise<Uint8Array> {
    const out = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: this.fullKey(key) }),
    );
    if (!out.Body) throw new Error(`Empty body for s3://${bucket}/${this.fullKey(key)}`);
    return out.Body.transformToByteArray();
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: this.fullKey(key) }),
      );
      return true;
    } catch (err) {
      if (err instanceof Error && err.name === "NotFound") return false;
      throw err;
    }
  }

  async list(bucket: string, prefix = ""): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: this.fullKey(prefix),
          ContinuationToken: token,
        }),
      );
      for (const obj of page.Contents ?? []) {
        if (obj.Key) keys.push(obj.Key.slice(this.prefix.length));
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return keys.sort();
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
