/**
 * Unit tests for storage backends.
 */
import { existsSync } from "node:fs";
import { join } from "node:path";
import { describe, test, expect } from "vitest";
import { UploadFailedException } from "../src/core/exceptions.js";
import { DiskStorage } from "../src/storage/disk.js";
import { S3Storage } from "../src/storage/s3.js";
import { bytes, makeTmpDir } from "./fixtures.js";

describe("DiskStorage", () => {
  test("write then read", async () => {
    const storage = new DiskStorage(makeTmpDir());
    await storage.write("docs", "acme/2024-03-01/slides/deck.pdf", bytes("deck"), "application/pdf");

    expect(new TextDecoder().decode(await storage.read("docs", "acme/2024-03-01/slides/deck.pdf"))).toBe(
      "deck",
    );
    expect(await storage.exists("docs", "acme/2024-03-01/slides/deck.pdf")).toBe(true);
    expect(await storage.exists("docs", "acme/2024-03-01/slides")).toBe(false);
    expect(await storage.exists("other", "acme/2024-03-01/slides/deck.pdf")).toBe(false);
  });

  test("overwrites an existing key", async () => {
    const storage = new DiskStorage(makeTmpDir());
    await storage.write("docs", "a.pdf", bytes("first"), "application/pdf");
    await storage.write("docs", "a.pdf", bytes("second"), "application/pdf");
    expect(new TextDecoder().decode(await storage.read("docs", "a.pdf"))).toBe("second");
  });

  test("list is sorted and filtered by prefix", async () => {
    const storage = new DiskStorage(makeTmpDir());
    for (const key of ["b/2.pdf", "a/1.pdf", "b/1.pdf", "c.pdf"]) {
      await storage.write("docs", key, bytes(key), "application/pdf");
    }
    expect(await storage.list("docs")).toEqual(["a/1.pdf", "b/1.pdf", "b/2.pdf", "c.pdf"]);
    expect(await storage.list("docs", "b/")).toEqual(["b/1.pdf", "b/2.pdf"]);
    expect(await storage.list("missing")).toEqual([]);
  });

  test("write failures raise UploadFailedException", async () => {
    const storage = new DiskStorage(makeTmpDir());
    await storage.write("docs", "a", bytes("file"), "text/plain");
    await expect(storage.write("docs", "a/b.pdf", bytes("x"), "application/pdf")).rejects.toThrow(
      UploadFailedException,
    );
  });

  test("keys cannot leave their bucket", async () => {
    const base = makeTmpDir();
    const storage = new DiskStorage(join(base, "storage"));

    await expect(
      storage.write("docs", "acme/2024-06-01/../../../../escaped.pdf", bytes("x"), "application/pdf"),
    ).rejects.toThrow(UploadFailedException);
    await expect(storage.write("../outside", "a.pdf", bytes("x"), "application/pdf")).rejects.toThrow(
      UploadFailedException,
    );
    expect(existsSync(join(base, "escaped.pdf"))).toBe(false);
    expect(existsSync(join(base, "outside"))).toBe(false);
    expect(await storage.exists("docs", "../../escaped.pdf")).toBe(false);
  });

  test("catalog URL", () => {
    expect(new DiskStorage(makeTmpDir()).url("docs", "a/b.pdf")).toBe("file://docs/a/b.pdf");
  });
});

describe("S3Storage", () => {
  test("catalog URL includes the key prefix", async () => {
    const prefixed = new S3Storage({ region: "eu-west-1", prefix: "archive/" });
    expect(prefixed.url("docs", "a/b.pdf")).toBe("s3://docs/archive/a/b.pdf");

    const plain = new S3Storage({ region: "eu-west-1" });
    expect(plain.url("docs", "a/b.pdf")).toBe("s3://docs/a/b.pdf");

    await Promise.all([prefixed.close(), plain.close()]);
  });
});
