#!/usr/bin/env node
/**
 * CLI entrypoint for eventdocs.
 *
 * Usage:
 *   eventdocs --isin FR0000121014 --start 2024-01-01 --end 2024-12-31 --bucket my-bucket
 *   eventdocs --isins-file isins.txt --types slides,transcript,audio
 */
import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import dotenv from "dotenv";

import { configFromEnv } from "./config.js";
import { InvalidRunRequestError } from "./core/exceptions.js";
import type { Diagnostic, ProgressEvent } from "./core/types.js";
import { EventDocs } from "./index.js";

const USAGE = `
eventdocs: corporate-event documents to object storage

Usage:
  eventdocs --isin <id> [--isin <id> ...] [options]
  eventdocs --isins-file <path> [options]

Options:
  --isin <id>            Security identifier (repeatable)
  --isins-file <path>    File with one identifier per line
  --start <YYYY-MM-DD>   First event date, inclusive  (default: 2024-01-01)
  --end <YYYY-MM-DD>     Last event date, inclusive   (default: 2024-12-31)
  --types <list>         Comma-separated: slides,report,transcript,audio
                         (default: slides,report,transcript)
  --bucket <name>        Target bucket (default: $EVENTDOCS_DEFAULT_BUCKET)
  --storage <disk|s3>    Storage backend              (default: disk)
  --storage-path <dir>   Disk storage directory       (default: ./data)
  --metadata <sqlite|postgres|airtable>
                         Metadata store               (default: sqlite)
  --db-path <file>       SQLite database              (default: ./eventdocs.db)
  --pause-ms <n>         Pause after each document    (default: 100)
  --help                 Show this help

Credentials are read from the environment (or a .env file):
  EVENTDOCS_API_KEY, AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_REGION,
  AIRTABLE_API_KEY, AIRTABLE_BASE_ID, AIRTABLE_TABLE_NAME, DATABASE_URL
`.trim();

dotenv.config();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    isin: { type: "string", multiple: true, default: [] },
    "isins-file": { type: "string" },
    start: { type: "string", default: "2024-01-01" },
    end: { type: "string", default: "2024-12-31" },
    types: { type: "string", default: "slides,report,transcript" },
    bucket: { type: "string" },
    storage: { type: "string" },
    "storage-path": { type: "string" },
    metadata: { type: "string" },
    "db-path": { type: "string" },
    "pause-ms": { type: "string", default: "100" },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const identifiers = [...values.isin];
if (values["isins-file"]) {
  identifiers.push(...readFileSync(values["isins-file"], "utf-8").split("\n"));
}
if (identifiers.every((id) => !id.trim())) {
  console.error(USAGE);
  process.exit(1);
}

const env = {
  ...process.env,
  EVENTDOCS_STORAGE: values.storage ?? process.env.EVENTDOCS_STORAGE,
  EVENTDOCS_STORAGE_PATH: values["storage-path"] ?? process.env.EVENTDOCS_STORAGE_PATH,
  EVENTDOCS_METADATA: values.metadata ?? process.env.EVENTDOCS_METADATA,
  EVENTDOCS_DB_PATH: values["db-path"] ?? process.env.EVENTDOCS_DB_PATH,
  EVENTDOCS_PAUSE_MS: values["pause-ms"],
};

const printDiagnostic = ({ level, message }: Diagnostic): void => {
  if (level === "info") console.log(message);
  else console.error(`${level === "warn" ? "Warning" : "Error"}: ${message}`);
};

const printProgress = (p: ProgressEvent): void => {
  if (p.done) {
    console.log(
      `\nFinal results:\n` +
        `  Total files processed: ${p.processed}/${p.total}\n` +
        `  Successful uploads: ${p.successful}\n` +
        `  Failed uploads: ${p.failed}`,
    );
    return;
  }
  console.log(
    `Processing: ${p.processed}/${p.total} files | Successful: ${p.successful} | Failed: ${p.failed}`,
  );
};

const docs = await EventDocs.fromConfig(configFromEnv(env));
let exitCode = 1;
try {
  const result = await docs.run(
    {
      identifiers,
      startDate: values.start,
      endDate: values.end,
      categories: values.types.split(",").map((t) => t.trim()).filter(Boolean),
      bucket: values.bucket,
    },
    { onProgress: printProgress, onDiagnostic: printDiagnostic },
  );
  if (result.status === "completed") exitCode = 0;
} catch (err) {
  if (err instanceof InvalidRunRequestError) {
    console.error(err.message);
  } else {
    console.error(`An error occurred during processing: ${err instanceof Error ? err.message : String(err)}`);
  }
} finally {
  await docs.close();
}
process.exit(exitCode);
