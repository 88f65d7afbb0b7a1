/**
 * Metadata store schema. One row per uploaded artifact.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  id            TEXT PRIMARY KEY,
  company       TEXT NOT NULL,
  isin          TEXT NOT NULL,
  storage_url   TEXT NOT NULL,
  event_date    TEXT NOT NULL,
  event_type    TEXT NOT NULL,
  document_type TEXT NOT NULL,
  created_at    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_documents_isin ON documents (isin);
CREATE INDEX IF NOT EXISTS idx_documents_event_date ON documents (event_date);
`;
