export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS document_keys (
  collection TEXT NOT NULL CHECK(collection IN ('global','delete')),
  position INTEGER NOT NULL,
  id TEXT NOT NULL,
  type TEXT NOT NULL,
  parent_id TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT '',
  PRIMARY KEY(collection, position)
);

CREATE INDEX IF NOT EXISTS idx_document_keys_type ON document_keys(collection, type, id);

CREATE TABLE IF NOT EXISTS checkpoints (
  object_type TEXT PRIMARY KEY,
  synced_at TEXT NOT NULL,
  run_kind TEXT NOT NULL CHECK(run_kind IN ('full','incremental'))
);

CREATE TABLE IF NOT EXISTS secrets (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
