/**
 * SQLite Schema Definition
 *
 * The continuum holds five entity tables:
 * - semantic_chunks: chunk tree produced by compressors
 * - unique_kernels: chunks that resist compression, with their lifecycle
 * - compression_runs: append-only audit of pipeline invocations
 * - research_suggestions: output of the improvement loop
 * - continuum_meta: key/value metadata, including the schema version
 *
 * The schema only ever grows. Each migration adds tables, indexes, or
 * columns that are nullable or carry a default, so rows written by an
 * older version stay readable in the same file.
 */

/**
 * Key/value metadata; created before any migration runs
 */
export const META_SCHEMA = `
CREATE TABLE IF NOT EXISTS continuum_meta (
  key TEXT PRIMARY KEY,
  value TEXT,
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);
`;

/**
 * Version 1: entity tables
 */
export const SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS semantic_chunks (
  id TEXT PRIMARY KEY,
  media_type TEXT NOT NULL CHECK (media_type IN ('audio', 'video', 'library', 'image', 'data')),
  chunk_key TEXT NOT NULL,
  description_text TEXT,
  diff_blob_ref TEXT,
  parent_id TEXT REFERENCES semantic_chunks(id),
  quad_path TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  CHECK (parent_id IS NULL OR parent_id <> id)
);

CREATE TABLE IF NOT EXISTS unique_kernels (
  id TEXT PRIMARY KEY,
  chunk_id TEXT NOT NULL REFERENCES semantic_chunks(id),
  source_compressor TEXT NOT NULL,
  residual_metric REAL,
  attempt_count INTEGER NOT NULL DEFAULT 0 CHECK (attempt_count >= 0),
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'compressed', 'flagged_research')),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS compression_runs (
  id TEXT PRIMARY KEY,
  media_id TEXT,
  strategy TEXT NOT NULL,
  config_json TEXT,
  output_hash TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS research_suggestions (
  id TEXT PRIMARY KEY,
  source TEXT NOT NULL CHECK (source IN ('cursor', 'manual')),
  context_json TEXT,
  recommendation_text TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_semantic_chunks_media ON semantic_chunks(media_type);
CREATE INDEX IF NOT EXISTS idx_semantic_chunks_parent ON semantic_chunks(parent_id);
CREATE INDEX IF NOT EXISTS idx_unique_kernels_status ON unique_kernels(status);
CREATE INDEX IF NOT EXISTS idx_unique_kernels_chunk ON unique_kernels(chunk_id);
CREATE INDEX IF NOT EXISTS idx_compression_runs_created_at ON compression_runs(created_at);
`;

/**
 * Version 2: stub flag and run provenance on chunks, kernel bookkeeping,
 * run counters, suggestion update time
 */
export const SCHEMA_V2 = `
ALTER TABLE semantic_chunks ADD COLUMN description_stub INTEGER NOT NULL DEFAULT 0;
ALTER TABLE semantic_chunks ADD COLUMN run_id TEXT;
ALTER TABLE unique_kernels ADD COLUMN merged_into TEXT;
ALTER TABLE unique_kernels ADD COLUMN updated_at TEXT;
ALTER TABLE compression_runs ADD COLUMN root_chunk_id TEXT;
ALTER TABLE compression_runs ADD COLUMN chunk_count INTEGER NOT NULL DEFAULT 0;
ALTER TABLE compression_runs ADD COLUMN kernel_count INTEGER NOT NULL DEFAULT 0;
ALTER TABLE research_suggestions ADD COLUMN updated_at TEXT;

CREATE INDEX IF NOT EXISTS idx_semantic_chunks_run ON semantic_chunks(run_id);
CREATE INDEX IF NOT EXISTS idx_unique_kernels_created_at ON unique_kernels(created_at);
`;

/**
 * Schema version for migrations
 */
export const SCHEMA_VERSION = 2;

/**
 * Meta key holding the applied schema version
 */
export const SCHEMA_VERSION_KEY = 'schema_version';
