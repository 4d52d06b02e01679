/**
 * SQLite Prepared Statements
 *
 * Fixed SQL for the continuum tables. Filtered list queries are built
 * in storage.ts from these select lists.
 */

// Chunks

export const INSERT_CHUNK = `
  INSERT INTO semantic_chunks (
    id, media_type, chunk_key, description_text, description_stub,
    diff_blob_ref, parent_id, quad_path, run_id, created_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const SELECT_CHUNK_COLUMNS = `
  SELECT id, media_type, chunk_key, description_text, description_stub,
         diff_blob_ref, parent_id, quad_path, run_id, created_at
  FROM semantic_chunks
`;

export const GET_CHUNK = `${SELECT_CHUNK_COLUMNS} WHERE id = ?`;

export const CHUNK_EXISTS = `SELECT 1 AS found FROM semantic_chunks WHERE id = ?`;

/**
 * Chunk followed by its parents up to the root
 */
export const GET_CHUNK_ANCESTRY = `
  WITH RECURSIVE ancestry(id, depth) AS (
    SELECT id, 0 FROM semantic_chunks WHERE id = ?
    UNION ALL
    SELECT c.parent_id, a.depth + 1
    FROM ancestry a
    JOIN semantic_chunks c ON c.id = a.id
    WHERE c.parent_id IS NOT NULL
  )
  SELECT c.id, c.media_type, c.chunk_key, c.description_text, c.description_stub,
         c.diff_blob_ref, c.parent_id, c.quad_path, c.run_id, c.created_at
  FROM ancestry a
  JOIN semantic_chunks c ON c.id = a.id
  ORDER BY a.depth ASC
`;

// Kernels

export const INSERT_KERNEL = `
  INSERT INTO unique_kernels (
    id, chunk_id, source_compressor, residual_metric, attempt_count,
    status, merged_into, created_at, updated_at
  ) VALUES (?, ?, ?, ?, 0, 'pending', NULL, ?, ?)
`;

export const SELECT_KERNEL_COLUMNS = `
  SELECT id, chunk_id, source_compressor, residual_metric, attempt_count,
         status, merged_into, created_at, updated_at
  FROM unique_kernels
`;

export const GET_KERNEL = `${SELECT_KERNEL_COLUMNS} WHERE id = ?`;

/**
 * Conditional on the state the caller observed
 */
export const UPDATE_KERNEL = `
  UPDATE unique_kernels
  SET status = ?, attempt_count = ?, residual_metric = ?, merged_into = ?, updated_at = ?
  WHERE id = ? AND status = ? AND attempt_count = ?
`;

/**
 * Compressed kernels whose chunk carries one of the given residual blobs;
 * the IN list is filled per call
 */
export function selectCompressedByResidual(count: number): string {
  return `
  SELECT c.diff_blob_ref, k.chunk_id, k.residual_metric
  FROM unique_kernels k
  JOIN semantic_chunks c ON c.id = k.chunk_id
  WHERE k.status = 'compressed'
    AND c.diff_blob_ref IN (${Array.from({ length: count }, () => '?').join(', ')})
  ORDER BY k.created_at ASC, k.rowid ASC
`;
}

// Runs

export const INSERT_RUN = `
  INSERT INTO compression_runs (
    id, media_id, strategy, config_json, output_hash, root_chunk_id,
    chunk_count, kernel_count, created_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

export const SELECT_RUN_COLUMNS = `
  SELECT id, media_id, strategy, config_json, output_hash, root_chunk_id,
         chunk_count, kernel_count, created_at
  FROM compression_runs
`;

export const GET_RUN = `${SELECT_RUN_COLUMNS} WHERE id = ?`;

// Suggestions

export const INSERT_SUGGESTION = `
  INSERT INTO research_suggestions (
    id, source, context_json, recommendation_text, status, created_at, updated_at
  ) VALUES (?, ?, ?, ?, ?, ?, ?)
`;

export const SELECT_SUGGESTION_COLUMNS = `
  SELECT id, source, context_json, recommendation_text, status, created_at, updated_at
  FROM research_suggestions
`;

export const GET_SUGGESTION = `${SELECT_SUGGESTION_COLUMNS} WHERE id = ?`;

export const UPDATE_SUGGESTION_STATUS = `
  UPDATE research_suggestions SET status = ?, updated_at = ? WHERE id = ?
`;

// Meta

export const GET_META = `SELECT value FROM continuum_meta WHERE key = ?`;

export const SET_META = `
  INSERT INTO continuum_meta (key, value, updated_at) VALUES (?, ?, ?)
  ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
`;

export const LIST_META = `SELECT key, value FROM continuum_meta ORDER BY key`;

export const COUNT_ROWS = `
  SELECT
    (SELECT COUNT(*) FROM semantic_chunks) AS chunks,
    (SELECT COUNT(*) FROM unique_kernels) AS kernels,
    (SELECT COUNT(*) FROM compression_runs) AS runs,
    (SELECT COUNT(*) FROM research_suggestions) AS suggestions
`;
