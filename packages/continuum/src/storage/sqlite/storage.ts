/**
 * SQLite Continuum Store Implementation
 *
 * Full implementation of IContinuumStore on better-sqlite3. Every write
 * that spans rows runs in one immediate transaction.
 */

import Database from 'better-sqlite3';

import type { ChunkInput, IContinuumStore, RowCounts, RunInput } from '../interface.js';
import type {
  ChunkQuery,
  CompressedResidual,
  CompressionRun,
  KernelCandidate,
  KernelExpectation,
  KernelQuery,
  KernelUpdate,
  KernelUpdateResult,
  ResearchSuggestion,
  RunBatch,
  RunQuery,
  SemanticChunk,
  SuggestionInput,
  SuggestionQuery,
  SuggestionStatus,
  UniqueKernel,
} from '../../types/index.js';
import { isKernelStatus, isMediaKind, isSuggestionSource, isTerminalStatus } from '../../types/index.js';
import { IntegrityError, InvalidTransitionError } from '../../errors.js';
import { SQLiteClient } from './client.js';
import { runMigrations } from './migrations.js';
import * as Q from './queries.js';
import { toChunk, toCompressedResidual, toKernel, toRun, toSuggestion } from './rows.js';
import type { ChunkRow, CompressedResidualRow, KernelRow, RunRow, SuggestionRow } from './rows.js';
import { generateSuggestionId } from '../../utils/id-generator.js';

export interface SQLiteStoreOptions {
  /** Log every SQL statement */
  verbose?: boolean;
}

type Entity = IntegrityError['entity'];

/**
 * Map constraint failures raised by SQLite onto IntegrityError
 */
function asIntegrityError(err: unknown, entity: Entity, entityId: string): unknown {
  if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
    return new IntegrityError(`${entity} ${entityId} violates ${err.code}: ${err.message}`, entity, entityId);
  }
  return err;
}

/**
 * SQLite implementation of the continuum store
 */
export class SQLiteContinuumStore implements IContinuumStore {
  private readonly client: SQLiteClient;

  constructor(source: string | SQLiteClient, options: SQLiteStoreOptions = {}) {
    this.client =
      typeof source === 'string' ? new SQLiteClient({ dbPath: source, verbose: options.verbose ?? false }) : source;
  }

  async initialize(): Promise<void> {
    runMigrations(this.client);
  }

  async close(): Promise<void> {
    this.client.close();
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async insertChunk(chunk: ChunkInput): Promise<SemanticChunk> {
    return this.client.transaction(
      () => this.writeChunk(chunk, chunk.runId ?? null, new Date().toISOString()),
      'immediate'
    );
  }

  async insertKernel(kernel: KernelCandidate): Promise<UniqueKernel> {
    return this.client.transaction(() => this.writeKernel(kernel, new Date().toISOString()), 'immediate');
  }

  async updateKernel(id: string, update: KernelUpdate, expected: KernelExpectation): Promise<KernelUpdateResult> {
    return this.client.transaction((): KernelUpdateResult => {
      const current = this.readKernel(id);
      if (!current) {
        return { applied: false, current: null };
      }
      if (!isKernelStatus(update.status)) {
        throw new InvalidTransitionError(id, current.status, String(update.status), 'unknown status');
      }
      if (current.status !== expected.status || current.attemptCount !== expected.attemptCount) {
        return { applied: false, current };
      }
      if (isTerminalStatus(current.status)) {
        throw new InvalidTransitionError(id, current.status, update.status, `${current.status} is terminal`);
      }
      if (update.attemptCount < current.attemptCount) {
        throw new InvalidTransitionError(
          id,
          current.status,
          update.status,
          `attempt count would decrease from ${current.attemptCount} to ${update.attemptCount}`
        );
      }
      if (update.residualMetric !== null && !(update.residualMetric >= 0 && update.residualMetric <= 1)) {
        throw new IntegrityError(`Residual metric ${update.residualMetric} is outside [0, 1]`, 'kernel', id);
      }
      const mergedInto = update.mergedInto ?? null;
      if (mergedInto !== null && !this.chunkExists(mergedInto)) {
        throw new IntegrityError(`Kernel ${id} cannot merge into missing chunk ${mergedInto}`, 'kernel', id);
      }

      const result = this.client
        .prepare(Q.UPDATE_KERNEL)
        .run(
          update.status,
          update.attemptCount,
          update.residualMetric,
          mergedInto,
          new Date().toISOString(),
          id,
          expected.status,
          expected.attemptCount
        );

      const after = this.readKernel(id);
      if (result.changes === 0 || !after) {
        return { applied: false, current: after };
      }
      return { applied: true, kernel: after };
    }, 'immediate');
  }

  async recordRun(run: RunInput): Promise<CompressionRun> {
    return this.client.transaction(
      () => this.writeRun(run, run.chunkCount ?? 0, run.kernelCount ?? 0, new Date().toISOString()),
      'immediate'
    );
  }

  async commitRun(batch: RunBatch): Promise<CompressionRun> {
    const createdAt = new Date().toISOString();
    return this.client.transaction(() => {
      for (const chunk of batch.chunks) {
        this.writeChunk(chunk, batch.run.id, createdAt);
      }
      for (const kernel of batch.kernels) {
        this.writeKernel(kernel, createdAt);
      }
      return this.writeRun(batch.run, batch.chunks.length, batch.kernels.length, createdAt);
    }, 'immediate');
  }

  async persistSuggestion(input: SuggestionInput): Promise<ResearchSuggestion> {
    if (!isSuggestionSource(input.source)) {
      throw new IntegrityError(`Unknown suggestion source ${String(input.source)}`, 'suggestion');
    }
    if (input.recommendationText.length === 0) {
      throw new IntegrityError('Suggestion text is empty', 'suggestion');
    }

    const id = generateSuggestionId();
    const timestamp = new Date().toISOString();
    try {
      this.client
        .prepare(Q.INSERT_SUGGESTION)
        .run(
          id,
          input.source,
          input.contextJson ?? null,
          input.recommendationText,
          input.status ?? 'pending',
          timestamp,
          timestamp
        );
    } catch (err) {
      throw asIntegrityError(err, 'suggestion', id);
    }

    const row = this.client.prepare<SuggestionRow>(Q.GET_SUGGESTION).get(id);
    if (!row) {
      throw new IntegrityError(`Suggestion ${id} missing after insert`, 'suggestion', id);
    }
    return toSuggestion(row);
  }

  async updateSuggestionStatus(id: string, status: SuggestionStatus): Promise<ResearchSuggestion | null> {
    this.client.prepare(Q.UPDATE_SUGGESTION_STATUS).run(status, new Date().toISOString(), id);
    return this.getSuggestion(id);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async getChunk(id: string): Promise<SemanticChunk | null> {
    const row = this.client.prepare<ChunkRow>(Q.GET_CHUNK).get(id);
    return row ? toChunk(row) : null;
  }

  async listChunks(query: ChunkQuery = {}): Promise<SemanticChunk[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.mediaKind) {
      conditions.push('media_type = ?');
      params.push(query.mediaKind);
    }
    if (query.parentId === null) {
      conditions.push('parent_id IS NULL');
    } else if (query.parentId !== undefined) {
      conditions.push('parent_id = ?');
      params.push(query.parentId);
    }
    if (query.runId) {
      conditions.push('run_id = ?');
      params.push(query.runId);
    }
    this.addWindow(conditions, params, query.since, query.until);

    let sql = Q.SELECT_CHUNK_COLUMNS + this.where(conditions) + ' ORDER BY rowid ASC';
    if (query.limit !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      params.push(query.limit, query.offset ?? 0);
    }

    return this.client
      .prepare<ChunkRow>(sql)
      .all(...params)
      .map(toChunk);
  }

  async getChunkAncestry(id: string): Promise<SemanticChunk[]> {
    return this.client
      .prepare<ChunkRow>(Q.GET_CHUNK_ANCESTRY)
      .all(id)
      .map(toChunk);
  }

  async getKernel(id: string): Promise<UniqueKernel | null> {
    return this.readKernel(id);
  }

  async listKernels(query: KernelQuery = {}): Promise<UniqueKernel[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.status) {
      conditions.push('status = ?');
      params.push(query.status);
    }
    if (query.sourceCompressor) {
      conditions.push('source_compressor = ?');
      params.push(query.sourceCompressor);
    }
    this.addWindow(conditions, params, query.since, query.until);

    const direction = query.order === 'newest' ? 'DESC' : 'ASC';
    let sql = `${Q.SELECT_KERNEL_COLUMNS}${this.where(conditions)} ORDER BY created_at ${direction}, rowid ${direction}`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.client
      .prepare<KernelRow>(sql)
      .all(...params)
      .map(toKernel);
  }

  async listCompressedByResidual(diffBlobRefs: string[]): Promise<CompressedResidual[]> {
    const refs = [...new Set(diffBlobRefs)];
    if (refs.length === 0) return [];

    return this.client
      .prepare<CompressedResidualRow>(Q.selectCompressedByResidual(refs.length))
      .all(...refs)
      .map(toCompressedResidual);
  }

  async getRun(id: string): Promise<CompressionRun | null> {
    const row = this.client.prepare<RunRow>(Q.GET_RUN).get(id);
    return row ? toRun(row) : null;
  }

  async listRuns(query: RunQuery = {}): Promise<CompressionRun[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.strategy) {
      conditions.push('strategy = ?');
      params.push(query.strategy);
    }
    if (query.mediaId) {
      conditions.push('media_id = ?');
      params.push(query.mediaId);
    }
    this.addWindow(conditions, params, query.since, query.until);

    let sql = `${Q.SELECT_RUN_COLUMNS}${this.where(conditions)} ORDER BY created_at DESC, rowid DESC`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.client
      .prepare<RunRow>(sql)
      .all(...params)
      .map(toRun);
  }

  async getSuggestion(id: string): Promise<ResearchSuggestion | null> {
    const row = this.client.prepare<SuggestionRow>(Q.GET_SUGGESTION).get(id);
    return row ? toSuggestion(row) : null;
  }

  async listSuggestions(query: SuggestionQuery = {}): Promise<ResearchSuggestion[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (query.source) {
      conditions.push('source = ?');
      params.push(query.source);
    }
    if (query.status) {
      conditions.push('status = ?');
      params.push(query.status);
    }

    let sql = `${Q.SELECT_SUGGESTION_COLUMNS}${this.where(conditions)} ORDER BY created_at DESC, rowid DESC`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.client
      .prepare<SuggestionRow>(sql)
      .all(...params)
      .map(toSuggestion);
  }

  // ==========================================================================
  // Metadata & maintenance
  // ==========================================================================

  async getMeta(key: string): Promise<string | null> {
    const row = this.client.prepare<{ value: string | null }>(Q.GET_META).get(key);
    return row?.value ?? null;
  }

  async setMeta(key: string, value: string): Promise<void> {
    this.client.prepare(Q.SET_META).run(key, value, new Date().toISOString());
  }

  async listMeta(): Promise<Record<string, string>> {
    const entries: Record<string, string> = {};
    for (const row of this.client.prepare<{ key: string; value: string | null }>(Q.LIST_META).all()) {
      entries[row.key] = row.value ?? '';
    }
    return entries;
  }

  async countRows(): Promise<RowCounts> {
    const row = this.client.prepare<RowCounts>(Q.COUNT_ROWS).get();
    return row ?? { chunks: 0, kernels: 0, runs: 0, suggestions: 0 };
  }

  async checkpoint(): Promise<void> {
    this.client.database.pragma('wal_checkpoint(TRUNCATE)');
  }

  async vacuum(): Promise<void> {
    this.client.exec('VACUUM');
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private writeChunk(chunk: ChunkInput, runId: string | null, createdAt: string): SemanticChunk {
    if (!isMediaKind(chunk.mediaKind)) {
      throw new IntegrityError(`Unknown media kind ${String(chunk.mediaKind)}`, 'chunk', chunk.id);
    }
    if (chunk.parentId === chunk.id) {
      throw new IntegrityError(`Chunk ${chunk.id} cannot be its own parent`, 'chunk', chunk.id);
    }
    if (chunk.parentId !== null && !this.chunkExists(chunk.parentId)) {
      throw new IntegrityError(`Parent ${chunk.parentId} of chunk ${chunk.id} does not exist`, 'chunk', chunk.id);
    }

    try {
      this.client
        .prepare(Q.INSERT_CHUNK)
        .run(
          chunk.id,
          chunk.mediaKind,
          chunk.chunkKey,
          chunk.descriptionText,
          chunk.descriptionStub ? 1 : 0,
          chunk.diffBlobRef,
          chunk.parentId,
          chunk.quadPath,
          runId,
          createdAt
        );
    } catch (err) {
      throw asIntegrityError(err, 'chunk', chunk.id);
    }

    return { ...chunk, runId, createdAt };
  }

  private writeKernel(kernel: KernelCandidate, createdAt: string): UniqueKernel {
    if (!this.chunkExists(kernel.chunkId)) {
      throw new IntegrityError(`Kernel ${kernel.id} references missing chunk ${kernel.chunkId}`, 'kernel', kernel.id);
    }

    try {
      this.client
        .prepare(Q.INSERT_KERNEL)
        .run(kernel.id, kernel.chunkId, kernel.sourceCompressor, kernel.residualMetric, createdAt, createdAt);
    } catch (err) {
      throw asIntegrityError(err, 'kernel', kernel.id);
    }

    return {
      ...kernel,
      attemptCount: 0,
      status: 'pending',
      mergedInto: null,
      createdAt,
      updatedAt: createdAt,
    };
  }

  private writeRun(run: RunInput, chunkCount: number, kernelCount: number, createdAt: string): CompressionRun {
    try {
      this.client
        .prepare(Q.INSERT_RUN)
        .run(
          run.id,
          run.mediaId,
          run.strategy,
          run.configJson,
          run.outputHash,
          run.rootChunkId,
          chunkCount,
          kernelCount,
          createdAt
        );
    } catch (err) {
      throw asIntegrityError(err, 'run', run.id);
    }

    return {
      id: run.id,
      mediaId: run.mediaId,
      strategy: run.strategy,
      configJson: run.configJson,
      outputHash: run.outputHash,
      rootChunkId: run.rootChunkId,
      chunkCount,
      kernelCount,
      createdAt,
    };
  }

  private readKernel(id: string): UniqueKernel | null {
    const row = this.client.prepare<KernelRow>(Q.GET_KERNEL).get(id);
    return row ? toKernel(row) : null;
  }

  private chunkExists(id: string): boolean {
    return this.client.prepare<{ found: number }>(Q.CHUNK_EXISTS).get(id) !== undefined;
  }

  private addWindow(conditions: string[], params: unknown[], since?: string, until?: string): void {
    if (since) {
      conditions.push('created_at >= ?');
      params.push(since);
    }
    if (until) {
      conditions.push('created_at <= ?');
      params.push(until);
    }
  }

  private where(conditions: string[]): string {
    return conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  }
}
