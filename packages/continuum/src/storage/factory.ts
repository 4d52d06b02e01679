/**
 * Store Factory
 *
 * Opens the continuum database and residual blob store for a
 * configuration.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { IContinuumStore } from './interface.js';
import { FileBlobStore, MemoryBlobStore } from './blobs.js';
import type { IBlobStore } from './blobs.js';
import { SQLiteContinuumStore } from './sqlite/storage.js';

/**
 * Store configuration
 */
export interface StoreConfig {
  /** SQLite path, or ':memory:' */
  dbPath: string;
  /** Directory for residual blobs; in-memory blobs when omitted */
  blobDir?: string;
  verbose?: boolean;
}

export interface StoreHandle {
  store: IContinuumStore;
  blobs: IBlobStore;
}

/**
 * Create and initialize a store
 */
export async function createStore(config: StoreConfig): Promise<IContinuumStore> {
  if (config.dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
  }
  const store = new SQLiteContinuumStore(config.dbPath, { verbose: config.verbose ?? false });
  await store.initialize();
  return store;
}

/**
 * Create the store together with its blob store
 */
export async function initStore(config: StoreConfig): Promise<StoreHandle> {
  const store = await createStore(config);
  const blobs = config.blobDir ? new FileBlobStore(config.blobDir) : new MemoryBlobStore();
  return { store, blobs };
}
