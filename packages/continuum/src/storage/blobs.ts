/**
 * Residual Blob Store
 *
 * Content-addressed storage for residual bytes. A chunk's diffBlobRef
 * is the ref returned by put().
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { sha256 } from '../utils/hash.js';

const REF_PREFIX = 'blob:sha256:';
const HASH_PATTERN = /^[0-9a-f]{64}$/;

export interface IBlobStore {
  /** Store bytes; identical content yields the same ref */
  put(bytes: Buffer): Promise<string>;
  /** Null when the ref is unknown or malformed */
  get(ref: string): Promise<Buffer | null>;
  has(ref: string): Promise<boolean>;
}

export function blobRef(hash: string): string {
  return `${REF_PREFIX}${hash}`;
}

/**
 * Extract the hash from a ref, or null when it is not a blob ref
 */
export function parseBlobRef(ref: string): string | null {
  if (!ref.startsWith(REF_PREFIX)) return null;
  const hash = ref.slice(REF_PREFIX.length);
  return HASH_PATTERN.test(hash) ? hash : null;
}

/**
 * Blobs under `<root>/<aa>/<hash>`
 */
export class FileBlobStore implements IBlobStore {
  constructor(private readonly root: string) {}

  async put(bytes: Buffer): Promise<string> {
    const hash = sha256(bytes);
    const file = this.pathFor(hash);
    if (await this.exists(file)) return blobRef(hash);

    await fs.mkdir(path.dirname(file), { recursive: true });
    // Write then rename so readers never see a partial blob; each put has
    // its own temp file since concurrent puts of one hash are allowed
    const temp = `${file}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.writeFile(temp, bytes);
    try {
      await fs.rename(temp, file);
    } catch (err) {
      await fs.rm(temp, { force: true });
      // Another put of the same content won the rename
      if (!(await this.exists(file))) throw err;
    }
    return blobRef(hash);
  }

  async get(ref: string): Promise<Buffer | null> {
    const hash = parseBlobRef(ref);
    if (!hash) return null;
    try {
      return await fs.readFile(this.pathFor(hash));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async has(ref: string): Promise<boolean> {
    const hash = parseBlobRef(ref);
    return hash ? this.exists(this.pathFor(hash)) : false;
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }

  private pathFor(hash: string): string {
    return path.join(this.root, hash.slice(0, 2), hash);
  }
}

/**
 * In-process blob store for tests and throwaway runs
 */
export class MemoryBlobStore implements IBlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async put(bytes: Buffer): Promise<string> {
    const hash = sha256(bytes);
    if (!this.blobs.has(hash)) {
      this.blobs.set(hash, Buffer.from(bytes));
    }
    return blobRef(hash);
  }

  async get(ref: string): Promise<Buffer | null> {
    const hash = parseBlobRef(ref);
    const stored = hash ? this.blobs.get(hash) : undefined;
    return stored ? Buffer.from(stored) : null;
  }

  async has(ref: string): Promise<boolean> {
    const hash = parseBlobRef(ref);
    return hash !== null && this.blobs.has(hash);
  }

  get size(): number {
    return this.blobs.size;
  }
}
