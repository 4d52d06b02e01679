/**
 * SQLite Storage Implementation
 *
 * Default continuum backend on better-sqlite3.
 */

export * from './client.js';
export * from './schema.js';
export * from './migrations.js';
export * from './storage.js';
