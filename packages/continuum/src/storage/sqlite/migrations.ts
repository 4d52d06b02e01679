/**
 * SQLite Migrations
 *
 * Applies the additive schema steps above the version recorded in
 * continuum_meta. Each step runs in its own transaction together with
 * the version bump.
 */

import type { SQLiteClient } from './client.js';
import { META_SCHEMA, SCHEMA_V1, SCHEMA_V2, SCHEMA_VERSION, SCHEMA_VERSION_KEY } from './schema.js';

export interface Migration {
  version: number;
  description: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  { version: 1, description: 'entity tables', sql: SCHEMA_V1 },
  { version: 2, description: 'stub flag, run provenance, kernel bookkeeping', sql: SCHEMA_V2 },
];

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  applied: number[];
}

/**
 * Read the applied schema version (0 for a fresh database)
 */
export function getSchemaVersion(client: SQLiteClient): number {
  client.exec(META_SCHEMA);
  const row = client
    .prepare<{ value: string | null }>('SELECT value FROM continuum_meta WHERE key = ?')
    .get(SCHEMA_VERSION_KEY);
  const version = row?.value ? parseInt(row.value, 10) : 0;
  return Number.isNaN(version) ? 0 : version;
}

/**
 * Apply migrations up to `target` (defaults to the current schema version)
 */
export function runMigrations(
  client: SQLiteClient,
  target: number = SCHEMA_VERSION
): MigrationResult {
  const fromVersion = getSchemaVersion(client);
  const applied: number[] = [];

  if (fromVersion > SCHEMA_VERSION) {
    console.warn(
      `[continuum] database schema version ${fromVersion} is newer than ${SCHEMA_VERSION}; ` +
        'opening without migrating'
    );
    return { fromVersion, toVersion: fromVersion, applied };
  }

  const setVersion = client.prepare(
    `INSERT INTO continuum_meta (key, value, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
  );

  for (const migration of MIGRATIONS) {
    if (migration.version <= fromVersion || migration.version > target) continue;

    client.transaction(() => {
      client.exec(migration.sql);
      setVersion.run(SCHEMA_VERSION_KEY, String(migration.version), new Date().toISOString());
    }, 'immediate');
    applied.push(migration.version);
  }

  return { fromVersion, toVersion: applied.length > 0 ? applied[applied.length - 1] : fromVersion, applied };
}
