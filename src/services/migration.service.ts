/**
 * Migration Service
 *
 * Schema versioning for the relay database. Each `vNNN_name.sql` file is
 * applied once, inside its own transaction, and recorded with a checksum.
 *
 * @module services/migration
 * @security SEC-006: All SQL via parameterized queries
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import type { DatabaseInstance } from './database.service';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Migration {
  /** Unique version number (must be sequential) */
  version: number;
  name: string;
  sql: string;
}

export interface MigrationResult {
  success: boolean;
  version: number;
  name: string;
  error?: string;
  durationMs: number;
}

export interface MigrationSummary {
  applied: MigrationResult[];
  skipped: number[];
  failed: MigrationResult | null;
  totalDurationMs: number;
}

// ============================================================================
// Constants
// ============================================================================

const MIGRATION_TABLE = 'schema_migrations';

/** Matches files like v001_identities.sql */
const MIGRATION_FILE_PATTERN = /^v(\d{3})_(.+)\.sql$/;

/**
 * Location of the bundled migrations. The build copies src/migrations to
 * dist/migrations so this resolves in both layouts.
 */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '../migrations');

const log = createLogger('migration');

// ============================================================================
// Tracking Table
// ============================================================================

function initializeMigrationTable(db: DatabaseInstance): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now')),
      checksum TEXT
    )
  `);
}

export function getAppliedMigrations(db: DatabaseInstance): number[] {
  const rows = db
    .prepare<[], { version: number }>(`SELECT version FROM ${MIGRATION_TABLE} ORDER BY version ASC`)
    .all();
  return rows.map((row) => row.version);
}

export function getCurrentSchemaVersion(db: DatabaseInstance): number {
  const result = db
    .prepare<[], { version: number | null }>(`SELECT MAX(version) as version FROM ${MIGRATION_TABLE}`)
    .get();
  return result?.version ?? 0;
}

// ============================================================================
// Migration Execution
// ============================================================================

function calculateChecksum(sql: string): string {
  return createHash('sha256').update(sql).digest('hex').substring(0, 16);
}

/**
 * Apply a single migration within a transaction
 * DB-001: Transactional migration with automatic rollback
 */
export function applyMigration(db: DatabaseInstance, migration: Migration): MigrationResult {
  const startTime = Date.now();

  log.info('Applying migration', { version: migration.version, name: migration.name });

  try {
    const checksum = calculateChecksum(migration.sql);
    const transaction = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare(`INSERT INTO ${MIGRATION_TABLE} (version, name, checksum) VALUES (?, ?, ?)`).run(
        migration.version,
        migration.name,
        checksum
      );
    });
    transaction();

    const durationMs = Date.now() - startTime;
    log.info('Migration applied successfully', {
      version: migration.version,
      name: migration.name,
      durationMs,
    });

    return { success: true, version: migration.version, name: migration.name, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';

    log.error('Migration failed', {
      version: migration.version,
      name: migration.name,
      error: errorMessage,
      durationMs,
    });

    return {
      success: false,
      version: migration.version,
      name: migration.name,
      error: errorMessage,
      durationMs,
    };
  }
}

// ============================================================================
// Migration Loading
// ============================================================================

/**
 * Load migrations from SQL files in a directory, sorted by version
 */
export function loadMigrationsFromDirectory(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    log.warn('Migrations directory does not exist', { path: migrationsDir });
    return [];
  }

  const migrations: Migration[] = [];

  for (const file of fs.readdirSync(migrationsDir)) {
    const match = MIGRATION_FILE_PATTERN.exec(file);
    if (!match) {
      continue;
    }

    migrations.push({
      version: parseInt(match[1], 10),
      name: match[2].replace(/_/g, ' '),
      sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8'),
    });
  }

  migrations.sort((a, b) => a.version - b.version);

  migrations.forEach((migration, index) => {
    if (migration.version !== index + 1) {
      log.warn('Non-sequential migration version detected', {
        expected: index + 1,
        actual: migration.version,
      });
    }
  });

  return migrations;
}

// ============================================================================
// Migration Runner
// ============================================================================

/**
 * Run all pending migrations. Stops at the first failure.
 *
 * @throws Error when a migration fails; the database is left at the last good version
 */
export function runMigrations(db: DatabaseInstance, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): MigrationSummary {
  const startTime = Date.now();
  initializeMigrationTable(db);

  const appliedSet = new Set(getAppliedMigrations(db));
  const summary: MigrationSummary = { applied: [], skipped: [], failed: null, totalDurationMs: 0 };

  for (const migration of loadMigrationsFromDirectory(migrationsDir)) {
    if (appliedSet.has(migration.version)) {
      summary.skipped.push(migration.version);
      continue;
    }

    const result = applyMigration(db, migration);
    if (!result.success) {
      summary.failed = result;
      break;
    }
    summary.applied.push(result);
  }

  summary.totalDurationMs = Date.now() - startTime;

  if (summary.failed) {
    throw new Error(`Migration v${summary.failed.version} failed: ${summary.failed.error ?? 'unknown error'}`);
  }

  log.info('Migrations complete', {
    applied: summary.applied.length,
    skipped: summary.skipped.length,
    schemaVersion: getCurrentSchemaVersion(db),
    durationMs: summary.totalDurationMs,
  });

  return summary;
}
