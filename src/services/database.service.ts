/**
 * Database Service
 *
 * Opens the relay's SQLite store (outbox + identities) and applies the
 * pragmas the delivery loop relies on. The instance is returned to the caller
 * and injected into every DAL; nothing here is module-global.
 *
 * @module services/database
 * @security SEC-006: Prepared statements for all queries
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Database instance type exported for DAL usage
 */
export type DatabaseInstance = Database.Database;

/**
 * Database configuration options
 */
export interface DatabaseOptions {
  /** Path to database file, or ':memory:' */
  dbPath: string;
  /** Enable verbose SQL logging (debug only) */
  verbose?: boolean;
  /** Memory limit for SQLite in KB (default: 16MB) */
  memoryLimit?: number;
  /** How long a writer waits on a locked database (default: 5000ms) */
  busyTimeoutMs?: number;
}

/**
 * Database health check result
 */
export interface DatabaseHealth {
  isOpen: boolean;
  tableCount: number;
  sizeBytes: number;
  path: string;
}

// ============================================================================
// Constants
// ============================================================================

export const IN_MEMORY_PATH = ':memory:';
const DEFAULT_MEMORY_LIMIT_KB = 16 * 1024;
const DEFAULT_BUSY_TIMEOUT_MS = 5000;

const log = createLogger('database');

// ============================================================================
// Database Initialization
// ============================================================================

/**
 * Open the SQLite database
 *
 * Steps:
 * 1. Ensure the parent directory exists (file databases only)
 * 2. Open with better-sqlite3
 * 3. Verify the file is a readable database
 * 4. Apply performance pragmas
 *
 * @throws Error if the file cannot be opened or is not a database
 */
export function openDatabase(options: DatabaseOptions): DatabaseInstance {
  const isMemory = options.dbPath === IN_MEMORY_PATH;
  const finalDbPath = isMemory ? IN_MEMORY_PATH : path.resolve(options.dbPath);

  if (!isMemory) {
    const dbDir = path.dirname(finalDbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
      log.debug('Database directory created', { path: dbDir });
    }
  }

  let db: DatabaseInstance;
  try {
    db = new Database(finalDbPath, {
      verbose: options.verbose
        ? (message?: unknown) => log.debug('SQL executed', { sql: String(message).substring(0, 200) })
        : undefined,
    });
  } catch (error) {
    log.error('Failed to open database file', {
      path: finalDbPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error(`Failed to open database: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  try {
    db.exec('SELECT count(*) FROM sqlite_master');
  } catch (error) {
    db.close();
    log.error('Database access verification failed', {
      path: finalDbPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error('Database access verification failed. The database may be corrupted.');
  }

  applyPerformancePragmas(db, options, isMemory);

  log.info('Database opened', { path: finalDbPath });
  return db;
}

/**
 * Apply performance optimization pragmas
 */
function applyPerformancePragmas(db: DatabaseInstance, options: DatabaseOptions, isMemory: boolean): void {
  // WAL is meaningless for in-memory databases
  if (!isMemory) {
    db.pragma('journal_mode = WAL');
  }

  // Outbox writes must survive power loss on field devices; NORMAL is safe under WAL
  db.pragma('synchronous = NORMAL');

  const memoryLimit = options.memoryLimit || DEFAULT_MEMORY_LIMIT_KB;
  db.pragma(`cache_size = -${memoryLimit}`);
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
  db.pragma('temp_store = MEMORY');

  log.debug('Performance pragmas applied', { memoryLimitKB: memoryLimit });
}

// ============================================================================
// Health & Shutdown
// ============================================================================

/**
 * Get database health information
 */
export function getDatabaseHealth(db: DatabaseInstance): DatabaseHealth {
  const tableCountResult = db
    .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM sqlite_master WHERE type = 'table'")
    .get();

  let sizeBytes = 0;
  if (db.name !== IN_MEMORY_PATH && fs.existsSync(db.name)) {
    sizeBytes = fs.statSync(db.name).size;
  }

  return {
    isOpen: db.open,
    tableCount: tableCountResult?.count ?? 0,
    sizeBytes,
    path: db.name,
  };
}

/**
 * Close the database, checkpointing the WAL first
 */
export function closeDatabase(db: DatabaseInstance): void {
  if (!db.open) {
    return;
  }

  try {
    if (db.name !== IN_MEMORY_PATH) {
      db.pragma('wal_checkpoint(TRUNCATE)');
    }
  } finally {
    db.close();
    log.info('Database closed', { path: db.name });
  }
}
