/**
 * Base Data Access Layer
 *
 * Common row access for the relay's tables. All queries are prepared
 * statements with bound parameters; table and key names come from subclass
 * constants, never from callers.
 *
 * @module dal/base
 * @security SEC-006: All queries use prepared statements with parameter binding
 */

import type { DatabaseInstance } from '../services/database.service';
import { createLogger } from '../utils/logger';

export type PrimaryKey = string | number;

const log = createLogger('dal');

/**
 * Abstract base class for Data Access Layer implementations
 *
 * @template TRow - Raw row shape as stored in SQLite
 */
export abstract class BaseDAL<TRow extends object> {
  /** Table name (must match schema exactly) */
  protected abstract readonly tableName: string;

  /** Primary key column name */
  protected abstract readonly primaryKey: string;

  constructor(protected readonly db: DatabaseInstance) {}

  /**
   * Get current ISO timestamp
   */
  protected now(): string {
    return new Date().toISOString();
  }

  /**
   * Find a raw row by primary key
   */
  protected findRowById(id: PrimaryKey): TRow | undefined {
    const result = this.db
      .prepare<[PrimaryKey], TRow>(`SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} = ?`)
      .get(id);

    log.debug('findById executed', { table: this.tableName, found: result !== undefined });
    return result;
  }

  /**
   * Count all rows in table
   */
  count(): number {
    const result = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${this.tableName}`).get();
    return result?.count ?? 0;
  }

  /**
   * Check if a row exists by primary key
   */
  exists(id: PrimaryKey): boolean {
    return this.db.prepare(`SELECT 1 FROM ${this.tableName} WHERE ${this.primaryKey} = ?`).get(id) !== undefined;
  }

  /**
   * Delete a row by primary key
   *
   * @returns true if a row was deleted
   */
  protected deleteById(id: PrimaryKey): boolean {
    const result = this.db.prepare(`DELETE FROM ${this.tableName} WHERE ${this.primaryKey} = ?`).run(id);
    return result.changes > 0;
  }
}
