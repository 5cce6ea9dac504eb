/**
 * Migration Service Unit Tests
 *
 * @module tests/unit/services/migration.service.spec
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import {
  getAppliedMigrations,
  getCurrentSchemaVersion,
  loadMigrationsFromDirectory,
  runMigrations,
} from '../../../src/services/migration.service';
import { createTestDatabase, MIGRATIONS_DIR, type TestDatabaseContext } from '../../helpers/test-database';

describe('Migration Service', () => {
  let ctx: TestDatabaseContext;
  let tempDir: string;

  const writeMigration = (file: string, sql: string) => fs.writeFileSync(path.join(tempDir, file), sql);

  beforeEach(() => {
    ctx = createTestDatabase({ skipMigrations: true });
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-migrations-'));
  });

  afterEach(() => {
    ctx.cleanup();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('bundled migrations', () => {
    it('should create the relay schema at version 2', () => {
      const summary = runMigrations(ctx.db, MIGRATIONS_DIR);

      expect(summary.applied.map((result) => result.version)).toEqual([1, 2]);
      expect(getCurrentSchemaVersion(ctx.db)).toBe(2);

      const tables = ctx.db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map((row) => row.name);
      expect(tables).toEqual(expect.arrayContaining(['identities', 'outbox', 'schema_migrations']));
    });

    it('should skip migrations already applied', () => {
      runMigrations(ctx.db, MIGRATIONS_DIR);
      const second = runMigrations(ctx.db, MIGRATIONS_DIR);

      expect(second.applied).toEqual([]);
      expect(second.skipped).toEqual([1, 2]);
      expect(getAppliedMigrations(ctx.db)).toEqual([1, 2]);
    });
  });

  describe('loadMigrationsFromDirectory', () => {
    it('should load sql files in version order and ignore other files', () => {
      writeMigration('v002_second_step.sql', 'CREATE TABLE b (id INTEGER);');
      writeMigration('v001_first.sql', 'CREATE TABLE a (id INTEGER);');
      writeMigration('README.md', '# notes');

      const migrations = loadMigrationsFromDirectory(tempDir);

      expect(migrations.map((m) => [m.version, m.name])).toEqual([
        [1, 'first'],
        [2, 'second step'],
      ]);
    });

    it('should return nothing for a missing directory', () => {
      expect(loadMigrationsFromDirectory(path.join(tempDir, 'absent'))).toEqual([]);
    });
  });

  describe('failures', () => {
    it('should roll back a failing migration and stop at the last good version', () => {
      writeMigration('v001_first.sql', 'CREATE TABLE a (id INTEGER);');
      writeMigration('v002_broken.sql', 'CREATE TABLE b (id INTEGER); INSERT INTO missing_table VALUES (1);');
      writeMigration('v003_never.sql', 'CREATE TABLE c (id INTEGER);');

      expect(() => runMigrations(ctx.db, tempDir)).toThrow(/^Migration v2 failed: no such table: missing_table/);

      expect(getCurrentSchemaVersion(ctx.db)).toBe(1);
      const b = ctx.db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'b'").get();
      expect(b).toBeUndefined();
    });
  });
});
