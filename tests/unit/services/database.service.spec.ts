/**
 * Database Service Unit Tests
 *
 * @module tests/unit/services/database.service.spec
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

import { closeDatabase, getDatabaseHealth, openDatabase } from '../../../src/services/database.service';

describe('Database Service', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-db-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create missing parent directories and enable WAL for file databases', () => {
    const dbPath = path.join(tempDir, 'nested', 'relay.db');

    const db = openDatabase({ dbPath });

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    closeDatabase(db);
  });

  it('should open an in-memory database without WAL', () => {
    const db = openDatabase({ dbPath: ':memory:' });

    expect(db.pragma('journal_mode', { simple: true })).toBe('memory');
    closeDatabase(db);
  });

  it('should refuse a file that is not a database', () => {
    const dbPath = path.join(tempDir, 'garbage.db');
    fs.writeFileSync(dbPath, 'this is not an sqlite file, just some plain text padding it out');

    expect(() => openDatabase({ dbPath })).toThrow('Database access verification failed. The database may be corrupted.');
  });

  it('should report health', () => {
    const dbPath = path.join(tempDir, 'relay.db');
    const db = openDatabase({ dbPath });
    db.exec('CREATE TABLE sample (id INTEGER)');

    const health = getDatabaseHealth(db);

    expect(health).toMatchObject({ isOpen: true, tableCount: 1, path: dbPath });
    closeDatabase(db);
  });

  it('should close once and tolerate a second close', () => {
    const db = openDatabase({ dbPath: ':memory:' });

    closeDatabase(db);
    closeDatabase(db);

    expect(db.open).toBe(false);
  });
});
