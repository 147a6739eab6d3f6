/**
 * Tests for database connection and migrations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SCHEMA_VERSION, getSchemaVersion, migrate, openDatabase } from '../../src/storage/db.js';
import type { StorageConfig } from '../../src/config/engine-config.js';
import { IndexStoreError } from '../../src/utils/errors.js';
import { getLogLevel, setLogLevel, type LogLevel } from '../../src/utils/logger.js';

function storageConfig(dbPath: string, overrides: Partial<StorageConfig> = {}): StorageConfig {
  return {
    dbPath,
    collection: 'default',
    encryption: { enabled: false, cipher: 'chacha20' },
    ...overrides,
  };
}

function tableNames(db: ReturnType<typeof openDatabase>): string[] {
  const rows = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`)
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

describe('db', () => {
  let dir: string;
  let savedLevel: LogLevel;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'duorank-db-'));
    savedLevel = getLogLevel();
    setLogLevel('silent');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    setLogLevel(savedLevel);
  });

  describe('openDatabase', () => {
    it('creates the schema in memory', () => {
      const db = openDatabase(storageConfig(':memory:'));

      expect(tableNames(db)).toEqual([
        'chunks',
        'collections',
        'documents',
        'embedding_cache',
        'schema_version',
      ]);
      expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);
      db.close();
    });

    it('enables foreign keys', () => {
      const db = openDatabase(storageConfig(':memory:'));

      expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
      db.close();
    });

    it('creates missing parent directories and uses WAL for files', () => {
      const path = join(dir, 'nested', 'deeper', 'index.db');
      const db = openDatabase(storageConfig(path));

      expect(existsSync(path)).toBe(true);
      expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
      db.close();
    });

    it('persists data across connections', () => {
      const path = join(dir, 'index.db');
      const first = openDatabase(storageConfig(path));
      first
        .prepare('INSERT INTO collections (name, dimensions, created_at) VALUES (?, ?, ?)')
        .run('docs', 8, '2024-01-01T00:00:00.000Z');
      first.close();

      const second = openDatabase(storageConfig(path));
      const row = second.prepare('SELECT dimensions FROM collections WHERE name = ?').get('docs');

      expect(row).toEqual({ dimensions: 8 });
      second.close();
    });

    it('reopens an encrypted database with its key', () => {
      const path = join(dir, 'encrypted.db');
      const encryption = { enabled: true, cipher: 'chacha20' as const, key: 'test-secret' };
      const first = openDatabase(storageConfig(path, { encryption }));
      first
        .prepare('INSERT INTO collections (name, dimensions, created_at) VALUES (?, ?, ?)')
        .run('secret', 4, '2024-01-01T00:00:00.000Z');
      first.close();

      const second = openDatabase(storageConfig(path, { encryption }));

      expect(second.prepare('SELECT name FROM collections').all()).toEqual([{ name: 'secret' }]);
      second.close();
    });

    it('fails with DB_OPEN_FAILED when encryption has no key', () => {
      const path = join(dir, 'nokey.db');
      let caught: unknown;
      try {
        openDatabase(storageConfig(path, { encryption: { enabled: true, cipher: 'chacha20' } }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(IndexStoreError);
      expect(caught).toMatchObject({ code: 'DB_OPEN_FAILED' });
    });
  });

  describe('migrate', () => {
    it('is idempotent', () => {
      const db = openDatabase(storageConfig(':memory:'));
      migrate(db);
      migrate(db);

      const versions = db.prepare('SELECT version FROM schema_version').all();
      expect(versions).toEqual([{ version: 1 }]);
      db.close();
    });
  });
});
