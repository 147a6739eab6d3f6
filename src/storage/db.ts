/**
 * SQLite database connection and migrations.
 *
 * Supports optional encryption using better-sqlite3-multiple-ciphers.
 * Connections are opened explicitly from a StorageConfig; there is no
 * process-wide singleton, so tests open their own `:memory:` databases.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { resolvePath, type StorageConfig } from '../config/engine-config.js';
import { IndexStoreError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

const moduleDir = dirname(fileURLToPath(import.meta.url));

/** Current schema version, recorded in schema_version */
export const SCHEMA_VERSION = 1;

export type Db = Database.Database;

/**
 * Apply encryption to a database connection.
 * The cipher must be set before the key.
 */
function applyEncryption(database: Db, cipher: string, key: string): void {
  database.pragma(`cipher = '${cipher}'`);
  database.pragma(`key = '${key.replace(/'/g, "''")}'`);
}

/**
 * Create tables and record the schema version. Idempotent.
 */
export function migrate(database: Db): void {
  const schema = readFileSync(join(moduleDir, 'schema.sql'), 'utf-8');
  database.exec(schema);
}

/**
 * Read the highest applied schema version (0 for a fresh database).
 */
export function getSchemaVersion(database: Db): number {
  const table = database
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
    .get();
  if (!table) return 0;
  const row = database.prepare('SELECT MAX(version) as version FROM schema_version').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Open (creating if needed) the index database described by `config`.
 *
 * - Expands `~` and creates the parent directory
 * - Applies cipher and key pragmas when encryption is enabled
 * - Enables foreign keys and, for file databases, WAL mode
 * - Runs migrations
 *
 * @throws IndexStoreError DB_OPEN_FAILED
 */
export function openDatabase(config: StorageConfig): Db {
  const inMemory = config.dbPath === ':memory:';
  const resolvedPath = inMemory ? config.dbPath : resolvePath(config.dbPath);
  let database: Db | null = null;

  try {
    if (!inMemory) {
      const dir = dirname(resolvedPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    database = new Database(resolvedPath);

    if (config.encryption.enabled) {
      if (!config.encryption.key) {
        throw new Error('Database encryption is enabled but no key is available (set DUORANK_DB_KEY)');
      }
      applyEncryption(database, config.encryption.cipher, config.encryption.key);
    }

    database.pragma('foreign_keys = ON');
    if (!inMemory) {
      database.pragma('journal_mode = WAL');
    }

    migrate(database);
    log.debug('Database opened', {
      path: inMemory ? ':memory:' : resolvedPath,
      encrypted: config.encryption.enabled,
      schemaVersion: getSchemaVersion(database),
    });
    return database;
  } catch (error) {
    database?.close();
    throw new IndexStoreError(`Failed to open database at ${resolvedPath}`, 'DB_OPEN_FAILED', error);
  }
}
