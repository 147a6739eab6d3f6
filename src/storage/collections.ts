/**
 * Named collections.
 *
 * Each collection fixes its dense dimension when it is created. Documents,
 * chunks and their vectors live inside exactly one collection.
 */

import type { Db } from './db.js';
import { ConfigurationError, IndexStoreError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('collections');

/** Maximum length of a name derived by collectionNameFromUrl */
const MAX_DERIVED_NAME_LENGTH = 50;

/** Path segments kept by collectionNameFromUrl */
const MAX_PATH_SEGMENTS = 4;

export interface CollectionInfo {
  name: string;
  dimensions: number;
  documentCount: number;
  chunkCount: number;
  createdAt: Date;
}

interface CollectionRow {
  name: string;
  dimensions: number;
  created_at: string;
  document_count: number;
  chunk_count: number;
}

/**
 * Create a collection if it does not exist.
 *
 * @returns true when the collection was created by this call
 * @throws ConfigurationError DIMENSION_MISMATCH if it exists with another dimension
 */
export function ensureCollection(db: Db, name: string, dimensions: number): boolean {
  const existing = db.prepare('SELECT dimensions FROM collections WHERE name = ?').get(name) as
    | { dimensions: number }
    | undefined;

  if (existing) {
    if (existing.dimensions !== dimensions) {
      throw new ConfigurationError(
        `Collection "${name}" has dimension ${existing.dimensions}, configured ${dimensions}`,
        'DIMENSION_MISMATCH',
      );
    }
    return false;
  }

  db.prepare('INSERT INTO collections (name, dimensions, created_at) VALUES (?, ?, ?)').run(
    name,
    dimensions,
    new Date().toISOString(),
  );
  log.info('Created collection', { name, dimensions });
  return true;
}

/**
 * List all collections with their document and chunk counts, by name.
 */
export function listCollections(db: Db): CollectionInfo[] {
  const rows = db
    .prepare(
      `
    SELECT c.name, c.dimensions, c.created_at,
      (SELECT COUNT(*) FROM documents d WHERE d.collection = c.name) AS document_count,
      (SELECT COUNT(*) FROM chunks k WHERE k.collection = c.name) AS chunk_count
    FROM collections c
    ORDER BY c.name
  `,
    )
    .all() as CollectionRow[];

  return rows.map((row) => ({
    name: row.name,
    dimensions: row.dimensions,
    documentCount: row.document_count,
    chunkCount: row.chunk_count,
    createdAt: new Date(row.created_at),
  }));
}

/**
 * Get one collection, or null if absent.
 */
export function getCollection(db: Db, name: string): CollectionInfo | null {
  return listCollections(db).find((c) => c.name === name) ?? null;
}

/**
 * Delete a collection with all of its documents, chunks and vectors.
 *
 * Index stores already open on the collection keep serving their in-memory
 * copy until reopened.
 *
 * @returns false if the collection did not exist
 */
export function deleteCollection(db: Db, name: string): boolean {
  try {
    const deleted = db.transaction(() => {
      db.prepare('DELETE FROM chunks WHERE collection = ?').run(name);
      db.prepare('DELETE FROM documents WHERE collection = ?').run(name);
      return db.prepare('DELETE FROM collections WHERE name = ?').run(name).changes > 0;
    })();
    if (deleted) {
      log.info('Deleted collection', { name });
    }
    return deleted;
  } catch (error) {
    throw new IndexStoreError(`Failed to delete collection "${name}"`, 'DELETE_FAILED', error);
  }
}

/**
 * Derive a collection name from a documentation URL.
 *
 * Takes the first host label (ignoring `www.`) and up to four path segments,
 * e.g. `https://www.example.com/api/v2/users` -> `example-api-v2-users`.
 *
 * @throws ConfigurationError INVALID_URL
 */
export function collectionNameFromUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigurationError(`Not a valid URL: ${url}`, 'INVALID_URL', error);
  }

  const host = parsed.hostname.replace(/^www\./, '');
  const hostLabel = host.split('.')[0];
  const segments = parsed.pathname
    .split('/')
    .filter((s) => s.length > 0)
    .slice(0, MAX_PATH_SEGMENTS);

  const name = [hostLabel, ...segments]
    .join('-')
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, MAX_DERIVED_NAME_LENGTH)
    .replace(/-+$/, '');

  if (name.length === 0) {
    throw new ConfigurationError(`Cannot derive a collection name from ${url}`, 'INVALID_URL');
  }
  return name;
}
