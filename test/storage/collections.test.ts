/**
 * Tests for named collections.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  collectionNameFromUrl,
  deleteCollection,
  ensureCollection,
  getCollection,
  listCollections,
} from '../../src/storage/collections.js';
import { SqliteIndexStore } from '../../src/storage/sqlite-index-store.js';
import type { Db } from '../../src/storage/db.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { getLogLevel, setLogLevel, type LogLevel } from '../../src/utils/logger.js';
import { createSampleChunk, createTestDb } from './test-utils.js';

describe('collections', () => {
  let db: Db;
  let savedLevel: LogLevel;

  beforeEach(() => {
    db = createTestDb();
    savedLevel = getLogLevel();
    setLogLevel('silent');
  });

  afterEach(() => {
    db.close();
    setLogLevel(savedLevel);
  });

  describe('ensureCollection', () => {
    it('creates once', () => {
      expect(ensureCollection(db, 'docs', 3)).toBe(true);
      expect(ensureCollection(db, 'docs', 3)).toBe(false);
    });

    it('rejects a different dimension for an existing collection', () => {
      ensureCollection(db, 'docs', 3);

      expect(() => ensureCollection(db, 'docs', 4)).toThrow(ConfigurationError);
      expect(() => ensureCollection(db, 'docs', 4)).toThrow(
        'Collection "docs" has dimension 3, configured 4',
      );
    });
  });

  describe('listCollections', () => {
    it('returns collections by name with counts', async () => {
      const store = new SqliteIndexStore(db, { collection: 'zeta', dimensions: 3 });
      ensureCollection(db, 'alpha', 8);
      await store.upsert({ sourceId: 'doc' }, [
        createSampleChunk({ id: 'c1', documentId: 'doc' }),
        createSampleChunk({ id: 'c2', documentId: 'doc', ordinal: 1 }),
      ]);

      const collections = listCollections(db);

      expect(collections.map((c) => [c.name, c.dimensions, c.documentCount, c.chunkCount])).toEqual([
        ['alpha', 8, 0, 0],
        ['zeta', 3, 1, 2],
      ]);
      expect(collections[0].createdAt).toBeInstanceOf(Date);
    });

    it('getCollection returns null for an unknown name', () => {
      expect(getCollection(db, 'missing')).toBeNull();
    });
  });

  describe('deleteCollection', () => {
    it('removes the collection and its contents', async () => {
      const store = new SqliteIndexStore(db, { collection: 'docs', dimensions: 3 });
      await store.upsert({ sourceId: 'doc' }, [createSampleChunk({ id: 'c1', documentId: 'doc' })]);

      expect(deleteCollection(db, 'docs')).toBe(true);
      expect(listCollections(db)).toEqual([]);
      expect(db.prepare('SELECT COUNT(*) as n FROM chunks').get()).toEqual({ n: 0 });
      expect(deleteCollection(db, 'docs')).toBe(false);
    });

    it('leaves other collections alone', async () => {
      const keep = new SqliteIndexStore(db, { collection: 'keep', dimensions: 3 });
      ensureCollection(db, 'drop', 3);
      await keep.upsert({ sourceId: 'doc' }, [createSampleChunk({ id: 'c1', documentId: 'doc' })]);

      deleteCollection(db, 'drop');

      expect(getCollection(db, 'keep')?.chunkCount).toBe(1);
    });
  });

  describe('collectionNameFromUrl', () => {
    it('uses the first host label and path segments', () => {
      expect(collectionNameFromUrl('https://www.example.com/api/v2/users')).toBe(
        'example-api-v2-users',
      );
    });

    it('keeps at most four path segments', () => {
      expect(collectionNameFromUrl('https://docs.test/a/b/c/d/e')).toBe('docs-a-b-c-d');
    });

    it('replaces other characters with dashes', () => {
      expect(collectionNameFromUrl('https://docs.test/Getting_Started/')).toBe(
        'docs-getting-started',
      );
    });

    it('rejects an invalid URL', () => {
      expect(() => collectionNameFromUrl('not a url')).toThrow('Not a valid URL: not a url');
    });
  });
});
