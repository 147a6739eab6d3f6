/**
 * Tests for embedding cache.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  EmbeddingCache,
  cacheModelKey,
  computeContentHash,
} from '../../src/storage/embedding-cache.js';
import type { Db } from '../../src/storage/db.js';
import { createTestDb } from './test-utils.js';

describe('embedding-cache', () => {
  let db: Db;
  let cache: EmbeddingCache;

  beforeEach(() => {
    db = createTestDb();
    cache = new EmbeddingCache(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('computeContentHash', () => {
    it('returns consistent hash for same content', () => {
      expect(computeContentHash('hello world')).toBe(computeContentHash('hello world'));
    });

    it('returns different hash for different content', () => {
      expect(computeContentHash('hello world')).not.toBe(computeContentHash('goodbye world'));
    });

    it('returns 64-character hex string', () => {
      expect(computeContentHash('test')).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  describe('cacheModelKey', () => {
    it('combines model and dimension', () => {
      expect(cacheModelKey('text-embedding-3-small', 512)).toBe('text-embedding-3-small@512');
    });
  });

  describe('get/set', () => {
    it('returns null for non-existent entry', () => {
      expect(cache.get('never cached', 'model@2')).toBeNull();
    });

    it('returns the stored embedding', () => {
      cache.set('some text', 'model@3', [0.5, -1, 2]);

      expect(cache.get('some text', 'model@3')).toEqual([0.5, -1, 2]);
    });

    it('replaces an existing embedding', () => {
      cache.set('some text', 'model@2', [1, 1]);
      cache.set('some text', 'model@2', [2, 2]);

      expect(cache.get('some text', 'model@2')).toEqual([2, 2]);
    });

    it('distinguishes between model keys', () => {
      cache.set('same text', 'model@2', [1, 1]);
      cache.set('same text', 'model@4', [2, 2, 2, 2]);

      expect(cache.get('same text', 'model@2')).toEqual([1, 1]);
      expect(cache.get('same text', 'model@4')).toEqual([2, 2, 2, 2]);
    });

    it('increments hit count on access', () => {
      cache.set('hit test', 'model@1', [0.5]);
      cache.get('hit test', 'model@1');
      cache.get('hit test', 'model@1');

      expect(cache.stats()).toEqual({ entryCount: 1, totalHits: 2, avgHitCount: 2 });
    });
  });

  describe('eviction', () => {
    it('evicts the oldest entries once over capacity', () => {
      const small = new EmbeddingCache(db, 3);
      small.set('a', 'm@1', [1]);
      small.set('b', 'm@1', [2]);
      small.set('c', 'm@1', [3]);
      small.set('d', 'm@1', [4]);

      expect(small.get('a', 'm@1')).toBeNull();
      expect(small.get('d', 'm@1')).toEqual([4]);
      expect(small.stats().entryCount).toBe(3);
    });

    it('does nothing under capacity', () => {
      cache.set('a', 'm@1', [1]);

      expect(cache.evictOldestIfNeeded()).toBe(0);
    });
  });

  describe('stats', () => {
    it('reports zeros for an empty cache', () => {
      expect(cache.stats()).toEqual({ entryCount: 0, totalHits: 0, avgHitCount: 0 });
    });
  });

  describe('clear', () => {
    it('clears only one model key when given', () => {
      cache.set('text', 'model@2', [1, 1]);
      cache.set('text', 'other@2', [2, 2]);

      cache.clear('model@2');

      expect(cache.get('text', 'model@2')).toBeNull();
      expect(cache.get('text', 'other@2')).toEqual([2, 2]);
    });

    it('clears everything without a key', () => {
      cache.set('a', 'model@1', [1]);
      cache.set('b', 'other@1', [2]);

      cache.clear();

      expect(cache.stats().entryCount).toBe(0);
    });
  });
});
