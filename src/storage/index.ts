export { openDatabase, migrate, getSchemaVersion, SCHEMA_VERSION, type Db } from './db.js';
export {
  ensureCollection,
  listCollections,
  getCollection,
  deleteCollection,
  collectionNameFromUrl,
  type CollectionInfo,
} from './collections.js';
export {
  EmbeddingCache,
  computeContentHash,
  cacheModelKey,
  type CacheStats,
} from './embedding-cache.js';
export type { IndexStore, IndexStats, DocumentRecord, UpsertOptions } from './index-store.js';
export { SqliteIndexStore, type SqliteIndexStoreOptions } from './sqlite-index-store.js';
