export {
  DEFAULT_CONFIG,
  freezeConfig,
  resolvePath,
  validateConfig,
  type ChunkingConfig,
  type DenseConfig,
  type EncryptionConfig,
  type EngineConfig,
  type EngineConfigPatch,
  type RetrievalConfig,
  type SparseConfig,
  type SparseModelName,
  type StorageConfig,
} from './engine-config.js';
export { loadConfig, mergeConfig, patchFromObject, type LoadConfigOptions } from './loader.js';
