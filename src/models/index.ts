export type { TextEmbedder, DenseTextEmbedder, SparseTextEmbedder, EmbedOptions } from './embedder.js';
export { DenseEmbedder, type DenseEmbeddingProvider, type DenseEmbedderDeps } from './dense-embedder.js';
export {
  OpenAIEmbeddingProvider,
  toProviderError,
  type EmbeddingsClient,
  type OpenAIProviderOptions,
} from './openai-provider.js';
export {
  SparseEmbedder,
  normalizeSparseVector,
  type SparseEmbeddingModel,
} from './sparse-embedder.js';
export { LexicalSparseModel, tokenize, tokenId, termWeight } from './lexical-model.js';
export { SPARSE_MODEL_REGISTRY, createSparseModel, type SparseModelEntry } from './model-registry.js';
