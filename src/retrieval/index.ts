export { fuse, fuseRRF, compareFused, type RRFSource, type RRFOptions, type FusionWeights } from './rrf.js';
export {
  RetrievalOrchestrator,
  chunkIdFor,
  type IngestOptions,
  type IngestPhase,
  type IngestProgress,
  type RetrieveOptions,
  type RetrievedChunk,
  type RepresentationFailure,
  type RetrievalResult,
  type RetrievalOrchestratorDeps,
} from './orchestrator.js';
export { formatContext, type FormatContextOptions } from './context-formatter.js';
