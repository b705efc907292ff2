/**
 * Retrieval exports.
 */

export type {
  ContextBundle,
  EvidenceItem,
  EvidenceSource,
  Retriever,
  SourceOutcome,
  SourceStatus,
} from './types.js';
export { emptyBundle } from './types.js';

export { KnowledgeRetriever } from './knowledge-retriever.js';
export type { KnowledgeRetrieverOptions, IngestResult } from './knowledge-retriever.js';
export { WebRetriever } from './web-retriever.js';
export type { WebRetrieverOptions } from './web-retriever.js';
export { cleanSnippet } from './snippet-cleaner.js';

export { fuse, DEFAULT_FUSE_OPTIONS } from './context-fuser.js';
export type { FuseOptions } from './context-fuser.js';
export { retrieveAll, outcomeItems } from './fan-out.js';
export type { FanOutRequest, FanOutResult } from './fan-out.js';

export { fuseRRF, DEFAULT_RRF_K } from './rrf.js';
export type { RankedItem, RRFSource, RankSource } from './rrf.js';
