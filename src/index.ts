/**
 * Hybrid search with weighted reciprocal rank fusion
 */

export type { RetrievalSource, DocumentPayload, RankedHit, HitsBySource } from './models/ranked-hit.js';
export { RETRIEVAL_SOURCES } from './models/ranked-hit.js';
export type { ContributingRanks, FusedResult } from './models/fused-result.js';
export { countContributingSources } from './models/fused-result.js';
export type { SearchRequest, SourceWeights } from './models/search-request.js';
export type { SearchResponse } from './models/search-response.js';

export * from './constants/fusion-constants.js';

export {
  HybridSearchError,
  ConfigError,
  RetrievalError,
  EmbeddingError,
  HybridRetrievalError,
  SearchCancelledError,
  StoreError,
  errorMessage,
} from './lib/errors.js';
export type {
  RetrievalFailureReason,
  EmbeddingFailureReason,
  SourceFailure,
  SearchError,
} from './lib/errors.js';
export { createSearchRequest, searchRequestSchema, weightWarnings, formatScore } from './lib/ranking-utils.js';
export type { SearchRequestInput } from './lib/ranking-utils.js';
export { withDeadline, DeadlineExceededError, OperationAbortedError } from './lib/deadline.js';
export { Logger, logger } from './lib/logger.js';
export type { LogLevel, LoggerConfig } from './lib/logger.js';
export { ConfigurationManager, loadConfig, maskApiKey, describeConfig } from './lib/env-config.js';
export type { HybridSearchConfig, SearchRequestDefaults } from './lib/env-config.js';

export { toRankedHits, validateHitList } from './services/retrievers/retriever.js';
export type { Retriever, RetrievalQuery, ScoredDocument } from './services/retrievers/retriever.js';
export { SqliteTextRetriever, toFtsQuery } from './services/retrievers/sqlite-text-retriever.js';
export { SqliteVectorRetriever } from './services/retrievers/sqlite-vector-retriever.js';
export { RankFuser, reciprocalRankTerm } from './services/rank-fuser.js';
export type { FusionOptions } from './services/rank-fuser.js';
export { ResultAssembler, compareFusedResults } from './services/result-assembler.js';
export { HybridSearchOrchestrator } from './services/hybrid-search-orchestrator.js';
export type {
  HybridSearchOrchestratorOptions,
  SearchCallOptions,
  SearchDefaults,
} from './services/hybrid-search-orchestrator.js';
export { SearchLifecycle, IllegalTransitionError } from './services/search-lifecycle.js';
export type { SearchLifecyclePhase, PhaseChangeListener } from './services/search-lifecycle.js';
export { PerformanceMonitor } from './services/performance-monitor.js';
export type { SearchMetrics } from './services/performance-monitor.js';
export type { QueryEmbedder, DocumentEmbedder } from './services/embedding/query-embedder.js';
export { OpenAIQueryEmbedder, createOpenAIEmbedder } from './services/embedding/openai-embedder.js';
export type { EmbeddingsClient } from './services/embedding/openai-embedder.js';
export { DocumentStore, assessSetup } from './services/document-store.js';
export type { StoredDocument, SetupReport } from './services/document-store.js';
export { DocumentIngestor, parseDocumentLines } from './services/document-ingestor.js';
export type { IngestSummary } from './services/document-ingestor.js';
export { createSearchContext } from './services/search-factory.js';
export type { SearchContext } from './services/search-factory.js';
