/**
 * Wiring of a ready-to-use hybrid search from configuration
 *
 * @module search-factory
 */

import { Result, ok } from 'neverthrow';
import type { HybridSearchConfig } from '../lib/env-config.js';
import type { StoreError } from '../lib/errors.js';
import { Logger } from '../lib/logger.js';
import { DocumentStore } from './document-store.js';
import { HybridSearchOrchestrator } from './hybrid-search-orchestrator.js';
import { SqliteTextRetriever } from './retrievers/sqlite-text-retriever.js';
import { SqliteVectorRetriever } from './retrievers/sqlite-vector-retriever.js';
import { createOpenAIEmbedder } from './embedding/openai-embedder.js';
import type { OpenAIQueryEmbedder } from './embedding/openai-embedder.js';

/**
 * Everything a search session needs
 */
export interface SearchContext {
  store: DocumentStore;
  orchestrator: HybridSearchOrchestrator;
  /** Present when an API key is configured */
  embedder?: OpenAIQueryEmbedder;
  logger: Logger;
  close(): void;
}

/**
 * Build a logger from configuration
 */
export function createLogger(config: HybridSearchConfig): Logger {
  return new Logger({ logDir: config.logDir, consoleLevel: config.logLevel });
}

/**
 * Open the store and wire retrievers, embedder and orchestrator
 *
 * @param config - Validated configuration
 * @param logger - Logger to use (default: built from configuration)
 */
export function createSearchContext(
  config: HybridSearchConfig,
  logger: Logger = createLogger(config)
): Result<SearchContext, StoreError> {
  return DocumentStore.open(config.databasePath).andThen((store) => {
    const embedder = config.openaiApiKey
      ? createOpenAIEmbedder({
          apiKey: config.openaiApiKey,
          baseURL: config.openaiBaseUrl,
          model: config.embeddingModel,
        })
      : undefined;

    const orchestrator = new HybridSearchOrchestrator({
      vectorRetriever: new SqliteVectorRetriever(store),
      textRetriever: new SqliteTextRetriever(store),
      embedder,
      logger,
      defaults: config.search,
      slowSearchThresholdMs: config.slowSearchThresholdMs,
    });

    return ok({
      store,
      orchestrator,
      embedder,
      logger,
      close: () => store.close(),
    });
  });
}
