/**
 * Hybrid search orchestration
 *
 * Fans a query out to the vector and text retrievers concurrently, joins both
 * under per-source deadlines, applies the degrade policy and fuses whatever
 * survived with weighted RRF.
 *
 * @module hybrid-search-orchestrator
 */

import { Result, ok, err } from 'neverthrow';
import type { HitsBySource, RankedHit, RetrievalSource } from '../models/ranked-hit.js';
import { RETRIEVAL_SOURCES } from '../models/ranked-hit.js';
import type { SearchRequest, SourceWeights } from '../models/search-request.js';
import type { SearchResponse } from '../models/search-response.js';
import {
  ConfigError,
  HybridRetrievalError,
  RetrievalError,
  SearchCancelledError,
  errorMessage,
} from '../lib/errors.js';
import type { EmbeddingError, SearchError, SourceFailure } from '../lib/errors.js';
import { DeadlineExceededError, OperationAbortedError, withDeadline } from '../lib/deadline.js';
import { Logger, logger as defaultLogger } from '../lib/logger.js';
import { createSearchRequest } from '../lib/ranking-utils.js';
import type { SearchRequestInput } from '../lib/ranking-utils.js';
import { DEFAULT_SLOW_SEARCH_THRESHOLD_MS, DEFAULT_TOP_K } from '../constants/fusion-constants.js';
import type { Retriever, RetrievalQuery } from './retrievers/retriever.js';
import { validateHitList } from './retrievers/retriever.js';
import type { QueryEmbedder } from './embedding/query-embedder.js';
import { RankFuser } from './rank-fuser.js';
import { ResultAssembler } from './result-assembler.js';
import { PerformanceMonitor } from './performance-monitor.js';
import { SearchLifecycle } from './search-lifecycle.js';
import type { PhaseChangeListener } from './search-lifecycle.js';

/**
 * Process-wide request defaults (from configuration)
 *
 * Applied beneath the caller's own fields; `candidateLimit` acts as a floor
 * that still grows with k.
 */
export interface SearchDefaults {
  k?: number;
  weights?: Partial<SourceWeights>;
  rankConstant?: number;
  degradeOnPartialFailure?: boolean;
  timeoutMs?: number;
  candidateLimit?: number;
}

/**
 * Collaborators and settings of an orchestrator
 */
export interface HybridSearchOrchestratorOptions {
  vectorRetriever: Retriever;
  textRetriever: Retriever;
  /** Consulted only for requests without a queryVector */
  embedder?: QueryEmbedder;
  logger?: Logger;
  /** Notified of every lifecycle transition of every call */
  onPhaseChange?: PhaseChangeListener;
  defaults?: SearchDefaults;
  slowSearchThresholdMs?: number;
}

export interface SearchCallOptions {
  /** Aborting cancels both in-flight retrievals */
  signal?: AbortSignal;
}

type SourceResult = Result<RankedHit[], RetrievalError | EmbeddingError>;

interface SourceOutcome {
  source: RetrievalSource;
  result: SourceResult;
}

/**
 * HybridSearchOrchestrator runs one hybrid search per call
 *
 * Holds no per-call state; concurrent calls are independent.
 */
export class HybridSearchOrchestrator {
  private readonly retrievers: Readonly<Record<RetrievalSource, Retriever>>;
  private readonly embedder?: QueryEmbedder;
  private readonly logger: Logger;
  private readonly onPhaseChange?: PhaseChangeListener;
  private readonly defaults: SearchDefaults;
  private readonly slowSearchThresholdMs: number;
  private readonly fuser = new RankFuser();
  private readonly assembler = new ResultAssembler();

  /**
   * @throws ConfigError when a retriever is wired to the wrong source
   */
  constructor(options: HybridSearchOrchestratorOptions) {
    const { vectorRetriever, textRetriever } = options;

    const mismatched = [
      vectorRetriever.source !== 'vector' ? `vectorRetriever: serves "${vectorRetriever.source}"` : undefined,
      textRetriever.source !== 'text' ? `textRetriever: serves "${textRetriever.source}"` : undefined,
    ].filter((issue): issue is string => issue !== undefined);

    if (mismatched.length > 0) {
      throw new ConfigError('Retrievers wired to the wrong source', mismatched);
    }

    this.retrievers = { vector: vectorRetriever, text: textRetriever };
    this.embedder = options.embedder;
    this.logger = options.logger ?? defaultLogger;
    this.onPhaseChange = options.onPhaseChange;
    this.defaults = options.defaults ?? {};
    this.slowSearchThresholdMs = options.slowSearchThresholdMs ?? DEFAULT_SLOW_SEARCH_THRESHOLD_MS;
  }

  /**
   * Execute a hybrid search
   *
   * @param input - Raw request; defaults fill every omitted field
   * @param options - Optional cancellation signal
   * @returns Fused response, or ConfigError / HybridRetrievalError / SearchCancelledError
   */
  async executeHybridSearch(
    input: SearchRequestInput,
    options: SearchCallOptions = {}
  ): Promise<Result<SearchResponse, SearchError>> {
    const requestResult = createSearchRequest(this.withDefaults(input));
    if (requestResult.isErr()) {
      this.logger.warn('Rejected invalid search request', { issues: requestResult.error.issues });
      return err(requestResult.error);
    }

    const request = requestResult.value;
    const { signal } = options;

    if (signal?.aborted) {
      return err(new SearchCancelledError());
    }

    const context = { query: request.queryText, k: request.k };
    const monitor = new PerformanceMonitor(this.slowSearchThresholdMs);
    const lifecycle = new SearchLifecycle((phase, previous) => {
      this.logger.debug(`Search phase ${previous} → ${phase}`, context);
      this.onPhaseChange?.(phase, previous);
    });

    lifecycle.transitionTo('dispatched');
    monitor.startTimer('total');
    const pending = RETRIEVAL_SOURCES.map((source) => this.dispatch(source, request, monitor, signal));

    lifecycle.transitionTo('awaiting_sources');
    const outcomes = await Promise.all(pending);

    if (signal?.aborted) {
      monitor.stopTimer('total');
      lifecycle.transitionTo('failed');
      this.logger.info('Search cancelled by caller', context);
      return err(new SearchCancelledError());
    }

    const hitsBySource: HitsBySource = {};
    const failures: SourceFailure[] = [];

    for (const { source, result } of outcomes) {
      if (result.isOk()) {
        hitsBySource[source] = result.value;
      } else {
        failures.push({ source, error: result.error });
      }
    }

    const survivors = outcomes.length - failures.length;
    if (failures.length > 0 && (survivors === 0 || !request.degradeOnPartialFailure)) {
      monitor.stopTimer('total');
      lifecycle.transitionTo('failed');

      for (const failure of failures) {
        this.logger.logRetrievalFailure(failure.source, failure.error, false, context);
      }

      const error = new HybridRetrievalError(failures);
      this.logger.error(error.message, { ...context, degradeOnPartialFailure: request.degradeOnPartialFailure });
      return err(error);
    }

    for (const failure of failures) {
      monitor.setDegradedSource(failure.source);
      this.logger.logRetrievalFailure(failure.source, failure.error, true, context);
      this.logger.warn(`Degraded search: ${failure.source} source failed (${failure.error.reason})`, context);
    }

    lifecycle.transitionTo('fusing');
    monitor.startTimer('fusion');
    const fused = this.fuser.fuse(hitsBySource, {
      weights: request.weights,
      rankConstant: request.rankConstant,
    });
    const results = this.assembler.assemble(fused.values(), request.k);
    monitor.stopTimer('fusion');

    monitor.recordCandidateCounts(hitsBySource.vector?.length ?? 0, hitsBySource.text?.length ?? 0, fused.size);
    const elapsedTimeMs = monitor.stopTimer('total');
    lifecycle.transitionTo('complete');

    this.reportMetrics(request, monitor, results.length);

    return ok({ results, elapsedTimeMs, degraded: failures.length > 0 });
  }

  /**
   * Run one source under its deadline; never rejects
   */
  private async dispatch(
    source: RetrievalSource,
    request: SearchRequest,
    monitor: PerformanceMonitor,
    signal?: AbortSignal
  ): Promise<SourceOutcome> {
    const phase = source === 'vector' ? 'vectorSearch' : 'textSearch';
    monitor.startTimer(phase);

    try {
      const result = await withDeadline((taskSignal) => this.runSource(source, request, taskSignal), {
        timeoutMs: request.timeoutMs,
        signal,
      });
      return { source, result };
    } catch (error) {
      return { source, result: err(toRetrievalError(source, error)) };
    } finally {
      monitor.stopTimer(phase);
    }
  }

  private async runSource(source: RetrievalSource, request: SearchRequest, signal: AbortSignal): Promise<SourceResult> {
    const query = await this.buildQuery(source, request, signal);
    if (query.isErr()) {
      return err(query.error);
    }

    const hits = await this.retrievers[source].retrieve(query.value, request.candidateLimit, signal);
    return hits.andThen((list) => validateHitList(source, list, request.candidateLimit));
  }

  /**
   * Build the modality payload a source needs
   *
   * The vector source embeds the query text only when the request carries no
   * vector of its own.
   */
  private async buildQuery(
    source: RetrievalSource,
    request: SearchRequest,
    signal: AbortSignal
  ): Promise<Result<RetrievalQuery, RetrievalError | EmbeddingError>> {
    if (source === 'text') {
      if (request.queryText.trim().length === 0) {
        return err(new RetrievalError('text', 'malformed_query', 'Query text is empty'));
      }
      return ok({ text: request.queryText });
    }

    if (request.queryVector) {
      return ok({ text: request.queryText, vector: request.queryVector });
    }

    if (!this.embedder) {
      return err(new RetrievalError('vector', 'malformed_query', 'No query vector and no embedder configured'));
    }

    const embedded = await this.embedder.embed(request.queryText, signal);
    return embedded.map((vector) => ({ text: request.queryText, vector }));
  }

  private withDefaults(input: SearchRequestInput): SearchRequestInput {
    const { weights: defaultWeights, candidateLimit: candidateFloor, ...scalars } = this.defaults;
    const merged: SearchRequestInput = {
      ...scalars,
      ...input,
      weights: {
        vector: input.weights?.vector ?? defaultWeights?.vector,
        text: input.weights?.text ?? defaultWeights?.text,
      },
    };

    if (merged.candidateLimit === undefined && candidateFloor !== undefined) {
      merged.candidateLimit = Math.max(candidateFloor, merged.k ?? DEFAULT_TOP_K);
    }

    return merged;
  }

  private reportMetrics(request: SearchRequest, monitor: PerformanceMonitor, resultCount: number): void {
    const metrics = monitor.getMetrics();

    if (metrics.slowSearch) {
      this.logger.logSlowSearch(request.queryText, metrics.totalTimeMs, monitor.getSlowThreshold(), resultCount, {
        vectorSearchTimeMs: metrics.vectorSearchTimeMs,
        textSearchTimeMs: metrics.textSearchTimeMs,
        fusionTimeMs: metrics.fusionTimeMs,
        degradedSource: metrics.degradedSource,
      });
    }

    this.logger.debug('Search complete', { query: request.queryText, resultCount, ...metrics });
  }
}

/**
 * Map whatever a dispatch threw into a per-source retrieval error
 */
function toRetrievalError(source: RetrievalSource, error: unknown): RetrievalError {
  if (error instanceof RetrievalError) {
    return error;
  }
  if (error instanceof DeadlineExceededError) {
    return new RetrievalError(source, 'timeout', `No response within ${error.timeoutMs}ms`, error);
  }
  if (error instanceof OperationAbortedError) {
    return new RetrievalError(source, 'unavailable', 'Retrieval aborted', error);
  }
  return new RetrievalError(source, 'unavailable', errorMessage(error), error);
}
