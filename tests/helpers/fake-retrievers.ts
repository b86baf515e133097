/**
 * In-process stand-ins for retrieval backends and embedding providers
 */

import { setTimeout as delay } from 'timers/promises';
import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { EmbeddingError, RetrievalError } from '../../src/lib/errors.js';
import type { EmbeddingFailureReason, RetrievalFailureReason } from '../../src/lib/errors.js';
import { Logger } from '../../src/lib/logger.js';
import type { RankedHit, RetrievalSource } from '../../src/models/ranked-hit.js';
import type { Retriever, RetrievalQuery } from '../../src/services/retrievers/retriever.js';
import type { QueryEmbedder } from '../../src/services/embedding/query-embedder.js';

/**
 * Ranked hits for ids in order, with payload text "Document <id>"
 */
export function hitsFor(source: RetrievalSource, ids: string[]): RankedHit[] {
  return ids.map((documentId, index) => ({
    documentId,
    rank: index + 1,
    source,
    payload: { text: `Document ${documentId}` },
  }));
}

type Behaviour =
  | { kind: 'hits'; ids: string[]; delayMs?: number }
  | { kind: 'raw'; hits: RankedHit[] }
  | { kind: 'fail'; reason: RetrievalFailureReason }
  | { kind: 'throw'; error: Error }
  | { kind: 'hang' };

export interface RetrieveCall {
  query: RetrievalQuery;
  k: number;
  signal: AbortSignal;
}

/**
 * Scriptable retriever that records every call
 */
export class FakeRetriever implements Retriever {
  readonly calls: RetrieveCall[] = [];

  constructor(
    readonly source: RetrievalSource,
    private readonly behaviour: Behaviour
  ) {}

  async retrieve(query: RetrievalQuery, k: number, signal: AbortSignal): Promise<Result<RankedHit[], RetrievalError>> {
    this.calls.push({ query, k, signal });

    switch (this.behaviour.kind) {
      case 'hits':
        if (this.behaviour.delayMs !== undefined) {
          await delay(this.behaviour.delayMs);
        }
        return ok(hitsFor(this.source, this.behaviour.ids).slice(0, k));
      case 'raw':
        return ok(this.behaviour.hits);
      case 'fail':
        return err(new RetrievalError(this.source, this.behaviour.reason, 'scripted failure'));
      case 'throw':
        throw this.behaviour.error;
      case 'hang':
        // Settles only once the orchestrator aborts the call
        return new Promise((resolve) => {
          signal.addEventListener(
            'abort',
            () => resolve(err(new RetrievalError(this.source, 'unavailable', 'aborted'))),
            { once: true }
          );
        });
    }
  }
}

export function listRetriever(source: RetrievalSource, ids: string[], delayMs?: number): FakeRetriever {
  return new FakeRetriever(source, { kind: 'hits', ids, delayMs });
}

export function rawRetriever(source: RetrievalSource, hits: RankedHit[]): FakeRetriever {
  return new FakeRetriever(source, { kind: 'raw', hits });
}

export function failingRetriever(source: RetrievalSource, reason: RetrievalFailureReason): FakeRetriever {
  return new FakeRetriever(source, { kind: 'fail', reason });
}

export function throwingRetriever(source: RetrievalSource, error: Error): FakeRetriever {
  return new FakeRetriever(source, { kind: 'throw', error });
}

export function hangingRetriever(source: RetrievalSource): FakeRetriever {
  return new FakeRetriever(source, { kind: 'hang' });
}

/**
 * Embedder returning a fixed vector, or a scripted failure
 */
export class FakeEmbedder implements QueryEmbedder {
  readonly model = 'fake-embedding-model';
  readonly inputs: string[] = [];

  constructor(
    private readonly vector: number[],
    private readonly failure?: EmbeddingFailureReason
  ) {}

  async embed(text: string): Promise<Result<number[], EmbeddingError>> {
    this.inputs.push(text);
    if (this.failure) {
      return err(new EmbeddingError(this.failure, 'scripted embedding failure'));
    }
    return ok([...this.vector]);
  }
}

/**
 * Logger that writes nothing
 */
export function silentLogger(): Logger {
  return new Logger({ console: false });
}
