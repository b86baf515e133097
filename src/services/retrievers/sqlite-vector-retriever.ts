/**
 * Semantic retriever: brute-force cosine similarity over stored embeddings
 */

import type { Result } from '../../lib/result-types.js';
import { ok, err } from '../../lib/result-types.js';
import { RetrievalError } from '../../lib/errors.js';
import { cosineSimilarity, isValidEmbedding } from '../../lib/embedding-utils.js';
import type { RankedHit } from '../../models/ranked-hit.js';
import type { DocumentStore } from '../document-store.js';
import { toRankedHits } from './retriever.js';
import type { Retriever, RetrievalQuery, ScoredDocument } from './retriever.js';

/**
 * Vector retriever over the document store
 *
 * Scores every embedded document against the query vector; equal
 * similarities are ordered by document id.
 */
export class SqliteVectorRetriever implements Retriever {
  readonly source = 'vector' as const;

  constructor(private readonly store: DocumentStore) {}

  async retrieve(query: RetrievalQuery, k: number, signal: AbortSignal): Promise<Result<RankedHit[], RetrievalError>> {
    if (signal.aborted) {
      return err(new RetrievalError('vector', 'unavailable', 'Retrieval aborted'));
    }

    const { vector } = query;
    if (!vector || !isValidEmbedding(vector)) {
      return err(new RetrievalError('vector', 'malformed_query', 'Query vector is missing or not finite'));
    }

    const loaded = this.store.loadEmbeddedDocuments();
    if (loaded.isErr()) {
      return err(new RetrievalError('vector', 'unavailable', loaded.error.message, loaded.error));
    }

    const scored: ScoredDocument[] = [];
    for (const doc of loaded.value) {
      if (doc.embedding.length !== vector.length) {
        return err(
          new RetrievalError(
            'vector',
            'malformed_query',
            `Query vector has ${vector.length} dimensions, document ${doc.id} has ${doc.embedding.length}`
          )
        );
      }
      scored.push({ documentId: doc.id, payload: doc.payload, score: cosineSimilarity(vector, doc.embedding) });
    }

    if (signal.aborted) {
      return err(new RetrievalError('vector', 'unavailable', 'Retrieval aborted'));
    }

    scored.sort((a, b) => {
      if (a.score !== b.score) {
        return b.score - a.score;
      }
      return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
    });

    return ok(toRankedHits('vector', scored.slice(0, k)));
  }
}
