/**
 * Lexical retriever over the document store's FTS5 index
 */

import type { Result } from '../../lib/result-types.js';
import { err } from '../../lib/result-types.js';
import { RetrievalError } from '../../lib/errors.js';
import type { RankedHit } from '../../models/ranked-hit.js';
import type { DocumentStore } from '../document-store.js';
import { toRankedHits } from './retriever.js';
import type { Retriever, RetrievalQuery } from './retriever.js';

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Turn free text into an FTS5 MATCH expression
 *
 * Each word becomes a quoted term and terms are OR-ed, so user input can
 * never be parsed as FTS5 syntax and any matching word qualifies a document.
 *
 * @returns The expression, or undefined when the text holds no words
 */
export function toFtsQuery(text: string): string | undefined {
  const tokens = text.match(TOKEN_PATTERN);
  if (!tokens) {
    return undefined;
  }
  return tokens.map((token) => `"${token}"`).join(' OR ');
}

/**
 * Text retriever ranked by bm25
 */
export class SqliteTextRetriever implements Retriever {
  readonly source = 'text' as const;

  constructor(private readonly store: DocumentStore) {}

  async retrieve(query: RetrievalQuery, k: number, signal: AbortSignal): Promise<Result<RankedHit[], RetrievalError>> {
    if (signal.aborted) {
      return err(new RetrievalError('text', 'unavailable', 'Retrieval aborted'));
    }

    const match = toFtsQuery(query.text);
    if (match === undefined) {
      return err(new RetrievalError('text', 'malformed_query', 'Query text contains no searchable words'));
    }

    return this.store
      .searchText(match, k)
      .map((rows) => toRankedHits('text', rows))
      .mapErr((error) => new RetrievalError('text', 'unavailable', error.message, error));
  }
}
