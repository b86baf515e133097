/**
 * Document ingestion
 *
 * Parses JSON Lines documents, embeds the ones that arrive without an
 * embedding, and writes everything to the document store.
 *
 * @module document-ingestor
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { ConfigError, EmbeddingError, StoreError } from '../lib/errors.js';
import { Logger, logger as defaultLogger } from '../lib/logger.js';
import { formatIssues } from '../lib/ranking-utils.js';
import { INGEST_EMBEDDING_BATCH_SIZE } from '../constants/fusion-constants.js';
import type { DocumentStore, StoredDocument } from './document-store.js';
import type { DocumentEmbedder } from './embedding/query-embedder.js';

/**
 * One line of an ingestion file
 */
export const documentLineSchema = z
  .object({
    id: z.string().min(1, { message: 'id must not be empty' }),
    text: z.string().min(1, { message: 'text must not be empty' }),
    metadata: z.record(z.unknown()).optional(),
    embedding: z.array(z.number().finite()).min(1, { message: 'embedding must not be empty' }).optional(),
  })
  .strict();

/**
 * Parse JSON Lines content into documents
 *
 * Blank lines are skipped. Every invalid line is reported, with its line number.
 */
export function parseDocumentLines(content: string): Result<StoredDocument[], ConfigError> {
  const documents: StoredDocument[] = [];
  const issues: string[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const lineNumber = index + 1;
    if (line.trim() === '') {
      return;
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      issues.push(`line ${lineNumber}: not valid JSON`);
      return;
    }

    const parsed = documentLineSchema.safeParse(value);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error, 'document').map((issue) => `line ${lineNumber}: ${issue}`));
      return;
    }

    documents.push(parsed.data);
  });

  if (issues.length > 0) {
    return err(new ConfigError('Invalid documents file', issues));
  }

  return ok(documents);
}

export interface IngestSummary {
  /** Documents written to the store */
  stored: number;
  /** Documents embedded during this ingestion */
  embedded: number;
  /** Documents stored without any embedding */
  withoutEmbedding: number;
}

export interface IngestOptions {
  /** Embed documents that carry no embedding (requires an embedder) */
  embed?: boolean;
  signal?: AbortSignal;
}

/**
 * DocumentIngestor writes documents to the store, embedding as needed
 */
export class DocumentIngestor {
  constructor(
    private readonly store: DocumentStore,
    private readonly embedder?: DocumentEmbedder,
    private readonly logger: Logger = defaultLogger,
    private readonly batchSize: number = INGEST_EMBEDDING_BATCH_SIZE
  ) {}

  /**
   * Ingest documents
   *
   * Nothing is stored when embedding fails.
   */
  async ingest(
    documents: readonly StoredDocument[],
    options: IngestOptions = {}
  ): Promise<Result<IngestSummary, StoreError | EmbeddingError>> {
    const shouldEmbed = (options.embed ?? true) && this.embedder !== undefined;
    const missing = documents.filter((doc) => doc.embedding === undefined);

    let embedded = new Map<string, number[]>();
    if (shouldEmbed && missing.length > 0) {
      const result = await this.embedMissing(missing, options.signal);
      if (result.isErr()) {
        this.logger.error('Embedding failed during ingestion', { reason: result.error.reason });
        return err(result.error);
      }
      embedded = result.value;
    }

    const prepared = documents.map((doc): StoredDocument => {
      const vector = embedded.get(doc.id);
      return vector === undefined ? doc : { ...doc, embedding: vector };
    });

    const stored = this.store.upsertDocuments(prepared);
    if (stored.isErr()) {
      return err(stored.error);
    }

    const summary: IngestSummary = {
      stored: stored.value,
      embedded: embedded.size,
      withoutEmbedding: prepared.filter((doc) => doc.embedding === undefined).length,
    };

    this.logger.info('Ingested documents', { ...summary });
    return ok(summary);
  }

  private async embedMissing(
    documents: readonly StoredDocument[],
    signal?: AbortSignal
  ): Promise<Result<Map<string, number[]>, EmbeddingError>> {
    const vectors = new Map<string, number[]>();
    if (!this.embedder) {
      return ok(vectors);
    }

    for (let start = 0; start < documents.length; start += this.batchSize) {
      const batch = documents.slice(start, start + this.batchSize);
      const result = await this.embedder.embedBatch(
        batch.map((doc) => doc.text),
        signal
      );
      if (result.isErr()) {
        return err(result.error);
      }

      batch.forEach((doc, index) => {
        const vector = result.value[index];
        if (vector !== undefined) {
          vectors.set(doc.id, vector);
        }
      });

      this.logger.debug('Embedded ingestion batch', {
        done: Math.min(start + this.batchSize, documents.length),
        total: documents.length,
      });
    }

    return ok(vectors);
  }
}
