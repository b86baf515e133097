/**
 * DocumentStore
 *
 * SQLite-backed store of documents for both retrievers: an FTS5 table
 * ranked by bm25() for text search, and embeddings stored as Float32 BLOBs
 * for brute-force cosine search.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { StoreError, errorMessage } from '../lib/errors.js';
import { BYTES_PER_COMPONENT, decodeEmbedding, encodeEmbedding } from '../lib/embedding-utils.js';
import type { DocumentPayload } from '../models/ranked-hit.js';
import type { ScoredDocument } from './retrievers/retriever.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const SCHEMA_FILE = path.join(__dirname, '../../sql/001_documents.sql');

/**
 * Document as written to the store
 */
export interface StoredDocument {
	id: string;
	text: string;
	metadata?: Record<string, unknown>;
	embedding?: readonly number[];
}

/**
 * Document loaded for vector search
 */
export interface EmbeddedDocument {
	id: string;
	payload: DocumentPayload;
	embedding: Float32Array;
}

/**
 * State of the store as seen by `check`
 */
export interface SetupReport {
	documentsTable: boolean;
	textIndex: boolean;
	documentCount: number;
	embeddedCount: number;
	/** Distinct embedding sizes in the store (more than one is unusable) */
	embeddingDimensions: number[];
}

/**
 * Problems that block searching, and warnings that only weaken it
 */
export interface SetupAssessment {
	problems: string[];
	warnings: string[];
}

/**
 * Judge a setup report
 *
 * @param report - Output of checkSetup
 * @param embedderConfigured - Whether query text can be embedded
 */
export function assessSetup(report: SetupReport, embedderConfigured: boolean): SetupAssessment {
	const problems: string[] = [];
	const warnings: string[] = [];

	if (!report.documentsTable) {
		problems.push('documents table is missing');
	}
	if (!report.textIndex) {
		problems.push('full-text index documents_fts is missing');
	}
	if (report.embeddingDimensions.length > 1) {
		problems.push(`embeddings have mixed dimensions (${report.embeddingDimensions.join(', ')})`);
	}

	if (report.documentsTable && report.documentCount === 0) {
		warnings.push('no documents stored; run "hybrid-search ingest <file>"');
	} else if (report.documentsTable && report.embeddedCount === 0) {
		warnings.push('no document carries an embedding; vector search will return nothing');
	}
	if (!embedderConfigured) {
		warnings.push('OPENAI_API_KEY is not set; queries without a vector will search text only');
	}

	return { problems, warnings };
}

interface DocumentRow {
	id: string;
	text: string;
	metadata: string | null;
}

interface TextSearchRow extends DocumentRow {
	score: number;
}

interface EmbeddingRow extends DocumentRow {
	embedding: Buffer;
}

const metadataSchema = z.record(z.unknown());

/**
 * Parse the metadata column
 */
function parseMetadata(id: string, raw: string | null): Result<Record<string, unknown> | undefined, StoreError> {
	if (raw === null) {
		return ok(undefined);
	}

	let value: unknown;
	try {
		value = JSON.parse(raw);
	} catch (error) {
		return err(new StoreError(`Document ${id} has unreadable metadata`, error));
	}

	const parsed = metadataSchema.safeParse(value);
	return parsed.success
		? ok(parsed.data)
		: err(new StoreError(`Document ${id} metadata is not an object`));
}

function toPayload(row: DocumentRow): Result<DocumentPayload, StoreError> {
	return parseMetadata(row.id, row.metadata).map((metadata) =>
		metadata === undefined ? { text: row.text } : { text: row.text, metadata }
	);
}

/**
 * Service class for document storage and search
 */
export class DocumentStore {
	private upsertStmt: Database.Statement<[string, string, string | null, Buffer | null, number | null]>;
	private deleteFtsStmt: Database.Statement<[string]>;
	private insertFtsStmt: Database.Statement<[string, string]>;
	private searchTextStmt: Database.Statement<[string, number], TextSearchRow>;
	private embeddedStmt: Database.Statement<[], EmbeddingRow>;

	constructor(private db: Database.Database) {
		this.db.exec(readFileSync(SCHEMA_FILE, 'utf-8'));

		this.upsertStmt = db.prepare<[string, string, string | null, Buffer | null, number | null]>(`
			INSERT INTO documents (id, text, metadata, embedding, embedding_dimensions)
			VALUES (?, ?, ?, ?, ?)
			ON CONFLICT(id) DO UPDATE SET
				text = excluded.text,
				metadata = excluded.metadata,
				embedding = excluded.embedding,
				embedding_dimensions = excluded.embedding_dimensions,
				updated_at = datetime('now')
		`);

		this.deleteFtsStmt = db.prepare<[string]>('DELETE FROM documents_fts WHERE document_id = ?');
		this.insertFtsStmt = db.prepare<[string, string]>('INSERT INTO documents_fts (text, document_id) VALUES (?, ?)');

		// bm25() is lower-is-better; ties fall back to id order
		this.searchTextStmt = db.prepare<[string, number], TextSearchRow>(`
			SELECT d.id AS id, d.text AS text, d.metadata AS metadata, bm25(documents_fts) AS score
			FROM documents_fts
			JOIN documents d ON d.id = documents_fts.document_id
			WHERE documents_fts MATCH ?
			ORDER BY score ASC, d.id ASC
			LIMIT ?
		`);

		this.embeddedStmt = db.prepare<[], EmbeddingRow>(`
			SELECT id, text, metadata, embedding
			FROM documents
			WHERE embedding IS NOT NULL
			ORDER BY id
		`);
	}

	/**
	 * Open (creating if needed) a store on disk
	 *
	 * @param dbPath - Database file, or ':memory:'
	 */
	static open(dbPath: string): Result<DocumentStore, StoreError> {
		try {
			if (dbPath !== ':memory:') {
				const dir = path.dirname(dbPath);
				if (!existsSync(dir)) {
					mkdirSync(dir, { recursive: true });
				}
			}

			const db = new Database(dbPath);
			db.pragma('journal_mode = WAL');
			db.pragma('synchronous = NORMAL');
			return ok(new DocumentStore(db));
		} catch (error) {
			return err(new StoreError(`Failed to open document store at ${dbPath}: ${errorMessage(error)}`, error));
		}
	}

	/**
	 * Insert or replace documents in one transaction
	 *
	 * @returns Number of documents written
	 */
	upsertDocuments(documents: readonly StoredDocument[]): Result<number, StoreError> {
		const write = this.db.transaction((batch: readonly StoredDocument[]) => {
			for (const doc of batch) {
				this.upsertStmt.run(
					doc.id,
					doc.text,
					doc.metadata === undefined ? null : JSON.stringify(doc.metadata),
					doc.embedding === undefined ? null : encodeEmbedding(doc.embedding),
					doc.embedding === undefined ? null : doc.embedding.length
				);
				this.deleteFtsStmt.run(doc.id);
				this.insertFtsStmt.run(doc.text, doc.id);
			}
			return batch.length;
		});

		try {
			return ok(write(documents));
		} catch (error) {
			return err(new StoreError(`Failed to store documents: ${errorMessage(error)}`, error));
		}
	}

	/**
	 * Full-text search ranked by bm25
	 *
	 * @param match - FTS5 MATCH expression
	 * @param limit - Maximum number of rows
	 * @returns Rows best first, `score` holding the raw bm25 value
	 */
	searchText(match: string, limit: number): Result<ScoredDocument[], StoreError> {
		let rows: TextSearchRow[];
		try {
			rows = this.searchTextStmt.all(match, limit);
		} catch (error) {
			return err(new StoreError(`Text search failed: ${errorMessage(error)}`, error));
		}

		return Result.combine(
			rows.map((row) =>
				toPayload(row).map((payload): ScoredDocument => ({ documentId: row.id, payload, score: row.score }))
			)
		);
	}

	/**
	 * Load every document that carries an embedding, ordered by id
	 */
	loadEmbeddedDocuments(): Result<EmbeddedDocument[], StoreError> {
		let rows: EmbeddingRow[];
		try {
			rows = this.embeddedStmt.all();
		} catch (error) {
			return err(new StoreError(`Failed to load embeddings: ${errorMessage(error)}`, error));
		}

		const documents: EmbeddedDocument[] = [];
		for (const row of rows) {
			const payload = toPayload(row);
			if (payload.isErr()) {
				return err(payload.error);
			}
			if (row.embedding.length === 0 || row.embedding.length % BYTES_PER_COMPONENT !== 0) {
				return err(new StoreError(`Document ${row.id} has a corrupt embedding (${row.embedding.length} bytes)`));
			}
			documents.push({ id: row.id, payload: payload.value, embedding: decodeEmbedding(row.embedding) });
		}

		return ok(documents);
	}

	/**
	 * Report whether both indexes are present and usable
	 */
	checkSetup(): Result<SetupReport, StoreError> {
		try {
			const tables = this.db
				.prepare<[], { name: string }>(
					`SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('documents', 'documents_fts')`
				)
				.all()
				.map((row) => row.name);

			const documentsTable = tables.includes('documents');
			const textIndex = tables.includes('documents_fts');

			if (!documentsTable) {
				return ok({ documentsTable, textIndex, documentCount: 0, embeddedCount: 0, embeddingDimensions: [] });
			}

			const counts = this.db
				.prepare<[], { total: number; embedded: number }>(
					'SELECT COUNT(*) AS total, COUNT(embedding) AS embedded FROM documents'
				)
				.get();

			const embeddingDimensions = this.db
				.prepare<[], { dimensions: number }>(
					`SELECT DISTINCT embedding_dimensions AS dimensions FROM documents
					 WHERE embedding_dimensions IS NOT NULL ORDER BY dimensions`
				)
				.all()
				.map((row) => row.dimensions);

			return ok({
				documentsTable,
				textIndex,
				documentCount: counts?.total ?? 0,
				embeddedCount: counts?.embedded ?? 0,
				embeddingDimensions,
			});
		} catch (error) {
			return err(new StoreError(`Setup check failed: ${errorMessage(error)}`, error));
		}
	}

	/**
	 * Close the database connection
	 */
	close(): void {
		this.db.close();
	}
}
