/**
 * Ingest Command
 *
 * Loads documents from a JSON Lines file into the document store.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { loadConfig } from '../../lib/env-config.js';
import { createSearchContext } from '../../services/search-factory.js';
import { DocumentIngestor, parseDocumentLines } from '../../services/document-ingestor.js';
import { OutputFormatter } from '../utils/output.js';

interface IngestCommandOptions {
  /** False when --no-embed is given */
  embed: boolean;
}

export function createIngestCommand(formatter: OutputFormatter): Command {
  return new Command('ingest')
    .description('Load documents from a JSON Lines file (one {"id","text","metadata"?,"embedding"?} per line)')
    .argument('<file>', 'JSON Lines file')
    .option('--no-embed', 'Store documents without computing missing embeddings')
    .action(async (file: string, options: IngestCommandOptions) => {
      try {
        await executeIngest(file, options, formatter);
      } catch (error) {
        formatter.error('Ingestion failed', error);
        process.exitCode = 1;
      }
    });
}

async function executeIngest(file: string, options: IngestCommandOptions, formatter: OutputFormatter): Promise<void> {
  const config = loadConfig();
  if (config.isErr()) {
    throw config.error;
  }

  const documents = parseDocumentLines(await readFile(file, 'utf-8'));
  if (documents.isErr()) {
    throw documents.error;
  }

  const context = createSearchContext(config.value);
  if (context.isErr()) {
    throw context.error;
  }

  const { store, embedder, logger, close } = context.value;

  try {
    if (options.embed && !embedder && documents.value.some((doc) => doc.embedding === undefined)) {
      formatter.warning('OPENAI_API_KEY is not set; documents without an embedding are stored for text search only');
    }

    const ingestor = new DocumentIngestor(store, embedder, logger);
    const summary = await ingestor.ingest(documents.value, { embed: options.embed });
    if (summary.isErr()) {
      throw summary.error;
    }

    formatter.success(`Ingested ${summary.value.stored} documents from ${file}`, { ...summary.value });
  } finally {
    close();
  }
}
