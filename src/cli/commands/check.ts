/**
 * Check Command
 *
 * Verifies configuration and that both search indexes are usable.
 */

import { Command } from 'commander';
import { describeConfig, loadConfig } from '../../lib/env-config.js';
import { assessSetup } from '../../services/document-store.js';
import { createSearchContext } from '../../services/search-factory.js';
import { OutputFormat, OutputFormatter } from '../utils/output.js';

export function createCheckCommand(formatter: OutputFormatter): Command {
  return new Command('check')
    .description('Validate configuration and the document store before searching')
    .action(() => {
      try {
        executeCheck(formatter);
      } catch (error) {
        formatter.error('Check failed', error);
        process.exitCode = 1;
      }
    });
}

function executeCheck(formatter: OutputFormatter): void {
  const config = loadConfig();
  if (config.isErr()) {
    throw config.error;
  }

  const context = createSearchContext(config.value);
  if (context.isErr()) {
    throw context.error;
  }

  const { store, embedder, close } = context.value;

  try {
    const report = store.checkSetup();
    if (report.isErr()) {
      throw report.error;
    }

    const { problems, warnings } = assessSetup(report.value, embedder !== undefined);

    if (formatter.getFormat() === OutputFormat.JSON) {
      formatter.json({
        status: problems.length === 0 ? 'ok' : 'failed',
        config: describeConfig(config.value),
        store: report.value,
        problems,
        warnings,
      });
    } else {
      formatter.info('Configuration', describeConfig(config.value));
      formatter.info('Document store', {
        documents: report.value.documentCount,
        embedded: report.value.embeddedCount,
        dimensions: report.value.embeddingDimensions.join(', ') || '(none)',
      });

      for (const warning of warnings) {
        formatter.warning(warning);
      }

      if (problems.length === 0) {
        formatter.success('Setup is ready for hybrid search');
      } else {
        formatter.error('Setup is not usable');
        formatter.list(problems);
      }
    }

    if (problems.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    close();
  }
}
