#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter, OutputFormat } from './utils/output.js';
import { createSearchCommand } from './commands/search.js';
import { createIngestCommand } from './commands/ingest.js';
import { createCheckCommand } from './commands/check.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('hybrid-search')
  .description('Hybrid search over a local document store using reciprocal rank fusion')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    // Set output format based on global --json flag
    const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean; quiet?: boolean }>();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }

    // LOG_LEVEL is read when configuration loads
    if (opts.verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
    if (opts.quiet) {
      process.env.LOG_LEVEL = 'error';
    }
  });

program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

program.addCommand(createSearchCommand(output));
program.addCommand(createIngestCommand(output));
program.addCommand(createCheckCommand(output));

program.parseAsync(process.argv).catch((error: unknown) => {
  // Commander has already printed its own usage errors
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  output.error('Unexpected error', error);
  process.exitCode = 1;
});
