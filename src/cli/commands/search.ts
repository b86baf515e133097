/**
 * Search Command
 *
 * Runs a hybrid search for one query, or prompts for queries until "exit"
 * when no query is given.
 */

import { Command } from 'commander';
import readline from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import chalk from 'chalk';
import { loadConfig } from '../../lib/env-config.js';
import { weightWarnings } from '../../lib/ranking-utils.js';
import type { SearchRequestInput } from '../../lib/ranking-utils.js';
import { createSearchContext } from '../../services/search-factory.js';
import type { HybridSearchOrchestrator } from '../../services/hybrid-search-orchestrator.js';
import { OutputFormat, OutputFormatter } from '../utils/output.js';
import { parsePositiveInt, parsePositiveNumber } from '../utils/options.js';
import { renderSearchResponse, toJsonResponse } from '../utils/result-renderer.js';

export interface SearchCommandOptions {
  limit?: number;
  vectorWeight?: number;
  textWeight?: number;
  rankConstant?: number;
  timeout?: number;
  candidates?: number;
  /** False when --no-degrade is given */
  degrade: boolean;
  explain?: boolean;
}

const EXIT_WORD = 'exit';

export function createSearchCommand(formatter: OutputFormatter): Command {
  return new Command('search')
    .description('Hybrid search: fuse vector and full-text rankings with weighted RRF')
    .argument('[query]', 'Search query (omit for an interactive prompt)')
    .option('-k, --limit <n>', 'Number of results', parsePositiveInt)
    .option('--vector-weight <w>', 'Weight of the vector ranking', parsePositiveNumber)
    .option('--text-weight <w>', 'Weight of the text ranking', parsePositiveNumber)
    .option('--rank-constant <c>', 'RRF constant C', parsePositiveInt)
    .option('--timeout <ms>', 'Per-source retrieval deadline in milliseconds', parsePositiveInt)
    .option('--candidates <n>', 'Hits requested from each source', parsePositiveInt)
    .option('--no-degrade', 'Fail instead of returning results from a single source')
    .option('--explain', 'Show the source ranks behind each score')
    .action(async (query: string | undefined, options: SearchCommandOptions) => {
      try {
        await executeSearch(query, options, formatter);
      } catch (error) {
        formatter.error('Search failed', error);
        process.exitCode = 1;
      }
    });
}

/**
 * Build the request fields given on the command line
 *
 * Omitted options are left out so configured defaults apply.
 */
export function buildRequestInput(query: string, options: SearchCommandOptions): SearchRequestInput {
  const request: SearchRequestInput = { queryText: query };

  if (options.limit !== undefined) request.k = options.limit;
  if (options.rankConstant !== undefined) request.rankConstant = options.rankConstant;
  if (options.timeout !== undefined) request.timeoutMs = options.timeout;
  if (options.candidates !== undefined) request.candidateLimit = options.candidates;
  if (!options.degrade) request.degradeOnPartialFailure = false;

  if (options.vectorWeight !== undefined || options.textWeight !== undefined) {
    const weights: NonNullable<SearchRequestInput['weights']> = {};
    if (options.vectorWeight !== undefined) weights.vector = options.vectorWeight;
    if (options.textWeight !== undefined) weights.text = options.textWeight;
    request.weights = weights;
  }

  return request;
}

async function executeSearch(
  query: string | undefined,
  options: SearchCommandOptions,
  formatter: OutputFormatter
): Promise<void> {
  const config = loadConfig();
  if (config.isErr()) {
    throw config.error;
  }

  const context = createSearchContext(config.value);
  if (context.isErr()) {
    throw context.error;
  }

  const { orchestrator, close } = context.value;

  if (formatter.getFormat() === OutputFormat.HUMAN) {
    const defaults = config.value.search.weights;
    const weights = {
      vector: options.vectorWeight ?? defaults.vector,
      text: options.textWeight ?? defaults.text,
    };
    for (const warning of weightWarnings(weights)) {
      formatter.warning(warning);
    }
  }

  try {
    if (query !== undefined) {
      const succeeded = await runQuery(orchestrator, query, options, formatter);
      if (!succeeded) {
        process.exitCode = 1;
      }
    } else {
      await interactiveLoop(orchestrator, options, formatter);
    }
  } finally {
    close();
  }
}

/**
 * Run one query and print its outcome
 *
 * @returns False when the search failed
 */
async function runQuery(
  orchestrator: HybridSearchOrchestrator,
  query: string,
  options: SearchCommandOptions,
  formatter: OutputFormatter
): Promise<boolean> {
  const request = buildRequestInput(query, options);
  const result = await orchestrator.executeHybridSearch(request);

  if (result.isErr()) {
    formatter.error(result.error.message, result.error);
    return false;
  }

  const response = result.value;

  if (formatter.getFormat() === OutputFormat.JSON) {
    formatter.json(toJsonResponse(query, response));
    return true;
  }

  console.log(chalk.cyan(`\nSearch: "${query}"`));
  formatter.lines(renderSearchResponse(response, { explain: options.explain, colorize: formatter.isColored() }));
  return true;
}

async function interactiveLoop(
  orchestrator: HybridSearchOrchestrator,
  options: SearchCommandOptions,
  formatter: OutputFormatter
): Promise<void> {
  const rl = readline.createInterface({ input, output });
  rl.setPrompt(chalk.bold(`Enter a search query (or "${EXIT_WORD}" to quit): `));
  rl.prompt();

  try {
    for await (const line of rl) {
      const query = line.trim();

      if (query.toLowerCase() === EXIT_WORD) {
        break;
      }

      if (query === '') {
        formatter.warning('Please enter a search query');
      } else {
        await runQuery(orchestrator, query, options, formatter);
      }

      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
