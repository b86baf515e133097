/**
 * Rendering of search responses for the terminal and for --json
 */

import { Chalk } from 'chalk';
import type { SearchResponse } from '../../models/search-response.js';
import type { FusedResult } from '../../models/fused-result.js';
import { RETRIEVAL_SOURCES } from '../../models/ranked-hit.js';
import { formatScore } from '../../lib/ranking-utils.js';

export interface RenderOptions {
  /** Add a line per result naming the source ranks behind its score */
  explain?: boolean;
  colorize?: boolean;
  /** Longest document text shown before it is cut (default: 200) */
  maxTextLength?: number;
}

const DEFAULT_MAX_TEXT_LENGTH = 200;

/**
 * Collapse whitespace and cut long text to one display line
 */
export function previewText(text: string, maxLength: number = DEFAULT_MAX_TEXT_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 1)}…` : flat;
}

/**
 * Describe the ranks that produced a fused score, e.g. "vector #1, text #3"
 */
export function describeContributions(result: FusedResult): string {
  const parts: string[] = [];
  for (const source of RETRIEVAL_SOURCES) {
    const rank = result.contributingRanks[source];
    if (rank !== undefined) {
      parts.push(`${source} #${rank}`);
    }
  }
  return parts.join(', ');
}

/**
 * Render a response as terminal lines
 *
 * Each result reads `n. text (score: x.xxxxxx)`, followed by the elapsed time.
 */
export function renderSearchResponse(response: SearchResponse, options: RenderOptions = {}): string[] {
  const color = new Chalk({ level: options.colorize ? 3 : 0 });
  const maxLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
  const lines: string[] = [];

  if (response.degraded) {
    lines.push(color.yellow('Partial results: one retrieval source failed'));
  }

  if (response.results.length === 0) {
    lines.push(color.yellow('No results found'));
  }

  response.results.forEach((result, index) => {
    lines.push(
      `${index + 1}. ${previewText(result.payload.text, maxLength)} ` +
        color.gray(`(score: ${formatScore(result.fusedScore)})`)
    );
    if (options.explain) {
      lines.push(color.dim(`   ${describeContributions(result)}`));
    }
  });

  lines.push(color.gray(`Search took ${response.elapsedTimeMs.toFixed(1)}ms`));
  return lines;
}

/**
 * Response as a plain object for --json output
 */
export function toJsonResponse(query: string, response: SearchResponse): Record<string, unknown> {
  return {
    query,
    count: response.results.length,
    degraded: response.degraded,
    elapsedTimeMs: response.elapsedTimeMs,
    results: response.results.map((result, index) => ({
      position: index + 1,
      documentId: result.documentId,
      score: result.fusedScore,
      contributingRanks: result.contributingRanks,
      text: result.payload.text,
      metadata: result.payload.metadata,
    })),
  };
}
