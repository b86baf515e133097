/**
 * Utility functions for hybrid search requests and scores
 *
 * @module ranking-utils
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import type { SearchRequest, SourceWeights } from '../models/search-request.js';
import { ConfigError } from './errors.js';
import {
  DEFAULT_CANDIDATE_LIMIT,
  DEFAULT_RANK_CONSTANT,
  DEFAULT_RETRIEVAL_TIMEOUT_MS,
  DEFAULT_SOURCE_WEIGHTS,
  DEFAULT_TOP_K,
  MAX_RETRIEVAL_TIMEOUT_MS,
  SCORE_DISPLAY_DECIMALS,
} from '../constants/fusion-constants.js';

const weightSchema = z
  .number()
  .finite()
  .positive({ message: 'Weight must be > 0' });

/**
 * Schema for raw search request input
 *
 * Every field but the query is optional and receives its default here, so a
 * parsed request is always complete.
 */
export const searchRequestSchema = z
  .object({
    queryText: z.string().default(''),
    queryVector: z.array(z.number().finite()).min(1, { message: 'Query vector must not be empty' }).optional(),
    k: z.number().int().min(1, { message: 'k must be >= 1' }).default(DEFAULT_TOP_K),
    weights: z
      .object({
        vector: weightSchema.default(DEFAULT_SOURCE_WEIGHTS.vector),
        text: weightSchema.default(DEFAULT_SOURCE_WEIGHTS.text),
      })
      .strict()
      .default({}),
    rankConstant: z
      .number()
      .int()
      .positive({ message: 'Rank constant must be > 0' })
      .default(DEFAULT_RANK_CONSTANT),
    degradeOnPartialFailure: z.boolean().default(true),
    timeoutMs: z
      .number()
      .int()
      .positive({ message: 'Timeout must be > 0' })
      .max(MAX_RETRIEVAL_TIMEOUT_MS, { message: `Timeout must be <= ${MAX_RETRIEVAL_TIMEOUT_MS}` })
      .default(DEFAULT_RETRIEVAL_TIMEOUT_MS),
    candidateLimit: z.number().int().min(1, { message: 'Candidate limit must be >= 1' }).optional(),
  })
  .strict()
  .refine((request) => request.queryText.trim().length > 0 || request.queryVector !== undefined, {
    message: 'Either queryText or queryVector is required',
    path: ['queryText'],
  });

/**
 * Raw search request as accepted by the public call surface
 */
export type SearchRequestInput = z.input<typeof searchRequestSchema>;

/**
 * Format zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError, fallbackPath: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : fallbackPath;
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw input into an immutable SearchRequest with defaults applied
 *
 * @param input - Raw request
 * @returns Result with the validated request or a ConfigError listing every issue
 */
export function createSearchRequest(input: SearchRequestInput): Result<SearchRequest, ConfigError> {
  const parsed = searchRequestSchema.safeParse(input);

  if (!parsed.success) {
    return err(new ConfigError('Invalid search request', formatIssues(parsed.error, 'request')));
  }

  const { queryText, queryVector, k, weights, rankConstant, degradeOnPartialFailure, timeoutMs, candidateLimit } =
    parsed.data;

  const request: SearchRequest = {
    queryText,
    ...(queryVector !== undefined ? { queryVector: Object.freeze([...queryVector]) } : {}),
    k,
    weights: Object.freeze({ vector: weights.vector, text: weights.text }),
    rankConstant,
    degradeOnPartialFailure,
    timeoutMs,
    candidateLimit: candidateLimit ?? Math.max(k, DEFAULT_CANDIDATE_LIMIT),
  };

  return ok(Object.freeze(request));
}

/**
 * Warnings for weight combinations that effectively silence one source
 *
 * @param weights - Source weights
 * @returns Human-readable warnings (empty when balanced)
 */
export function weightWarnings(weights: Readonly<SourceWeights>): string[] {
  const warnings: string[] = [];
  const ratio = weights.vector / weights.text;

  if (ratio >= 10) {
    warnings.push(`Vector weight is ${ratio.toFixed(1)}x the text weight (text results heavily discounted)`);
  } else if (ratio <= 0.1) {
    warnings.push(`Text weight is ${(1 / ratio).toFixed(1)}x the vector weight (vector results heavily discounted)`);
  }

  return warnings;
}

/**
 * Format score for display
 *
 * @param score - Score value to format
 * @param decimals - Number of decimal places (default: SCORE_DISPLAY_DECIMALS)
 */
export function formatScore(score: number, decimals: number = SCORE_DISPLAY_DECIMALS): string {
  return score.toFixed(decimals);
}
