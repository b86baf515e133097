/**
 * Unit tests for search request validation and score helpers
 */

import { describe, it, expect } from 'vitest';
import { createSearchRequest, formatScore, weightWarnings } from '../../src/lib/ranking-utils.js';
import { ConfigError } from '../../src/lib/errors.js';

describe('createSearchRequest', () => {
  it('should apply every default', () => {
    const request = createSearchRequest({ queryText: 'vector databases' })._unsafeUnwrap();

    expect(request).toEqual({
      queryText: 'vector databases',
      k: 10,
      weights: { vector: 1, text: 1 },
      rankConstant: 60,
      degradeOnPartialFailure: true,
      timeoutMs: 2000,
      candidateLimit: 20,
    });
  });

  it('should raise the candidate limit to k', () => {
    expect(createSearchRequest({ queryText: 'q', k: 35 })._unsafeUnwrap().candidateLimit).toBe(35);
    expect(createSearchRequest({ queryText: 'q', k: 35, candidateLimit: 5 })._unsafeUnwrap().candidateLimit).toBe(5);
  });

  it('should fill in a single omitted weight', () => {
    const request = createSearchRequest({ queryText: 'q', weights: { text: 0.3 } })._unsafeUnwrap();
    expect(request.weights).toEqual({ vector: 1, text: 0.3 });
  });

  it('should return an immutable request', () => {
    const request = createSearchRequest({ queryText: 'q', queryVector: [1, 2] })._unsafeUnwrap();

    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.weights)).toBe(true);
    expect(Object.isFrozen(request.queryVector)).toBe(true);
  });

  it('should accept a vector-only request', () => {
    const request = createSearchRequest({ queryVector: [0.1, 0.2] })._unsafeUnwrap();

    expect(request.queryText).toBe('');
    expect(request.queryVector).toEqual([0.1, 0.2]);
  });

  it('should list every invalid field', () => {
    const error = createSearchRequest({
      queryText: 'q',
      k: 0,
      weights: { vector: 0, text: -1 },
      rankConstant: 0,
      timeoutMs: 0,
    })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.retryable).toBe(false);
    expect(error.issues).toEqual([
      'k: k must be >= 1',
      'weights.vector: Weight must be > 0',
      'weights.text: Weight must be > 0',
      'rankConstant: Rank constant must be > 0',
      'timeoutMs: Timeout must be > 0',
    ]);
  });

  it('should reject a request without text or vector', () => {
    const error = createSearchRequest({ queryText: '' })._unsafeUnwrapErr();
    expect(error.issues).toEqual(['queryText: Either queryText or queryVector is required']);
  });

  it('should accept a long query', () => {
    const queryText = 'word '.repeat(1000);
    expect(createSearchRequest({ queryText })._unsafeUnwrap().queryText).toBe(queryText);
  });

  it('should cap the timeout at the longest timer delay', () => {
    expect(createSearchRequest({ queryText: 'q', timeoutMs: 2_147_483_647 })._unsafeUnwrap().timeoutMs).toBe(
      2_147_483_647
    );

    const error = createSearchRequest({ queryText: 'q', timeoutMs: 2_147_483_648 })._unsafeUnwrapErr();
    expect(error.issues).toEqual(['timeoutMs: Timeout must be <= 2147483647']);
  });

  it('should reject a non-integer rank constant', () => {
    const error = createSearchRequest({ queryText: 'q', rankConstant: 1.5 })._unsafeUnwrapErr();
    expect(error.issues).toEqual(['rankConstant: Expected integer, received float']);
  });
});

describe('weightWarnings', () => {
  it('should stay quiet for balanced weights', () => {
    expect(weightWarnings({ vector: 1, text: 2 })).toEqual([]);
  });

  it('should warn when one source dominates', () => {
    expect(weightWarnings({ vector: 10, text: 1 })).toEqual([
      'Vector weight is 10.0x the text weight (text results heavily discounted)',
    ]);
    expect(weightWarnings({ vector: 1, text: 20 })).toEqual([
      'Text weight is 20.0x the vector weight (vector results heavily discounted)',
    ]);
  });
});

describe('formatScore', () => {
  it('should print six decimals by default', () => {
    expect(formatScore(1 / 61)).toBe('0.016393');
    expect(formatScore(0.5, 2)).toBe('0.50');
  });
});
