/**
 * Unit tests for the search command's request building
 */

import { describe, it, expect } from 'vitest';
import { buildRequestInput } from '../../src/cli/commands/search.js';

describe('buildRequestInput', () => {
  it('should leave omitted options to the configured defaults', () => {
    expect(buildRequestInput('rrf', { degrade: true })).toEqual({ queryText: 'rrf' });
  });

  it('should map every option onto the request', () => {
    expect(
      buildRequestInput('rrf', {
        limit: 5,
        vectorWeight: 2,
        textWeight: 0.5,
        rankConstant: 10,
        timeout: 300,
        candidates: 40,
        degrade: false,
      })
    ).toEqual({
      queryText: 'rrf',
      k: 5,
      weights: { vector: 2, text: 0.5 },
      rankConstant: 10,
      timeoutMs: 300,
      candidateLimit: 40,
      degradeOnPartialFailure: false,
    });
  });

  it('should send only the weight that was given', () => {
    expect(buildRequestInput('rrf', { textWeight: 3, degrade: true }).weights).toEqual({ text: 3 });
  });
});
