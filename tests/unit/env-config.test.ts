/**
 * Unit tests for environment configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationManager, describeConfig, maskApiKey } from '../../src/lib/env-config.js';
import type { Environment } from '../../src/lib/env-config.js';

const MISSING_ENV_FILE = path.join(os.tmpdir(), 'hybrid-search-no-such-dir', '.env');

function load(env: Environment) {
  return new ConfigurationManager(MISSING_ENV_FILE, env).load();
}

describe('ConfigurationManager', () => {
  describe('load', () => {
    it('should apply defaults to an empty environment', () => {
      const config = load({})._unsafeUnwrap();

      expect(config).toEqual({
        databasePath: '.hybridsearch/index.db',
        openaiApiKey: undefined,
        openaiBaseUrl: undefined,
        embeddingModel: 'text-embedding-ada-002',
        search: {
          k: 10,
          weights: { vector: 1, text: 1 },
          rankConstant: 60,
          candidateLimit: 20,
          timeoutMs: 2000,
          degradeOnPartialFailure: true,
        },
        slowSearchThresholdMs: 500,
        logLevel: 'warn',
        logDir: undefined,
      });
    });

    it('should read and coerce every variable', () => {
      const config = load({
        HYBRID_SEARCH_DB_PATH: '/tmp/docs.db',
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
        EMBEDDING_MODEL: 'test-model',
        VECTOR_WEIGHT: '0.5',
        TEXT_WEIGHT: '2',
        RANK_CONSTANT: '30',
        SEARCH_TOP_K: '5',
        SEARCH_CANDIDATE_LIMIT: '40',
        RETRIEVAL_TIMEOUT_MS: '750',
        DEGRADE_ON_PARTIAL_FAILURE: '0',
        SLOW_SEARCH_THRESHOLD_MS: '250',
        LOG_LEVEL: 'debug',
        LOG_DIR: '/tmp/logs',
      })._unsafeUnwrap();

      expect(config.databasePath).toBe('/tmp/docs.db');
      expect(config.openaiApiKey).toBe('test-secret');
      expect(config.openaiBaseUrl).toBe('http://localhost:8080/v1');
      expect(config.embeddingModel).toBe('test-model');
      expect(config.search).toEqual({
        k: 5,
        weights: { vector: 0.5, text: 2 },
        rankConstant: 30,
        candidateLimit: 40,
        timeoutMs: 750,
        degradeOnPartialFailure: false,
      });
      expect(config.slowSearchThresholdMs).toBe(250);
      expect(config.logLevel).toBe('debug');
      expect(config.logDir).toBe('/tmp/logs');
    });

    it('should treat blank variables as unset', () => {
      const config = load({ OPENAI_API_KEY: '   ', TEXT_WEIGHT: '' })._unsafeUnwrap();

      expect(config.openaiApiKey).toBeUndefined();
      expect(config.search.weights.text).toBe(1);
    });

    it('should name every invalid variable', () => {
      const error = load({
        VECTOR_WEIGHT: '-1',
        DEGRADE_ON_PARTIAL_FAILURE: 'maybe',
        LOG_LEVEL: 'loud',
      })._unsafeUnwrapErr();

      expect(error.code).toBe('CONFIG_INVALID');
      expect(error.issues).toEqual([
        'VECTOR_WEIGHT: Number must be greater than 0',
        'DEGRADE_ON_PARTIAL_FAILURE: Expected true, false, 1 or 0',
        "LOG_LEVEL: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error' | 'fatal', received 'loud'",
      ]);
    });

    it('should reject a retrieval timeout longer than a timer can hold', () => {
      const error = load({ RETRIEVAL_TIMEOUT_MS: '3000000000' })._unsafeUnwrapErr();
      expect(error.issues).toEqual(['RETRIEVAL_TIMEOUT_MS: Number must be less than or equal to 2147483647']);
    });

    it('should reject a non-integer rank constant', () => {
      const error = load({ RANK_CONSTANT: '2.5' })._unsafeUnwrapErr();
      expect(error.issues).toEqual(['RANK_CONSTANT: Expected integer, received float']);
    });
  });

  describe('loadEnv', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hybrid-search-env-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should succeed without a .env file', () => {
      const env: Environment = {};
      expect(new ConfigurationManager(path.join(tempDir, '.env'), env).loadEnv().isOk()).toBe(true);
      expect(env).toEqual({});
    });

    it('should fill unset variables without overriding set ones', () => {
      const envFile = path.join(tempDir, '.env');
      fs.writeFileSync(envFile, 'RANK_CONSTANT=30\nTEXT_WEIGHT=2\n');
      const env: Environment = { TEXT_WEIGHT: '3' };
      const manager = new ConfigurationManager(envFile, env);

      const config = manager.loadEnv().andThen(() => manager.load())._unsafeUnwrap();

      expect(config.search.rankConstant).toBe(30);
      expect(config.search.weights.text).toBe(3);
    });
  });
});

describe('maskApiKey', () => {
  it('should show only the last four characters', () => {
    expect(maskApiKey('test-secret')).toBe('****cret');
    expect(maskApiKey('abc')).toBe('****');
  });
});

describe('describeConfig', () => {
  it('should mask the API key and name unset values', () => {
    const config = load({ OPENAI_API_KEY: 'test-secret' })._unsafeUnwrap();
    const described = describeConfig(config);

    expect(described.openaiApiKey).toBe('****cret');
    expect(described.openaiBaseUrl).toBe('(default)');
    expect(described.weights).toBe('vector=1 text=1');
    expect(described.logDir).toBe('(console only)');
  });
});
