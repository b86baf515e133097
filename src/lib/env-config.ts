/**
 * Configuration Management
 *
 * Environment-driven configuration: `.env` is loaded with dotenv, then the
 * variables are validated with zod into a typed HybridSearchConfig.
 */

import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Result } from './result-types.js';
import { ok, err } from './result-types.js';
import { ConfigError, errorMessage } from './errors.js';
import { formatIssues } from './ranking-utils.js';
import type { LogLevel } from './logger.js';
import type { SourceWeights } from '../models/search-request.js';
import {
	DEFAULT_CANDIDATE_LIMIT,
	DEFAULT_DATABASE_PATH,
	DEFAULT_EMBEDDING_MODEL,
	DEFAULT_RANK_CONSTANT,
	DEFAULT_RETRIEVAL_TIMEOUT_MS,
	DEFAULT_SLOW_SEARCH_THRESHOLD_MS,
	DEFAULT_SOURCE_WEIGHTS,
	DEFAULT_TOP_K,
	MAX_RETRIEVAL_TIMEOUT_MS,
} from '../constants/fusion-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Environment variables as seen by the manager
 */
export type Environment = Record<string, string | undefined>;

/**
 * Defaults applied to every search request
 */
export interface SearchRequestDefaults {
	k: number;
	weights: SourceWeights;
	rankConstant: number;
	candidateLimit: number;
	timeoutMs: number;
	degradeOnPartialFailure: boolean;
}

/**
 * Validated process configuration
 */
export interface HybridSearchConfig {
	/** SQLite document store */
	databasePath: string;

	/** OpenAI credentials; no embedder is built without a key */
	openaiApiKey?: string;
	openaiBaseUrl?: string;
	embeddingModel: string;

	search: SearchRequestDefaults;

	slowSearchThresholdMs: number;
	logLevel: LogLevel;
	/** JSONL log directory; console only when unset */
	logDir?: string;
}

// ============================================================================
// Schema
// ============================================================================

const booleanFlag = z
	.enum(['true', 'false', '1', '0'], {
		errorMap: () => ({ message: 'Expected true, false, 1 or 0' }),
	})
	.transform((value) => value === 'true' || value === '1');

const positiveNumber = (fallback: number) => z.coerce.number().finite().positive().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
	HYBRID_SEARCH_DB_PATH: z.string().default(DEFAULT_DATABASE_PATH),
	OPENAI_API_KEY: z.string().optional(),
	OPENAI_BASE_URL: z.string().url().optional(),
	EMBEDDING_MODEL: z.string().default(DEFAULT_EMBEDDING_MODEL),
	VECTOR_WEIGHT: positiveNumber(DEFAULT_SOURCE_WEIGHTS.vector),
	TEXT_WEIGHT: positiveNumber(DEFAULT_SOURCE_WEIGHTS.text),
	RANK_CONSTANT: positiveInt(DEFAULT_RANK_CONSTANT),
	SEARCH_TOP_K: positiveInt(DEFAULT_TOP_K),
	SEARCH_CANDIDATE_LIMIT: positiveInt(DEFAULT_CANDIDATE_LIMIT),
	RETRIEVAL_TIMEOUT_MS: z.coerce
		.number()
		.int()
		.positive()
		.max(MAX_RETRIEVAL_TIMEOUT_MS)
		.default(DEFAULT_RETRIEVAL_TIMEOUT_MS),
	DEGRADE_ON_PARTIAL_FAILURE: booleanFlag.default('true'),
	SLOW_SEARCH_THRESHOLD_MS: positiveInt(DEFAULT_SLOW_SEARCH_THRESHOLD_MS),
	LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
	LOG_DIR: z.string().optional(),
});

/**
 * Drop variables set to an empty string; they count as unset
 */
function withoutBlanks(env: Environment): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== '') {
			result[key] = value.trim();
		}
	}
	return result;
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Loads `.env` into the given environment and validates it.
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: Environment = process.env
	) {}

	/**
	 * Load variables from a .env file
	 *
	 * A missing file is not an error; variables already set win.
	 */
	loadEnv(): Result<void, ConfigError> {
		const envFile = this.envPath ?? path.resolve(process.cwd(), '.env');

		if (!existsSync(envFile)) {
			return ok(undefined);
		}

		try {
			const parsed = parseDotenv(readFileSync(envFile));
			for (const [key, value] of Object.entries(parsed)) {
				if (this.env[key] === undefined) {
					this.env[key] = value;
				}
			}
			return ok(undefined);
		} catch (error) {
			return err(new ConfigError(`Failed to load .env file: ${errorMessage(error)}`));
		}
	}

	/**
	 * Validate the environment into a configuration
	 *
	 * @returns Result with the configuration, or a ConfigError naming every invalid variable
	 */
	load(): Result<HybridSearchConfig, ConfigError> {
		const parsed = envSchema.safeParse(withoutBlanks(this.env));

		if (!parsed.success) {
			return err(new ConfigError('Invalid environment configuration', formatIssues(parsed.error, 'env')));
		}

		const env = parsed.data;

		return ok({
			databasePath: env.HYBRID_SEARCH_DB_PATH,
			openaiApiKey: env.OPENAI_API_KEY,
			openaiBaseUrl: env.OPENAI_BASE_URL,
			embeddingModel: env.EMBEDDING_MODEL,
			search: {
				k: env.SEARCH_TOP_K,
				weights: { vector: env.VECTOR_WEIGHT, text: env.TEXT_WEIGHT },
				rankConstant: env.RANK_CONSTANT,
				candidateLimit: env.SEARCH_CANDIDATE_LIMIT,
				timeoutMs: env.RETRIEVAL_TIMEOUT_MS,
				degradeOnPartialFailure: env.DEGRADE_ON_PARTIAL_FAILURE,
			},
			slowSearchThresholdMs: env.SLOW_SEARCH_THRESHOLD_MS,
			logLevel: env.LOG_LEVEL,
			logDir: env.LOG_DIR,
		});
	}
}

/**
 * Mask API key for safe logging (show only last 4 characters)
 */
export function maskApiKey(apiKey: string): string {
	if (apiKey.length <= 4) {
		return '****';
	}
	return '****' + apiKey.slice(-4);
}

/**
 * Configuration as printable key/value pairs, secrets masked
 */
export function describeConfig(config: HybridSearchConfig): Record<string, string> {
	return {
		databasePath: config.databasePath,
		openaiApiKey: config.openaiApiKey ? maskApiKey(config.openaiApiKey) : '(not set)',
		openaiBaseUrl: config.openaiBaseUrl ?? '(default)',
		embeddingModel: config.embeddingModel,
		k: String(config.search.k),
		weights: `vector=${config.search.weights.vector} text=${config.search.weights.text}`,
		rankConstant: String(config.search.rankConstant),
		candidateLimit: String(config.search.candidateLimit),
		timeoutMs: String(config.search.timeoutMs),
		degradeOnPartialFailure: String(config.search.degradeOnPartialFailure),
		logLevel: config.logLevel,
		logDir: config.logDir ?? '(console only)',
	};
}

/**
 * Load `.env` and validate the process environment
 *
 * @param envPath - Optional path to .env file
 */
export function loadConfig(envPath?: string): Result<HybridSearchConfig, ConfigError> {
	const manager = new ConfigurationManager(envPath);
	return manager.loadEnv().andThen(() => manager.load());
}
