/**
 * Structured Logging Module
 *
 * Structured logging for searches, retrieval failures and slow searches.
 * Entries go to the console above a level threshold and, when a log
 * directory is configured, to JSON Lines (.jsonl) files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RetrievalSource } from '../models/ranked-hit.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Retrieval failure log entry
 */
export interface RetrievalFailureLog extends BaseLogEntry {
	type: 'retrieval_failure';
	source: RetrievalSource;
	error_code: string;
	reason: string;
	error_message: string;
	degraded: boolean;
	context?: Record<string, unknown>;
}

/**
 * Slow search log entry
 */
export interface SlowSearchLog extends BaseLogEntry {
	type: 'slow_search';
	level: 'warn';
	query: string;
	duration_ms: number;
	threshold_ms: number;
	result_count: number;
	context?: Record<string, unknown>;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Union type for all log entries
 */
export type LogEntry = RetrievalFailureLog | SlowSearchLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for JSONL log files (default: none, console only) */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Structured logger
 */
export class Logger {
	private logDir?: string;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Change the console threshold (e.g. from --verbose / --quiet)
	 */
	setConsoleLevel(level: LogLevel): void {
		this.consoleLevel = level;
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	/**
	 * Output to console if enabled and above threshold
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;

		// Everything goes to stderr so stdout stays clean for --json output
		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, JSON.stringify(entry));
				break;
			default:
				console.warn(prefix, JSON.stringify(entry));
		}
	}

	/**
	 * Log a failed retrieval source
	 */
	logRetrievalFailure(
		source: RetrievalSource,
		error: { code: string; reason: string; message: string },
		degraded: boolean,
		context?: Record<string, unknown>
	): void {
		const entry: RetrievalFailureLog = {
			timestamp: new Date().toISOString(),
			level: degraded ? 'warn' : 'error',
			type: 'retrieval_failure',
			source,
			error_code: error.code,
			reason: error.reason,
			error_message: error.message,
			degraded,
			context,
		};

		this.writeLogEntry('retrieval-failures', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a search that exceeded the slow-search threshold
	 */
	logSlowSearch(
		query: string,
		durationMs: number,
		thresholdMs: number,
		resultCount: number,
		context?: Record<string, unknown>
	): void {
		const entry: SlowSearchLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'slow_search',
			query,
			duration_ms: Math.round(durationMs),
			threshold_ms: thresholdMs,
			result_count: resultCount,
			context,
		};

		this.writeLogEntry('slow-searches', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

/**
 * Default logger instance (console only, warn and above)
 */
export const logger = new Logger();
