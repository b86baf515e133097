/**
 * Output formatting utilities for CLI
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { errorMessage } from '../../lib/errors.js';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•'
};

/**
 * Output formatter class
 *
 * Human output goes through chalk; JSON output prints one object per call.
 * Errors and warnings go to stderr.
 */
export class OutputFormatter {
  private format: OutputFormat;
  private color: ChalkInstance;

  constructor(format: OutputFormat = OutputFormat.HUMAN, useColor: boolean = process.stdout.isTTY === true) {
    this.format = format;
    this.color = new Chalk({ level: useColor ? 3 : 0 });
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${this.color.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error instanceof Error
          ? { name: error.name, message: error.message }
          : error === undefined ? undefined : { name: 'Error', message: String(error) }
      });
    } else {
      console.error(`${this.color.red(symbols.error)} ${this.color.red(message)}`);
      if (error !== undefined) {
        console.error(`  ${this.color.dim(errorMessage(error))}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${this.color.yellow(symbols.warning)} ${this.color.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else {
      console.log(`${this.color.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items });
    } else {
      for (const item of items) {
        console.log(`  ${this.color.dim(symbols.bullet)} ${item}`);
      }
    }
  }

  /**
   * Outputs preformatted lines (human format only)
   */
  lines(lines: string[]): void {
    for (const line of lines) {
      console.log(line);
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      console.log(`  ${this.color.dim(formattedKey + ':')} ${String(value)}`);
    }
  }

  /**
   * Whether human output is colored
   */
  isColored(): boolean {
    return this.color.level > 0;
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }
}
