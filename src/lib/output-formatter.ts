/**
 * Output Formatter
 * json | table output and error reporting for CLI commands
 */

import Table from 'cli-table3';
import { InvalidArgumentError } from 'commander';
import { ApiError, ConfigError, OAuth2Error, ResponseFormatError, TransportError } from './errors.js';
import { redactUrl } from './logger.js';

export type OutputFormat = 'json' | 'table';

export function isValidFormat(format: string): format is OutputFormat {
  return format === 'json' || format === 'table';
}

export function formatOutput(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print `data`; table format uses `tableRenderer` and falls back to JSON without one
 */
export function outputData(data: unknown, format: OutputFormat = 'json', tableRenderer?: () => void): void {
  if (format === 'table' && tableRenderer) {
    tableRenderer();
    return;
  }
  console.log(formatOutput(data));
}

export type Cell = string | number | boolean | null | undefined;

/**
 * Render rows with cli-table3
 */
export function renderTable(head: string[], rows: Cell[][]): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(row.map((cell) => (cell === undefined || cell === null ? '' : String(cell))));
  }
  return table.toString();
}

/**
 * Two-column key/value table for a single object
 */
export function renderRecord(record: object): string {
  const rows: Cell[][] = Object.entries(record)
    .filter(([, value]) => value !== undefined && (typeof value !== 'object' || value === null))
    .map(([key, value]) => [key, value === null ? '' : String(value)]);
  return renderTable(['Field', 'Value'], rows);
}

export interface ErrorReport {
  code: string;
  message: string;
  statusCode?: number;
  url?: string;
  errors?: readonly unknown[];
}

export function describeError(error: unknown): ErrorReport {
  if (error instanceof ApiError) {
    return {
      code: error instanceof OAuth2Error ? 'OAUTH2_ERROR' : 'API_ERROR',
      message: error.message,
      statusCode: error.statusCode,
      url: redactUrl(error.url),
      errors: error.errors,
    };
  }
  if (error instanceof TransportError) {
    return { code: 'NETWORK_ERROR', message: error.message, url: redactUrl(error.url) };
  }
  if (error instanceof ResponseFormatError) {
    return { code: 'UNEXPECTED_RESPONSE', message: error.message, url: redactUrl(error.url) };
  }
  if (error instanceof ConfigError) {
    return { code: 'CONFIG_ERROR', message: error.message };
  }
  if (error instanceof InvalidArgumentError) {
    return { code: 'INVALID_ARGUMENT', message: error.message };
  }
  return {
    code: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * JSON error envelope on stdout, or a readable message on stderr; sets the exit code to 1
 */
export function reportError(error: unknown, format: OutputFormat = 'json'): void {
  const report = describeError(error);

  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error: report }));
  } else {
    console.error(`Error: ${report.message}`);
    if (report.url) {
      console.error(`URL: ${report.url}`);
    }
    if (report.errors && report.errors.length > 0) {
      console.error(`Details: ${JSON.stringify(report.errors)}`);
    }
  }

  process.exitCode = 1;
}
