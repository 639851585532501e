/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @loadramp/cli/output
 */

import chalk from 'chalk';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'plain'];

let globalOutputFormat: OutputFormat = 'table';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

export function disableColor(): void {
  chalk.level = 0;
}

/**
 * Outputs data in the current format
 */
export function output(data: unknown, format?: OutputFormat): void {
  const fmt = format ?? globalOutputFormat;

  if (fmt !== 'json' && typeof data === 'string') {
    console.log(data);
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

export interface TableColumn<T> {
  key: keyof T & string;
  header: string;
  width?: number;
}

/**
 * Lay out rows as padded text lines: header, separator, then one line per row
 */
export function formatTable<T extends object>(data: readonly T[], columns: readonly TableColumn<T>[]): string[] {
  const cell = (row: T, column: TableColumn<T>): string => {
    const value: unknown = row[column.key];
    return value === null || value === undefined ? '' : String(value);
  };

  const widths = columns.map(
    (column) => column.width ?? Math.max(column.header.length, 4, ...data.map((row) => cell(row, column).length)),
  );

  const render = (values: string[]): string =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? value.length))
      .join('  ')
      .trimEnd();

  return [
    render(columns.map((column) => column.header)),
    widths.map((w) => '─'.repeat(w)).join('──'),
    ...data.map((row) => render(columns.map((column) => cell(row, column)))),
  ];
}

/**
 * Prints rows as a table, or as JSON in json mode
 */
export function table<T extends object>(data: readonly T[], columns: readonly TableColumn<T>[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (data.length === 0) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  const [header, separator, ...rows] = formatTable(data, columns);
  console.log(chalk.bold(header));
  console.log(separator);
  for (const row of rows) {
    console.log(row);
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a run or scenario status badge
 */
export function statusBadge(status: string): string {
  const statusLower = status.toLowerCase();

  if (['running', 'collecting', 'converging'].includes(statusLower)) {
    return chalk.green('●') + ' ' + chalk.green(status);
  }
  if (['completed', 'done'].includes(statusLower)) {
    return chalk.green('✓') + ' ' + chalk.green(status);
  }
  if (['stopped-early', 'finished'].includes(statusLower)) {
    return chalk.yellow('◐') + ' ' + chalk.yellow(status);
  }
  if (['failed', 'error'].includes(statusLower)) {
    return chalk.red('●') + ' ' + chalk.red(status);
  }
  if (['cancelled', 'idle'].includes(statusLower)) {
    return chalk.gray('○') + ' ' + chalk.gray(status);
  }

  return chalk.blue('●') + ' ' + status;
}
