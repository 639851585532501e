/**
 * Minimal CSV helpers for the results tables.
 * @module @loadramp/shared/utils/csv
 */

export type CsvCell = string | number | null | undefined;

function escapeCell(cell: CsvCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  const text = String(cell);
  if (/[",\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsvRow(cells: readonly CsvCell[]): string {
  return cells.map(escapeCell).join(',');
}

function splitLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
}

export interface ParsedCsv {
  header: string[];
  rows: string[][];
}

/**
 * Parse CSV text. Lines whose cell count differs from the header (for
 * example a row still being appended) are skipped.
 */
export function parseCsv(text: string): ParsedCsv {
  const lines = text.split('\n').map((line) => line.replace(/\r$/, '')).filter((line) => line.length > 0);
  if (lines.length === 0) {
    return { header: [], rows: [] };
  }
  const header = splitLine(lines[0] ?? '');
  const rows = lines
    .slice(1)
    .map(splitLine)
    .filter((cells) => cells.length === header.length);
  return { header, rows };
}

/**
 * Parse a numeric cell; empty or non-numeric cells are absent.
 */
export function parseNumericCell(cell: string | undefined): number | null {
  if (cell === undefined || cell.trim() === '') {
    return null;
  }
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse JSON text, resolving undefined when it is not valid JSON
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
