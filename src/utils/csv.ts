/**
 * CSV reading and writing
 *
 * Fields holding a comma, a quote, CR or LF are quoted and quotes are doubled;
 * lines end in `\n`. The header row is always written.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type CsvRecord = Record<string, string>;

export interface CsvTable {
  header: string[];
  records: CsvRecord[];
}

const RE_NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: string): string {
  return RE_NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(values: string[]): string {
  return values.map(formatCsvField).join(',');
}

/**
 * Header plus one line per record; missing fields are written empty
 */
export function formatCsv(columns: string[], records: CsvRecord[]): string {
  const lines = [formatCsvRow(columns)];
  for (const record of records) {
    lines.push(formatCsvRow(columns.map((column) => record[column] ?? '')));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split CSV text into rows of fields. Accepts `\n` and `\r\n` line endings and
 * a leading BOM; blank lines are skipped.
 */
export function parseCsvRows(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endRow = (): void => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    field = '';
  };

  while (i < input.length) {
    const ch = input[i];
    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      endRow();
    } else if (ch !== '\r') {
      field += ch;
    }
    i++;
  }
  if (field !== '' || row.length > 0) endRow();

  return rows;
}

/**
 * Records keyed by the header row
 */
export function parseCsv(text: string): CsvTable {
  const [header = [], ...rows] = parseCsvRows(text);
  const records = rows.map((values) => {
    const record: CsvRecord = {};
    header.forEach((column, i) => {
      record[column] = values[i] ?? '';
    });
    return record;
  });
  return { header, records };
}

export async function writeCsvFile(path: string, columns: string[], records: CsvRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatCsv(columns, records), 'utf-8');
}

export async function readCsvFile(path: string): Promise<CsvTable> {
  return parseCsv(await readFile(path, 'utf-8'));
}
