import fs from 'node:fs/promises';
import path from 'node:path';

import type { CellValue, ResultRow } from './types.js';

type ResultTableErrorReason = 'RESULT_TABLE_READ_ERROR' | 'RESULT_TABLE_INVALID' | 'RESULT_COLUMNS_MISSING';

export const LABEL_COLUMN = 'notes';

export class ResultTableError extends Error {
  readonly reason: ResultTableErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: ResultTableErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ResultTableError';
    this.reason = reason;
    this.details = details;
  }
}

export interface ResultTableOptions {
  /** Columns that must be present in the header, in addition to `notes`. */
  requiredColumns?: readonly string[];
}

export class ResultTable {
  readonly columns: readonly string[];
  readonly rows: readonly ResultRow[];

  constructor(columns: readonly string[], rows: readonly ResultRow[]) {
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
  }

  /** Rows whose label equals `notes` exactly. */
  select(notes: string): ResultRow[] {
    return this.rows.filter((row) => row[LABEL_COLUMN] === notes);
  }
}

/**
 * Splits CSV text into records. Quoted fields may hold commas, doubled quotes
 * and line breaks; a quote inside an unquoted field is a literal character.
 * Records end at LF or CRLF.
 */
export function parseCsvRecords(raw: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;

  const endRecord = () => {
    record.push(field);
    field = '';
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < raw.length; i += 1) {
    const char = raw[i];

    if (inQuotes) {
      if (char === '"') {
        if (raw[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line += 1;
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n') {
      endRecord();
      line += 1;
    } else if (char === '\r' && raw[i + 1] === '\n') {
      continue;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new ResultTableError('RESULT_TABLE_INVALID', 'unterminated quoted field', { line });
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }

  return records;
}

export function parseCell(value: string): CellValue {
  if (value.trim().length === 0) return value;
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : value;
}

function assertColumns(columns: readonly string[], required: readonly string[]): void {
  const missing = required.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ResultTableError('RESULT_COLUMNS_MISSING', `result table is missing columns: ${missing.join(', ')}`, {
      missing
    });
  }
}

export function parseResultCsv(raw: string, options: ResultTableOptions = {}): ResultTable {
  const records = parseCsvRecords(raw);
  if (records.length === 0) {
    throw new ResultTableError('RESULT_TABLE_INVALID', 'result table has no header row');
  }

  const [header, ...body] = records;
  const columns = header.map((column) => column.trim());
  assertColumns(columns, [LABEL_COLUMN, ...(options.requiredColumns ?? [])]);

  const rows = body.map((record, index) => {
    if (record.length !== columns.length) {
      throw new ResultTableError(
        'RESULT_TABLE_INVALID',
        `row ${index + 1} has ${record.length} fields, expected ${columns.length}`,
        { row: index + 1, fields: record.length, expected: columns.length }
      );
    }

    const row: Record<string, CellValue> = {};
    columns.forEach((column, columnIdx) => {
      // The label stays textual even when it looks like a number.
      row[column] = column === LABEL_COLUMN ? record[columnIdx] : parseCell(record[columnIdx]);
    });
    return row;
  });

  return new ResultTable(columns, rows);
}

export async function loadResultTable(resultsPath: string, options: ResultTableOptions = {}): Promise<ResultTable> {
  const absolutePath = path.resolve(resultsPath);

  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, 'utf8');
  } catch (err) {
    throw new ResultTableError('RESULT_TABLE_READ_ERROR', `Failed to read result table: ${absolutePath}`, {
      path: absolutePath,
      error: err instanceof Error ? err.message : String(err)
    });
  }

  return parseResultCsv(raw, options);
}
