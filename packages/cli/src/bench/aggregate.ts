import type { ResultTable } from './table.js';
import type {
  AverageSeries,
  CellValue,
  FlagBit,
  FlagPairBucket,
  FlagPairKey,
  FlagPairLabels,
  PercentileColumns,
  PercentileName,
  ResultRow
} from './types.js';

export const PERCENTILES: readonly PercentileName[] = ['p50', 'p99', 'p999'];

export const POP_PERCENTILE_COLUMNS: PercentileColumns = {
  p50: 'pop_lat_p50_ns',
  p99: 'pop_lat_p99_ns',
  p999: 'pop_lat_p999_ns'
};

const FLAG_BITS: readonly FlagBit[] = [0, 1];

export interface RowGroup {
  key: CellValue[];
  rows: ResultRow[];
}

function isPresent(value: CellValue | undefined): value is CellValue {
  return value !== undefined && value !== '';
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function compareCells(a: CellValue, b: CellValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareKeys(a: CellValue[], b: CellValue[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    const order = compareCells(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

/**
 * Groups the rows labelled `notes` by the values of `keyColumns`. Rows missing
 * any key are left out. Groups come back in ascending key order.
 */
export function groupRows(table: ResultTable, notes: string, keyColumns: readonly string[]): RowGroup[] {
  const groups = new Map<string, RowGroup>();

  for (const row of table.select(notes)) {
    const key: CellValue[] = [];
    for (const column of keyColumns) {
      const value = row[column];
      if (!isPresent(value)) break;
      key.push(value);
    }
    if (key.length !== keyColumns.length) continue;

    const id = JSON.stringify(key);
    const existing = groups.get(id);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

function numericValues(rows: ResultRow[], column: string): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const value = row[column];
    if (typeof value === 'number') values.push(value);
  }
  return values;
}

/**
 * Averages `metricColumn` per distinct value of `keyColumn` over the rows
 * labelled `notes`. Averages are truncated to integers, matching the integer
 * units of the measurement columns.
 */
export function getAvg(table: ResultTable, notes: string, keyColumn: string, metricColumn: string): AverageSeries {
  const keys: CellValue[] = [];
  const averages: number[] = [];

  for (const group of groupRows(table, notes, [keyColumn])) {
    const values = numericValues(group.rows, metricColumn);
    if (values.length === 0) continue;
    keys.push(group.key[0]);
    averages.push(Math.trunc(mean(values)));
  }

  return { keys, averages };
}

function flagBit(value: CellValue): FlagBit | null {
  if (value === 0 || value === 1) return value;
  return null;
}

const FLAG_PAIR_KEYS: Record<FlagBit, Record<FlagBit, FlagPairKey>> = {
  0: { 0: '0,0', 1: '0,1' },
  1: { 0: '1,0', 1: '1,1' }
};

function flagPairKey(a: FlagBit, b: FlagBit): FlagPairKey {
  return FLAG_PAIR_KEYS[a][b];
}

/**
 * Mean p50/p99/p999 for each of the four combinations of two 0/1 flag
 * columns. A combination is reported only when every percentile has at least
 * one observation; output order is (0,0), (0,1), (1,0), (1,1).
 */
export function getFlagPairPercentiles(
  table: ResultTable,
  notes: string,
  flags: readonly [string, string],
  labels?: FlagPairLabels,
  columns: PercentileColumns = POP_PERCENTILE_COLUMNS
): FlagPairBucket[] {
  const byPair = new Map<FlagPairKey, ResultRow[]>();
  for (const group of groupRows(table, notes, flags)) {
    const first = flagBit(group.key[0]);
    const second = flagBit(group.key[1]);
    if (first === null || second === null) continue;
    byPair.set(flagPairKey(first, second), group.rows);
  }

  const buckets: FlagPairBucket[] = [];
  for (const first of FLAG_BITS) {
    for (const second of FLAG_BITS) {
      const key = flagPairKey(first, second);
      const rows = byPair.get(key) ?? [];

      const percentiles: Partial<Record<PercentileName, number>> = {};
      for (const name of PERCENTILES) {
        const values = numericValues(rows, columns[name]);
        if (values.length > 0) percentiles[name] = mean(values);
      }

      const { p50, p99, p999 } = percentiles;
      if (p50 === undefined || p99 === undefined || p999 === undefined) continue;

      buckets.push({
        key: [first, second],
        label: labels?.[key] ?? `${flags[0]}=${first}, ${flags[1]}=${second}`,
        percentiles: { p50, p99, p999 }
      });
    }
  }

  return buckets;
}
