import { CellValue, ColumnInfo, Row } from '../ir/types.js';
import { logger } from '../utils/logger.js';

export const NORM_SUFFIX = '_norm';

/**
 * Case and accent insensitive form of a value: NFKD, combining marks dropped,
 * lowercased and trimmed. `null`/`undefined` normalize to the empty string.
 */
export function normalizeText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value)
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .trim();
}

export function normalizeCell(cell: CellValue | undefined): string {
  return normalizeText(cell);
}

export function normalizedColumnName(column: string): string {
  return `${column}${NORM_SUFFIX}`;
}

export function isNormalizedColumn(column: string): boolean {
  return column.endsWith(NORM_SUFFIX);
}

/**
 * Adds a `<column>_norm` cell to every row for each textual column. Runs once
 * at load time; the returned column infos carry the derived names.
 */
export function prepareNormalizedColumns(columns: ColumnInfo[], rows: Row[]): ColumnInfo[] {
  const taken = new Set(columns.map((c) => c.name));
  const prepared: ColumnInfo[] = [];

  for (const column of columns) {
    if (column.kind !== 'text' || isNormalizedColumn(column.name)) {
      prepared.push({ ...column });
      continue;
    }
    const derived = normalizedColumnName(column.name);
    if (taken.has(derived)) {
      logger.warn(`Skipping normalized column ${derived}: name already used by the spreadsheet`);
      prepared.push({ ...column });
      continue;
    }
    taken.add(derived);
    for (const row of rows) {
      row[derived] = normalizeCell(row[column.name]);
    }
    prepared.push({ ...column, normalized: derived });
  }

  return prepared;
}

/** Original column names followed by the derived ones, in upload order. */
export function allColumnNames(columns: ColumnInfo[]): string[] {
  const derived = columns.flatMap((c) => (c.normalized ? [c.normalized] : []));
  return [...columns.map((c) => c.name), ...derived];
}
