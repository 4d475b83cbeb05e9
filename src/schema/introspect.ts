import { CellValue, ColumnInfo, ColumnKind, Row } from '../ir/types.js';
import { cellToNumber } from '../utils/numbers.js';

function isEmpty(cell: CellValue | undefined): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '');
}

/**
 * A column is numeric when at least half of its non-empty cells read as
 * numbers, so a stray "n/d" does not turn a value column into text.
 */
export function inferColumnKind(values: (CellValue | undefined)[]): ColumnKind {
  const present = values.filter((v) => !isEmpty(v));
  if (present.length === 0) return 'empty';
  const numeric = present.filter((v) => cellToNumber(v) !== undefined).length;
  return numeric * 2 >= present.length ? 'numeric' : 'text';
}

export function introspectColumns(names: string[], rows: Row[]): ColumnInfo[] {
  return names.map((name) => ({
    name,
    kind: inferColumnKind(rows.map((r) => r[name])),
  }));
}

export function numericColumns(columns: ColumnInfo[]): ColumnInfo[] {
  return columns.filter((c) => c.kind === 'numeric');
}
