import {
  CellValue,
  ColumnInfo,
  FilterPredicate,
  QueryPlan,
  QueryResult,
  Row,
  Table,
} from '../ir/types.js';
import { normalizeCell } from '../normalize/normalizer.js';
import { cellToNumber } from '../utils/numbers.js';

export const DEFAULT_LIST_LIMIT = 20;

export interface ExecuteOptions {
  listLimit?: number;
}

function isPresent(cell: CellValue | undefined): boolean {
  return cell !== null && cell !== undefined && !(typeof cell === 'string' && cell.trim() === '');
}

function textOf(row: Row, column: string, info: ColumnInfo | undefined): string {
  if (info?.normalized) {
    const derived = row[info.normalized];
    return typeof derived === 'string' ? derived : normalizeCell(derived);
  }
  return normalizeCell(row[column]);
}

function equals(row: Row, predicate: FilterPredicate, info: ColumnInfo | undefined): boolean {
  if (typeof predicate.value === 'number') {
    const n = cellToNumber(row[predicate.column]);
    if (n !== undefined && n === predicate.value) return true;
  }
  return textOf(row, predicate.column, info) === predicate.literal;
}

function compare(row: Row, predicate: FilterPredicate): boolean {
  const n = cellToNumber(row[predicate.column]);
  if (n === undefined || typeof predicate.value !== 'number') return false;
  switch (predicate.operator) {
    case 'gt': return n > predicate.value;
    case 'lt': return n < predicate.value;
    case 'gte': return n >= predicate.value;
    case 'lte': return n <= predicate.value;
    default: return false;
  }
}

/** Unique values in first-seen order; 1 and "1" stay apart. */
function distinct(values: (CellValue | undefined)[]): CellValue[] {
  const seen = new Set<string>();
  const out: CellValue[] = [];
  for (const value of values) {
    if (value === undefined) continue;
    const key = `${typeof value}:${String(value)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

export function matchesPredicate(row: Row, predicate: FilterPredicate, info?: ColumnInfo): boolean {
  switch (predicate.operator) {
    case 'eq': return equals(row, predicate, info);
    case 'neq': return !equals(row, predicate, info);
    default: return compare(row, predicate);
  }
}

/** Rows matching every predicate, in original order. No predicates keeps the whole table. */
export function applyFilters(table: Table, filters: FilterPredicate[]): Row[] {
  if (filters.length === 0) return table.rows;
  const infos = new Map(table.columns.map((c) => [c.name, c]));
  return table.rows.filter((row) => filters.every((f) => matchesPredicate(row, f, infos.get(f.column))));
}

export function originalColumns(table: Table): string[] {
  return table.columns.map((c) => c.name);
}

export function executePlan(table: Table, plan: QueryPlan, opts: ExecuteOptions = {}): QueryResult {
  const limit = opts.listLimit ?? DEFAULT_LIST_LIMIT;
  const subset = applyFilters(table, plan.filters);
  const filters = plan.filters;
  const column = plan.targetColumn;

  switch (plan.intent) {
    case 'count':
      return { kind: 'count', count: subset.length, filters };

    case 'sum':
    case 'mean': {
      if (!column) {
        return { kind: 'clarification', missing: 'column', intent: plan.intent, availableColumns: originalColumns(table) };
      }
      const numbers: number[] = [];
      for (const row of subset) {
        const n = cellToNumber(row[column]);
        if (n !== undefined) numbers.push(n);
      }
      const sum = numbers.reduce((acc, n) => acc + n, 0);
      const value = numbers.length === 0 ? 0 : plan.intent === 'sum' ? sum : sum / numbers.length;
      return {
        kind: 'aggregate',
        op: plan.intent,
        column,
        value,
        numericCount: numbers.length,
        noNumericData: numbers.length === 0,
        filters,
      };
    }

    case 'list': {
      if (column) {
        const values = distinct(subset.map((row) => row[column]).filter(isPresent));
        return { kind: 'list', mode: 'values', column, values: values.slice(0, limit), total: values.length, limit, filters };
      }
      if (plan.intentSource === 'default' && filters.length === 0) {
        return { kind: 'clarification', missing: 'question', intent: plan.intent, availableColumns: originalColumns(table) };
      }
      const columns = originalColumns(table);
      const rows = subset.slice(0, limit).map((row) => {
        const projected: Row = {};
        for (const c of columns) projected[c] = row[c] ?? null;
        return projected;
      });
      return { kind: 'list', mode: 'rows', columns, rows, total: subset.length, limit, filters };
    }
  }
}
