export type Intent = 'count' | 'sum' | 'mean' | 'list';

export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export type ColumnKind = 'numeric' | 'text' | 'empty';

export interface ColumnInfo {
  name: string;
  kind: ColumnKind;
  normalized?: string; // name of the derived *_norm column, textual columns only
}

export interface Table {
  columns: ColumnInfo[];
  rows: Row[];
}

export type FilterOperator = 'eq' | 'neq' | 'gt' | 'lt' | 'gte' | 'lte';

export interface FilterPredicate {
  column: string;
  operator: FilterOperator;
  value: string | number;
  literal: string; // normalized literal as typed, used for text comparison
  raw: string; // clause text as it appeared in the normalized question
}

export interface QueryPlan {
  question: string;
  intent: Intent;
  intentSource: 'keyword' | 'default';
  cue?: string;
  targetColumn?: string;
  targetPhrase: string;
  filters: FilterPredicate[];
  skipped: string[];
}

export interface CountResult {
  kind: 'count';
  count: number;
  filters: FilterPredicate[];
}

export interface AggregateResult {
  kind: 'aggregate';
  op: 'sum' | 'mean';
  column: string;
  value: number;
  numericCount: number;
  noNumericData: boolean;
  filters: FilterPredicate[];
}

export interface ValueListResult {
  kind: 'list';
  mode: 'values';
  column: string;
  values: CellValue[];
  total: number;
  limit: number;
  filters: FilterPredicate[];
}

export interface RowListResult {
  kind: 'list';
  mode: 'rows';
  columns: string[];
  rows: Row[];
  total: number;
  limit: number;
  filters: FilterPredicate[];
}

export interface ClarificationResult {
  kind: 'clarification';
  missing: 'column' | 'question';
  intent: Intent;
  availableColumns: string[];
}

export type QueryResult = CountResult | AggregateResult | ValueListResult | RowListResult | ClarificationResult;
