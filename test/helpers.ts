import * as xlsx from 'xlsx';
import { tableFromRecords } from '../src/file-processing/spreadsheet-processor.js';
import type { QueryPlan, Table } from '../src/ir/types.js';

export const VEHICLE_SHEET: unknown[][] = [
  ['marca_veiculo', 'valor_nota'],
  ['FIAT', 100],
  ['JEEP', 200],
  ['FIAT', 300],
];

export function vehicleTable(): Table {
  return tableFromRecords([
    { marca_veiculo: 'FIAT', valor_nota: 100 },
    { marca_veiculo: 'JEEP', valor_nota: 200 },
    { marca_veiculo: 'FIAT', valor_nota: 300 },
  ]);
}

/** Writes an in-memory .xlsx workbook, one sheet per entry. */
export function makeWorkbook(sheets: Record<string, unknown[][]>): Buffer {
  const workbook = xlsx.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    xlsx.utils.book_append_sheet(workbook, xlsx.utils.aoa_to_sheet(rows), name);
  }
  const out: Buffer = xlsx.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return out;
}

export function plan(partial: Partial<QueryPlan> & Pick<QueryPlan, 'intent'>): QueryPlan {
  return {
    question: '',
    intentSource: 'keyword',
    targetPhrase: '',
    filters: [],
    skipped: [],
    ...partial,
  };
}
