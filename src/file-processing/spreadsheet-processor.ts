import fs from 'fs-extra';
import * as path from 'path';
import * as xlsx from 'xlsx';
import { CellValue, Row, Table } from '../ir/types.js';
import { prepareNormalizedColumns } from '../normalize/normalizer.js';
import { introspectColumns } from '../schema/introspect.js';
import { errorMessage, FileTooLargeError, UploadFormatError } from '../utils/errors.js';
import { uploadLogger } from '../utils/logger.js';

export const DEFAULT_MAX_FILE_SIZE = 30 * 1024 * 1024;

const ZIP_SIGNATURE = 0x04034b50; // "PK\x03\x04", every .xlsx is a zip container

export interface LoadedSpreadsheet {
  originalName: string;
  sheetName: string;
  sheetNames: string[];
  table: Table;
  metadata: {
    size: number;
    rowCount: number;
    columnCount: number;
    processingTime: number;
  };
}

export interface ProcessOptions {
  sheet?: string;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  const text = String(value);
  return text.trim() === '' ? null : text;
}

/** Blank headers become `coluna_<n>`; repeats get the first `_<n>` suffix no other header uses. */
function headerNames(header: unknown[]): string[] {
  const bases = header.map((cell, i) => String(cell ?? '').trim() || `coluna_${i + 1}`);
  const written = new Set(bases);
  const used = new Set<string>();
  return bases.map((base) => {
    let name = base;
    for (let n = 2; used.has(name) || (name !== base && written.has(name)); n++) {
      name = `${base}_${n}`;
    }
    used.add(name);
    return name;
  });
}

/**
 * Builds a normalized table from a header row and data rows. Textual columns
 * get their `_norm` companions here, once.
 */
export function buildTable(header: unknown[], data: unknown[][]): Table {
  const names = headerNames(header);
  const rows: Row[] = data.map((cells) => {
    const row: Row = {};
    names.forEach((name, i) => {
      row[name] = toCellValue(cells[i]);
    });
    return row;
  });
  const columns = prepareNormalizedColumns(introspectColumns(names, rows), rows);
  return { columns, rows };
}

/** Table from plain records; the column order follows the first appearance of each key. */
export function tableFromRecords(records: Record<string, unknown>[]): Table {
  const header: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!header.includes(key)) header.push(key);
    }
  }
  return buildTable(header, records.map((r) => header.map((h) => r[h])));
}

export class SpreadsheetProcessor {
  constructor(private readonly maxFileSize: number = DEFAULT_MAX_FILE_SIZE) {}

  async processPath(filePath: string, opts: ProcessOptions = {}): Promise<LoadedSpreadsheet> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new UploadFormatError(`Não foi possível abrir ${filePath}: ${errorMessage(error)}`);
    }
    return this.process(buffer, path.basename(filePath), opts);
  }

  async process(buffer: Buffer, originalName: string, opts: ProcessOptions = {}): Promise<LoadedSpreadsheet> {
    const startTime = Date.now();
    uploadLogger.info(`Processing file: ${originalName} (${buffer.length} bytes)`);

    if (path.extname(originalName).toLowerCase() !== '.xlsx') {
      throw new UploadFormatError('Apenas arquivos .xlsx são suportados');
    }
    if (buffer.length > this.maxFileSize) {
      throw new FileTooLargeError(buffer.length, this.maxFileSize);
    }
    if (buffer.length < 4 || buffer.readUInt32LE(0) !== ZIP_SIGNATURE) {
      throw new UploadFormatError(`O arquivo ${originalName} não é uma planilha .xlsx válida`);
    }

    let workbook: xlsx.WorkBook;
    try {
      workbook = xlsx.read(buffer, { type: 'buffer', cellDates: true });
    } catch (error) {
      uploadLogger.error(`Error reading workbook ${originalName}:`, error);
      throw new UploadFormatError(`Não foi possível ler a planilha ${originalName}: ${errorMessage(error)}`);
    }

    const sheetName = opts.sheet ?? workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (sheetName === undefined || !sheet) {
      throw new UploadFormatError(
        opts.sheet
          ? `Aba "${opts.sheet}" não encontrada. Abas disponíveis: ${workbook.SheetNames.join(', ')}`
          : 'A planilha não contém abas'
      );
    }

    const matrix = xlsx.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true });
    const [header, ...data] = matrix;
    if (!header || data.length === 0) {
      throw new UploadFormatError(`A aba "${sheetName}" está vazia`);
    }

    const table = buildTable(header, data);
    const processingTime = Date.now() - startTime;
    uploadLogger.info(`File processed successfully: ${originalName} in ${processingTime}ms`, {
      sheet: sheetName,
      rows: table.rows.length,
      columns: table.columns.length,
    });

    return {
      originalName,
      sheetName,
      sheetNames: workbook.SheetNames,
      table,
      metadata: {
        size: buffer.length,
        rowCount: table.rows.length,
        columnCount: table.columns.length,
        processingTime,
      },
    };
  }
}
