import { describe, expect, it } from 'vitest';
import { buildTable, SpreadsheetProcessor } from '../src/file-processing/spreadsheet-processor.js';
import { allColumnNames } from '../src/normalize/normalizer.js';
import { FileTooLargeError, UploadFormatError } from '../src/utils/errors.js';
import { makeWorkbook, VEHICLE_SHEET } from './helpers.js';

describe('SpreadsheetProcessor', () => {
  const processor = new SpreadsheetProcessor();

  it('loads the first sheet into a normalized table', async () => {
    const loaded = await processor.process(makeWorkbook({ Planilha1: VEHICLE_SHEET }), 'dados.xlsx');

    expect(loaded.sheetName).toBe('Planilha1');
    expect(loaded.metadata.rowCount).toBe(3);
    expect(loaded.metadata.columnCount).toBe(2);
    expect(allColumnNames(loaded.table.columns)).toEqual(['marca_veiculo', 'valor_nota', 'marca_veiculo_norm']);
    expect(loaded.table.rows[0]).toEqual({ marca_veiculo: 'FIAT', valor_nota: 100, marca_veiculo_norm: 'fiat' });
  });

  it('accepts the extension in any case', async () => {
    const loaded = await processor.process(makeWorkbook({ Planilha1: VEHICLE_SHEET }), 'DADOS.XLSX');
    expect(loaded.originalName).toBe('DADOS.XLSX');
  });

  it('selects a sheet by name', async () => {
    const buffer = makeWorkbook({ Resumo: [['x'], [1]], Vendas: VEHICLE_SHEET });
    const loaded = await processor.process(buffer, 'dados.xlsx', { sheet: 'Vendas' });
    expect(loaded.sheetName).toBe('Vendas');
    expect(loaded.sheetNames).toEqual(['Resumo', 'Vendas']);
    expect(loaded.metadata.rowCount).toBe(3);

    await expect(processor.process(buffer, 'dados.xlsx', { sheet: 'Nada' })).rejects.toThrow(
      'Aba "Nada" não encontrada. Abas disponíveis: Resumo, Vendas'
    );
  });

  it('names blank and repeated headers', async () => {
    const buffer = makeWorkbook({ Planilha1: [['nome', null, 'nome'], ['a', 'b', 'c']] });
    const loaded = await processor.process(buffer, 'dados.xlsx');
    expect(loaded.table.columns.map((c) => c.name)).toEqual(['nome', 'coluna_2', 'nome_2']);
  });

  it('keeps repeated headers apart from existing suffixed ones', () => {
    const table = buildTable(['a', 'a', 'a_2'], [[1, 2, 3]]);
    expect(table.columns.map((c) => c.name)).toEqual(['a', 'a_3', 'a_2']);
    expect(table.rows[0]).toEqual({ a: 1, a_3: 2, a_2: 3 });
  });

  it('rejects other extensions', async () => {
    await expect(processor.process(makeWorkbook({ Planilha1: VEHICLE_SHEET }), 'dados.csv')).rejects.toThrow(
      'Apenas arquivos .xlsx são suportados'
    );
  });

  it('rejects files that are not workbooks', async () => {
    await expect(processor.process(Buffer.from('not a spreadsheet'), 'dados.xlsx')).rejects.toBeInstanceOf(UploadFormatError);
  });

  it('rejects a sheet with a header and no rows', async () => {
    const buffer = makeWorkbook({ Planilha1: [['marca_veiculo', 'valor_nota']] });
    await expect(processor.process(buffer, 'dados.xlsx')).rejects.toThrow('A aba "Planilha1" está vazia');
  });

  it('enforces the size limit', async () => {
    const small = new SpreadsheetProcessor(10);
    await expect(small.process(makeWorkbook({ Planilha1: VEHICLE_SHEET }), 'dados.xlsx')).rejects.toBeInstanceOf(FileTooLargeError);
  });

  it('reports unreadable paths as upload errors', async () => {
    await expect(processor.processPath('/nonexistent/dados.xlsx')).rejects.toThrow(/^Não foi possível abrir/);
  });
});
