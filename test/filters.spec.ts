import { describe, expect, it } from 'vitest';
import { extractFilters } from '../src/parser/filters.js';
import { ColumnResolver } from '../src/resolver/column-resolver.js';
import { tableFromRecords } from '../src/file-processing/spreadsheet-processor.js';

const table = tableFromRecords([
  { marca_veiculo: 'FIAT', cor_veiculo: 'Azul', valor_nota: 100 },
  { marca_veiculo: 'JEEP', cor_veiculo: 'Preto', valor_nota: 200 },
  { marca_veiculo: 'FIAT', cor_veiculo: 'Prata', valor_nota: 300 },
]);
const resolver = new ColumnResolver(table.columns);

describe('extractFilters', () => {
  it('reads a symbolic equality after a connector', () => {
    const { filters, skipped } = extractFilters('Soma de valor_nota onde marca_veiculo = FIAT', resolver);
    expect(filters).toEqual([
      { column: 'marca_veiculo', operator: 'eq', value: 'fiat', literal: 'fiat', raw: 'marca_veiculo = fiat' },
    ]);
    expect(skipped).toEqual([]);
  });

  it('splits conjunctions into separate predicates', () => {
    const { filters } = extractFilters('Liste cor_veiculo onde valor_nota > 150 e marca_veiculo = fiat', resolver);
    expect(filters.map((f) => [f.column, f.operator, f.value])).toEqual([
      ['valor_nota', 'gt', 150],
      ['marca_veiculo', 'eq', 'fiat'],
    ]);
    expect(filters[0].raw).toBe('valor_nota > 150');
  });

  it('understands worded operators', () => {
    expect(extractFilters('Quantos registros com valor_nota maior que 150?', resolver).filters[0]).toMatchObject({
      column: 'valor_nota',
      operator: 'gt',
      value: 150,
    });
    expect(extractFilters('valor_nota maior ou igual a 200', resolver).filters[0]).toMatchObject({ operator: 'gte', value: 200 });
    expect(extractFilters('marca_veiculo diferente de jeep', resolver).filters[0]).toMatchObject({ operator: 'neq', value: 'jeep' });
  });

  it('ends the last value at a clause separator', () => {
    expect(extractFilters('Quantos registros onde marca_veiculo = FIAT, por favor?', resolver).filters).toEqual([
      { column: 'marca_veiculo', operator: 'eq', value: 'fiat', literal: 'fiat', raw: 'marca_veiculo = fiat' },
    ]);
    expect(extractFilters('Liste marca_veiculo onde valor_nota > 150 e ordene por placa', resolver).filters).toEqual([
      { column: 'valor_nota', operator: 'gt', value: 150, literal: '150', raw: 'valor_nota > 150' },
    ]);
  });

  it('parses pt-BR decimals in values', () => {
    expect(extractFilters('valor_nota < 1.234,56', resolver).filters[0]).toMatchObject({ operator: 'lt', value: 1234.56 });
  });

  it('strips quotes around values', () => {
    expect(extractFilters('cor_veiculo = "Azul"', resolver).filters[0]).toMatchObject({ value: 'azul', literal: 'azul' });
  });

  it('resolves multi-word column phrases', () => {
    const { filters } = extractFilters('Liste valor_nota onde cor do veículo = prata', resolver);
    expect(filters).toEqual([
      { column: 'cor_veiculo', operator: 'eq', value: 'prata', literal: 'prata', raw: 'cor do veiculo = prata' },
    ]);
  });

  it('skips clauses whose column does not resolve', () => {
    const { filters, skipped } = extractFilters('Quantos registros onde xyz = 3', resolver);
    expect(filters).toEqual([]);
    expect(skipped).toEqual(['xyz = 3']);
  });

  it('skips ordering comparisons against text', () => {
    const { filters, skipped } = extractFilters('valor_nota > muito', resolver);
    expect(filters).toEqual([]);
    expect(skipped).toEqual(['valor_nota > muito']);
  });

  it('finds nothing in a question without operators', () => {
    expect(extractFilters('Quantos registros existem no arquivo?', resolver)).toEqual({ filters: [], clauses: [], skipped: [] });
  });
});
