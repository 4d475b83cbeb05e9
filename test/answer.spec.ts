import { describe, expect, it } from 'vitest';
import { describeFilter, renderAnswer } from '../src/explain/answer.js';
import { explainPlan } from '../src/explain/explainer.js';
import type { FilterPredicate } from '../src/ir/types.js';
import { plan } from './helpers.js';

const fiat: FilterPredicate = { column: 'marca_veiculo', operator: 'eq', value: 'fiat', literal: 'fiat', raw: 'marca_veiculo = fiat' };

describe('renderAnswer', () => {
  it('renders counts', () => {
    expect(renderAnswer({ kind: 'count', count: 3, filters: [] })).toBe('Total de registros: 3.');
    expect(renderAnswer({ kind: 'count', count: 2, filters: [fiat] })).toBe('Total de registros (marca_veiculo = fiat): 2.');
  });

  it('renders aggregates', () => {
    expect(
      renderAnswer({ kind: 'aggregate', op: 'sum', column: 'valor_nota', value: 400, numericCount: 2, noNumericData: false, filters: [fiat] })
    ).toBe('Soma de valor_nota (marca_veiculo = fiat): 400.');
    expect(
      renderAnswer({ kind: 'aggregate', op: 'mean', column: 'valor_nota', value: 2.5, numericCount: 2, noNumericData: false, filters: [] })
    ).toBe('Média de valor_nota: 2,5.');
    expect(
      renderAnswer({ kind: 'aggregate', op: 'sum', column: 'marca_veiculo', value: 0, numericCount: 0, noNumericData: true, filters: [] })
    ).toBe('Soma de marca_veiculo: 0 (nenhum valor numérico encontrado).');
  });

  it('renders value lists with the hidden remainder', () => {
    expect(
      renderAnswer({ kind: 'list', mode: 'values', column: 'placa', values: ['A', 'B'], total: 5, limit: 2, filters: [] })
    ).toBe('placa (5 registros): A, B e mais 3.');
    expect(
      renderAnswer({ kind: 'list', mode: 'values', column: 'placa', values: ['A'], total: 1, limit: 20, filters: [] })
    ).toBe('placa (1 registro): A.');
  });

  it('renders empty lists', () => {
    expect(
      renderAnswer({ kind: 'list', mode: 'values', column: 'placa', values: [], total: 0, limit: 20, filters: [fiat] })
    ).toBe('Nenhum registro encontrado.');
  });

  it('renders row lists one line per row', () => {
    const answer = renderAnswer({
      kind: 'list',
      mode: 'rows',
      columns: ['marca_veiculo', 'valor_nota'],
      rows: [
        { marca_veiculo: 'FIAT', valor_nota: 100 },
        { marca_veiculo: 'FIAT', valor_nota: null },
      ],
      total: 3,
      limit: 2,
      filters: [],
    });
    expect(answer.split('\n')).toEqual([
      '3 registros encontrados:',
      'marca_veiculo: FIAT | valor_nota: 100',
      'marca_veiculo: FIAT | valor_nota: -',
      '... e mais 1.',
    ]);
  });

  it('renders clarifications', () => {
    expect(
      renderAnswer({ kind: 'clarification', missing: 'column', intent: 'mean', availableColumns: ['marca_veiculo', 'valor_nota'] })
    ).toBe('Não consegui identificar a coluna para calcular a média. Colunas disponíveis: marca_veiculo, valor_nota.');
    expect(renderAnswer({ kind: 'clarification', missing: 'question', intent: 'list', availableColumns: ['a'] })).toBe(
      'Não entendi a pergunta. Posso contar registros, somar, calcular a média ou listar valores de uma coluna. Colunas disponíveis: a.'
    );
  });
});

describe('describeFilter', () => {
  it('formats numeric values in pt-BR', () => {
    expect(describeFilter({ column: 'valor_nota', operator: 'gt', value: 1234.5, literal: '1234.5', raw: '' })).toBe('valor_nota > 1.234,5');
  });
});

describe('explainPlan', () => {
  it('lists intent, target, filters and skipped clauses', () => {
    const text = explainPlan(plan({ intent: 'count', cue: 'quantos', filters: [fiat], skipped: ['xyz = 3'] }));
    expect(text.split('\n')).toEqual([
      'Interpretação da pergunta:',
      '- Intenção: count (palavra-chave "quantos")',
      '- Coluna alvo: não identificada',
      '- Filtros: marca_veiculo = fiat',
      '- Trechos ignorados: "xyz = 3"',
    ]);
  });

  it('mentions the default intent', () => {
    const text = explainPlan(plan({ intent: 'list', intentSource: 'default', targetColumn: 'placa' }));
    expect(text.split('\n')).toEqual([
      'Interpretação da pergunta:',
      '- Intenção: list (padrão, nenhuma palavra-chave reconhecida)',
      '- Coluna alvo: placa',
      '- Filtros: nenhum (todas as linhas)',
    ]);
  });
});
