import { CellValue, FilterOperator, FilterPredicate, Intent, QueryResult } from '../ir/types.js';
import { formatNumber } from '../utils/numbers.js';

const SYMBOLS: Record<FilterOperator, string> = {
  eq: '=',
  neq: '!=',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
};

const ACTIONS: Record<Intent, string> = {
  count: 'contar',
  sum: 'calcular a soma',
  mean: 'calcular a média',
  list: 'listar',
};

export function describeFilter(filter: FilterPredicate): string {
  const value = typeof filter.value === 'number' ? formatNumber(filter.value) : filter.value;
  return `${filter.column} ${SYMBOLS[filter.operator]} ${value}`;
}

export function describeFilters(filters: FilterPredicate[]): string {
  return filters.map(describeFilter).join(' e ');
}

function filterSuffix(filters: FilterPredicate[]): string {
  return filters.length ? ` (${describeFilters(filters)})` : '';
}

function formatCell(cell: CellValue | undefined): string {
  if (cell === null || cell === undefined) return '-';
  return typeof cell === 'number' ? formatNumber(cell) : cell;
}

function records(total: number): string {
  return `${formatNumber(total)} ${total === 1 ? 'registro' : 'registros'}`;
}

/** Renders a query result as the single pt-BR sentence (or block) sent back to the user. */
export function renderAnswer(result: QueryResult): string {
  switch (result.kind) {
    case 'count':
      return `Total de registros${filterSuffix(result.filters)}: ${formatNumber(result.count)}.`;

    case 'aggregate': {
      const label = result.op === 'sum' ? 'Soma' : 'Média';
      const head = `${label} de ${result.column}${filterSuffix(result.filters)}`;
      return result.noNumericData
        ? `${head}: 0 (nenhum valor numérico encontrado).`
        : `${head}: ${formatNumber(result.value)}.`;
    }

    case 'list': {
      if (result.total === 0) return 'Nenhum registro encontrado.';
      const hidden = result.total - Math.min(result.total, result.limit);
      const more = hidden > 0 ? ` e mais ${formatNumber(hidden)}` : '';

      if (result.mode === 'values') {
        const shown = result.values.map(formatCell).join(', ');
        return `${result.column}${filterSuffix(result.filters)} (${records(result.total)}): ${shown}${more}.`;
      }

      const lines = result.rows.map((row) => result.columns.map((c) => `${c}: ${formatCell(row[c])}`).join(' | '));
      const found = result.total === 1 ? 'encontrado' : 'encontrados';
      const tail = hidden > 0 ? [`... e mais ${formatNumber(hidden)}.`] : [];
      return [`${records(result.total)} ${found}${filterSuffix(result.filters)}:`, ...lines, ...tail].join('\n');
    }

    case 'clarification': {
      const columns = `Colunas disponíveis: ${result.availableColumns.join(', ')}.`;
      if (result.missing === 'column') {
        return `Não consegui identificar a coluna para ${ACTIONS[result.intent]}. ${columns}`;
      }
      return `Não entendi a pergunta. Posso contar registros, somar, calcular a média ou listar valores de uma coluna. ${columns}`;
    }
  }
}
