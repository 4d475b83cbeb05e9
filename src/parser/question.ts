import { Intent, QueryPlan, Table } from '../ir/types.js';
import { normalizeText } from '../normalize/normalizer.js';
import { ColumnMatch, ColumnResolver } from '../resolver/column-resolver.js';
import { extractFilters, FilterClause } from './filters.js';
import { classifyIntent, WEAK_SUM_CUE } from './intent.js';

function cutClauses(text: string, clauses: FilterClause[]): string {
  let out = '';
  let cursor = 0;
  for (const clause of clauses) {
    out += text.slice(cursor, clause.start) + ' ';
    cursor = Math.max(cursor, clause.end);
  }
  out += text.slice(cursor);
  return out.replace(/\s+/g, ' ').trim();
}

function resolveTarget(intent: Intent, phrase: string, resolver: ColumnResolver): ColumnMatch | undefined {
  if (intent === 'sum' || intent === 'mean') {
    return resolver.resolve(phrase, { numericOnly: true }) ?? resolver.resolve(phrase);
  }
  return resolver.resolve(phrase);
}

/**
 * Turns a question into an (intent, target column, filters) plan. Filters are
 * read first; the intent and the target column come from what is left once
 * the filter clauses are cut out.
 */
export function planQuestion(question: string, table: Table, resolver: ColumnResolver): QueryPlan {
  const extraction = extractFilters(question, resolver);
  const targetPhrase = cutClauses(normalizeText(question), extraction.clauses);
  // filter values may contain cue words ("tipo = soma")
  const classified = classifyIntent(targetPhrase);

  let intent = classified.intent;
  let target = resolveTarget(intent, targetPhrase, resolver);

  // "total de registros" asks for a count, not a sum
  if (intent === 'sum' && classified.cue === WEAK_SUM_CUE) {
    const kind = target ? table.columns.find((c) => c.name === target?.column)?.kind : undefined;
    if (kind !== 'numeric') {
      intent = 'count';
      target = resolveTarget(intent, targetPhrase, resolver);
    }
  }

  return {
    question,
    intent,
    intentSource: classified.source,
    cue: classified.cue,
    targetColumn: target?.column,
    targetPhrase,
    filters: extraction.filters,
    skipped: extraction.skipped,
  };
}
