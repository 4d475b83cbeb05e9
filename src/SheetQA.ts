import { ColumnResolver, DEFAULT_MATCH_THRESHOLD } from './resolver/column-resolver.js';
import { planQuestion } from './parser/question.js';
import { executePlan, DEFAULT_LIST_LIMIT } from './executor/query-executor.js';
import { renderAnswer } from './explain/answer.js';
import { explainPlan } from './explain/explainer.js';
import type { QueryPlan, QueryResult, Table } from './ir/types.js';
import type { SynonymTable } from './resolver/synonyms.js';

export interface SheetQAOptions {
  threshold?: number; // minimum similarity for a fuzzy column match
  synonyms?: SynonymTable;
  listLimit?: number; // list items rendered before "e mais N"
}

export interface AskResult {
  answer: string;
  explanation: string;
  plan: QueryPlan;
  result: QueryResult;
}

export class SheetQA {
  private readonly resolvers = new WeakMap<Table, ColumnResolver>();

  constructor(private readonly opts: SheetQAOptions = {}) {}

  plan(table: Table, question: string): QueryPlan {
    return planQuestion(question, table, this.resolverFor(table));
  }

  ask(table: Table, question: string): AskResult {
    const plan = this.plan(table, question);
    const result = executePlan(table, plan, { listLimit: this.opts.listLimit ?? DEFAULT_LIST_LIMIT });
    return { answer: renderAnswer(result), explanation: explainPlan(plan), plan, result };
  }

  private resolverFor(table: Table): ColumnResolver {
    let resolver = this.resolvers.get(table);
    if (!resolver) {
      resolver = new ColumnResolver(table.columns, {
        threshold: this.opts.threshold ?? DEFAULT_MATCH_THRESHOLD,
        synonyms: this.opts.synonyms,
      });
      this.resolvers.set(table, resolver);
    }
    return resolver;
  }
}
