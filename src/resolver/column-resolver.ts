import { ColumnInfo } from '../ir/types.js';
import { normalizeText } from '../normalize/normalizer.js';
import { columnKey, contentTokens, diceCoefficient, STOPWORDS } from './similarity.js';
import { DEFAULT_SYNONYMS, SynonymTable } from './synonyms.js';

export const DEFAULT_MATCH_THRESHOLD = 0.6;

export interface ColumnMatch {
  column: string;
  score: number;
  via: 'exact' | 'synonym' | 'fuzzy';
}

export interface ResolveOptions {
  numericOnly?: boolean;
}

export interface ColumnResolverOptions {
  threshold?: number;
  synonyms?: SynonymTable;
}

function escapeRegExp(input: string) {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Maps a phrase taken from a question to one of the table's columns.
 * Exact names win, then the first registered synonym, then the best fuzzy
 * score above the threshold.
 */
export class ColumnResolver {
  readonly threshold: number;
  private readonly synonyms: { pattern: RegExp; target: string }[];

  constructor(private readonly columns: ColumnInfo[], opts: ColumnResolverOptions = {}) {
    this.threshold = opts.threshold ?? DEFAULT_MATCH_THRESHOLD;
    this.synonyms = Object.entries(opts.synonyms ?? DEFAULT_SYNONYMS).map(([phrase, target]) => ({
      pattern: new RegExp(`(^|\\s)${escapeRegExp(normalizeText(phrase))}(?=\\s|$)`),
      target: columnKey(normalizeText(target)),
    }));
  }

  resolve(phrase: string, opts: ResolveOptions = {}): ColumnMatch | undefined {
    const normalized = normalizeText(phrase).replace(/[?!.,;:]+$/, '').trim();
    if (!normalized) return undefined;

    const candidates = opts.numericOnly ? this.columns.filter((c) => c.kind === 'numeric') : this.columns;

    const exact = this.exactMatch(columnKey(normalized), candidates, !opts.numericOnly);
    if (exact) return { column: exact, score: 1, via: 'exact' };

    const mentioned = this.mentionedColumn(normalized, candidates, !opts.numericOnly);
    if (mentioned) return { column: mentioned, score: 1, via: 'exact' };

    for (const synonym of this.synonyms) {
      if (!synonym.pattern.test(normalized)) continue;
      const target = this.exactMatch(synonym.target, candidates, false);
      if (target) return { column: target, score: 1, via: 'synonym' };
    }

    const words = contentTokens(normalized);
    if (words.length === 0) return undefined;

    let best: ColumnMatch | undefined;
    let bestLength = 0;
    for (const column of candidates) {
      const key = normalizeText(column.name);
      const score = this.score(key, words);
      if (score < this.threshold) continue;
      const better = !best
        || score > best.score + 1e-9
        || (Math.abs(score - best.score) <= 1e-9 && key.length > bestLength);
      if (better) {
        best = { column: column.name, score, via: 'fuzzy' };
        bestLength = key.length;
      }
    }
    return best;
  }

  private exactMatch(key: string, candidates: ColumnInfo[], includeDerived: boolean): string | undefined {
    for (const column of candidates) {
      if (columnKey(normalizeText(column.name)) === key) return column.name;
    }
    if (includeDerived) {
      for (const column of candidates) {
        if (column.normalized && columnKey(normalizeText(column.normalized)) === key) return column.normalized;
      }
    }
    return undefined;
  }

  /** Longest column name written out as whole words inside the phrase. */
  private mentionedColumn(normalized: string, candidates: ColumnInfo[], includeDerived: boolean): string | undefined {
    const names = candidates.flatMap((c) => (includeDerived && c.normalized ? [c.name, c.normalized] : [c.name]));
    let best: string | undefined;
    let bestLength = 0;
    for (const name of names) {
      const key = columnKey(normalizeText(name));
      if (!key || STOPWORDS.has(key) || key.length <= bestLength) continue;
      const words = key.split('_').filter((w) => w.length > 0).map(escapeRegExp);
      if (words.length === 0) continue;
      const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${words.join('[\\s_\\-]+')}(?![\\p{L}\\p{N}_])`, 'u');
      if (pattern.test(normalized)) {
        best = name;
        bestLength = key.length;
      }
    }
    return best;
  }

  private score(columnName: string, words: string[]): number {
    const columnTokens = contentTokens(columnName);
    if (columnTokens.length === 0) return 0;

    const target = columnTokens.join('_');
    const width = Math.min(columnTokens.length, words.length);
    let windowScore = 0;
    for (let i = 0; i + width <= words.length; i++) {
      windowScore = Math.max(windowScore, diceCoefficient(target, words.slice(i, i + width).join('_')));
    }

    const present = new Set(words);
    const covered = columnTokens.filter((t) => present.has(t)).length;
    return Math.max(windowScore, 0.9 * (covered / columnTokens.length));
  }
}
