import { FilterOperator, FilterPredicate } from '../ir/types.js';
import { normalizeText } from '../normalize/normalizer.js';
import { ColumnMatch, ColumnResolver } from '../resolver/column-resolver.js';
import { contentTokens, diceCoefficient } from '../resolver/similarity.js';
import { parseNumber } from '../utils/numbers.js';

const WORD = '[\\p{L}\\p{N}_]';

// Longest cues first so `>=` is not read as `>` and `maior ou igual a` not as `igual a`
const OPERATOR_CUES: ReadonlyArray<[string, FilterOperator]> = [
  ['>=', 'gte'],
  ['<=', 'lte'],
  ['!=', 'neq'],
  ['==', 'eq'],
  ['=', 'eq'],
  ['>', 'gt'],
  ['<', 'lt'],
  ['maior ou igual a', 'gte'],
  ['menor ou igual a', 'lte'],
  ['maior que', 'gt'],
  ['menor que', 'lt'],
  ['acima de', 'gt'],
  ['abaixo de', 'lt'],
  ['diferente de', 'neq'],
  ['igual a', 'eq'],
  ['igual', 'eq'],
];

const OPERATORS = new Map(OPERATOR_CUES);

const OPERATOR_RE = new RegExp(
  OPERATOR_CUES.map(([cue]) => (/^\p{L}/u.test(cue) ? `(?<!${WORD})${cue}(?!${WORD})` : cue)).join('|'),
  'gu'
);

const CONNECTOR_RE = new RegExp(
  `(?<!${WORD})(?:no qual|na qual|nos quais|nas quais|onde|em que|cujos|cujas|cujo|cuja|quando|com|para)(?!${WORD})`,
  'gu'
);

// A comma between digits is a decimal separator, not a clause break
const SEPARATOR_RE = new RegExp(`\\s*;\\s*|\\s*,(?!\\d)\\s*|\\s+(?:e|and)(?!${WORD})\\s*`, 'gu');

const ORDERING: ReadonlySet<FilterOperator> = new Set(['gt', 'lt', 'gte', 'lte']);

const MAX_PHRASE_TOKENS = 4;

export interface FilterClause {
  start: number;
  end: number;
  text: string;
  predicate?: FilterPredicate;
}

export interface FilterExtraction {
  filters: FilterPredicate[];
  clauses: FilterClause[];
  skipped: string[];
}

interface Boundary {
  start: number;
  end: number;
}

function lastBoundary(region: string): Boundary | undefined {
  let last: Boundary | undefined;
  for (const re of [SEPARATOR_RE, CONNECTOR_RE]) {
    for (const m of region.matchAll(re)) {
      const start = m.index ?? 0;
      if (start === 0) continue; // a value must come before the boundary
      if (!last || start > last.start) last = { start, end: start + m[0].length };
    }
  }
  return last;
}

function firstSeparator(region: string): number | undefined {
  for (const m of region.matchAll(SEPARATOR_RE)) {
    const start = m.index ?? 0;
    if (start > 0) return start;
  }
  return undefined;
}

function cleanValue(value: string): string {
  return value
    .trim()
    .replace(/[.,;!?:\s]+$/, '')
    .replace(/^["'“”‘’]+|["'“”‘’]+$/g, '')
    .trim();
}

/** True when the phrase's last word is part of the column it resolved to. */
function anchored(match: ColumnMatch, lastWord: string): boolean {
  return contentTokens(normalizeText(match.column)).some((t) => t === lastWord || diceCoefficient(t, lastWord) >= 0.6);
}

interface PhraseMatch {
  start: number;
  match?: ColumnMatch;
}

/**
 * Picks the column phrase that ends right before an operator: the tail of
 * `left` after its last connector, at most four words. Each suffix is tried
 * and the best anchored score wins; ties go to the shorter suffix.
 */
function resolveColumnPhrase(text: string, leftStart: number, leftEnd: number, resolver: ColumnResolver): PhraseMatch {
  const left = text.slice(leftStart, leftEnd);
  let segmentStart = 0;
  for (const m of left.matchAll(CONNECTOR_RE)) {
    segmentStart = (m.index ?? 0) + m[0].length;
  }

  const words = [...left.slice(segmentStart).matchAll(/\S+/g)].slice(-MAX_PHRASE_TOKENS);
  if (words.length === 0) return { start: leftEnd };

  const nearest = words[words.length - 1];
  let best: PhraseMatch = { start: leftStart + segmentStart + (nearest.index ?? 0) };
  for (let n = 1; n <= words.length; n++) {
    const suffix = words.slice(-n);
    const phrase = suffix.map((w) => w[0]).join(' ');
    const tail = contentTokens(normalizeText(phrase));
    const lastWord = tail[tail.length - 1];
    if (lastWord === undefined) continue;

    const match = resolver.resolve(phrase);
    if (!match || !anchored(match, lastWord)) continue;
    if (!best.match || match.score > best.match.score + 1e-9) {
      best = { start: leftStart + segmentStart + (suffix[0].index ?? 0), match };
    }
  }
  return best;
}

/**
 * Finds `<column> <operator> <value>` clauses in a question. Clauses whose
 * column does not resolve, or whose value is unusable, are reported in
 * `skipped` and never abort extraction.
 */
export function extractFilters(question: string, resolver: ColumnResolver): FilterExtraction {
  const text = normalizeText(question);
  const operators = [...text.matchAll(OPERATOR_RE)];

  const filters: FilterPredicate[] = [];
  const clauses: FilterClause[] = [];
  const skipped: string[] = [];

  let leftStart = 0;
  operators.forEach((op, i) => {
    const opStart = op.index ?? 0;
    const opEnd = opStart + op[0].length;
    const next = operators[i + 1];
    const regionEnd = next ? next.index ?? text.length : text.length;
    const region = text.slice(opEnd, regionEnd);

    let valueText: string;
    let nextLeftStart = regionEnd;
    if (next) {
      const boundary = lastBoundary(region);
      if (boundary) {
        valueText = region.slice(0, boundary.start);
        nextLeftStart = opEnd + boundary.end;
      } else {
        const first = region.match(/^\s*\S+/);
        valueText = first ? first[0] : '';
        nextLeftStart = opEnd + valueText.length;
      }
    } else {
      valueText = region.slice(0, firstSeparator(region) ?? region.length);
    }

    const phrase = resolveColumnPhrase(text, leftStart, opStart, resolver);
    leftStart = nextLeftStart;

    const end = opEnd + valueText.trimEnd().length;
    const raw = text.slice(phrase.start, end).trim();
    const clause: FilterClause = { start: phrase.start, end, text: raw };
    clauses.push(clause);

    const operator = OPERATORS.get(op[0]);
    const literal = cleanValue(valueText);
    if (!phrase.match || !operator || literal === '') {
      skipped.push(raw);
      return;
    }

    const numeric = parseNumber(literal);
    if (ORDERING.has(operator) && numeric === undefined) {
      skipped.push(raw);
      return;
    }

    clause.predicate = {
      column: phrase.match.column,
      operator,
      value: numeric ?? literal,
      literal,
      raw,
    };
    filters.push(clause.predicate);
  });

  return { filters, clauses, skipped };
}
