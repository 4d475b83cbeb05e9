import { Intent } from '../ir/types.js';
import { normalizeText } from '../normalize/normalizer.js';

export interface IntentMatch {
  intent: Intent;
  source: 'keyword' | 'default';
  cue?: string;
}

/**
 * Keyword families in precedence order; the first family with a cue in the
 * question wins. Cues are written in normalized (accent-free) form.
 */
export const INTENT_CUES: ReadonlyArray<{ intent: Intent; cues: string[] }> = [
  { intent: 'sum', cues: ['soma', 'somar', 'somatorio', 'totalizar', 'total'] },
  { intent: 'mean', cues: ['media', 'valor medio'] },
  { intent: 'count', cues: ['quantos', 'quantas', 'quantidade', 'contagem', 'contar', 'numero de'] },
  {
    intent: 'list',
    cues: [
      'listar', 'liste', 'lista', 'mostrar', 'mostre', 'mostra', 'exibir', 'exiba',
      'quais', 'retornar', 'retorne', 'trazer', 'traga', 'me de',
    ],
  },
];

/** "total" alone may mean a row count ("total de registros") rather than a sum. */
export const WEAK_SUM_CUE = 'total';

function hasCue(text: string, cue: string): boolean {
  return new RegExp(`(^|[^\\p{L}\\p{N}_])${cue}(?=$|[^\\p{L}\\p{N}_])`, 'u').test(text);
}

export function classifyIntent(question: string): IntentMatch {
  const text = normalizeText(question);
  for (const family of INTENT_CUES) {
    const cue = family.cues.find((c) => hasCue(text, c));
    if (cue) return { intent: family.intent, source: 'keyword', cue };
  }
  return { intent: 'list', source: 'default' };
}
