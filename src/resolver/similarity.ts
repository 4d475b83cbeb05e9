/**
 * Dice coefficient over character bigrams.
 */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return 1.0;
  if (a.length < 2 || b.length < 2) return 0;

  const aBigrams = new Set<string>();
  for (let i = 0; i < a.length - 1; i++) {
    aBigrams.add(a.slice(i, i + 2));
  }

  let intersection = 0;
  for (let i = 0; i < b.length - 1; i++) {
    if (aBigrams.has(b.slice(i, i + 2))) {
      intersection++;
    }
  }

  return (2 * intersection) / (a.length - 1 + b.length - 1);
}

// Articles, prepositions and filter connectors carry no column meaning
export const STOPWORDS = new Set([
  'a', 'o', 'as', 'os', 'e', 'de', 'da', 'do', 'das', 'dos', 'um', 'uma',
  'no', 'na', 'nos', 'nas', 'em', 'ao', 'aos', 'pelo', 'pela', 'que',
  'onde', 'cujo', 'cuja', 'cujos', 'cujas', 'quando', 'com', 'para', 'qual',
]);

/** Splits normalized text into word tokens; underscores and hyphens split too. */
export function wordTokens(normalized: string): string[] {
  return normalized
    .split(/[\s_\-]+/)
    .map((t) => t.replace(/[^\p{L}\p{N}]/gu, ''))
    .filter((t) => t.length > 0);
}

export function contentTokens(normalized: string): string[] {
  return wordTokens(normalized).filter((t) => !STOPWORDS.has(t));
}

/** Column key used for exact comparisons: spaces and hyphens read as underscores. */
export function columnKey(normalized: string): string {
  return normalized.trim().replace(/[\s\-]+/g, '_');
}
