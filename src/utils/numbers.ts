import { CellValue } from '../ir/types.js';

const NUMERIC_SHAPE = /^[-+]?\d[\d.,]*$/;

/**
 * Parses numeric text written in pt-BR or en notation.
 * `1.234,56` and `1,234.56` both read as 1234.56; a lone comma is a decimal
 * separator (`1,5`), repeated dots are thousands separators (`1.234.567`).
 */
export function parseNumber(text: string): number | undefined {
  const s = text.trim().replace(/^r\$\s*/i, '').replace(/\s+/g, '');
  if (!NUMERIC_SHAPE.test(s)) return undefined;

  const lastDot = s.lastIndexOf('.');
  const lastComma = s.lastIndexOf(',');
  let canonical: string;

  if (lastDot !== -1 && lastComma !== -1) {
    canonical = lastComma > lastDot
      ? s.replace(/\./g, '').replace(',', '.')
      : s.replace(/,/g, '');
  } else if (lastComma !== -1) {
    const commas = s.split(',').length - 1;
    canonical = commas === 1 ? s.replace(',', '.') : s.replace(/,/g, '');
  } else if (lastDot !== -1 && s.split('.').length > 2) {
    canonical = s.replace(/\./g, '');
  } else {
    canonical = s;
  }

  const value = Number(canonical);
  return Number.isFinite(value) ? value : undefined;
}

export function cellToNumber(cell: CellValue | undefined): number | undefined {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : undefined;
  if (typeof cell === 'string') return parseNumber(cell);
  return undefined;
}

const formatter = new Intl.NumberFormat('pt-BR', { maximumFractionDigits: 2 });

export function formatNumber(value: number): string {
  return formatter.format(value);
}
