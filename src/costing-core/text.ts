// src/costing-core/text.ts
// Diacritics-insensitive normalisation shared by catalog lookup and routing.

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_WORD = /[^a-z0-9]+/g;

export function normalizeText(text: string): string {
  return text
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(NON_WORD, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(' ') : [];
}

/**
 * True when `term` starts a word in the normalised text. Short stems such as
 * "vat" or "dph" would otherwise fire inside unrelated Czech words.
 */
export function containsTerm(normalized: string, term: string): boolean {
  return ` ${normalized}`.includes(` ${term}`);
}

export function containsAnyTerm(normalized: string, terms: readonly string[]): boolean {
  return terms.some((term) => containsTerm(normalized, term));
}

const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 4 });

export function formatNumber(value: number): string {
  return amountFormat.format(value);
}
