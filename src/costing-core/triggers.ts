// src/costing-core/triggers.ts
// Keyword predicates over normalised claim text. Shared by routing and by
// retrieval planning so both agree on which formula a claim is headed for.

import type { Claim } from './claims';
import { containsAnyTerm, containsTerm, normalizeText } from './text';

export const PENSION_INDEXATION_TERMS = ['valoriz', 'indexac', 'indexation'] as const;
export const PENSION_TERMS = ['duchod', 'penz', 'pension'] as const;
export const VAT_TERMS = ['dph', 'vat', 'dan z pridane hodnoty'] as const;
export const INCOME_TAX_TERMS = ['dan z prijmu', 'dane z prijmu', 'income tax'] as const;
export const DEBT_TERMS = ['dluh', 'zadluz', 'debt'] as const;
export const RATIO_TERMS = ['hdp', 'gdp', 'pomer', 'ratio'] as const;
export const PER_UNIT_TERMS = [
  'kazd',
  'na osobu',
  'na hlavu',
  'na obyvatele',
  'per capita',
  'per person',
  'each',
] as const;

export type TaxKind = 'vat' | 'income';

export function claimHaystack(claim: Claim): string {
  return normalizeText(`${claim.text} ${claim.target}`);
}

export function isPensionValorization(haystack: string): boolean {
  return containsAnyTerm(haystack, PENSION_INDEXATION_TERMS) && containsAnyTerm(haystack, PENSION_TERMS);
}

export function detectTaxKind(haystack: string): TaxKind | null {
  if (containsAnyTerm(haystack, VAT_TERMS)) return 'vat';
  if (containsAnyTerm(haystack, INCOME_TAX_TERMS)) return 'income';
  if (containsTerm(haystack, 'dan') && containsTerm(haystack, 'prijm')) return 'income';
  return null;
}

export function isTaxChange(haystack: string): boolean {
  return detectTaxKind(haystack) !== null;
}

export function isDebtRatio(haystack: string): boolean {
  return containsAnyTerm(haystack, DEBT_TERMS) && containsAnyTerm(haystack, RATIO_TERMS);
}

export function hasPerUnitQuantifier(haystack: string): boolean {
  return containsAnyTerm(haystack, PER_UNIT_TERMS);
}
