import { describe, it, expect } from 'vitest';
import {
  claimHaystack,
  detectTaxKind,
  hasPerUnitQuantifier,
  isDebtRatio,
  isPensionValorization,
} from '@core/triggers';

describe('claimHaystack', () => {
  it('joins normalised text and target', () => {
    expect(
      claimHaystack({ id: 'c', text: '5000 Kč pro každého', claimType: 'spending', target: 'hasiči' }),
    ).toBe('5000 kc pro kazdeho hasici');
  });
});

describe('isPensionValorization', () => {
  it('needs both an indexation and a pension term', () => {
    expect(isPensionValorization('valorizace duchodu')).toBe(true);
    expect(isPensionValorization('pension indexation')).toBe(true);
    expect(isPensionValorization('valorizace platu')).toBe(false);
    expect(isPensionValorization('vyssi duchody')).toBe(false);
  });
});

describe('detectTaxKind', () => {
  it('tells VAT from income tax', () => {
    expect(detectTaxKind('zvysime dph na 25')).toBe('vat');
    expect(detectTaxKind('snizime dan z prijmu')).toBe('income');
    expect(detectTaxKind('raise the income tax')).toBe('income');
  });

  it('ignores stems inside other words', () => {
    expect(detectTaxKind('privatizace nemocnic')).toBeNull();
  });
});

describe('isDebtRatio', () => {
  it('needs both a debt and a ratio term', () => {
    expect(isDebtRatio('snizime dluh na 30 hdp')).toBe(true);
    expect(isDebtRatio('splatime dluh')).toBe(false);
  });
});

describe('hasPerUnitQuantifier', () => {
  it('finds per-person wording', () => {
    expect(hasPerUnitQuantifier('5000 kc pro kazdeho hasice')).toBe(true);
    expect(hasPerUnitQuantifier('1000 kc na osobu')).toBe(true);
    expect(hasPerUnitQuantifier('5 miliard pro hasice')).toBe(false);
  });
});
