import type { FactRole } from '@shared/types';
import type { Claim } from '@core/claims';
import type { Fact } from '@core/facts';

export const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');
export const fixedClock = () => FIXED_NOW;

export function claim(fields: Partial<Claim> & Pick<Claim, 'text'>): Claim {
  return { id: 'claim-1', claimType: 'generic', target: '', ...fields };
}

export function fact(role: FactRole, value: number, overrides: Partial<Fact> = {}): Fact {
  return {
    sourceId: `csu_${role}`,
    role,
    value,
    unit: 'CZK',
    confidence: 'high',
    provenanceLabel: `Test: ${role} (2024)`,
    ...overrides,
  };
}

export function pensionFacts(): Fact[] {
  return [
    fact('inflation', 0.03, { unit: 'ratio' }),
    fact('real_wage_growth', 0.06, { unit: 'ratio' }),
    fact('average_pension', 20000, { unit: 'CZK/month' }),
    fact('pensioner_count', 2500000, { unit: 'persons' }),
  ];
}
