// src/costing-core/formulas.ts
// The six costing strategies. Each declares its inputs and confidence tier
// and computes deterministically from claim values and resolved facts.
// Constants that are not data (statutory rates, weights, base shares) are
// named and returned with the computation.

import type { ConfidenceTier, FactRole, FormulaName } from '@shared/types';
import type { Claim } from './claims';
import type { Fact, FactIndex } from './facts';
import { formatNumber } from './text';
import { claimHaystack, detectTaxKind, type TaxKind } from './triggers';

// ── Types ────────────────────────────────────────────────────────────────────

export type ClaimInput = 'value_amount' | 'value_percent';

export interface RequiredInputs {
  readonly claim: readonly ClaimInput[];
  readonly facts: readonly FactRole[];
}

export interface NamedCoefficient {
  readonly name: string;
  readonly value: number;
  readonly description: string;
}

export interface FormulaComputation {
  ok: true;
  /** Unrounded; the engine rounds to whole koruna. */
  amount: number;
  expression: string;
  inputsUsed: Fact[];
  coefficients: NamedCoefficient[];
  assumptions: string[];
}

export interface MissingInputs {
  ok: false;
  missing: string[];
}

export type FormulaOutcome = FormulaComputation | MissingInputs;

export interface Formula {
  readonly name: FormulaName;
  readonly confidence: ConfidenceTier;
  requiredInputs(): RequiredInputs;
  compute(claim: Claim, facts: FactIndex): FormulaOutcome;
}

// ── Named coefficients ───────────────────────────────────────────────────────

export const REAL_WAGE_GROWTH_WEIGHT: NamedCoefficient = {
  name: 'real_wage_growth_weight',
  value: 1 / 3,
  description: 'Statutory weight of real wage growth in pension valorization',
};

export const MONTHS_PER_YEAR: NamedCoefficient = {
  name: 'months_per_year',
  value: 12,
  description: 'Monthly pension payments per year',
};

interface TaxParameters {
  label: string;
  currentRate: NamedCoefficient;
  baseShareOfGdp: NamedCoefficient;
}

export const TAX_PARAMETERS: Record<TaxKind, TaxParameters> = {
  vat: {
    label: 'VAT',
    currentRate: {
      name: 'vat_standard_rate',
      value: 21,
      description: 'Current standard VAT rate in percent',
    },
    baseShareOfGdp: {
      name: 'vat_base_share_of_gdp',
      value: 0.5,
      description: 'Approximate VAT base (household consumption) as a share of GDP',
    },
  },
  income: {
    label: 'income tax',
    currentRate: {
      name: 'income_tax_rate',
      value: 15,
      description: 'Current basic personal income tax rate in percent',
    },
    baseShareOfGdp: {
      name: 'income_tax_base_share_of_gdp',
      value: 0.4,
      description: 'Approximate income tax base (wages) as a share of GDP',
    },
  },
};

// ── Helpers ──────────────────────────────────────────────────────────────────

function missingInputs(inputs: Record<string, unknown>): MissingInputs {
  return {
    ok: false,
    missing: Object.entries(inputs)
      .filter(([, value]) => value === undefined)
      .map(([name]) => name),
  };
}

function describe(fact: Fact): string {
  return `${formatNumber(fact.value)} (${fact.provenanceLabel})`;
}

// ── Generic formulas ─────────────────────────────────────────────────────────

export const simpleAddition: Formula = {
  name: 'simple_addition',
  confidence: 'high',
  requiredInputs: () => ({ claim: ['value_amount'], facts: [] }),
  compute(claim) {
    const amount = claim.valueAmount;
    if (amount === undefined) return missingInputs({ value_amount: amount });

    return {
      ok: true,
      amount,
      expression: `Direct cost: ${formatNumber(amount)} CZK`,
      inputsUsed: [],
      coefficients: [],
      assumptions: [],
    };
  },
};

export const perCapitaMultiplication: Formula = {
  name: 'per_capita_multiplication',
  confidence: 'high',
  requiredInputs: () => ({ claim: ['value_amount'], facts: ['population'] }),
  compute(claim, facts) {
    const amount = claim.valueAmount;
    const population = facts.get('population');
    if (amount === undefined || !population) {
      return missingInputs({ value_amount: amount, population });
    }

    return {
      ok: true,
      amount: amount * population.value,
      expression: `${describe(population)} × ${formatNumber(amount)} CZK`,
      inputsUsed: [population],
      coefficients: [],
      assumptions: [`Applies to every member of: ${population.provenanceLabel}`],
    };
  },
};

export const rateApplication: Formula = {
  name: 'rate_application',
  confidence: 'medium',
  requiredInputs: () => ({ claim: ['value_percent'], facts: ['base_amount'] }),
  compute(claim, facts) {
    const percent = claim.valuePercent;
    const base = facts.get('base_amount');
    if (percent === undefined || !base) {
      return missingInputs({ value_percent: percent, base_amount: base });
    }

    return {
      ok: true,
      amount: base.value * (percent / 100),
      expression: `${describe(base)} × ${formatNumber(percent)}%`,
      inputsUsed: [base],
      coefficients: [],
      assumptions: [`Rate applied to the whole of: ${base.provenanceLabel}`],
    };
  },
};

// ── Specific formulas ────────────────────────────────────────────────────────

export const pensionValorization: Formula = {
  name: 'pension_valorization',
  confidence: 'high',
  requiredInputs: () => ({
    claim: [],
    facts: ['inflation', 'real_wage_growth', 'average_pension', 'pensioner_count'],
  }),
  compute(_claim, facts) {
    const inflation = facts.get('inflation');
    const realWageGrowth = facts.get('real_wage_growth');
    const averagePension = facts.get('average_pension');
    const pensionerCount = facts.get('pensioner_count');
    if (!inflation || !realWageGrowth || !averagePension || !pensionerCount) {
      return missingInputs({
        inflation,
        real_wage_growth: realWageGrowth,
        average_pension: averagePension,
        pensioner_count: pensionerCount,
      });
    }

    const increase = inflation.value + realWageGrowth.value * REAL_WAGE_GROWTH_WEIGHT.value;
    const amount = increase * averagePension.value * pensionerCount.value * MONTHS_PER_YEAR.value;

    return {
      ok: true,
      amount,
      expression:
        `(${formatNumber(inflation.value)} inflation + 1/3 × ${formatNumber(realWageGrowth.value)} real wage growth)` +
        ` × ${formatNumber(averagePension.value)} CZK average pension` +
        ` × ${formatNumber(pensionerCount.value)} pensioners × 12 months`,
      inputsUsed: [inflation, realWageGrowth, averagePension, pensionerCount],
      coefficients: [REAL_WAGE_GROWTH_WEIGHT, MONTHS_PER_YEAR],
      assumptions: ['Statutory valorization formula'],
    };
  },
};

export const taxRateChange: Formula = {
  name: 'tax_rate_change',
  confidence: 'medium',
  requiredInputs: () => ({ claim: ['value_percent'], facts: ['gdp'] }),
  compute(claim, facts) {
    const newRate = claim.valuePercent;
    const gdp = facts.get('gdp');
    const taxKind = detectTaxKind(claimHaystack(claim)) ?? undefined;
    if (newRate === undefined || !gdp || !taxKind) {
      return missingInputs({ value_percent: newRate, gdp, tax_type: taxKind });
    }

    const { label, currentRate, baseShareOfGdp } = TAX_PARAMETERS[taxKind];
    const taxBase = gdp.value * baseShareOfGdp.value;
    const amount = (taxBase * (newRate - currentRate.value)) / 100;

    return {
      ok: true,
      amount,
      expression:
        `${formatNumber(baseShareOfGdp.value)} × ${describe(gdp)}` +
        ` × (${formatNumber(newRate)}% − ${formatNumber(currentRate.value)}%)`,
      inputsUsed: [gdp],
      coefficients: [currentRate, baseShareOfGdp],
      assumptions: [
        `${label} base estimated as ${formatNumber(baseShareOfGdp.value * 100)}% of GDP`,
        `Current ${label} rate: ${formatNumber(currentRate.value)}%`,
        'Positive amounts are additional revenue, negative amounts lost revenue',
      ],
    };
  },
};

export const debtToGdp: Formula = {
  name: 'debt_to_gdp',
  confidence: 'high',
  requiredInputs: () => ({ claim: ['value_percent'], facts: ['gdp'] }),
  compute(claim, facts) {
    const targetRatio = claim.valuePercent;
    const gdp = facts.get('gdp');
    if (targetRatio === undefined || !gdp) {
      return missingInputs({ value_percent: targetRatio, gdp });
    }

    return {
      ok: true,
      amount: gdp.value * (targetRatio / 100),
      expression: `${describe(gdp)} × ${formatNumber(targetRatio)}%`,
      inputsUsed: [gdp],
      coefficients: [],
      assumptions: ['Amount is the total debt implied by the target ratio, not an annual cost'],
    };
  },
};

// ── Registry ─────────────────────────────────────────────────────────────────

export const FORMULA_REGISTRY = {
  simple_addition: simpleAddition,
  per_capita_multiplication: perCapitaMultiplication,
  rate_application: rateApplication,
  pension_valorization: pensionValorization,
  tax_rate_change: taxRateChange,
  debt_to_gdp: debtToGdp,
} as const satisfies Record<FormulaName, Formula>;

export function getFormula(name: FormulaName): Formula {
  return FORMULA_REGISTRY[name];
}
