// src/costing-core/calculation-engine.ts
// Routes a claim and its resolved facts to one formula and executes it.
// Pure: (claim, facts) -> result. Unsupported outcomes carry a timestamp
// from the injected clock; results carry none.

import type {
  CalculationResultRecord,
  ConfidenceTier,
  FormulaName,
  UnsupportedClaimRecord,
  UnsupportedFailure,
} from '@shared/types';
import type { Claim } from './claims';
import { indexFacts, lowestTier, toFactRecord, type Fact, type FactIndex } from './facts';
import { FORMULA_REGISTRY, type Formula, type NamedCoefficient } from './formulas';
import {
  claimHaystack,
  hasPerUnitQuantifier,
  isDebtRatio,
  isPensionValorization,
  isTaxChange,
} from './triggers';

// ── Types ────────────────────────────────────────────────────────────────────

export interface CalculationResult {
  readonly claimId: string;
  readonly costCzk: number;
  readonly formulaName: FormulaName;
  readonly formulaExpression: string;
  readonly inputsUsed: readonly Fact[];
  readonly confidence: ConfidenceTier;
  readonly sourceIds: readonly string[];
  readonly coefficients: readonly NamedCoefficient[];
  readonly assumptions: readonly string[];
}

export interface UnsupportedClaim {
  readonly claimId: string;
  readonly text: string;
  readonly reason: string;
  readonly failure: UnsupportedFailure;
  readonly missing: readonly string[];
  readonly timestamp: string;
}

export type CalculationOutcome =
  | { ok: true; result: CalculationResult }
  | { ok: false; unsupported: UnsupportedClaim };

export type Clock = () => Date;

// ── Routing ──────────────────────────────────────────────────────────────────

export interface RoutingInput {
  claim: Claim;
  haystack: string;
  facts: FactIndex;
}

export interface RoutingRule {
  formula: FormulaName;
  stage: 'specific' | 'generic';
  matches(input: RoutingInput): boolean;
}

/** Evaluated top to bottom; the first match wins. */
export const ROUTING_RULES: readonly RoutingRule[] = [
  {
    formula: 'pension_valorization',
    stage: 'specific',
    matches: ({ haystack }) => isPensionValorization(haystack),
  },
  {
    formula: 'tax_rate_change',
    stage: 'specific',
    matches: ({ haystack }) => isTaxChange(haystack),
  },
  {
    formula: 'debt_to_gdp',
    stage: 'specific',
    matches: ({ haystack }) => isDebtRatio(haystack),
  },
  {
    formula: 'per_capita_multiplication',
    stage: 'generic',
    matches: ({ haystack, facts }) => facts.has('population') && hasPerUnitQuantifier(haystack),
  },
  {
    formula: 'rate_application',
    stage: 'generic',
    matches: ({ claim, facts }) => {
      const base = facts.get('base_amount');
      return claim.valuePercent !== undefined && base !== undefined && base.value > 0;
    },
  },
  {
    formula: 'simple_addition',
    stage: 'generic',
    matches: ({ claim }) => claim.valueAmount !== undefined,
  },
];

export function selectFormula(claim: Claim, facts: FactIndex): Formula | null {
  const input: RoutingInput = { claim, haystack: claimHaystack(claim), facts };
  const rule = ROUTING_RULES.find((candidate) => candidate.matches(input));
  return rule ? FORMULA_REGISTRY[rule.formula] : null;
}

// ── Execution ────────────────────────────────────────────────────────────────

export function unsupportedClaim(
  claim: Pick<Claim, 'id' | 'text'>,
  failure: UnsupportedFailure,
  detail: { missing?: readonly string[]; message?: string },
  clock: Clock,
): UnsupportedClaim {
  const missing = detail.missing ?? [];
  const reason =
    failure === 'no_formula'
      ? 'no formula'
      : failure === 'missing_data'
        ? `missing data: ${missing.join(', ')}`
        : `error: ${detail.message ?? 'unknown'}`;

  return Object.freeze({
    claimId: claim.id,
    text: claim.text,
    reason,
    failure,
    missing: Object.freeze([...missing]),
    timestamp: clock().toISOString(),
  });
}

function roundToKoruna(amount: number): number {
  const rounded = Math.round(amount);
  return rounded === 0 ? 0 : rounded;
}

export function calculate(
  claim: Claim,
  facts: readonly Fact[],
  clock: Clock = () => new Date(),
): CalculationOutcome {
  const index = indexFacts(facts);
  const formula = selectFormula(claim, index);

  if (!formula) {
    return { ok: false, unsupported: unsupportedClaim(claim, 'no_formula', {}, clock) };
  }

  const outcome = formula.compute(claim, index);
  if (!outcome.ok) {
    return {
      ok: false,
      unsupported: unsupportedClaim(claim, 'missing_data', { missing: outcome.missing }, clock),
    };
  }

  // Only facts the formula consumed are cited.
  const sourceIds = Array.from(new Set(outcome.inputsUsed.map((fact) => fact.sourceId)));
  const confidence = lowestTier([
    formula.confidence,
    ...outcome.inputsUsed.map((fact) => fact.confidence),
  ]);

  return {
    ok: true,
    result: Object.freeze({
      claimId: claim.id,
      costCzk: roundToKoruna(outcome.amount),
      formulaName: formula.name,
      formulaExpression: outcome.expression,
      inputsUsed: Object.freeze(outcome.inputsUsed),
      confidence,
      sourceIds: Object.freeze(sourceIds),
      coefficients: Object.freeze(outcome.coefficients),
      assumptions: Object.freeze(outcome.assumptions),
    }),
  };
}

// ── Wire records ─────────────────────────────────────────────────────────────

export function toResultRecord(result: CalculationResult): CalculationResultRecord {
  return {
    claim_id: result.claimId,
    cost_czk: result.costCzk,
    formula_name: result.formulaName,
    formula_expression: result.formulaExpression,
    inputs_used: result.inputsUsed.map(toFactRecord),
    confidence: result.confidence,
    source_ids: [...result.sourceIds],
    coefficients: result.coefficients.map((coefficient) => ({ ...coefficient })),
    assumptions: [...result.assumptions],
  };
}

export function toUnsupportedRecord(unsupported: UnsupportedClaim): UnsupportedClaimRecord {
  return {
    claim_id: unsupported.claimId,
    text: unsupported.text,
    reason: unsupported.reason,
    timestamp: unsupported.timestamp,
  };
}
