// src/costing-core/retrieval.ts
// Resolves the data a claim needs: catalog first, statistics-office fallback
// second, gap otherwise. Every resolved value is registered as a source
// before it is handed out as a fact.

import type { ClaimType, ConfidenceTier, FactRole } from '@shared/types';
import type { CatalogEntry, DatasetCatalog } from './catalog';
import type { Claim } from './claims';
import type { Fact } from './facts';
import { searchWithTimeout, type FallbackResolver } from './fallback';
import { FORMULA_REGISTRY } from './formulas';
import type { SourceRegistry } from './source-registry';
import { tokenize } from './text';
import { claimHaystack, isDebtRatio, isPensionValorization, isTaxChange } from './triggers';

// ── Requirements ─────────────────────────────────────────────────────────────

export type IndicatorRole = Exclude<FactRole, 'population' | 'base_amount'>;
export type RequirementRole = 'subject' | 'budget' | IndicatorRole;

export interface DataRequirement {
  role: RequirementRole;
  query: string;
  expectedUnits: readonly string[];
  /** Resolved by id instead of keyword lookup. */
  catalogId?: string;
}

export const CATALOG_SOURCE_PREFIX = 'csu_';
export const FALLBACK_SOURCE_PREFIX = 'csu_api_';

// Fixed catalog queries for indicators that do not depend on the claim target.
export const INDICATOR_QUERIES: Record<IndicatorRole, { query: string; unit: string }> = {
  gdp: { query: 'hruby domaci produkt hdp', unit: 'CZK' },
  inflation: { query: 'inflace', unit: 'ratio' },
  real_wage_growth: { query: 'rust realnych mezd', unit: 'ratio' },
  average_pension: { query: 'prumerny starobni duchod', unit: 'CZK/month' },
  pensioner_count: { query: 'pocet duchodcu', unit: 'persons' },
};

export const CLAIM_TYPE_INDICATORS: Record<ClaimType, readonly IndicatorRole[]> = {
  spending: [],
  percentage_change: [],
  generic: [],
  tax_change: ['gdp'],
  debt_ratio: ['gdp'],
  pension: ['inflation', 'real_wage_growth', 'average_pension', 'pensioner_count'],
};

// State budget chapter (catalog id) behind each extractor policy area.
export const POLICY_BUDGET_CHAPTERS: Partial<Record<string, string>> = {
  pensions: 'budget_pensions',
  healthcare: 'budget_healthcare',
  education: 'budget_education',
  culture: 'budget_culture',
  defense: 'budget_defense',
  infrastructure: 'budget_transport',
};

const SUBJECT_UNITS: Partial<Record<string, FactRole>> = {
  persons: 'population',
  CZK: 'base_amount',
};

function isIndicatorRole(role: FactRole): role is IndicatorRole {
  return role !== 'population' && role !== 'base_amount';
}

/**
 * Roles implied by the claim type, the budget chapter of the claim's policy
 * area, plus the fact roles of any keyword-driven formula the claim text
 * already triggers.
 */
export function planRequirements(claim: Claim): DataRequirement[] {
  const haystack = claimHaystack(claim);
  const indicators = new Set<IndicatorRole>(CLAIM_TYPE_INDICATORS[claim.claimType]);

  const triggered = [
    isPensionValorization(haystack) ? FORMULA_REGISTRY.pension_valorization : null,
    isTaxChange(haystack) ? FORMULA_REGISTRY.tax_rate_change : null,
    isDebtRatio(haystack) ? FORMULA_REGISTRY.debt_to_gdp : null,
  ];
  for (const formula of triggered) {
    if (!formula) continue;
    for (const role of formula.requiredInputs().facts) {
      if (isIndicatorRole(role)) indicators.add(role);
    }
  }

  const requirements: DataRequirement[] = [
    {
      role: 'subject',
      query: claim.target || claim.text,
      expectedUnits: Object.keys(SUBJECT_UNITS),
    },
  ];

  const policyArea = claim.policyArea?.toLowerCase();
  const chapter = policyArea ? POLICY_BUDGET_CHAPTERS[policyArea] : undefined;
  if (policyArea && chapter) {
    requirements.push({ role: 'budget', query: policyArea, expectedUnits: ['CZK'], catalogId: chapter });
  }

  for (const role of indicators) {
    const { query, unit } = INDICATOR_QUERIES[role];
    requirements.push({ role, query, expectedUnits: [unit] });
  }
  return requirements;
}

// ── Engine ───────────────────────────────────────────────────────────────────

export interface RetrievalDeps {
  catalog: DatasetCatalog;
  fallback: FallbackResolver;
  sources: SourceRegistry;
  fallbackTimeoutMs: number;
}

type Origin = 'catalog' | 'fallback';

const ORIGIN_CONFIDENCE: Record<Origin, ConfidenceTier> = {
  catalog: 'high',
  fallback: 'medium',
};

export function provenanceLabel(entry: CatalogEntry): string {
  return `${entry.sourceLabel}: ${entry.displayName} (${entry.year})`;
}

export class RetrievalEngine {
  constructor(private readonly deps: RetrievalDeps) {}

  async resolve(claim: Claim): Promise<Fact[]> {
    const facts: Fact[] = [];
    for (const requirement of planRequirements(claim)) {
      // The budget chapter only stands in when the subject gave no CZK base.
      if (requirement.role === 'budget' && facts.some((fact) => fact.role === 'base_amount')) {
        continue;
      }
      const fact = await this.resolveRequirement(claim, requirement);
      if (fact) facts.push(fact);
    }
    return facts;
  }

  async resolveRequirement(claim: Claim, requirement: DataRequirement): Promise<Fact | null> {
    const tokens = tokenize(requirement.query);

    const fromCatalog = requirement.catalogId
      ? this.deps.catalog.get(requirement.catalogId)
      : this.deps.catalog.lookup(tokens);
    if (fromCatalog && requirement.expectedUnits.includes(fromCatalog.unit)) {
      return this.toFact(requirement, fromCatalog, 'catalog');
    }

    const fromFallback = await searchWithTimeout(
      this.deps.fallback,
      tokens,
      claim.text,
      this.deps.fallbackTimeoutMs,
    );
    if (fromFallback && requirement.expectedUnits.includes(fromFallback.unit)) {
      return this.toFact(requirement, fromFallback, 'fallback');
    }

    return null;
  }

  private toFact(requirement: DataRequirement, entry: CatalogEntry, origin: Origin): Fact | null {
    const role =
      requirement.role === 'subject'
        ? SUBJECT_UNITS[entry.unit]
        : requirement.role === 'budget'
          ? 'base_amount'
          : requirement.role;
    if (!role) return null;

    const prefix = origin === 'catalog' ? CATALOG_SOURCE_PREFIX : FALLBACK_SOURCE_PREFIX;
    const sourceId = `${prefix}${entry.id}`;
    const label = provenanceLabel(entry);

    const registered = this.deps.sources.register(sourceId, label);
    if (!registered.ok) return null;

    return Object.freeze({
      sourceId,
      role,
      value: entry.value,
      unit: entry.unit,
      confidence: ORIGIN_CONFIDENCE[origin],
      provenanceLabel: label,
    });
  }
}
