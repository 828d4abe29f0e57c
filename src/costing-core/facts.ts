// src/costing-core/facts.ts

import type { ConfidenceTier, FactRecord, FactRole } from '@shared/types';

export interface Fact {
  readonly sourceId: string;
  readonly role: FactRole;
  readonly value: number;
  readonly unit: string;
  readonly confidence: ConfidenceTier;
  readonly provenanceLabel: string;
}

export type FactIndex = ReadonlyMap<FactRole, Fact>;

/** First fact per role wins; resolution order is preserved. */
export function indexFacts(facts: readonly Fact[]): FactIndex {
  const index = new Map<FactRole, Fact>();
  for (const fact of facts) {
    if (!index.has(fact.role)) index.set(fact.role, fact);
  }
  return index;
}

const TIER_RANK: Record<ConfidenceTier, number> = { high: 2, medium: 1, low: 0 };

export function lowestTier(tiers: readonly ConfidenceTier[]): ConfidenceTier {
  return tiers.reduce<ConfidenceTier>(
    (lowest, tier) => (TIER_RANK[tier] < TIER_RANK[lowest] ? tier : lowest),
    'high',
  );
}

export function toFactRecord(fact: Fact): FactRecord {
  return {
    source_id: fact.sourceId,
    role: fact.role,
    value: fact.value,
    unit: fact.unit,
    confidence: fact.confidence,
    provenance_label: fact.provenanceLabel,
  };
}
