// src/costing-core/pipeline.ts
// Claim -> retrieval -> calculation, per claim, for a whole proposal.
// A claim that fails never takes its siblings down with it.

import type { AnalysisReport } from '@shared/types';
import {
  calculate,
  toResultRecord,
  toUnsupportedRecord,
  unsupportedClaim,
  type CalculationOutcome,
} from './calculation-engine';
import { parseClaim, toClaimRecord, type Claim } from './claims';
import type { AnalysisContext } from './context';
import type { Fact } from './facts';
import { toSuggestionRecord } from './fallback';

// ── Types ────────────────────────────────────────────────────────────────────

export interface ClaimOutcome {
  claim: Claim;
  facts: readonly Fact[];
  outcome: CalculationOutcome;
}

export interface RejectedClaim {
  index: number;
  claimId: string | null;
  errors: string[];
}

export interface AnalysisBatch {
  outcomes: ClaimOutcome[];
  rejected: RejectedClaim[];
}

// ── Per-claim processing ─────────────────────────────────────────────────────

export async function processClaim(claim: Claim, context: AnalysisContext): Promise<ClaimOutcome> {
  let facts: Fact[] = [];
  let outcome: CalculationOutcome;

  try {
    facts = await context.retrieval.resolve(claim);
    outcome = calculate(claim, facts, context.clock);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[PIPELINE] Claim ${claim.id} failed:`, message);
    outcome = {
      ok: false,
      unsupported: unsupportedClaim(claim, 'error', { message }, context.clock),
    };
  }

  if (!outcome.ok) {
    context.unsupportedLog.append(outcome.unsupported);
  }
  return { claim, facts, outcome };
}

async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await fn(items[index]);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}

// ── Run ──────────────────────────────────────────────────────────────────────

export async function analyzeClaims(
  inputs: readonly unknown[],
  context: AnalysisContext,
): Promise<AnalysisBatch> {
  const claims: Claim[] = [];
  const rejected: RejectedClaim[] = [];

  inputs.forEach((input, index) => {
    const parsed = parseClaim(input);
    if (parsed.ok) {
      claims.push(parsed.claim);
    } else {
      rejected.push({ index, claimId: parsed.claimId, errors: parsed.errors });
    }
  });

  const outcomes = await mapWithConcurrency(claims, context.concurrency, (claim) =>
    processClaim(claim, context),
  );

  return { outcomes, rejected };
}

/**
 * Persists the run's unsupported-claim batch and builds the report. A sink
 * failure is logged and flagged on the report; the results still go out.
 */
export async function finishAnalysis(
  context: AnalysisContext,
  batch: AnalysisBatch,
): Promise<AnalysisReport> {
  let persisted = true;
  try {
    await context.unsupportedLog.persist();
  } catch (err) {
    persisted = false;
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[UNSUPPORTED] Failed to persist batch for run ${context.runId}:`, message);
  }

  return {
    run_id: context.runId,
    started_at: context.startedAt,
    outcomes: batch.outcomes.map(({ claim, outcome }) => ({
      claim: toClaimRecord(claim),
      result: outcome.ok ? toResultRecord(outcome.result) : null,
      unsupported: outcome.ok ? null : toUnsupportedRecord(outcome.unsupported),
    })),
    rejected: batch.rejected.map((rejection) => ({
      index: rejection.index,
      claim_id: rejection.claimId,
      errors: [...rejection.errors],
    })),
    sources: context.sources.toRecord(),
    suggestions: context.suggestions.map(toSuggestionRecord),
    unsupported_log_persisted: persisted,
  };
}

export async function runAnalysis(
  inputs: readonly unknown[],
  context: AnalysisContext,
): Promise<AnalysisReport> {
  const batch = await analyzeClaims(inputs, context);
  return finishAnalysis(context, batch);
}
