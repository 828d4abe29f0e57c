// src/costing-core/claims.ts
// Claim boundary: validates extraction output and folds the legacy shape
// into the current one before anything else touches it.

import { z } from 'zod';
import { CLAIM_TYPES, LEGACY_CLAIM_TYPES, LEGACY_CLAIM_TYPE_MAP } from '@shared/constants';
import type { ClaimRecord, ClaimType, LegacyClaimType } from '@shared/types';

// ── Types ────────────────────────────────────────────────────────────────────

export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly claimType: ClaimType;
  readonly target: string;
  readonly valueAmount?: number;
  readonly valuePercent?: number;
  /** Budget area named by the extractor, e.g. "defense". */
  readonly policyArea?: string;
}

export type ClaimParseResult =
  | { ok: true; claim: Claim; legacy: boolean }
  | { ok: false; claimId: string | null; errors: string[] };

// ── Schemas ──────────────────────────────────────────────────────────────────

const amountSchema = z.number().finite().nonnegative().nullish();
const percentSchema = z.number().finite().min(0).max(100).nullish();

export const claimRecordSchema = z.object({
  id: z.string().trim().min(1),
  text: z.string().trim().min(1),
  claim_type: z.enum(CLAIM_TYPES),
  target: z.string().default(''),
  value_amount: amountSchema,
  value_percent: percentSchema,
  policy_area: z.string().trim().nullish(),
});

export const legacyClaimRecordSchema = z.object({
  id: z.string().trim().min(1),
  text: z.string().trim().min(1),
  claim_type: z.union([z.enum(CLAIM_TYPES), z.enum(LEGACY_CLAIM_TYPES)]),
  target_entity: z.string().default(''),
  value_czk: amountSchema,
  value_percent: percentSchema,
  policy_area: z.string().trim().nullish(),
  confidence: z.number().min(0).max(1).optional(),
});

// ── Helpers ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isLegacyShape(input: unknown): boolean {
  if (!isRecord(input) || 'target' in input) return false;
  return 'target_entity' in input || 'value_czk' in input;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function isLegacyClaimType(value: string): value is LegacyClaimType {
  return (LEGACY_CLAIM_TYPES as readonly string[]).includes(value);
}

function toClaimType(value: ClaimType | LegacyClaimType): ClaimType {
  return isLegacyClaimType(value) ? LEGACY_CLAIM_TYPE_MAP[value] : value;
}

function buildClaim(fields: {
  id: string;
  text: string;
  claimType: ClaimType;
  target: string;
  valueAmount: number | null | undefined;
  valuePercent: number | null | undefined;
  policyArea: string | null | undefined;
}): Claim {
  const claim: Claim = {
    id: fields.id,
    text: fields.text,
    claimType: fields.claimType,
    target: fields.target.trim(),
    ...(fields.valueAmount != null ? { valueAmount: fields.valueAmount } : {}),
    ...(fields.valuePercent != null ? { valuePercent: fields.valuePercent } : {}),
    ...(fields.policyArea ? { policyArea: fields.policyArea } : {}),
  };
  return Object.freeze(claim);
}

// ── Boundary ─────────────────────────────────────────────────────────────────

export function parseClaim(input: unknown): ClaimParseResult {
  const claimId = isRecord(input) && typeof input.id === 'string' ? input.id : null;

  if (isLegacyShape(input)) {
    const parsed = legacyClaimRecordSchema.safeParse(input);
    if (!parsed.success) {
      return { ok: false, claimId, errors: formatIssues(parsed.error) };
    }
    const record = parsed.data;
    return {
      ok: true,
      legacy: true,
      claim: buildClaim({
        id: record.id,
        text: record.text,
        claimType: toClaimType(record.claim_type),
        target: record.target_entity,
        valueAmount: record.value_czk,
        valuePercent: record.value_percent,
        policyArea: record.policy_area,
      }),
    };
  }

  const parsed = claimRecordSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, claimId, errors: formatIssues(parsed.error) };
  }
  const record = parsed.data;
  return {
    ok: true,
    legacy: false,
    claim: buildClaim({
      id: record.id,
      text: record.text,
      claimType: record.claim_type,
      target: record.target,
      valueAmount: record.value_amount,
      valuePercent: record.value_percent,
      policyArea: record.policy_area,
    }),
  };
}

export function toClaimRecord(claim: Claim): ClaimRecord {
  return {
    id: claim.id,
    text: claim.text,
    claim_type: claim.claimType,
    target: claim.target,
    value_amount: claim.valueAmount ?? null,
    value_percent: claim.valuePercent ?? null,
    policy_area: claim.policyArea ?? null,
  };
}
