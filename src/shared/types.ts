import type {
  CLAIM_TYPES,
  CONFIDENCE_TIERS,
  FACT_ROLES,
  FORMULA_NAMES,
  LEGACY_CLAIM_TYPES,
  UNSUPPORTED_FAILURES,
} from './constants';

export type ClaimType = (typeof CLAIM_TYPES)[number];
export type LegacyClaimType = (typeof LEGACY_CLAIM_TYPES)[number];
export type FactRole = (typeof FACT_ROLES)[number];
export type FormulaName = (typeof FORMULA_NAMES)[number];
export type ConfidenceTier = (typeof CONFIDENCE_TIERS)[number];
export type UnsupportedFailure = (typeof UNSUPPORTED_FAILURES)[number];

// ── Wire records (snake_case, read by external tooling) ─────────────────────

export interface ClaimRecord {
  id: string;
  text: string;
  claim_type: ClaimType;
  target: string;
  value_amount: number | null;
  value_percent: number | null;
  policy_area: string | null;
}

export interface CatalogEntryRecord {
  id: string;
  display_name: string;
  keywords: string[];
  numeric_value: number;
  unit: string;
  year: number;
  source_label: string;
}

export interface FactRecord {
  source_id: string;
  role: FactRole;
  value: number;
  unit: string;
  confidence: ConfidenceTier;
  provenance_label: string;
}

export interface CoefficientRecord {
  name: string;
  value: number;
  description: string;
}

export interface CalculationResultRecord {
  claim_id: string;
  cost_czk: number;
  formula_name: FormulaName;
  formula_expression: string;
  inputs_used: FactRecord[];
  confidence: ConfidenceTier;
  source_ids: string[];
  coefficients: CoefficientRecord[];
  assumptions: string[];
}

export interface UnsupportedClaimRecord {
  claim_id: string;
  text: string;
  reason: string;
  timestamp: string;
}

export interface UnsupportedClaimBatch {
  run_id: string;
  run_started_at: string;
  entries: UnsupportedClaimRecord[];
}

export interface FallbackSuggestionRecord {
  keywords: string[];
  claim_text: string;
  suggested_action: string;
}

export interface ClaimOutcomeRecord {
  claim: ClaimRecord;
  result: CalculationResultRecord | null;
  unsupported: UnsupportedClaimRecord | null;
}

export interface RejectedClaimRecord {
  index: number;
  claim_id: string | null;
  errors: string[];
}

export interface AnalysisReport {
  run_id: string;
  started_at: string;
  outcomes: ClaimOutcomeRecord[];
  rejected: RejectedClaimRecord[];
  sources: Record<string, string>;
  suggestions: FallbackSuggestionRecord[];
  unsupported_log_persisted: boolean;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
