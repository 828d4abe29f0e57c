export const API_PREFIX = '/api';

export const CLAIM_TYPES = [
  'spending',
  'tax_change',
  'pension',
  'debt_ratio',
  'percentage_change',
  'generic',
] as const;

// Claim types emitted by the older extraction schema.
export const LEGACY_CLAIM_TYPES = [
  'spending_increase_absolute',
  'spending_increase_percent',
  'spending_cut_absolute',
  'spending_cut_percent',
  'tax_rate_increase',
  'tax_rate_decrease',
  'tax_base_change',
  'regulatory_change',
  'general_policy',
] as const;

export const LEGACY_CLAIM_TYPE_MAP = {
  spending_increase_absolute: 'spending',
  spending_cut_absolute: 'spending',
  spending_increase_percent: 'percentage_change',
  spending_cut_percent: 'percentage_change',
  tax_rate_increase: 'tax_change',
  tax_rate_decrease: 'tax_change',
  tax_base_change: 'tax_change',
  regulatory_change: 'generic',
  general_policy: 'generic',
} as const satisfies Record<
  (typeof LEGACY_CLAIM_TYPES)[number],
  (typeof CLAIM_TYPES)[number]
>;

export const FACT_ROLES = [
  'population',
  'base_amount',
  'gdp',
  'inflation',
  'real_wage_growth',
  'average_pension',
  'pensioner_count',
] as const;

export const FORMULA_NAMES = [
  'simple_addition',
  'per_capita_multiplication',
  'rate_application',
  'pension_valorization',
  'tax_rate_change',
  'debt_to_gdp',
] as const;

export const CONFIDENCE_TIERS = ['high', 'medium', 'low'] as const;

export const UNSUPPORTED_FAILURES = ['no_formula', 'missing_data', 'error'] as const;

export const UNSUPPORTED_LOG_SINKS = ['file', 'database', 'memory'] as const;
