// costing-core: claim costing without a server. The only I/O is the
// catalog loader and the unsupported-claim sinks.

export const COSTING_CORE_VERSION = '0.1.0';

export { DatasetCatalog, loadCatalog, toCatalogEntryRecord } from './catalog';
export type { CatalogEntry } from './catalog';
export { parseClaim, toClaimRecord } from './claims';
export type { Claim, ClaimParseResult } from './claims';
export { calculate, selectFormula, ROUTING_RULES } from './calculation-engine';
export type { CalculationOutcome, CalculationResult, UnsupportedClaim } from './calculation-engine';
export { createAnalysisContext } from './context';
export type { AnalysisContext, AnalysisContextOptions } from './context';
export { StatisticsOfficeStub, createStatisticsOfficeStub } from './fallback';
export type { FallbackResolver, FallbackSuggestion } from './fallback';
export { FORMULA_REGISTRY, getFormula } from './formulas';
export type { Formula, NamedCoefficient } from './formulas';
export { analyzeClaims, finishAnalysis, processClaim, runAnalysis } from './pipeline';
export { RetrievalEngine, planRequirements } from './retrieval';
export { SourceRegistry } from './source-registry';
export {
  FileUnsupportedClaimSink,
  MemoryUnsupportedClaimSink,
  UnsupportedClaimLog,
} from './unsupported-log';
export type { UnsupportedClaimSink } from './unsupported-log';
