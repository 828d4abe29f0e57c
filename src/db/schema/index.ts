export { analysisRuns } from './analysis-runs';
export { unsupportedClaims } from './unsupported-claims';
