import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import { analysisRuns } from '../../src/db/schema/analysis-runs';
import { unsupportedClaims } from '@db/schema/index';

describe('analysis runs schema', () => {
  it('exports an analysis_runs table', () => {
    expect(getTableName(analysisRuns)).toBe('analysis_runs');
  });

  it('has run columns', () => {
    const cols = Object.keys(analysisRuns);
    expect(cols).toContain('id');
    expect(cols).toContain('startedAt');
    expect(cols).toContain('unsupportedCount');
  });
});

describe('unsupported claims schema', () => {
  it('exports an unsupported_claims table', () => {
    expect(getTableName(unsupportedClaims)).toBe('unsupported_claims');
  });

  it('stores the batch entry fields', () => {
    const cols = Object.keys(unsupportedClaims);
    expect(cols).toContain('runId');
    expect(cols).toContain('claimId');
    expect(cols).toContain('text');
    expect(cols).toContain('reason');
    expect(cols).toContain('timestamp');
  });

  it('references its run', () => {
    expect(unsupportedClaims.runId.notNull).toBe(true);
  });
});
