import { describe, it, expect } from 'vitest';
import { DatasetCatalog } from '@core/catalog';
import { DEFAULT_CONCURRENCY, createAnalysisContext } from '@core/context';
import type { FallbackFactory } from '@core/fallback';
import { MemoryUnsupportedClaimSink } from '@core/unsupported-log';
import { fixedClock } from './fixtures';

describe('createAnalysisContext', () => {
  it('builds independent state for each run', () => {
    const catalog = new DatasetCatalog([]);
    const a = createAnalysisContext({ catalog, sink: new MemoryUnsupportedClaimSink() });
    const b = createAnalysisContext({ catalog, sink: new MemoryUnsupportedClaimSink() });

    expect(a.runId).not.toBe(b.runId);
    expect(a.sources).not.toBe(b.sources);
    expect(a.unsupportedLog).not.toBe(b.unsupportedLog);
    expect(a.catalog).toBe(b.catalog);
    expect(a.concurrency).toBe(DEFAULT_CONCURRENCY);
  });

  it('stamps the run with the injected clock', () => {
    const context = createAnalysisContext({
      catalog: new DatasetCatalog([]),
      sink: new MemoryUnsupportedClaimSink(),
      clock: fixedClock,
      runId: 'run-42',
    });

    expect(context.startedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(context.unsupportedLog.toBatch()).toEqual({
      run_id: 'run-42',
      run_started_at: '2026-01-01T00:00:00.000Z',
      entries: [],
    });
  });

  it('routes fallback suggestions into the run', async () => {
    const createFallback: FallbackFactory = (onSuggestion) => ({
      search: async (keywords, claimText) => {
        onSuggestion({ keywords, claimText, suggestedAction: 'add it' });
        return null;
      },
    });
    const context = createAnalysisContext({
      catalog: new DatasetCatalog([]),
      sink: new MemoryUnsupportedClaimSink(),
      createFallback,
    });

    await context.retrieval.resolve({ id: 'c', text: 'Dotace', claimType: 'generic', target: '' });

    expect(context.suggestions).toEqual([{ keywords: ['dotace'], claimText: 'Dotace', suggestedAction: 'add it' }]);
  });

  it('never runs with less than one worker', () => {
    const context = createAnalysisContext({
      catalog: new DatasetCatalog([]),
      sink: new MemoryUnsupportedClaimSink(),
      concurrency: 0,
    });
    expect(context.concurrency).toBe(1);
  });
});
