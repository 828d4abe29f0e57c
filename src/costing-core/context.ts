// src/costing-core/context.ts
// Everything one analysis run owns. Built fresh per run; nothing here is
// shared between runs except the read-only catalog.

import { randomUUID } from 'crypto';
import type { DatasetCatalog } from './catalog';
import type { Clock } from './calculation-engine';
import {
  createStatisticsOfficeStub,
  type FallbackFactory,
  type FallbackSuggestion,
} from './fallback';
import { RetrievalEngine } from './retrieval';
import { SourceRegistry } from './source-registry';
import { UnsupportedClaimLog, type UnsupportedClaimSink } from './unsupported-log';

export const DEFAULT_FALLBACK_TIMEOUT_MS = 10_000;
export const DEFAULT_CONCURRENCY = 4;

export interface AnalysisContext {
  readonly runId: string;
  readonly startedAt: string;
  readonly catalog: DatasetCatalog;
  readonly sources: SourceRegistry;
  readonly unsupportedLog: UnsupportedClaimLog;
  readonly retrieval: RetrievalEngine;
  readonly suggestions: readonly FallbackSuggestion[];
  readonly concurrency: number;
  readonly clock: Clock;
}

export interface AnalysisContextOptions {
  catalog: DatasetCatalog;
  sink: UnsupportedClaimSink;
  createFallback?: FallbackFactory;
  fallbackTimeoutMs?: number;
  concurrency?: number;
  clock?: Clock;
  runId?: string;
}

export function createAnalysisContext(options: AnalysisContextOptions): AnalysisContext {
  const clock = options.clock ?? (() => new Date());
  const runId = options.runId ?? randomUUID();
  const startedAt = clock().toISOString();
  const sources = new SourceRegistry();
  const suggestions: FallbackSuggestion[] = [];

  const createFallback = options.createFallback ?? createStatisticsOfficeStub;
  const fallback = createFallback((suggestion) => {
    suggestions.push(suggestion);
  });

  return {
    runId,
    startedAt,
    catalog: options.catalog,
    sources,
    unsupportedLog: new UnsupportedClaimLog(runId, startedAt, options.sink),
    retrieval: new RetrievalEngine({
      catalog: options.catalog,
      fallback,
      sources,
      fallbackTimeoutMs: options.fallbackTimeoutMs ?? DEFAULT_FALLBACK_TIMEOUT_MS,
    }),
    suggestions,
    concurrency: Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY),
    clock,
  };
}
