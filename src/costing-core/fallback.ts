// src/costing-core/fallback.ts
// Statistics-office fallback. The live integration does not exist yet; the
// stub keeps the contract and records what the catalog was missing.

import type { FallbackSuggestionRecord } from '@shared/types';
import type { CatalogEntry } from './catalog';

// ── Contract ─────────────────────────────────────────────────────────────────

export interface FallbackSuggestion {
  readonly keywords: readonly string[];
  readonly claimText: string;
  readonly suggestedAction: string;
}

export type SuggestionListener = (suggestion: FallbackSuggestion) => void;

export interface FallbackResolver {
  search(
    keywords: readonly string[],
    claimText: string,
    signal?: AbortSignal,
  ): Promise<CatalogEntry | null>;
}

export type FallbackFactory = (onSuggestion: SuggestionListener) => FallbackResolver;

// ── Production stub ──────────────────────────────────────────────────────────

export class StatisticsOfficeStub implements FallbackResolver {
  constructor(private readonly onSuggestion: SuggestionListener = () => undefined) {}

  async search(keywords: readonly string[], claimText: string): Promise<CatalogEntry | null> {
    const suggestion: FallbackSuggestion = {
      keywords: [...keywords],
      claimText,
      suggestedAction: `Add a catalog entry covering: ${keywords.join(', ') || '(no keywords)'}`,
    };
    console.warn(`[FALLBACK] No statistics-office data for [${keywords.join(', ')}]`);
    this.onSuggestion(suggestion);
    return null;
  }
}

export const createStatisticsOfficeStub: FallbackFactory = (onSuggestion) =>
  new StatisticsOfficeStub(onSuggestion);

// ── Timeout wrapper ──────────────────────────────────────────────────────────

/**
 * Timeouts and transport failures degrade to not-found; the run continues.
 */
export async function searchWithTimeout(
  resolver: FallbackResolver,
  keywords: readonly string[],
  claimText: string,
  timeoutMs: number,
): Promise<CatalogEntry | null> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      console.warn(`[RETRIEVAL] Fallback search timed out after ${timeoutMs}ms`);
      resolve(null);
    }, timeoutMs);
  });

  try {
    return await Promise.race([resolver.search(keywords, claimText, controller.signal), timeout]);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[RETRIEVAL] Fallback search failed: ${message}`);
    return null;
  } finally {
    clearTimeout(timer);
  }
}

export function toSuggestionRecord(suggestion: FallbackSuggestion): FallbackSuggestionRecord {
  return {
    keywords: [...suggestion.keywords],
    claim_text: suggestion.claimText,
    suggested_action: suggestion.suggestedAction,
  };
}
