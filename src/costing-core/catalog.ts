// src/costing-core/catalog.ts
// Static dataset catalog: named quantities with keyword indices.
// Read-only after load.

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { CatalogEntryRecord } from '@shared/types';
import { normalizeText } from './text';

// ── Types ────────────────────────────────────────────────────────────────────

export interface CatalogEntry {
  readonly id: string;
  readonly displayName: string;
  /** Normalised (lowercase, no diacritics) in insertion order. */
  readonly keywords: readonly string[];
  readonly value: number;
  readonly unit: string;
  readonly year: number;
  readonly sourceLabel: string;
}

export interface SkippedCatalogRecord {
  index: number;
  reason: string;
}

export interface CatalogParseResult {
  entries: CatalogEntry[];
  skipped: SkippedCatalogRecord[];
}

// ── Record schema ────────────────────────────────────────────────────────────

export const catalogEntrySchema = z
  .object({
    id: z.string().trim().min(1),
    display_name: z.string().min(1),
    keywords: z.array(z.string()).min(1),
    numeric_value: z.number().finite(),
    unit: z.string().min(1),
    year: z.number().int(),
    source_label: z.string().trim().min(1),
  })
  .refine((record) => record.unit !== 'persons' || record.numeric_value >= 0, {
    message: 'population counts cannot be negative',
    path: ['numeric_value'],
  })
  .refine((record) => record.keywords.some((keyword) => normalizeText(keyword) !== ''), {
    message: 'at least one non-empty keyword is required',
    path: ['keywords'],
  });

export function toCatalogEntry(record: CatalogEntryRecord): CatalogEntry {
  const keywords = record.keywords.map(normalizeText).filter((keyword) => keyword !== '');
  return Object.freeze({
    id: record.id,
    displayName: record.display_name,
    keywords: Object.freeze(Array.from(new Set(keywords))),
    value: record.numeric_value,
    unit: record.unit,
    year: record.year,
    sourceLabel: record.source_label,
  });
}

export function toCatalogEntryRecord(entry: CatalogEntry): CatalogEntryRecord {
  return {
    id: entry.id,
    display_name: entry.displayName,
    keywords: [...entry.keywords],
    numeric_value: entry.value,
    unit: entry.unit,
    year: entry.year,
    source_label: entry.sourceLabel,
  };
}

/** Validates records one by one; a bad record never stops the rest. */
export function parseCatalogRecords(records: readonly unknown[]): CatalogParseResult {
  const entries: CatalogEntry[] = [];
  const skipped: SkippedCatalogRecord[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    const parsed = catalogEntrySchema.safeParse(record);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      skipped.push({ index, reason });
      return;
    }
    if (seen.has(parsed.data.id)) {
      skipped.push({ index, reason: `duplicate id ${parsed.data.id}` });
      return;
    }
    seen.add(parsed.data.id);
    entries.push(toCatalogEntry(parsed.data));
  });

  return { entries, skipped };
}

// ── Catalog ──────────────────────────────────────────────────────────────────

interface ScoredEntry {
  entry: CatalogEntry;
  matches: number;
  longestMatch: number;
}

export class DatasetCatalog {
  private readonly entries: readonly CatalogEntry[];

  constructor(entries: readonly CatalogEntry[]) {
    this.entries = Object.freeze([...entries]);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly CatalogEntry[] {
    return this.entries;
  }

  get(id: string): CatalogEntry | null {
    return this.entries.find((entry) => entry.id === id) ?? null;
  }

  /**
   * Scores each entry by how many of its keywords occur as substrings of the
   * normalised query. Ties go to the longer matched keyword, then to the
   * earlier entry.
   */
  lookup(tokens: readonly string[]): CatalogEntry | null {
    const haystack = normalizeText(tokens.join(' '));
    if (!haystack) return null;

    let best: ScoredEntry | null = null;

    for (const entry of this.entries) {
      let matches = 0;
      let longestMatch = 0;
      for (const keyword of entry.keywords) {
        if (haystack.includes(keyword)) {
          matches += 1;
          longestMatch = Math.max(longestMatch, keyword.length);
        }
      }
      if (matches === 0) continue;

      if (
        !best ||
        matches > best.matches ||
        (matches === best.matches && longestMatch > best.longestMatch)
      ) {
        best = { entry, matches, longestMatch };
      }
    }

    return best?.entry ?? null;
  }
}

// ── Loader ───────────────────────────────────────────────────────────────────

export async function loadCatalog(filePath: string): Promise<DatasetCatalog> {
  const raw = await readFile(filePath, 'utf-8');
  const records: unknown = JSON.parse(raw);

  if (!Array.isArray(records)) {
    throw new Error(`Catalog at ${filePath} is not a JSON array`);
  }

  const { entries, skipped } = parseCatalogRecords(records);
  for (const skip of skipped) {
    console.warn(`[CATALOG] Skipped entry #${skip.index}: ${skip.reason}`);
  }
  console.warn(`[CATALOG] Loaded ${entries.length} entries from ${filePath}`);

  return new DatasetCatalog(entries);
}
