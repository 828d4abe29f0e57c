// src/costing-core/source-registry.ts

export type RegisterResult =
  | { ok: true; created: boolean }
  | { ok: false; error: string; existingLabel?: string };

/**
 * Run-scoped, append-only map of source id to citable label. A label, once
 * written, is never replaced. Writes are synchronous, so concurrent claim
 * tasks within one run cannot interleave inside a single write.
 */
export class SourceRegistry {
  private readonly labels = new Map<string, string>();

  register(sourceId: string, label: string): RegisterResult {
    if (!sourceId.trim()) {
      return { ok: false, error: 'sourceId is required' };
    }
    if (!label.trim()) {
      return { ok: false, error: `Empty label for source ${sourceId}` };
    }

    const existing = this.labels.get(sourceId);
    if (existing === undefined) {
      this.labels.set(sourceId, label);
      return { ok: true, created: true };
    }
    if (existing === label) {
      return { ok: true, created: false };
    }

    console.warn(`[SOURCES] Ignored conflicting label for ${sourceId}: "${label}"`);
    return {
      ok: false,
      error: `Source ${sourceId} is already registered with a different label`,
      existingLabel: existing,
    };
  }

  label(sourceId: string): string | undefined {
    return this.labels.get(sourceId);
  }

  has(sourceId: string): boolean {
    return this.labels.has(sourceId);
  }

  get size(): number {
    return this.labels.size;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.labels);
  }
}
