// src/costing-core/unsupported-log.ts
// Append-only audit trail of claims the pipeline could not cost. One batch
// per analysis run, persisted once; external coverage tooling reads the
// batch format, so its fields do not change.

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { UnsupportedClaimBatch } from '@shared/types';
import { toUnsupportedRecord, type UnsupportedClaim } from './calculation-engine';

// ── Sinks ────────────────────────────────────────────────────────────────────

export interface UnsupportedClaimSink {
  writeBatch(batch: UnsupportedClaimBatch): Promise<void>;
}

export function runKey(runStartedAt: string, runId: string): string {
  return `${runStartedAt.replace(/[:.]/g, '-')}_${runId.slice(0, 8)}`;
}

export class FileUnsupportedClaimSink implements UnsupportedClaimSink {
  constructor(private readonly directory: string) {}

  fileFor(batch: Pick<UnsupportedClaimBatch, 'run_id' | 'run_started_at'>): string {
    return path.join(this.directory, `unsupported_${runKey(batch.run_started_at, batch.run_id)}.json`);
  }

  async writeBatch(batch: UnsupportedClaimBatch): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const file = this.fileFor(batch);
    // 'wx' fails if the file exists: batches are never rewritten.
    await writeFile(file, `${JSON.stringify(batch, null, 2)}\n`, { encoding: 'utf-8', flag: 'wx' });
    console.warn(`[UNSUPPORTED] Wrote ${batch.entries.length} entries to ${file}`);
  }
}

export class MemoryUnsupportedClaimSink implements UnsupportedClaimSink {
  readonly batches: UnsupportedClaimBatch[] = [];

  async writeBatch(batch: UnsupportedClaimBatch): Promise<void> {
    this.batches.push(structuredClone(batch));
  }
}

// ── Log ──────────────────────────────────────────────────────────────────────

export class UnsupportedClaimLog {
  private readonly entries: UnsupportedClaim[] = [];
  private persisted: Promise<void> | null = null;

  constructor(
    readonly runId: string,
    readonly runStartedAt: string,
    private readonly sink: UnsupportedClaimSink,
  ) {}

  append(entry: UnsupportedClaim): void {
    if (this.persisted) {
      throw new Error(`Unsupported-claim log for run ${this.runId} is already persisted`);
    }
    this.entries.push(entry);
  }

  list(): readonly UnsupportedClaim[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  get isPersisted(): boolean {
    return this.persisted !== null;
  }

  toBatch(): UnsupportedClaimBatch {
    return {
      run_id: this.runId,
      run_started_at: this.runStartedAt,
      entries: this.entries.map(toUnsupportedRecord),
    };
  }

  /**
   * Writes the batch once; later calls return the same promise. A failed
   * write is forgotten so the batch can be retried.
   */
  persist(): Promise<void> {
    if (!this.persisted) {
      this.persisted = this.sink.writeBatch(this.toBatch()).catch((err: unknown) => {
        this.persisted = null;
        throw err;
      });
    }
    return this.persisted;
  }
}
