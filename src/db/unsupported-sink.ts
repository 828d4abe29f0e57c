import type { UnsupportedClaimBatch } from '@shared/types';
import type { UnsupportedClaimSink } from '@core/unsupported-log';
import type { Database } from './connection';
import { analysisRuns, unsupportedClaims } from './schema/index';

/** Stores each run's batch as one analysis_runs row plus its entries. */
export class DatabaseUnsupportedClaimSink implements UnsupportedClaimSink {
  constructor(private readonly db: Database) {}

  async writeBatch(batch: UnsupportedClaimBatch): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.insert(analysisRuns).values({
        id: batch.run_id,
        startedAt: new Date(batch.run_started_at),
        unsupportedCount: batch.entries.length,
      });
      if (batch.entries.length > 0) {
        await tx.insert(unsupportedClaims).values(
          batch.entries.map((entry) => ({
            runId: batch.run_id,
            claimId: entry.claim_id,
            text: entry.text,
            reason: entry.reason,
            timestamp: new Date(entry.timestamp),
          })),
        );
      }
    });
    console.warn(`[UNSUPPORTED] Stored ${batch.entries.length} entries for run ${batch.run_id}`);
  }
}
