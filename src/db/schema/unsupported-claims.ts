import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';
import { analysisRuns } from './analysis-runs';

export const unsupportedClaims = pgTable('unsupported_claims', {
  id: uuid('id').primaryKey().defaultRandom(),
  runId: uuid('run_id').notNull().references(() => analysisRuns.id),
  claimId: text('claim_id').notNull(),
  text: text('text').notNull(),
  reason: text('reason').notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
