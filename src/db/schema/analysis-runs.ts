import { pgTable, uuid, integer, timestamp } from 'drizzle-orm/pg-core';

export const analysisRuns = pgTable('analysis_runs', {
  id: uuid('id').primaryKey(),
  startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
  unsupportedCount: integer('unsupported_count').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
