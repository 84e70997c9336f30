import { integer, pgTable, text } from 'drizzle-orm/pg-core';
import { createTimestampColumn } from '../utils.js';

/** Lifecycle record of each derived aggregate (one row per materialized view). */
export const derivedRefreshesTable = pgTable('derived_refreshes', {
  viewName: text('view_name').primaryKey(),
  refreshedAt: createTimestampColumn('refreshed_at'),
  rowCount: integer('row_count').notNull(),
  durationMs: integer('duration_ms').notNull(),
});
