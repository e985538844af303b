import { sql } from 'drizzle-orm';
import { check, index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

const utcNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

export const graphSessions = sqliteTable(
  'graph_sessions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sessionKey: text('session_key').notNull(),
    graphId: text('graph_id').notNull(),
    graphVersion: text('graph_version').notNull(),
    goalId: text('goal_id').notNull(),
    pausedAt: text('paused_at').notNull(),
    pauseReason: text('pause_reason').notNull(),
    stepsExecuted: integer('steps_executed').notNull(),
    schemaVersion: integer('schema_version').notNull(),
    state: text('state', { mode: 'json' }).notNull(),
    savedAt: text('saved_at').notNull(),
    createdAt: text('created_at').notNull().default(utcNow),
    updatedAt: text('updated_at').notNull().default(utcNow),
  },
  table => ({
    sessionKeyUnique: uniqueIndex('graph_sessions_session_key_uq').on(table.sessionKey),
    pauseReasonCheck: check(
      'graph_sessions_pause_reason_ck',
      sql`${table.pauseReason} in ('pause_node', 'interrupted')`,
    ),
    stepsExecutedCheck: check('graph_sessions_steps_executed_ck', sql`${table.stepsExecuted} >= 0`),
    graphIdx: index('graph_sessions_graph_id_graph_version_idx').on(table.graphId, table.graphVersion),
  }),
);
