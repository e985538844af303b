import type { TrellisDatabase } from './connection.js';
import { sql } from 'drizzle-orm';

export function migrateDatabase(db: TrellisDatabase): void {
  db.run(sql`CREATE TABLE IF NOT EXISTS graph_sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_key TEXT NOT NULL,
    graph_id TEXT NOT NULL,
    graph_version TEXT NOT NULL,
    goal_id TEXT NOT NULL,
    paused_at TEXT NOT NULL,
    pause_reason TEXT NOT NULL,
    steps_executed INTEGER NOT NULL,
    schema_version INTEGER NOT NULL,
    state TEXT NOT NULL,
    saved_at TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT graph_sessions_pause_reason_ck
      CHECK (pause_reason IN ('pause_node', 'interrupted')),
    CONSTRAINT graph_sessions_steps_executed_ck
      CHECK (steps_executed >= 0)
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS graph_sessions_session_key_uq
    ON graph_sessions(session_key)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS graph_sessions_graph_id_graph_version_idx
    ON graph_sessions(graph_id, graph_version)`);
}
