import { asc, eq } from 'drizzle-orm';
import { assertSessionStateSerializable, type SessionState, type SessionStore, type SessionSummary } from '@trellis/shared';
import type { TrellisDatabase } from './connection.js';
import { graphSessions } from './schema.js';
import { assertKnownPauseReason, decodeSessionState } from './sessionState.js';

type GraphSessionRow = typeof graphSessions.$inferSelect;

function toSessionSummary(row: GraphSessionRow): SessionSummary {
  return {
    sessionId: row.sessionKey,
    graphId: row.graphId,
    graphVersion: row.graphVersion,
    pausedAt: row.pausedAt,
    pauseReason: assertKnownPauseReason(row.pauseReason),
    stepsExecuted: row.stepsExecuted,
    savedAt: row.savedAt,
  };
}

export function saveGraphSession(
  db: TrellisDatabase,
  params: {
    sessionId: string;
    state: SessionState;
    occurredAt?: string;
  },
): void {
  const { sessionId, state } = params;
  assertSessionStateSerializable(state);
  const occurredAt = params.occurredAt ?? new Date().toISOString();
  const columns = {
    graphId: state.graphId,
    graphVersion: state.graphVersion,
    goalId: state.goalId,
    pausedAt: state.pausedAt,
    pauseReason: state.pauseReason,
    stepsExecuted: state.stepsExecuted,
    schemaVersion: state.schemaVersion,
    state,
    savedAt: state.savedAt,
    updatedAt: occurredAt,
  };

  db.insert(graphSessions)
    .values({ sessionKey: sessionId, createdAt: occurredAt, ...columns })
    .onConflictDoUpdate({ target: graphSessions.sessionKey, set: columns })
    .run();
}

export function loadGraphSession(db: TrellisDatabase, sessionId: string): SessionState | null {
  const row = db
    .select()
    .from(graphSessions)
    .where(eq(graphSessions.sessionKey, sessionId))
    .get();

  if (!row) {
    return null;
  }

  return decodeSessionState(row.state, sessionId);
}

export function deleteGraphSession(db: TrellisDatabase, sessionId: string): boolean {
  const deleted = db.delete(graphSessions).where(eq(graphSessions.sessionKey, sessionId)).run();
  return deleted.changes > 0;
}

export function listGraphSessions(db: TrellisDatabase): SessionSummary[] {
  const rows = db
    .select()
    .from(graphSessions)
    .orderBy(asc(graphSessions.sessionKey))
    .all();

  return rows.map(toSessionSummary);
}

/** Durable session store over one SQLite database. Writes are a single upsert. */
export function createSqliteSessionStore(db: TrellisDatabase): SessionStore {
  return {
    async save(sessionId, state) {
      saveGraphSession(db, { sessionId, state });
    },

    async load(sessionId) {
      return loadGraphSession(db, sessionId);
    },

    async delete(sessionId) {
      return deleteGraphSession(db, sessionId);
    },

    async list() {
      return listGraphSessions(db);
    },
  };
}
