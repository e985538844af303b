import { describe, expect, it } from 'vitest';
import { createDatabase } from './connection.js';
import { migrateDatabase } from './migrate.js';
import { graphSessions } from './schema.js';

function createMigratedDb() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return db;
}

function insertSession(db: ReturnType<typeof createDatabase>, sessionKey: string, pauseReason = 'pause_node') {
  return db
    .insert(graphSessions)
    .values({
      sessionKey,
      graphId: 'graph-1',
      graphVersion: '1',
      goalId: 'goal-1',
      pausedAt: 'review',
      pauseReason,
      stepsExecuted: 1,
      schemaVersion: 1,
      state: {},
      savedAt: '2026-01-01T00:00:00.000Z',
    })
    .run();
}

describe('graph_sessions schema', () => {
  it('is idempotent to migrate', () => {
    const db = createMigratedDb();

    expect(() => migrateDatabase(db)).not.toThrow();
  });

  it('fills creation and update timestamps', () => {
    const db = createMigratedDb();
    insertSession(db, 'session-1');

    const row = db.select().from(graphSessions).get();
    expect(row?.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(row?.updatedAt).toBe(row?.createdAt);
  });

  it('enforces unique session keys', () => {
    const db = createMigratedDb();
    insertSession(db, 'session-1');

    expect(() => insertSession(db, 'session-1')).toThrow(/UNIQUE constraint failed/);
  });

  it('rejects unknown pause reasons', () => {
    const db = createMigratedDb();

    expect(() => insertSession(db, 'session-1', 'sleeping')).toThrow(/CHECK constraint failed/);
  });
});
