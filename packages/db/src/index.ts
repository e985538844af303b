export { createDatabase, type TrellisDatabase } from './connection.js';
export { migrateDatabase } from './migrate.js';
export * from './schema.js';
export { assertKnownPauseReason, decodeSessionState } from './sessionState.js';
export {
  createSqliteSessionStore,
  deleteGraphSession,
  listGraphSessions,
  loadGraphSession,
  saveGraphSession,
} from './sessionStore.js';
