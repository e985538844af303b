import {
  assertSessionStateSerializable,
  compareStringsByCodeUnit,
  type SessionState,
  type SessionStore,
  type SessionSummary,
} from '@trellis/shared';

export function toSessionSummary(state: SessionState): SessionSummary {
  return {
    sessionId: state.sessionId,
    graphId: state.graphId,
    graphVersion: state.graphVersion,
    pausedAt: state.pausedAt,
    pauseReason: state.pauseReason,
    stepsExecuted: state.stepsExecuted,
    savedAt: state.savedAt,
  };
}

/**
 * Process-local store. States are cloned on save and on load, and must
 * survive JSON like they would in a durable store.
 */
export function createInMemorySessionStore(): SessionStore {
  const sessions = new Map<string, SessionState>();

  return {
    async save(sessionId, state) {
      assertSessionStateSerializable(state);
      sessions.set(sessionId, structuredClone(state));
    },

    async load(sessionId) {
      const state = sessions.get(sessionId);
      return state ? structuredClone(state) : null;
    },

    async delete(sessionId) {
      return sessions.delete(sessionId);
    },

    async list() {
      return [...sessions.values()]
        .map(toSessionSummary)
        .sort((left, right) => compareStringsByCodeUnit(left.sessionId, right.sessionId));
    },
  };
}
