import {
  isRecord,
  nodeOutcomeStatuses,
  pauseReasons,
  SESSION_STATE_SCHEMA_VERSION,
  type EdgeTraversal,
  type PauseReason,
  type SessionState,
} from '@trellis/shared';

function fail(sessionId: string, field: string, expectation: string): never {
  throw new Error(`Stored session "${sessionId}" is malformed: ${field} must be ${expectation}.`);
}

function readString(source: Record<string, unknown>, field: string, sessionId: string): string {
  const value = source[field];
  if (typeof value !== 'string') {
    return fail(sessionId, field, 'a string');
  }
  return value;
}

function readCount(source: Record<string, unknown>, field: string, sessionId: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return fail(sessionId, field, 'a non-negative integer');
  }
  return value;
}

function readStringList(source: Record<string, unknown>, field: string, sessionId: string): string[] {
  const value = source[field];
  if (!Array.isArray(value)) {
    return fail(sessionId, field, 'an array of strings');
  }

  const strings: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      return fail(sessionId, field, 'an array of strings');
    }
    strings.push(entry);
  }
  return strings;
}

export function assertKnownPauseReason(pauseReason: string): PauseReason {
  const known = pauseReasons.find(candidate => candidate === pauseReason);
  if (known === undefined) {
    throw new Error(`Unknown pause reason: ${pauseReason}`);
  }
  return known;
}

function readRetryCounts(source: Record<string, unknown>, sessionId: string): Record<string, number> {
  const value = source.retryCounts;
  if (!isRecord(value)) {
    return fail(sessionId, 'retryCounts', 'an object');
  }

  const retryCounts: Record<string, number> = {};
  for (const [nodeId, count] of Object.entries(value)) {
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
      return fail(sessionId, `retryCounts.${nodeId}`, 'a non-negative integer');
    }
    retryCounts[nodeId] = count;
  }
  return retryCounts;
}

function readEdgeHistory(source: Record<string, unknown>, sessionId: string): EdgeTraversal[] {
  const value = source.edgeHistory;
  if (!Array.isArray(value)) {
    return fail(sessionId, 'edgeHistory', 'an array');
  }

  return value.map((entry: unknown) => {
    if (!isRecord(entry)) {
      return fail(sessionId, 'edgeHistory', 'an array of edge traversals');
    }
    const outcomeStatus = nodeOutcomeStatuses.find(candidate => candidate === entry.outcomeStatus);
    if (outcomeStatus === undefined) {
      return fail(sessionId, 'edgeHistory.outcomeStatus', `one of ${nodeOutcomeStatuses.join(', ')}`);
    }
    return {
      edgeId: readString(entry, 'edgeId', sessionId),
      source: readString(entry, 'source', sessionId),
      target: readString(entry, 'target', sessionId),
      outcomeStatus,
      step: readCount(entry, 'step', sessionId),
    };
  });
}

/** Validates a persisted session state before it re-enters the engine. */
export function decodeSessionState(value: unknown, sessionId: string): SessionState {
  if (!isRecord(value)) {
    return fail(sessionId, 'state', 'an object');
  }

  if (value.schemaVersion !== SESSION_STATE_SCHEMA_VERSION) {
    throw new Error(
      `Stored session "${sessionId}" has schema version ${String(value.schemaVersion)}; expected ${SESSION_STATE_SCHEMA_VERSION}.`,
    );
  }

  const context = value.context;
  if (!isRecord(context)) {
    return fail(sessionId, 'context', 'an object');
  }

  return {
    schemaVersion: SESSION_STATE_SCHEMA_VERSION,
    sessionId: readString(value, 'sessionId', sessionId),
    graphId: readString(value, 'graphId', sessionId),
    graphVersion: readString(value, 'graphVersion', sessionId),
    goalId: readString(value, 'goalId', sessionId),
    pausedAt: readString(value, 'pausedAt', sessionId),
    pauseReason: assertKnownPauseReason(readString(value, 'pauseReason', sessionId)),
    queuedNodeIds: readStringList(value, 'queuedNodeIds', sessionId),
    context,
    contextVersion: readCount(value, 'contextVersion', sessionId),
    retryCounts: readRetryCounts(value, sessionId),
    edgeHistory: readEdgeHistory(value, sessionId),
    path: readStringList(value, 'path', sessionId),
    stepsExecuted: readCount(value, 'stepsExecuted', sessionId),
    savedAt: readString(value, 'savedAt', sessionId),
  };
}
