import type { NodeOutcomeStatus } from './execution.js';

export const SESSION_STATE_SCHEMA_VERSION = 1;

export const pauseReasons = ['pause_node', 'interrupted'] as const;
export type PauseReason = (typeof pauseReasons)[number];

export type EdgeTraversal = {
  edgeId: string;
  source: string;
  target: string;
  outcomeStatus: NodeOutcomeStatus;
  step: number;
};

/**
 * Resumable state of a suspended run.
 *
 * `pausedAt` is the pause node for `pause_node` sessions, whose successors are
 * resolved on resume. For `interrupted` sessions it is the node whose invocation
 * was aborted, and it runs again on resume.
 */
export type SessionState = {
  schemaVersion: typeof SESSION_STATE_SCHEMA_VERSION;
  sessionId: string;
  graphId: string;
  graphVersion: string;
  goalId: string;
  pausedAt: string;
  pauseReason: PauseReason;
  queuedNodeIds: string[];
  context: Record<string, unknown>;
  contextVersion: number;
  retryCounts: Record<string, number>;
  edgeHistory: EdgeTraversal[];
  path: string[];
  stepsExecuted: number;
  savedAt: string;
};

export type SessionSummary = {
  sessionId: string;
  graphId: string;
  graphVersion: string;
  pausedAt: string;
  pauseReason: PauseReason;
  stepsExecuted: number;
  savedAt: string;
};

// One active executor per session id; concurrent use of the same id is the caller's problem.
export type SessionStore = {
  save(sessionId: string, state: SessionState): Promise<void>;
  load(sessionId: string): Promise<SessionState | null>;
  delete(sessionId: string): Promise<boolean>;
  list(): Promise<SessionSummary[]>;
};

/**
 * Describes the first value under `path` that would not come back unchanged
 * from `JSON.stringify` and `JSON.parse`, or returns null when none does.
 */
export function findNonJsonValue(value: unknown, path: string, ancestors: Set<object> = new Set()): string | null {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return `${path} is ${String(value)}`;
    }
    return Object.is(value, -0) ? `${path} is -0` : null;
  }

  if (typeof value !== 'object') {
    return `${path} is ${typeof value}`;
  }

  if (ancestors.has(value)) {
    return `${path} is a circular reference`;
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      for (let index = 0; index < value.length; index += 1) {
        if (!(index in value)) {
          return `${path}[${index}] is an empty array slot`;
        }
        const problem = findNonJsonValue(value[index], `${path}[${index}]`, ancestors);
        if (problem !== null) {
          return problem;
        }
      }
      return null;
    }

    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      return `${path} is not a plain object (${Object.prototype.toString.call(value).slice(8, -1)})`;
    }

    if (Object.getOwnPropertySymbols(value).length > 0) {
      return `${path} has symbol keys`;
    }

    for (const [key, entry] of Object.entries(value)) {
      const problem = findNonJsonValue(entry, `${path}.${key}`, ancestors);
      if (problem !== null) {
        return problem;
      }
    }
    return null;
  } finally {
    ancestors.delete(value);
  }
}

// Stores hold sessions as JSON; a state that would change on the way through is refused.
export function assertSessionStateSerializable(state: SessionState): void {
  for (const [key, value] of Object.entries(state)) {
    const problem = findNonJsonValue(value, key);
    if (problem !== null) {
      throw new Error(`Session "${state.sessionId}" cannot be stored as JSON: ${problem}.`);
    }
  }
}
