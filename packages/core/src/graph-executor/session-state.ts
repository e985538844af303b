import { SESSION_STATE_SCHEMA_VERSION, type Goal, type PauseReason, type SessionState } from '@trellis/shared';
import { ContextStore } from '../contextStore.js';
import type { GraphIndex } from '../graph.js';
import type { RunState } from './types.js';

export function toSessionState(
  state: RunState,
  params: {
    pausedAt: string;
    pauseReason: PauseReason;
    savedAt: string;
  },
): SessionState {
  return {
    schemaVersion: SESSION_STATE_SCHEMA_VERSION,
    sessionId: state.runId,
    graphId: state.index.graph.id,
    graphVersion: state.index.graph.version,
    goalId: state.goal.id,
    pausedAt: params.pausedAt,
    pauseReason: params.pauseReason,
    queuedNodeIds: [...state.frontier],
    context: state.context.snapshot(),
    contextVersion: state.context.version,
    retryCounts: { ...state.retryCounts },
    edgeHistory: state.edgeHistory.map(traversal => ({ ...traversal })),
    path: [...state.path],
    stepsExecuted: state.stepsExecuted,
    savedAt: params.savedAt,
  };
}

export function restoreRunState(session: SessionState, index: GraphIndex, goal: Readonly<Goal>): RunState {
  return {
    runId: session.sessionId,
    index,
    goal,
    context: new ContextStore(session.context, session.contextVersion),
    retryCounts: { ...session.retryCounts },
    edgeHistory: session.edgeHistory.map(traversal => ({ ...traversal })),
    path: [...session.path],
    stepsExecuted: session.stepsExecuted,
    frontier:
      session.pauseReason === 'interrupted'
        ? [session.pausedAt, ...session.queuedNodeIds]
        : [...session.queuedNodeIds],
    status: 'paused',
  };
}

export function collectRunOutput(state: RunState): Record<string, unknown> {
  const { graph, nodesById } = state.index;
  if (graph.outputKeys) {
    return state.context.pick(graph.outputKeys);
  }

  const keys = new Set<string>();
  for (const nodeId of state.path) {
    for (const key of nodesById.get(nodeId)?.outputKeys ?? []) {
      keys.add(key);
    }
  }
  return state.context.pick([...keys]);
}
