import { randomUUID } from 'node:crypto';
import type { Goal, GraphSpec, PauseReason, SessionState } from '@trellis/shared';
import { ContextStore } from '../contextStore.js';
import { selectMatchingEdges, type RoutableOutcome } from '../edgeResolver.js';
import {
  DeadEndError,
  ExecutionCancelledError,
  GraphRunError,
  GraphValidationError,
  SessionNotFoundError,
  SessionPersistenceError,
  StepBudgetExceededError,
  StepExecutionError,
  UnexpectedExecutionError,
  VersionMismatchError,
} from '../errors.js';
import { attachGoal } from '../goal.js';
import { indexGraph, resolveEntryNode, type GraphIndex } from '../graph.js';
import { validateGraph } from '../graphValidator.js';
import { runNode } from '../nodeRunner.js';
import { transitionRun } from '../stateMachine.js';
import { DEFAULT_MAX_STEPS } from './constants.js';
import { collectRunOutput, restoreRunState, toSessionState } from './session-state.js';
import type {
  ExecuteGraphParams,
  ExecutionResult,
  ExecutorConfig,
  FinishedRunStatus,
  GraphExecutor,
  GraphExecutorDependencies,
  GraphRunEventPayload,
  ResumeGraphParams,
  RunState,
  TerminalRunStatus,
} from './types.js';

type PreparedGraph =
  | {
      ok: true;
      index: GraphIndex;
      goal: Readonly<Goal>;
    }
  | {
      ok: false;
      error: GraphValidationError;
    };

type RoutingResult =
  | {
      ok: true;
    }
  | {
      ok: false;
      error: GraphRunError;
    };

function resolveMaxSteps(config: ExecutorConfig | undefined): number {
  const maxSteps = config?.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new Error(`maxSteps must be a positive integer, received ${maxSteps}.`);
  }
  return maxSteps;
}

function prepareGraph(graph: GraphSpec, goal: Goal): PreparedGraph {
  const errors = [...validateGraph(graph).errors];
  if (graph.goalId !== goal.id) {
    errors.push(`Graph "${graph.id}" targets goal "${graph.goalId}" but goal "${goal.id}" was supplied.`);
  }

  if (errors.length > 0) {
    return { ok: false, error: new GraphValidationError(graph.id, errors) };
  }

  return { ok: true, index: indexGraph(graph), goal: attachGoal(goal) };
}

function toFailedResultBeforeStart(runId: string, error: GraphRunError): ExecutionResult {
  return {
    runId,
    status: 'failed',
    success: false,
    stepsExecuted: 0,
    path: [],
    output: {},
    error,
    pausedAt: null,
    sessionState: null,
  };
}

function toExecutionResult(
  state: RunState,
  status: FinishedRunStatus,
  error: GraphRunError | null,
  pause: { pausedAt: string; sessionState: SessionState } | null = null,
): ExecutionResult {
  return {
    runId: state.runId,
    status,
    success: status === 'succeeded',
    stepsExecuted: state.stepsExecuted,
    path: [...state.path],
    output: collectRunOutput(state),
    error,
    pausedAt: pause?.pausedAt ?? null,
    sessionState: pause?.sessionState ?? null,
  };
}

export function createGraphExecutor(dependencies: GraphExecutorDependencies): GraphExecutor {
  const maxSteps = resolveMaxSteps(dependencies.config);
  const nodeTimeoutMs = dependencies.config?.nodeTimeoutMs ?? null;
  const now = dependencies.now ?? (() => new Date());
  const generateRunId = dependencies.generateRunId ?? randomUUID;

  async function emit(runId: string, payload: GraphRunEventPayload): Promise<void> {
    if (!dependencies.onEvent) {
      return;
    }

    await dependencies.onEvent({
      ...payload,
      runId,
      timestamp: now().toISOString(),
    });
  }

  async function finish(
    state: RunState,
    status: TerminalRunStatus,
    error: GraphRunError | null,
  ): Promise<ExecutionResult> {
    state.status = transitionRun(state.status, status);
    await emit(state.runId, {
      type: 'run_finished',
      status,
      errorCode: error?.code ?? null,
    });
    if (dependencies.onRunTerminal) {
      await dependencies.onRunTerminal({ runId: state.runId, status, error });
    }
    return toExecutionResult(state, status, error);
  }

  async function suspend(state: RunState, nodeId: string, pauseReason: PauseReason): Promise<ExecutionResult> {
    const sessionState = toSessionState(state, {
      pausedAt: nodeId,
      pauseReason,
      savedAt: now().toISOString(),
    });

    try {
      await dependencies.sessionStore.save(state.runId, sessionState);
    } catch (error) {
      return finish(state, 'failed', new SessionPersistenceError(state.runId, nodeId, error));
    }

    state.status = transitionRun(state.status, 'paused');
    await emit(state.runId, { type: 'run_paused', nodeId, reason: pauseReason });
    return toExecutionResult(
      state,
      'paused',
      pauseReason === 'interrupted' ? new ExecutionCancelledError(nodeId) : null,
      { pausedAt: nodeId, sessionState },
    );
  }

  async function route(state: RunState, nodeId: string, outcome: RoutableOutcome): Promise<RoutingResult> {
    const { graph, outgoingEdgesByNodeId, conditionsByEdgeId } = state.index;
    const matched = selectMatchingEdges({
      nodeId,
      outcome,
      context: state.context.snapshot(),
      outgoingEdges: outgoingEdgesByNodeId.get(nodeId) ?? [],
      mode: graph.routingMode,
      conditions: conditionsByEdgeId,
    });

    if (matched.length === 0) {
      if (outcome.status === 'failed' && outcome.error instanceof GraphRunError) {
        return { ok: false, error: outcome.error };
      }
      return { ok: false, error: new DeadEndError(nodeId) };
    }

    for (const edge of matched) {
      state.edgeHistory.push({
        edgeId: edge.id,
        source: edge.source,
        target: edge.target,
        outcomeStatus: outcome.status,
        step: state.stepsExecuted,
      });
      state.frontier.push(edge.target);
      await emit(state.runId, {
        type: 'edge_taken',
        edgeId: edge.id,
        source: edge.source,
        target: edge.target,
      });
    }

    return { ok: true };
  }

  async function advance(state: RunState, signal: AbortSignal | undefined): Promise<ExecutionResult> {
    const { graph, nodesById, entryPointNodeIds, pauseNodeIds, terminalNodeIds } = state.index;
    const model = dependencies.config?.model ?? graph.defaultModel;
    let lastNodeId: string | null = null;

    for (let nodeId = state.frontier.shift(); nodeId !== undefined; nodeId = state.frontier.shift()) {
      lastNodeId = nodeId;
      if (signal?.aborted) {
        return suspend(state, nodeId, 'interrupted');
      }

      if (state.stepsExecuted >= maxSteps) {
        return finish(state, 'failed', new StepBudgetExceededError(maxSteps, nodeId));
      }

      const node = nodesById.get(nodeId);
      if (!node) {
        throw new Error(`Node "${nodeId}" is not part of graph "${graph.id}".`);
      }

      await emit(state.runId, { type: 'node_started', nodeId, step: state.stepsExecuted + 1 });
      const runId = state.runId;
      const outcome = await runNode({
        runId,
        node,
        context: state.context,
        stepExecutor: dependencies.stepExecutor,
        goal: state.goal,
        model,
        maxTokens: graph.maxTokens,
        isEntryPoint: entryPointNodeIds.has(nodeId),
        retryCount: state.retryCounts[nodeId] ?? 0,
        maxAttempts: maxSteps - state.stepsExecuted,
        timeoutMs: nodeTimeoutMs,
        signal,
        onAttemptFailed: failure => emit(runId, { type: 'node_attempt_failed', ...failure }),
      });

      state.stepsExecuted += outcome.attempts;
      if (outcome.retryCount > 0) {
        state.retryCounts[nodeId] = outcome.retryCount;
      }

      if (outcome.status === 'interrupted') {
        return suspend(state, nodeId, 'interrupted');
      }

      state.path.push(nodeId);
      if (outcome.status === 'succeeded') {
        state.context.apply(outcome.contextPatch);
      }
      await emit(state.runId, {
        type: 'node_completed',
        nodeId,
        status: outcome.status,
        attempts: outcome.attempts,
        contextVersion: state.context.version,
      });

      if (outcome.status === 'succeeded' && pauseNodeIds.has(nodeId)) {
        return suspend(state, nodeId, 'pause_node');
      }

      if (terminalNodeIds.has(nodeId)) {
        return finish(state, outcome.status, outcome.error);
      }

      if (
        outcome.error instanceof StepExecutionError &&
        !outcome.retriesExhausted &&
        state.stepsExecuted >= maxSteps
      ) {
        return finish(state, 'failed', new StepBudgetExceededError(maxSteps, nodeId));
      }

      const routing = await route(state, nodeId, outcome);
      if (!routing.ok) {
        return finish(state, 'failed', routing.error);
      }
    }

    return finish(state, 'failed', new DeadEndError(lastNodeId ?? graph.entryNode));
  }

  async function drive(state: RunState, start: () => Promise<RoutingResult>, signal?: AbortSignal): Promise<ExecutionResult> {
    try {
      const started = await start();
      if (!started.ok) {
        return await finish(state, 'failed', started.error);
      }
      return await advance(state, signal);
    } catch (error) {
      return toExecutionResult(state, 'failed', new UnexpectedExecutionError(error));
    }
  }

  async function execute(params: ExecuteGraphParams): Promise<ExecutionResult> {
    const runId = params.sessionId ?? generateRunId();
    const prepared = prepareGraph(params.graph, params.goal);
    if (!prepared.ok) {
      return toFailedResultBeforeStart(runId, prepared.error);
    }

    const entryNodeId = resolveEntryNode(params.graph, params.entryPoint);
    if (entryNodeId === null) {
      return toFailedResultBeforeStart(
        runId,
        new GraphValidationError(params.graph.id, [`Unknown entry point "${params.entryPoint ?? ''}".`]),
      );
    }

    const state: RunState = {
      runId,
      index: prepared.index,
      goal: prepared.goal,
      context: new ContextStore(params.input ?? {}),
      retryCounts: {},
      edgeHistory: [],
      path: [],
      stepsExecuted: 0,
      frontier: [entryNodeId],
      status: 'running',
    };

    return drive(
      state,
      async () => {
        await emit(runId, { type: 'run_started', graphId: params.graph.id, entryNodeId, resumed: false });
        return { ok: true };
      },
      params.signal,
    );
  }

  async function resume(params: ResumeGraphParams): Promise<ExecutionResult> {
    const { sessionId, graph } = params;
    let session: SessionState | null;
    try {
      session = await dependencies.sessionStore.load(sessionId);
    } catch (error) {
      return toFailedResultBeforeStart(sessionId, new UnexpectedExecutionError(error));
    }

    if (!session) {
      return toFailedResultBeforeStart(sessionId, new SessionNotFoundError(sessionId));
    }

    if (session.graphId !== graph.id || session.graphVersion !== graph.version) {
      return toFailedResultBeforeStart(
        sessionId,
        new VersionMismatchError(
          sessionId,
          { graphId: graph.id, graphVersion: graph.version },
          { graphId: session.graphId, graphVersion: session.graphVersion },
        ),
      );
    }

    const prepared = prepareGraph(graph, params.goal);
    if (!prepared.ok) {
      return toFailedResultBeforeStart(sessionId, prepared.error);
    }

    const pausedSession = session;
    const state = restoreRunState(pausedSession, prepared.index, prepared.goal);

    return drive(
      state,
      async () => {
        state.status = transitionRun(state.status, 'running');
        if (params.input) {
          state.context.apply(params.input);
        }
        await emit(state.runId, {
          type: 'run_started',
          graphId: graph.id,
          entryNodeId: pausedSession.pausedAt,
          resumed: true,
        });

        if (pausedSession.pauseReason === 'interrupted') {
          return { ok: true };
        }

        // The pause node already ran; its targets queue behind any pending fan-out branches.
        return route(state, pausedSession.pausedAt, {
          status: 'succeeded',
          contextPatch: {},
          error: null,
        });
      },
      params.signal,
    );
  }

  return { execute, resume };
}
