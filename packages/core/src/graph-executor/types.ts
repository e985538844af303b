import type {
  EdgeTraversal,
  Goal,
  GraphSpec,
  NodeOutcomeStatus,
  PauseReason,
  RunStatus,
  SessionState,
  SessionStore,
  StepExecutor,
} from '@trellis/shared';
import type { ContextStore } from '../contextStore.js';
import type { GraphRunError, GraphRunErrorCode } from '../errors.js';
import type { GraphIndex } from '../graph.js';

export type FinishedRunStatus = Exclude<RunStatus, 'running'>;
export type TerminalRunStatus = Extract<RunStatus, 'succeeded' | 'failed'>;

export type ExecutorConfig = {
  maxSteps?: number;
  nodeTimeoutMs?: number | null;
  // Overrides the graph's defaultModel when set.
  model?: string | null;
};

export type GraphRunEventPayload =
  | {
      type: 'run_started';
      graphId: string;
      entryNodeId: string;
      resumed: boolean;
    }
  | {
      type: 'node_started';
      nodeId: string;
      step: number;
    }
  | {
      type: 'node_attempt_failed';
      nodeId: string;
      attempt: number;
      error: string;
      willRetry: boolean;
    }
  | {
      type: 'node_completed';
      nodeId: string;
      status: NodeOutcomeStatus;
      attempts: number;
      contextVersion: number;
    }
  | {
      type: 'edge_taken';
      edgeId: string;
      source: string;
      target: string;
    }
  | {
      type: 'run_paused';
      nodeId: string;
      reason: PauseReason;
    }
  | {
      type: 'run_finished';
      status: TerminalRunStatus;
      errorCode: GraphRunErrorCode | null;
    };

export type GraphRunEvent = GraphRunEventPayload & {
  runId: string;
  timestamp: string;
};

export type GraphExecutorDependencies = {
  stepExecutor: StepExecutor;
  sessionStore: SessionStore;
  config?: ExecutorConfig;
  onEvent?: (event: GraphRunEvent) => Promise<void> | void;
  onRunTerminal?: (params: {
    runId: string;
    status: TerminalRunStatus;
    error: GraphRunError | null;
  }) => Promise<void> | void;
  now?: () => Date;
  generateRunId?: () => string;
};

export type ExecuteGraphParams = {
  graph: GraphSpec;
  goal: Goal;
  input?: Record<string, unknown>;
  // Name of an entry in graph.entryPoints; the graph's entryNode when omitted.
  entryPoint?: string;
  sessionId?: string;
  signal?: AbortSignal;
};

export type ResumeGraphParams = {
  sessionId: string;
  graph: GraphSpec;
  goal: Goal;
  input?: Record<string, unknown>;
  signal?: AbortSignal;
};

export type ExecutionResult = {
  runId: string;
  status: FinishedRunStatus;
  success: boolean;
  stepsExecuted: number;
  path: string[];
  output: Record<string, unknown>;
  error: GraphRunError | null;
  pausedAt: string | null;
  sessionState: SessionState | null;
};

export type GraphExecutor = {
  execute(params: ExecuteGraphParams): Promise<ExecutionResult>;
  resume(params: ResumeGraphParams): Promise<ExecutionResult>;
};

export type RunState = {
  runId: string;
  index: GraphIndex;
  goal: Readonly<Goal>;
  context: ContextStore;
  retryCounts: Record<string, number>;
  edgeHistory: EdgeTraversal[];
  path: string[];
  stepsExecuted: number;
  frontier: string[];
  status: RunStatus;
};
