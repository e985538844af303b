export { DEFAULT_MAX_STEPS } from './constants.js';
export { createGraphExecutor } from './executor.js';
export { collectRunOutput, restoreRunState, toSessionState } from './session-state.js';
export type {
  ExecuteGraphParams,
  ExecutionResult,
  ExecutorConfig,
  FinishedRunStatus,
  GraphExecutor,
  GraphExecutorDependencies,
  GraphRunEvent,
  GraphRunEventPayload,
  ResumeGraphParams,
  RunState,
  TerminalRunStatus,
} from './types.js';
