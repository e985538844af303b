export { ContextStore } from './contextStore.js';
export { attachGoal, getGoalWeightTotal, getHardConstraints } from './goal.js';
export {
  getEntryPointNodeIds,
  getOutgoingEdges,
  indexGraph,
  resolveEntryNode,
  sortEdgesByPriority,
  type GraphIndex,
} from './graph.js';
export {
  ConditionSyntaxError,
  evaluateCondition,
  evaluateExpression,
  parseCondition,
  type ComparisonOperator,
  type ConditionExpression,
  type ConditionScope,
} from './conditions.js';
export { validateGraph, type GraphValidationResult } from './graphValidator.js';
export {
  buildContextView,
  pickDeclaredOutputs,
  runNode,
  type NodeAttemptFailure,
  type NodeInterruption,
  type NodeOutcome,
  type RunNodeParams,
} from './nodeRunner.js';
export {
  doesEdgeMatch,
  resolveNextNodes,
  selectMatchingEdges,
  toConditionScope,
  type EdgeResolutionParams,
  type RoutableOutcome,
} from './edgeResolver.js';
export { canTransitionRun, transitionRun } from './stateMachine.js';
export {
  DeadEndError,
  ExecutionCancelledError,
  GraphRunError,
  GraphValidationError,
  PreconditionError,
  SessionNotFoundError,
  SessionPersistenceError,
  StepBudgetExceededError,
  StepExecutionError,
  toErrorMessage,
  UnexpectedExecutionError,
  VersionMismatchError,
  type GraphRunErrorCode,
} from './errors.js';
export { createInMemorySessionStore, toSessionSummary } from './sessionStore.js';
export { GraphDocumentError, parseGoal, parseGraphDocument, parseGraphSpec } from './graphDocument.js';
export * from './graph-executor/index.js';
export * from './step-executors/index.js';
