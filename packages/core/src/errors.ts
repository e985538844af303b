export type GraphRunErrorCode =
  | 'PRECONDITION_FAILED'
  | 'STEP_EXECUTION_FAILED'
  | 'DEAD_END'
  | 'STEP_BUDGET_EXCEEDED'
  | 'VERSION_MISMATCH'
  | 'GRAPH_INVALID'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_PERSISTENCE_FAILED'
  | 'EXECUTION_CANCELLED'
  | 'UNEXPECTED_ERROR';

export class GraphRunError extends Error {
  readonly code: GraphRunErrorCode;
  readonly nodeId: string | null;

  constructor(
    code: GraphRunErrorCode,
    message: string,
    options: {
      nodeId?: string | null;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = 'GraphRunError';
    this.code = code;
    this.nodeId = options.nodeId ?? null;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class PreconditionError extends GraphRunError {
  readonly missingKeys: string[];

  constructor(nodeId: string, missingKeys: string[]) {
    super(
      'PRECONDITION_FAILED',
      `Node "${nodeId}" is missing required context keys: ${missingKeys.join(', ')}.`,
      { nodeId },
    );
    this.name = 'PreconditionError';
    this.missingKeys = missingKeys;
  }
}

export class StepExecutionError extends GraphRunError {
  readonly attempts: number;

  constructor(nodeId: string, message: string, options: { attempts: number; cause?: unknown }) {
    super('STEP_EXECUTION_FAILED', message, { nodeId, cause: options.cause });
    this.name = 'StepExecutionError';
    this.attempts = options.attempts;
  }
}

export class DeadEndError extends GraphRunError {
  constructor(nodeId: string) {
    super('DEAD_END', `No outgoing edge of node "${nodeId}" matched its outcome.`, { nodeId });
    this.name = 'DeadEndError';
  }
}

export class StepBudgetExceededError extends GraphRunError {
  readonly maxSteps: number;

  constructor(maxSteps: number, nodeId: string | null) {
    super('STEP_BUDGET_EXCEEDED', `Run exceeded the step budget of ${maxSteps} steps.`, { nodeId });
    this.name = 'StepBudgetExceededError';
    this.maxSteps = maxSteps;
  }
}

export class VersionMismatchError extends GraphRunError {
  readonly expected: { graphId: string; graphVersion: string };
  readonly actual: { graphId: string; graphVersion: string };

  constructor(
    sessionId: string,
    expected: { graphId: string; graphVersion: string },
    actual: { graphId: string; graphVersion: string },
  ) {
    super(
      'VERSION_MISMATCH',
      `Session "${sessionId}" was saved for graph "${actual.graphId}"@${actual.graphVersion} and cannot resume on "${expected.graphId}"@${expected.graphVersion}.`,
    );
    this.name = 'VersionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class GraphValidationError extends GraphRunError {
  readonly errors: string[];

  constructor(graphId: string, errors: string[]) {
    super('GRAPH_INVALID', `Graph "${graphId}" failed validation: ${errors.join('; ')}`);
    this.name = 'GraphValidationError';
    this.errors = errors;
  }
}

export class SessionNotFoundError extends GraphRunError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session "${sessionId}" was not found.`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionPersistenceError extends GraphRunError {
  constructor(sessionId: string, nodeId: string, cause: unknown) {
    super('SESSION_PERSISTENCE_FAILED', `Failed to persist session "${sessionId}".`, { nodeId, cause });
    this.name = 'SessionPersistenceError';
  }
}

export class ExecutionCancelledError extends GraphRunError {
  constructor(nodeId: string) {
    super('EXECUTION_CANCELLED', `Execution was cancelled at node "${nodeId}".`, { nodeId });
    this.name = 'ExecutionCancelledError';
  }
}

export class UnexpectedExecutionError extends GraphRunError {
  constructor(cause: unknown) {
    super('UNEXPECTED_ERROR', `Unexpected execution failure: ${toErrorMessage(cause)}`, { cause });
    this.name = 'UnexpectedExecutionError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
