import type { EdgeSpec, NodeOutcomeStatus, RoutingMode } from '@trellis/shared';
import { evaluateExpression, parseCondition, type ConditionExpression, type ConditionScope } from './conditions.js';
import { DeadEndError } from './errors.js';

export type RoutableOutcome = {
  status: NodeOutcomeStatus;
  contextPatch: Readonly<Record<string, unknown>>;
  error: Error | null;
};

export type EdgeResolutionParams = {
  nodeId: string;
  outcome: RoutableOutcome;
  context: Readonly<Record<string, unknown>>;
  // Outgoing edges of `nodeId`, already in evaluation order.
  outgoingEdges: readonly EdgeSpec[];
  mode?: RoutingMode;
  // Parsed custom conditions by edge id. Edges without an entry are parsed on demand.
  conditions?: ReadonlyMap<string, ConditionExpression>;
};

export function toConditionScope(
  outcome: RoutableOutcome,
  context: Readonly<Record<string, unknown>>,
): ConditionScope {
  return {
    context,
    outcome: {
      status: outcome.status,
      error: outcome.error?.message ?? null,
      output: outcome.contextPatch,
    },
  };
}

export function doesEdgeMatch(
  edge: EdgeSpec,
  scope: ConditionScope,
  conditions?: ReadonlyMap<string, ConditionExpression>,
): boolean {
  switch (edge.condition) {
    case 'always':
      return true;
    case 'on_success':
      return scope.outcome.status === 'succeeded';
    case 'on_failure':
      return scope.outcome.status === 'failed';
    case 'custom':
      if (edge.conditionExpr === null) {
        throw new Error(`Custom edge "${edge.id}" is missing a condition expression.`);
      }
      return Boolean(evaluateExpression(conditions?.get(edge.id) ?? parseCondition(edge.conditionExpr), scope));
  }
}

/**
 * Outgoing edges that match, in the order given. Single mode returns at most
 * the first match.
 */
export function selectMatchingEdges(params: EdgeResolutionParams): EdgeSpec[] {
  const mode = params.mode ?? 'single';
  const scope = toConditionScope(params.outcome, params.context);

  const matched: EdgeSpec[] = [];
  for (const edge of params.outgoingEdges) {
    if (!doesEdgeMatch(edge, scope, params.conditions)) {
      continue;
    }
    matched.push(edge);
    if (mode === 'single') {
      break;
    }
  }
  return matched;
}

export function resolveNextNodes(
  params: EdgeResolutionParams & {
    stopNodeIds?: ReadonlySet<string>;
  },
): string[] {
  const matched = selectMatchingEdges(params);
  if (matched.length === 0 && !params.stopNodeIds?.has(params.nodeId)) {
    throw new DeadEndError(params.nodeId);
  }

  return matched.map(edge => edge.target);
}
