import type { EdgeSpec, Goal, GraphSpec, NodeSpec, StepInvocation } from '@trellis/shared';

export function createTestNode(id: string, overrides: Partial<NodeSpec> = {}): NodeSpec {
  return {
    id,
    name: id,
    description: '',
    nodeType: 'agentic-step',
    inputKeys: [],
    outputKeys: [],
    prompt: null,
    tools: [],
    maxRetries: 0,
    ...overrides,
  };
}

export function createTestEdge(
  id: string,
  source: string,
  target: string,
  overrides: Partial<EdgeSpec> = {},
): EdgeSpec {
  return {
    id,
    source,
    target,
    condition: 'always',
    conditionExpr: null,
    priority: 0,
    ...overrides,
  };
}

export function createTestGoal(overrides: Partial<Goal> = {}): Goal {
  return {
    id: 'goal-1',
    name: 'Test goal',
    description: 'Goal used by engine tests.',
    successCriteria: [],
    constraints: [],
    ...overrides,
  };
}

export function createTestGraph(
  params: Pick<GraphSpec, 'entryNode' | 'nodes' | 'edges'> & Partial<GraphSpec>,
): GraphSpec {
  return {
    id: 'graph-1',
    goalId: 'goal-1',
    version: '1',
    entryPoints: {},
    terminalNodes: [],
    pauseNodes: [],
    routingMode: 'single',
    defaultModel: null,
    maxTokens: null,
    ...params,
  };
}

export function createTestInvocation(node: NodeSpec, overrides: Partial<StepInvocation> = {}): StepInvocation {
  return {
    runId: 'run-1',
    node,
    context: {},
    tools: node.tools,
    goal: createTestGoal(),
    model: null,
    maxTokens: null,
    attempt: 1,
    signal: new AbortController().signal,
    ...overrides,
  };
}
