// Node kinds understood by step executors; the engine treats them as opaque tags.
export const nodeTypes = ['agentic-step', 'tool-call', 'decision', 'pure-transform'] as const;
export type NodeType = (typeof nodeTypes)[number];

export const edgeConditions = ['always', 'on_success', 'on_failure', 'custom'] as const;
export type EdgeCondition = (typeof edgeConditions)[number];

export const routingModes = ['single', 'fan_out'] as const;
export type RoutingMode = (typeof routingModes)[number];

export const constraintTypes = ['hard', 'soft'] as const;
export type ConstraintType = (typeof constraintTypes)[number];

export type SuccessCriterion = {
  id: string;
  description: string;
  metric: string;
  target: string | number | boolean;
  weight: number;
};

export type Constraint = {
  id: string;
  description: string;
  constraintType: ConstraintType;
  category: string;
};

// Declarative success criteria for a run. Evaluated outside the engine.
export type Goal = {
  id: string;
  name: string;
  description: string;
  successCriteria: SuccessCriterion[];
  constraints: Constraint[];
};

export type NodeSpec = {
  id: string;
  name: string;
  description: string;
  nodeType: NodeType;
  inputKeys: string[];
  outputKeys: string[];
  prompt: string | null;
  tools: string[];
  maxRetries: number;
  inputDefaults?: Record<string, unknown>;
};

export type EdgeSpec = {
  id: string;
  source: string;
  target: string;
  condition: EdgeCondition;
  conditionExpr: string | null;
  priority: number;
};

export type GraphSpec = {
  id: string;
  goalId: string;
  version: string;
  entryNode: string;
  entryPoints: Record<string, string>;
  terminalNodes: string[];
  pauseNodes: string[];
  nodes: NodeSpec[];
  edges: EdgeSpec[];
  routingMode: RoutingMode;
  outputKeys?: string[];
  defaultModel: string | null;
  maxTokens: number | null;
};

export type GraphDocument = {
  goal: Goal;
  graph: GraphSpec;
};
