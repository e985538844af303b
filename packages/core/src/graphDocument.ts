import {
  constraintTypes,
  edgeConditions,
  isRecord,
  nodeTypes,
  routingModes,
  type Constraint,
  type EdgeSpec,
  type Goal,
  type GraphDocument,
  type GraphSpec,
  type NodeSpec,
  type SuccessCriterion,
} from '@trellis/shared';

export class GraphDocumentError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'GraphDocumentError';
    this.path = path;
  }
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new GraphDocumentError(path, 'expected an object.');
  }
  return value;
}

function readString(source: Record<string, unknown>, key: string, path: string, fallback?: string): string {
  const value = source[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || (fallback === undefined && value.length === 0)) {
    throw new GraphDocumentError(`${path}.${key}`, 'expected a non-empty string.');
  }
  return value;
}

function readNullableString(source: Record<string, unknown>, key: string, path: string): string | null {
  const value = source[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new GraphDocumentError(`${path}.${key}`, 'expected a string or null.');
  }
  return value;
}

function readStringArray(source: Record<string, unknown>, key: string, path: string): string[] {
  const value = source[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new GraphDocumentError(`${path}.${key}`, 'expected an array of strings.');
  }

  return value.map((entry: unknown, index) => {
    if (typeof entry !== 'string') {
      throw new GraphDocumentError(`${path}.${key}[${index}]`, 'expected a string.');
    }
    return entry;
  });
}

function readNumber(source: Record<string, unknown>, key: string, path: string, fallback: number): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new GraphDocumentError(`${path}.${key}`, 'expected a finite number.');
  }
  return value;
}

function readNullableNumber(source: Record<string, unknown>, key: string, path: string): number | null {
  const value = source[key];
  if (value === undefined || value === null) {
    return null;
  }
  return readNumber(source, key, path, 0);
}

function readOneOf<T extends string>(
  source: Record<string, unknown>,
  key: string,
  path: string,
  allowed: readonly T[],
  fallback?: T,
): T {
  const value = source[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }

  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new GraphDocumentError(`${path}.${key}`, `expected one of: ${allowed.join(', ')}.`);
  }
  return match;
}

function readArray<T>(
  source: Record<string, unknown>,
  key: string,
  path: string,
  parseEntry: (value: unknown, path: string) => T,
): T[] {
  const value = source[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new GraphDocumentError(`${path}.${key}`, 'expected an array.');
  }
  return value.map((entry: unknown, index) => parseEntry(entry, `${path}.${key}[${index}]`));
}

function parseSuccessCriterion(value: unknown, path: string): SuccessCriterion {
  const source = expectRecord(value, path);
  const target = source.target;
  if (typeof target !== 'string' && typeof target !== 'number' && typeof target !== 'boolean') {
    throw new GraphDocumentError(`${path}.target`, 'expected a string, number or boolean.');
  }

  return {
    id: readString(source, 'id', path),
    description: readString(source, 'description', path, ''),
    metric: readString(source, 'metric', path),
    target,
    weight: readNumber(source, 'weight', path, 1),
  };
}

function parseConstraint(value: unknown, path: string): Constraint {
  const source = expectRecord(value, path);
  return {
    id: readString(source, 'id', path),
    description: readString(source, 'description', path, ''),
    constraintType: readOneOf(source, 'constraintType', path, constraintTypes, 'hard'),
    category: readString(source, 'category', path, 'general'),
  };
}

export function parseGoal(value: unknown, path = '$'): Goal {
  const source = expectRecord(value, path);
  const id = readString(source, 'id', path);
  return {
    id,
    name: readString(source, 'name', path, id),
    description: readString(source, 'description', path, ''),
    successCriteria: readArray(source, 'successCriteria', path, parseSuccessCriterion),
    constraints: readArray(source, 'constraints', path, parseConstraint),
  };
}

function parseNode(value: unknown, path: string): NodeSpec {
  const source = expectRecord(value, path);
  const id = readString(source, 'id', path);
  const node: NodeSpec = {
    id,
    name: readString(source, 'name', path, id),
    description: readString(source, 'description', path, ''),
    nodeType: readOneOf(source, 'nodeType', path, nodeTypes, 'agentic-step'),
    inputKeys: readStringArray(source, 'inputKeys', path),
    outputKeys: readStringArray(source, 'outputKeys', path),
    prompt: readNullableString(source, 'prompt', path),
    tools: readStringArray(source, 'tools', path),
    maxRetries: readNumber(source, 'maxRetries', path, 0),
  };

  if (source.inputDefaults !== undefined) {
    node.inputDefaults = expectRecord(source.inputDefaults, `${path}.inputDefaults`);
  }
  return node;
}

function parseEdge(value: unknown, path: string): EdgeSpec {
  const source = expectRecord(value, path);
  return {
    id: readString(source, 'id', path),
    source: readString(source, 'source', path),
    target: readString(source, 'target', path),
    condition: readOneOf(source, 'condition', path, edgeConditions, 'always'),
    conditionExpr: readNullableString(source, 'conditionExpr', path),
    priority: readNumber(source, 'priority', path, 0),
  };
}

function parseEntryPoints(value: unknown, path: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }

  const source = expectRecord(value, path);
  const entryPoints: Record<string, string> = {};
  for (const [name, nodeId] of Object.entries(source)) {
    if (typeof nodeId !== 'string') {
      throw new GraphDocumentError(`${path}.${name}`, 'expected a node id.');
    }
    entryPoints[name] = nodeId;
  }
  return entryPoints;
}

/**
 * Checks the shape of a graph definition. Structural rules (dangling edges,
 * reachability and so on) belong to `validateGraph`.
 */
export function parseGraphSpec(value: unknown, path = '$'): GraphSpec {
  const source = expectRecord(value, path);
  const graph: GraphSpec = {
    id: readString(source, 'id', path),
    goalId: readString(source, 'goalId', path),
    version: readString(source, 'version', path),
    entryNode: readString(source, 'entryNode', path),
    entryPoints: parseEntryPoints(source.entryPoints, `${path}.entryPoints`),
    terminalNodes: readStringArray(source, 'terminalNodes', path),
    pauseNodes: readStringArray(source, 'pauseNodes', path),
    nodes: readArray(source, 'nodes', path, parseNode),
    edges: readArray(source, 'edges', path, parseEdge),
    routingMode: readOneOf(source, 'routingMode', path, routingModes, 'single'),
    defaultModel: readNullableString(source, 'defaultModel', path),
    maxTokens: readNullableNumber(source, 'maxTokens', path),
  };

  if (source.outputKeys !== undefined) {
    graph.outputKeys = readStringArray(source, 'outputKeys', path);
  }
  return graph;
}

export function parseGraphDocument(value: unknown): GraphDocument {
  const source = expectRecord(value, '$');
  return {
    goal: parseGoal(source.goal, '$.goal'),
    graph: parseGraphSpec(source.graph, '$.graph'),
  };
}
