import type { EdgeSpec, GraphSpec, NodeSpec } from '@trellis/shared';
import { parseCondition, type ConditionExpression } from './conditions.js';

export type GraphIndex = {
  graph: GraphSpec;
  nodesById: ReadonlyMap<string, NodeSpec>;
  // Outgoing edges per node, in evaluation order.
  outgoingEdgesByNodeId: ReadonlyMap<string, EdgeSpec[]>;
  // Parsed custom conditions, keyed by edge id. Scoped to one index.
  conditionsByEdgeId: ReadonlyMap<string, ConditionExpression>;
  entryPointNodeIds: ReadonlySet<string>;
  terminalNodeIds: ReadonlySet<string>;
  pauseNodeIds: ReadonlySet<string>;
};

// Ascending priority; ties keep declaration order.
export function sortEdgesByPriority(edges: readonly EdgeSpec[]): EdgeSpec[] {
  return edges
    .map((edge, index) => ({ edge, index }))
    .sort((a, b) => a.edge.priority - b.edge.priority || a.index - b.index)
    .map(entry => entry.edge);
}

export function getOutgoingEdges(graph: GraphSpec, nodeId: string): EdgeSpec[] {
  return sortEdgesByPriority(graph.edges.filter(edge => edge.source === nodeId));
}

export function getEntryPointNodeIds(graph: GraphSpec): Set<string> {
  return new Set([graph.entryNode, ...Object.values(graph.entryPoints)]);
}

export function resolveEntryNode(graph: GraphSpec, entryPoint?: string): string | null {
  if (entryPoint === undefined) {
    return graph.entryNode;
  }

  if (!Object.prototype.hasOwnProperty.call(graph.entryPoints, entryPoint)) {
    return null;
  }

  return graph.entryPoints[entryPoint];
}

export function indexGraph(graph: GraphSpec): GraphIndex {
  const nodesById = new Map<string, NodeSpec>();
  for (const node of graph.nodes) {
    nodesById.set(node.id, node);
  }

  const outgoingEdgesByNodeId = new Map<string, EdgeSpec[]>();
  for (const node of graph.nodes) {
    outgoingEdgesByNodeId.set(node.id, getOutgoingEdges(graph, node.id));
  }

  const conditionsByEdgeId = new Map<string, ConditionExpression>();
  for (const edge of graph.edges) {
    if (edge.condition === 'custom' && edge.conditionExpr !== null) {
      conditionsByEdgeId.set(edge.id, parseCondition(edge.conditionExpr));
    }
  }

  return {
    graph,
    nodesById,
    outgoingEdgesByNodeId,
    conditionsByEdgeId,
    entryPointNodeIds: getEntryPointNodeIds(graph),
    terminalNodeIds: new Set(graph.terminalNodes),
    pauseNodeIds: new Set(graph.pauseNodes),
  };
}
