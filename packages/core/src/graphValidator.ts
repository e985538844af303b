import type { EdgeSpec, GraphSpec } from '@trellis/shared';
import { parseCondition } from './conditions.js';
import { toErrorMessage } from './errors.js';
import { getEntryPointNodeIds } from './graph.js';

export type GraphValidationResult = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

function findDuplicates(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}

function collectReachable(startIds: Iterable<string>, edges: readonly EdgeSpec[]): Set<string> {
  const adjacency = new Map<string, string[]>();
  for (const edge of edges) {
    const targets = adjacency.get(edge.source);
    if (targets) {
      targets.push(edge.target);
    } else {
      adjacency.set(edge.source, [edge.target]);
    }
  }

  const reachable = new Set<string>();
  const queue = [...startIds];
  while (queue.length > 0) {
    const nodeId = queue.shift();
    if (nodeId === undefined || reachable.has(nodeId)) {
      continue;
    }
    reachable.add(nodeId);
    queue.push(...(adjacency.get(nodeId) ?? []));
  }
  return reachable;
}

function validateEdge(edge: EdgeSpec, nodeIds: ReadonlySet<string>, errors: string[]): void {
  if (!nodeIds.has(edge.source)) {
    errors.push(`Edge "${edge.id}" references unknown source node "${edge.source}".`);
  }
  if (!nodeIds.has(edge.target)) {
    errors.push(`Edge "${edge.id}" references unknown target node "${edge.target}".`);
  }
  if (!Number.isInteger(edge.priority)) {
    errors.push(`Edge "${edge.id}" priority must be an integer.`);
  }

  if (edge.condition !== 'custom') {
    if (edge.conditionExpr !== null) {
      errors.push(`Edge "${edge.id}" declares a condition expression but its condition is "${edge.condition}".`);
    }
    return;
  }

  if (edge.conditionExpr === null || edge.conditionExpr.trim().length === 0) {
    errors.push(`Custom edge "${edge.id}" is missing a condition expression.`);
    return;
  }

  try {
    parseCondition(edge.conditionExpr);
  } catch (error) {
    errors.push(`Custom edge "${edge.id}" has an invalid condition expression: ${toErrorMessage(error)}`);
  }
}

function collectPriorityCollisionWarnings(edges: readonly EdgeSpec[]): string[] {
  const customEdgesByKey = new Map<string, EdgeSpec[]>();
  for (const edge of edges) {
    if (edge.condition !== 'custom') {
      continue;
    }
    const key = `${edge.source}\u0000${edge.priority}`;
    const group = customEdgesByKey.get(key);
    if (group) {
      group.push(edge);
    } else {
      customEdgesByKey.set(key, [edge]);
    }
  }

  const warnings: string[] = [];
  for (const group of customEdgesByKey.values()) {
    if (group.length < 2) {
      continue;
    }
    const [first] = group;
    warnings.push(
      `Custom edges ${group.map(edge => `"${edge.id}"`).join(', ')} from node "${first.source}" share priority ${first.priority}; "${first.id}" wins when several match.`,
    );
  }
  return warnings;
}

export function validateGraph(graph: GraphSpec): GraphValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const nodeIds = new Set(graph.nodes.map(node => node.id));

  for (const duplicate of findDuplicates(graph.nodes.map(node => node.id))) {
    errors.push(`Duplicate node id "${duplicate}".`);
  }
  for (const duplicate of findDuplicates(graph.edges.map(edge => edge.id))) {
    errors.push(`Duplicate edge id "${duplicate}".`);
  }

  for (const node of graph.nodes) {
    if (!Number.isInteger(node.maxRetries) || node.maxRetries < 0) {
      errors.push(`Node "${node.id}" maxRetries must be a non-negative integer.`);
    }
  }

  for (const edge of graph.edges) {
    validateEdge(edge, nodeIds, errors);
  }

  if (!nodeIds.has(graph.entryNode)) {
    errors.push(`Entry node "${graph.entryNode}" is not a node of the graph.`);
  }
  for (const [name, nodeId] of Object.entries(graph.entryPoints)) {
    if (!nodeIds.has(nodeId)) {
      errors.push(`Entry point "${name}" references unknown node "${nodeId}".`);
    }
  }

  for (const nodeId of graph.terminalNodes) {
    if (!nodeIds.has(nodeId)) {
      errors.push(`Terminal node "${nodeId}" is not a node of the graph.`);
    }
  }
  const terminalNodeIds = new Set(graph.terminalNodes);
  for (const nodeId of graph.pauseNodes) {
    if (!nodeIds.has(nodeId)) {
      errors.push(`Pause node "${nodeId}" is not a node of the graph.`);
    }
    if (terminalNodeIds.has(nodeId)) {
      errors.push(`Node "${nodeId}" cannot be both a terminal node and a pause node.`);
    }
  }

  if (nodeIds.has(graph.entryNode)) {
    const reachableFromEntry = collectReachable([graph.entryNode], graph.edges);
    const stopNodes = [...graph.terminalNodes, ...graph.pauseNodes];
    if (!stopNodes.some(nodeId => reachableFromEntry.has(nodeId))) {
      errors.push(`No terminal or pause node is reachable from entry node "${graph.entryNode}".`);
    }

    const reachable = collectReachable(
      [...getEntryPointNodeIds(graph)].filter(nodeId => nodeIds.has(nodeId)),
      graph.edges,
    );
    for (const node of graph.nodes) {
      if (!reachable.has(node.id)) {
        warnings.push(`Node "${node.id}" is not reachable from any entry point.`);
      }
    }
  }

  const sourceNodeIds = new Set(graph.edges.map(edge => edge.source));
  const pauseNodeIds = new Set(graph.pauseNodes);
  for (const node of graph.nodes) {
    if (!terminalNodeIds.has(node.id) && !pauseNodeIds.has(node.id) && !sourceNodeIds.has(node.id)) {
      warnings.push(`Node "${node.id}" has no outgoing edges and is neither terminal nor pause.`);
    }
    if (pauseNodeIds.has(node.id) && !sourceNodeIds.has(node.id)) {
      warnings.push(`Pause node "${node.id}" has no outgoing edges; resuming it will dead-end.`);
    }
  }

  warnings.push(...collectPriorityCollisionWarnings(graph.edges));

  if (graph.outputKeys) {
    const producedKeys = new Set(graph.nodes.flatMap(node => node.outputKeys));
    for (const key of graph.outputKeys) {
      if (!producedKeys.has(key)) {
        warnings.push(`Graph output key "${key}" is not produced by any node.`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
