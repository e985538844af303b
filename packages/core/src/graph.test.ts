import { describe, expect, it } from 'vitest';
import { parseCondition } from './conditions.js';
import { getOutgoingEdges, indexGraph, resolveEntryNode } from './graph.js';
import { createTestEdge, createTestGraph, createTestNode } from './test-support.js';

const graph = createTestGraph({
  entryNode: 'A',
  entryPoints: { review: 'B' },
  nodes: [createTestNode('A'), createTestNode('B'), createTestNode('C')],
  edges: [
    createTestEdge('low', 'A', 'C', { priority: 5 }),
    createTestEdge('high', 'A', 'B', { priority: -1 }),
    createTestEdge('next', 'B', 'C'),
  ],
  terminalNodes: ['C'],
});

describe('graph helpers', () => {
  it('sorts outgoing edges by priority', () => {
    expect(getOutgoingEdges(graph, 'A').map(edge => edge.id)).toEqual(['high', 'low']);
  });

  it('resolves named entry points', () => {
    expect(resolveEntryNode(graph)).toBe('A');
    expect(resolveEntryNode(graph, 'review')).toBe('B');
    expect(resolveEntryNode(graph, 'unknown')).toBeNull();
  });

  it('ignores inherited entry point names', () => {
    expect(resolveEntryNode(graph, 'constructor')).toBeNull();
    expect(resolveEntryNode(graph, 'toString')).toBeNull();
  });

  it('indexes nodes and stop sets', () => {
    const index = indexGraph(graph);

    expect(index.nodesById.get('B')?.id).toBe('B');
    expect([...index.entryPointNodeIds]).toEqual(['A', 'B']);
    expect(index.terminalNodeIds.has('C')).toBe(true);
    expect(index.outgoingEdgesByNodeId.get('A')?.map(edge => edge.id)).toEqual(['high', 'low']);
    expect(index.outgoingEdgesByNodeId.get('C')).toEqual([]);
  });

  it('parses custom conditions once per index', () => {
    const gated = createTestGraph({
      entryNode: 'A',
      nodes: [createTestNode('A'), createTestNode('B')],
      edges: [
        createTestEdge('gate', 'A', 'B', { condition: 'custom', conditionExpr: 'score > 1' }),
        createTestEdge('plain', 'A', 'B', { priority: 1 }),
      ],
      terminalNodes: ['B'],
    });

    const first = indexGraph(gated);
    const second = indexGraph(gated);

    expect([...first.conditionsByEdgeId.keys()]).toEqual(['gate']);
    expect(first.conditionsByEdgeId.get('gate')).toEqual(parseCondition('score > 1'));
    expect(first.conditionsByEdgeId.get('gate')).not.toBe(second.conditionsByEdgeId.get('gate'));
  });
});
