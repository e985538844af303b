import { describe, expect, it } from 'vitest';
import { validateGraph } from './graphValidator.js';
import { createTestEdge, createTestGraph, createTestNode } from './test-support.js';

describe('validateGraph', () => {
  it('accepts a linear graph without warnings', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      nodes: [createTestNode('A'), createTestNode('B'), createTestNode('C')],
      edges: [createTestEdge('e1', 'A', 'B'), createTestEdge('e2', 'B', 'C')],
      terminalNodes: ['C'],
    });

    expect(validateGraph(graph)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports structural errors', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      nodes: [createTestNode('A'), createTestNode('A'), createTestNode('B')],
      edges: [
        createTestEdge('e1', 'A', 'X'),
        createTestEdge('e1', 'A', 'B', { condition: 'custom' }),
      ],
      terminalNodes: ['B'],
      pauseNodes: ['B'],
    });

    const result = validateGraph(graph);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Duplicate node id "A".',
      'Duplicate edge id "e1".',
      'Edge "e1" references unknown target node "X".',
      'Custom edge "e1" is missing a condition expression.',
      'Node "B" cannot be both a terminal node and a pause node.',
    ]);
  });

  it('rejects malformed edges, retries and entry points', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      entryPoints: { review: 'Z' },
      nodes: [createTestNode('A', { maxRetries: -1 }), createTestNode('B')],
      edges: [
        createTestEdge('e1', 'A', 'B', { priority: 0.5 }),
        createTestEdge('e2', 'A', 'B', { condition: 'custom', conditionExpr: 'score >' }),
        createTestEdge('e3', 'A', 'B', { conditionExpr: 'score > 1' }),
      ],
      terminalNodes: ['B', 'Q'],
    });

    expect(validateGraph(graph).errors).toEqual([
      'Node "A" maxRetries must be a non-negative integer.',
      'Edge "e1" priority must be an integer.',
      'Custom edge "e2" has an invalid condition expression: Unexpected end of expression (at offset 7)',
      'Edge "e3" declares a condition expression but its condition is "always".',
      'Entry point "review" references unknown node "Z".',
      'Terminal node "Q" is not a node of the graph.',
    ]);
  });

  it('requires a reachable terminal or pause node', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      nodes: [createTestNode('A'), createTestNode('B')],
      edges: [createTestEdge('e1', 'A', 'B')],
    });

    expect(validateGraph(graph).errors).toEqual(['No terminal or pause node is reachable from entry node "A".']);
  });

  it('reports an unknown entry node', () => {
    const graph = createTestGraph({
      entryNode: 'missing',
      nodes: [createTestNode('A')],
      edges: [],
      terminalNodes: ['A'],
    });

    expect(validateGraph(graph).errors).toEqual(['Entry node "missing" is not a node of the graph.']);
  });

  it('warns about unreachable nodes, dead ends, priority ties and unknown output keys', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      nodes: ['A', 'B', 'C', 'D', 'P'].map(id => createTestNode(id)),
      edges: [
        createTestEdge('e1', 'A', 'B', { condition: 'custom', conditionExpr: 'x == 1' }),
        createTestEdge('e2', 'A', 'C', { condition: 'custom', conditionExpr: 'y == 1' }),
        createTestEdge('e3', 'A', 'P', { priority: 1 }),
      ],
      terminalNodes: ['B', 'C'],
      pauseNodes: ['P'],
      outputKeys: ['result'],
    });

    const result = validateGraph(graph);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Node "D" is not reachable from any entry point.',
      'Node "D" has no outgoing edges and is neither terminal nor pause.',
      'Pause node "P" has no outgoing edges; resuming it will dead-end.',
      'Custom edges "e1", "e2" from node "A" share priority 0; "e1" wins when several match.',
      'Graph output key "result" is not produced by any node.',
    ]);
  });

  it('treats alternate entry points as reachability roots', () => {
    const graph = createTestGraph({
      entryNode: 'A',
      entryPoints: { resume: 'R' },
      nodes: [createTestNode('A'), createTestNode('R'), createTestNode('T')],
      edges: [createTestEdge('e1', 'A', 'T'), createTestEdge('e2', 'R', 'T')],
      terminalNodes: ['T'],
    });

    expect(validateGraph(graph).warnings).toEqual([]);
  });
});
