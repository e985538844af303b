import { describe, it, expect } from 'vitest';
import {
  SESSION_STATE_SCHEMA_VERSION,
  assertSessionStateSerializable,
  compareStringsByCodeUnit,
  edgeConditions,
  findNonJsonValue,
  isRecord,
  nodeTypes,
  pauseReasons,
  routingModes,
  type GraphSpec,
  type RunStatus,
  type SessionState,
} from './index.js';

describe('shared types', () => {
  it('should allow valid run statuses', () => {
    const statuses: RunStatus[] = ['running', 'paused', 'succeeded', 'failed'];
    expect(statuses).toHaveLength(4);
  });

  it('should list the supported node, edge and routing vocabularies', () => {
    expect(nodeTypes).toEqual(['agentic-step', 'tool-call', 'decision', 'pure-transform']);
    expect(edgeConditions).toEqual(['always', 'on_success', 'on_failure', 'custom']);
    expect(routingModes).toEqual(['single', 'fan_out']);
    expect(pauseReasons).toEqual(['pause_node', 'interrupted']);
  });

  it('should type-check a graph spec', () => {
    const graph: GraphSpec = {
      id: 'review-graph',
      goalId: 'ship-review',
      version: '1',
      entryNode: 'draft',
      entryPoints: {},
      terminalNodes: ['publish'],
      pauseNodes: [],
      nodes: [
        {
          id: 'draft',
          name: 'Draft',
          description: 'Write a draft',
          nodeType: 'agentic-step',
          inputKeys: [],
          outputKeys: ['draft'],
          prompt: 'Write it',
          tools: [],
          maxRetries: 2,
        },
        {
          id: 'publish',
          name: 'Publish',
          description: 'Publish the draft',
          nodeType: 'tool-call',
          inputKeys: ['draft'],
          outputKeys: ['url'],
          prompt: null,
          tools: ['publisher'],
          maxRetries: 0,
        },
      ],
      edges: [
        { id: 'draft-publish', source: 'draft', target: 'publish', condition: 'on_success', conditionExpr: null, priority: 0 },
      ],
      routingMode: 'single',
      defaultModel: null,
      maxTokens: null,
    };

    expect(graph.nodes).toHaveLength(2);
    expect(graph.edges[0].condition).toBe('on_success');
  });

  it('should type-check a session state', () => {
    const state: SessionState = {
      schemaVersion: SESSION_STATE_SCHEMA_VERSION,
      sessionId: 'session-1',
      graphId: 'review-graph',
      graphVersion: '1',
      goalId: 'ship-review',
      pausedAt: 'approve',
      pauseReason: 'pause_node',
      queuedNodeIds: [],
      context: { draft: 'text' },
      contextVersion: 2,
      retryCounts: {},
      edgeHistory: [],
      path: ['draft', 'approve'],
      stepsExecuted: 2,
      savedAt: '2026-01-01T00:00:00.000Z',
    };

    expect(state.schemaVersion).toBe(1);
  });

  it('orders strings by UTF-16 code unit', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareStringsByCodeUnit)).toEqual(['A', 'B', 'a', 'b']);
    expect(compareStringsByCodeUnit('same', 'same')).toBe(0);
  });

  it('recognizes plain records', () => {
    expect(isRecord({ key: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('text')).toBe(false);
  });

  describe('JSON fidelity', () => {
    it('accepts plain JSON values, shared branches included', () => {
      const shared = { title: 'v1' };

      expect(findNonJsonValue({ a: [1, 'x', true, null], b: shared, c: shared }, 'context')).toBeNull();
      expect(findNonJsonValue(Object.assign(Object.create(null), { x: 1 }), 'context')).toBeNull();
    });

    it('points at values JSON would drop or change', () => {
      expect(findNonJsonValue({ a: [1, { b: undefined }] }, 'context')).toBe('context.a[1].b is undefined');
      expect(findNonJsonValue({ n: Number.NaN }, 'context')).toBe('context.n is NaN');
      expect(findNonJsonValue({ n: -Infinity }, 'context')).toBe('context.n is -Infinity');
      expect(findNonJsonValue({ stamp: new Date('2026-01-01T00:00:00.000Z') }, 'context')).toBe(
        'context.stamp is not a plain object (Date)',
      );
      expect(findNonJsonValue({ lookup: new Map() }, 'context')).toBe('context.lookup is not a plain object (Map)');
      expect(findNonJsonValue({ fn: () => 1 }, 'context')).toBe('context.fn is function');
      expect(findNonJsonValue({ list: new Array<number>(2) }, 'context')).toBe('context.list[0] is an empty array slot');
    });

    it('reports circular references', () => {
      const loop: Record<string, unknown> = {};
      loop.self = loop;

      expect(findNonJsonValue(loop, 'context')).toBe('context.self is a circular reference');
    });

    it('refuses session states whose context would not survive JSON', () => {
      const state: SessionState = {
        schemaVersion: SESSION_STATE_SCHEMA_VERSION,
        sessionId: 'session-1',
        graphId: 'review-graph',
        graphVersion: '1',
        goalId: 'ship-review',
        pausedAt: 'approve',
        pauseReason: 'pause_node',
        queuedNodeIds: [],
        context: { draft: 'text', note: undefined },
        contextVersion: 2,
        retryCounts: {},
        edgeHistory: [],
        path: ['draft', 'approve'],
        stepsExecuted: 2,
        savedAt: '2026-01-01T00:00:00.000Z',
      };

      expect(() => assertSessionStateSerializable(state)).toThrow(
        'Session "session-1" cannot be stored as JSON: context.note is undefined.',
      );
      expect(() => assertSessionStateSerializable({ ...state, context: { draft: 'text' } })).not.toThrow();
    });
  });
});
