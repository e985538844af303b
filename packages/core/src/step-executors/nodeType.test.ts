import { describe, expect, it } from 'vitest';
import { createTestInvocation, createTestNode } from '../test-support.js';
import { createFunctionStepExecutor } from './function.js';
import { createMockStepExecutor } from './mock.js';
import { createNodeTypeStepExecutor } from './nodeType.js';

describe('createNodeTypeStepExecutor', () => {
  it('routes invocations by node type', async () => {
    const transform = createFunctionStepExecutor({ upper: () => ({ text: 'HELLO' }) });
    const executor = createNodeTypeStepExecutor({ 'pure-transform': transform });

    await expect(
      executor.invoke(createTestInvocation(createTestNode('upper', { nodeType: 'pure-transform' }))),
    ).resolves.toEqual({ status: 'succeeded', output: { text: 'HELLO' } });
  });

  it('falls back when no executor handles the type', async () => {
    const fallback = createMockStepExecutor();
    const executor = createNodeTypeStepExecutor({}, fallback);

    await executor.invoke(createTestInvocation(createTestNode('decide', { nodeType: 'decision' })));

    expect(fallback.getInvocations().map(invocation => invocation.node.id)).toEqual(['decide']);
  });

  it('fails unhandled types without a fallback', async () => {
    const executor = createNodeTypeStepExecutor({});

    await expect(
      executor.invoke(createTestInvocation(createTestNode('call', { nodeType: 'tool-call' }))),
    ).resolves.toEqual({
      status: 'failed',
      output: {},
      error: 'No step executor handles node type "tool-call".',
    });
  });
});
