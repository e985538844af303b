import type { NodeSpec } from '@trellis/shared';
import { describe, expect, it } from 'vitest';
import { ContextStore } from './contextStore.js';
import { PreconditionError, StepExecutionError } from './errors.js';
import { buildContextView, runNode, type NodeAttemptFailure, type RunNodeParams } from './nodeRunner.js';
import { createFunctionStepExecutor } from './step-executors/function.js';
import { createMockStepExecutor } from './step-executors/mock.js';
import { createTestGoal, createTestNode } from './test-support.js';

function createParams(node: NodeSpec, overrides: Partial<RunNodeParams> = {}): RunNodeParams {
  return {
    runId: 'run-1',
    node,
    context: new ContextStore(),
    stepExecutor: createMockStepExecutor(),
    goal: createTestGoal(),
    model: null,
    maxTokens: null,
    isEntryPoint: false,
    retryCount: 0,
    ...overrides,
  };
}

describe('buildContextView', () => {
  it('fills entry-point inputs from defaults and omits keys missing from both', () => {
    const node = createTestNode('start', {
      inputKeys: ['topic', 'depth', 'extra'],
      inputDefaults: { depth: 2 },
    });

    expect(buildContextView(node, new ContextStore({ topic: 'graphs' }), true)).toEqual({
      ok: true,
      view: { topic: 'graphs', depth: 2 },
    });
  });

  it('prefers context values over defaults', () => {
    const node = createTestNode('start', { inputKeys: ['depth'], inputDefaults: { depth: 2 } });

    expect(buildContextView(node, new ContextStore({ depth: 5 }), true)).toEqual({ ok: true, view: { depth: 5 } });
  });

  it('lists missing keys for other nodes', () => {
    const node = createTestNode('review', { inputKeys: ['draft', 'plan', 'notes'] });

    expect(buildContextView(node, new ContextStore({ plan: 'p' }), false)).toEqual({
      ok: false,
      missingKeys: ['draft', 'notes'],
    });
  });
});

describe('runNode', () => {
  it('fails a precondition without invoking the step executor', async () => {
    const stepExecutor = createMockStepExecutor();
    const node = createTestNode('B', { inputKeys: ['plan'], maxRetries: 3 });

    const outcome = await runNode(createParams(node, { stepExecutor }));

    expect(outcome.status).toBe('failed');
    expect(outcome.attempts).toBe(1);
    expect(outcome.retryCount).toBe(0);
    expect(stepExecutor.getInvocations()).toHaveLength(0);
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(PreconditionError);
      expect(outcome.error?.message).toBe('Node "B" is missing required context keys: plan.');
      expect(outcome.retriesExhausted).toBe(false);
    }
  });

  it('restricts the patch to declared output keys and leaves the context untouched', async () => {
    const context = new ContextStore({ topic: 'graphs' });
    const node = createTestNode('A', { inputKeys: ['topic'], outputKeys: ['plan', 'risks'] });
    const stepExecutor = createFunctionStepExecutor({
      A: invocation => ({ plan: `plan for ${String(invocation.context.topic)}`, secret: 'hidden' }),
    });

    const outcome = await runNode(createParams(node, { context, stepExecutor }));

    expect(outcome.status).toBe('succeeded');
    if (outcome.status === 'succeeded') {
      expect(outcome.contextPatch).toEqual({ plan: 'plan for graphs' });
    }
    expect(context.snapshot()).toEqual({ topic: 'graphs' });
    expect(context.version).toBe(0);
  });

  it('passes only declared inputs, tools and model metadata to the step executor', async () => {
    const stepExecutor = createMockStepExecutor();
    const node = createTestNode('A', { inputKeys: ['topic'], tools: ['search'] });

    await runNode(
      createParams(node, {
        context: new ContextStore({ topic: 'graphs', other: 1 }),
        stepExecutor,
        model: 'test-model',
        maxTokens: 256,
      }),
    );

    const [invocation] = stepExecutor.getInvocations();
    expect(invocation.context).toEqual({ topic: 'graphs' });
    expect(invocation.tools).toEqual(['search']);
    expect(invocation.model).toBe('test-model');
    expect(invocation.maxTokens).toBe(256);
    expect(invocation.attempt).toBe(1);
  });

  it('retries failed attempts in place while retries remain', async () => {
    const failures: NodeAttemptFailure[] = [];
    const stepExecutor = createMockStepExecutor({
      responses: {
        B: [
          { status: 'failed', error: 'flaky' },
          { status: 'failed', error: 'flaky' },
          { status: 'succeeded', output: { draft: 'd' } },
        ],
      },
    });
    const node = createTestNode('B', { outputKeys: ['draft'], maxRetries: 2 });

    const outcome = await runNode(
      createParams(node, {
        stepExecutor,
        onAttemptFailed: failure => {
          failures.push(failure);
        },
      }),
    );

    expect(outcome).toMatchObject({ status: 'succeeded', attempts: 3, retryCount: 2, contextPatch: { draft: 'd' } });
    expect(failures).toEqual([
      { nodeId: 'B', attempt: 1, error: 'flaky', willRetry: true },
      { nodeId: 'B', attempt: 2, error: 'flaky', willRetry: true },
    ]);
    expect(stepExecutor.getInvocations().map(invocation => invocation.attempt)).toEqual([1, 2, 3]);
  });

  it('stops after maxRetries + 1 attempts', async () => {
    const stepExecutor = createMockStepExecutor({ responses: { B: [{ status: 'failed', error: 'boom' }] } });
    const node = createTestNode('B', { maxRetries: 1 });

    const outcome = await runNode(createParams(node, { stepExecutor }));

    expect(outcome).toMatchObject({ status: 'failed', attempts: 2, retryCount: 1, retriesExhausted: true });
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(StepExecutionError);
      expect(outcome.error?.message).toBe('Node "B" failed after 2 attempt(s): boom');
    }
  });

  it('does not retry once the carried-over retry count reaches the cap', async () => {
    const stepExecutor = createMockStepExecutor({ responses: { B: [{ status: 'failed' }] } });
    const node = createTestNode('B', { maxRetries: 1 });

    const outcome = await runNode(createParams(node, { stepExecutor, retryCount: 1 }));

    expect(outcome).toMatchObject({ status: 'failed', attempts: 1, retryCount: 1, retriesExhausted: true });
    if (outcome.status === 'failed') {
      expect(outcome.error?.message).toBe(
        'Node "B" failed after 1 attempt(s): Step executor reported a failure for node "B".',
      );
    }
  });

  it('stops retrying when the attempt allowance runs out', async () => {
    const stepExecutor = createMockStepExecutor({ responses: { B: [{ status: 'failed', error: 'boom' }] } });
    const node = createTestNode('B', { maxRetries: 5 });

    const outcome = await runNode(createParams(node, { stepExecutor, maxAttempts: 2 }));

    expect(outcome).toMatchObject({ status: 'failed', attempts: 2, retryCount: 1, retriesExhausted: false });
  });

  it('treats a thrown error as a failed attempt', async () => {
    const stepExecutor = createFunctionStepExecutor({
      B: () => {
        throw new Error('kaput');
      },
    });

    const outcome = await runNode(createParams(createTestNode('B'), { stepExecutor }));

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error?.message).toBe('Node "B" failed after 1 attempt(s): kaput');
    }
  });

  it('fails an attempt that outlives the node timeout', async () => {
    const stepExecutor = createMockStepExecutor({ responses: { B: [{ status: 'succeeded', delayMs: 1_000 }] } });

    const outcome = await runNode(createParams(createTestNode('B'), { stepExecutor, timeoutMs: 5 }));

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error?.message).toBe('Node "B" failed after 1 attempt(s): Node "B" timed out after 5ms.');
    }
    expect(stepExecutor.getInvocations()[0].signal.aborted).toBe(true);
  });

  it('reports an interruption when the run signal aborts mid-attempt', async () => {
    const controller = new AbortController();
    const stepExecutor = createMockStepExecutor({ responses: { B: [{ status: 'succeeded', delayMs: 1_000 }] } });
    setTimeout(() => controller.abort(), 5);

    const outcome = await runNode(
      createParams(createTestNode('B', { maxRetries: 2 }), { stepExecutor, signal: controller.signal }),
    );

    expect(outcome).toEqual({ status: 'interrupted', nodeId: 'B', attempts: 0, retryCount: 0 });
  });
});
