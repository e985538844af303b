import type { Goal, NodeOutcomeStatus, NodeSpec, StepExecutor } from '@trellis/shared';
import type { ContextStore } from './contextStore.js';
import { PreconditionError, StepExecutionError, toErrorMessage } from './errors.js';

export type NodeOutcome = {
  status: NodeOutcomeStatus;
  nodeId: string;
  contextPatch: Record<string, unknown>;
  error: PreconditionError | StepExecutionError | null;
  attempts: number;
  retryCount: number;
  retriesExhausted: boolean;
};

export type NodeInterruption = {
  status: 'interrupted';
  nodeId: string;
  attempts: number;
  retryCount: number;
};

export type NodeAttemptFailure = {
  nodeId: string;
  attempt: number;
  error: string;
  willRetry: boolean;
};

export type RunNodeParams = {
  runId: string;
  node: NodeSpec;
  context: ContextStore;
  stepExecutor: StepExecutor;
  goal: Readonly<Goal>;
  model: string | null;
  maxTokens: number | null;
  isEntryPoint: boolean;
  // Retries already spent on this node during the run.
  retryCount: number;
  maxAttempts?: number;
  timeoutMs?: number | null;
  signal?: AbortSignal;
  onAttemptFailed?: (failure: NodeAttemptFailure) => Promise<void> | void;
};

type ContextView =
  | {
      ok: true;
      view: Record<string, unknown>;
    }
  | {
      ok: false;
      missingKeys: string[];
    };

type AttemptResult =
  | {
      ok: true;
      output: Record<string, unknown>;
    }
  | {
      ok: false;
      message: string;
      cause?: unknown;
    };

export function buildContextView(node: NodeSpec, context: ContextStore, isEntryPoint: boolean): ContextView {
  const view: Record<string, unknown> = {};
  const missingKeys: string[] = [];
  const defaults = node.inputDefaults ?? {};

  for (const key of node.inputKeys) {
    if (context.has(key)) {
      view[key] = context.get(key);
      continue;
    }

    if (!isEntryPoint) {
      missingKeys.push(key);
      continue;
    }

    if (Object.prototype.hasOwnProperty.call(defaults, key)) {
      view[key] = defaults[key];
    }
  }

  if (missingKeys.length > 0) {
    return { ok: false, missingKeys };
  }

  return { ok: true, view };
}

export function pickDeclaredOutputs(node: NodeSpec, output: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const patch: Record<string, unknown> = {};
  for (const key of node.outputKeys) {
    if (Object.prototype.hasOwnProperty.call(output, key)) {
      patch[key] = output[key];
    }
  }
  return patch;
}

async function invokeStep(params: RunNodeParams, view: Record<string, unknown>, attempt: number): Promise<AttemptResult> {
  const { node } = params;
  const controller = new AbortController();
  const abortFromRun = (): void => controller.abort(params.signal?.reason);
  params.signal?.addEventListener('abort', abortFromRun, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutMs = params.timeoutMs ?? null;
  if (timeoutMs !== null && timeoutMs > 0) {
    timer = setTimeout(
      () => controller.abort(new Error(`Node "${node.id}" timed out after ${timeoutMs}ms.`)),
      timeoutMs,
    );
  }

  try {
    const result = await Promise.race([
      params.stepExecutor.invoke({
        runId: params.runId,
        node,
        context: view,
        tools: node.tools,
        goal: params.goal,
        model: params.model,
        maxTokens: params.maxTokens,
        attempt,
        signal: controller.signal,
      }),
      aborted,
    ]);

    if (result.status === 'failed') {
      return {
        ok: false,
        message: result.error ?? `Step executor reported a failure for node "${node.id}".`,
      };
    }

    return { ok: true, output: result.output };
  } catch (error) {
    return { ok: false, message: toErrorMessage(error), cause: error };
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    params.signal?.removeEventListener('abort', abortFromRun);
  }
}

/**
 * Executes one visit of a node, retrying failed attempts in place while the
 * node's retry allowance lasts. The returned patch is never applied here.
 */
export async function runNode(params: RunNodeParams): Promise<NodeOutcome | NodeInterruption> {
  const { node } = params;
  const contextView = buildContextView(node, params.context, params.isEntryPoint);
  if (!contextView.ok) {
    return {
      status: 'failed',
      nodeId: node.id,
      contextPatch: {},
      error: new PreconditionError(node.id, contextView.missingKeys),
      attempts: 1,
      retryCount: params.retryCount,
      retriesExhausted: false,
    };
  }

  const maxAttempts = Math.max(1, params.maxAttempts ?? Number.POSITIVE_INFINITY);
  let retryCount = Math.min(params.retryCount, node.maxRetries);
  let attempts = 0;

  for (;;) {
    if (params.signal?.aborted) {
      return { status: 'interrupted', nodeId: node.id, attempts, retryCount };
    }

    attempts += 1;
    const result = await invokeStep(params, contextView.view, attempts);

    // The cut attempt is not counted; the node restarts on resume.
    if (params.signal?.aborted) {
      return { status: 'interrupted', nodeId: node.id, attempts: attempts - 1, retryCount };
    }

    if (result.ok) {
      return {
        status: 'succeeded',
        nodeId: node.id,
        contextPatch: pickDeclaredOutputs(node, result.output),
        error: null,
        attempts,
        retryCount,
        retriesExhausted: false,
      };
    }

    const retriesExhausted = retryCount >= node.maxRetries;
    const willRetry = !retriesExhausted && attempts < maxAttempts;
    if (params.onAttemptFailed) {
      await params.onAttemptFailed({
        nodeId: node.id,
        attempt: attempts,
        error: result.message,
        willRetry,
      });
    }

    if (!willRetry) {
      return {
        status: 'failed',
        nodeId: node.id,
        contextPatch: {},
        error: new StepExecutionError(
          node.id,
          `Node "${node.id}" failed after ${attempts} attempt(s): ${result.message}`,
          { attempts, cause: result.cause },
        ),
        attempts,
        retryCount,
        retriesExhausted,
      };
    }

    retryCount += 1;
  }
}
