import {
  isRecord,
  nodeOutcomeStatuses,
  type NodeOutcomeStatus,
  type NodeSpec,
  type StepExecutor,
  type StepInvocation,
  type StepResult,
} from '@trellis/shared';

export type MockStepResponse = {
  status: NodeOutcomeStatus;
  output?: Record<string, unknown>;
  error?: string;
  // Simulated latency; honours the invocation signal.
  delayMs?: number;
};

export type MockResponses = Record<string, MockStepResponse[]>;

export type MockStepExecutorOptions = {
  responses?: MockResponses;
  defaultOutput?: (node: NodeSpec) => Record<string, unknown>;
};

export type MockStepExecutor = StepExecutor & {
  getInvocations(): StepInvocation[];
};

export function createMockOutput(node: NodeSpec): Record<string, unknown> {
  return Object.fromEntries(node.outputKeys.map(key => [key, `mock:${node.id}:${key}`]));
}

function wait(delayMs: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Scripted executor for tests and dry runs. Each node's responses are consumed
 * in order and the last one repeats; unscripted nodes succeed with
 * `defaultOutput`.
 */
export function createMockStepExecutor(options: MockStepExecutorOptions = {}): MockStepExecutor {
  const responses = options.responses ?? {};
  const defaultOutput = options.defaultOutput ?? createMockOutput;
  const consumedByNodeId = new Map<string, number>();
  const invocations: StepInvocation[] = [];

  return {
    async invoke(invocation): Promise<StepResult> {
      invocations.push(invocation);
      const { node } = invocation;
      const script = responses[node.id] ?? [];
      if (script.length === 0) {
        return { status: 'succeeded', output: defaultOutput(node) };
      }

      const consumed = consumedByNodeId.get(node.id) ?? 0;
      consumedByNodeId.set(node.id, consumed + 1);
      const response = script[Math.min(consumed, script.length - 1)];
      if (response.delayMs !== undefined && response.delayMs > 0) {
        await wait(response.delayMs, invocation.signal);
      }

      const result: StepResult = {
        status: response.status,
        output: { ...(response.output ?? {}) },
      };
      if (response.error !== undefined) {
        result.error = response.error;
      }
      return result;
    },

    getInvocations() {
      return [...invocations];
    },
  };
}

function parseMockResponse(value: unknown, path: string): MockStepResponse {
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object.`);
  }

  const { status, output, error, delayMs } = value;
  const knownStatus = nodeOutcomeStatuses.find(candidate => candidate === status);
  if (knownStatus === undefined) {
    throw new Error(`${path}.status must be one of: ${nodeOutcomeStatuses.join(', ')}.`);
  }

  const response: MockStepResponse = { status: knownStatus };
  if (output !== undefined) {
    if (!isRecord(output)) {
      throw new Error(`${path}.output must be an object.`);
    }
    response.output = output;
  }
  if (error !== undefined) {
    if (typeof error !== 'string') {
      throw new Error(`${path}.error must be a string.`);
    }
    response.error = error;
  }
  if (delayMs !== undefined) {
    if (typeof delayMs !== 'number' || !Number.isInteger(delayMs) || delayMs < 0) {
      throw new Error(`${path}.delayMs must be a non-negative integer.`);
    }
    response.delayMs = delayMs;
  }
  return response;
}

export function parseMockResponses(value: unknown): MockResponses {
  if (!isRecord(value)) {
    throw new Error('$ must be an object keyed by node id.');
  }

  const parsed: MockResponses = {};
  for (const [nodeId, script] of Object.entries(value)) {
    const path = `$.${nodeId}`;
    if (!Array.isArray(script)) {
      throw new Error(`${path} must be an array of responses.`);
    }
    parsed[nodeId] = script.map((response: unknown, index) => parseMockResponse(response, `${path}[${index}]`));
  }
  return parsed;
}
