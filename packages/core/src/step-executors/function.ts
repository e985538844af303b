import type { StepExecutor, StepInvocation, StepResult } from '@trellis/shared';

// Returns the node's output; throwing fails the attempt.
export type StepHandler = (
  invocation: StepInvocation,
) => Promise<Record<string, unknown>> | Record<string, unknown>;

export function createFunctionStepExecutor(handlers: Readonly<Record<string, StepHandler>>): StepExecutor {
  return {
    async invoke(invocation): Promise<StepResult> {
      const handler = handlers[invocation.node.id];
      if (!handler) {
        return {
          status: 'failed',
          output: {},
          error: `No handler is registered for node "${invocation.node.id}".`,
        };
      }

      return { status: 'succeeded', output: await handler(invocation) };
    },
  };
}
