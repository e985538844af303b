import type { NodeType, StepExecutor, StepResult } from '@trellis/shared';

export function createNodeTypeStepExecutor(
  executorsByType: Partial<Record<NodeType, StepExecutor>>,
  fallback?: StepExecutor,
): StepExecutor {
  return {
    async invoke(invocation): Promise<StepResult> {
      const executor = executorsByType[invocation.node.nodeType] ?? fallback;
      if (!executor) {
        return {
          status: 'failed',
          output: {},
          error: `No step executor handles node type "${invocation.node.nodeType}".`,
        };
      }
      return executor.invoke(invocation);
    },
  };
}
