import { isRecord, type StepExecutor, type StepResult, type ToolRegistry } from '@trellis/shared';

/**
 * Calls the first tool permitted by the node that the registry knows about,
 * passing the node's context view as input. A non-object tool result is
 * written to the node's first output key.
 */
export function createToolStepExecutor(registry: ToolRegistry): StepExecutor {
  return {
    async invoke(invocation): Promise<StepResult> {
      const { node } = invocation;
      const available = registry.getTools();
      const toolName = invocation.tools.find(name => Object.prototype.hasOwnProperty.call(available, name));
      if (toolName === undefined) {
        return {
          status: 'failed',
          output: {},
          error:
            invocation.tools.length === 0
              ? `Node "${node.id}" does not permit any tools.`
              : `None of the tools permitted by node "${node.id}" are registered: ${invocation.tools.join(', ')}.`,
        };
      }

      const result = await registry.getExecutor()({
        name: toolName,
        input: invocation.context,
        signal: invocation.signal,
      });

      if (isRecord(result)) {
        return { status: 'succeeded', output: result };
      }

      const [firstOutputKey] = node.outputKeys;
      return {
        status: 'succeeded',
        output: firstOutputKey === undefined ? {} : { [firstOutputKey]: result },
      };
    },
  };
}
