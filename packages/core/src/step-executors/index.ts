export { createFunctionStepExecutor, type StepHandler } from './function.js';
export {
  createMockOutput,
  createMockStepExecutor,
  parseMockResponses,
  type MockResponses,
  type MockStepExecutor,
  type MockStepExecutorOptions,
  type MockStepResponse,
} from './mock.js';
export { createNodeTypeStepExecutor } from './nodeType.js';
export { createToolStepExecutor } from './tool.js';
