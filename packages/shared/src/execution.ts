import type { Goal, NodeSpec } from './graph.js';

export const nodeOutcomeStatuses = ['succeeded', 'failed'] as const;
export type NodeOutcomeStatus = (typeof nodeOutcomeStatuses)[number];

export type StepInvocation = {
  runId: string;
  node: NodeSpec;
  // Only the node's declared input keys.
  context: Readonly<Record<string, unknown>>;
  tools: readonly string[];
  goal: Readonly<Goal>;
  model: string | null;
  maxTokens: number | null;
  attempt: number;
  signal: AbortSignal;
};

export type StepResult = {
  status: NodeOutcomeStatus;
  output: Record<string, unknown>;
  error?: string;
};

/**
 * The unit of work behind a node: an LLM call, a tool call or a plain function.
 * Implementations should honour `invocation.signal`.
 */
export type StepExecutor = {
  invoke(invocation: StepInvocation): Promise<StepResult>;
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
};

export type ToolCall = {
  name: string;
  input: Readonly<Record<string, unknown>>;
  signal: AbortSignal;
};

export type ToolExecutor = (call: ToolCall) => Promise<unknown>;

// Supplied by the surrounding application.
export type ToolRegistry = {
  getTools(): Record<string, ToolDescriptor>;
  getExecutor(): ToolExecutor;
};
