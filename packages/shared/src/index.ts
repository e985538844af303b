export * from './graph.js';
export * from './execution.js';
export * from './session.js';

// Run statuses
export type RunStatus = 'running' | 'paused' | 'succeeded' | 'failed';

/**
 * Compares strings in locale-independent code-unit order.
 * Useful when deterministic ordering must not vary by runtime locale.
 */
export function compareStringsByCodeUnit(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  if (a > b) {
    return 1;
  }

  return 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
