import type { RunStatus } from '@trellis/shared';

const validRunTransitions: Record<RunStatus, RunStatus[]> = {
  running: ['paused', 'succeeded', 'failed'],
  paused: ['running', 'failed'],
  succeeded: [],
  failed: [],
};

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return validRunTransitions[from].includes(to);
}

export function transitionRun(current: RunStatus, next: RunStatus): RunStatus {
  if (!canTransitionRun(current, next)) {
    throw new Error(`Invalid run transition: ${current} -> ${next}`);
  }
  return next;
}
