import type { Goal } from '@trellis/shared';

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

// Goals are consulted, never evaluated, by the engine; a run gets its own frozen copy.
export function attachGoal(goal: Goal): Readonly<Goal> {
  return deepFreeze(structuredClone(goal));
}

export function getGoalWeightTotal(goal: Goal): number {
  return goal.successCriteria.reduce((total, criterion) => total + criterion.weight, 0);
}

export function getHardConstraints(goal: Goal): Goal['constraints'] {
  return goal.constraints.filter(constraint => constraint.constraintType === 'hard');
}
