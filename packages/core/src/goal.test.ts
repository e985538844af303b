import { describe, expect, it } from 'vitest';
import { attachGoal, getGoalWeightTotal, getHardConstraints } from './goal.js';
import { createTestGoal } from './test-support.js';

const goal = createTestGoal({
  successCriteria: [
    { id: 'c1', description: 'Tests pass', metric: 'tests_passing', target: true, weight: 2 },
    { id: 'c2', description: 'Coverage', metric: 'coverage', target: 0.8, weight: 0.5 },
  ],
  constraints: [
    { id: 'k1', description: 'No network', constraintType: 'hard', category: 'safety' },
    { id: 'k2', description: 'Be brief', constraintType: 'soft', category: 'style' },
  ],
});

describe('goal', () => {
  it('attaches a deeply frozen copy', () => {
    const attached = attachGoal(goal);

    expect(attached).toEqual(goal);
    expect(attached).not.toBe(goal);
    expect(Object.isFrozen(attached)).toBe(true);
    expect(Object.isFrozen(attached.successCriteria[0])).toBe(true);
    expect(Object.isFrozen(goal)).toBe(false);
  });

  it('sums criterion weights and filters hard constraints', () => {
    expect(getGoalWeightTotal(goal)).toBe(2.5);
    expect(getHardConstraints(goal).map(constraint => constraint.id)).toEqual(['k1']);
  });
});
