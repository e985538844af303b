import { describe, expect, it } from 'vitest';
import { canTransitionRun, transitionRun } from './stateMachine.js';

describe('stateMachine', () => {
  describe('run transitions', () => {
    it('should allow running -> paused', () => {
      expect(canTransitionRun('running', 'paused')).toBe(true);
    });

    it('should allow running -> succeeded and running -> failed', () => {
      expect(canTransitionRun('running', 'succeeded')).toBe(true);
      expect(canTransitionRun('running', 'failed')).toBe(true);
    });

    it('should allow paused -> running', () => {
      expect(canTransitionRun('paused', 'running')).toBe(true);
    });

    it('should not allow paused -> succeeded', () => {
      expect(canTransitionRun('paused', 'succeeded')).toBe(false);
    });

    it('should not allow succeeded -> running', () => {
      expect(canTransitionRun('succeeded', 'running')).toBe(false);
    });

    it('should throw on invalid transition', () => {
      expect(() => transitionRun('failed', 'running')).toThrow('Invalid run transition: failed -> running');
    });

    it('should return new status on valid transition', () => {
      expect(transitionRun('paused', 'running')).toBe('running');
    });
  });
});
