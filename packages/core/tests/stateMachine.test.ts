import { describe, expect, it } from 'vitest';
import { StateTransitionError } from '../src/errors/index.js';
import { JobStateMachine, isValidTransition } from '../src/stateMachine.js';

describe('JobStateMachine', () => {
  it('walks the happy path', () => {
    const machine = new JobStateMachine('job-1');
    for (const state of ['PROBING', 'PLANNING', 'RENDERING', 'JOINING', 'VALIDATING', 'SUCCEEDED'] as const) {
      machine.transitionTo(state);
    }
    expect(machine.getState()).toBe('SUCCEEDED');
    expect(machine.getHistory()).toHaveLength(6);
  });

  it('rejects skipping stages', () => {
    const machine = new JobStateMachine('job-2');
    expect(() => machine.transitionTo('RENDERING')).toThrow(StateTransitionError);
  });

  it('requeues a failed job and remembers the failure', () => {
    const machine = new JobStateMachine('job-3');
    machine.transitionTo('PROBING');
    machine.fail('TRANSIENT_IO', 'disk busy');
    machine.requeue();

    expect(machine.getState()).toBe('QUEUED');
    expect(machine.getLastFailure()).toBe('TRANSIENT_IO');
  });

  it('has no way out of SUCCEEDED', () => {
    expect(isValidTransition('SUCCEEDED', 'QUEUED')).toBe(false);
    expect(isValidTransition('SUCCEEDED', 'FAILED')).toBe(false);
    expect(isValidTransition('JOINING', 'SUCCEEDED')).toBe(true);
  });
});
