/**
 * Job State Machine
 *
 * Strict state machine for job lifecycle management.
 *
 * State Flow:
 * QUEUED → PROBING → PLANNING → RENDERING → JOINING → VALIDATING → SUCCEEDED
 *                    ↘ FAILED (from any non-terminal state)
 * FAILED → QUEUED when the scheduler grants a retry
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is recorded in the history
 */

import { StateTransitionError, type FailureReason } from './errors/index.js';

export const JOB_STATES = [
  'QUEUED',
  'PROBING',
  'PLANNING',
  'RENDERING',
  'JOINING',
  'VALIDATING',
  'SUCCEEDED',
  'FAILED',
] as const;

export type JobState = (typeof JOB_STATES)[number];

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: FailureReason;
  message?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  QUEUED: new Set<JobState>(['PROBING', 'FAILED']),
  PROBING: new Set<JobState>(['PLANNING', 'FAILED']),
  PLANNING: new Set<JobState>(['RENDERING', 'FAILED']),
  RENDERING: new Set<JobState>(['JOINING', 'FAILED']),
  JOINING: new Set<JobState>(['VALIDATING', 'SUCCEEDED', 'FAILED']), // validation may be disabled
  VALIDATING: new Set<JobState>(['SUCCEEDED', 'FAILED']),
  SUCCEEDED: new Set<JobState>([]), // Terminal state
  FAILED: new Set<JobState>(['QUEUED']), // Retry
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private lastFailure: FailureReason | null = null;
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'QUEUED') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  /**
   * Reason of the most recent failure, kept across a requeue
   */
  getLastFailure(): FailureReason | null {
    return this.lastFailure;
  }

  /**
   * Check if a transition to the target state is valid
   */
  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: JobState,
    reason?: FailureReason,
    message?: string
  ): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      message,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Fail the job with a reason
   */
  fail(reason: FailureReason, message?: string): JobStateTransition {
    this.lastFailure = reason;
    return this.transitionTo('FAILED', reason, message);
  }

  /**
   * Put a failed job back in the queue
   */
  requeue(): JobStateTransition {
    return this.transitionTo('QUEUED');
  }
}
