/**
 * @fileoverview Sequence validation for step sessions.
 *
 * Pure functions: the same state and record always yield the same outcome,
 * and the input state is never mutated.
 */

import { SequenceError, type StepId, type StepRecord, TimeoutError } from '@step-relay/shared';

/**
 * Validation state owned by a single session.
 */
export interface ValidationState {
  /** Id of the last accepted step, null before the first one */
  readonly lastStepId: StepId | null;
  /** Minimum reported wait, in seconds */
  readonly timeoutThresholdSeconds: number;
  /** Id the first step must carry; any id is accepted when undefined */
  readonly firstStepId?: StepId | undefined;
}

export type Outcome =
  | { readonly kind: 'accepted'; readonly state: ValidationState }
  | { readonly kind: 'rejected'; readonly error: SequenceError | TimeoutError };

export function createValidationState(
  timeoutThresholdSeconds: number,
  firstStepId?: StepId
): ValidationState {
  return { lastStepId: null, timeoutThresholdSeconds, firstStepId };
}

/**
 * Id the next record must carry, or null if any id is acceptable.
 */
export function expectedStepId(state: ValidationState): StepId | null {
  if (state.lastStepId !== null) {
    return state.lastStepId + 1;
  }
  return state.firstStepId ?? null;
}

/**
 * Check a record against the session state.
 *
 * Ordering is checked before the wait threshold, so a record violating
 * both is reported as a SequenceError.
 */
export function validateStep(state: ValidationState, record: StepRecord): Outcome {
  const expected = expectedStepId(state);
  if (expected !== null && record.stepId !== expected) {
    return { kind: 'rejected', error: new SequenceError(record.stepId, expected) };
  }

  if (record.waitSeconds < state.timeoutThresholdSeconds) {
    return {
      kind: 'rejected',
      error: new TimeoutError(record.stepId, record.waitSeconds, state.timeoutThresholdSeconds),
    };
  }

  return { kind: 'accepted', state: { ...state, lastStepId: record.stepId } };
}
