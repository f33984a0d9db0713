/**
 * Track phase state machine.
 *
 * Enforces valid phase transitions during a reconciliation pass and
 * produces typed errors on invalid transitions.
 */

import { TrackPhase, VALID_TRACK_TRANSITIONS } from '../domain/track-state';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a track phase transition. */
export function transitionTrackPhase(
  current: TrackPhase,
  target: TrackPhase,
): TransitionResult<TrackPhase> {
  const validTargets = VALID_TRACK_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'INVARIANT.INVALID_TRANSITION',
        message: `Invalid track phase transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a track phase is terminal. */
export function isTerminalTrackPhase(phase: TrackPhase): boolean {
  return VALID_TRACK_TRANSITIONS[phase].length === 0;
}
