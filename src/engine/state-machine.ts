/**
 * Run and operation state machines.
 *
 * Every status change in the executor goes through these checks so an
 * operation can never be run twice or resurrected after a terminal state.
 */

import {
  OperationStatus,
  RunStatus,
  VALID_OPERATION_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function transitionOperationStatus(
  operationId: string,
  current: OperationStatus,
  target: OperationStatus,
): TransitionResult<OperationStatus> {
  const validTargets = VALID_OPERATION_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'OPERATION.INVALID_TRANSITION',
        message: `Invalid operation state transition for "${operationId}": ${current} -> ${target}`,
        operationId,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}
