import type { FixLoopState } from '@repairgate/shared-types';

export type FixLoopEvent =
  | 'start'
  /** The model produced a parseable patch */
  | 'patch_ready'
  | 'attempt_passed'
  /** Generation, parsing or validation failed for the current attempt */
  | 'attempt_failed'
  | 'retry'
  | 'cancel';

export interface FixLoopPosition {
  state: FixLoopState;
  /** 0-based index of the current attempt */
  index: number;
}

export const TERMINAL_STATES: ReadonlySet<FixLoopState> = new Set<FixLoopState>(['PASS', 'EXHAUSTED', 'CANCELLED']);

export class InvalidTransitionError extends Error {
  constructor(
    public readonly state: FixLoopState,
    public readonly event: FixLoopEvent
  ) {
    super(`Invalid fix loop transition: ${state} on ${event}`);
    this.name = 'InvalidTransitionError';
  }
}

export function isTerminal(state: FixLoopState): boolean {
  return TERMINAL_STATES.has(state);
}

function afterFailure(index: number, maxIterations: number): FixLoopPosition {
  return index + 1 < maxIterations ? { state: 'RETRY', index } : { state: 'EXHAUSTED', index };
}

/**
 * Transition function of the fix loop. Pure; the loop driver only executes
 * the side effects of the state it lands in.
 */
export function nextFixLoopState(
  position: FixLoopPosition,
  event: FixLoopEvent,
  maxIterations: number
): FixLoopPosition {
  if (isTerminal(position.state)) {
    if (event === 'cancel') return position;
    throw new InvalidTransitionError(position.state, event);
  }

  if (event === 'cancel') {
    return { state: 'CANCELLED', index: position.index };
  }

  switch (position.state) {
    case 'PENDING':
      if (event === 'start') return { state: 'GENERATING', index: 0 };
      break;
    case 'GENERATING':
      if (event === 'patch_ready') return { state: 'VALIDATING', index: position.index };
      if (event === 'attempt_failed') return afterFailure(position.index, maxIterations);
      break;
    case 'VALIDATING':
      if (event === 'attempt_passed') return { state: 'PASS', index: position.index };
      if (event === 'attempt_failed') return afterFailure(position.index, maxIterations);
      break;
    case 'RETRY':
      if (event === 'retry') return { state: 'GENERATING', index: position.index + 1 };
      break;
  }

  throw new InvalidTransitionError(position.state, event);
}
