/**
 * Errors raised to the driver of a game. All of them are thrown synchronously
 * at the offending call and leave the session as it was.
 */

export type MastermindErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_GUESS'
  | 'SESSION_TERMINATED'
  | 'HINT_ALREADY_USED'
  | 'SESSION_IN_PROGRESS';

export abstract class MastermindError extends Error {
  abstract readonly code: MastermindErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Construction parameters are unusable; build a new session with valid ones. */
export class InvalidConfigurationError extends MastermindError {
  readonly code = 'INVALID_CONFIGURATION';
}

export type InvalidGuessReason = 'length' | 'color';

export class InvalidGuessError extends MastermindError {
  readonly code = 'INVALID_GUESS';

  constructor(
    message: string,
    readonly reason: InvalidGuessReason,
    /** First offending position, for `reason === 'color'`. */
    readonly index: number | null = null,
  ) {
    super(message);
  }
}

export class SessionTerminatedError extends MastermindError {
  readonly code = 'SESSION_TERMINATED';
}

export class HintAlreadyUsedError extends MastermindError {
  readonly code = 'HINT_ALREADY_USED';
}

export class SessionInProgressError extends MastermindError {
  readonly code = 'SESSION_IN_PROGRESS';
}

export function isMastermindError(value: unknown, code?: MastermindErrorCode): value is MastermindError {
  return value instanceof MastermindError && (code === undefined || value.code === code);
}

/** Internal consistency check. A failure is a bug in the engine, not bad input. */
export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message}`);
  }
}
