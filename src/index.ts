export {
  CODE_LENGTH,
  COLOR_NAMES,
  COLORS,
  MAX_GUESSES,
  NUM_COLORS,
  computeFeedback,
  feedbackPegs,
  isSolved,
} from './lib/mastermind';
export type { Color, ColorName, Feedback, Peg } from './lib/mastermind';

export { DEFAULT_GAME_CONFIG, resolveConfig, validateConfig } from './lib/config';
export type { GameConfig } from './lib/config';

export {
  HintAlreadyUsedError,
  InvalidConfigurationError,
  InvalidGuessError,
  MastermindError,
  SessionInProgressError,
  SessionTerminatedError,
  isMastermindError,
} from './lib/errors';
export type { InvalidGuessReason, MastermindErrorCode } from './lib/errors';

export { cryptoRandomSource, scriptedRandomSource, seededRandomSource } from './lib/random';
export type { RandomSource } from './lib/random';

export { generateSecret } from './lib/secret';
export type { GenerateSecretOptions } from './lib/secret';

export { SALT_LENGTH, computeCommitment, paletteIndices, verifyCommitment } from './lib/commitment';

export { createConsoleLogger, silentLogger } from './lib/logger';
export type { Logger } from './lib/logger';

export { GameSession, newSession } from './lib/session';
export type { Attempt, GuessOutcome, Hint, Reveal, SessionDeps, SessionOptions, SessionState } from './lib/session';
