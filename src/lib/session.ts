/**
 * One play-through of Mastermind: secret generation, turn counting, win/loss
 * detection and the one-time hint. No rendering or input handling lives here;
 * a UI calls in and draws whatever comes back.
 */

import { computeCommitment, paletteIndices, SALT_LENGTH } from './commitment';
import { resolveConfig, validateConfig, type GameConfig } from './config';
import {
  assertInvariant,
  HintAlreadyUsedError,
  InvalidGuessError,
  SessionInProgressError,
  SessionTerminatedError,
} from './errors';
import { createConsoleLogger, type Logger } from './logger';
import { computeFeedback, isSolved, type Color, type ColorName, type Feedback } from './mastermind';
import { cryptoRandomSource, type RandomSource } from './random';
import { generateSecret } from './secret';

export type SessionState = 'in_progress' | 'won' | 'lost' | 'abandoned';

export interface Attempt<C extends Color = ColorName> {
  /** 0-based turn index. */
  readonly turn: number;
  readonly guess: readonly C[];
  readonly feedback: Readonly<Feedback>;
}

export interface Hint<C extends Color = ColorName> {
  readonly position: number;
  readonly color: C;
}

export interface GuessOutcome<C extends Color = ColorName> {
  attempt: Attempt<C>;
  feedback: Readonly<Feedback>;
  state: SessionState;
  remainingAttempts: number;
  /** Set once the guess ended the game, `null` while it goes on. */
  secret: readonly C[] | null;
}

export interface Reveal<C extends Color = ColorName> {
  secret: readonly C[];
  salt: Uint8Array;
}

export interface SessionDeps {
  random?: RandomSource;
  logger?: Logger;
}

export type SessionOptions<C extends Color = ColorName> = Partial<GameConfig<C>> & SessionDeps;

export class GameSession<C extends Color = ColorName> {
  readonly config: Readonly<GameConfig<C>>;
  /** Hex sha256 commitment to the secret, published from the first turn. */
  readonly commitment: string;

  private readonly secret: readonly C[];
  private readonly salt: Uint8Array;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly attempts: Attempt<C>[] = [];
  private currentState: SessionState = 'in_progress';
  private revealedHint: Hint<C> | null = null;

  constructor(config: GameConfig<C>, { random = cryptoRandomSource, logger = createConsoleLogger() }: SessionDeps = {}) {
    this.config = validateConfig(config);
    this.random = random;
    this.logger = logger;

    const { palette, length, allowRepeats } = this.config;
    this.secret = Object.freeze(generateSecret(palette, length, random, { allowRepeats }));
    assertInvariant(this.secret.length === length, `secret has ${this.secret.length} pegs, expected ${length}`);

    this.salt = random.bytes(SALT_LENGTH);
    this.commitment = computeCommitment(paletteIndices(palette, this.secret), this.salt);

    this.logger.debug(
      `New game: ${length} pegs, ${palette.length} colors, ${this.config.maxAttempts} attempts, commitment ${this.commitment}`,
    );
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return this.currentState !== 'in_progress';
  }

  get history(): readonly Attempt<C>[] {
    return Object.freeze([...this.attempts]);
  }

  get remainingAttempts(): number {
    return this.config.maxAttempts - this.attempts.length;
  }

  get hintUsed(): boolean {
    return this.revealedHint !== null;
  }

  get hint(): Hint<C> | null {
    return this.revealedHint;
  }

  submitGuess(guess: readonly C[]): GuessOutcome<C> {
    this.ensureInProgress('submit a guess');
    this.validateGuess(guess);

    const feedback = Object.freeze(computeFeedback(this.secret, guess));
    assertInvariant(
      feedback.exact + feedback.partial <= this.config.length,
      `feedback ${feedback.exact}/${feedback.partial} exceeds ${this.config.length} pegs`,
    );

    const attempt: Attempt<C> = Object.freeze({
      turn: this.attempts.length,
      guess: Object.freeze([...guess]),
      feedback,
    });
    this.attempts.push(attempt);

    if (isSolved(feedback, this.config.length)) {
      this.finish('won');
    } else if (this.attempts.length === this.config.maxAttempts) {
      this.finish('lost');
    }

    return {
      attempt,
      feedback,
      state: this.currentState,
      remainingAttempts: this.remainingAttempts,
      secret: this.isTerminal ? this.secret : null,
    };
  }

  /**
   * Reveal one secret peg the player does not have right in their latest
   * attempt (any peg before the first guess). One per session, free of charge.
   */
  requestHint(): Hint<C> {
    if (this.revealedHint) {
      throw new HintAlreadyUsedError(
        `Hint already used: position ${this.revealedHint.position + 1} is ${String(this.revealedHint.color)}`,
      );
    }
    this.ensureInProgress('request a hint');

    const last = this.attempts.at(-1);
    const candidates: number[] = [];
    for (let i = 0; i < this.config.length; i++) {
      if (!last || last.guess[i] !== this.secret[i]) candidates.push(i);
    }
    // A fully correct last attempt would have ended the game.
    assertInvariant(candidates.length > 0, 'no unsolved position left for a hint');

    const position = candidates[this.random.nextInt(candidates.length)];
    this.revealedHint = Object.freeze({ position, color: this.secret[position] });
    this.logger.debug(`Hint revealed for position ${position + 1} on turn ${this.attempts.length}`);
    return this.revealedHint;
  }

  /** Give up. Returns the secret. */
  abandon(): readonly C[] {
    this.ensureInProgress('abandon');
    this.finish('abandoned');
    return this.secret;
  }

  /** Secret and commitment salt, once the game is over. */
  reveal(): Reveal<C> {
    if (!this.isTerminal) {
      throw new SessionInProgressError('The secret stays hidden until the game is over');
    }
    return { secret: this.secret, salt: this.salt.slice() };
  }

  private validateGuess(guess: readonly C[]): void {
    const { length, palette } = this.config;
    if (guess.length !== length) {
      throw new InvalidGuessError(`Guess must have ${length} pegs, got ${guess.length}`, 'length');
    }
    const index = guess.findIndex((color) => !palette.includes(color));
    if (index !== -1) {
      throw new InvalidGuessError(
        `Color ${String(guess[index])} at position ${index + 1} is not in the palette`,
        'color',
        index,
      );
    }
  }

  private ensureInProgress(action: string): void {
    if (this.isTerminal) {
      throw new SessionTerminatedError(`Cannot ${action}: the game is already ${this.currentState}`);
    }
  }

  private finish(state: Exclude<SessionState, 'in_progress'>): void {
    this.currentState = state;
    this.logger.debug(
      `Game ${state} after ${this.attempts.length} attempt(s); secret was ${this.secret.join(', ')}`,
    );
  }
}

/**
 * Start a game. Options left out fall back to `DEFAULT_GAME_CONFIG`; a
 * palette of your own colors types the whole session.
 */
export function newSession(options?: SessionOptions<ColorName>): GameSession<ColorName>;
export function newSession<C extends Color>(options: SessionOptions<C> & { palette: readonly C[] }): GameSession<C>;
export function newSession(options: SessionOptions<Color> = {}): GameSession<Color> {
  const { random, logger, ...overrides } = options;
  return new GameSession(resolveConfig(overrides), { random, logger });
}
