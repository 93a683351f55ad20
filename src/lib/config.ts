import { InvalidConfigurationError } from './errors';
import { CODE_LENGTH, COLOR_NAMES, MAX_GUESSES, type Color, type ColorName } from './mastermind';

export interface GameConfig<C extends Color = ColorName> {
  palette: readonly C[];
  /** Pegs per code. */
  length: number;
  maxAttempts: number;
  /** Whether a secret may use the same color twice. */
  allowRepeats: boolean;
}

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = Object.freeze({
  palette: COLOR_NAMES,
  length: CODE_LENGTH,
  maxAttempts: MAX_GUESSES,
  allowRepeats: true,
});

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

/**
 * Check a complete configuration and return a frozen copy of it.
 */
export function validateConfig<C extends Color>(config: GameConfig<C>): Readonly<GameConfig<C>> {
  const { palette, length, maxAttempts, allowRepeats } = config;

  if (palette.length === 0) {
    throw new InvalidConfigurationError('Palette must contain at least one color');
  }
  // NaN never equals itself, so it could be neither guessed nor scored
  if (palette.some((color) => Number.isNaN(color))) {
    throw new InvalidConfigurationError('Palette cannot contain NaN');
  }
  if (new Set(palette).size !== palette.length) {
    throw new InvalidConfigurationError(`Palette has duplicate colors: ${palette.join(', ')}`);
  }
  if (!isPositiveInteger(length)) {
    throw new InvalidConfigurationError(`Code length must be a positive integer, got ${length}`);
  }
  if (!isPositiveInteger(maxAttempts)) {
    throw new InvalidConfigurationError(`Max attempts must be a positive integer, got ${maxAttempts}`);
  }
  if (!allowRepeats && palette.length < length) {
    throw new InvalidConfigurationError(
      `Cannot draw ${length} distinct colors from a palette of ${palette.length}`,
    );
  }

  return Object.freeze({
    palette: Object.freeze([...palette]),
    length,
    maxAttempts,
    allowRepeats,
  });
}

/**
 * Fill in defaults and validate. Without a palette the default color names
 * are used, so a custom color type always comes with its own palette.
 */
export function resolveConfig(overrides?: Partial<GameConfig>): Readonly<GameConfig>;
export function resolveConfig<C extends Color>(
  overrides: Partial<GameConfig<C>> & { palette: readonly C[] },
): Readonly<GameConfig<C>>;
export function resolveConfig(overrides: Partial<GameConfig<Color>>): Readonly<GameConfig<Color>>;
export function resolveConfig(overrides: Partial<GameConfig<Color>> = {}): Readonly<GameConfig<Color>> {
  return validateConfig({
    palette: overrides.palette ?? DEFAULT_GAME_CONFIG.palette,
    length: overrides.length ?? DEFAULT_GAME_CONFIG.length,
    maxAttempts: overrides.maxAttempts ?? DEFAULT_GAME_CONFIG.maxAttempts,
    allowRepeats: overrides.allowRepeats ?? DEFAULT_GAME_CONFIG.allowRepeats,
  });
}
