import { InvalidConfigurationError } from './errors';
import type { Color } from './mastermind';
import type { RandomSource } from './random';

export interface GenerateSecretOptions {
  /** Defaults to true: every peg is drawn from the full palette. */
  allowRepeats?: boolean;
}

/**
 * Draw a secret code of `length` pegs from `palette`.
 *
 * With repeats, each position is an independent uniform draw. Without, each
 * drawn color leaves the pool, like dealing from a shuffled deck.
 */
export function generateSecret<C extends Color>(
  palette: readonly C[],
  length: number,
  random: RandomSource,
  { allowRepeats = true }: GenerateSecretOptions = {},
): C[] {
  if (palette.length === 0) {
    throw new InvalidConfigurationError('Palette must contain at least one color');
  }
  if (!Number.isInteger(length) || length < 1) {
    throw new InvalidConfigurationError(`Code length must be a positive integer, got ${length}`);
  }

  if (allowRepeats) {
    return Array.from({ length }, () => palette[random.nextInt(palette.length)]);
  }

  if (palette.length < length) {
    throw new InvalidConfigurationError(
      `Cannot draw ${length} distinct colors from a palette of ${palette.length}`,
    );
  }

  const available = [...palette];
  const secret: C[] = [];
  for (let i = 0; i < length; i++) {
    const [picked] = available.splice(random.nextInt(available.length), 1);
    secret.push(picked);
  }
  return secret;
}
