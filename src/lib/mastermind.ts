/**
 * Mastermind scoring, shared by the game session and any driver that wants to
 * score a guess offline.
 */

export const COLOR_NAMES = ['Red', 'Blue', 'Green', 'Yellow', 'Purple', 'Orange'] as const;
export const COLORS: Readonly<Record<ColorName, string>> = {
  Red: '#EF4444',
  Blue: '#3B82F6',
  Green: '#22C55E',
  Yellow: '#EAB308',
  Purple: '#A855F7',
  Orange: '#F97316',
};
export const CODE_LENGTH = 4;
export const NUM_COLORS = COLOR_NAMES.length;
export const MAX_GUESSES = 10;

export type ColorName = (typeof COLOR_NAMES)[number];

/** Anything comparable with `===` can serve as a peg color. */
export type Color = string | number;

export interface Feedback {
  exact: number;   // Red pegs
  partial: number; // White pegs
}

export type Peg = 'red' | 'white' | 'empty';

/**
 * Compute Mastermind feedback for a guess against a secret code.
 *
 * Exact matches are taken out first; the remaining colors on each side are
 * then intersected as multisets, so a single secret peg never satisfies two
 * guess pegs. Swapping the arguments gives the same result.
 */
export function computeFeedback<C extends Color>(secret: readonly C[], guess: readonly C[]): Feedback {
  if (secret.length !== guess.length) {
    throw new Error(`secret/guess length mismatch: ${secret.length} vs ${guess.length}`);
  }

  // Step 1: Count exact matches (red pegs)
  let exact = 0;
  const inSecret = new Map<C, number>();
  const inGuess = new Map<C, number>();

  for (let i = 0; i < secret.length; i++) {
    const s = secret[i];
    const g = guess[i];
    if (s === g) {
      exact++;
      continue;
    }
    inSecret.set(s, (inSecret.get(s) ?? 0) + 1);
    inGuess.set(g, (inGuess.get(g) ?? 0) + 1);
  }

  // Step 2: Count color matches among the non-exact positions (white pegs)
  let partial = 0;
  for (const [color, countInSecret] of inSecret) {
    partial += Math.min(countInSecret, inGuess.get(color) ?? 0);
  }

  return { exact, partial };
}

export function isSolved(feedback: Feedback, length: number): boolean {
  return feedback.exact === length;
}

/**
 * Board layout for a feedback: red pegs first, then white, padded with empty
 * holes up to the code length.
 */
export function feedbackPegs(feedback: Feedback, length: number): Peg[] {
  if (feedback.exact + feedback.partial > length) {
    throw new Error(`feedback ${feedback.exact}/${feedback.partial} does not fit ${length} holes`);
  }

  const pegs: Peg[] = [];
  for (let i = 0; i < feedback.exact; i++) pegs.push('red');
  for (let i = 0; i < feedback.partial; i++) pegs.push('white');
  while (pegs.length < length) pegs.push('empty');
  return pegs;
}
