import assert from 'node:assert/strict';
import test from 'node:test';
import { InvalidConfigurationError } from './errors';
import { scriptedRandomSource, seededRandomSource } from './random';
import { generateSecret } from './secret';

const PALETTE = ['R', 'G', 'B', 'Y', 'O', 'P'];

test('generateSecret maps each draw onto the palette', () => {
  assert.deepEqual(generateSecret(PALETTE, 4, scriptedRandomSource([0, 1, 2, 3])), ['R', 'G', 'B', 'Y']);
  assert.deepEqual(generateSecret(PALETTE, 4, scriptedRandomSource([5, 5, 5, 5])), ['P', 'P', 'P', 'P']);
});

test('generateSecret without repeats draws from a shrinking pool', () => {
  // Pool sizes 6, 5, 4, 3: 5%6=5 -> P, 5%5=0 -> R, 5%4=1 -> B, 5%3=2 -> O
  const secret = generateSecret(PALETTE, 4, scriptedRandomSource([5, 5, 5, 5]), { allowRepeats: false });
  assert.deepEqual(secret, ['P', 'R', 'B', 'O']);
});

test('generateSecret is reproducible from a seed', () => {
  const a = generateSecret(PALETTE, 8, seededRandomSource(7));
  const b = generateSecret(PALETTE, 8, seededRandomSource(7));
  assert.deepEqual(a, b);
  assert.equal(a.length, 8);
  assert.ok(a.every((c) => PALETTE.includes(c)));
});

test('generateSecret without repeats never repeats a color', () => {
  const random = seededRandomSource(99);
  for (let i = 0; i < 50; i++) {
    const secret = generateSecret(PALETTE, 6, random, { allowRepeats: false });
    assert.equal(new Set(secret).size, 6);
  }
});

test('generateSecret rejects unusable parameters', () => {
  const random = seededRandomSource(1);
  assert.throws(() => generateSecret([], 4, random), InvalidConfigurationError);
  assert.throws(() => generateSecret(PALETTE, 0, random), InvalidConfigurationError);
  assert.throws(() => generateSecret(PALETTE, 1.5, random), InvalidConfigurationError);
  assert.throws(
    () => generateSecret(['R', 'G'], 3, random, { allowRepeats: false }),
    /Cannot draw 3 distinct colors from a palette of 2/,
  );
});
