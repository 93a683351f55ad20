import assert from 'node:assert/strict';
import test from 'node:test';
import {
  assertInvariant,
  HintAlreadyUsedError,
  InvalidGuessError,
  isMastermindError,
  MastermindError,
  SessionTerminatedError,
} from './errors';

test('errors carry their class name and code', () => {
  const err = new HintAlreadyUsedError('again');
  assert.ok(err instanceof MastermindError);
  assert.ok(err instanceof Error);
  assert.equal(err.name, 'HintAlreadyUsedError');
  assert.equal(err.code, 'HINT_ALREADY_USED');
  assert.equal(err.message, 'again');
});

test('isMastermindError narrows by code', () => {
  const err: unknown = new SessionTerminatedError('over');
  assert.equal(isMastermindError(err), true);
  assert.equal(isMastermindError(err, 'SESSION_TERMINATED'), true);
  assert.equal(isMastermindError(err, 'INVALID_GUESS'), false);
  assert.equal(isMastermindError(new Error('plain')), false);
  assert.equal(isMastermindError('SESSION_TERMINATED'), false);
});

test('InvalidGuessError defaults to no position', () => {
  const err = new InvalidGuessError('short', 'length');
  assert.equal(err.reason, 'length');
  assert.equal(err.index, null);
});

test('assertInvariant only throws on a broken invariant', () => {
  assert.doesNotThrow(() => assertInvariant(true, 'fine'));
  assert.throws(() => assertInvariant(false, 'two pegs in one hole'), {
    name: 'Error',
    message: 'Invariant violated: two pegs in one hole',
  });
});
