import assert from 'node:assert/strict';
import test from 'node:test';
import { createConsoleLogger, silentLogger } from './logger';

test('createConsoleLogger tags every line', (t) => {
  const debug = t.mock.method(console, 'debug', () => {});
  const warn = t.mock.method(console, 'warn', () => {});

  const logger = createConsoleLogger('Board');
  logger.debug('turn', 3);
  createConsoleLogger().warn('slow draw');

  assert.deepEqual(debug.mock.calls[0].arguments, ['[Board]', 'turn', 3]);
  assert.deepEqual(warn.mock.calls[0].arguments, ['[Mastermind]', 'slow draw']);
});

test('silentLogger writes nothing', (t) => {
  const debug = t.mock.method(console, 'debug', () => {});
  silentLogger.debug('ignored');
  assert.equal(debug.mock.callCount(), 0);
});
