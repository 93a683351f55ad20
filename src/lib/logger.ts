/**
 * Sessions report lifecycle events (start, hint, end of game) through this.
 * Caller mistakes such as a bad guess are thrown, never logged.
 */
export type Logger = Pick<Console, 'debug' | 'warn'>;

export function createConsoleLogger(tag = 'Mastermind'): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args: unknown[]) => console.debug(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
