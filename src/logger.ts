/**
 * Structured logging contract. Events are snake_case names followed by a context
 * object, e.g. `logger.warn('match_fetch_skipped', { matchId })`.
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const consoleLogger: Logger = console;

export const describeError = (err: unknown) =>
  err instanceof Error ? { name: err.name, message: err.message } : { message: String(err) };
