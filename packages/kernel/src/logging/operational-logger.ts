/**
 * Helmsman Kernel — Operational Logger Interface
 *
 * Structural subset of a pino logger. Kernel components log through this
 * interface so the kernel carries no logging dependency; runtime-host's
 * createLogger() returns a pino instance that satisfies it.
 */

export interface OperationalLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const silentLogger: OperationalLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
