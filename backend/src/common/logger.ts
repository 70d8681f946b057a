/**
 * Logger contract handed to services. Fastify's pino logger (`app.log`)
 * satisfies it; tests pass `vi.fn()` mocks.
 */
export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
