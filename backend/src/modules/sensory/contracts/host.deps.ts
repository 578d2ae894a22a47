/**
 * Host dependencies injected into the sensory module.
 * The module never reaches for process-wide singletons.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
