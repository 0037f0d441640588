export type TimerErrorCode = 'NAME_CONFLICT' | 'INVALID_INTERVAL' | 'DISPOSED' | 'CANCELLED';

export abstract class TimerError extends Error {
  abstract readonly code: TimerErrorCode;
}

export class NameConflictError extends TimerError {
  readonly code = 'NAME_CONFLICT';

  constructor(readonly timerName: string) {
    super(`A timer with the name '${timerName}' already exists.`);
    this.name = 'NameConflictError';
  }
}

export class InvalidIntervalError extends TimerError {
  readonly code = 'INVALID_INTERVAL';

  constructor(
    readonly value: unknown,
    detail: string,
  ) {
    super(`Invalid timer interval (got ${String(value)}): ${detail}`);
    this.name = 'InvalidIntervalError';
  }
}

export class DisposedError extends TimerError {
  readonly code = 'DISPOSED';

  constructor() {
    super('The timer registry has been disposed.');
    this.name = 'DisposedError';
  }
}

export class TimerCancelledError extends TimerError {
  readonly code = 'CANCELLED';

  constructor(readonly timerName: string | null) {
    super(
      timerName
        ? `Timer '${timerName}' was cancelled before it fired.`
        : 'Anonymous timer was cancelled before it fired.',
    );
    this.name = 'TimerCancelledError';
  }
}

export function isTimerError(value: unknown): value is TimerError {
  return value instanceof TimerError;
}

/**
 * Normalizes anything user code may throw into an `Error`.
 * Strings become the message; other values are kept as `cause`.
 */
export function ensureError(value: unknown, fallbackMessage = 'Unknown error'): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  return new Error(fallbackMessage, { cause: value });
}
