import { describe, expect, it } from 'vitest';

import {
  DisposedError,
  InvalidIntervalError,
  NameConflictError,
  TimerCancelledError,
  ensureError,
  isTimerError,
} from '../src/errors';

describe('timer errors', () => {
  it('carries a code and the conflicting name', () => {
    const error = new NameConflictError('heartbeat');

    expect(error.code).toBe('NAME_CONFLICT');
    expect(error.timerName).toBe('heartbeat');
    expect(error.message).toBe("A timer with the name 'heartbeat' already exists.");
    expect(isTimerError(error)).toBe(true);
  });

  it('describes cancelled named and anonymous timers', () => {
    expect(new TimerCancelledError('nightly').message).toBe(
      "Timer 'nightly' was cancelled before it fired.",
    );
    expect(new TimerCancelledError(null).message).toBe(
      'Anonymous timer was cancelled before it fired.',
    );
  });

  it('distinguishes timer errors from other errors', () => {
    expect(isTimerError(new DisposedError())).toBe(true);
    expect(isTimerError(new InvalidIntervalError(0, 'must be positive'))).toBe(true);
    expect(isTimerError(new Error('other'))).toBe(false);
    expect(new InvalidIntervalError(0, 'must be positive').message).toBe(
      'Invalid timer interval (got 0): must be positive',
    );
  });
});

describe('ensureError', () => {
  it('returns errors unchanged', () => {
    const error = new Error('same');
    expect(ensureError(error)).toBe(error);
  });

  it('wraps strings as the message', () => {
    expect(ensureError('text').message).toBe('text');
  });

  it('keeps other values as the cause', () => {
    const wrapped = ensureError(404, 'Request failed');
    expect(wrapped.message).toBe('Request failed');
    expect(wrapped.cause).toBe(404);
  });
});
