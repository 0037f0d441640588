import { ensureError } from '../errors';
import type { DelayCallback } from '../scheduler/delayScheduler';

export type MaybePromise<T> = T | Promise<T>;

export type TimerSuccessEvent = {
  name: string;
  /** Interval the timer was armed with when this invocation ran. */
  interval: number;
};

export type TimerFailureEvent = {
  name: string;
  error: Error;
};

export type GuardedInvocationOptions = {
  name: string;
  body: () => MaybePromise<void>;
  getInterval: () => number;
  onSuccess: (event: TimerSuccessEvent) => void;
  onFailure: (event: TimerFailureEvent) => void;
};

/** Feeds a produced value into `next`, staying synchronous when nothing is async. */
export function pipeValue<T>(
  value: MaybePromise<T>,
  next: (value: T) => MaybePromise<void>,
): MaybePromise<void> {
  if (value instanceof Promise) {
    const pending: Promise<T> = value;
    return pending.then(next);
  }
  return next(value);
}

/**
 * Wraps user code so that nothing it throws reaches the scheduler. Exactly one
 * of `onSuccess` / `onFailure` is raised per invocation; synchronous bodies
 * report synchronously.
 */
export function createGuardedInvocation(options: GuardedInvocationOptions): DelayCallback {
  const { name, body, getInterval, onSuccess, onFailure } = options;

  const succeed = (): void => {
    onSuccess({ name, interval: getInterval() });
  };
  const fail = (err: unknown): void => {
    onFailure({ name, error: ensureError(err) });
  };

  return () => {
    let result: MaybePromise<void>;
    try {
      result = body();
    } catch (err: unknown) {
      fail(err);
      return;
    }

    if (result instanceof Promise) {
      return result.then(succeed, fail);
    }
    succeed();
  };
}
