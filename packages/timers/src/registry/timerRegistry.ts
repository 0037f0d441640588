import { DisposedError, NameConflictError, TimerCancelledError, ensureError } from '../errors';
import { silentLogger, type TimerLogger } from '../logging';
import { createSubject, type Observer, type Subject, type Unsubscribe } from '../observer';
import { NO_REPEAT, type DelayScheduler } from '../scheduler/delayScheduler';
import { NodeDelayScheduler } from '../scheduler/nodeDelayScheduler';
import { systemClock, timeUntil, type Clock } from '../time/timeUntil';
import {
  createGuardedInvocation,
  pipeValue,
  type MaybePromise,
  type TimerFailureEvent,
  type TimerSuccessEvent,
} from './guardedInvocation';
import {
  createTimerControl,
  type NamedTimerEntry,
  type TimerControl,
  type TimerEntry,
} from './timerControl';
import { parseDueTime, parseInterval } from './validation';

export type TimerRegistryOptions = {
  /** Defaults to a `NodeDelayScheduler` sharing the registry's logger. */
  scheduler?: DelayScheduler;
  logger?: TimerLogger;
  now?: Clock;
  /** Called when a success/failure observer throws. Defaults to logging at error level. */
  onObserverError?: (error: unknown, timerName: string) => void;
};

function isNamed(entry: TimerEntry): entry is NamedTimerEntry {
  return entry.name !== null;
}

/**
 * Registry of named timers.
 *
 * Each entry owns exactly one delay handle. Callbacks are wrapped so that user
 * errors are reported through {@link TimerRegistry.onFailure} (recurring
 * timers) or the returned promise (one-shots) and never reach the scheduler.
 *
 * @example
 * ```ts
 * const timers = new TimerRegistry({ logger });
 * timers.onFailure(({ name, error }) => logger.warn({ err: error }, name));
 * timers.addTimer('health-check', 30_000, () => checkHealth());
 * // ...
 * timers.dispose();
 * ```
 */
export class TimerRegistry {
  private readonly entries = new Map<string, NamedTimerEntry>();
  private readonly anonymous = new Set<TimerEntry>();
  private readonly scheduler: DelayScheduler;
  private readonly logger: TimerLogger;
  private readonly now: Clock;
  private readonly success: Subject<TimerSuccessEvent>;
  private readonly failure: Subject<TimerFailureEvent>;
  private disposed = false;

  constructor(options: TimerRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.scheduler = options.scheduler ?? new NodeDelayScheduler({ logger: this.logger });
    this.now = options.now ?? systemClock;

    const onObserverError =
      options.onObserverError ??
      ((err: unknown, timerName: string) => {
        this.logger.error?.({ err, timer: timerName }, 'timer.observer.failed');
      });
    this.success = createSubject<TimerSuccessEvent>({
      onError: (err, event) => onObserverError(err, event.name),
    });
    this.failure = createSubject<TimerFailureEvent>({
      onError: (err, event) => onObserverError(err, event.name),
    });
  }

  /** Subscribes to successful invocations of recurring timers. */
  onSuccess(observer: Observer<TimerSuccessEvent>): Unsubscribe {
    return this.success.subscribe(observer);
  }

  /** Subscribes to failed invocations of recurring timers. */
  onFailure(observer: Observer<TimerFailureEvent>): Unsubscribe {
    return this.failure.subscribe(observer);
  }

  /**
   * Adds a timer that runs `action` every `interval` ms, first after one
   * interval.
   *
   * @throws NameConflictError if `name` is already registered.
   * @throws InvalidIntervalError if `interval` is not a positive finite number.
   */
  addTimer(name: string, interval: number, action: () => MaybePromise<void>): void {
    this.addRecurring(name, interval, action);
  }

  /** Like {@link addTimer}, for a producer whose value is discarded. */
  addTimerWithResult<T>(name: string, producer: () => MaybePromise<T>, interval: number): void {
    this.addRecurring(name, interval, () => pipeValue(producer(), () => undefined));
  }

  /**
   * Like {@link addTimer}, passing each produced value to `handler` before the
   * success event. A throwing handler fails the invocation.
   */
  addTimerWithHandler<T>(
    name: string,
    producer: () => MaybePromise<T>,
    interval: number,
    handler: (value: T) => MaybePromise<void>,
  ): void {
    this.addRecurring(name, interval, () => pipeValue(producer(), handler));
  }

  /**
   * Runs `producer` once after `dueTime` ms and resolves with its value.
   *
   * With a non-empty `name` the timer is listed by {@link getTimerNames} and can
   * be cancelled with {@link removeTimer}, which rejects the promise with
   * `TimerCancelledError`. Name conflicts throw synchronously.
   */
  addOneShot<T>(
    name: string | null | undefined,
    producer: () => MaybePromise<T>,
    dueTime: number,
  ): Promise<T> {
    this.assertUsable();
    const timerName = name ? name : null;
    if (timerName !== null) {
      this.assertNameAvailable(timerName);
    }
    const delay = parseDueTime(dueTime);

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const fire = (): MaybePromise<void> => {
        if (settled) {
          return;
        }
        settled = true;
        this.detach(entry);

        let value: MaybePromise<T>;
        try {
          value = producer();
        } catch (err: unknown) {
          reject(ensureError(err));
          return;
        }

        if (value instanceof Promise) {
          const pending: Promise<T> = value;
          return pending.then(resolve, (err: unknown) => {
            reject(ensureError(err));
          });
        }
        resolve(value);
      };

      const entry: TimerEntry = {
        name: timerName,
        kind: 'one-shot',
        interval: delay,
        handle: this.scheduler.create(fire, delay, NO_REPEAT),
        cancel: () => {
          if (settled) {
            return;
          }
          settled = true;
          reject(new TimerCancelledError(timerName));
        },
      };

      if (isNamed(entry)) {
        this.entries.set(entry.name, entry);
      } else {
        this.anonymous.add(entry);
      }
      this.logger.debug?.({ timer: timerName, dueTimeMs: delay }, 'timer.one_shot.added');
    });
  }

  /**
   * Disables and releases the named timer. An invocation already running is
   * allowed to finish; nothing fires afterwards. Unknown names are ignored.
   */
  removeTimer(name: string): void {
    this.assertUsable();
    const entry = this.entries.get(name);
    if (!entry) {
      return;
    }

    this.entries.delete(name);
    this.release(entry);
    this.logger.info?.({ timer: name }, 'timer.removed');
  }

  /** Stops firing without releasing the timer. Returns false if `name` is unknown. */
  stopTimer(name: string): boolean {
    this.assertUsable();
    const entry = this.entries.get(name);
    if (!entry) {
      return false;
    }

    entry.handle.disable();
    this.logger.debug?.({ timer: name }, 'timer.stopped');
    return true;
  }

  /**
   * Re-arms the timer to fire after `interval` and every `interval` after that.
   * Returns false if `name` is unknown.
   */
  startTimer(name: string, interval: number): boolean {
    this.assertUsable();
    const entry = this.entries.get(name);
    if (!entry) {
      return false;
    }

    const period = parseInterval(interval);
    entry.interval = period;
    entry.handle.change(period, entry.kind === 'recurring' ? period : NO_REPEAT);
    this.logger.debug?.({ timer: name, intervalMs: period }, 'timer.started');
    return true;
  }

  getTimer(name: string): TimerControl | undefined {
    this.assertUsable();
    const entry = this.entries.get(name);
    if (!entry) {
      return undefined;
    }

    return createTimerControl(entry, {
      isLive: (candidate) => !this.disposed && this.entries.get(candidate.name) === candidate,
      remove: (timerName) => this.removeTimer(timerName),
    });
  }

  hasTimer(name: string): boolean {
    this.assertUsable();
    return this.entries.has(name);
  }

  /** Snapshot of the registered names; later changes do not affect it. */
  getTimerNames(): readonly string[] {
    this.assertUsable();
    return Object.freeze(Array.from(this.entries.keys()));
  }

  /** Milliseconds until `instant`, or 0 if it has already passed. */
  getTimeSpanUntil(instant: Date | number): number {
    return timeUntil(instant, this.now);
  }

  /** Releases every timer, named or anonymous. Pending one-shots are cancelled. */
  killAllTimers(): void {
    this.assertUsable();
    const count = this.releaseAll();
    this.logger.info?.({ count }, 'timer.all_removed');
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }

    const count = this.releaseAll();
    this.disposed = true;
    this.success.clear();
    this.failure.clear();
    this.logger.info?.({ count }, 'timer.registry.disposed');
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  private addRecurring(name: string, interval: number, body: () => MaybePromise<void>): void {
    this.assertUsable();
    this.assertNameAvailable(name);
    const period = parseInterval(interval);

    const callback = createGuardedInvocation({
      name,
      body,
      getInterval: () => entry.interval,
      onSuccess: (event) => this.success.notify(event),
      onFailure: (event) => {
        this.logger.warn?.({ err: event.error, timer: name }, 'timer.invocation.failed');
        this.failure.notify(event);
      },
    });

    const entry: NamedTimerEntry = {
      name,
      kind: 'recurring',
      interval: period,
      handle: this.scheduler.create(callback, period, period),
    };
    this.entries.set(name, entry);
    this.logger.info?.({ timer: name, intervalMs: period }, 'timer.added');
  }

  private detach(entry: TimerEntry): void {
    if (isNamed(entry)) {
      if (this.entries.get(entry.name) === entry) {
        this.entries.delete(entry.name);
      }
    } else {
      this.anonymous.delete(entry);
    }
    entry.handle.dispose();
  }

  private release(entry: TimerEntry): void {
    entry.handle.disable();
    entry.handle.dispose();
    entry.cancel?.();
  }

  private releaseAll(): number {
    const all: TimerEntry[] = [...this.entries.values(), ...this.anonymous];
    this.entries.clear();
    this.anonymous.clear();
    for (const entry of all) {
      this.release(entry);
    }
    return all.length;
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new DisposedError();
    }
  }

  private assertNameAvailable(name: string): void {
    if (this.entries.has(name)) {
      throw new NameConflictError(name);
    }
  }
}
