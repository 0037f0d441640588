import type { TimerLogger } from '../logging';
import type { DelayCallback, DelayHandle, DelayScheduler, Period } from './delayScheduler';

type TimeoutHandle = ReturnType<typeof setTimeout>;

/** Longest delay setTimeout accepts before it overflows and fires immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type NodeDelaySchedulerOptions = {
  logger?: TimerLogger;
  /** When true, pending timeouts do not keep the process alive. */
  unref?: boolean;
};

class NodeDelayHandle implements DelayHandle {
  private timeoutId: TimeoutHandle | null = null;
  private generation = 0;
  private armed = false;
  private disposed = false;
  private period: Period = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly callback: DelayCallback,
    private readonly options: NodeDelaySchedulerOptions,
  ) {}

  change(dueTime: number, period: Period): boolean {
    if (this.disposed) {
      return false;
    }

    this.clearTimeoutIfNeeded();
    this.generation += 1;
    this.period = period;
    this.armed = true;
    this.wait(dueTime, this.generation);
    return true;
  }

  disable(): boolean {
    if (this.disposed) {
      return false;
    }

    this.clearTimeoutIfNeeded();
    this.generation += 1;
    this.armed = false;
    return true;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disable();
    this.disposed = true;
  }

  isArmed(): boolean {
    return this.armed;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  private clearTimeoutIfNeeded(): void {
    if (!this.timeoutId) {
      return;
    }
    clearTimeout(this.timeoutId);
    this.timeoutId = null;
  }

  private wait(delayMs: number, generation: number): void {
    const step = Math.min(Math.max(delayMs, 0), MAX_TIMEOUT_MS);
    const remaining = delayMs - step;

    this.timeoutId = setTimeout(() => {
      this.timeoutId = null;
      if (generation !== this.generation) {
        return;
      }
      if (remaining > 0) {
        this.wait(remaining, generation);
        return;
      }
      this.fire(generation);
    }, step);

    if (this.options.unref) {
      this.timeoutId.unref();
    }
  }

  private fire(generation: number): void {
    if (this.disposed || !this.armed || generation !== this.generation) {
      return;
    }

    if (this.period === null) {
      if (this.inFlight) {
        // no later period picks this fire up; it runs once the current invocation settles
        this.options.logger?.debug?.({ period: null }, 'delay_scheduler.fire.deferred');
        void this.inFlight.then(() => this.fire(generation));
        return;
      }
      this.armed = false;
      this.run();
      return;
    }

    // next period counts from the start of this fire, not from its completion
    this.wait(this.period, generation);

    if (this.inFlight) {
      this.options.logger?.debug?.({ period: this.period }, 'delay_scheduler.fire.skipped');
      return;
    }

    this.run();
  }

  private run(): void {
    let result: void | Promise<void>;
    try {
      result = this.callback();
    } catch (err: unknown) {
      this.reportFailure(err);
      return;
    }

    if (result instanceof Promise) {
      this.inFlight = result
        .catch((err: unknown) => {
          this.reportFailure(err);
        })
        .finally(() => {
          this.inFlight = null;
        });
    }
  }

  private reportFailure(err: unknown): void {
    this.options.logger?.error?.({ err }, 'delay_scheduler.callback.failed');
  }
}

/**
 * `setTimeout`-backed scheduler. A handle never runs its callback concurrently
 * with itself: a periodic fire that comes due while the previous async
 * invocation is still pending is skipped, and a non-repeating one is deferred
 * until that invocation settles.
 */
export class NodeDelayScheduler implements DelayScheduler {
  constructor(private readonly options: NodeDelaySchedulerOptions = {}) {}

  create(callback: DelayCallback, dueTime: number, period: Period): DelayHandle {
    const handle = new NodeDelayHandle(callback, this.options);
    handle.change(dueTime, period);
    return handle;
  }
}
