import { NO_REPEAT, type DelayHandle, type Period } from '../scheduler/delayScheduler';
import { parseDueTime, parseInterval } from './validation';

export type TimerKind = 'recurring' | 'one-shot';

export type TimerEntry = {
  /** null for anonymous one-shots, which are tracked but not addressable. */
  readonly name: string | null;
  readonly kind: TimerKind;
  readonly handle: DelayHandle;
  interval: number;
  /** Settles a pending one-shot with a cancellation. */
  cancel?: () => void;
};

export type NamedTimerEntry = TimerEntry & { readonly name: string };

/**
 * Restricted view of a registered timer. It can re-arm, pause or cancel the
 * timer but never releases the underlying handle itself, so the registry
 * stays the only owner.
 */
export interface TimerControl {
  readonly name: string;
  readonly kind: TimerKind;
  /**
   * Re-arms the timer: first fire after `dueTime`, then every `period`.
   * Omitting `period` keeps the timer's kind (recurring timers repeat at their
   * current interval, one-shots do not repeat).
   */
  rearm(dueTime: number, period?: Period): boolean;
  stop(): boolean;
  cancel(): void;
  isArmed(): boolean;
}

export type TimerControlBindings = {
  isLive(entry: NamedTimerEntry): boolean;
  remove(name: string): void;
};

export function createTimerControl(
  entry: NamedTimerEntry,
  bindings: TimerControlBindings,
): TimerControl {
  const isLive = (): boolean => bindings.isLive(entry);

  return {
    name: entry.name,
    kind: entry.kind,

    rearm(dueTime, period) {
      if (!isLive()) {
        return false;
      }

      const due = parseDueTime(dueTime);
      const defaultPeriod = entry.kind === 'recurring' ? entry.interval : NO_REPEAT;
      const next = period === undefined ? defaultPeriod : period === null ? NO_REPEAT : parseInterval(period);
      if (next !== null) {
        entry.interval = next;
      }
      return entry.handle.change(due, next);
    },

    stop() {
      return isLive() ? entry.handle.disable() : false;
    },

    cancel() {
      if (isLive()) {
        bindings.remove(entry.name);
      }
    },

    isArmed() {
      return isLive() && entry.handle.isArmed();
    },
  };
}
