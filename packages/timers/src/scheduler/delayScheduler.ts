export type DelayCallback = () => void | Promise<void>;

/** Period value meaning "fire once, do not repeat". */
export const NO_REPEAT = null;

export type Period = number | null;

/**
 * One scheduled callback. The creator owns the handle and is responsible for
 * disposing it.
 */
export interface DelayHandle {
  /** Re-arms the handle. Returns false if it has already been disposed. */
  change(dueTime: number, period: Period): boolean;
  /** Stops firing without releasing the handle. Returns false if disposed. */
  disable(): boolean;
  dispose(): void;
  isArmed(): boolean;
  isDisposed(): boolean;
}

export interface DelayScheduler {
  create(callback: DelayCallback, dueTime: number, period: Period): DelayHandle;
}
