export {
  TimerError,
  NameConflictError,
  InvalidIntervalError,
  DisposedError,
  TimerCancelledError,
  isTimerError,
  ensureError,
  type TimerErrorCode,
} from './errors';
export { silentLogger, type TimerLogger } from './logging';
export { createSubject, type Observer, type Subject, type SubjectOptions, type Unsubscribe } from './observer';
export {
  NO_REPEAT,
  type DelayCallback,
  type DelayHandle,
  type DelayScheduler,
  type Period,
} from './scheduler/delayScheduler';
export {
  MAX_TIMEOUT_MS,
  NodeDelayScheduler,
  type NodeDelaySchedulerOptions,
} from './scheduler/nodeDelayScheduler';
export {
  createGuardedInvocation,
  type GuardedInvocationOptions,
  type MaybePromise,
  type TimerFailureEvent,
  type TimerSuccessEvent,
} from './registry/guardedInvocation';
export type { TimerControl, TimerKind } from './registry/timerControl';
export { TimerRegistry, type TimerRegistryOptions } from './registry/timerRegistry';
export { systemClock, timeUntil, timeUntilMidnight, type Clock } from './time/timeUntil';
