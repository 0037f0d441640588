export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

function toEpochMs(instant: Date | number): number {
  return instant instanceof Date ? instant.getTime() : instant;
}

/**
 * Milliseconds from now until `instant`, clamped at zero so that an instant in
 * the past means "as soon as possible".
 */
export function timeUntil(instant: Date | number, now: Clock = systemClock): number {
  const delay = toEpochMs(instant) - now();
  return delay > 0 ? delay : 0;
}

/**
 * Milliseconds until the next local midnight, optionally shifted by
 * `addHours` (e.g. 1 for 1 AM tomorrow).
 */
export function timeUntilMidnight(addHours = 0, now: Clock = systemClock): number {
  const current = new Date(now());
  const target = new Date(current.getFullYear(), current.getMonth(), current.getDate() + 1);
  if (addHours > 0) {
    target.setHours(target.getHours() + addHours);
  }
  return timeUntil(target, () => current.getTime());
}
