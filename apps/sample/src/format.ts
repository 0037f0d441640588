const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/** "1 day 2 hours 5 seconds"; spans under a millisecond print with four decimals. */
export function formatDuration(ms: number): string {
  const units: Array<[number, string]> = [
    [Math.floor(ms / MS_PER_DAY), 'day'],
    [Math.floor(ms / MS_PER_HOUR) % 24, 'hour'],
    [Math.floor(ms / MS_PER_MINUTE) % 60, 'minute'],
    [Math.floor(ms / MS_PER_SECOND) % 60, 'second'],
    [Math.floor(ms) % 1000, 'millisecond'],
  ];

  const parts = units.filter(([count]) => count > 0).map(([count, unit]) => plural(count, unit));
  if (parts.length === 0) {
    return `${ms.toFixed(4)} milliseconds`;
  }
  return parts.join(' ');
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local wall-clock time as `hh:mm:ss.fff AM`. */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours();
  const hours12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? 'AM' : 'PM';
  return `${pad(hours12)}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)} ${suffix}`;
}
