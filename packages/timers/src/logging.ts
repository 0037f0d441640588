type LogFn = (obj: Record<string, unknown>, msg: string) => void;

/**
 * Structural subset of a pino logger. Every method is optional so callers can
 * pass a partial logger, or nothing at all.
 */
export type TimerLogger = {
  debug?: LogFn;
  info?: LogFn;
  warn?: LogFn;
  error?: LogFn;
};

export const silentLogger: TimerLogger = {};
