import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { context, trace } from '@opentelemetry/api';

export type CreateLoggerOptions = {
  level: string;
  destination?: DestinationStream;
  base?: LoggerOptions['base'];
  timestamp?: LoggerOptions['timestamp'];
};

const traceContextMixin = (): Record<string, unknown> => {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
};

/**
 * Pino logger that adds `traceId`/`spanId` when an OpenTelemetry span is
 * active. The timer registry accepts it as its logger directly.
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level,
    mixin: traceContextMixin,
    ...(options.base !== undefined ? { base: options.base } : {}),
    ...(options.timestamp !== undefined ? { timestamp: options.timestamp } : {}),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
