import { trace } from '@opentelemetry/api';
import { format, transports, createLogger, type Logger } from 'winston';

const traceFormat = format((info) => {
  const span = trace.getActiveSpan();
  if (!span) return info;

  const context = span.spanContext();
  info.traceId = context.traceId;
  info.spanId = context.spanId;
  info.traceFlags = context.traceFlags;
  return info;
});

const logger = createLogger({
  level: process.env.LOG_LEVEL || 'http',
  format: format.combine(format.timestamp({ format: 'YYYY-MM-DD hh:mm:ss.SSS' }), format.json(), traceFormat()),
  defaultMeta: {
    service: 'memokit',
  },
  transports: [new transports.Console()],
});

/**
 * Creates the logger of a single engine component. Every record carries the component name next to the
 * labels of the cache it belongs to.
 */
export function componentLogger(component: string, labels: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...labels });
}

export default logger;
