/**
 * Structured Logger
 *
 * Pino-based logging for the flow monitor.
 * - GCP-style severity mapping in production (JSON to stdout)
 * - insertId for ordering entries that share a timestamp
 * - stack_trace extraction from `err`
 * - console-compatible call signatures: logger.warn('msg', extra)
 */

import pino from 'pino';

const SERVICE_NAME = 'water-flow-monitor';

const SEVERITY: Record<string, string> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

/** Monotonic counter for insertId */
let insertIdCounter = 0;

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.VITEST || process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function createLogger(): pino.Logger {
  const isDev = process.env.NODE_ENV === 'development';
  const level = resolveLogLevel();
  const base = {
    service: SERVICE_NAME,
    version: process.env.npm_package_version ?? '0.0.0',
  };

  if (!isDev) {
    return pino({
      level,
      messageKey: 'message',
      base,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: {
        level(label: string) {
          return {
            severity: SEVERITY[label] || 'DEFAULT',
            level: label,
          };
        },
        log(obj: Record<string, unknown>) {
          const result: Record<string, unknown> = {
            ...obj,
            'logging.googleapis.com/insertId': `${Date.now()}-${insertIdCounter++}`,
          };

          if (obj.err instanceof Error && obj.err.stack) {
            result['stack_trace'] = obj.err.stack;
          }

          return result;
        },
      },
    });
  }

  return pino({
    level,
    base,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: {
      target: 'pino/file',
      options: { destination: 1 },
    },
  });
}

const pinoLogger = createLogger();

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void;

type WrappedLogger = {
  warn: LogMethod;
  error: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => WrappedLogger;
  level: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts both pino's `(obj, msg)` order and console-style `(msg, extra)`.
 * Extra arguments after the message become structured context.
 */
function createWrappedLogger(base: pino.Logger): WrappedLogger {
  function wrapMethod(method: 'warn' | 'error' | 'info' | 'debug' | 'fatal'): LogMethod {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      const [first] = args;

      if (isRecord(msgOrObj) && typeof first === 'string') {
        base[method](msgOrObj, first);
        return;
      }

      if (typeof msgOrObj === 'string' && args.length > 0) {
        if (first instanceof Error) {
          base[method]({ err: first }, msgOrObj);
          return;
        }
        base[method]({ extra: first }, msgOrObj);
        return;
      }

      if (typeof msgOrObj === 'string') {
        base[method](msgOrObj);
        return;
      }

      base[method]({ extra: msgOrObj });
    };
  }

  return {
    warn: wrapMethod('warn'),
    error: wrapMethod('error'),
    info: wrapMethod('info'),
    debug: wrapMethod('debug'),
    fatal: wrapMethod('fatal'),
    child: (bindings: Record<string, unknown>) => createWrappedLogger(base.child(bindings)),
    get level() {
      return base.level;
    },
    set level(val: string) {
      base.level = val;
    },
  };
}

export const logger: WrappedLogger = createWrappedLogger(pinoLogger);

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  context: Record<string, string | number | boolean>
): WrappedLogger {
  return createWrappedLogger(pinoLogger.child(context));
}

export type Logger = WrappedLogger;
