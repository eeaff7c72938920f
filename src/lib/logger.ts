export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerContext {
  name: string;
  level?: LogLevel;
  defaultFields?: Record<string, unknown>;
  /** Receives each serialized line; stderr by default so stdout keeps the transcript */
  sink?: (line: string) => void;
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  child(childContext: Partial<LoggerContext>): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function log(level: LogLevel, context: LoggerContext, message: string, fields?: Record<string, unknown>): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(context.level ?? 'warn')) return;

  const payload = {
    level,
    message,
    logger: context.name,
    ...(context.defaultFields ?? {}),
    ...(fields ?? {}),
    timestamp: new Date().toISOString(),
  };

  (context.sink ?? writeStderr)(JSON.stringify(payload));
}

function mergeContext(base: LoggerContext, childContext: Partial<LoggerContext>): LoggerContext {
  return {
    name: childContext.name ?? base.name,
    level: childContext.level ?? base.level,
    sink: childContext.sink ?? base.sink,
    defaultFields: {
      ...(base.defaultFields ?? {}),
      ...(childContext.defaultFields ?? {}),
    },
  };
}

export function createLogger(context: LoggerContext): Logger {
  const logWithLevel = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
    log(level, context, message, fields);
  };

  const child = (childContext: Partial<LoggerContext>): Logger => createLogger(mergeContext(context, childContext));

  return {
    debug: (message, fields) => logWithLevel('debug', message, fields),
    info: (message, fields) => logWithLevel('info', message, fields),
    warn: (message, fields) => logWithLevel('warn', message, fields),
    error: (message, fields) => logWithLevel('error', message, fields),
    child,
  };
}

/** Logger used when the caller does not pass one */
export const silentLogger: Logger = createLogger({ name: 'unpak', level: 'error', sink: () => undefined });
