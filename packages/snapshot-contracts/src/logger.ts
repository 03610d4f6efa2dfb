/**
 * Logger contract.
 *
 * Components receive an ILogger instead of writing to the console directly,
 * so hosts can route output wherever they like.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Where console logger lines go (overridable for tests)
 */
export interface LogSink {
  write(level: Exclude<LogLevel, 'silent'>, line: string): void;
}

const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else if (level === 'info') {
      console.info(line);
    } else {
      console.debug(line);
    }
  },
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Rendered as a `[scope]` prefix */
  scope?: string;
  sink?: LogSink;
}

function renderMeta(meta: LogMeta | undefined): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [unserializable meta]';
  }
}

/**
 * Console-backed logger with level filtering.
 *
 * Line format: `[scope] LEVEL message {"meta":"json"}`
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.scope ? `[${options.scope}] ` : '';
  const sink = options.sink ?? consoleSink;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink.write(level, `${prefix}${level.toUpperCase()} ${message}${renderMeta(meta)}`);
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, error, meta) =>
      emit('error', error ? `${message}: ${error.message}` : message, meta),
  };
}

/** Logger that drops everything */
export const noopLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
