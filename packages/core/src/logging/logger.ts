import type { LogLevel } from '@tickertape/shared';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

interface LoggerOptions {
  level: LogLevel;
  scope?: string;
  /** Defaults to stderr; the CLI owns stdout. */
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level];
  const sink = options.sink ?? stderrSink;
  const scopeTag = options.scope ? ` [${options.scope}]` : '';

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink(`[tickertape] [${level}]${scopeTag} ${message}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (scope) =>
      createLogger({
        level: options.level,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
