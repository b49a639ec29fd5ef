/**
 * Logging
 *
 * Levels match the native engine's own log callback so engine and binding
 * messages can share one sink.
 */

export enum LogLevel {
  Error = 1,
  Warn,
  Info,
  Debug,
  Trace,
}

/**
 * Receives every message at or below the configured level.
 */
export type LogSink = (level: LogLevel, target: string, message: string) => void;

export interface Logger {
  readonly target: string;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

/**
 * Default sink: errors and warnings go to the console, the rest is dropped.
 */
export const consoleSink: LogSink = (level, target, message) => {
  const line = `[${target}] ${message}`;
  if (level === LogLevel.Error) {
    console.error(line);
  } else if (level === LogLevel.Warn) {
    console.warn(line);
  }
};

/**
 * Create a logger for one component.
 *
 * @param target - Component name prefixed to every message
 * @param sink - Where messages go
 * @param maxLevel - Most verbose level forwarded to the sink
 */
export function createLogger(
  target: string,
  sink: LogSink = consoleSink,
  maxLevel: LogLevel = LogLevel.Warn
): Logger {
  const emit = (level: LogLevel, message: string): void => {
    if (level <= maxLevel) {
      sink(level, target, message);
    }
  };
  return {
    target,
    error: (message) => emit(LogLevel.Error, message),
    warn: (message) => emit(LogLevel.Warn, message),
    info: (message) => emit(LogLevel.Info, message),
    debug: (message) => emit(LogLevel.Debug, message),
    trace: (message) => emit(LogLevel.Trace, message),
  };
}
