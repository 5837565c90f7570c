import type { ILogger, LogLevel } from '../../ports/logger';

export type LogSink = Pick<Console, LogLevel>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// Every line reads `[tag] message`; anything below `level` is dropped.
export function createConsoleLogger(tag: string, level: LogLevel = 'info', sink: LogSink = console): ILogger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) { if (enabled('debug')) sink.debug(prefix, message, ...details); },
    info(message, ...details) { if (enabled('info')) sink.info(prefix, message, ...details); },
    warn(message, ...details) { if (enabled('warn')) sink.warn(prefix, message, ...details); },
    error(message, ...details) { if (enabled('error')) sink.error(prefix, message, ...details); },
  };
}

export const silentLogger: ILogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
