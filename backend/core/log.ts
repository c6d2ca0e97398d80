import type { LogEvent, LogFn, LogLevel } from './types.js';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

/** One JSON line per event; debug/info on stdout, warn/error on stderr. */
export function createLogger(level: LogLevel = 'info'): LogFn {
  const min = LOG_LEVELS.indexOf(level);
  return (e: LogEvent) => {
    if (LOG_LEVELS.indexOf(e.level) < min) return;
    const line = JSON.stringify({ time: new Date().toISOString(), ...e });
    if (e.level === 'warn' || e.level === 'error') console.error(line);
    else console.log(line);
  };
}

export const silentLogger: LogFn = () => {};
