import type { LogLevel } from '../config';

type EventLevel = Exclude<LogLevel, 'silent'>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Same sink and threshold, different `[Scope]` tag */
  child: (scope: string) => Logger;
}

export function formatLogLine(level: EventLevel, scope: string, message: string, now = new Date()): string {
  return `${now.toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`;
}

const emit = (level: EventLevel, scope: string, message: string) => {
  const line = formatLogLine(level, scope, message);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * One line per event: timestamp, level, `[Scope]`, message.
 */
export const createLogger = (scope: string, threshold: LogLevel = 'info'): Logger => {
  const shouldLog = (level: EventLevel) => levelWeights[level] >= levelWeights[threshold];
  const log = (level: EventLevel) => (message: string) => {
    if (shouldLog(level)) emit(level, scope, message);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (childScope: string) => createLogger(childScope, threshold),
  };
};
