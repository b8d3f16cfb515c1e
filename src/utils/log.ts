import type { LogLevel } from '../config.js';

// stdout belongs to the stdio transport; everything goes to stderr
export interface Logger {
  debug(tag: string, ...args: unknown[]): void;
  info(tag: string, ...args: unknown[]): void;
  warn(tag: string, ...args: unknown[]): void;
  error(tag: string, ...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2, debug: 3 };

export function createLogger(level: LogLevel): Logger {
  const on = (l: LogLevel) => RANK[level] >= RANK[l];
  return {
    debug: (tag, ...args) => { if (on('debug')) console.error(`[${tag}]`, ...args); },
    info: (tag, ...args) => { if (on('info')) console.error(`[${tag}]`, ...args); },
    warn: (tag, ...args) => { if (on('warn')) console.warn(`[${tag}]`, ...args); },
    error: (tag, ...args) => { if (level !== 'silent') console.error(`[${tag}]`, ...args); },
  };
}

export const silentLogger: Logger = createLogger('silent');
