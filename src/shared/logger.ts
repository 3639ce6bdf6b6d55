// Shared logger: near-zero overhead when disabled
// Levels: 0=OFF, 1=ERROR, 2=WARN, 3=INFO, 4=DEBUG
// Everything is written to stderr; stdout belongs to rendered query output.

export const LOG_LEVEL = { OFF: 0, ERROR: 1, WARN: 2, INFO: 3, DEBUG: 4 } as const;
export type LogLevel = typeof LOG_LEVEL[keyof typeof LOG_LEVEL];
export type LogLevelName = 'off' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  off: LOG_LEVEL.OFF,
  error: LOG_LEVEL.ERROR,
  warn: LOG_LEVEL.WARN,
  info: LOG_LEVEL.INFO,
  debug: LOG_LEVEL.DEBUG,
};

let processLevel: LogLevel = LOG_LEVEL.WARN;

/** Set the level every logger without its own override follows */
export function setLogLevel(level: LogLevel | LogLevelName): void {
  processLevel = typeof level === 'number' ? level : LEVEL_BY_NAME[level];
}

export function getLogLevel(): LogLevel {
  return processLevel;
}

export class Logger {
  private _level: LogLevel | null;
  private _tag: string;

  /** Without an explicit level the logger tracks the process-wide level. */
  constructor(tag: string, level: LogLevel | null = null) {
    this._tag = tag;
    this._level = level;
  }

  get level(): LogLevel { return this._level ?? processLevel; }
  set level(l: LogLevel) { this._level = l; }

  debug(msg: string, ...args: unknown[]): void {
    if (this.level >= 4) console.error(`[${this._tag}] ${msg}`, ...args);
  }

  info(msg: string, ...args: unknown[]): void {
    if (this.level >= 3) console.error(`[${this._tag}] ${msg}`, ...args);
  }

  warn(msg: string, ...args: unknown[]): void {
    if (this.level >= 2) console.warn(`[${this._tag}] ${msg}`, ...args);
  }

  error(msg: string, ...args: unknown[]): void {
    if (this.level >= 1) console.error(`[${this._tag}] ${msg}`, ...args);
  }
}
