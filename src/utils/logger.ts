import { config, LogLevelName } from '../config';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  scope?: string;
  message: string;
}

type LogListener = (entry: LogEntry) => void;

/**
 * Leveled console logger with optional per-file scopes.
 * Listeners receive every entry that passes the level filter.
 */
export class Logger {
  private level: LogLevelName;
  private listeners: LogListener[] = [];

  constructor(level: LogLevelName = config.logLevel) {
    this.level = level;
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  child(scope: string): ScopedLogger {
    return new ScopedLogger(this, scope);
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  log(level: LogLevelName, message: string, scope?: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, scope, message };
    this.listeners.forEach((l) => l(entry));

    const line = scope ? `[${scope}] ${message}` : message;
    if (level === 'debug') console.debug(line);
    else if (level === 'info') console.info(line);
    else if (level === 'warn') console.warn(line);
    else console.error(line);
  }
}

export class ScopedLogger {
  constructor(
    private parent: Logger,
    readonly scope: string
  ) {}

  debug(message: string): void {
    this.parent.log('debug', message, this.scope);
  }

  info(message: string): void {
    this.parent.log('info', message, this.scope);
  }

  warn(message: string): void {
    this.parent.log('warn', message, this.scope);
  }

  error(message: string): void {
    this.parent.log('error', message, this.scope);
  }
}

/** Anything a component can log through */
export type LogSink = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export const logger = new Logger();
