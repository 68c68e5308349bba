/**
 * Structured Logging
 * JSON lines with module name and optional bound context.
 */

// ── Log Levels ──

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ── Logger Interface ──

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Returns a logger that adds `bindings` to every entry's context. */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  module: string;
  message: string;
  context?: Record<string, unknown>;
}

// ── Global State ──

let globalLogLevel: LogLevel = LogLevel.INFO;
let logOutput: (entry: LogEntry) => void = defaultOutput;

function defaultOutput(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Override the log output function (for testing). */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

export function resetLogOutput(): void {
  logOutput = defaultOutput;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Parse a level name such as `"warn"`; unknown names yield `undefined`. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

// ── Console Logger ──

export class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level?: LogLevel,
    private bindings: Record<string, unknown> = {},
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.module, this.level, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = this.level ?? globalLogLevel;
    if (level < effectiveLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
    };
    const merged = { ...this.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    logOutput(entry);
  }
}

export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
