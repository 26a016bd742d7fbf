import type { LogLevel } from '../validation/constants.js';

/**
 * Sink for diagnostics raised on evaluation error paths.
 *
 * Fire-and-forget: callers never consume a return value and a logger must
 * not throw.
 */
export interface DiagnosticLogger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

/** Single entry recorded by {@link MemoryLogger} */
export interface LogEntry {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown>;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: 'warn') */
  level?: LogLevel;
  /** Tag appended to the message prefix, e.g. `operatorPredicate` */
  component?: string;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimum];
}

/**
 * Creates a logger writing `[cep-predicates:<component>] message` to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): DiagnosticLogger {
  const minimum = options.level ?? 'warn';
  const prefix = options.component ? `[cep-predicates:${options.component}]` : '[cep-predicates]';

  const write = (level: LogLevel, message: string, details?: Record<string, unknown>): void => {
    if (!isLevelEnabled(level, minimum)) return;
    if (details !== undefined) {
      console[level](`${prefix} ${message}`, details);
    } else {
      console[level](`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, details) => write('debug', message, details),
    info: (message, details) => write('info', message, details),
    warn: (message, details) => write('warn', message, details),
    error: (message, details) => write('error', message, details),
  };
}

/** Logger that drops everything */
export const silentLogger: DiagnosticLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger keeping entries in memory. Useful for tests and for callers that
 * collect diagnostics per evaluation batch.
 */
export class MemoryLogger implements DiagnosticLogger {
  private readonly _entries: LogEntry[] = [];

  get entries(): readonly LogEntry[] {
    return this._entries;
  }

  debug(message: string, details?: Record<string, unknown>): void {
    this.record('debug', message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.record('info', message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.record('warn', message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    this.record('error', message, details);
  }

  /** Entries at the given level */
  at(level: LogLevel): LogEntry[] {
    return this._entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this._entries.length = 0;
  }

  private record(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    this._entries.push({ level, message, ...(details !== undefined && { details }) });
  }
}

/** Logger used by predicates constructed without an explicit one */
export const defaultLogger: DiagnosticLogger = createConsoleLogger({ component: 'predicate' });
