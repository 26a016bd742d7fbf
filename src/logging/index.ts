export {
  createConsoleLogger,
  defaultLogger,
  isLevelEnabled,
  MemoryLogger,
  silentLogger,
  type ConsoleLoggerOptions,
  type DiagnosticLogger,
  type LogEntry,
} from './logger.js';
