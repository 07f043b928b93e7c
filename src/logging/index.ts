export { StructuredLogger, LogLevel, LogContext, LogEntry, logger, parseLogLevel } from './structured-logger';
