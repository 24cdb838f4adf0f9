export { logger, log, setLogLevel, getLogLevel, isLogLevel, errorField } from './logger';
export type { LogLevel, LogEntry } from './logger';
