export { Logger, createLogger, getLogger, isLogLevel, LOG_LEVELS } from './logger';
export type { LogLevel, LogData, LogEntry } from './logger';
export { HealthCheck } from './health';
export type { HealthCheckResult } from './health';
