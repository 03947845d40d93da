import winston from 'winston';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface LogData {
  sessionId?: string;
  event?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  sessionId?: string;
  event?: string;
  message?: string;
  data?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

class Logger {
  private winstonLogger: winston.Logger;
  private logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(formatConsoleOutput)
        ),
      }),
    ];

    // Jest workers would otherwise all append to the same files
    if (process.env.NODE_ENV !== 'test') {
      transports.push(
        new winston.transports.File({
          filename: 'logs/combined.log',
          format: winston.format.json(),
        })
      );
    }

    if (process.env.NODE_ENV === 'production') {
      transports.push(
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          format: winston.format.json(),
        })
      );
    }

    this.winstonLogger = winston.createLogger({
      level: mapLogLevel(logLevel),
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: LogData,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
    };

    if (message) {
      entry.message = message;
    }

    if (data) {
      const { sessionId, event, ...rest } = data;
      if (sessionId) {
        entry.sessionId = sessionId;
      }
      if (event) {
        entry.event = event;
      }
      if (Object.keys(rest).length > 0) {
        entry.data = rest;
      }
    }

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
      };

      if ('code' in error && typeof error.code === 'string') {
        entry.error.code = error.code;
      }
    }

    return entry;
  }

  debug(message: string, data?: LogData): void {
    this.winstonLogger.debug(this.createLogEntry('DEBUG', message, data));
  }

  info(message: string, data?: LogData): void {
    this.winstonLogger.info(this.createLogEntry('INFO', message, data));
  }

  warn(message: string, data?: LogData): void {
    this.winstonLogger.warn(this.createLogEntry('WARN', message, data));
  }

  error(message: string, dataOrError?: LogData | Error, error?: Error): void {
    let logData: LogData | undefined;
    let logError: Error | undefined;

    if (dataOrError instanceof Error) {
      logError = dataOrError;
    } else {
      logData = dataOrError;
      logError = error;
    }

    this.winstonLogger.error(this.createLogEntry('ERROR', message, logData, logError));
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.winstonLogger.level = mapLogLevel(level);
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }
}

function mapLogLevel(level: LogLevel): string {
  const levelMap: Record<LogLevel, string> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARN: 'warn',
    ERROR: 'error',
  };
  return levelMap[level];
}

function formatConsoleOutput(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, sessionId, event, ...rest } = info;
  let output = `${String(timestamp)} [${level}]`;

  if (typeof sessionId === 'string') {
    output += ` [${sessionId}]`;
  }

  if (typeof event === 'string') {
    output += ` ${event}`;
  }

  if (message) {
    output += `: ${String(message)}`;
  }

  if (Object.keys(rest).length > 0) {
    output += ` ${JSON.stringify(rest)}`;
  }

  return output;
}

let loggerInstance: Logger | null = null;

function levelFromEnv(): LogLevel | undefined {
  const envLogLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLogLevel) ? envLogLevel : undefined;
}

export function createLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel || levelFromEnv() || 'INFO');
  } else if (logLevel) {
    loggerInstance.setLogLevel(logLevel);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(levelFromEnv() || 'INFO');
  }
  return loggerInstance;
}

export { Logger };
export default Logger;
