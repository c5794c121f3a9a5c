interface LogLevel {
  ERROR: 'error';
  WARN: 'warn';
  INFO: 'info';
  DEBUG: 'debug';
}

export type LogLevelKey = keyof LogLevel;

interface LogEntry {
  timestamp: string;
  level: LogLevelKey;
  message: string;
  service: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string | undefined;
  };
}

const LEVELS: Record<LogLevelKey, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

export function toLogLevel(level: LogLevel[LogLevelKey]): LogLevelKey {
  switch (level) {
    case 'error':
      return 'ERROR';
    case 'warn':
      return 'WARN';
    case 'debug':
      return 'DEBUG';
    default:
      return 'INFO';
  }
}

export class Logger {
  private serviceName: string;
  private logLevel: LogLevelKey = 'INFO';

  constructor(serviceName: string, logLevel: LogLevelKey = 'INFO') {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
  }

  /**
   * Logger for a sub-component that keeps this logger's level
   */
  child(serviceName: string): Logger {
    return new Logger(serviceName, this.logLevel);
  }

  private shouldLog(level: LogLevelKey): boolean {
    return LEVELS[level] <= LEVELS[this.logLevel];
  }

  private formatLog(level: LogLevelKey, message: string, data?: Record<string, unknown>, error?: Error): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.serviceName,
    };

    if (data) {
      logEntry.data = data;
    }

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack || undefined,
      };
    }

    return logEntry;
  }

  private output(level: LogLevelKey, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const line = JSON.stringify(this.formatLog(level, message, data, error));

    switch (level) {
      case 'ERROR':
        console.error(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      case 'INFO':
        console.log(line);
        break;
      case 'DEBUG':
        console.debug(line);
        break;
    }
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.output('ERROR', message, data, error);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.output('WARN', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.output('INFO', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.output('DEBUG', message, data);
  }

  // Specialized logging methods for the ingestion pipeline
  fetchRetry(symbol: string, attempt: number, maxAttempts: number, delayMs: number, cause: string): void {
    this.warn('Provider request failed, backing off', { symbol, attempt, maxAttempts, delayMs, cause });
  }

  entrySkipped(symbol: string, dateKey: string, reason: string): void {
    this.warn('Skipped malformed entry', { symbol, dateKey, reason });
  }

  databaseOperation(operation: string, details?: Record<string, unknown>, duration?: number, error?: Error): void {
    const data: Record<string, unknown> = { operation, ...details };
    if (duration !== undefined) {
      data.duration = duration;
    }

    if (error) {
      this.error(`Database ${operation} failed`, data, error);
    } else {
      this.info(`Database ${operation} completed`, data);
    }
  }

  symbolCompleted(symbol: string, rowsWritten: number, rowsSkipped: number, durationMs: number): void {
    this.info('Symbol ingested', { symbol, rowsWritten, rowsSkipped, durationMs });
  }
}

// Utility function to create a logger for a specific service
export function createLogger(serviceName: string, logLevel: LogLevelKey = 'INFO'): Logger {
  return new Logger(serviceName, logLevel);
}
