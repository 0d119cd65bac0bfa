import { createHash } from 'crypto';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

class Logger {
  private minLevel: LogLevel;

  constructor() {
    const logLevelEnv = process.env.LOG_LEVEL?.toUpperCase();

    if (logLevelEnv && isLogLevel(logLevelEnv)) {
      this.minLevel = logLevelEnv;
    } else {
      const env = process.env.NODE_ENV || 'development';
      this.minLevel = env === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
    }
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private format(entry: LogEntry): string {
    const base = `[${entry.timestamp}] [${entry.level}] ${entry.message}`;

    if (entry.meta !== undefined) {
      const metaStr = typeof entry.meta === 'object'
        ? JSON.stringify(entry.meta, null, 2)
        : String(entry.meta);
      return `${base}\n${metaStr}`;
    }

    return base;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) return;

    const line = this.format({ timestamp: new Date().toISOString(), level, message, meta });

    if (level === LogLevel.DEBUG || level === LogLevel.INFO) {
      console.log(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown): void {
    let meta: unknown = error;

    if (error instanceof Error) {
      meta = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.write(LogLevel.ERROR, message, meta);
  }
}

/**
 * Hash an address for privacy-safe logging (PII protection)
 * Returns first 8 chars of SHA256 hash for log correlation
 */
export function hashEmailForLogging(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').substring(0, 8);
}

export const logger = new Logger();
