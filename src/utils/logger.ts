type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/**
 * Structured JSON logger. Credentials and provider secrets are redacted
 * before anything reaches stdout/stderr.
 */
class Logger {
  private level: LogLevel;
  private sensitiveFields = ['password', 'token', 'secret', 'authorization', 'passkey', 'consumerkey'];

  constructor() {
    const configured = process.env.LOG_LEVEL;
    this.level = isLogLevel(configured) ? configured : 'info';
  }

  redact(value: unknown): unknown {
    if (typeof value !== 'object' || value === null) return value;
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Error) return { name: value.name, message: value.message };
    if (Array.isArray(value)) return value.map(item => this.redact(item));
    return this.redactRecord(value);
  }

  private redactRecord(value: object): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (this.sensitiveFields.some(field => key.toLowerCase().includes(field))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = this.redact(entry);
      }
    }
    return redacted;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.redactRecord(context || {}),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else {
      console.warn(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const logger = new Logger();
