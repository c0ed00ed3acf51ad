import { nowIso } from './date.js';
import { env } from './env.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * LOG_LEVEL 예시: "DEBUG", "warn"
 * - 비어있으면 INFO
 * - 잘못된 값이면 에러 발생
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (!normalized) return 'INFO';
  if (!isLogLevel(normalized)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join('|')}, got: ${raw}`);
  }
  return normalized;
}

function levelFromEnv(): LogLevel {
  const normalized = env('LOG_LEVEL')?.trim().toUpperCase();
  return normalized && isLogLevel(normalized) ? normalized : 'INFO';
}

export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private serviceName: string,
    minLevel?: LogLevel
  ) {
    this.minLevel = minLevel ?? levelFromEnv();
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string, minLevel?: LogLevel): Logger {
  return new Logger(serviceName, minLevel);
}
