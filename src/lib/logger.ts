/**
 * Structured Logger
 * JSON log lines on the console, one logger per component.
 *   - level filtering (MKT_LOG_LEVEL, default `warn`)
 *   - request context (method, url, status, duration)
 *   - error name/message/stack capture
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** HTTP method */
  method?: string;
  /** Request URL, already redacted */
  url?: string;
  /** Elapsed time in milliseconds */
  duration?: number;
  /** Response status code */
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level (default: from MKT_LOG_LEVEL, else 'warn') */
  minLevel?: LogLevel;
  /** Include stack traces (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Level from MKT_LOG_LEVEL, or the fallback when unset or unknown
 */
export function resolveLogLevel(fallback: LogLevel = 'warn'): LogLevel {
  const value = process.env.MKT_LOG_LEVEL?.toLowerCase();
  return value && isLogLevel(value) ? value : fallback;
}

export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;
  private includeStack: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? resolveLogLevel();
    this.includeStack = config.includeStack !== false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.info(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: this.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Shared loggers, one per component
 */
export const loggers = {
  http: new StructuredLogger('HTTP'),
  oauth: new StructuredLogger('OAuth2'),
  cli: new StructuredLogger('CLI'),
};

/**
 * Apply one level to every shared logger (CLI --verbose)
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

const REDACTED_PARAMS = new Set(['client_secret', 'access_token', 'code', 'api_key']);

/**
 * Mask credential-bearing query values before a URL reaches a log line
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  let changed = false;
  for (const key of [...parsed.searchParams.keys()]) {
    if (REDACTED_PARAMS.has(key.toLowerCase())) {
      parsed.searchParams.set(key, '***');
      changed = true;
    }
  }
  return changed ? parsed.toString() : url;
}
