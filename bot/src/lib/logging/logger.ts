/**
 * Centralized logging utility for the bot and its render pipeline.
 * Emits structured JSON lines in the pino shape so logs can be piped through jq.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const logger = createLogger('RenderOrchestrator');
 *   logger.info('Render finished', { username, view: 'equipped', bytes: 5120 });
 *   logger.warn('Color out of range, clamped', { field: 'intColorHair', value: -1 });
 *
 * Log levels: debug, info, warn, error
 *
 * Output format:
 *   { "level": 30, "time": <timestamp>, "context": "Renderer", "msg": "...", ...fields }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export interface LogContext {
  [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

/**
 * Masks credentials and summarizes binary payloads in log context.
 * Rendered images are logged by size only.
 */
export function sanitizeContext(data: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();

    if (lowerKey.includes('token') || lowerKey.includes('password') || lowerKey.includes('secret')
        || lowerKey.includes('apikey') || lowerKey.includes('api_key') || lowerKey === 'cookie' || lowerKey === 'authorization') {
      sanitized[key] = '***';
    } else if (Buffer.isBuffer(value) || value instanceof Uint8Array) {
      sanitized[key] = `<${value.byteLength} bytes>`;
    } else if (value instanceof Error) {
      sanitized[key] = {
        message: value.message,
        name: value.name,
        stack: value.stack,
      };
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export class Logger {
  private context: string;
  /** Fixed level; when unset, LOG_LEVEL is read on every call */
  private minLevel?: LogLevel;

  constructor(context: string = 'Bot', minLevel?: LogLevel) {
    this.context = context;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.minLevel ?? envLevel()];
  }

  private formatStructured(level: LogLevel, message: string, data?: LogContext): string {
    const logEntry: Record<string, unknown> = {
      level: LOG_LEVEL_VALUES[level],
      time: Date.now(),
      context: this.context,
      msg: message,
    };

    if (data && Object.keys(data).length > 0) {
      Object.assign(logEntry, sanitizeContext(data));
    }

    return JSON.stringify(logEntry);
  }

  debug(message: string, data?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatStructured('debug', message, data));
    }
  }

  info(message: string, data?: LogContext): void {
    if (this.shouldLog('info')) {
      console.log(this.formatStructured('info', message, data));
    }
  }

  warn(message: string, data?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatStructured('warn', message, data));
    }
  }

  error(message: string, data?: LogContext): void {
    if (this.shouldLog('error')) {
      console.error(this.formatStructured('error', message, data));
    }
  }
}

function envLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

/**
 * Create a logger instance with a specific context
 * @param context - Context string attached to every line (e.g., 'CharPage', 'Renderer')
 * @param minLevel - Minimum level to output (defaults to LOG_LEVEL env var, then 'info')
 */
export function createLogger(context: string, minLevel?: LogLevel): Logger {
  return new Logger(context, minLevel);
}
