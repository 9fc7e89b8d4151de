/**
 * HTTP request logging utility
 * Structured logging for requests to the upstream character site
 */

import { createLogger } from './logger.js';

const logger = createLogger('HTTP');

export interface HttpLogContext {
  requestId: string;
  method: string;
  url: string;
  username?: string;
  status?: number;
  duration?: number;
  error?: string;
  [key: string]: unknown; // Index signature for LogContext compatibility
}

/**
 * Log HTTP request start
 */
export function logHttpStart(ctx: Omit<HttpLogContext, 'status' | 'duration'>): void {
  logger.debug('Upstream request starting', ctx);
}

export function logHttpSuccess(ctx: HttpLogContext): void {
  logger.info('Upstream request completed', ctx);
}

export function logHttpError(ctx: HttpLogContext): void {
  logger.warn('Upstream request failed', ctx);
}

export function logHttpTimeout(ctx: HttpLogContext): void {
  logger.error('Upstream request timed out', ctx);
}
