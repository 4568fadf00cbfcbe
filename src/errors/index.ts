/**
 * Error taxonomy for the notification engine.
 *
 * Every error raised on purpose is an AppError carrying a stable code, so the
 * API layer in front of the engine can map it without string matching.
 */

import { logger } from '../config/logger';

// =============================================================================
// TYPES
// =============================================================================

export interface ErrorDetails {
  [key: string]: unknown;
}

export interface SerializedError {
  code: string;
  status: number;
  message: string;
  details?: ErrorDetails;
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: ErrorDetails;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      status: this.statusCode,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/** Malformed or expired notification; never retried */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, 'VALIDATION_ERROR', true, details);
  }
}

/** Channel not initialized or recipient of the wrong shape */
export class ConfigurationError extends AppError {
  constructor(channel: string, reason: string) {
    super(`${channel} channel misconfigured: ${reason}`, 500, 'CONFIGURATION_ERROR', true, {
      channel,
      reason,
    });
  }
}

/** Transport failure or timeout; eligible for retry */
export class DeliveryError extends AppError {
  constructor(channel: string, reason: string, details?: ErrorDetails) {
    super(`Failed to send ${channel} notification: ${reason}`, 502, 'DELIVERY_ERROR', true, {
      channel,
      reason,
      ...details,
    });
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 504, 'TIMEOUT', true, {
      operation,
      timeoutMs,
    });
  }
}

export class ScheduleNotFoundError extends AppError {
  constructor(scheduleId: string) {
    super(`Schedule with ID ${scheduleId} not found`, 404, 'SCHEDULE_NOT_FOUND', true, {
      scheduleId,
    });
  }
}

export class QueueFullError extends AppError {
  constructor(queue: string, capacity: number) {
    super(`Queue ${queue} is full (capacity ${capacity})`, 503, 'QUEUE_FULL', true, {
      queue,
      capacity,
    });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(service: string, message?: string) {
    super(
      message || `Service ${service} is temporarily unavailable`,
      503,
      'SERVICE_UNAVAILABLE',
      true,
      { service }
    );
  }
}

export class TemplateError extends AppError {
  constructor(templateId: string, message: string) {
    super(`Template error for ${templateId}: ${message}`, 400, 'TEMPLATE_ERROR', true, {
      templateId,
    });
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Check if error is operational (expected) or programming error
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error with the level its kind deserves: operational errors are
 * expected at runtime, anything else is a bug.
 */
export function logError(context: string, error: unknown, meta: Record<string, unknown> = {}): void {
  if (isOperationalError(error)) {
    logger.warn(context, { ...meta, error: errorMessage(error) });
    return;
  }
  logger.error(context, {
    ...meta,
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
}
