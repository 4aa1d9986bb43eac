/**
 * Structured Logging Utility
 *
 * All logs MUST be free of patient data. Records hold names, CPFs, phone
 * numbers and clinical notes; none of that may reach stdout.
 *
 * WHAT TO LOG:
 * - Hashed IDs
 * - Event types
 * - Timestamps
 * - Error codes and types
 *
 * WHAT NOT TO LOG:
 * - Patient names, CPFs, emails, phones
 * - Diagnosis / prescription text
 * - Passwords or tokens
 */

import { sha256Hash } from './hash.utils';

export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG',
}

/**
 * Structured log entry format
 */
export interface StructuredLog {
  timestamp: string;
  level: LogLevel;
  event: string;
  message: string;
  context?: {
    requestId?: string;
    userIdHash?: string;
    resourceType?: string;
    resourceIdHash?: string;
    ipAddressHash?: string;
  };
  metadata?: Record<string, unknown>;
  error?: {
    code?: string;
    type?: string;
    stack?: string;
  };
}

/**
 * Keep only the error type and code; messages can echo user input
 */
function sanitizeError(error: unknown): { code?: string; type?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      type: error.name,
      code,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }
  return { type: 'UnknownError' };
}

function logStructured(entry: StructuredLog): void {
  if (process.env.NODE_ENV === 'test') {
    return;
  }
  console.log(JSON.stringify(entry));
}

function buildEntry(
  level: LogLevel,
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): StructuredLog {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    message,
    context,
    metadata,
  };
}

export function logError(
  event: string,
  message: string,
  error?: unknown,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  const entry = buildEntry(LogLevel.ERROR, event, message, context, metadata);
  entry.error = error ? sanitizeError(error) : undefined;
  logStructured(entry);
}

export function logWarning(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured(buildEntry(LogLevel.WARN, event, message, context, metadata));
}

export function logInfo(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  logStructured(buildEntry(LogLevel.INFO, event, message, context, metadata));
}

/**
 * Log a debug event (only in development)
 */
export function logDebug(
  event: string,
  message: string,
  context?: StructuredLog['context'],
  metadata?: Record<string, unknown>
): void {
  if (process.env.NODE_ENV === 'development') {
    logStructured(buildEntry(LogLevel.DEBUG, event, message, context, metadata));
  }
}

/**
 * Helper to create a hashed context
 */
export function createRequestContext(
  requestId?: string,
  userId?: number | string,
  resourceType?: string,
  resourceId?: number | string,
  ipAddress?: string
): StructuredLog['context'] {
  return {
    requestId,
    userIdHash: userId !== undefined ? sha256Hash(String(userId)) : undefined,
    resourceType,
    resourceIdHash: resourceId !== undefined ? sha256Hash(String(resourceId)) : undefined,
    ipAddressHash: ipAddress ? sha256Hash(ipAddress) : undefined,
  };
}

/**
 * Log system error (no user context)
 */
export function logSystemError(
  event: string,
  message: string,
  error?: unknown,
  metadata?: Record<string, unknown>
): void {
  logError(event, message, error, undefined, metadata);
}
