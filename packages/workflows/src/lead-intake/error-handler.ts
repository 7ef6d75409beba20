/**
 * Error Handler
 *
 * Maps faults raised by collaborators (scoring service, spreadsheet,
 * calendar, notification channels) to error codes for logs.
 *
 * @module lead-intake/error-handler
 */

import { getErrorMessage } from '@lead-intake/lib';

// ===========================================
// Types
// ===========================================

export const ErrorCodes = {
  TIMEOUT: 'TIMEOUT',
  RATE_LIMITED: 'RATE_LIMITED',
  AUTH_FAILED: 'AUTH_FAILED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Classified error with code
 */
export interface ClassifiedError {
  code: ErrorCode;
  message: string;
}

/**
 * Raised when a collaborator answers with something that cannot be used
 */
export class MalformedResponseError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

// ===========================================
// Error Classification
// ===========================================

/**
 * Classify an error into a structured error with a code.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = getErrorMessage(error);

  if (error instanceof MalformedResponseError || error instanceof SyntaxError) {
    return { code: ErrorCodes.MALFORMED_RESPONSE, message };
  }

  if (isTimeoutError(error, message)) {
    return { code: ErrorCodes.TIMEOUT, message };
  }

  if (isRateLimitError(error, message)) {
    return { code: ErrorCodes.RATE_LIMITED, message };
  }

  if (isAuthenticationError(error, message)) {
    return { code: ErrorCodes.AUTH_FAILED, message };
  }

  if (isNetworkError(error, message)) {
    return { code: ErrorCodes.NETWORK_ERROR, message };
  }

  // Validation failures from zod are malformed answers
  if (isZodError(error)) {
    return { code: ErrorCodes.MALFORMED_RESPONSE, message };
  }

  return { code: ErrorCodes.UNKNOWN, message };
}

// ===========================================
// Error Detection Helpers
// ===========================================

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code);
  }
  return '';
}

function isTimeoutError(error: unknown, message: string): boolean {
  const lowerMessage = message.toLowerCase();
  return (
    errorName(error) === 'TimeoutError' ||
    errorName(error) === 'AbortError' ||
    errorCode(error) === 'ETIMEDOUT' ||
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out')
  );
}

function isRateLimitError(_error: unknown, message: string): boolean {
  const lowerMessage = message.toLowerCase();
  return (
    lowerMessage.includes('rate limit') ||
    lowerMessage.includes('too many requests') ||
    lowerMessage.includes('429')
  );
}

function isAuthenticationError(_error: unknown, message: string): boolean {
  const lowerMessage = message.toLowerCase();
  return (
    lowerMessage.includes('unauthorized') ||
    lowerMessage.includes('authentication') ||
    lowerMessage.includes('invalid_grant') ||
    lowerMessage.includes('401') ||
    lowerMessage.includes('403')
  );
}

function isNetworkError(error: unknown, message: string): boolean {
  const code = errorCode(error);
  return (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    message.toLowerCase().includes('network')
  );
}

function isZodError(error: unknown): boolean {
  return errorName(error) === 'ZodError';
}
