/**
 * Webhook API Contract
 *
 * Defines the HTTP surface of the lead intake service.
 * This contract is used by:
 * - Website / form webhook (caller)
 * - Lead Intake server (handler)
 *
 * @module lead-intake/contracts/webhook-api
 */

import { z } from 'zod';
import type { WorkflowResult } from './workflow-result';

// ===========================================
// Webhook Request
// ===========================================

/**
 * Optional shared-secret header; enforced only when a secret is configured
 */
export const WEBHOOK_SECRET_HEADER = 'X-Webhook-Secret';

// ===========================================
// Webhook Response
// ===========================================

export const ErrorCodeSchema = z.enum([
  'INVALID_INPUT',     // Body missing or not JSON
  'AUTH_FAILED',       // Missing or invalid X-Webhook-Secret
  'RATE_LIMITED',      // Too many requests
  'NOT_INITIALIZED',   // Workflow could not be built from configuration
  'NOT_FOUND',         // Unknown route or lead
  'UPDATE_FAILED',     // Lead status could not be written
  'INTERNAL_ERROR',    // Anything unexpected at the HTTP boundary
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/**
 * Error response for failures outside the workflow
 */
export interface WebhookErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

// ===========================================
// Status Update
// ===========================================

export const StatusUpdateRequestSchema = z.object({
  status: z.string().min(1).default('UPDATED'),
  notes: z.string().default(''),
});

export type StatusUpdateRequest = z.infer<typeof StatusUpdateRequestSchema>;

// ===========================================
// HTTP Status Codes
// ===========================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type HttpStatus = (typeof HTTP_STATUS)[keyof typeof HTTP_STATUS];

/**
 * HTTP status for a workflow result: 200 on success, 400 otherwise
 */
export function workflowResultStatus(result: WorkflowResult): HttpStatus {
  return result.success ? HTTP_STATUS.OK : HTTP_STATUS.BAD_REQUEST;
}

// ===========================================
// Request Validation
// ===========================================

/**
 * Validate webhook authentication against a shared secret
 */
export function validateWebhookAuth(
  headers: Headers | Record<string, string>,
  expectedSecret: string
): { valid: boolean; error?: string } {
  const secret =
    headers instanceof Headers
      ? headers.get(WEBHOOK_SECRET_HEADER)
      : headers[WEBHOOK_SECRET_HEADER];

  if (!secret) {
    return {
      valid: false,
      error: `Missing ${WEBHOOK_SECRET_HEADER} header`,
    };
  }

  if (secret !== expectedSecret) {
    return {
      valid: false,
      error: 'Invalid webhook secret',
    };
  }

  return { valid: true };
}

// ===========================================
// Response Builders
// ===========================================

/**
 * Build error response
 */
export function buildErrorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): WebhookErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}
