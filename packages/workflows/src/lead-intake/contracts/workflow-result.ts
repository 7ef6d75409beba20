/**
 * Workflow Result Contract
 *
 * Defines the outcome of processing one lead. Returned to the webhook
 * caller as a flat JSON object.
 *
 * @module lead-intake/contracts/workflow-result
 */

// ===========================================
// Workflow Result
// ===========================================

export interface WorkflowResult {
  /** False when validation failed, the lead was a duplicate, or an unexpected fault occurred */
  success: boolean;
  /** Derived lead identifier, once known */
  lead_id: string | null;
  /** Hard failures and storage failures, in order */
  errors: string[];
  /** Degraded steps that did not stop the workflow */
  warnings: string[];
  /** Meeting link for the booked consultation */
  meet_link: string | null;
  /** Intent score in [0, 1], once scored */
  intent_score: number | null;
}

// ===========================================
// Messages
// ===========================================

export const WORKFLOW_MESSAGES = {
  DUPLICATE: 'Duplicate lead - already processed',
  SCORING_FALLBACK: 'AI analysis failed - using default score - manual review recommended',
  STORE_FAILED: 'Failed to log lead to spreadsheet',
  SCHEDULE_FAILED: 'Failed to create calendar event',
  UNEXPECTED: 'Unexpected error during lead processing',
} as const;

export function notificationFailedMessage(channel: string): string {
  return `Failed to send ${channel} notification`;
}

// ===========================================
// Builders
// ===========================================

/**
 * Fresh result for a new request
 */
export function createEmptyResult(): WorkflowResult {
  return {
    success: false,
    lead_id: null,
    errors: [],
    warnings: [],
    meet_link: null,
    intent_score: null,
  };
}
