/**
 * Processed Lead Contract
 *
 * Defines the scoring service response and the ProcessedLead record
 * consumed by the store, scheduler and notifier.
 *
 * @module lead-intake/contracts/processed-lead
 */

import { z } from 'zod';

// ===========================================
// Constants
// ===========================================

/**
 * Score assigned when every scoring attempt fails.
 * The workflow treats this exact value as "manual review required"; a genuine
 * base-case score of 0.5 cannot be told apart from it.
 */
export const FALLBACK_INTENT_SCORE = 0.5;

/** Score at or above which a lead is announced as urgent */
export const HIGH_INTENT_THRESHOLD = 0.8;

// ===========================================
// Scoring Response Schema
// ===========================================

/**
 * Structured answer expected from the scoring service
 */
export const ScoringResponseSchema = z.object({
  name: z.string().describe('Lead name, copied from the input'),
  phone: z.string().describe('Lead phone, copied from the input'),
  model: z.string().describe('Car model, copied from the input'),
  datetime: z.string().describe('Appointment time (ISO 8601), copied from the input'),
  // Numeric strings are accepted; null, booleans and blank strings are not
  intent_score: z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .describe('Purchase intent between 0.0 and 1.0'),
});

export type ScoringResponse = z.infer<typeof ScoringResponseSchema>;

// ===========================================
// Processed Lead
// ===========================================

/**
 * Scored, normalized lead. intent_score is always within [0, 1].
 */
export interface ProcessedLead {
  readonly name: string;
  readonly phone: string;
  readonly model: string;
  readonly datetime: string;
  readonly intent_score: number;
}

/**
 * Clamp a score into [0, 1]
 */
export function clampIntentScore(score: number): number {
  return Math.max(0, Math.min(1, score));
}

/**
 * Build a frozen ProcessedLead from a scoring response
 */
export function toProcessedLead(response: ScoringResponse): ProcessedLead {
  return Object.freeze({
    name: response.name,
    phone: response.phone,
    model: response.model,
    datetime: response.datetime,
    intent_score: clampIntentScore(response.intent_score),
  });
}

/**
 * Whether a score is the fallback sentinel
 */
export function isFallbackScore(score: number): boolean {
  return score === FALLBACK_INTENT_SCORE;
}

/**
 * Whether a lead should be announced as urgent
 */
export function isHighIntent(processed: ProcessedLead): boolean {
  return processed.intent_score >= HIGH_INTENT_THRESHOLD;
}

/**
 * Format a score for people: two decimals
 */
export function formatIntentScore(score: number): string {
  return score.toFixed(2);
}
