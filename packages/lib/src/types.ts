/**
 * Shared Types for Lead Intake
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// Identifiers
// ===========================================

/** Deterministic identifier derived from a lead's contact identity */
export type LeadId = string & { readonly __brand: 'LeadId' };

/** Cast a raw string into a LeadId (callers are responsible for its shape) */
export function toLeadId(value: string): LeadId {
  return value as LeadId;
}

// ===========================================
// Step Outputs
// ===========================================

/**
 * Successful outcome of a collaborator step.
 * Extra fields carry the step's payload.
 */
export type StepSuccess<T extends object = Record<never, never>> = { success: true } & T;

/**
 * Failed outcome of a collaborator step.
 * Failures are values, never thrown across a collaborator boundary.
 */
export interface StepFailure<C extends string = string> {
  success: false;
  code: C;
  error: string;
}

/** Discriminated outcome returned at every collaborator boundary */
export type StepOutput<T extends object, C extends string> = StepSuccess<T> | StepFailure<C>;

/**
 * Build a failure outcome
 */
export function stepFailure<C extends string>(code: C, error: string): StepFailure<C> {
  return { success: false, code, error };
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
