/**
 * Lead Intake Contracts
 *
 * @module lead-intake/contracts
 */

export * from './lead-input';
export * from './processed-lead';
export * from './workflow-result';
export * from './webhook-api';
