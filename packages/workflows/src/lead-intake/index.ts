/**
 * Lead Intake
 *
 * Webhook-driven lead pipeline: validate, identify, dedupe, score, store,
 * schedule and notify.
 *
 * @module lead-intake
 */

// Contracts
export * from './contracts';

// Types
export * from './types';

// Workflow and collaborators
export { LeadWorkflow, type LeadWorkflowDependencies } from './workflow';
export * from './validator';
export { createLead, deriveLeadId } from './lead';
export * from './intent-scorer';
export * from './lead-store';
export * from './scheduler';
export { Notifier } from './notifier';
export * from './channels';

// HTTP
export { createApp, hasLeadData, SERVICE_BANNER } from './app';
export type { ComponentStatus, LeadIntakeAppDependencies } from './app';
export { rateLimit, clientAddress, FixedWindowCounter } from './rate-limiter';
export { buildServices, type LeadIntakeServices } from './services';

// Ambient
export * from './config';
export { classifyError, ErrorCodes, MalformedResponseError } from './error-handler';
export type { ClassifiedError, ErrorCode as FaultCode } from './error-handler';
export { withRetry, calculateDelay, DEFAULT_RETRY_CONFIG, type RetryConfig } from './retry';
export { LeadIntakeLogger, createLogger, logger, maskPhone } from './logger';
export type { LoggerConfig, LogLevel } from './logger';
