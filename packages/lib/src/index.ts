/**
 * Lead Intake Library
 *
 * Shared utilities for the lead intake packages.
 */

// Types
export * from './types';

// Structured Outputs (Zod to JSON Schema for model tools)
export * from './structured-outputs';
