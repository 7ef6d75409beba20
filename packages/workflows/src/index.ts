/**
 * @lead-intake/workflows
 */

export * from './lead-intake';
