/**
 * Structured Outputs Module
 *
 * Utilities for creating structured output tools with Zod schemas.
 *
 * @module @lead-intake/lib/structured-outputs
 */

export {
  buildTool,
  extractToolResult,
  extractTextContent,
  forceToolChoice,
  createStructuredRequest,
  type ToolBuilderConfig,
  type BuiltTool,
} from './tool-builder';

export { zodToJsonSchema, type JsonSchema } from './zod-to-schema';
