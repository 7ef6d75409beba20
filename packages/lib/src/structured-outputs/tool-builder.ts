/**
 * Tool Builder Utility
 *
 * Creates structured output tools from Zod schemas so a model can be forced
 * to answer through a single, schema-checked tool call.
 *
 * @module @lead-intake/lib/structured-outputs
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { ZodSchema, ZodTypeDef, SafeParseReturnType } from 'zod';
import { zodToJsonSchema } from './zod-to-schema';

/**
 * Configuration for building a structured output tool
 */
export interface ToolBuilderConfig<T> {
  /** Unique name for the tool */
  name: string;
  /** Description of what the tool does (shown to the model) */
  description: string;
  /** Zod schema defining the expected output structure */
  schema: ZodSchema<T, ZodTypeDef, unknown>;
}

/**
 * A built tool ready for use with the Messages API
 */
export interface BuiltTool<T> {
  tool: Anthropic.Tool;
  name: string;
  /** Parse and validate a tool result without throwing */
  safeParse: (result: unknown) => SafeParseReturnType<unknown, T>;
}

/**
 * Build a structured output tool from a Zod schema.
 *
 * @example
 * ```typescript
 * const scoreTool = buildTool({
 *   name: 'record_intent_score',
 *   description: 'Record the intent score for a lead',
 *   schema: z.object({ intent_score: z.number() }),
 * });
 *
 * const response = await client.messages.create({
 *   model: 'claude-3-5-haiku-20241022',
 *   max_tokens: 512,
 *   ...createStructuredRequest(scoreTool, messages),
 * });
 *
 * const score = scoreTool.safeParse(extractToolResult(response.content, scoreTool.name));
 * ```
 */
export function buildTool<T>(config: ToolBuilderConfig<T>): BuiltTool<T> {
  const jsonSchema = zodToJsonSchema(config.schema);

  const tool: Anthropic.Tool = {
    name: config.name,
    description: config.description,
    input_schema: {
      ...jsonSchema,
      type: 'object',
    },
  };

  return {
    tool,
    name: config.name,
    safeParse: (result: unknown) => config.schema.safeParse(result),
  };
}

/**
 * Find the first tool_use block matching the tool name and return its input.
 *
 * @returns The tool input or null if the model did not call the tool
 */
export function extractToolResult(
  content: ReadonlyArray<{ type: string; name?: string; input?: unknown }>,
  toolName: string,
): unknown {
  const toolUse = content.find(
    (block) => block.type === 'tool_use' && block.name === toolName,
  );
  return toolUse?.input ?? null;
}

/**
 * Concatenate the text blocks of a response.
 * Used when a model answers with a JSON document instead of a tool call.
 */
export function extractTextContent(
  content: ReadonlyArray<{ type: string; text?: string }>,
): string {
  return content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('')
    .trim();
}

/**
 * Create tool_choice configuration to force a specific tool.
 */
export function forceToolChoice(toolName: string): { type: 'tool'; name: string } {
  return { type: 'tool', name: toolName };
}

/**
 * Create the tools/tool_choice/messages part of a structured output request.
 */
export function createStructuredRequest<T>(
  tool: BuiltTool<T>,
  messages: Anthropic.MessageParam[],
): {
  tools: Anthropic.Tool[];
  tool_choice: { type: 'tool'; name: string };
  messages: Anthropic.MessageParam[];
} {
  return {
    tools: [tool.tool],
    tool_choice: forceToolChoice(tool.name),
    messages,
  };
}
