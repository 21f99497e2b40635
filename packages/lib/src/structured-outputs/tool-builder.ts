/**
 * Tool Builder
 *
 * Turns a Zod schema into an Anthropic tool definition so Claude returns
 * structured JSON that is validated on the way back in.
 *
 * @module @expo-outreach/lib/structured-outputs
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { z, ZodTypeAny } from 'zod';
import { validateToolSchema, zodToJsonSchema } from './zod-to-schema';

export interface ToolBuilderConfig<T extends ZodTypeAny> {
  /** Tool name, also used to force tool choice */
  name: string;
  /** Shown to Claude */
  description: string;
  schema: T;
}

export interface BuiltTool<T> {
  tool: Tool;
  name: string;
  /** Validate a tool_use input against the schema; throws ZodError */
  parse: (input: unknown) => T;
  /** Non-throwing variant of parse */
  safeParse: (input: unknown) => { success: true; data: T } | { success: false; error: string };
}

/**
 * Build a structured output tool from a Zod schema.
 *
 * @example
 * ```typescript
 * const messageTool = buildTool({
 *   name: 'write_outreach_email',
 *   description: 'Write a short outreach email from the supplied facts',
 *   schema: z.object({ subject: z.string(), body: z.string() }),
 * });
 *
 * const response = await client.messages.create({
 *   model,
 *   max_tokens: 1024,
 *   tools: [messageTool.tool],
 *   tool_choice: forceToolChoice(messageTool.name),
 *   messages,
 * });
 *
 * const email = messageTool.parse(extractToolResult(response.content, messageTool.name));
 * ```
 */
export function buildTool<T extends ZodTypeAny>(config: ToolBuilderConfig<T>): BuiltTool<z.infer<T>> {
  const jsonSchema = zodToJsonSchema(config.schema);
  validateToolSchema(jsonSchema);

  return {
    name: config.name,
    tool: {
      name: config.name,
      description: config.description,
      input_schema: { ...jsonSchema, type: 'object' },
    },
    parse: (input) => config.schema.parse(input),
    safeParse: (input) => {
      const result = config.schema.safeParse(input);
      if (result.success) {
        return { success: true, data: result.data };
      }
      return {
        success: false,
        error: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
      };
    },
  };
}

/**
 * Find the input of the first tool_use block with the given name.
 * Returns null when Claude answered without calling the tool.
 */
export function extractToolResult(
  content: ReadonlyArray<{ type: string; name?: string; input?: unknown }>,
  toolName: string,
): unknown {
  const block = content.find((b) => b.type === 'tool_use' && b.name === toolName);
  return block?.input ?? null;
}

export function forceToolChoice(toolName: string): { type: 'tool'; name: string } {
  return { type: 'tool', name: toolName };
}
