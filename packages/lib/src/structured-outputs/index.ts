/**
 * Structured Outputs Module
 *
 * Zod-backed tool definitions for Claude tool use.
 *
 * @module @expo-outreach/lib/structured-outputs
 */

export {
  buildTool,
  extractToolResult,
  forceToolChoice,
  type ToolBuilderConfig,
  type BuiltTool,
} from './tool-builder';

export { zodToJsonSchema, validateToolSchema, type JsonSchema } from './zod-to-schema';
