/**
 * Observability Module for Expo Outreach
 *
 * Langfuse integration for tracing message generation calls.
 *
 * @example
 * ```typescript
 * import { startMessageGeneration, shutdownLangfuse } from '@expo-outreach/lib/observability';
 *
 * const trace = startMessageGeneration({
 *   attendeeId, companyId, templateFamily: 'top_tier', model, attempt: 1, prompt,
 * });
 * // ... call the model ...
 * trace.end({ output, latencyMs: 840 });
 *
 * await shutdownLangfuse();
 * ```
 */

export {
  initLangfuse,
  getLangfuse,
  isLangfuseEnabled,
  shutdownLangfuse,
  resetLangfuse,
} from './langfuse-client';

export { startMessageGeneration, type GenerationTrace } from './tracing';

export type {
  MessageGenerationTraceInput,
  MessageGenerationTraceOutput,
  LangfuseConfig,
} from './types';

export { LANGFUSE_ENV_VARS } from './types';
