/**
 * Generation Tracing
 *
 * Records each message-generation call as a Langfuse generation so prompt,
 * output, latency and token usage can be inspected per attendee.
 */

import type { MessageGenerationTraceInput, MessageGenerationTraceOutput } from './types';
import { getLangfuse } from './langfuse-client';

/**
 * Handle returned for an in-flight traced generation
 */
export interface GenerationTrace {
  /** Langfuse observation ID, undefined when tracing is disabled */
  observationId?: string;
  end(result: MessageGenerationTraceOutput): void;
  fail(error: Error, latencyMs: number): void;
}

const NOOP_TRACE: GenerationTrace = {
  end: () => undefined,
  fail: () => undefined,
};

/**
 * Start tracing a message generation call.
 *
 * Returns a no-op handle when Langfuse is not configured, so callers never
 * branch on observability being enabled.
 */
export function startMessageGeneration(input: MessageGenerationTraceInput): GenerationTrace {
  const langfuse = getLangfuse();
  if (!langfuse) {
    return NOOP_TRACE;
  }

  const trace = langfuse.trace({
    name: 'outreach_message',
    tags: ['content_composer', input.templateFamily],
    metadata: {
      attendeeId: input.attendeeId,
      companyId: input.companyId,
      waveId: input.waveId,
      environment: process.env.NODE_ENV || 'development',
    },
  });

  const generation = trace.generation({
    name: 'message_generation',
    model: input.model,
    input: { prompt: input.prompt },
    metadata: {
      attempt: input.attempt,
      templateFamily: input.templateFamily,
      promptLength: input.prompt.length,
    },
  });

  return {
    observationId: generation.id,
    end(result) {
      generation.end({
        output: result.output,
        usage: result.usage
          ? {
              input: result.usage.inputTokens,
              output: result.usage.outputTokens,
              total: result.usage.inputTokens + result.usage.outputTokens,
            }
          : undefined,
        metadata: { latencyMs: result.latencyMs },
      });
    },
    fail(error, latencyMs) {
      generation.end({
        output: null,
        level: 'ERROR',
        statusMessage: error.message,
        metadata: { latencyMs, error: error.message },
      });
    },
  };
}
