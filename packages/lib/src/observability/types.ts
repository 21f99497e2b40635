/**
 * Observability Types for Expo Outreach
 *
 * Type definitions for Langfuse integration and generation tracing.
 */

import type { AttendeeId, CompanyId, WaveId } from '../types';

// ===========================================
// Generation Tracing Types
// ===========================================

/** Input recorded when a message generation call starts */
export interface MessageGenerationTraceInput {
  attendeeId: AttendeeId;
  companyId: CompanyId;
  waveId?: WaveId;
  templateFamily: string;
  model: string;
  /** 1 for the first call, 2 for the stricter retry */
  attempt: number;
  prompt: string;
}

/** Output recorded when a message generation call ends */
export interface MessageGenerationTraceOutput {
  output: unknown;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  latencyMs: number;
}

// ===========================================
// Configuration Types
// ===========================================

/** Langfuse client configuration */
export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
  enabled?: boolean;
  flushAt?: number;
  flushInterval?: number;
  requestTimeout?: number;
}

/** Environment variable names for Langfuse */
export const LANGFUSE_ENV_VARS = {
  publicKey: 'LANGFUSE_PUBLIC_KEY',
  secretKey: 'LANGFUSE_SECRET_KEY',
  baseUrl: 'LANGFUSE_BASE_URL',
  enabled: 'LANGFUSE_ENABLED',
} as const;
