/**
 * Webhook API Contract
 *
 * Request and response shapes for the outreach HTTP surface. Callers are
 * the campaign workflow (classify/compose/send), the reply feed (signals)
 * and the scheduler (follow-up sweep).
 *
 * @module outreach/contracts/webhook-api
 */

import { z } from 'zod';

// ===========================================
// Authentication
// ===========================================

export const WEBHOOK_SECRET_HEADER = 'X-Webhook-Secret';

// ===========================================
// Path Parameters
// ===========================================

export const WaveParamsSchema = z.object({
  wave_id: z.string().min(1).max(100),
});

export const CompanyParamsSchema = WaveParamsSchema.extend({
  company_id: z.string().min(1),
});

export const AttendeeParamsSchema = WaveParamsSchema.extend({
  attendee_id: z.string().min(1),
});

// ===========================================
// Request Bodies
// ===========================================

export const ProcessWaveRequestSchema = z.object({
  /** Companies to run through the pipeline; all known companies when omitted */
  company_ids: z.array(z.string().min(1)).min(1).optional(),
  /** Send composed messages in the same run */
  send: z.boolean().optional().default(false),
});
export type ProcessWaveRequest = z.infer<typeof ProcessWaveRequestSchema>;

export const SignalEventSchema = z.object({
  attendee_id: z.string().min(1),
  /** Limits the signal to one wave; applies to every wave of the attendee otherwise */
  wave_id: z.string().min(1).optional(),
  signal: z.enum(['replied', 'claimed-elsewhere']),
  occurred_at: z.string().datetime({ offset: true }),
});
export type SignalEvent = z.infer<typeof SignalEventSchema>;

export const SignalBatchRequestSchema = z.object({
  events: z.array(SignalEventSchema).min(1).max(500),
});
export type SignalBatchRequest = z.infer<typeof SignalBatchRequestSchema>;

export const FollowUpSweepRequestSchema = z.object({
  as_of: z.string().datetime({ offset: true }).optional(),
});

export const DueQuerySchema = z.object({
  as_of: z.string().datetime({ offset: true }).optional(),
});

// ===========================================
// Responses
// ===========================================

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function ok<T>(data: T): SuccessResponse<T> {
  return { success: true, data };
}

// ===========================================
// Auth Validation
// ===========================================

/**
 * Validate webhook authentication against the shared secret
 */
export function validateWebhookAuth(
  headers: Headers,
  expectedSecret: string,
): { valid: true } | { valid: false; error: string } {
  const secret = headers.get(WEBHOOK_SECRET_HEADER);

  if (!secret) {
    return { valid: false, error: `Missing ${WEBHOOK_SECRET_HEADER} header` };
  }

  if (!secureCompare(secret, expectedSecret)) {
    return { valid: false, error: 'Invalid webhook secret' };
  }

  return { valid: true };
}

/**
 * Constant-time string comparison
 */
export function secureCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return result === 0;
}
