/**
 * Outreach Attempt Contracts
 *
 * One row per (attendee, wave). Rows are never deleted; a later wave gets a
 * fresh row for the same attendee.
 *
 * @module outreach/contracts/outreach-attempt
 */

import { z } from 'zod';
import type { AttemptId, AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import { TreatmentSchema, type Treatment } from './treatment';
import { GeneratedMessageSchema } from './generated-message';

// ===========================================
// Enums
// ===========================================

export const AttemptStateSchema = z.enum([
  'pending',
  'generated',
  'sent',
  'awaiting-reply',
  'follow-up-due',
  'replied',
  'claimed-elsewhere',
  'follow-up-sent',
  'failed',
  'suppressed',
]);
export type AttemptState = z.infer<typeof AttemptStateSchema>;

export const GenerationStatusSchema = z.enum(['pending', 'generated', 'validated', 'failed']);
export type GenerationStatus = z.infer<typeof GenerationStatusSchema>;

export const SendStatusSchema = z.enum(['not-sent', 'sent', 'error']);
export type SendStatus = z.infer<typeof SendStatusSchema>;

export const ReplySignalSchema = z.enum(['none', 'replied', 'claimed-elsewhere']);
export type ReplySignal = z.infer<typeof ReplySignalSchema>;

export const PipelineStageSchema = z.enum(['classify', 'compose', 'send', 'follow-up', 'signal']);

// ===========================================
// Sub-records
// ===========================================

const TimestampSchema = z.string().datetime({ offset: true });

export const StateHistoryEntrySchema = z.object({
  state: AttemptStateSchema,
  timestamp: TimestampSchema,
  reason: z.string().optional(),
});
export type StateHistoryEntry = z.infer<typeof StateHistoryEntrySchema>;

export const AttemptErrorSchema = z.object({
  code: z.string(),
  stage: PipelineStageSchema,
  message: z.string(),
  at: TimestampSchema,
});
export type AttemptError = z.infer<typeof AttemptErrorSchema>;

// ===========================================
// Outreach Attempt
// ===========================================

export const OutreachAttemptSchema = z.object({
  id: z.string(),
  attendee_id: z.string(),
  company_id: z.string(),
  wave_id: z.string(),

  treatment: TreatmentSchema,

  // Lifecycle
  state: AttemptStateSchema,
  state_history: z.array(StateHistoryEntrySchema),

  // Composer
  generation_status: GenerationStatusSchema,
  message: GeneratedMessageSchema.nullable(),

  // Delivery
  send_status: SendStatusSchema,
  delivery_id: z.string().nullable(),
  sent_at: TimestampSchema.nullable(),
  budget_reserved: z.boolean(),
  /** Claimed by a sender; blocks a second concurrent send */
  send_in_flight: z.boolean(),

  // Signal feed
  reply_signal: ReplySignalSchema,
  signal_at: TimestampSchema.nullable(),

  // Follow-up scheduler
  follow_up_eligible_at: TimestampSchema.nullable(),
  follow_up_in_flight: z.boolean(),
  follow_up_sent: z.boolean(),
  follow_up_delivery_id: z.string().nullable(),

  last_error: AttemptErrorSchema.nullable(),

  /** Bumped by the repository on every write; used for compare-and-set */
  version: z.number().int().min(0),

  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});
export type OutreachAttempt = z.infer<typeof OutreachAttemptSchema>;

// ===========================================
// Creation Helper
// ===========================================

export function attemptIdFor(waveId: WaveId, attendeeId: AttendeeId): AttemptId {
  return `${waveId}:${attendeeId}`;
}

export function createPendingAttempt(
  params: {
    attendeeId: AttendeeId;
    companyId: CompanyId;
    waveId: WaveId;
    treatment: Treatment;
  },
  now: Date = new Date(),
): OutreachAttempt {
  const timestamp = now.toISOString();

  return {
    id: attemptIdFor(params.waveId, params.attendeeId),
    attendee_id: params.attendeeId,
    company_id: params.companyId,
    wave_id: params.waveId,
    treatment: params.treatment,
    state: 'pending',
    state_history: [{ state: 'pending', timestamp }],
    generation_status: 'pending',
    message: null,
    send_status: 'not-sent',
    delivery_id: null,
    sent_at: null,
    budget_reserved: false,
    send_in_flight: false,
    reply_signal: 'none',
    signal_at: null,
    follow_up_eligible_at: null,
    follow_up_in_flight: false,
    follow_up_sent: false,
    follow_up_delivery_id: null,
    last_error: null,
    version: 0,
    created_at: timestamp,
    updated_at: timestamp,
  };
}
