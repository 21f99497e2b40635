/**
 * Outreach Agent Types
 *
 * Internal types used by the outreach agent.
 * For contract types, see ./contracts/
 *
 * @module outreach/types
 */

import type { AttendeeId, CompanyId, PipelineStage, WaveId } from '@expo-outreach/lib';
import type { Treatment } from './contracts/treatment';
import type { AttemptState } from './contracts/outreach-attempt';

// ===========================================
// Configuration Types
// ===========================================

export interface OutreachConfig {
  /** Contact cap for companies with more attendees than this (default: 3) */
  maxContactsPerCompany: number;

  /** Size of the global top-target list (default: 50) */
  topTargetCount: number;

  /** Score a product line must reach to count as a fit (default: 50) */
  fitThreshold: number;

  /** Days after send before a follow-up becomes due (default: 7) */
  followUpDelayDays: number;

  /** Timeout per generation call in ms (default: 20,000) */
  generationTimeoutMs: number;

  /** Timeout per delivery call in ms (default: 10,000) */
  deliveryTimeoutMs: number;

  /** Concurrent generation calls per company (default: 5) */
  composeConcurrency: number;

  /** Companies processed at once by processWave (default: 4) */
  companyConcurrency: number;

  /** Fixed address copied on every send */
  trackingBcc: string;

  /** Clock, injectable for tests */
  now: () => Date;
}

export const DEFAULT_OUTREACH_CONFIG: Omit<OutreachConfig, 'trackingBcc'> = {
  maxContactsPerCompany: 3,
  topTargetCount: 50,
  fitThreshold: 50,
  followUpDelayDays: 7,
  generationTimeoutMs: 20_000,
  deliveryTimeoutMs: 10_000,
  composeConcurrency: 5,
  companyConcurrency: 4,
  now: () => new Date(),
};

// ===========================================
// Log Event Types
// ===========================================

export type LogEventType =
  | 'batch_classified'
  | 'treatment_assigned'
  | 'message_composed'
  | 'grounding_failed'
  | 'attempt_failed'
  | 'message_sent'
  | 'delivery_failed'
  | 'budget_rejected'
  | 'signal_applied'
  | 'follow_up_due'
  | 'follow_up_sent'
  | 'review_notified'
  | 'wave_completed'
  | 'request_handled'
  | 'agent_log';

export interface LogEvent {
  event: LogEventType;
  level: 'debug' | 'info' | 'warn' | 'error';
  timestamp: string;
}

// ===========================================
// Batch Result Types
// ===========================================

export interface ClassifiedAttendee {
  attendee_id: AttendeeId;
  treatment: Treatment;
}

/** A failure isolated to one attendee or company inside a batch */
export interface PipelineFailure {
  stage: PipelineStage;
  code: string;
  message: string;
  attendee_id?: AttendeeId;
  company_id?: CompanyId;
}

export interface CompanyWaveResult {
  company_id: CompanyId;
  classified: ClassifiedAttendee[];
  /** Attempts that reached `generated` */
  composed: AttendeeId[];
  /** Attempts that reached `awaiting-reply` */
  sent: AttendeeId[];
  /** Composed attempts suppressed because the company budget was spent */
  budget_rejected: AttendeeId[];
  failures: PipelineFailure[];
}

export interface WaveResult {
  wave_id: WaveId;
  companies: CompanyWaveResult[];
  failures: PipelineFailure[];
  duration_ms: number;
}

export type SendOutcome = 'sent' | 'budget_rejected' | 'budget_unavailable' | 'delivery_failed' | 'skipped_signal';

export type SignalOutcome = 'applied' | 'recorded' | 'duplicate' | 'unknown_attendee';

export interface SignalResult {
  attendee_id: AttendeeId;
  attempt_id?: string;
  outcome: SignalOutcome;
  state?: AttemptState;
}

export interface FollowUpSweepResult {
  marked_due: number;
  sent: string[];
  skipped_in_flight: string[];
  failures: PipelineFailure[];
}

export interface BudgetUsage {
  company_id: CompanyId;
  wave_id: WaveId;
  consumed: number;
  cap: number;
  remaining: number;
}
