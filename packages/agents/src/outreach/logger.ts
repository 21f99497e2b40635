/**
 * Structured JSON Logger for the Outreach Agent
 *
 * One JSON line per event. Event methods are typed so log consumers can
 * rely on the field names.
 *
 * @module outreach/logger
 */

import type { PipelineStage } from '@expo-outreach/lib';
import type { LogEventType, LogEvent } from './types';
import type { RuleId, TreatmentVariant } from './contracts/treatment';
import type { AttemptState } from './contracts/outreach-attempt';

// ===========================================
// Logger Configuration
// ===========================================

export interface LoggerConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  prettyPrint: boolean;
  /** Defaults to console.log */
  output?: (message: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  prettyPrint: false,
};

const LOG_LEVEL_PRIORITY: Record<LoggerConfig['level'], number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ===========================================
// Logger Class
// ===========================================

export class OutreachLogger {
  private config: LoggerConfig;
  private waveId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Tag all subsequent entries with a wave
   */
  setWaveId(waveId: string | undefined): void {
    this.waveId = waveId;
  }

  private shouldLog(level: LoggerConfig['level']): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private log(level: LoggerConfig['level'], event: LogEventType, data: object): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEvent & Record<string, unknown> = {
      event,
      level,
      timestamp: new Date().toISOString(),
      wave_id: this.waveId,
      ...data,
    };

    // Remove undefined values
    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.config.output ?? console.log;
    output(this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }

  // ===========================================
  // Classification Events
  // ===========================================

  treatmentAssigned(data: {
    attendee_id: string;
    company_id: string;
    variant: TreatmentVariant;
    rule_id: RuleId;
    priority: number;
  }): void {
    this.log('debug', 'treatment_assigned', data);
  }

  batchClassified(data: {
    company_id: string;
    wave_id: string;
    attendees: number;
    cap: number;
    contacted: number;
    suppressed: number;
    reclassified_changes: number;
  }): void {
    this.log('info', 'batch_classified', data);
  }

  // ===========================================
  // Composition Events
  // ===========================================

  messageComposed(data: {
    attendee_id: string;
    company_id: string;
    template_family: string;
    attempts: number;
    disclosure_included: boolean;
  }): void {
    this.log('info', 'message_composed', data);
  }

  groundingFailed(data: {
    attendee_id: string;
    company_id: string;
    attempt: number;
    issues: string[];
  }): void {
    this.log('warn', 'grounding_failed', data);
  }

  attemptFailed(data: {
    attendee_id?: string;
    company_id?: string;
    stage: PipelineStage;
    error_code: string;
    error_message: string;
  }): void {
    this.log('error', 'attempt_failed', data);
  }

  // ===========================================
  // Delivery Events
  // ===========================================

  messageSent(data: {
    attendee_id: string;
    company_id: string;
    delivery_id: string;
    consumed: number;
    cap: number;
  }): void {
    this.log('info', 'message_sent', data);
  }

  deliveryFailed(data: {
    attendee_id: string;
    company_id: string;
    stage: PipelineStage;
    attempts: number;
    error_message: string;
  }): void {
    this.log('error', 'delivery_failed', data);
  }

  budgetRejected(data: {
    attendee_id: string;
    company_id: string;
    consumed: number;
    cap: number;
  }): void {
    this.log('warn', 'budget_rejected', data);
  }

  // ===========================================
  // Lifecycle Events
  // ===========================================

  signalApplied(data: {
    attendee_id: string;
    attempt_id?: string;
    signal: string;
    outcome: string;
    state?: AttemptState;
  }): void {
    this.log('info', 'signal_applied', data);
  }

  followUpDue(data: { attempt_id: string; attendee_id: string; eligible_at: string }): void {
    this.log('debug', 'follow_up_due', data);
  }

  followUpSent(data: { attempt_id: string; attendee_id: string; delivery_id: string }): void {
    this.log('info', 'follow_up_sent', data);
  }

  reviewNotified(data: { attempt_id: string; reason: string; delivered: boolean; error_message?: string }): void {
    this.log(data.delivered ? 'info' : 'warn', 'review_notified', data);
  }

  waveCompleted(data: {
    wave_id: string;
    companies: number;
    classified: number;
    composed: number;
    sent: number;
    budget_rejected: number;
    failures: number;
    duration_ms: number;
  }): void {
    this.log('info', 'wave_completed', data);
  }

  requestHandled(data: {
    method: string;
    path: string;
    status: number;
    duration_ms: number;
    request_id?: string;
    error?: string;
  }): void {
    this.log(data.status >= 500 ? 'error' : data.status >= 400 ? 'warn' : 'info', 'request_handled', data);
  }

  // ===========================================
  // Generic Methods
  // ===========================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', 'agent_log', { message, ...data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', 'agent_log', { message, ...data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', 'agent_log', { message, ...data });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', 'agent_log', { message, ...data });
  }
}

// ===========================================
// Default Logger Instance
// ===========================================

export const logger = new OutreachLogger();

export function createLogger(config?: Partial<LoggerConfig>): OutreachLogger {
  return new OutreachLogger(config);
}
