/**
 * Outreach Errors
 *
 * Every failure that leaves the engine names the pipeline stage and, where
 * known, the attendee and company it concerns.
 *
 * @module outreach/errors
 */

import type { AttendeeId, CompanyId, PipelineStage } from '@expo-outreach/lib';
import type { AttemptState } from './contracts/outreach-attempt';
import type { GeneratedMessage, GroundingIssue } from './contracts/generated-message';

// ===========================================
// Error Codes
// ===========================================

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  UNGROUNDED_CLAIM: 'UNGROUNDED_CLAIM',
  GENERATION_FAILED: 'GENERATION_FAILED',
  SUPPRESSED_TREATMENT: 'SUPPRESSED_TREATMENT',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  DELIVERY_FAILED: 'DELIVERY_FAILED',
  // Recorded on attempts, never thrown
  BUDGET_EXHAUSTED: 'BUDGET_EXHAUSTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorScope {
  attendeeId?: AttendeeId;
  companyId?: CompanyId;
}

// ===========================================
// Base Error
// ===========================================

export class OutreachError extends Error {
  readonly attendeeId?: AttendeeId;
  readonly companyId?: CompanyId;

  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly stage: PipelineStage,
    scope: ErrorScope = {},
    readonly retryable = false,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'OutreachError';
    this.attendeeId = scope.attendeeId;
    this.companyId = scope.companyId;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      stage: this.stage,
      message: this.message,
      attendee_id: this.attendeeId,
      company_id: this.companyId,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ===========================================
// Subclasses
// ===========================================

/** Malformed or inconsistent caller input; never retried */
export class InvalidInputError extends OutreachError {
  constructor(message: string, stage: PipelineStage, scope?: ErrorScope, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_INPUT, stage, scope, false, details);
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends OutreachError {
  constructor(resource: string, id: string, stage: PipelineStage, scope?: ErrorScope) {
    super(`${resource} ${id} not found`, ErrorCodes.NOT_FOUND, stage, scope, false, { resource, id });
    this.name = 'NotFoundError';
  }
}

/** Generated content cites something the fact payload does not contain */
export class UngroundedClaimError extends OutreachError {
  constructor(
    readonly issues: GroundingIssue[],
    scope?: ErrorScope,
    /** The rejected draft, kept for review */
    readonly draft?: GeneratedMessage,
  ) {
    super(
      `Generated message failed grounding: ${issues.map((i) => i.detail).join('; ')}`,
      ErrorCodes.UNGROUNDED_CLAIM,
      'compose',
      scope,
      true,
      { issues },
    );
    this.name = 'UngroundedClaimError';
  }
}

/** Generation call failed, timed out or returned an unusable shape */
export class GenerationError extends OutreachError {
  constructor(message: string, scope?: ErrorScope, cause?: Error) {
    super(message, ErrorCodes.GENERATION_FAILED, 'compose', scope, true, cause && { cause: cause.message });
    this.name = 'GenerationError';
  }
}

/** Suppressed attendees must never reach the composer */
export class SuppressedTreatmentError extends OutreachError {
  constructor(scope?: ErrorScope) {
    super('Cannot compose a message for a suppressed treatment', ErrorCodes.SUPPRESSED_TREATMENT, 'compose', scope);
    this.name = 'SuppressedTreatmentError';
  }
}

export class InvalidTransitionError extends OutreachError {
  constructor(
    readonly from: AttemptState,
    readonly to: AttemptState,
    stage: PipelineStage,
    scope?: ErrorScope,
  ) {
    super(`Invalid attempt transition ${from} -> ${to}`, ErrorCodes.INVALID_TRANSITION, stage, scope, false, {
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class DeliveryError extends OutreachError {
  constructor(message: string, stage: PipelineStage, scope?: ErrorScope, cause?: Error) {
    super(message, ErrorCodes.DELIVERY_FAILED, stage, scope, true, cause && { cause: cause.message });
    this.name = 'DeliveryError';
  }
}

// ===========================================
// Helpers
// ===========================================

export function isOutreachError(error: unknown): error is OutreachError {
  return error instanceof OutreachError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
