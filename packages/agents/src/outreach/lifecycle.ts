/**
 * Outreach Lifecycle
 *
 * State machine for one outreach attempt. Transitions only move forward;
 * every helper here is pure and returns a new attempt.
 *
 * @module outreach/lifecycle
 */

import type { PipelineStage } from '@expo-outreach/lib';
import type { AttemptState, OutreachAttempt, ReplySignal } from './contracts/outreach-attempt';
import { InvalidTransitionError } from './errors';
import type { SignalOutcome } from './types';

// ===========================================
// Transition Table
// ===========================================

export const ALLOWED_TRANSITIONS: Readonly<Record<AttemptState, readonly AttemptState[]>> = {
  pending: ['generated', 'failed', 'suppressed'],
  generated: ['sent', 'suppressed'],
  sent: ['awaiting-reply', 'replied', 'claimed-elsewhere'],
  'awaiting-reply': ['follow-up-due', 'replied', 'claimed-elsewhere'],
  'follow-up-due': ['follow-up-sent', 'replied', 'claimed-elsewhere'],
  replied: [],
  'claimed-elsewhere': [],
  'follow-up-sent': [],
  failed: [],
  suppressed: [],
};

/** States in which a delivered message is waiting on the recipient */
const SIGNAL_RECEIVING_STATES: readonly AttemptState[] = ['sent', 'awaiting-reply', 'follow-up-due'];

export const DEFAULT_FOLLOW_UP_DELAY_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export function canTransition(from: AttemptState, to: AttemptState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: AttemptState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}

export function assertTransition(attempt: OutreachAttempt, to: AttemptState, stage: PipelineStage): void {
  if (!canTransition(attempt.state, to)) {
    throw new InvalidTransitionError(attempt.state, to, stage, {
      attendeeId: attempt.attendee_id,
      companyId: attempt.company_id,
    });
  }
}

/**
 * Move an attempt to a new state, recording it in the history.
 *
 * @throws InvalidTransitionError when the move is not in the table
 */
export function transitionAttempt(
  attempt: OutreachAttempt,
  to: AttemptState,
  options: { stage: PipelineStage; now: Date; reason?: string },
): OutreachAttempt {
  assertTransition(attempt, to, options.stage);
  const timestamp = options.now.toISOString();

  return {
    ...attempt,
    state: to,
    state_history: [...attempt.state_history, { state: to, timestamp, reason: options.reason }],
    updated_at: timestamp,
  };
}

// ===========================================
// Follow-up Timing
// ===========================================

export function followUpEligibleAt(sentAt: Date, delayDays: number = DEFAULT_FOLLOW_UP_DELAY_DAYS): Date {
  return new Date(sentAt.getTime() + delayDays * DAY_MS);
}

/**
 * Whether the follow-up for this attempt should go out as of `asOf`.
 * A recorded reply or claim rules it out whatever the timer says.
 */
export function isDueForFollowUp(attempt: OutreachAttempt, asOf: Date): boolean {
  if (attempt.reply_signal !== 'none' || attempt.follow_up_sent) return false;
  if (attempt.state === 'follow-up-due') return true;
  if (attempt.state !== 'awaiting-reply' || attempt.follow_up_eligible_at === null) return false;
  return new Date(attempt.follow_up_eligible_at).getTime() <= asOf.getTime();
}

// ===========================================
// Signals
// ===========================================

/**
 * Apply a reply or claim signal.
 *
 * - first signal wins; later ones are duplicates and change nothing
 * - on a delivered attempt the signal is terminal
 * - on an unsent or finished attempt it is recorded without a state change
 */
export function applySignal(
  attempt: OutreachAttempt,
  signal: Exclude<ReplySignal, 'none'>,
  options: { occurredAt: Date; now: Date },
): { attempt: OutreachAttempt; outcome: SignalOutcome } {
  if (attempt.reply_signal !== 'none') {
    return { attempt, outcome: 'duplicate' };
  }

  const recorded: OutreachAttempt = {
    ...attempt,
    reply_signal: signal,
    signal_at: options.occurredAt.toISOString(),
    updated_at: options.now.toISOString(),
  };

  if (!SIGNAL_RECEIVING_STATES.includes(attempt.state)) {
    return { attempt: recorded, outcome: 'recorded' };
  }

  return {
    attempt: transitionAttempt(recorded, signal, { stage: 'signal', now: options.now, reason: `${signal} signal` }),
    outcome: 'applied',
  };
}
