/**
 * Outreach Lifecycle Tests
 */

import { describe, test, expect } from 'vitest';
import {
  ALLOWED_TRANSITIONS,
  applySignal,
  canTransition,
  followUpEligibleAt,
  isDueForFollowUp,
  isTerminal,
  transitionAttempt,
} from '../../outreach/lifecycle';
import { AttemptStateSchema } from '../../outreach/contracts/outreach-attempt';
import { InvalidTransitionError } from '../../outreach/errors';
import { daysAfter, makeAttempt, makeAwaitingAttempt, T0 } from './fixtures';

describe('transition table', () => {
  test('covers every state', () => {
    expect(Object.keys(ALLOWED_TRANSITIONS).sort()).toEqual([...AttemptStateSchema.options].sort());
  });

  test('terminal states allow nothing', () => {
    const terminal = AttemptStateSchema.options.filter(isTerminal);
    expect(terminal).toEqual(['replied', 'claimed-elsewhere', 'follow-up-sent', 'failed', 'suppressed']);
  });

  test('never moves backwards', () => {
    expect(canTransition('awaiting-reply', 'sent')).toBe(false);
    expect(canTransition('generated', 'pending')).toBe(false);
    expect(canTransition('follow-up-due', 'awaiting-reply')).toBe(false);
  });

  test('lets a composed attempt end suppressed when its budget is spent', () => {
    expect(canTransition('generated', 'suppressed')).toBe(true);
    expect(canTransition('sent', 'suppressed')).toBe(false);
  });
});

describe('transitionAttempt', () => {
  test('records the new state in the history', () => {
    const now = new Date('2026-03-02T16:00:00.000Z');
    const next = transitionAttempt(makeAttempt(), 'generated', { stage: 'compose', now });

    expect(next.state).toBe('generated');
    expect(next.updated_at).toBe('2026-03-02T16:00:00.000Z');
    expect(next.state_history).toEqual([
      { state: 'pending', timestamp: '2026-03-02T15:00:00.000Z' },
      { state: 'generated', timestamp: '2026-03-02T16:00:00.000Z' },
    ]);
  });

  test('does not modify the input', () => {
    const attempt = makeAttempt();
    transitionAttempt(attempt, 'suppressed', { stage: 'classify', now: T0, reason: 'not_fit' });

    expect(attempt.state).toBe('pending');
    expect(attempt.state_history).toHaveLength(1);
  });

  test('rejects a move outside the table', () => {
    const attempt = makeAttempt({ state: 'generated' });

    expect(() => transitionAttempt(attempt, 'generated', { stage: 'compose', now: T0 })).toThrow(
      InvalidTransitionError,
    );
    expect(() => transitionAttempt(attempt, 'generated', { stage: 'compose', now: T0 })).toThrow(
      'Invalid attempt transition generated -> generated',
    );
  });
});

describe('follow-up timing', () => {
  test('eligible seven days after send by default', () => {
    expect(followUpEligibleAt(T0)).toEqual(daysAfter(T0, 7));
    expect(followUpEligibleAt(T0, 3)).toEqual(daysAfter(T0, 3));
  });

  test('due only once the wait has run out', () => {
    const attempt = makeAwaitingAttempt();

    expect(isDueForFollowUp(attempt, daysAfter(T0, 6))).toBe(false);
    expect(isDueForFollowUp(attempt, daysAfter(T0, 7))).toBe(true);
  });

  test('never due after a reply or claim', () => {
    expect(isDueForFollowUp(makeAwaitingAttempt({ reply_signal: 'replied' }), daysAfter(T0, 30))).toBe(false);
    expect(isDueForFollowUp(makeAwaitingAttempt({ reply_signal: 'claimed-elsewhere' }), daysAfter(T0, 30))).toBe(
      false,
    );
  });

  test('never due twice', () => {
    const sent = makeAwaitingAttempt({ state: 'follow-up-due', follow_up_sent: true });
    expect(isDueForFollowUp(sent, daysAfter(T0, 30))).toBe(false);
  });

  test('an attempt already marked due stays due', () => {
    expect(isDueForFollowUp(makeAwaitingAttempt({ state: 'follow-up-due' }), T0)).toBe(true);
  });

  test('unsent attempts are never due', () => {
    expect(isDueForFollowUp(makeAttempt(), daysAfter(T0, 30))).toBe(false);
  });
});

describe('applySignal', () => {
  const occurredAt = daysAfter(T0, 2);
  const now = daysAfter(T0, 2);

  test('a reply to a delivered message is terminal', () => {
    const { attempt, outcome } = applySignal(makeAwaitingAttempt(), 'replied', { occurredAt, now });

    expect(outcome).toBe('applied');
    expect(attempt.state).toBe('replied');
    expect(attempt.reply_signal).toBe('replied');
    expect(attempt.signal_at).toBe('2026-03-04T15:00:00.000Z');
    expect(attempt.state_history.at(-1)).toEqual({
      state: 'replied',
      timestamp: '2026-03-04T15:00:00.000Z',
      reason: 'replied signal',
    });
    expect(isTerminal(attempt.state)).toBe(true);
  });

  test('a claim ends a due follow-up', () => {
    const { attempt, outcome } = applySignal(makeAwaitingAttempt({ state: 'follow-up-due' }), 'claimed-elsewhere', {
      occurredAt,
      now,
    });

    expect(outcome).toBe('applied');
    expect(attempt.state).toBe('claimed-elsewhere');
  });

  test('the first signal wins', () => {
    const first = applySignal(makeAwaitingAttempt(), 'claimed-elsewhere', { occurredAt, now });
    const second = applySignal(first.attempt, 'replied', { occurredAt: daysAfter(T0, 3), now: daysAfter(T0, 3) });

    expect(second.outcome).toBe('duplicate');
    expect(second.attempt).toBe(first.attempt);
    expect(second.attempt.reply_signal).toBe('claimed-elsewhere');
  });

  test('is recorded without a state change before send', () => {
    const { attempt, outcome } = applySignal(makeAttempt({ state: 'generated' }), 'replied', { occurredAt, now });

    expect(outcome).toBe('recorded');
    expect(attempt.state).toBe('generated');
    expect(attempt.reply_signal).toBe('replied');
  });

  test('is recorded without a state change after the follow-up', () => {
    const { attempt, outcome } = applySignal(
      makeAwaitingAttempt({ state: 'follow-up-sent', follow_up_sent: true }),
      'replied',
      { occurredAt, now },
    );

    expect(outcome).toBe('recorded');
    expect(attempt.state).toBe('follow-up-sent');
  });
});
