/**
 * Reply / Claim Signal Feed Tests
 */

import { describe, test, expect } from 'vitest';
import { applySignalEvents } from '../../outreach/signals';
import { InMemoryOutreachRepository } from '../../outreach/repository';
import type { SignalEvent } from '../../outreach/contracts/webhook-api';
import { captureLogger, daysAfter, makeAttempt, makeAwaitingAttempt, T0 } from './fixtures';

const REPLY: SignalEvent = {
  attendee_id: 'att-dana',
  signal: 'replied',
  occurred_at: '2026-03-04T09:30:00.000Z',
};

async function setup(...attempts: ReturnType<typeof makeAttempt>[]) {
  const repository = new InMemoryOutreachRepository();
  for (const attempt of attempts) {
    await repository.insertAttempt(attempt);
  }
  const { logger, lines } = captureLogger();
  return { repository, lines, deps: { repository, logger, now: () => daysAfter(T0, 2) } };
}

describe('applySignalEvents', () => {
  test('ends a delivered attempt', async () => {
    const { repository, deps } = await setup(makeAwaitingAttempt());

    const results = await applySignalEvents([REPLY], deps);

    expect(results).toEqual([
      { attendee_id: 'att-dana', attempt_id: 'wave-spring:att-dana', outcome: 'applied', state: 'replied' },
    ]);
    const stored = await repository.getAttempt('wave-spring:att-dana');
    expect(stored?.reply_signal).toBe('replied');
    expect(stored?.signal_at).toBe('2026-03-04T09:30:00.000Z');
  });

  test('replaying the same events changes nothing', async () => {
    const { repository, deps } = await setup(makeAwaitingAttempt());
    await applySignalEvents([REPLY], deps);
    const before = await repository.getAttempt('wave-spring:att-dana');

    const results = await applySignalEvents([REPLY], deps);

    expect(results).toEqual([
      { attendee_id: 'att-dana', attempt_id: 'wave-spring:att-dana', outcome: 'duplicate', state: 'replied' },
    ]);
    expect(await repository.getAttempt('wave-spring:att-dana')).toEqual(before);
  });

  test('keeps the first signal when a different one follows', async () => {
    const { repository, deps } = await setup(makeAwaitingAttempt());

    await applySignalEvents([{ ...REPLY, signal: 'claimed-elsewhere' }, REPLY], deps);

    const stored = await repository.getAttempt('wave-spring:att-dana');
    expect(stored?.state).toBe('claimed-elsewhere');
    expect(stored?.reply_signal).toBe('claimed-elsewhere');
  });

  test('records a signal on an attempt that has not been sent', async () => {
    const { deps } = await setup(makeAttempt({ state: 'generated' }));

    const results = await applySignalEvents([REPLY], deps);

    expect(results).toEqual([
      { attendee_id: 'att-dana', attempt_id: 'wave-spring:att-dana', outcome: 'recorded', state: 'generated' },
    ]);
  });

  test('reports attendees with no attempts', async () => {
    const { deps, lines } = await setup();

    const results = await applySignalEvents([{ ...REPLY, attendee_id: 'att-nobody' }], deps);

    expect(results).toEqual([{ attendee_id: 'att-nobody', outcome: 'unknown_attendee' }]);
    expect(lines.some((l) => l.event === 'signal_applied' && l.outcome === 'unknown_attendee')).toBe(true);
  });

  test('a wave id limits the signal to that wave', async () => {
    const { repository, deps } = await setup(
      makeAwaitingAttempt(),
      makeAwaitingAttempt({ id: 'wave-fall:att-dana', wave_id: 'wave-fall' }),
    );

    await applySignalEvents([{ ...REPLY, wave_id: 'wave-fall' }], deps);

    expect((await repository.getAttempt('wave-fall:att-dana'))?.state).toBe('replied');
    expect((await repository.getAttempt('wave-spring:att-dana'))?.state).toBe('awaiting-reply');
  });

  test('without a wave id the signal reaches every wave', async () => {
    const { deps } = await setup(
      makeAwaitingAttempt(),
      makeAwaitingAttempt({ id: 'wave-fall:att-dana', wave_id: 'wave-fall' }),
    );

    const results = await applySignalEvents([REPLY], deps);

    expect(results.map((r) => [r.attempt_id, r.outcome])).toEqual([
      ['wave-fall:att-dana', 'applied'],
      ['wave-spring:att-dana', 'applied'],
    ]);
  });
});
