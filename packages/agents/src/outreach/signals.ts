/**
 * Reply / Claim Signal Feed
 *
 * Applies reply and claimed-elsewhere events to outreach attempts.
 * Replaying the same events is harmless: the first recorded signal wins.
 *
 * @module outreach/signals
 */

import type { OutreachRepository } from './repository';
import { updateAttempt } from './repository';
import type { SignalEvent } from './contracts/webhook-api';
import { applySignal } from './lifecycle';
import { logger as defaultLogger, type OutreachLogger } from './logger';
import type { SignalOutcome, SignalResult } from './types';

export interface SignalDependencies {
  repository: OutreachRepository;
  logger?: OutreachLogger;
  now?: () => Date;
}

/**
 * Apply events in order. An event without a wave applies to every attempt
 * of that attendee.
 */
export async function applySignalEvents(
  events: readonly SignalEvent[],
  deps: SignalDependencies,
): Promise<SignalResult[]> {
  const log = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  const results: SignalResult[] = [];

  for (const event of events) {
    const attempts = await deps.repository.listAttempts({
      attendeeId: event.attendee_id,
      waveId: event.wave_id,
    });

    if (attempts.length === 0) {
      results.push({ attendee_id: event.attendee_id, outcome: 'unknown_attendee' });
      log.signalApplied({ attendee_id: event.attendee_id, signal: event.signal, outcome: 'unknown_attendee' });
      continue;
    }

    for (const row of attempts) {
      let outcome: SignalOutcome = 'duplicate';
      const updated = await updateAttempt(deps.repository, row.id, (current) => {
        const applied = applySignal(current, event.signal, {
          occurredAt: new Date(event.occurred_at),
          now: now(),
        });
        outcome = applied.outcome;
        return applied.outcome === 'duplicate' ? null : applied.attempt;
      });
      if (!updated) continue;

      results.push({
        attendee_id: event.attendee_id,
        attempt_id: row.id,
        outcome,
        state: updated.attempt.state,
      });
      log.signalApplied({
        attendee_id: event.attendee_id,
        attempt_id: row.id,
        signal: event.signal,
        outcome,
        state: updated.attempt.state,
      });
    }
  }

  return results;
}
