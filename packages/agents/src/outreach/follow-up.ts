/**
 * Follow-up Scheduler
 *
 * Periodic sweep: flips attempts whose wait has run out to follow-up-due,
 * then sends the fixed follow-up once per attempt. An in-flight flag set by
 * compare-and-set keeps overlapping sweeps from sending twice.
 *
 * @module outreach/follow-up
 */

import type { PipelineFailure, FollowUpSweepResult } from './types';
import type { OutreachAttempt } from './contracts/outreach-attempt';
import type { OutreachRepository } from './repository';
import { updateAttempt } from './repository';
import type { ResearchStore } from './research-store';
import type { DeliveryRetryConfig, DeliveryService } from './delivery';
import { deliverWithRetry, requireTrackingBcc } from './delivery';
import { composeFollowUp } from './composer';
import { isDueForFollowUp, transitionAttempt } from './lifecycle';
import { ErrorCodes } from './errors';
import { logger as defaultLogger, type OutreachLogger } from './logger';

export interface FollowUpDependencies {
  repository: OutreachRepository;
  research: ResearchStore;
  delivery: DeliveryService;
  trackingBcc: string;
  deliveryConfig?: Partial<DeliveryRetryConfig>;
  logger?: OutreachLogger;
  now?: () => Date;
}

/**
 * Attempts whose follow-up should go out as of `asOf`. Read-only.
 */
export async function dueForFollowUp(repository: OutreachRepository, asOf: Date): Promise<OutreachAttempt[]> {
  const candidates = await repository.listAttempts({ states: ['awaiting-reply', 'follow-up-due'] });
  return candidates.filter((attempt) => isDueForFollowUp(attempt, asOf));
}

/**
 * Move every awaiting-reply attempt whose wait is over to follow-up-due.
 */
export async function markDueFollowUps(
  repository: OutreachRepository,
  asOf: Date,
  options: { now?: () => Date; logger?: OutreachLogger } = {},
): Promise<OutreachAttempt[]> {
  const now = options.now ?? (() => new Date());
  const log = options.logger ?? defaultLogger;
  const marked: OutreachAttempt[] = [];

  for (const attempt of await repository.listAttempts({ states: ['awaiting-reply'] })) {
    const updated = await updateAttempt(repository, attempt.id, (current) =>
      current.state === 'awaiting-reply' && isDueForFollowUp(current, asOf)
        ? transitionAttempt(current, 'follow-up-due', { stage: 'follow-up', now: now(), reason: 'no reply' })
        : null,
    );
    if (updated?.changed) {
      marked.push(updated.attempt);
      log.followUpDue({
        attempt_id: updated.attempt.id,
        attendee_id: updated.attempt.attendee_id,
        eligible_at: updated.attempt.follow_up_eligible_at ?? asOf.toISOString(),
      });
    }
  }

  return marked;
}

/**
 * Run one sweep: mark due attempts, then send each pending follow-up.
 *
 * @throws InvalidInputError before touching any attempt when the tracking BCC is blank
 */
export async function sendFollowUps(asOf: Date, deps: FollowUpDependencies): Promise<FollowUpSweepResult> {
  requireTrackingBcc(deps.trackingBcc, 'follow-up');
  const now = deps.now ?? (() => new Date());
  const log = deps.logger ?? defaultLogger;
  const result: FollowUpSweepResult = { marked_due: 0, sent: [], skipped_in_flight: [], failures: [] };

  result.marked_due = (await markDueFollowUps(deps.repository, asOf, { now, logger: log })).length;

  const due = await deps.repository.listAttempts({ states: ['follow-up-due'] });
  for (const attempt of due) {
    if (attempt.follow_up_sent || attempt.reply_signal !== 'none') continue;

    const claimed = await updateAttempt(deps.repository, attempt.id, (current) =>
      current.state === 'follow-up-due' &&
      !current.follow_up_in_flight &&
      !current.follow_up_sent &&
      current.reply_signal === 'none'
        ? { ...current, follow_up_in_flight: true, updated_at: now().toISOString() }
        : null,
    );
    if (!claimed?.changed) {
      result.skipped_in_flight.push(attempt.id);
      continue;
    }

    const failure = await sendOne(claimed.attempt, deps, now, log);
    if (failure) {
      result.failures.push(failure);
    } else {
      result.sent.push(attempt.id);
    }
  }

  return result;
}

async function sendOne(
  attempt: OutreachAttempt,
  deps: FollowUpDependencies,
  now: () => Date,
  log: OutreachLogger,
): Promise<PipelineFailure | null> {
  const scope = { attendeeId: attempt.attendee_id, companyId: attempt.company_id };
  const [attendee, company] = await Promise.all([
    deps.research.getAttendee(attempt.attendee_id),
    deps.research.getCompany(attempt.company_id),
  ]);

  if (!attendee || !company) {
    await release(attempt, deps, now, {
      code: ErrorCodes.NOT_FOUND,
      message: `Research record missing for ${attendee ? 'company' : 'attendee'}`,
    });
    return {
      stage: 'follow-up',
      code: ErrorCodes.NOT_FOUND,
      message: 'Research record missing',
      attendee_id: attempt.attendee_id,
      company_id: attempt.company_id,
    };
  }

  const message = composeFollowUp(attendee, company);
  const delivery = await deliverWithRetry(
    deps.delivery,
    { to: attendee.email, subject: message.subject, body: message.body },
    { trackingBcc: deps.trackingBcc, stage: 'follow-up', scope },
    deps.deliveryConfig,
  );

  if (!delivery.success) {
    await release(attempt, deps, now, { code: delivery.error.code, message: delivery.error.message });
    log.deliveryFailed({
      attendee_id: attempt.attendee_id,
      company_id: attempt.company_id,
      stage: 'follow-up',
      attempts: delivery.attempts,
      error_message: delivery.error.message,
    });
    return {
      stage: 'follow-up',
      code: delivery.error.code,
      message: delivery.error.message,
      attendee_id: attempt.attendee_id,
      company_id: attempt.company_id,
    };
  }

  const deliveryId = delivery.receipt.delivery_id;
  await updateAttempt(deps.repository, attempt.id, (current) => {
    const recorded: OutreachAttempt = {
      ...current,
      follow_up_in_flight: false,
      follow_up_sent: true,
      follow_up_delivery_id: deliveryId,
      updated_at: now().toISOString(),
    };
    // A reply may have landed while the follow-up was in flight
    return current.state === 'follow-up-due'
      ? transitionAttempt(recorded, 'follow-up-sent', { stage: 'follow-up', now: now() })
      : recorded;
  });

  log.followUpSent({ attempt_id: attempt.id, attendee_id: attempt.attendee_id, delivery_id: deliveryId });
  return null;
}

/**
 * Clear the in-flight flag so a later sweep can try again
 */
async function release(
  attempt: OutreachAttempt,
  deps: FollowUpDependencies,
  now: () => Date,
  error: { code: string; message: string },
): Promise<void> {
  const at = now().toISOString();
  await updateAttempt(deps.repository, attempt.id, (current) => ({
    ...current,
    follow_up_in_flight: false,
    last_error: { code: error.code, stage: 'follow-up', message: error.message, at },
    updated_at: at,
  }));
}
