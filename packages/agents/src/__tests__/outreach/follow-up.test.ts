/**
 * Follow-up Scheduler Tests
 */

import { describe, test, expect } from 'vitest';
import { dueForFollowUp, markDueFollowUps, sendFollowUps, type FollowUpDependencies } from '../../outreach/follow-up';
import { InMemoryOutreachRepository } from '../../outreach/repository';
import { InMemoryResearchStore } from '../../outreach/research-store';
import { applySignalEvents } from '../../outreach/signals';
import { followUpBody } from '../../outreach/templates';
import type { OutreachAttempt } from '../../outreach/contracts/outreach-attempt';
import {
  captureLogger,
  daysAfter,
  FakeDeliveryService,
  makeAttendee,
  makeAwaitingAttempt,
  makeCompany,
  T0,
} from './fixtures';

const ID = 'wave-spring:att-dana';

async function setup(...attempts: OutreachAttempt[]) {
  const repository = new InMemoryOutreachRepository();
  for (const attempt of attempts.length > 0 ? attempts : [makeAwaitingAttempt()]) {
    await repository.insertAttempt(attempt);
  }
  const delivery = new FakeDeliveryService();
  const { logger } = captureLogger();
  const deps: FollowUpDependencies = {
    repository,
    research: new InMemoryResearchStore({ companies: [makeCompany()], attendees: [makeAttendee()] }),
    delivery,
    trackingBcc: 'tracking@outreach.test',
    deliveryConfig: { retryDelayMs: 0 },
    logger,
    now: () => daysAfter(T0, 7),
  };
  return { repository, delivery, deps };
}

describe('dueForFollowUp', () => {
  test('lists an attempt once its wait has run out', async () => {
    const { repository } = await setup();

    expect(await dueForFollowUp(repository, daysAfter(T0, 6))).toEqual([]);
    expect((await dueForFollowUp(repository, daysAfter(T0, 7))).map((a) => a.id)).toEqual([ID]);
  });

  test('does not change any attempt', async () => {
    const { repository } = await setup();

    await dueForFollowUp(repository, daysAfter(T0, 7));

    expect((await repository.getAttempt(ID))?.state).toBe('awaiting-reply');
  });
});

describe('markDueFollowUps', () => {
  test('moves due attempts to follow-up-due once', async () => {
    const { repository } = await setup();
    const asOf = daysAfter(T0, 7);

    const first = await markDueFollowUps(repository, asOf, { now: () => asOf });
    const second = await markDueFollowUps(repository, asOf, { now: () => asOf });

    expect(first.map((a) => a.state)).toEqual(['follow-up-due']);
    expect(second).toEqual([]);
  });
});

describe('sendFollowUps', () => {
  test('sends the fixed follow-up once and records it', async () => {
    const { repository, delivery, deps } = await setup();

    const result = await sendFollowUps(daysAfter(T0, 7), deps);

    expect(result).toEqual({ marked_due: 1, sent: [ID], skipped_in_flight: [], failures: [] });
    expect(delivery.sent).toEqual([
      {
        to: 'dana@acme.test',
        subject: 'Following up, Dana',
        body: followUpBody('Dana', 'Acme Foods'),
        bcc: 'tracking@outreach.test',
      },
    ]);

    const stored = await repository.getAttempt(ID);
    expect(stored?.state).toBe('follow-up-sent');
    expect(stored?.follow_up_sent).toBe(true);
    expect(stored?.follow_up_in_flight).toBe(false);
    expect(stored?.follow_up_delivery_id).toBe('dlv-1');
  });

  test('a second sweep sends nothing', async () => {
    const { delivery, deps } = await setup();
    await sendFollowUps(daysAfter(T0, 7), deps);

    const again = await sendFollowUps(daysAfter(T0, 8), deps);

    expect(again).toEqual({ marked_due: 0, sent: [], skipped_in_flight: [], failures: [] });
    expect(delivery.sent).toHaveLength(1);
  });

  test('overlapping sweeps send one follow-up', async () => {
    const { delivery, deps } = await setup();
    const asOf = daysAfter(T0, 7);

    const [a, b] = await Promise.all([sendFollowUps(asOf, deps), sendFollowUps(asOf, deps)]);

    expect([...a.sent, ...b.sent]).toEqual([ID]);
    expect(delivery.sent).toHaveLength(1);
  });

  test('sends nothing before the wait has run out', async () => {
    const { delivery, deps } = await setup();

    const result = await sendFollowUps(daysAfter(T0, 6), deps);

    expect(result.marked_due).toBe(0);
    expect(delivery.sent).toHaveLength(0);
  });

  test('a reply before the deadline means no follow-up', async () => {
    const { repository, delivery, deps } = await setup();
    await applySignalEvents(
      [{ attendee_id: 'att-dana', signal: 'replied', occurred_at: daysAfter(T0, 2).toISOString() }],
      { repository, logger: deps.logger },
    );

    const result = await sendFollowUps(daysAfter(T0, 10), deps);

    expect(result.sent).toEqual([]);
    expect(delivery.sent).toHaveLength(0);
    expect((await repository.getAttempt(ID))?.state).toBe('replied');
  });

  test('a failed send releases the attempt for the next sweep', async () => {
    const { repository, delivery, deps } = await setup();
    delivery.failNext = 2;

    const failed = await sendFollowUps(daysAfter(T0, 7), deps);

    expect(failed.sent).toEqual([]);
    expect(failed.failures).toEqual([
      {
        stage: 'follow-up',
        code: 'DELIVERY_FAILED',
        message: 'Delivery failed after 2 attempts: mail relay unavailable',
        attendee_id: 'att-dana',
        company_id: 'co-acme',
      },
    ]);
    const released = await repository.getAttempt(ID);
    expect(released?.state).toBe('follow-up-due');
    expect(released?.follow_up_in_flight).toBe(false);
    expect(released?.last_error?.code).toBe('DELIVERY_FAILED');

    const retried = await sendFollowUps(daysAfter(T0, 8), deps);

    expect(retried.sent).toEqual([ID]);
    expect(delivery.sent).toHaveLength(1);
  });

  test('reports an attempt whose research record is gone', async () => {
    const { deps } = await setup(makeAwaitingAttempt({ id: 'wave-spring:att-ghost', attendee_id: 'att-ghost' }));

    const result = await sendFollowUps(daysAfter(T0, 7), deps);

    expect(result.failures).toEqual([
      {
        stage: 'follow-up',
        code: 'NOT_FOUND',
        message: 'Research record missing',
        attendee_id: 'att-ghost',
        company_id: 'co-acme',
      },
    ]);
  });

  test('rejects a blank tracking BCC before touching any attempt', async () => {
    const { repository, delivery, deps } = await setup();

    await expect(sendFollowUps(daysAfter(T0, 7), { ...deps, trackingBcc: '  ' })).rejects.toThrow(
      'A tracking BCC address is required on every send',
    );

    const attempt = await repository.getAttempt(ID);
    expect(attempt?.state).toBe('awaiting-reply');
    expect(attempt?.follow_up_in_flight).toBe(false);
    expect(delivery.sent).toEqual([]);
  });
});
