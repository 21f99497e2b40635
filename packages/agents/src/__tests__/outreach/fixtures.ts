/**
 * Outreach Agent Test Fixtures
 *
 * Research-record builders, a fixed clock and in-process fakes for the
 * generation, delivery and review collaborators.
 *
 * @module outreach/tests/fixtures
 */

import type { z } from 'zod';
import {
  AttendeeRecordSchema,
  CompanyRecordSchema,
  type AttendeeRecord,
  type CompanyRecord,
} from '../../outreach/contracts/research-records';
import type { FactPayload } from '../../outreach/contracts/generated-message';
import type { OutreachEmail } from '../../outreach/contracts/message-tool';
import { createPendingAttempt, type OutreachAttempt } from '../../outreach/contracts/outreach-attempt';
import type { ContactTreatment } from '../../outreach/contracts/treatment';
import { OutreachAgent, type OutreachAgentConfig } from '../../outreach/agent';
import type { DeliveryReceipt, DeliveryService, OutboundMessage } from '../../outreach/delivery';
import type { GenerateOptions, GenerationFamily, GenerationService } from '../../outreach/generation';
import { createLogger, type OutreachLogger } from '../../outreach/logger';
import { InMemoryOutreachRepository } from '../../outreach/repository';
import { InMemoryResearchStore } from '../../outreach/research-store';
import type { ReviewNotifier } from '../../outreach/review-notifier';

// ===========================================
// Clock
// ===========================================

export const T0 = new Date('2026-03-02T15:00:00.000Z');

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAfter(start: Date, days: number): Date {
  return new Date(start.getTime() + days * DAY_MS);
}

export class TestClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advanceDays(days: number): void {
    this.current = daysAfter(this.current, days);
  }
}

// ===========================================
// Research Records
// ===========================================

export const TEST_WAVE = 'wave-spring';

export function makeCompany(overrides: Partial<z.input<typeof CompanyRecordSchema>> = {}): CompanyRecord {
  return CompanyRecordSchema.parse({
    id: 'co-acme',
    name: 'Acme Foods',
    overview: 'Regional grocery chain with its own private fleet',
    dc_count: 25,
    dc_source: 'Company annual report',
    truck_count: 0,
    gate_fit_score: 80,
    truck_fit_score: 40,
    ...overrides,
  });
}

export function makeAttendee(overrides: Partial<z.input<typeof AttendeeRecordSchema>> = {}): AttendeeRecord {
  return AttendeeRecordSchema.parse({
    id: 'att-dana',
    company_id: 'co-acme',
    first_name: 'Dana',
    last_name: 'Reyes',
    email: 'dana@acme.test',
    title: 'Director of Logistics',
    ticket_type: 'Retailer/CPG',
    gate_fit_score: 80,
    truck_fit_score: 40,
    ...overrides,
  });
}

/**
 * `count` retailer attendees at one company, best first
 */
export function makeRetailers(count: number, companyId = 'co-acme', score = 80): AttendeeRecord[] {
  return Array.from({ length: count }, (_, i) =>
    makeAttendee({
      id: `att-${companyId}-${i + 1}`,
      company_id: companyId,
      first_name: `Person${String.fromCharCode(65 + i)}`,
      email: `person${i + 1}@${companyId}.test`,
      gate_fit_score: score - i,
    }),
  );
}

// ===========================================
// Treatments & Attempts
// ===========================================

export const TOP_TIER: ContactTreatment = {
  variant: 'top-tier-personalized',
  rule_id: 'retailer_top_target',
  priority: 1,
  product_focus: 'gate',
  requires_review: false,
};

/**
 * Attempt row for att-dana in TEST_WAVE, with any fields overridden
 */
export function makeAttempt(overrides: Partial<OutreachAttempt> = {}): OutreachAttempt {
  const base = createPendingAttempt(
    { attendeeId: 'att-dana', companyId: 'co-acme', waveId: TEST_WAVE, treatment: TOP_TIER },
    T0,
  );
  return { ...base, ...overrides };
}

/**
 * A delivered attempt waiting on a reply, follow-up eligible after 7 days
 */
export function makeAwaitingAttempt(overrides: Partial<OutreachAttempt> = {}): OutreachAttempt {
  return makeAttempt({
    state: 'awaiting-reply',
    generation_status: 'validated',
    send_status: 'sent',
    delivery_id: 'dlv-original',
    sent_at: T0.toISOString(),
    budget_reserved: true,
    follow_up_eligible_at: daysAfter(T0, 7).toISOString(),
    ...overrides,
  });
}

// ===========================================
// Generation Fake
// ===========================================

export interface GenerationCall {
  family: GenerationFamily;
  payload: FactPayload;
  options: GenerateOptions;
}

type Responder = (payload: FactPayload, family: GenerationFamily) => OutreachEmail | Error;

/**
 * Draft that uses only supplied facts
 */
export function groundedEmail(payload: FactPayload, family: GenerationFamily): OutreachEmail {
  const count = payload.dc_count ?? payload.truck_count;
  const countLine =
    payload.dc_count !== undefined
      ? `With ${payload.dc_count} distribution centers, gate traffic adds up fast.`
      : payload.truck_count !== undefined
        ? `Running ${payload.truck_count} trucks means a lot of yard moves.`
        : `Gate and yard flow tends to matter a lot for teams like yours.`;
  const ask =
    family === 'top_tier'
      ? 'Would you be open to meet privately during the show?'
      : family === 'standard'
        ? 'Stop by our booth during expo hours if you have a moment.'
        : 'Hope the show is going well on your side of the floor.';

  const claimed = [
    { field: 'first_name', value: payload.first_name },
    { field: 'company_name', value: payload.company_name },
  ];
  if (count !== undefined) {
    claimed.push({ field: payload.dc_count !== undefined ? 'dc_count' : 'truck_count', value: String(count) });
  }

  return {
    subject: `Yard flow at ${payload.company_name}`,
    body: `Hi ${payload.first_name},\n\n${countLine} ${ask}`,
    claimed_facts: claimed,
  };
}

export class FakeGenerationService implements GenerationService {
  readonly calls: GenerationCall[] = [];
  private readonly queue: Responder[] = [];

  constructor(private readonly fallback: Responder = groundedEmail) {}

  /** Responses used in order before falling back to the default */
  enqueue(...responders: Responder[]): this {
    this.queue.push(...responders);
    return this;
  }

  async generate(family: GenerationFamily, payload: FactPayload, options: GenerateOptions): Promise<OutreachEmail> {
    this.calls.push({ family, payload, options });
    const responder = this.queue.shift() ?? this.fallback;
    const result = responder(payload, family);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

// ===========================================
// Delivery Fake
// ===========================================

export class FakeDeliveryService implements DeliveryService {
  readonly sent: OutboundMessage[] = [];
  /** Number of upcoming calls that fail */
  failNext = 0;
  private counter = 0;

  async send(message: OutboundMessage): Promise<DeliveryReceipt> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('mail relay unavailable');
    }
    this.sent.push(message);
    this.counter++;
    return { delivery_id: `dlv-${this.counter}` };
  }
}

// ===========================================
// Review Fake
// ===========================================

export class RecordingReviewNotifier implements ReviewNotifier {
  readonly notified: Array<{ attempt_id: string; reason: string }> = [];

  async notify(attempt: OutreachAttempt, reason: string): Promise<void> {
    this.notified.push({ attempt_id: attempt.id, reason });
  }
}

// ===========================================
// Logger
// ===========================================

export function captureLogger(): { logger: OutreachLogger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: 'debug',
    output: (line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

// ===========================================
// Agent Harness
// ===========================================

export interface TestHarness {
  agent: OutreachAgent;
  repository: InMemoryOutreachRepository;
  research: InMemoryResearchStore;
  generation: FakeGenerationService;
  delivery: FakeDeliveryService;
  notifier: RecordingReviewNotifier;
  clock: TestClock;
  logger: OutreachLogger;
  logs: Array<Record<string, unknown>>;
}

export function createHarness(
  data: { companies: CompanyRecord[]; attendees: AttendeeRecord[] },
  options: { generation?: FakeGenerationService; config?: Partial<OutreachAgentConfig> } = {},
): TestHarness {
  const research = new InMemoryResearchStore(data);
  const repository = new InMemoryOutreachRepository();
  const generation = options.generation ?? new FakeGenerationService();
  const delivery = new FakeDeliveryService();
  const notifier = new RecordingReviewNotifier();
  const clock = new TestClock();
  const { logger, lines } = captureLogger();

  const agent = new OutreachAgent(
    { research, repository, generation, delivery, reviewNotifier: notifier, logger },
    { trackingBcc: 'tracking@outreach.test', now: clock.now, ...options.config },
  );

  return { agent, repository, research, generation, delivery, notifier, clock, logger, logs: lines };
}
