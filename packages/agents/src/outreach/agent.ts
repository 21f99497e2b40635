/**
 * Outreach Agent
 *
 * Wires the research store, budget tracker, classifier, composer and
 * lifecycle tracker into the operations exposed to callers:
 * classifyBatch, composeAndRecord, sendAttempt, processWave, applySignals,
 * dueForFollowUp, sendFollowUps, pendingReview, pendingResend, budgetUsage.
 *
 * @module outreach/agent
 */

import { mapWithConcurrency } from '@expo-outreach/lib';
import type { AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import type { AttendeeRecord } from './contracts/research-records';
import { isSuppressed, type Treatment } from './contracts/treatment';
import { attemptIdFor, createPendingAttempt, type OutreachAttempt } from './contracts/outreach-attempt';
import type { SignalEvent } from './contracts/webhook-api';
import { budgetPosition, compareAttendeeRank, computeBudget } from './budget';
import { classify } from './classifier';
import { ContentComposer, type ComposeResult } from './composer';
import { deliverWithRetry, requireTrackingBcc, type DeliveryService } from './delivery';
import {
  ErrorCodes,
  GenerationError,
  NotFoundError,
  OutreachError,
  SuppressedTreatmentError,
  getErrorMessage,
  type ErrorScope,
} from './errors';
import { dueForFollowUp, sendFollowUps } from './follow-up';
import type { GenerationService } from './generation';
import { assertTransition, followUpEligibleAt, transitionAttempt } from './lifecycle';
import { logger as defaultLogger, type OutreachLogger } from './logger';
import { consumeBudget, updateAttempt, type OutreachRepository } from './repository';
import type { ResearchStore } from './research-store';
import { NoopReviewNotifier, type ReviewNotifier } from './review-notifier';
import { applySignalEvents } from './signals';
import {
  DEFAULT_OUTREACH_CONFIG,
  type BudgetUsage,
  type ClassifiedAttendee,
  type CompanyWaveResult,
  type FollowUpSweepResult,
  type OutreachConfig,
  type PipelineFailure,
  type SendOutcome,
  type SignalResult,
  type WaveResult,
} from './types';

// ===========================================
// Types
// ===========================================

export interface OutreachAgentDependencies {
  research: ResearchStore;
  repository: OutreachRepository;
  generation: GenerationService;
  delivery: DeliveryService;
  reviewNotifier?: ReviewNotifier;
  logger?: OutreachLogger;
}

export type OutreachAgentConfig = Partial<OutreachConfig> & Pick<OutreachConfig, 'trackingBcc'>;

export interface SendResult {
  attempt: OutreachAttempt;
  outcome: SendOutcome;
}

export interface ProcessWaveOptions {
  companyIds?: CompanyId[];
  /** Also send every composed message */
  send?: boolean;
}

function failureFrom(error: unknown, fallback: Omit<PipelineFailure, 'code' | 'message'>): PipelineFailure {
  if (error instanceof OutreachError) {
    return {
      stage: error.stage,
      code: error.code,
      message: error.message,
      attendee_id: error.attendeeId ?? fallback.attendee_id,
      company_id: error.companyId ?? fallback.company_id,
    };
  }
  return { ...fallback, code: 'INTERNAL_ERROR', message: getErrorMessage(error) };
}

// ===========================================
// Outreach Agent
// ===========================================

export class OutreachAgent {
  readonly config: OutreachConfig;
  private readonly composer: ContentComposer;
  private readonly logger: OutreachLogger;
  private readonly reviewNotifier: ReviewNotifier;

  constructor(
    private readonly deps: OutreachAgentDependencies,
    config: OutreachAgentConfig,
  ) {
    this.config = { ...DEFAULT_OUTREACH_CONFIG, ...config, trackingBcc: requireTrackingBcc(config.trackingBcc, 'send') };
    this.logger = deps.logger ?? defaultLogger;
    this.reviewNotifier = deps.reviewNotifier ?? new NoopReviewNotifier();
    this.composer = new ContentComposer(
      { generation: deps.generation, logger: this.logger },
      { generationTimeoutMs: this.config.generationTimeoutMs },
    );
  }

  // ===========================================
  // Classification
  // ===========================================

  /**
   * Rank a company's attendees, classify each one and create any missing
   * attempt rows for the wave. A row still pending takes the recomputed
   * treatment; a row past pending keeps the one it was acted on with, and
   * that stored treatment is what is returned.
   */
  async classifyBatch(companyId: CompanyId, waveId: WaveId): Promise<ClassifiedAttendee[]> {
    const company = await this.deps.research.getCompany(companyId);
    if (!company) {
      throw new NotFoundError('Company', companyId, 'classify', { companyId });
    }

    const attendees = await this.deps.research.getAttendees(companyId);
    const computed = computeBudget(companyId, attendees, waveId, {
      maxPerCompany: this.config.maxContactsPerCompany,
      computedAt: this.config.now(),
    });
    // First stored budget for the wave wins
    const budget = await this.deps.repository.putBudgetIfAbsent(computed);

    const topTargets = new Set(await this.deps.research.getTopCompanies(this.config.topTargetCount));
    const isTopTarget = topTargets.has(companyId);

    const classified: ClassifiedAttendee[] = [];
    let changes = 0;

    for (const attendee of this.inBudgetOrder(attendees, budget.ranking)) {
      const treatment = classify(attendee, company, budgetPosition(budget, attendee.id), {
        isTopTarget,
        fitThreshold: this.config.fitThreshold,
      });

      const { inserted, attempt: stored } = await this.deps.repository.insertAttempt(
        this.newAttempt(attendee.id, companyId, waveId, treatment),
      );

      let attempt = stored;
      let fresh = inserted;
      if (!inserted && !sameTreatment(stored.treatment, treatment)) {
        const replaced = await this.replaceTreatment(stored, treatment);
        attempt = replaced.attempt;
        fresh = replaced.changed;
        if (replaced.changed) {
          changes++;
        } else {
          this.logger.debug('Treatment changed after the attempt moved on, keeping the recorded one', {
            attempt_id: stored.id,
            state: stored.state,
            recorded: stored.treatment.rule_id,
            computed: treatment.rule_id,
          });
        }
      }

      const recorded = attempt.treatment;
      classified.push({ attendee_id: attendee.id, treatment: recorded });
      this.logger.treatmentAssigned({
        attendee_id: attendee.id,
        company_id: companyId,
        variant: recorded.variant,
        rule_id: recorded.rule_id,
        priority: recorded.priority,
      });

      if (fresh && isSuppressed(recorded) && recorded.requires_review) {
        await this.reviewNotifier.notify(attempt, recorded.suppression_reason);
      }
    }

    this.logger.batchClassified({
      company_id: companyId,
      wave_id: waveId,
      attendees: attendees.length,
      cap: budget.cap,
      contacted: classified.filter((c) => !isSuppressed(c.treatment)).length,
      suppressed: classified.filter((c) => isSuppressed(c.treatment)).length,
      reclassified_changes: changes,
    });

    return classified;
  }

  /**
   * Swap in a recomputed treatment while the attempt is still pending.
   * A suppressed result ends the attempt; past pending nothing changes.
   */
  private async replaceTreatment(
    attempt: OutreachAttempt,
    treatment: Treatment,
  ): Promise<{ attempt: OutreachAttempt; changed: boolean }> {
    const now = this.config.now();
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) => {
      if (current.state !== 'pending' || sameTreatment(current.treatment, treatment)) {
        return null;
      }
      const retreated: OutreachAttempt = { ...current, treatment, updated_at: now.toISOString() };
      return isSuppressed(treatment)
        ? transitionAttempt(retreated, 'suppressed', { stage: 'classify', now, reason: treatment.suppression_reason })
        : retreated;
    });
    return updated ?? { attempt, changed: false };
  }

  private newAttempt(attendeeId: AttendeeId, companyId: CompanyId, waveId: WaveId, treatment: Treatment): OutreachAttempt {
    const now = this.config.now();
    const pending = createPendingAttempt({ attendeeId, companyId, waveId, treatment }, now);
    if (!isSuppressed(treatment)) {
      return pending;
    }
    return transitionAttempt(pending, 'suppressed', { stage: 'classify', now, reason: treatment.suppression_reason });
  }

  private inBudgetOrder(attendees: AttendeeRecord[], ranking: readonly AttendeeId[]): AttendeeRecord[] {
    const order = new Map(ranking.map((id, index) => [id, index]));
    const ranked = attendees.filter((a) => order.has(a.id));
    const unranked = attendees.filter((a) => !order.has(a.id)).sort(compareAttendeeRank);
    ranked.sort((a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0));
    return [...ranked, ...unranked];
  }

  // ===========================================
  // Composition
  // ===========================================

  /**
   * Compose the message for a pending attempt and record the outcome:
   * `generated` when it validates, `failed` (and flagged for review) when it
   * does not.
   */
  async composeAndRecord(attendeeId: AttendeeId, waveId: WaveId): Promise<OutreachAttempt> {
    const attempt = await this.requireAttempt(attendeeId, waveId, 'compose');
    const scope: ErrorScope = { attendeeId, companyId: attempt.company_id };

    if (isSuppressed(attempt.treatment)) {
      throw new SuppressedTreatmentError(scope);
    }
    assertTransition(attempt, 'generated', 'compose');

    const [attendee, company] = await Promise.all([
      this.deps.research.getAttendee(attendeeId),
      this.deps.research.getCompany(attempt.company_id),
    ]);
    if (!attendee) throw new NotFoundError('Attendee', attendeeId, 'compose', scope);
    if (!company) throw new NotFoundError('Company', attempt.company_id, 'compose', scope);

    const companyContactCount = await this.companyContactCount(attempt.company_id, waveId);

    let composed: ComposeResult;
    try {
      composed = await this.composer.compose(attendee, company, attempt.treatment, { companyContactCount, waveId });
    } catch (error) {
      if (error instanceof GenerationError) {
        return this.markFailed(attempt, error, null);
      }
      throw error;
    }

    if (composed.error) {
      return this.markFailed(attempt, composed.error, composed.message);
    }

    const message = composed.message;
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) => ({
      ...transitionAttempt(current, 'generated', { stage: 'compose', now: this.config.now() }),
      generation_status: 'validated',
      message,
      last_error: null,
    }));
    if (!updated) throw new NotFoundError('Attempt', attempt.id, 'compose', scope);
    return updated.attempt;
  }

  private async markFailed(
    attempt: OutreachAttempt,
    error: OutreachError,
    message: OutreachAttempt['message'],
  ): Promise<OutreachAttempt> {
    const now = this.config.now();
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) => ({
      ...transitionAttempt(current, 'failed', { stage: 'compose', now, reason: error.code }),
      generation_status: 'failed',
      message,
      last_error: { code: error.code, stage: error.stage, message: error.message, at: now.toISOString() },
    }));
    if (!updated) {
      throw new NotFoundError('Attempt', attempt.id, 'compose', { attendeeId: attempt.attendee_id });
    }

    this.logger.attemptFailed({
      attendee_id: attempt.attendee_id,
      company_id: attempt.company_id,
      stage: error.stage,
      error_code: error.code,
      error_message: error.message,
    });
    await this.reviewNotifier.notify(updated.attempt, error.code);
    return updated.attempt;
  }

  /**
   * Attendees at the company being contacted this wave, capped by the budget
   */
  private async companyContactCount(companyId: CompanyId, waveId: WaveId): Promise<number> {
    const [attempts, budget] = await Promise.all([
      this.deps.repository.listAttempts({ companyId, waveId }),
      this.deps.repository.getBudget(companyId, waveId),
    ]);
    const contacts = attempts.filter((a) => !isSuppressed(a.treatment)).length;
    return budget ? Math.min(contacts, budget.cap) : contacts;
  }

  // ===========================================
  // Delivery
  // ===========================================

  /**
   * Send a generated attempt: reserve a budget slot, deliver with the
   * tracking BCC, then move to awaiting-reply.
   */
  async sendAttempt(attendeeId: AttendeeId, waveId: WaveId): Promise<SendResult> {
    const attempt = await this.requireAttempt(attendeeId, waveId, 'send');
    const scope: ErrorScope = { attendeeId, companyId: attempt.company_id };

    if (attempt.reply_signal !== 'none') {
      return { attempt, outcome: 'skipped_signal' };
    }
    assertTransition(attempt, 'sent', 'send');

    const message = attempt.message;
    if (!message || !message.validation.passed) {
      throw new OutreachError('Attempt has no validated message', ErrorCodes.INVALID_INPUT, 'send', scope);
    }

    const attendee = await this.deps.research.getAttendee(attendeeId);
    if (!attendee) throw new NotFoundError('Attendee', attendeeId, 'send', scope);

    const claimed = await updateAttempt(this.deps.repository, attempt.id, (current) =>
      current.state === 'generated' && !current.send_in_flight ? { ...current, send_in_flight: true } : null,
    );
    if (!claimed?.changed) {
      throw new OutreachError('Attempt is already being sent', ErrorCodes.INVALID_TRANSITION, 'send', scope);
    }

    if (!claimed.attempt.budget_reserved) {
      const reservation = await consumeBudget(this.deps.repository, attempt.company_id, waveId);
      if (!reservation.consumed) {
        this.logger.budgetRejected({
          attendee_id: attendeeId,
          company_id: attempt.company_id,
          consumed: reservation.budget?.consumed ?? 0,
          cap: reservation.budget?.cap ?? 0,
        });
        if (reservation.reason === 'cap_reached') {
          return { attempt: await this.suppressOverBudget(attempt), outcome: 'budget_rejected' };
        }
        const unavailable = await this.recordSendError(
          attempt,
          ErrorCodes.BUDGET_EXHAUSTED,
          `Budget ${reservation.reason}`,
          'error',
        );
        return { attempt: unavailable, outcome: 'budget_unavailable' };
      }
      await updateAttempt(this.deps.repository, attempt.id, (current) => ({ ...current, budget_reserved: true }));
    }

    const delivery = await deliverWithRetry(
      this.deps.delivery,
      { to: attendee.email, subject: message.subject, body: message.body },
      { trackingBcc: this.config.trackingBcc, stage: 'send', scope },
      { timeoutMs: this.config.deliveryTimeoutMs },
    );

    if (!delivery.success) {
      const failed = await this.recordSendError(attempt, delivery.error.code, delivery.error.message, 'error');
      this.logger.deliveryFailed({
        attendee_id: attendeeId,
        company_id: attempt.company_id,
        stage: 'send',
        attempts: delivery.attempts,
        error_message: delivery.error.message,
      });
      return { attempt: failed, outcome: 'delivery_failed' };
    }

    const sentAt = this.config.now();
    const deliveryId = delivery.receipt.delivery_id;
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) => {
      const sent = transitionAttempt(
        {
          ...current,
          send_status: 'sent',
          send_in_flight: false,
          delivery_id: deliveryId,
          sent_at: sentAt.toISOString(),
          follow_up_eligible_at: followUpEligibleAt(sentAt, this.config.followUpDelayDays).toISOString(),
          last_error: null,
        },
        'sent',
        { stage: 'send', now: sentAt },
      );
      // A signal recorded before delivery confirmed ends the attempt straight away
      const next = current.reply_signal === 'none' ? 'awaiting-reply' : current.reply_signal;
      return transitionAttempt(sent, next, { stage: 'send', now: sentAt });
    });
    if (!updated) throw new NotFoundError('Attempt', attempt.id, 'send', scope);

    const budget = await this.deps.repository.getBudget(attempt.company_id, waveId);
    this.logger.messageSent({
      attendee_id: attendeeId,
      company_id: attempt.company_id,
      delivery_id: deliveryId,
      consumed: budget?.consumed ?? 0,
      cap: budget?.cap ?? 0,
    });

    return { attempt: updated.attempt, outcome: 'sent' };
  }

  /**
   * The company's contacts are all spent: the composed message is never sent
   */
  private async suppressOverBudget(attempt: OutreachAttempt): Promise<OutreachAttempt> {
    const now = this.config.now();
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) =>
      transitionAttempt({ ...current, send_in_flight: false }, 'suppressed', {
        stage: 'send',
        now,
        reason: 'budget_exhausted',
      }),
    );
    if (!updated) {
      throw new NotFoundError('Attempt', attempt.id, 'send', { attendeeId: attempt.attendee_id });
    }
    return updated.attempt;
  }

  private async recordSendError(
    attempt: OutreachAttempt,
    code: string,
    message: string,
    sendStatus?: 'error',
  ): Promise<OutreachAttempt> {
    const at = this.config.now().toISOString();
    const updated = await updateAttempt(this.deps.repository, attempt.id, (current) => ({
      ...current,
      send_in_flight: false,
      send_status: sendStatus ?? current.send_status,
      last_error: { code, stage: 'send', message, at },
      updated_at: at,
    }));
    if (!updated) {
      throw new NotFoundError('Attempt', attempt.id, 'send', { attendeeId: attempt.attendee_id });
    }
    return updated.attempt;
  }

  // ===========================================
  // Wave Processing
  // ===========================================

  /**
   * Run classify, compose and (optionally) send for many companies.
   * Companies run concurrently; within a company the steps run in order.
   * A failure is recorded against its company or attendee and the rest
   * of the wave carries on.
   */
  async processWave(waveId: WaveId, options: ProcessWaveOptions = {}): Promise<WaveResult> {
    const startTime = Date.now();
    const companyIds = options.companyIds ?? (await this.deps.research.listCompanyIds());

    const settled = await mapWithConcurrency(companyIds, this.config.companyConcurrency, (companyId) =>
      this.processCompany(companyId, waveId, options.send ?? false),
    );

    const companies: CompanyWaveResult[] = [];
    const failures: PipelineFailure[] = [];
    settled.forEach((entry, index) => {
      if (entry.status === 'fulfilled') {
        companies.push(entry.value);
        failures.push(...entry.value.failures);
      } else {
        failures.push(failureFrom(entry.reason, { stage: 'classify', company_id: companyIds[index] }));
      }
    });

    const result: WaveResult = { wave_id: waveId, companies, failures, duration_ms: Date.now() - startTime };

    this.logger.waveCompleted({
      wave_id: waveId,
      companies: companyIds.length,
      classified: companies.reduce((n, c) => n + c.classified.length, 0),
      composed: companies.reduce((n, c) => n + c.composed.length, 0),
      sent: companies.reduce((n, c) => n + c.sent.length, 0),
      budget_rejected: companies.reduce((n, c) => n + c.budget_rejected.length, 0),
      failures: failures.length,
      duration_ms: result.duration_ms,
    });

    return result;
  }

  private async processCompany(companyId: CompanyId, waveId: WaveId, send: boolean): Promise<CompanyWaveResult> {
    const result: CompanyWaveResult = {
      company_id: companyId,
      classified: [],
      composed: [],
      sent: [],
      budget_rejected: [],
      failures: [],
    };

    try {
      result.classified = await this.classifyBatch(companyId, waveId);
    } catch (error) {
      result.failures.push(failureFrom(error, { stage: 'classify', company_id: companyId }));
      return result;
    }

    const pending = await this.deps.repository.listAttempts({ companyId, waveId, states: ['pending'] });
    const composed = await mapWithConcurrency(pending, this.config.composeConcurrency, (attempt) =>
      this.composeAndRecord(attempt.attendee_id, waveId),
    );

    composed.forEach((entry, index) => {
      const attendeeId = pending[index].attendee_id;
      if (entry.status === 'rejected') {
        result.failures.push(failureFrom(entry.reason, { stage: 'compose', attendee_id: attendeeId, company_id: companyId }));
      } else if (entry.value.state === 'generated') {
        result.composed.push(attendeeId);
      } else if (entry.value.last_error) {
        result.failures.push({
          stage: 'compose',
          code: entry.value.last_error.code,
          message: entry.value.last_error.message,
          attendee_id: attendeeId,
          company_id: companyId,
        });
      }
    });

    if (!send) {
      return result;
    }

    const ready = await this.deps.repository.listAttempts({ companyId, waveId, states: ['generated'] });
    ready.sort((a, b) => a.treatment.priority - b.treatment.priority);

    for (const attempt of ready) {
      try {
        const { outcome, attempt: after } = await this.sendAttempt(attempt.attendee_id, waveId);
        if (outcome === 'sent') {
          result.sent.push(attempt.attendee_id);
        } else if (outcome === 'budget_rejected') {
          result.budget_rejected.push(attempt.attendee_id);
        } else if (after.last_error) {
          result.failures.push({
            stage: 'send',
            code: after.last_error.code,
            message: after.last_error.message,
            attendee_id: attempt.attendee_id,
            company_id: companyId,
          });
        }
      } catch (error) {
        result.failures.push(failureFrom(error, { stage: 'send', attendee_id: attempt.attendee_id, company_id: companyId }));
      }
    }

    return result;
  }

  // ===========================================
  // Lifecycle
  // ===========================================

  async applySignals(events: readonly SignalEvent[]): Promise<SignalResult[]> {
    return applySignalEvents(events, {
      repository: this.deps.repository,
      logger: this.logger,
      now: this.config.now,
    });
  }

  async dueForFollowUp(asOf: Date): Promise<OutreachAttempt[]> {
    return dueForFollowUp(this.deps.repository, asOf);
  }

  async sendFollowUps(asOf: Date): Promise<FollowUpSweepResult> {
    return sendFollowUps(asOf, {
      repository: this.deps.repository,
      research: this.deps.research,
      delivery: this.deps.delivery,
      trackingBcc: this.config.trackingBcc,
      deliveryConfig: { timeoutMs: this.config.deliveryTimeoutMs },
      logger: this.logger,
      now: this.config.now,
    });
  }

  // ===========================================
  // Queries
  // ===========================================

  /**
   * Failed attempts and ambiguous-role suppressions
   */
  async pendingReview(): Promise<OutreachAttempt[]> {
    const attempts = await this.deps.repository.listAttempts({ states: ['failed', 'suppressed'] });
    return attempts.filter((a) => a.state === 'failed' || a.treatment.requires_review);
  }

  /**
   * Generated attempts whose last delivery failed
   */
  async pendingResend(): Promise<OutreachAttempt[]> {
    const attempts = await this.deps.repository.listAttempts({ states: ['generated'] });
    return attempts.filter((a) => a.send_status === 'error');
  }

  async budgetUsage(waveId: WaveId): Promise<BudgetUsage[]> {
    const budgets = await this.deps.repository.listBudgets(waveId);
    return budgets.map((b) => ({
      company_id: b.company_id,
      wave_id: b.wave_id,
      consumed: b.consumed,
      cap: b.cap,
      remaining: b.cap - b.consumed,
    }));
  }

  private async requireAttempt(
    attendeeId: AttendeeId,
    waveId: WaveId,
    stage: 'compose' | 'send',
  ): Promise<OutreachAttempt> {
    const id = attemptIdFor(waveId, attendeeId);
    const attempt = await this.deps.repository.getAttempt(id);
    if (!attempt) {
      throw new NotFoundError('Attempt', id, stage, { attendeeId });
    }
    return attempt;
  }
}

function sameTreatment(a: Treatment, b: Treatment): boolean {
  return (
    a.variant === b.variant &&
    a.rule_id === b.rule_id &&
    a.priority === b.priority &&
    a.product_focus === b.product_focus &&
    a.requires_review === b.requires_review
  );
}

// ===========================================
// Factory
// ===========================================

export function createOutreachAgent(deps: OutreachAgentDependencies, config: OutreachAgentConfig): OutreachAgent {
  return new OutreachAgent(deps, config);
}
