/**
 * Content Composer
 *
 * Builds the fact payload for a treatment, asks the generation service for
 * a draft, normalises the disclosure line and validates grounding. A draft
 * that fails gets one stricter retry; after that it is returned unvalidated
 * so the caller can route it to review.
 *
 * @module outreach/composer
 */

import { toError, withTimeout } from '@expo-outreach/lib';
import type { AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import type { AttendeeRecord, CompanyRecord } from './contracts/research-records';
import { isSuppressed, type Treatment } from './contracts/treatment';
import type { FactPayload, GeneratedMessage } from './contracts/generated-message';
import type { OutreachEmail } from './contracts/message-tool';
import { GenerationError, SuppressedTreatmentError, UngroundedClaimError, type ErrorScope } from './errors';
import { buildFactPayload } from './fact-payload';
import type { GenerationFamily, GenerationService } from './generation';
import { validateGrounding } from './grounding';
import { logger as defaultLogger, type OutreachLogger } from './logger';
import {
  TEMPLATE_FAMILY_BY_VARIANT,
  followUpBody,
  followUpSubject,
  stripDisclosure,
  withDisclosure,
} from './templates';

// ===========================================
// Configuration
// ===========================================

export interface ComposerConfig {
  generationTimeoutMs: number;
  /** Generation calls per compose, including the stricter retry */
  maxGenerationAttempts: number;
}

export const DEFAULT_COMPOSER_CONFIG: ComposerConfig = {
  generationTimeoutMs: 20_000,
  maxGenerationAttempts: 2,
};

export interface ComposerDependencies {
  generation: GenerationService;
  logger?: OutreachLogger;
}

export interface ComposeOptions {
  /** Attendees at this company being contacted in the wave */
  companyContactCount: number;
  waveId?: WaveId;
}

/** A composed message plus the error that kept it from validating */
export interface ComposeResult {
  message: GeneratedMessage;
  /** Set when validation did not pass */
  error?: UngroundedClaimError | GenerationError;
}

// ===========================================
// Composer
// ===========================================

export class ContentComposer {
  private readonly config: ComposerConfig;
  private readonly logger: OutreachLogger;

  constructor(
    private readonly deps: ComposerDependencies,
    config?: Partial<ComposerConfig>,
  ) {
    this.config = { ...DEFAULT_COMPOSER_CONFIG, ...config };
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Compose a first-touch message.
   *
   * @throws SuppressedTreatmentError for suppressed treatments
   * @throws GenerationError when no generation call produced a draft
   */
  async compose(
    attendee: AttendeeRecord,
    company: CompanyRecord,
    treatment: Treatment,
    options: ComposeOptions,
  ): Promise<ComposeResult> {
    const scope: ErrorScope = { attendeeId: attendee.id, companyId: company.id };
    if (isSuppressed(treatment)) {
      throw new SuppressedTreatmentError(scope);
    }

    const family = TEMPLATE_FAMILY_BY_VARIANT[treatment.variant];
    const payload = buildFactPayload(attendee, company, treatment, {
      includeDisclosure: options.companyContactCount > 1,
    });

    let rejected: string[] | undefined;
    let lastDraft: GeneratedMessage | undefined;
    let lastError: UngroundedClaimError | GenerationError | undefined;

    for (let attempt = 1; attempt <= this.config.maxGenerationAttempts; attempt++) {
      try {
        const message = await this.draft(family, payload, attempt, rejected, {
          attendeeId: attendee.id,
          companyId: company.id,
          waveId: options.waveId,
        });
        this.logger.messageComposed({
          attendee_id: attendee.id,
          company_id: company.id,
          template_family: family,
          attempts: attempt,
          disclosure_included: message.disclosure_included,
        });
        return { message };
      } catch (error) {
        if (error instanceof UngroundedClaimError) {
          lastDraft = error.draft;
          this.logger.groundingFailed({
            attendee_id: attendee.id,
            company_id: company.id,
            attempt,
            issues: error.issues.map((i) => i.detail),
          });
          rejected = error.issues.map((i) => i.detail);
        } else if (error instanceof GenerationError) {
          this.logger.warn('Generation call failed', {
            attendee_id: attendee.id,
            company_id: company.id,
            attempt,
            error_message: error.message,
          });
          rejected = [`the previous call failed (${error.message}); keep the draft short and use fewer facts`];
        } else {
          throw error;
        }
        lastError = error;
      }
    }

    if (!lastDraft || !lastError) {
      throw lastError ?? new GenerationError('No generation attempts were made', scope);
    }

    return { message: lastDraft, error: lastError };
  }

  /**
   * One generation call: draft, normalise disclosure, validate.
   */
  private async draft(
    family: GenerationFamily,
    payload: FactPayload,
    attempt: number,
    rejected: string[] | undefined,
    ids: { attendeeId: AttendeeId; companyId: CompanyId; waveId?: WaveId },
  ): Promise<GeneratedMessage> {
    const scope: ErrorScope = { attendeeId: ids.attendeeId, companyId: ids.companyId };

    let raw: OutreachEmail;
    try {
      raw = await withTimeout(
        this.deps.generation.generate(family, payload, {
          timeoutMs: this.config.generationTimeoutMs,
          attempt,
          rejected,
          ...ids,
        }),
        this.config.generationTimeoutMs,
        'generation',
      );
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      const cause = toError(error);
      throw new GenerationError(cause.message, scope, cause);
    }

    const message: GeneratedMessage = {
      subject: stripDisclosure(raw.subject),
      body: withDisclosure(raw.body, payload.company_name, payload.include_disclosure),
      claimed_facts: raw.claimed_facts,
      template_family: family,
      disclosure_included: payload.include_disclosure,
      validation: { passed: true, issues: [], attempts: attempt },
    };

    const verdict = validateGrounding(message, payload, family);
    if (!verdict.passed) {
      throw new UngroundedClaimError(verdict.issues, scope, {
        ...message,
        validation: { passed: false, issues: verdict.issues, attempts: attempt },
      });
    }

    return message;
  }
}

// ===========================================
// Follow-up
// ===========================================

/**
 * Fixed follow-up message: first name and company name only, no generation
 * call.
 */
export function composeFollowUp(
  attendee: Pick<AttendeeRecord, 'first_name'>,
  company: Pick<CompanyRecord, 'name'>,
): GeneratedMessage {
  const firstName = attendee.first_name.trim();
  const companyName = company.name.trim();

  return {
    subject: followUpSubject(firstName),
    body: followUpBody(firstName, companyName),
    claimed_facts: [
      { field: 'first_name', value: firstName },
      { field: 'company_name', value: companyName },
    ],
    template_family: 'follow_up',
    disclosure_included: false,
    validation: { passed: true, issues: [], attempts: 0 },
  };
}

export function createComposer(deps: ComposerDependencies, config?: Partial<ComposerConfig>): ContentComposer {
  return new ContentComposer(deps, config);
}
