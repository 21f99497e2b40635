/**
 * Grounding Validation
 *
 * Pure checks of a drafted message against the fact payload it was
 * generated from. No I/O; the composer decides what to do with the verdict.
 *
 * @module outreach/grounding
 */

import type {
  ClaimedFact,
  FactField,
  FactPayload,
  GroundingIssue,
  TemplateFamily,
} from './contracts/generated-message';
import { FactFieldSchema } from './contracts/generated-message';
import { findMeetingOffer, hasDisclosure } from './templates';

// ===========================================
// Numbers
// ===========================================

/**
 * A standalone number. Digits glued to a letter on the left ("Q4", "B2B"),
 * joined by a slash ("24/7") or followed by a word ("3PL") are part of a
 * term, not a quantity; ordinals ("25th") and unit letters ("40M") still count.
 */
const NUMBER_PATTERN = /(?<![A-Za-z\d.\/])\d(?:[\d,]*\d)?(?:\.\d+)?(?![\d\/]|[.,]\d|(?!(?:st|nd|rd|th)\b)[A-Za-z]{2})/g;

/**
 * Every standalone number in the text, thousands separators removed.
 * "1,200 sites and 3.5 miles" -> ['1200', '3.5']
 */
export function extractNumericTokens(text: string): string[] {
  return [...text.matchAll(NUMBER_PATTERN)].map((m) => m[0].replace(/,/g, ''));
}

function numericValue(token: string): number {
  return Number(token);
}

/**
 * Numbers the payload makes available to the writer
 */
export function groundedNumbers(payload: FactPayload): Set<number> {
  const numbers = new Set<number>();
  if (payload.dc_count !== undefined) numbers.add(payload.dc_count);
  if (payload.truck_count !== undefined) numbers.add(payload.truck_count);

  const texts = [
    payload.first_name,
    payload.company_name,
    payload.overview,
    payload.count_source,
    payload.hook,
    ...payload.bullets,
  ];
  for (const text of texts) {
    if (!text) continue;
    for (const token of extractNumericTokens(text)) {
      numbers.add(numericValue(token));
    }
  }
  return numbers;
}

// ===========================================
// Claimed Facts
// ===========================================

const MIN_WORD_OVERLAP = 0.6;

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length >= 3);
}

/**
 * Field contents for a claimed fact, or null when the payload does not
 * supply that field
 */
export function fieldValues(payload: FactPayload, field: FactField): string[] | null {
  switch (field) {
    case 'first_name':
      return [payload.first_name];
    case 'company_name':
      return [payload.company_name];
    case 'overview':
      return payload.overview ? [payload.overview] : null;
    case 'dc_count':
      return payload.dc_count !== undefined ? [String(payload.dc_count)] : null;
    case 'truck_count':
      return payload.truck_count !== undefined ? [String(payload.truck_count)] : null;
    case 'count_source':
      return payload.count_source ? [payload.count_source] : null;
    case 'hook':
      return payload.hook ? [payload.hook] : null;
    case 'bullets':
      return payload.bullets.length > 0 ? payload.bullets : null;
  }
}

/**
 * A claim value is supported by a field when every number in it appears in
 * the field and most of its words do too.
 */
export function claimSupported(value: string, source: string): boolean {
  const sourceNumbers = new Set(extractNumericTokens(source).map(numericValue));
  const claimNumbers = extractNumericTokens(value).map(numericValue);
  if (claimNumbers.some((n) => !sourceNumbers.has(n))) return false;

  const claimWords = words(value);
  if (claimWords.length === 0) {
    return claimNumbers.length > 0 || source.toLowerCase().includes(value.trim().toLowerCase());
  }

  const sourceWords = new Set(words(source));
  const hits = claimWords.filter((w) => sourceWords.has(w)).length;
  return hits / claimWords.length >= MIN_WORD_OVERLAP;
}

export function checkClaimedFact(claim: ClaimedFact, payload: FactPayload): GroundingIssue | null {
  const field = FactFieldSchema.safeParse(claim.field);
  if (!field.success) {
    return { kind: 'unknown_field', detail: `claimed field "${claim.field}" is not a supplied fact` };
  }

  const values = fieldValues(payload, field.data);
  if (!values) {
    return { kind: 'unknown_field', detail: `claimed field "${claim.field}" was not supplied` };
  }

  if (!values.some((source) => claimSupported(claim.value, source))) {
    return {
      kind: 'unsupported_value',
      detail: `claimed ${claim.field} "${claim.value}" does not match the supplied value`,
    };
  }

  return null;
}

// ===========================================
// Verdict
// ===========================================

export interface DraftMessage {
  subject: string;
  body: string;
  claimed_facts: ClaimedFact[];
}

export interface GroundingVerdict {
  passed: boolean;
  issues: GroundingIssue[];
  /** Numeric tokens with no source in the payload */
  ungroundedNumbers: string[];
}

export function validateGrounding(
  draft: DraftMessage,
  payload: FactPayload,
  family: TemplateFamily,
): GroundingVerdict {
  const issues: GroundingIssue[] = [];

  const allowed = groundedNumbers(payload);
  const ungroundedNumbers = [
    ...new Set(
      extractNumericTokens(`${draft.subject}\n${draft.body}`).filter((token) => !allowed.has(numericValue(token))),
    ),
  ];
  for (const token of ungroundedNumbers) {
    issues.push({ kind: 'ungrounded_number', detail: `number ${token} does not appear in the supplied facts` });
  }

  for (const claim of draft.claimed_facts) {
    const issue = checkClaimedFact(claim, payload);
    if (issue) issues.push(issue);
  }

  if (family === 'exhibitor_sales') {
    const offer = findMeetingOffer(`${draft.subject}\n${draft.body}`);
    if (offer) {
      issues.push({ kind: 'meeting_offer', detail: `exhibitor-sales message offers a meeting ("${offer}")` });
    }
  }

  const disclosed = hasDisclosure(draft.body);
  if (payload.include_disclosure && !disclosed) {
    issues.push({ kind: 'disclosure_missing', detail: 'colleague disclosure line is required' });
  } else if (!payload.include_disclosure && disclosed) {
    issues.push({ kind: 'disclosure_unexpected', detail: 'colleague disclosure line must be omitted' });
  }

  return { passed: issues.length === 0, issues, ungroundedNumbers };
}
