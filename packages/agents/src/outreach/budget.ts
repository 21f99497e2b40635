/**
 * Account Budget Tracker
 *
 * Ranks a company's attendees and fixes how many of them may be contacted
 * in a wave. Pure: persisting the budget and counting sends against it is
 * the repository's job.
 *
 * @module outreach/budget
 */

import type { AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import type { AttendeeRecord } from './contracts/research-records';
import type { BudgetPosition, CompanyBudget } from './contracts/treatment';
import { InvalidInputError } from './errors';

export const DEFAULT_MAX_CONTACTS_PER_COMPANY = 3;

export interface BudgetOptions {
  maxPerCompany?: number;
  computedAt?: Date;
}

/**
 * Best first: combined score desc, attendee id asc
 */
export function compareAttendeeRank(a: AttendeeRecord, b: AttendeeRecord): number {
  if (a.combined_score !== b.combined_score) {
    return b.combined_score - a.combined_score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function capFor(attendeeCount: number, maxPerCompany: number = DEFAULT_MAX_CONTACTS_PER_COMPANY): number {
  return attendeeCount <= maxPerCompany ? attendeeCount : maxPerCompany;
}

/**
 * Compute the ranking and cap for one company in one wave.
 *
 * @throws InvalidInputError on an empty list, attendees from another
 *   company, or a repeated attendee id
 */
export function computeBudget(
  companyId: CompanyId,
  attendees: readonly AttendeeRecord[],
  waveId: WaveId,
  options: BudgetOptions = {},
): CompanyBudget {
  const maxPerCompany = options.maxPerCompany ?? DEFAULT_MAX_CONTACTS_PER_COMPANY;
  if (!Number.isInteger(maxPerCompany) || maxPerCompany < 1) {
    throw new InvalidInputError(`maxPerCompany must be a positive integer, got ${maxPerCompany}`, 'classify', {
      companyId,
    });
  }

  if (attendees.length === 0) {
    throw new InvalidInputError(`Company ${companyId} has no attendees to rank`, 'classify', { companyId });
  }

  const seen = new Set<AttendeeId>();
  for (const attendee of attendees) {
    if (attendee.company_id !== companyId) {
      throw new InvalidInputError(
        `Attendee ${attendee.id} belongs to ${attendee.company_id}, not ${companyId}`,
        'classify',
        { companyId, attendeeId: attendee.id },
      );
    }
    if (seen.has(attendee.id)) {
      throw new InvalidInputError(`Attendee ${attendee.id} listed twice`, 'classify', {
        companyId,
        attendeeId: attendee.id,
      });
    }
    seen.add(attendee.id);
  }

  const ranking = [...attendees].sort(compareAttendeeRank).map((a) => a.id);

  return {
    company_id: companyId,
    wave_id: waveId,
    ranking,
    cap: capFor(ranking.length, maxPerCompany),
    consumed: 0,
    computed_at: (options.computedAt ?? new Date()).toISOString(),
  };
}

export function budgetPosition(budget: CompanyBudget, attendeeId: AttendeeId): BudgetPosition {
  const index = budget.ranking.indexOf(attendeeId);
  const rank = index === -1 ? budget.ranking.length + 1 : index + 1;
  return {
    rank,
    cap: budget.cap,
    within_cap: rank <= budget.cap,
  };
}
