/**
 * Fact Payload
 *
 * Whitelists the research facts a generation call may see for one
 * attendee. Unsourced or non-positive counts are dropped so the model has
 * no number to repeat.
 *
 * @module outreach/fact-payload
 */

import type { AttendeeRecord, CompanyRecord } from './contracts/research-records';
import type { ContactTreatment } from './contracts/treatment';
import type { FactPayload } from './contracts/generated-message';
import { FRAMING_BY_FAMILY, TEMPLATE_FAMILY_BY_VARIANT } from './templates';

export const MAX_BULLETS = 3;

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * A count is usable only when it is a positive integer with a source
 */
export function usableCount(count: number, source: string | undefined): { count: number; source: string } | null {
  const cited = clean(source);
  if (!Number.isInteger(count) || count <= 0 || !cited) return null;
  return { count, source: cited };
}

export function buildFactPayload(
  attendee: AttendeeRecord,
  company: CompanyRecord,
  treatment: ContactTreatment,
  options: { includeDisclosure: boolean },
): FactPayload {
  const family = TEMPLATE_FAMILY_BY_VARIANT[treatment.variant];
  const focusCount =
    treatment.product_focus === 'gate'
      ? usableCount(company.dc_count, company.dc_source)
      : usableCount(company.truck_count, company.truck_source);

  return {
    first_name: attendee.first_name.trim(),
    company_name: company.name.trim(),
    overview: clean(company.overview),
    dc_count: treatment.product_focus === 'gate' ? focusCount?.count : undefined,
    truck_count: treatment.product_focus === 'truck' ? focusCount?.count : undefined,
    count_source: focusCount?.source,
    hook: clean(company.hook),
    bullets: company.bullets
      .map((b) => b.trim())
      .filter((b) => b.length > 0)
      .slice(0, MAX_BULLETS),
    framing: FRAMING_BY_FAMILY[family],
    include_disclosure: options.includeDisclosure,
  };
}
