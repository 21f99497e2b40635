/**
 * Role Classification
 *
 * Buckets an attendee's title into operations, sales or other. A title
 * that hits both keyword families is treated as other so it goes to review.
 *
 * @module outreach/roles
 */

import type { AttendeeRecord, RoleClassification } from './contracts/research-records';

export const OPERATIONS_KEYWORDS = [
  'operations',
  'logistics',
  'supply chain',
  'distribution',
  'warehouse',
  'warehousing',
  'transportation',
  'fleet',
  'facility',
  'facilities',
  'security',
  'loss prevention',
  'fulfillment',
  'yard',
] as const;

export const SALES_KEYWORDS = [
  'sales',
  'business development',
  'account',
  'partnership',
  'marketing',
  'revenue',
  'customer success',
  'channel',
] as const;

function keywordPattern(keywords: readonly string[]): RegExp {
  const escaped = keywords.map((k) => k.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/ /g, '\\s+'));
  return new RegExp(`\\b(?:${escaped.join('|')})s?\\b`, 'i');
}

const OPERATIONS_PATTERN = keywordPattern(OPERATIONS_KEYWORDS);
const SALES_PATTERN = keywordPattern(SALES_KEYWORDS);

/**
 * Classify free-text title and job function
 */
export function classifyRole(title?: string, jobFunction?: string): RoleClassification {
  const text = [title, jobFunction].filter(Boolean).join(' ');
  if (!text.trim()) return 'other';

  const operations = OPERATIONS_PATTERN.test(text);
  const sales = SALES_PATTERN.test(text);

  if (operations && !sales) return 'operations';
  if (sales && !operations) return 'sales';
  return 'other';
}

/**
 * Research-supplied role wins over keyword matching
 */
export function roleOf(attendee: Pick<AttendeeRecord, 'role' | 'title' | 'job_function'>): RoleClassification {
  return attendee.role ?? classifyRole(attendee.title, attendee.job_function);
}
