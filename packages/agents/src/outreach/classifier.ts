/**
 * Treatment Classifier
 *
 * Ordered decision table mapping (attendee, company, budget position) to a
 * treatment. The first rule whose condition holds decides; rule order is
 * part of the behaviour and is covered by tests.
 *
 * @module outreach/classifier
 */

import type { FitCategory, ProductLine } from '@expo-outreach/lib';
import type { AttendeeRecord, CompanyRecord, RoleClassification } from './contracts/research-records';
import type {
  BudgetPosition,
  ContactVariant,
  RuleId,
  SuppressionReason,
  Treatment,
} from './contracts/treatment';
import { DEFAULT_FIT_THRESHOLD, fitCategory, strongerLine } from './fit';
import { roleOf } from './roles';

// ===========================================
// Attendance Type
// ===========================================

export type AttendanceType = 'retailer' | 'exhibitor' | 'other';

/**
 * Normalise a free-text ticket tag. "Retailer/CPG", "retailer / cpg" and
 * "CPG" are retailers; "Exhibitor/Sponsor" and "Sponsor" are exhibitors.
 */
export function parseAttendanceType(ticketType: string): AttendanceType {
  const tag = ticketType.toLowerCase();
  if (/\b(retailer|retail|cpg)\b/.test(tag)) return 'retailer';
  if (/\b(exhibitor|sponsor)\b/.test(tag)) return 'exhibitor';
  return 'other';
}

// ===========================================
// Rule Context
// ===========================================

export interface ClassifyOptions {
  /** Company is in the global top-target list */
  isTopTarget: boolean;
  fitThreshold?: number;
}

/** Facts derived once per classification and shared by every rule */
export interface RuleContext {
  attendance: AttendanceType;
  attendeeCategory: FitCategory;
  companyCategory: FitCategory;
  role: RoleClassification;
  focus: ProductLine;
  position: BudgetPosition;
  isTopTarget: boolean;
}

export interface ClassifierRule {
  id: RuleId;
  when: (ctx: RuleContext) => boolean;
  then: (ctx: RuleContext) => Treatment;
}

function contact(variant: ContactVariant, id: RuleId) {
  return (ctx: RuleContext): Treatment => ({
    variant,
    rule_id: id,
    priority: ctx.position.rank,
    product_focus: ctx.focus,
    requires_review: false,
  });
}

function suppress(reason: SuppressionReason, id: RuleId, requiresReview = false) {
  return (ctx: RuleContext): Treatment => ({
    variant: 'suppressed',
    rule_id: id,
    priority: ctx.position.rank,
    suppression_reason: reason,
    product_focus: ctx.attendeeCategory === 'other' ? undefined : ctx.focus,
    requires_review: requiresReview,
  });
}

// ===========================================
// Decision Table
// ===========================================

export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  {
    id: 'not_fit',
    when: (ctx) => ctx.attendeeCategory === 'other',
    then: suppress('not_fit', 'not_fit'),
  },
  {
    id: 'retailer_budget_exhausted',
    when: (ctx) => ctx.attendance === 'retailer' && !ctx.position.within_cap,
    then: suppress('budget_exhausted', 'retailer_budget_exhausted'),
  },
  {
    id: 'retailer_top_target',
    when: (ctx) => ctx.attendance === 'retailer' && ctx.isTopTarget,
    then: contact('top-tier-personalized', 'retailer_top_target'),
  },
  {
    id: 'retailer_standard',
    when: (ctx) => ctx.attendance === 'retailer',
    then: contact('standard-personalized', 'retailer_standard'),
  },
  {
    id: 'exhibitor_company_not_fit',
    when: (ctx) => ctx.attendance === 'exhibitor' && ctx.companyCategory === 'other',
    then: suppress('company_not_fit', 'exhibitor_company_not_fit'),
  },
  {
    id: 'exhibitor_operations',
    when: (ctx) => ctx.attendance === 'exhibitor' && ctx.role === 'operations',
    then: contact('top-tier-personalized', 'exhibitor_operations'),
  },
  {
    id: 'exhibitor_sales',
    when: (ctx) => ctx.attendance === 'exhibitor' && ctx.role === 'sales',
    then: contact('exhibitor-sales', 'exhibitor_sales'),
  },
  {
    id: 'exhibitor_ambiguous_role',
    when: (ctx) => ctx.attendance === 'exhibitor',
    then: suppress('ambiguous_role', 'exhibitor_ambiguous_role', true),
  },
  {
    id: 'unsupported_attendance_type',
    when: () => true,
    then: suppress('unsupported_attendance_type', 'unsupported_attendance_type'),
  },
];

// ===========================================
// Classification
// ===========================================

export function buildRuleContext(
  attendee: AttendeeRecord,
  company: CompanyRecord,
  position: BudgetPosition,
  options: ClassifyOptions,
): RuleContext {
  const threshold = options.fitThreshold ?? DEFAULT_FIT_THRESHOLD;
  return {
    attendance: parseAttendanceType(attendee.ticket_type),
    attendeeCategory: fitCategory(attendee.gate_fit_score, attendee.truck_fit_score, threshold),
    companyCategory: fitCategory(company.gate_fit_score, company.truck_fit_score, threshold),
    role: roleOf(attendee),
    focus: strongerLine(attendee.gate_fit_score, attendee.truck_fit_score),
    position,
    isTopTarget: options.isTopTarget,
  };
}

/**
 * Classify one attendee. Pure and total: the last rule always matches.
 */
export function classify(
  attendee: AttendeeRecord,
  company: CompanyRecord,
  position: BudgetPosition,
  options: ClassifyOptions,
): Treatment {
  const ctx = buildRuleContext(attendee, company, position, options);
  for (const rule of CLASSIFIER_RULES) {
    if (rule.when(ctx)) {
      return rule.then(ctx);
    }
  }
  // Unreachable while the last rule is unconditional
  return suppress('unsupported_attendance_type', 'unsupported_attendance_type')(ctx);
}
