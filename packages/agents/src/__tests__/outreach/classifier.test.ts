/**
 * Treatment Classifier Tests
 *
 * Rule order is part of the contract, so several cases match more than one
 * rule on purpose.
 */

import { describe, test, expect } from 'vitest';
import { CLASSIFIER_RULES, classify, parseAttendanceType } from '../../outreach/classifier';
import { TreatmentVariantSchema, type BudgetPosition } from '../../outreach/contracts/treatment';
import { makeAttendee, makeCompany } from './fixtures';

const INSIDE: BudgetPosition = { rank: 2, cap: 3, within_cap: true };
const OUTSIDE: BudgetPosition = { rank: 4, cap: 3, within_cap: false };

const exhibitor = (title: string, overrides: Parameters<typeof makeAttendee>[0] = {}) =>
  makeAttendee({ ticket_type: 'Exhibitor/Sponsor', title, ...overrides });

describe('parseAttendanceType', () => {
  test.each<[string, string]>([
    ['Retailer/CPG', 'retailer'],
    ['retailer / cpg', 'retailer'],
    ['CPG', 'retailer'],
    ['Exhibitor/Sponsor', 'exhibitor'],
    ['Sponsor', 'exhibitor'],
    ['Speaker', 'other'],
    ['', 'other'],
  ])('%j -> %s', (tag, expected) => {
    expect(parseAttendanceType(tag)).toBe(expected);
  });
});

describe('decision table', () => {
  test('lists the rules in evaluation order', () => {
    expect(CLASSIFIER_RULES.map((r) => r.id)).toEqual([
      'not_fit',
      'retailer_budget_exhausted',
      'retailer_top_target',
      'retailer_standard',
      'exhibitor_company_not_fit',
      'exhibitor_operations',
      'exhibitor_sales',
      'exhibitor_ambiguous_role',
      'unsupported_attendance_type',
    ]);
  });

  test('suppresses an attendee with no passing fit score', () => {
    const attendee = makeAttendee({ gate_fit_score: 30, truck_fit_score: 49 });
    expect(classify(attendee, makeCompany(), INSIDE, { isTopTarget: true })).toEqual({
      variant: 'suppressed',
      rule_id: 'not_fit',
      priority: 2,
      suppression_reason: 'not_fit',
      product_focus: undefined,
      requires_review: false,
    });
  });

  test('fit check wins over the budget check', () => {
    const attendee = makeAttendee({ gate_fit_score: 10, truck_fit_score: 10 });
    expect(classify(attendee, makeCompany(), OUTSIDE, { isTopTarget: true }).rule_id).toBe('not_fit');
  });

  test('honours a custom fit threshold', () => {
    const attendee = makeAttendee({ gate_fit_score: 60, truck_fit_score: 10 });
    expect(classify(attendee, makeCompany(), INSIDE, { isTopTarget: true, fitThreshold: 70 }).rule_id).toBe('not_fit');
  });

  test('suppresses a retailer outside the company cap', () => {
    expect(classify(makeAttendee(), makeCompany(), OUTSIDE, { isTopTarget: true })).toEqual({
      variant: 'suppressed',
      rule_id: 'retailer_budget_exhausted',
      priority: 4,
      suppression_reason: 'budget_exhausted',
      product_focus: 'gate',
      requires_review: false,
    });
  });

  test('gives top-target retailers the top-tier treatment', () => {
    expect(classify(makeAttendee(), makeCompany(), INSIDE, { isTopTarget: true })).toEqual({
      variant: 'top-tier-personalized',
      rule_id: 'retailer_top_target',
      priority: 2,
      product_focus: 'gate',
      requires_review: false,
    });
  });

  test('gives other retailers the standard treatment', () => {
    const treatment = classify(makeAttendee(), makeCompany(), INSIDE, { isTopTarget: false });
    expect(treatment.variant).toBe('standard-personalized');
    expect(treatment.rule_id).toBe('retailer_standard');
  });

  test('focuses on the stronger product line', () => {
    const attendee = makeAttendee({ gate_fit_score: 55, truck_fit_score: 90 });
    expect(classify(attendee, makeCompany(), INSIDE, { isTopTarget: false }).product_focus).toBe('truck');
  });

  test('suppresses exhibitors whose company is not a fit', () => {
    const company = makeCompany({ gate_fit_score: 20, truck_fit_score: 20 });
    const treatment = classify(exhibitor('Director of Logistics'), company, INSIDE, { isTopTarget: false });
    expect(treatment).toMatchObject({ variant: 'suppressed', suppression_reason: 'company_not_fit' });
  });

  test('treats operations exhibitors like top-tier retailers', () => {
    const treatment = classify(exhibitor('Director of Logistics'), makeCompany(), INSIDE, { isTopTarget: false });
    expect(treatment).toMatchObject({ variant: 'top-tier-personalized', rule_id: 'exhibitor_operations' });
  });

  test('gives sales exhibitors the lighter template', () => {
    const treatment = classify(exhibitor('VP of Sales'), makeCompany(), INSIDE, { isTopTarget: true });
    expect(treatment).toEqual({
      variant: 'exhibitor-sales',
      rule_id: 'exhibitor_sales',
      priority: 2,
      product_focus: 'gate',
      requires_review: false,
    });
  });

  test('exhibitors are not capped at classification time', () => {
    const treatment = classify(exhibitor('VP of Sales'), makeCompany(), OUTSIDE, { isTopTarget: true });
    expect(treatment.variant).toBe('exhibitor-sales');
  });

  test('sends ambiguous exhibitor roles to review', () => {
    const treatment = classify(exhibitor('Chief Executive Officer'), makeCompany(), INSIDE, { isTopTarget: true });
    expect(treatment).toEqual({
      variant: 'suppressed',
      rule_id: 'exhibitor_ambiguous_role',
      priority: 2,
      suppression_reason: 'ambiguous_role',
      product_focus: 'gate',
      requires_review: true,
    });
  });

  test('suppresses attendance types it does not handle', () => {
    const treatment = classify(makeAttendee({ ticket_type: 'Speaker' }), makeCompany(), INSIDE, { isTopTarget: true });
    expect(treatment).toMatchObject({
      variant: 'suppressed',
      rule_id: 'unsupported_attendance_type',
      suppression_reason: 'unsupported_attendance_type',
      requires_review: false,
    });
  });
});

describe('TreatmentVariantSchema', () => {
  test('lists only the variants the classifier produces', () => {
    expect(TreatmentVariantSchema.options).toEqual([
      'top-tier-personalized',
      'standard-personalized',
      'exhibitor-sales',
      'suppressed',
    ]);
  });
});
