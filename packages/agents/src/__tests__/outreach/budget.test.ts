/**
 * Account Budget Tracker Tests
 */

import { describe, test, expect } from 'vitest';
import { budgetPosition, capFor, computeBudget } from '../../outreach/budget';
import { InvalidInputError } from '../../outreach/errors';
import { makeAttendee, makeRetailers, T0, TEST_WAVE } from './fixtures';

describe('capFor', () => {
  test('equals the attendee count up to the maximum', () => {
    expect(capFor(1)).toBe(1);
    expect(capFor(2)).toBe(2);
    expect(capFor(3)).toBe(3);
  });

  test('uses the configured maximum above it', () => {
    expect(capFor(4)).toBe(3);
    expect(capFor(12)).toBe(3);
    expect(capFor(12, 5)).toBe(5);
  });
});

describe('computeBudget', () => {
  test('ranks by combined score and fixes the cap', () => {
    const attendees = makeRetailers(5);
    const budget = computeBudget('co-acme', [...attendees].reverse(), TEST_WAVE, { computedAt: T0 });

    expect(budget).toEqual({
      company_id: 'co-acme',
      wave_id: TEST_WAVE,
      ranking: ['att-co-acme-1', 'att-co-acme-2', 'att-co-acme-3', 'att-co-acme-4', 'att-co-acme-5'],
      cap: 3,
      consumed: 0,
      computed_at: '2026-03-02T15:00:00.000Z',
    });
  });

  test('breaks score ties by attendee id', () => {
    const attendees = ['att-c', 'att-a', 'att-b'].map((id) => makeAttendee({ id }));
    const first = computeBudget('co-acme', attendees, TEST_WAVE, { computedAt: T0 });
    const second = computeBudget('co-acme', [...attendees].reverse(), TEST_WAVE, { computedAt: T0 });

    expect(first.ranking).toEqual(['att-a', 'att-b', 'att-c']);
    expect(second).toEqual(first);
  });

  test('cap equals the roster size for small companies', () => {
    expect(computeBudget('co-acme', makeRetailers(2), TEST_WAVE).cap).toBe(2);
  });

  test('rejects an empty roster', () => {
    expect(() => computeBudget('co-acme', [], TEST_WAVE)).toThrow(InvalidInputError);
    expect(() => computeBudget('co-acme', [], TEST_WAVE)).toThrow('Company co-acme has no attendees to rank');
  });

  test('rejects attendees from another company', () => {
    const attendees = [makeAttendee({ id: 'att-1' }), makeAttendee({ id: 'att-2', company_id: 'co-other' })];
    expect(() => computeBudget('co-acme', attendees, TEST_WAVE)).toThrow('Attendee att-2 belongs to co-other, not co-acme');
  });

  test('rejects a repeated attendee', () => {
    const attendee = makeAttendee({ id: 'att-1' });
    expect(() => computeBudget('co-acme', [attendee, attendee], TEST_WAVE)).toThrow('Attendee att-1 listed twice');
  });

  test('rejects a non-positive maximum', () => {
    expect(() => computeBudget('co-acme', makeRetailers(2), TEST_WAVE, { maxPerCompany: 0 })).toThrow(
      'maxPerCompany must be a positive integer, got 0',
    );
  });
});

describe('budgetPosition', () => {
  const budget = computeBudget('co-acme', makeRetailers(5), TEST_WAVE, { computedAt: T0 });

  test('reports rank and whether it is inside the cap', () => {
    expect(budgetPosition(budget, 'att-co-acme-3')).toEqual({ rank: 3, cap: 3, within_cap: true });
    expect(budgetPosition(budget, 'att-co-acme-4')).toEqual({ rank: 4, cap: 3, within_cap: false });
  });

  test('places unranked attendees after everyone else', () => {
    expect(budgetPosition(budget, 'att-unknown')).toEqual({ rank: 6, cap: 3, within_cap: false });
  });
});
