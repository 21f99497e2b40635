/**
 * Outreach Repository
 *
 * Storage for attempts and per-company budgets. Both are updated with
 * compare-and-set so concurrent workers never overwrite each other.
 *
 * @module outreach/repository
 */

import type { AttemptId, AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import type { AttemptState, OutreachAttempt } from './contracts/outreach-attempt';
import type { CompanyBudget } from './contracts/treatment';

// ===========================================
// Interface
// ===========================================

export interface AttemptFilter {
  waveId?: WaveId;
  companyId?: CompanyId;
  attendeeId?: AttendeeId;
  states?: readonly AttemptState[];
}

export type IncrementResult =
  | { ok: true; budget: CompanyBudget }
  | { ok: false; reason: 'conflict' | 'cap_reached'; budget: CompanyBudget }
  | { ok: false; reason: 'missing' };

export interface OutreachRepository {
  getAttempt(id: AttemptId): Promise<OutreachAttempt | null>;
  listAttempts(filter?: AttemptFilter): Promise<OutreachAttempt[]>;
  /** Insert unless an attempt with the same id exists; returns the stored row */
  insertAttempt(attempt: OutreachAttempt): Promise<{ inserted: boolean; attempt: OutreachAttempt }>;
  /**
   * Store `next` if the stored row still has `next.version`. Returns the
   * stored row with its version bumped, or null on a conflict.
   */
  compareAndSetAttempt(next: OutreachAttempt): Promise<OutreachAttempt | null>;

  getBudget(companyId: CompanyId, waveId: WaveId): Promise<CompanyBudget | null>;
  /** Store the budget unless one exists for (company, wave); returns the stored one */
  putBudgetIfAbsent(budget: CompanyBudget): Promise<CompanyBudget>;
  /** consumed += 1 if consumed still equals `expectedConsumed` and stays within the cap */
  compareAndIncrement(companyId: CompanyId, waveId: WaveId, expectedConsumed: number): Promise<IncrementResult>;
  listBudgets(waveId?: WaveId): Promise<CompanyBudget[]>;
}

// ===========================================
// In-Memory Implementation
// ===========================================

export interface RepositorySnapshot {
  attempts: OutreachAttempt[];
  budgets: CompanyBudget[];
}

function budgetKey(companyId: CompanyId, waveId: WaveId): string {
  return `${waveId}\u0000${companyId}`;
}

/** Yield so concurrent callers interleave between read and write */
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class InMemoryOutreachRepository implements OutreachRepository {
  private readonly attempts = new Map<AttemptId, OutreachAttempt>();
  private readonly budgets = new Map<string, CompanyBudget>();

  constructor(snapshot?: RepositorySnapshot) {
    for (const attempt of snapshot?.attempts ?? []) {
      this.attempts.set(attempt.id, structuredClone(attempt));
    }
    for (const budget of snapshot?.budgets ?? []) {
      this.budgets.set(budgetKey(budget.company_id, budget.wave_id), structuredClone(budget));
    }
  }

  async getAttempt(id: AttemptId): Promise<OutreachAttempt | null> {
    const attempt = this.attempts.get(id);
    return attempt ? structuredClone(attempt) : null;
  }

  async listAttempts(filter: AttemptFilter = {}): Promise<OutreachAttempt[]> {
    const rows: OutreachAttempt[] = [];
    for (const attempt of this.attempts.values()) {
      if (filter.waveId !== undefined && attempt.wave_id !== filter.waveId) continue;
      if (filter.companyId !== undefined && attempt.company_id !== filter.companyId) continue;
      if (filter.attendeeId !== undefined && attempt.attendee_id !== filter.attendeeId) continue;
      if (filter.states && !filter.states.includes(attempt.state)) continue;
      rows.push(structuredClone(attempt));
    }
    return rows.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async insertAttempt(attempt: OutreachAttempt): Promise<{ inserted: boolean; attempt: OutreachAttempt }> {
    const existing = this.attempts.get(attempt.id);
    if (existing) {
      return { inserted: false, attempt: structuredClone(existing) };
    }
    this.attempts.set(attempt.id, structuredClone(attempt));
    return { inserted: true, attempt: structuredClone(attempt) };
  }

  async compareAndSetAttempt(next: OutreachAttempt): Promise<OutreachAttempt | null> {
    await tick();
    const current = this.attempts.get(next.id);
    if (!current || current.version !== next.version) {
      return null;
    }
    const stored = { ...structuredClone(next), version: current.version + 1 };
    this.attempts.set(next.id, stored);
    return structuredClone(stored);
  }

  async getBudget(companyId: CompanyId, waveId: WaveId): Promise<CompanyBudget | null> {
    const budget = this.budgets.get(budgetKey(companyId, waveId));
    return budget ? structuredClone(budget) : null;
  }

  async putBudgetIfAbsent(budget: CompanyBudget): Promise<CompanyBudget> {
    const key = budgetKey(budget.company_id, budget.wave_id);
    const existing = this.budgets.get(key);
    if (existing) {
      return structuredClone(existing);
    }
    this.budgets.set(key, structuredClone(budget));
    return structuredClone(budget);
  }

  async compareAndIncrement(companyId: CompanyId, waveId: WaveId, expectedConsumed: number): Promise<IncrementResult> {
    await tick();
    const key = budgetKey(companyId, waveId);
    const current = this.budgets.get(key);
    if (!current) {
      return { ok: false, reason: 'missing' };
    }
    if (current.consumed >= current.cap) {
      return { ok: false, reason: 'cap_reached', budget: structuredClone(current) };
    }
    if (current.consumed !== expectedConsumed) {
      return { ok: false, reason: 'conflict', budget: structuredClone(current) };
    }
    const updated = { ...current, consumed: current.consumed + 1 };
    this.budgets.set(key, updated);
    return { ok: true, budget: structuredClone(updated) };
  }

  async listBudgets(waveId?: WaveId): Promise<CompanyBudget[]> {
    return [...this.budgets.values()]
      .filter((b) => waveId === undefined || b.wave_id === waveId)
      .map((b) => structuredClone(b))
      .sort((a, b) => (a.company_id < b.company_id ? -1 : a.company_id > b.company_id ? 1 : 0));
  }

  snapshot(): RepositorySnapshot {
    return {
      attempts: [...this.attempts.values()].map((a) => structuredClone(a)),
      budgets: [...this.budgets.values()].map((b) => structuredClone(b)),
    };
  }
}

// ===========================================
// Budget Consumption
// ===========================================

export type ConsumeResult =
  | { consumed: true; budget: CompanyBudget }
  | { consumed: false; reason: 'cap_reached' | 'missing' | 'contention'; budget?: CompanyBudget };

export const DEFAULT_CONSUME_RETRIES = 25;

/**
 * Reserve one contact against a company budget.
 *
 * Retries the compare-and-increment only when another writer got there
 * first; a full budget is rejected immediately.
 */
export async function consumeBudget(
  repository: OutreachRepository,
  companyId: CompanyId,
  waveId: WaveId,
  maxRetries: number = DEFAULT_CONSUME_RETRIES,
): Promise<ConsumeResult> {
  let budget = await repository.getBudget(companyId, waveId);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (!budget) {
      return { consumed: false, reason: 'missing' };
    }
    if (budget.consumed >= budget.cap) {
      return { consumed: false, reason: 'cap_reached', budget };
    }

    const result = await repository.compareAndIncrement(companyId, waveId, budget.consumed);
    if (result.ok) {
      return { consumed: true, budget: result.budget };
    }
    if (result.reason === 'missing') {
      return { consumed: false, reason: 'missing' };
    }
    if (result.reason === 'cap_reached') {
      return { consumed: false, reason: 'cap_reached', budget: result.budget };
    }
    budget = result.budget;
  }

  return { consumed: false, reason: 'contention', budget: budget ?? undefined };
}

// ===========================================
// Attempt Updates
// ===========================================

export const DEFAULT_UPDATE_RETRIES = 5;

/**
 * Read-modify-write an attempt with compare-and-set, re-reading on conflict.
 * `mutate` returns null to leave the row as it is.
 *
 * @returns the stored row and whether this call changed it, or null when
 *   the attempt does not exist
 */
export async function updateAttempt(
  repository: OutreachRepository,
  id: AttemptId,
  mutate: (current: OutreachAttempt) => OutreachAttempt | null,
  maxRetries: number = DEFAULT_UPDATE_RETRIES,
): Promise<{ attempt: OutreachAttempt; changed: boolean } | null> {
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const current = await repository.getAttempt(id);
    if (!current) return null;

    const next = mutate(current);
    if (next === null) {
      return { attempt: current, changed: false };
    }

    const stored = await repository.compareAndSetAttempt({ ...next, version: current.version });
    if (stored) {
      return { attempt: stored, changed: true };
    }
  }

  throw new Error(`Attempt ${id} kept changing underneath ${maxRetries + 1} updates`);
}
