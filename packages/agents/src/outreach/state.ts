/**
 * State Persistence
 *
 * Saves the repository contents (attempts and budgets) as one JSON file so
 * a restarted server picks up where it left off.
 *
 * State files are stored in state/outreach-state.json
 *
 * @module outreach/state
 */

import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { OutreachAttemptSchema } from './contracts/outreach-attempt';
import { CompanyBudgetSchema } from './contracts/treatment';
import { logger as defaultLogger, type OutreachLogger } from './logger';
import type { RepositorySnapshot } from './repository';

// ===========================================
// Configuration
// ===========================================

export interface StateConfig {
  /** Relative paths resolve against the working directory */
  stateDir?: string;
  stateFilename?: string;
}

const DEFAULT_STATE_CONFIG: Required<StateConfig> = {
  stateDir: 'state',
  stateFilename: 'outreach-state.json',
};

const StateFileSchema = z.object({
  saved_at: z.string().datetime({ offset: true }),
  attempts: z.array(OutreachAttemptSchema),
  budgets: z.array(CompanyBudgetSchema),
});

// ===========================================
// Path Helpers
// ===========================================

export function getStatePath(config: StateConfig = {}): string {
  const { stateDir, stateFilename } = { ...DEFAULT_STATE_CONFIG, ...config };
  return resolve(process.cwd(), stateDir, stateFilename);
}

// ===========================================
// State CRUD Operations
// ===========================================

/**
 * Load the saved snapshot.
 *
 * @returns null when there is no state file, or when it fails validation
 *   (logged, so a corrupt file never blocks startup)
 */
export function loadState(config: StateConfig = {}, logger: OutreachLogger = defaultLogger): RepositorySnapshot | null {
  const statePath = getStatePath(config);
  if (!existsSync(statePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(statePath, 'utf-8'));
  } catch (error) {
    logger.warn('State file is not valid JSON, starting empty', {
      path: statePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('State file failed validation, starting empty', {
      path: statePath,
      issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }

  return { attempts: parsed.data.attempts, budgets: parsed.data.budgets };
}

export function saveState(snapshot: RepositorySnapshot, config: StateConfig = {}, now: Date = new Date()): string {
  const statePath = getStatePath(config);
  mkdirSync(dirname(statePath), { recursive: true });

  const file: z.infer<typeof StateFileSchema> = {
    saved_at: now.toISOString(),
    attempts: snapshot.attempts,
    budgets: snapshot.budgets,
  };
  writeFileSync(statePath, JSON.stringify(file, null, 2), 'utf-8');
  return statePath;
}

export function clearState(config: StateConfig = {}): void {
  const statePath = getStatePath(config);
  if (existsSync(statePath)) {
    unlinkSync(statePath);
  }
}

export function hasState(config: StateConfig = {}): boolean {
  return existsSync(getStatePath(config));
}
