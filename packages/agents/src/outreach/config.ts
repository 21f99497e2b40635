/**
 * Environment Configuration
 *
 * Reads the server's settings from environment variables. Numeric settings
 * fall back to the engine defaults.
 *
 * @module outreach/config
 */

import { z } from 'zod';
import { DEFAULT_OUTREACH_CONFIG } from './types';

// ===========================================
// Schema
// ===========================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  OUTREACH_SECRET: z.string().min(1, 'OUTREACH_SECRET is required'),
  OUTREACH_PORT: z.coerce.number().int().min(1).max(65535).default(4010),
  OUTREACH_TRACKING_BCC: z.string().email('OUTREACH_TRACKING_BCC must be an email address'),
  OUTREACH_MODEL: optionalString,
  OUTREACH_STATE_DIR: z.string().min(1).default('state'),
  ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
  DELIVERY_WEBHOOK_URL: z.string().url('DELIVERY_WEBHOOK_URL must be a URL'),
  DELIVERY_WEBHOOK_SECRET: optionalString,
  RESEARCH_DATA_PATH: z.string().min(1).default('data/research.json'),

  MAX_CONTACTS_PER_COMPANY: positiveInt(DEFAULT_OUTREACH_CONFIG.maxContactsPerCompany),
  TOP_TARGET_COUNT: positiveInt(DEFAULT_OUTREACH_CONFIG.topTargetCount),
  FIT_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_OUTREACH_CONFIG.fitThreshold),
  FOLLOW_UP_DELAY_DAYS: positiveInt(DEFAULT_OUTREACH_CONFIG.followUpDelayDays),
  GENERATION_TIMEOUT_MS: positiveInt(DEFAULT_OUTREACH_CONFIG.generationTimeoutMs),
  DELIVERY_TIMEOUT_MS: positiveInt(DEFAULT_OUTREACH_CONFIG.deliveryTimeoutMs),
  COMPOSE_CONCURRENCY: positiveInt(DEFAULT_OUTREACH_CONFIG.composeConcurrency),
  COMPANY_CONCURRENCY: positiveInt(DEFAULT_OUTREACH_CONFIG.companyConcurrency),

  SLACK_BOT_TOKEN: optionalString,
  SLACK_REVIEW_CHANNEL: optionalString,

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

// ===========================================
// Loading
// ===========================================

/**
 * Parse the environment.
 *
 * @throws Error listing every missing or malformed variable
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return parsed.data;
}
