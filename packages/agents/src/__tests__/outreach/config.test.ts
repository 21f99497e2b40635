/**
 * Environment Configuration Tests
 */

import { describe, test, expect } from 'vitest';
import { loadEnvConfig } from '../../outreach/config';

const REQUIRED = {
  OUTREACH_SECRET: 'test-secret',
  OUTREACH_TRACKING_BCC: 'tracking@outreach.test',
  ANTHROPIC_API_KEY: 'test-key',
  DELIVERY_WEBHOOK_URL: 'https://mail.outreach.test/send',
};

describe('loadEnvConfig', () => {
  test('fills defaults for everything optional', () => {
    const config = loadEnvConfig(REQUIRED);

    expect(config).toMatchObject({
      OUTREACH_PORT: 4010,
      OUTREACH_STATE_DIR: 'state',
      RESEARCH_DATA_PATH: 'data/research.json',
      MAX_CONTACTS_PER_COMPANY: 3,
      TOP_TARGET_COUNT: 50,
      FIT_THRESHOLD: 50,
      FOLLOW_UP_DELAY_DAYS: 7,
      GENERATION_TIMEOUT_MS: 20000,
      DELIVERY_TIMEOUT_MS: 10000,
      COMPOSE_CONCURRENCY: 5,
      COMPANY_CONCURRENCY: 4,
      LOG_LEVEL: 'info',
    });
    expect(config.OUTREACH_MODEL).toBeUndefined();
    expect(config.SLACK_BOT_TOKEN).toBeUndefined();
  });

  test('coerces numeric settings', () => {
    const config = loadEnvConfig({ ...REQUIRED, OUTREACH_PORT: '8080', MAX_CONTACTS_PER_COMPANY: '5' });

    expect(config.OUTREACH_PORT).toBe(8080);
    expect(config.MAX_CONTACTS_PER_COMPANY).toBe(5);
  });

  test('treats blank optional strings as unset', () => {
    const config = loadEnvConfig({ ...REQUIRED, SLACK_REVIEW_CHANNEL: '  ', OUTREACH_MODEL: ' claude-test-model ' });

    expect(config.SLACK_REVIEW_CHANNEL).toBeUndefined();
    expect(config.OUTREACH_MODEL).toBe('claude-test-model');
  });

  test('lists every problem', () => {
    expect(() => loadEnvConfig({ OUTREACH_TRACKING_BCC: 'not-an-email' })).toThrow(
      'Invalid environment configuration:\n' +
        '  OUTREACH_SECRET: Required\n' +
        '  OUTREACH_TRACKING_BCC: OUTREACH_TRACKING_BCC must be an email address\n' +
        '  ANTHROPIC_API_KEY: Required\n' +
        '  DELIVERY_WEBHOOK_URL: Required',
    );
  });

  test('rejects a fit threshold above 100', () => {
    expect(() => loadEnvConfig({ ...REQUIRED, FIT_THRESHOLD: '120' })).toThrow('FIT_THRESHOLD');
  });
});
