/**
 * Outreach Agent - Server Entry Point
 *
 * Loads the research export and any saved tracker state, wires the Claude,
 * delivery and Slack clients, and starts the webhook server.
 *
 * Usage:
 *   npm start
 *
 * Required environment variables:
 *   OUTREACH_SECRET         - Webhook authentication secret
 *   OUTREACH_TRACKING_BCC   - Address copied on every send
 *   ANTHROPIC_API_KEY       - Anthropic API key for Claude
 *   DELIVERY_WEBHOOK_URL    - Endpoint that actually sends the email
 *
 * See ./config.ts for the optional settings.
 *
 * @module outreach/server
 */

import Anthropic from '@anthropic-ai/sdk';
import { serve } from '@hono/node-server';
import { WebClient } from '@slack/web-api';
import { initLangfuse, shutdownLangfuse } from '@expo-outreach/lib';

import { createOutreachAgent } from './agent';
import { loadEnvConfig, type EnvConfig } from './config';
import { HttpDeliveryService } from './delivery';
import { ClaudeGenerationService } from './generation';
import { createLogger, type OutreachLogger } from './logger';
import { InMemoryOutreachRepository } from './repository';
import { loadResearchStore } from './research-store';
import { NoopReviewNotifier, SlackReviewNotifier, type ReviewNotifier } from './review-notifier';
import { loadState, saveState } from './state';
import { createOutreachApp } from './webhook';

// ===========================================
// Client Initialization
// ===========================================

function createReviewNotifier(config: EnvConfig, logger: OutreachLogger): ReviewNotifier {
  if (!config.SLACK_BOT_TOKEN || !config.SLACK_REVIEW_CHANNEL) {
    logger.info('Slack review channel not configured, review notifications disabled');
    return new NoopReviewNotifier();
  }
  return new SlackReviewNotifier(new WebClient(config.SLACK_BOT_TOKEN), config.SLACK_REVIEW_CHANNEL, logger);
}

// ===========================================
// Main Entry Point
// ===========================================

async function main(): Promise<void> {
  const config = loadEnvConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  const stateConfig = { stateDir: config.OUTREACH_STATE_DIR };

  initLangfuse();

  const research = await loadResearchStore(config.RESEARCH_DATA_PATH);
  const repository = new InMemoryOutreachRepository(loadState(stateConfig, logger) ?? undefined);

  const agent = createOutreachAgent(
    {
      research,
      repository,
      generation: new ClaudeGenerationService(new Anthropic({ apiKey: config.ANTHROPIC_API_KEY }), {
        ...(config.OUTREACH_MODEL ? { model: config.OUTREACH_MODEL } : {}),
      }),
      delivery: new HttpDeliveryService(config.DELIVERY_WEBHOOK_URL, config.DELIVERY_WEBHOOK_SECRET),
      reviewNotifier: createReviewNotifier(config, logger),
      logger,
    },
    {
      trackingBcc: config.OUTREACH_TRACKING_BCC,
      maxContactsPerCompany: config.MAX_CONTACTS_PER_COMPANY,
      topTargetCount: config.TOP_TARGET_COUNT,
      fitThreshold: config.FIT_THRESHOLD,
      followUpDelayDays: config.FOLLOW_UP_DELAY_DAYS,
      generationTimeoutMs: config.GENERATION_TIMEOUT_MS,
      deliveryTimeoutMs: config.DELIVERY_TIMEOUT_MS,
      composeConcurrency: config.COMPOSE_CONCURRENCY,
      companyConcurrency: config.COMPANY_CONCURRENCY,
    },
  );

  const persist = (): void => {
    saveState(repository.snapshot(), stateConfig);
  };

  const app = createOutreachApp({
    agent,
    webhookSecret: config.OUTREACH_SECRET,
    logger,
    onMutation: persist,
  });

  const server = serve({ fetch: app.fetch, port: config.OUTREACH_PORT }, (info) => {
    logger.info('Outreach server listening', { port: info.port });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    persist();
    server.close();
    shutdownLangfuse()
      .catch((error: unknown) => {
        logger.warn('Langfuse shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start outreach server:', error);
  process.exit(1);
});
