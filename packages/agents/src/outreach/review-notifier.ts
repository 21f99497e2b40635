/**
 * Review Notifier
 *
 * Posts attempts that need a human (failed generation, ambiguous role) to a
 * Slack channel. Notification problems are logged and never fail the
 * pipeline.
 *
 * @module outreach/review-notifier
 */

import type { ChatPostMessageArguments, ChatPostMessageResponse, KnownBlock } from '@slack/web-api';
import type { OutreachAttempt } from './contracts/outreach-attempt';
import { logger as defaultLogger, type OutreachLogger } from './logger';

export interface ReviewNotifier {
  notify(attempt: OutreachAttempt, reason: string): Promise<void>;
}

/** The part of the Slack WebClient this notifier calls */
export interface SlackPoster {
  chat: {
    postMessage(args: ChatPostMessageArguments): Promise<ChatPostMessageResponse>;
  };
}

export class SlackReviewNotifier implements ReviewNotifier {
  private readonly logger: OutreachLogger;

  constructor(
    private readonly client: SlackPoster,
    private readonly channel: string,
    logger?: OutreachLogger,
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async notify(attempt: OutreachAttempt, reason: string): Promise<void> {
    try {
      const response = await this.client.chat.postMessage({
        channel: this.channel,
        text: `Outreach needs review: ${attempt.attendee_id} at ${attempt.company_id} (${reason})`,
        blocks: buildReviewBlocks(attempt, reason),
        unfurl_links: false,
      });
      if (!response.ok) {
        throw new Error(response.error ?? 'Unknown Slack error');
      }
      this.logger.reviewNotified({ attempt_id: attempt.id, reason, delivered: true });
    } catch (error) {
      this.logger.reviewNotified({
        attempt_id: attempt.id,
        reason,
        delivered: false,
        error_message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Used when no Slack channel is configured */
export class NoopReviewNotifier implements ReviewNotifier {
  async notify(): Promise<void> {}
}

export function buildReviewBlocks(attempt: OutreachAttempt, reason: string): KnownBlock[] {
  const fields = [
    `*Attendee*\n${attempt.attendee_id}`,
    `*Company*\n${attempt.company_id}`,
    `*Wave*\n${attempt.wave_id}`,
    `*State*\n${attempt.state}`,
  ];

  const blocks: KnownBlock[] = [
    {
      type: 'section',
      text: { type: 'mrkdwn', text: `:mag: *Outreach needs review*: ${reason}` },
    },
    {
      type: 'section',
      fields: fields.map((text) => ({ type: 'mrkdwn' as const, text })),
    },
  ];

  if (attempt.message) {
    blocks.push({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*Draft subject*: ${attempt.message.subject}\n>${attempt.message.body.slice(0, 500).replace(/\n/g, '\n>')}`,
      },
    });
  }

  return blocks;
}
