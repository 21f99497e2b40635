/**
 * Delivery
 *
 * Hands fully composed messages to the mail transport. Every send carries
 * the fixed tracking BCC; each call has a timeout and is retried once.
 *
 * @module outreach/delivery
 */

import { z } from 'zod';
import { toError, withTimeout, type PipelineStage } from '@expo-outreach/lib';
import { DeliveryError, InvalidInputError, type ErrorScope } from './errors';

// ===========================================
// Interface
// ===========================================

export interface OutboundMessage {
  to: string;
  subject: string;
  body: string;
  bcc: string;
}

export interface DeliveryReceipt {
  delivery_id: string;
}

export interface DeliveryService {
  send(message: OutboundMessage, options: { timeoutMs: number }): Promise<DeliveryReceipt>;
}

// ===========================================
// HTTP Implementation
// ===========================================

const DeliveryResponseSchema = z.union([
  z.object({ delivery_id: z.string().min(1) }),
  z.object({ id: z.string().min(1) }).transform((r) => ({ delivery_id: r.id })),
]);

/**
 * Posts each message to a delivery webhook, e.g. a workflow that creates
 * and sends the mail.
 */
export class HttpDeliveryService implements DeliveryService {
  constructor(
    private readonly webhookUrl: string,
    private readonly secret?: string,
  ) {}

  async send(message: OutboundMessage, options: { timeoutMs: number }): Promise<DeliveryReceipt> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.secret) {
      headers['X-Webhook-Secret'] = this.secret;
    }

    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Delivery webhook returned ${response.status}: ${text.slice(0, 200)}`);
    }

    const parsed = DeliveryResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Delivery webhook response has no delivery id');
    }
    return parsed.data;
  }
}

// ===========================================
// Retry
// ===========================================

export interface DeliveryRetryConfig {
  timeoutMs: number;
  /** Total calls, including the retry */
  maxAttempts: number;
  retryDelayMs: number;
}

export const DEFAULT_DELIVERY_RETRY_CONFIG: DeliveryRetryConfig = {
  timeoutMs: 10_000,
  maxAttempts: 2,
  retryDelayMs: 500,
};

export type DeliveryResult =
  | { success: true; receipt: DeliveryReceipt; attempts: number }
  | { success: false; error: DeliveryError; attempts: number };

/**
 * The trimmed tracking BCC.
 *
 * @throws InvalidInputError when it is blank
 */
export function requireTrackingBcc(trackingBcc: string, stage: PipelineStage, scope?: ErrorScope): string {
  const bcc = trackingBcc.trim();
  if (!bcc) {
    throw new InvalidInputError('A tracking BCC address is required on every send', stage, scope);
  }
  return bcc;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Send with the tracking BCC set, retrying once on failure.
 *
 * @throws InvalidInputError when no tracking BCC is configured
 */
export async function deliverWithRetry(
  service: DeliveryService,
  message: Omit<OutboundMessage, 'bcc'>,
  context: { trackingBcc: string; stage: PipelineStage; scope: ErrorScope },
  config: Partial<DeliveryRetryConfig> = {},
): Promise<DeliveryResult> {
  const { timeoutMs, maxAttempts, retryDelayMs } = { ...DEFAULT_DELIVERY_RETRY_CONFIG, ...config };

  const bcc = requireTrackingBcc(context.trackingBcc, context.stage, context.scope);
  const outbound: OutboundMessage = { ...message, bcc };
  let lastError: Error = new Error('No delivery attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const receipt = await withTimeout(service.send(outbound, { timeoutMs }), timeoutMs, 'delivery');
      return { success: true, receipt, attempts: attempt };
    } catch (error) {
      lastError = toError(error);
      if (attempt < maxAttempts && retryDelayMs > 0) {
        await sleep(retryDelayMs);
      }
    }
  }

  return {
    success: false,
    error: new DeliveryError(
      `Delivery failed after ${maxAttempts} attempts: ${lastError.message}`,
      context.stage,
      context.scope,
      lastError,
    ),
    attempts: maxAttempts,
  };
}
