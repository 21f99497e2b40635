/**
 * Outreach Agent - Webhook HTTP Handler
 *
 * Provides HTTP endpoints for:
 * - POST /api/waves/:wave_id/companies/:company_id/classify - Classify a company's attendees
 * - POST /api/waves/:wave_id/attendees/:attendee_id/compose - Compose one message
 * - POST /api/waves/:wave_id/attendees/:attendee_id/send    - Send one composed message
 * - POST /api/waves/:wave_id/process                        - Run a whole wave
 * - GET  /api/waves/:wave_id/budgets                        - Contact budget usage
 * - GET  /api/follow-ups/due                                - Attempts due a follow-up
 * - POST /api/follow-ups/sweep                              - Send due follow-ups
 * - GET  /api/review                                        - Attempts needing a human
 * - POST /api/signals                                       - Reply / claim feed
 * - GET  /health                                            - Health check (no auth)
 *
 * @module outreach/webhook
 */

import { Hono } from 'hono';
import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { zValidator } from '@hono/zod-validator';
import { ZodError } from 'zod';
import type { OutreachAgent } from './agent';
import {
  AttendeeParamsSchema,
  CompanyParamsSchema,
  DueQuerySchema,
  FollowUpSweepRequestSchema,
  ProcessWaveRequestSchema,
  SignalBatchRequestSchema,
  WaveParamsSchema,
  ok,
  validateWebhookAuth,
} from './contracts/webhook-api';
import { ErrorCodes, isOutreachError, type ErrorCode } from './errors';
import { logger as defaultLogger, type OutreachLogger } from './logger';

// ===========================================
// Configuration
// ===========================================

export interface OutreachWebhookConfig {
  agent: OutreachAgent;

  /** Shared secret expected in X-Webhook-Secret */
  webhookSecret: string;

  logger?: OutreachLogger;

  /** Called after every successful POST, e.g. to persist state */
  onMutation?: () => void | Promise<void>;

  /** Clock used for default `as_of` values */
  now?: () => Date;
}

type AppEnv = { Variables: { requestId: string } };

// ===========================================
// Error Envelope
// ===========================================

export const HttpErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

const STATUS_BY_CODE: Record<ErrorCode, ContentfulStatusCode> = {
  [ErrorCodes.INVALID_INPUT]: 400,
  [ErrorCodes.NOT_FOUND]: 404,
  [ErrorCodes.INVALID_TRANSITION]: 409,
  [ErrorCodes.SUPPRESSED_TREATMENT]: 409,
  [ErrorCodes.BUDGET_EXHAUSTED]: 409,
  [ErrorCodes.UNGROUNDED_CLAIM]: 422,
  [ErrorCodes.GENERATION_FAILED]: 502,
  [ErrorCodes.DELIVERY_FAILED]: 502,
};

export function statusForCode(code: ErrorCode): ContentfulStatusCode {
  return STATUS_BY_CODE[code];
}

function formatZodError(error: ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'root';
    formatted[key] = [...(formatted[key] ?? []), issue.message];
  }
  return formatted;
}

function buildErrorResponse(
  message: string,
  code: string,
  details?: Record<string, unknown>,
  requestId?: string,
): ErrorResponse {
  return {
    success: false,
    error: message,
    code,
    details,
    timestamp: new Date().toISOString(),
    requestId,
  };
}

/**
 * Validation hook: hand failures to the error handler so every 400 uses
 * the same envelope
 */
function throwOnInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}

// ===========================================
// App Factory
// ===========================================

export function createOutreachApp(config: OutreachWebhookConfig): Hono<AppEnv> {
  const { agent, webhookSecret } = config;
  const log = config.logger ?? defaultLogger;
  const now = config.now ?? (() => new Date());
  const app = new Hono<AppEnv>();

  // Request logging
  app.use(
    '*',
    createMiddleware<AppEnv>(async (c, next) => {
      const requestId = c.req.header('x-request-id') ?? crypto.randomUUID();
      const startTime = Date.now();
      c.set('requestId', requestId);

      await next();

      log.requestHandled({
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration_ms: Date.now() - startTime,
        request_id: requestId,
        error: c.error?.message,
      });
    }),
  );

  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      service: 'outreach',
      timestamp: new Date().toISOString(),
    }),
  );

  // Authentication
  app.use(
    '/api/*',
    createMiddleware<AppEnv>(async (c, next) => {
      const auth = validateWebhookAuth(c.req.raw.headers, webhookSecret);
      if (!auth.valid) {
        return c.json(
          buildErrorResponse(auth.error, HttpErrorCodes.AUTHENTICATION_ERROR, undefined, c.get('requestId')),
          401,
        );
      }
      await next();

      if (c.req.method === 'POST' && c.res.status < 400 && config.onMutation) {
        await config.onMutation();
      }
    }),
  );

  // ===========================================
  // Wave Routes
  // ===========================================

  app.post(
    '/api/waves/:wave_id/companies/:company_id/classify',
    zValidator('param', CompanyParamsSchema, throwOnInvalid),
    async (c) => {
      const { wave_id, company_id } = c.req.valid('param');
      const treatments = await agent.classifyBatch(company_id, wave_id);
      return c.json(ok({ wave_id, company_id, treatments }));
    },
  );

  app.post(
    '/api/waves/:wave_id/attendees/:attendee_id/compose',
    zValidator('param', AttendeeParamsSchema, throwOnInvalid),
    async (c) => {
      const { wave_id, attendee_id } = c.req.valid('param');
      const attempt = await agent.composeAndRecord(attendee_id, wave_id);
      return c.json(ok({ attempt }));
    },
  );

  app.post(
    '/api/waves/:wave_id/attendees/:attendee_id/send',
    zValidator('param', AttendeeParamsSchema, throwOnInvalid),
    async (c) => {
      const { wave_id, attendee_id } = c.req.valid('param');
      const result = await agent.sendAttempt(attendee_id, wave_id);
      return c.json(ok(result));
    },
  );

  app.post(
    '/api/waves/:wave_id/process',
    zValidator('param', WaveParamsSchema, throwOnInvalid),
    zValidator('json', ProcessWaveRequestSchema, throwOnInvalid),
    async (c) => {
      const { wave_id } = c.req.valid('param');
      const body = c.req.valid('json');
      const result = await agent.processWave(wave_id, { companyIds: body.company_ids, send: body.send });
      return c.json(ok(result));
    },
  );

  app.get('/api/waves/:wave_id/budgets', zValidator('param', WaveParamsSchema, throwOnInvalid), async (c) => {
    const { wave_id } = c.req.valid('param');
    return c.json(ok({ wave_id, budgets: await agent.budgetUsage(wave_id) }));
  });

  // ===========================================
  // Follow-up Routes
  // ===========================================

  app.get('/api/follow-ups/due', zValidator('query', DueQuerySchema, throwOnInvalid), async (c) => {
    const { as_of } = c.req.valid('query');
    const asOf = as_of ? new Date(as_of) : now();
    const attempts = await agent.dueForFollowUp(asOf);
    return c.json(ok({ as_of: asOf.toISOString(), attempts }));
  });

  app.post('/api/follow-ups/sweep', zValidator('json', FollowUpSweepRequestSchema, throwOnInvalid), async (c) => {
    const { as_of } = c.req.valid('json');
    const asOf = as_of ? new Date(as_of) : now();
    const result = await agent.sendFollowUps(asOf);
    return c.json(ok({ as_of: asOf.toISOString(), ...result }));
  });

  // ===========================================
  // Review & Signals
  // ===========================================

  app.get('/api/review', async (c) => {
    const [review, resend] = await Promise.all([agent.pendingReview(), agent.pendingResend()]);
    return c.json(ok({ review, resend }));
  });

  app.post('/api/signals', zValidator('json', SignalBatchRequestSchema, throwOnInvalid), async (c) => {
    const { events } = c.req.valid('json');
    const results = await agent.applySignals(events);
    return c.json(ok({ results }));
  });

  // ===========================================
  // Error Handling
  // ===========================================

  app.onError((err, c) => {
    const requestId = c.get('requestId');

    if (err instanceof ZodError) {
      return c.json(
        buildErrorResponse('Validation failed', HttpErrorCodes.VALIDATION_ERROR, { fields: formatZodError(err) }, requestId),
        400,
      );
    }

    if (isOutreachError(err)) {
      const details: Record<string, unknown> = {
        ...err.details,
        stage: err.stage,
        attendee_id: err.attendeeId,
        company_id: err.companyId,
        retryable: err.retryable,
      };
      return c.json(buildErrorResponse(err.message, err.code, details, requestId), statusForCode(err.code));
    }

    if (err instanceof HTTPException) {
      const status = err.status === 401 ? 401 : err.status === 404 ? 404 : 400;
      const code =
        status === 401
          ? HttpErrorCodes.AUTHENTICATION_ERROR
          : status === 404
            ? HttpErrorCodes.NOT_FOUND
            : HttpErrorCodes.VALIDATION_ERROR;
      return c.json(buildErrorResponse(err.message || 'HTTP error', code, undefined, requestId), status);
    }

    log.error('Unhandled request error', { path: c.req.path, error: err.message, request_id: requestId });
    return c.json(buildErrorResponse('Internal server error', HttpErrorCodes.INTERNAL_ERROR, undefined, requestId), 500);
  });

  app.notFound((c) =>
    c.json(buildErrorResponse('Not found', HttpErrorCodes.NOT_FOUND, undefined, c.get('requestId')), 404),
  );

  return app;
}
