/**
 * Outreach Email Tool
 *
 * Structured output schema for the generation call. Claude returns the
 * subject, body and the facts it claims to have used; the composer then
 * checks those claims against the supplied payload.
 *
 * @module outreach/contracts/message-tool
 */

import { z } from 'zod';
import { buildTool } from '@expo-outreach/lib';
import { ClaimedFactSchema } from './generated-message';

// ===========================================
// Tool Output Schema
// ===========================================

export const OutreachEmailSchema = z.object({
  subject: z
    .string()
    .min(1)
    .max(120)
    .describe('Email subject line, plain text, no numbers unless they appear in the supplied facts'),

  body: z
    .string()
    .min(1)
    .max(2000)
    .describe('Email body, plain text, signed off without a signature block'),

  claimed_facts: z
    .array(ClaimedFactSchema)
    .max(10)
    .describe('Every supplied fact used in the email, with the field it came from'),
});

export type OutreachEmail = z.infer<typeof OutreachEmailSchema>;

// ===========================================
// Tool Definition
// ===========================================

/**
 * Usage:
 * ```typescript
 * const response = await anthropic.messages.create({
 *   model,
 *   max_tokens: 1024,
 *   tools: [MESSAGE_TOOL.tool],
 *   tool_choice: forceToolChoice(MESSAGE_TOOL.name),
 *   messages: [{ role: 'user', content: prompt }],
 * });
 *
 * const email = MESSAGE_TOOL.parse(extractToolResult(response.content, MESSAGE_TOOL.name));
 * ```
 */
export const MESSAGE_TOOL = buildTool({
  name: 'write_outreach_email',
  description:
    'Write a short, personal outreach email to a conference attendee using only the supplied facts. Returns subject, body and the list of facts used.',
  schema: OutreachEmailSchema,
});
