/**
 * Generated Message Contracts
 *
 * @module outreach/contracts/generated-message
 */

import { z } from 'zod';

// ===========================================
// Fact Payload
// ===========================================

/** Message framing handed to the model with the facts */
export const FramingSchema = z.enum(['meet_privately', 'booth_visit', 'light_touch']);
export type Framing = z.infer<typeof FramingSchema>;

/**
 * The only facts a generation call may see. Anything else in the research
 * record stays out of the prompt.
 */
export const FactPayloadSchema = z.object({
  first_name: z.string(),
  company_name: z.string(),
  overview: z.string().optional(),
  /** Present only for gate focus with a sourced, positive count */
  dc_count: z.number().int().positive().optional(),
  /** Present only for truck focus with a sourced, positive count */
  truck_count: z.number().int().positive().optional(),
  count_source: z.string().optional(),
  hook: z.string().optional(),
  bullets: z.array(z.string()).max(3),
  framing: FramingSchema,
  include_disclosure: z.boolean(),
});
export type FactPayload = z.infer<typeof FactPayloadSchema>;

/** Payload fields a claimed fact may cite */
export const FactFieldSchema = z.enum([
  'first_name',
  'company_name',
  'overview',
  'dc_count',
  'truck_count',
  'count_source',
  'hook',
  'bullets',
]);
export type FactField = z.infer<typeof FactFieldSchema>;

export const ClaimedFactSchema = z.object({
  field: z.string().describe('Name of the supplied fact field the claim comes from'),
  value: z.string().describe('The fact as used in the email'),
});
export type ClaimedFact = z.infer<typeof ClaimedFactSchema>;

// ===========================================
// Template Families
// ===========================================

export const TemplateFamilySchema = z.enum(['top_tier', 'standard', 'exhibitor_sales', 'follow_up']);
export type TemplateFamily = z.infer<typeof TemplateFamilySchema>;

// ===========================================
// Generated Message
// ===========================================

export const GroundingIssueSchema = z.object({
  kind: z.enum([
    'ungrounded_number',
    'unknown_field',
    'unsupported_value',
    'meeting_offer',
    'disclosure_missing',
    'disclosure_unexpected',
  ]),
  detail: z.string(),
});
export type GroundingIssue = z.infer<typeof GroundingIssueSchema>;

export const ValidationResultSchema = z.object({
  passed: z.boolean(),
  issues: z.array(GroundingIssueSchema),
  /** Generation calls made for this message (0 for fixed templates) */
  attempts: z.number().int().min(0),
});
export type ValidationResult = z.infer<typeof ValidationResultSchema>;

export const GeneratedMessageSchema = z.object({
  subject: z.string(),
  body: z.string(),
  claimed_facts: z.array(ClaimedFactSchema),
  template_family: TemplateFamilySchema,
  disclosure_included: z.boolean(),
  validation: ValidationResultSchema,
});
export type GeneratedMessage = z.infer<typeof GeneratedMessageSchema>;
