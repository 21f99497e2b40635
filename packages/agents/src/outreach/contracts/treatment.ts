/**
 * Treatment Contracts
 *
 * The outreach variant assigned to one attendee, as a tagged union on
 * `variant`: contact treatments always carry a product focus, suppressed
 * ones always carry a reason.
 *
 * @module outreach/contracts/treatment
 */

import { z } from 'zod';

// ===========================================
// Enums
// ===========================================

export const TreatmentVariantSchema = z.enum([
  'top-tier-personalized',
  'standard-personalized',
  'exhibitor-sales',
  'suppressed',
]);
export type TreatmentVariant = z.infer<typeof TreatmentVariantSchema>;

/** Variants that produce a first-touch message */
export const ContactVariantSchema = z.enum([
  'top-tier-personalized',
  'standard-personalized',
  'exhibitor-sales',
]);
export type ContactVariant = z.infer<typeof ContactVariantSchema>;

export const SuppressionReasonSchema = z.enum([
  'not_fit',
  'budget_exhausted',
  'company_not_fit',
  'ambiguous_role',
  'unsupported_attendance_type',
]);
export type SuppressionReason = z.infer<typeof SuppressionReasonSchema>;

/** Identifiers of the classifier rules, in evaluation order */
export const RuleIdSchema = z.enum([
  'not_fit',
  'retailer_budget_exhausted',
  'retailer_top_target',
  'retailer_standard',
  'exhibitor_company_not_fit',
  'exhibitor_operations',
  'exhibitor_sales',
  'exhibitor_ambiguous_role',
  'unsupported_attendance_type',
]);
export type RuleId = z.infer<typeof RuleIdSchema>;

export const ProductLineSchema = z.enum(['gate', 'truck']);

// ===========================================
// Treatment
// ===========================================

const TreatmentBaseSchema = z.object({
  /** 1-based rank of the attendee within the company budget */
  priority: z.number().int().min(1),
  rule_id: RuleIdSchema,
});

export const ContactTreatmentSchema = TreatmentBaseSchema.extend({
  variant: ContactVariantSchema,
  product_focus: ProductLineSchema,
  requires_review: z.literal(false),
});
export type ContactTreatment = z.infer<typeof ContactTreatmentSchema>;

export const SuppressedTreatmentSchema = TreatmentBaseSchema.extend({
  variant: z.literal('suppressed'),
  suppression_reason: SuppressionReasonSchema,
  product_focus: ProductLineSchema.optional(),
  /** True when a human should decide instead (ambiguous role) */
  requires_review: z.boolean(),
});
export type SuppressedTreatment = z.infer<typeof SuppressedTreatmentSchema>;

export const TreatmentSchema = z.discriminatedUnion('variant', [
  ContactTreatmentSchema,
  SuppressedTreatmentSchema,
]);
export type Treatment = z.infer<typeof TreatmentSchema>;

export function isSuppressed(treatment: Treatment): treatment is SuppressedTreatment {
  return treatment.variant === 'suppressed';
}

// ===========================================
// Budget
// ===========================================

export const CompanyBudgetSchema = z
  .object({
    company_id: z.string(),
    wave_id: z.string(),
    /** Attendee ids, best first */
    ranking: z.array(z.string()),
    cap: z.number().int().min(0),
    consumed: z.number().int().min(0),
    computed_at: z.string().datetime(),
  })
  .refine((b) => b.consumed <= b.cap, { message: 'consumed must not exceed cap' });
export type CompanyBudget = z.infer<typeof CompanyBudgetSchema>;

/** Where one attendee sits in a company budget */
export interface BudgetPosition {
  /** 1-based; ranking.length + 1 when the attendee is not ranked */
  rank: number;
  cap: number;
  within_cap: boolean;
}
