/**
 * Research Record Contracts
 *
 * Company and attendee records as exported by the research pipeline.
 * Both are read-only inside the outreach engine.
 *
 * @module outreach/contracts/research-records
 */

import { z } from 'zod';
import { combinedScore } from '../fit';

// ===========================================
// Shared Fields
// ===========================================

export const FitScoreSchema = z.number().int().min(0).max(100);

const CountSchema = z.number().int().min(0).default(0);

// ===========================================
// Company Record
// ===========================================

export const CompanyRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    website: z.string().optional(),
    industry: z.string().optional(),

    employee_count: CountSchema,
    location_count: CountSchema,

    overview: z.string().optional(),
    /** Distribution centers; 0 when research found no number */
    dc_count: CountSchema,
    dc_source: z.string().optional(),
    truck_count: CountSchema,
    truck_source: z.string().optional(),
    bullets: z.array(z.string()).default([]),
    hook: z.string().optional(),

    gate_fit_score: FitScoreSchema,
    truck_fit_score: FitScoreSchema,
    /** Derived from the two fit scores when the export omits it */
    combined_score: z.number().int().min(0).optional(),

    researched_at: z.string().datetime().optional(),
  })
  .transform((company) => ({
    ...company,
    combined_score:
      company.combined_score ?? combinedScore(company.gate_fit_score, company.truck_fit_score),
  }));

export type CompanyRecord = z.infer<typeof CompanyRecordSchema>;

// ===========================================
// Attendee Record
// ===========================================

export const RoleClassificationSchema = z.enum(['operations', 'sales', 'other']);
export type RoleClassification = z.infer<typeof RoleClassificationSchema>;

export const AttendeeRecordSchema = z
  .object({
    id: z.string().min(1),
    company_id: z.string().min(1),
    first_name: z.string().min(1),
    last_name: z.string().optional(),
    email: z.string().email(),
    title: z.string().optional(),
    job_function: z.string().optional(),
    management_level: z.string().optional(),
    /** Set when research already classified the role */
    role: RoleClassificationSchema.optional(),
    linkedin_url: z.string().optional(),
    /** Free-text attendance tag, e.g. "Retailer/CPG" or "Exhibitor/Sponsor" */
    ticket_type: z.string(),

    // Snapshot of the company's scores at research time
    gate_fit_score: FitScoreSchema,
    truck_fit_score: FitScoreSchema,
    combined_score: z.number().int().min(0).optional(),
  })
  .transform((attendee) => ({
    ...attendee,
    combined_score:
      attendee.combined_score ?? combinedScore(attendee.gate_fit_score, attendee.truck_fit_score),
  }));

export type AttendeeRecord = z.infer<typeof AttendeeRecordSchema>;

// ===========================================
// Research Export
// ===========================================

export const ResearchExportSchema = z.object({
  companies: z.array(CompanyRecordSchema),
  attendees: z.array(AttendeeRecordSchema),
});

export type ResearchExport = z.infer<typeof ResearchExportSchema>;

export function parseResearchExport(data: unknown): ResearchExport {
  return ResearchExportSchema.parse(data);
}
