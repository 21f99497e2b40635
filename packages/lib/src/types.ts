/**
 * Shared Types for Expo Outreach
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// Identifier Types
// ===========================================

/** Research-store identifier of a company */
export type CompanyId = string;

/** Research-store identifier of a conference attendee */
export type AttendeeId = string;

/** One discrete run of the outreach engine over a prospect set */
export type WaveId = string;

/** Identifier of a single (attendee, wave) outreach attempt */
export type AttemptId = string;

// ===========================================
// Fit Types
// ===========================================

/** Product lines a company can be a fit for */
export type ProductLine = 'gate' | 'truck';

/**
 * Fit category derived from the two product-line scores.
 * 'other' means neither line passes the fit threshold.
 */
export type FitCategory = 'gate' | 'truck' | 'both' | 'other';

// ===========================================
// Pipeline Stage Types
// ===========================================

/** Pipeline stage at which a failure occurred */
export type PipelineStage = 'classify' | 'compose' | 'send' | 'follow-up' | 'signal';
