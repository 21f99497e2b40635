/**
 * Outreach Contracts
 *
 * Re-exports all contract types and schemas.
 *
 * @module outreach/contracts
 */

export * from './research-records';
export * from './treatment';
export * from './generated-message';
export * from './outreach-attempt';
export * from './webhook-api';

// Structured output tool contracts
export { OutreachEmailSchema, type OutreachEmail, MESSAGE_TOOL } from './message-tool';
