/**
 * Expo Outreach Library
 *
 * Shared utilities for the outreach engine.
 */

// Types
export * from './types';

// Observability (Langfuse integration)
export * from './observability';

// Structured Outputs (Zod to JSON Schema for Claude tools)
export * from './structured-outputs';

// Concurrency (bounded fan-out, timeouts)
export { mapWithConcurrency, withTimeout, toError, TimeoutError, type Settled } from './concurrency';
