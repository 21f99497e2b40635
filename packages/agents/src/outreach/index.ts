/**
 * Outreach Agent
 *
 * Decides who to contact at a conference, with which message, and keeps
 * track of every attempt from first touch to follow-up.
 *
 * @module outreach
 */

// Contracts
export * from './contracts';

// Agent
export { OutreachAgent, createOutreachAgent } from './agent';
export type { OutreachAgentConfig, OutreachAgentDependencies, ProcessWaveOptions, SendResult } from './agent';

// Decision logic
export { computeBudget, budgetPosition, capFor, compareAttendeeRank, DEFAULT_MAX_CONTACTS_PER_COMPANY } from './budget';
export { classify, parseAttendanceType, CLASSIFIER_RULES, type AttendanceType } from './classifier';
export { classifyRole, roleOf } from './roles';
export { combinedScore, fitCategory, strongerLine, productFocus, DEFAULT_FIT_THRESHOLD } from './fit';

// Composition
export { ContentComposer, createComposer, composeFollowUp } from './composer';
export type { ComposeOptions, ComposeResult, ComposerConfig } from './composer';
export { buildFactPayload } from './fact-payload';
export { validateGrounding, extractNumericTokens } from './grounding';
export {
  ClaudeGenerationService,
  createClaudeGenerationService,
  type GenerationService,
  type MessagesClient,
} from './generation';

// Lifecycle
export { ALLOWED_TRANSITIONS, canTransition, isTerminal, transitionAttempt, applySignal } from './lifecycle';
export { applySignalEvents } from './signals';
export { dueForFollowUp, markDueFollowUps, sendFollowUps } from './follow-up';

// Collaborators
export { InMemoryResearchStore, loadResearchStore, type ResearchStore } from './research-store';
export {
  InMemoryOutreachRepository,
  consumeBudget,
  updateAttempt,
  type OutreachRepository,
  type RepositorySnapshot,
} from './repository';
export { HttpDeliveryService, deliverWithRetry, type DeliveryService, type OutboundMessage } from './delivery';
export { SlackReviewNotifier, NoopReviewNotifier, type ReviewNotifier } from './review-notifier';

// Infrastructure
export { createOutreachApp, type OutreachWebhookConfig } from './webhook';
export { loadEnvConfig, type EnvConfig } from './config';
export { loadState, saveState, clearState, hasState, type StateConfig } from './state';
export { OutreachLogger, logger, createLogger, type LoggerConfig } from './logger';
export * from './errors';
export * from './types';
