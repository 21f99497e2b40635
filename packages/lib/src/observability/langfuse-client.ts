/**
 * Langfuse Client
 *
 * Lazily-initialised Langfuse client shared by every generation call.
 * Observability is opt-in: without credentials every helper is a no-op.
 */

import { Langfuse } from 'langfuse';
import type { LangfuseConfig } from './types';
import { LANGFUSE_ENV_VARS } from './types';

interface ClientState {
  instance: Langfuse | null;
  /** false once initialisation was attempted and rejected */
  enabled: boolean;
}

const state: ClientState = {
  instance: null,
  enabled: true,
};

function readEnvConfig(env: NodeJS.ProcessEnv): Partial<LangfuseConfig> {
  return {
    publicKey: env[LANGFUSE_ENV_VARS.publicKey],
    secretKey: env[LANGFUSE_ENV_VARS.secretKey],
    baseUrl: env[LANGFUSE_ENV_VARS.baseUrl] || 'https://cloud.langfuse.com',
    enabled: env[LANGFUSE_ENV_VARS.enabled] !== 'false',
  };
}

/**
 * Initialise the shared Langfuse client.
 *
 * Explicit config wins over environment variables. Returns null when
 * credentials are missing or observability is switched off.
 */
export function initLangfuse(config: Partial<LangfuseConfig> = {}): Langfuse | null {
  if (state.instance) {
    return state.instance;
  }

  const merged = { ...readEnvConfig(process.env), ...config };

  if (!merged.publicKey || !merged.secretKey || merged.enabled === false) {
    state.enabled = false;
    return null;
  }

  state.instance = new Langfuse({
    publicKey: merged.publicKey,
    secretKey: merged.secretKey,
    baseUrl: merged.baseUrl,
    flushAt: merged.flushAt ?? 15,
    flushInterval: merged.flushInterval ?? 10_000,
    requestTimeout: merged.requestTimeout ?? 10_000,
  });
  state.enabled = true;

  return state.instance;
}

/**
 * Get the shared client, initialising it from the environment on first use
 */
export function getLangfuse(): Langfuse | null {
  if (!state.enabled) return null;
  return state.instance ?? initLangfuse();
}

export function isLangfuseEnabled(): boolean {
  return state.enabled && state.instance !== null;
}

/**
 * Flush pending events and close the client. Call before process exit.
 */
export async function shutdownLangfuse(): Promise<void> {
  if (state.instance) {
    await state.instance.shutdownAsync();
    state.instance = null;
  }
}

/**
 * Forget the client and re-enable lazy initialisation (tests)
 */
export function resetLangfuse(): void {
  state.instance = null;
  state.enabled = true;
}
