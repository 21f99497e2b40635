/**
 * Generation Service
 *
 * Turns a template family and a fact payload into a draft email. The Claude
 * implementation uses a forced tool call so the draft always comes back as
 * { subject, body, claimed_facts }.
 *
 * @module outreach/generation
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Message, MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { extractToolResult, forceToolChoice, startMessageGeneration, toError } from '@expo-outreach/lib';
import type { AttendeeId, CompanyId, WaveId } from '@expo-outreach/lib';
import type { FactPayload, TemplateFamily } from './contracts/generated-message';
import { MESSAGE_TOOL, type OutreachEmail } from './contracts/message-tool';
import { GenerationError } from './errors';
import { buildGenerationPrompt } from './templates';

// ===========================================
// Interface
// ===========================================

export type GenerationFamily = Exclude<TemplateFamily, 'follow_up'>;

export interface GenerateOptions {
  timeoutMs: number;
  /** 1 for the first call, 2 for the stricter retry */
  attempt: number;
  /** Problems with the previous draft */
  rejected?: string[];
  attendeeId: AttendeeId;
  companyId: CompanyId;
  waveId?: WaveId;
}

export interface GenerationService {
  generate(family: GenerationFamily, payload: FactPayload, options: GenerateOptions): Promise<OutreachEmail>;
}

// ===========================================
// Claude Implementation
// ===========================================

/** The part of the Anthropic client this service calls */
export interface MessagesClient {
  messages: {
    create(
      params: MessageCreateParamsNonStreaming,
      options?: { timeout?: number; maxRetries?: number },
    ): Promise<Message>;
  };
}

export interface ClaudeGenerationConfig {
  model: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_CLAUDE_GENERATION_CONFIG: ClaudeGenerationConfig = {
  model: 'claude-sonnet-4-20250514',
  maxTokens: 1024,
  temperature: 0.4,
};

const SYSTEM_PROMPT = [
  'You write short, plain-text outreach emails for a field sales team at a logistics technology conference.',
  'You only state facts that were supplied to you. You never invent numbers, customers or results.',
].join(' ');

export class ClaudeGenerationService implements GenerationService {
  private readonly config: ClaudeGenerationConfig;

  constructor(
    private readonly client: MessagesClient,
    config?: Partial<ClaudeGenerationConfig>,
  ) {
    this.config = { ...DEFAULT_CLAUDE_GENERATION_CONFIG, ...config };
  }

  async generate(family: GenerationFamily, payload: FactPayload, options: GenerateOptions): Promise<OutreachEmail> {
    const scope = { attendeeId: options.attendeeId, companyId: options.companyId };
    const prompt = buildGenerationPrompt(family, payload, { rejected: options.rejected });

    const trace = startMessageGeneration({
      attendeeId: options.attendeeId,
      companyId: options.companyId,
      waveId: options.waveId,
      templateFamily: family,
      model: this.config.model,
      attempt: options.attempt,
      prompt,
    });
    const startTime = Date.now();

    try {
      // Retries are the composer's decision, not the SDK's
      const response = await this.client.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: options.attempt > 1 ? 0 : this.config.temperature,
          system: SYSTEM_PROMPT,
          tools: [MESSAGE_TOOL.tool],
          tool_choice: forceToolChoice(MESSAGE_TOOL.name),
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: options.timeoutMs, maxRetries: 0 },
      );

      const toolResult = extractToolResult(response.content, MESSAGE_TOOL.name);
      if (toolResult === null) {
        throw new GenerationError('No tool result returned from Claude', scope);
      }

      const parsed = MESSAGE_TOOL.safeParse(toolResult);
      if (!parsed.success) {
        throw new GenerationError(`Malformed draft from Claude: ${parsed.error}`, scope);
      }

      trace.end({
        output: parsed.data,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        latencyMs: Date.now() - startTime,
      });

      return parsed.data;
    } catch (error) {
      const cause = toError(error);
      trace.fail(cause, Date.now() - startTime);

      if (error instanceof GenerationError) throw error;
      if (error instanceof Anthropic.APIError) {
        throw new GenerationError(`Claude API error (${error.status ?? 'no status'}): ${error.message}`, scope, cause);
      }
      throw new GenerationError(`Generation failed: ${cause.message}`, scope, cause);
    }
  }
}

export function createClaudeGenerationService(
  options: { apiKey?: string; client?: MessagesClient } & Partial<ClaudeGenerationConfig> = {},
): ClaudeGenerationService {
  const { apiKey, client, ...config } = options;
  return new ClaudeGenerationService(
    client ?? new Anthropic({ apiKey: apiKey || process.env.ANTHROPIC_API_KEY }),
    config,
  );
}
