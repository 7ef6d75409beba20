/**
 * Intent Scorer
 *
 * Asks a language model to rate a lead's purchase intent against a fixed
 * rubric. Never rejects: after the attempt budget is spent the lead gets
 * the fallback score, which the workflow reports as needing manual review.
 *
 * @module lead-intake/intent-scorer
 */

import type Anthropic from '@anthropic-ai/sdk';
import {
  buildTool,
  createStructuredRequest,
  extractTextContent,
  extractToolResult,
} from '@lead-intake/lib/structured-outputs';
import type { Lead } from './contracts/lead-input';
import {
  FALLBACK_INTENT_SCORE,
  ScoringResponseSchema,
  toProcessedLead,
  type ProcessedLead,
  type ScoringResponse,
} from './contracts/processed-lead';
import { MalformedResponseError } from './error-handler';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from './retry';

// ===========================================
// Prompt
// ===========================================

export const SCORING_SYSTEM_PROMPT =
  'You are a lead qualification assistant. Return only valid JSON.';

/**
 * Build the scoring prompt for a lead
 */
export function buildScoringPrompt(lead: Lead): string {
  return `Analyze this car dealership lead and return a strict JSON object with intent scoring.

Lead Information:
- Name: ${lead.name}
- Email: ${lead.email}
- Phone: ${lead.phone}
- Car Model: ${lead.car_model}
- Appointment: ${lead.appointment_datetime}

Calculate an intent_score (0.0 to 1.0) based on:
- Email domain quality (corporate vs free email) - corporate emails get +0.2
- Car model (luxury vs economy) - luxury models get +0.3
- Appointment timing (urgency) - appointments within 3 days get +0.2
- Base score is 0.5

Return ONLY valid JSON with these keys: name, phone, model, datetime, intent_score.
Copy name, phone, model (the car model) and datetime (the appointment) from the lead.`;
}

// ===========================================
// Scoring Service
// ===========================================

/**
 * Text-generation service that answers a scoring prompt.
 * Resolves with the decoded answer; rejects on transport faults or an
 * answer that is not JSON.
 */
export interface ScoringService {
  complete(prompt: string): Promise<unknown>;
}

/** Content block shape read from a Messages API response */
export interface ScoringContentBlock {
  type: string;
  name?: string;
  input?: unknown;
  text?: string;
}

/** The part of the Anthropic client the scoring service calls */
export interface ScoringMessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming
    ): PromiseLike<{ content: ScoringContentBlock[] }>;
  };
}

export interface AnthropicScoringConfig {
  model: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_ANTHROPIC_SCORING_CONFIG: AnthropicScoringConfig = {
  model: 'claude-3-5-haiku-20241022',
  maxTokens: 512,
  temperature: 0.3,
};

const scoreTool = buildTool({
  name: 'record_intent_score',
  description: 'Record the qualified lead and its purchase intent score',
  schema: ScoringResponseSchema,
});

/**
 * Scoring service backed by the Anthropic Messages API.
 * Forces the structured output tool; a plain JSON text answer is accepted too.
 */
export class AnthropicScoringService implements ScoringService {
  private readonly config: AnthropicScoringConfig;

  constructor(
    private readonly client: ScoringMessagesClient,
    config: Partial<AnthropicScoringConfig> = {}
  ) {
    this.config = { ...DEFAULT_ANTHROPIC_SCORING_CONFIG, ...config };
  }

  async complete(prompt: string): Promise<unknown> {
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: SCORING_SYSTEM_PROMPT,
      ...createStructuredRequest(scoreTool, [{ role: 'user', content: prompt }]),
    });

    const toolResult = extractToolResult(response.content, scoreTool.name);
    if (toolResult !== null) {
      return toolResult;
    }

    const text = extractTextContent(response.content);
    if (!text) {
      throw new MalformedResponseError('Scoring response contained no tool call or text');
    }
    return JSON.parse(text);
  }
}

// ===========================================
// Intent Scorer
// ===========================================

export interface IntentScorerOptions {
  logger?: LeadIntakeLogger;
  retry?: Partial<RetryConfig>;
}

export class IntentScorer {
  private readonly logger: LeadIntakeLogger;
  private readonly retryConfig: RetryConfig;

  constructor(
    private readonly service: ScoringService,
    options: IntentScorerOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
  }

  /**
   * Score a lead. Resolves with a ProcessedLead whose intent_score is in
   * [0, 1]; never rejects.
   */
  async score(lead: Lead): Promise<ProcessedLead> {
    const prompt = buildScoringPrompt(lead);

    const outcome = await withRetry(
      async () => this.parseResponse(await this.service.complete(prompt)),
      this.retryConfig,
      ({ attempt, maxAttempts, error }) => {
        this.logger.scoringAttemptFailed({
          lead_id: lead.lead_id,
          attempt,
          max_attempts: maxAttempts,
          error_code: error.code,
          error_message: error.message,
        });
      }
    );

    if (outcome.success) {
      const processed = toProcessedLead(outcome.result);
      this.logger.leadScored({
        lead_id: lead.lead_id,
        intent_score: processed.intent_score,
        attempts: outcome.attempts,
      });
      return processed;
    }

    this.logger.scoringFallback({ lead_id: lead.lead_id, attempts: outcome.attempts });
    return createFallbackProcessedLead(lead);
  }

  private parseResponse(raw: unknown): ScoringResponse {
    const parsed = scoreTool.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(
        'Scoring response did not match the expected shape',
        parsed.error.issues
      );
    }
    if (!Number.isFinite(parsed.data.intent_score)) {
      throw new MalformedResponseError('Scoring response intent_score is not a number');
    }
    return parsed.data;
  }
}

/**
 * ProcessedLead used when scoring is unavailable: the lead's own fields
 * with the fallback score.
 */
export function createFallbackProcessedLead(lead: Lead): ProcessedLead {
  return Object.freeze({
    name: lead.name,
    phone: lead.phone,
    model: lead.car_model,
    datetime: lead.appointment_datetime,
    intent_score: FALLBACK_INTENT_SCORE,
  });
}
