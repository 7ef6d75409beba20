/**
 * Intent Scorer Tests
 *
 * @module __tests__/lead-intake/intent-scorer.test
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AnthropicScoringService,
  IntentScorer,
  SCORING_SYSTEM_PROMPT,
  buildScoringPrompt,
  type ScoringContentBlock,
} from '../../lead-intake/intent-scorer';
import { MalformedResponseError } from '../../lead-intake/error-handler';
import { createLead } from '../../lead-intake/lead';
import {
  FakeScoringService,
  NOW,
  createCapturingLogger,
  createSilentLogger,
  createSubmission,
  daysFromNow,
  scoringAnswer,
} from './fixtures';

const NO_DELAY = { baseDelayMs: 0, jitterFactor: 0 };

function createScorer(service: FakeScoringService, logger = createSilentLogger()) {
  return new IntentScorer(service, { logger, retry: NO_DELAY });
}

const lead = createLead(createSubmission(), NOW);

// ===========================================
// Prompt
// ===========================================

describe('buildScoringPrompt', () => {
  it('should embed the lead fields', () => {
    const prompt = buildScoringPrompt(lead);

    expect(prompt).toContain('- Name: Jane Doe');
    expect(prompt).toContain('- Email: jane@corp.com');
    expect(prompt).toContain('- Phone: +1-212-555-0100');
    expect(prompt).toContain('- Car Model: Luxury Sedan X');
    expect(prompt).toContain(`- Appointment: ${daysFromNow(2)}`);
  });

  it('should state the rubric and the answer keys', () => {
    const prompt = buildScoringPrompt(lead);

    expect(prompt).toContain('- Base score is 0.5');
    expect(prompt).toContain('corporate emails get +0.2');
    expect(prompt).toContain('luxury models get +0.3');
    expect(prompt).toContain('appointments within 3 days get +0.2');
    expect(prompt).toContain('keys: name, phone, model, datetime, intent_score');
  });
});

// ===========================================
// Scoring
// ===========================================

describe('IntentScorer.score', () => {
  it('should clamp a score above 1 and use the returned fields', async () => {
    const service = new FakeScoringService(scoringAnswer({ name: 'Jane D.', intent_score: 1.2 }));

    const processed = await createScorer(service).score(lead);

    expect(processed).toEqual({
      name: 'Jane D.',
      phone: '+1-212-555-0100',
      model: 'Luxury Sedan X',
      datetime: daysFromNow(2),
      intent_score: 1,
    });
    expect(service.prompts).toHaveLength(1);
  });

  it('should clamp a negative score to 0', async () => {
    const service = new FakeScoringService(scoringAnswer({ intent_score: -0.4 }));
    const processed = await createScorer(service).score(lead);
    expect(processed.intent_score).toBe(0);
  });

  it('should accept a numeric string score', async () => {
    const service = new FakeScoringService(scoringAnswer({ intent_score: '0.85' }));
    const processed = await createScorer(service).score(lead);
    expect(processed.intent_score).toBe(0.85);
  });

  it.each([
    { label: 'null', score: null },
    { label: 'an empty string', score: '' },
    { label: 'a blank string', score: '   ' },
    { label: 'false', score: false },
    { label: 'an empty list', score: [] },
  ])('should treat $label as a malformed score and fall back', async ({ score }) => {
    const service = new FakeScoringService(scoringAnswer({ intent_score: score }));
    const capture = createCapturingLogger();

    const processed = await createScorer(service, capture.logger).score(lead);

    expect(processed.intent_score).toBe(0.5);
    expect(service.prompts).toHaveLength(3);
    const failures = capture.events().filter((event) => event.event === 'scoring_attempt_failed');
    expect(failures.map((event) => event.error_code)).toEqual([
      'MALFORMED_RESPONSE',
      'MALFORMED_RESPONSE',
      'MALFORMED_RESPONSE',
    ]);
  });

  it('should retry after a transport fault', async () => {
    const service = new FakeScoringService(new Error('network error'), scoringAnswer());
    const capture = createCapturingLogger();

    const processed = await createScorer(service, capture.logger).score(lead);

    expect(processed.intent_score).toBe(1);
    expect(service.prompts).toHaveLength(2);
    const scored = capture.events().find((event) => event.event === 'lead_scored');
    expect(scored).toMatchObject({ attempts: 2, intent_score: 1 });
  });

  it('should fall back to 0.5 with the lead fields after 3 malformed answers', async () => {
    const service = new FakeScoringService(
      new SyntaxError('Unexpected token h in JSON at position 0'),
      'here is your score',
      { score: 0.9 }
    );
    const capture = createCapturingLogger();

    const processed = await createScorer(service, capture.logger).score(lead);

    expect(processed).toEqual({
      name: 'Jane Doe',
      phone: '+1-212-555-0100',
      model: 'Luxury Sedan X',
      datetime: daysFromNow(2),
      intent_score: 0.5,
    });
    expect(service.prompts).toHaveLength(3);

    const events = capture.events();
    const failures = events.filter((event) => event.event === 'scoring_attempt_failed');
    expect(failures.map((event) => event.error_code)).toEqual([
      'MALFORMED_RESPONSE',
      'MALFORMED_RESPONSE',
      'MALFORMED_RESPONSE',
    ]);
    expect(events.find((event) => event.event === 'scoring_fallback')).toMatchObject({
      lead_id: lead.lead_id,
      attempts: 3,
    });
  });

  it('should honour a smaller attempt budget', async () => {
    const service = new FakeScoringService(new Error('timeout'));
    const scorer = new IntentScorer(service, {
      logger: createSilentLogger(),
      retry: { ...NO_DELAY, maxAttempts: 1 },
    });

    const processed = await scorer.score(lead);

    expect(processed.intent_score).toBe(0.5);
    expect(service.prompts).toHaveLength(1);
  });
});

// ===========================================
// Anthropic Scoring Service
// ===========================================

function createClient(content: ScoringContentBlock[]) {
  const create = vi.fn(async () => ({ content }));
  return { client: { messages: { create } }, create };
}

describe('AnthropicScoringService', () => {
  it('should force the scoring tool and return its input', async () => {
    const answer = scoringAnswer();
    const { client, create } = createClient([
      { type: 'tool_use', name: 'record_intent_score', input: answer },
    ]);

    const result = await new AnthropicScoringService(client).complete('score this');

    expect(result).toEqual(answer);
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'claude-3-5-haiku-20241022',
        temperature: 0.3,
        system: SCORING_SYSTEM_PROMPT,
        tool_choice: { type: 'tool', name: 'record_intent_score' },
        messages: [{ role: 'user', content: 'score this' }],
      })
    );
  });

  it('should parse a JSON text answer', async () => {
    const { client } = createClient([{ type: 'text', text: '{"intent_score": 0.7}' }]);

    const result = await new AnthropicScoringService(client).complete('score this');

    expect(result).toEqual({ intent_score: 0.7 });
  });

  it('should reject a text answer that is not JSON', async () => {
    const { client } = createClient([{ type: 'text', text: 'high intent' }]);

    await expect(new AnthropicScoringService(client).complete('score this')).rejects.toThrow(
      SyntaxError
    );
  });

  it('should reject an empty answer', async () => {
    const { client } = createClient([]);

    await expect(new AnthropicScoringService(client).complete('score this')).rejects.toThrow(
      MalformedResponseError
    );
  });

  it('should use the configured model', async () => {
    const { client, create } = createClient([
      { type: 'tool_use', name: 'record_intent_score', input: scoringAnswer() },
    ]);

    await new AnthropicScoringService(client, { model: 'claude-3-5-sonnet-20241022' }).complete('x');

    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'claude-3-5-sonnet-20241022' })
    );
  });
});
