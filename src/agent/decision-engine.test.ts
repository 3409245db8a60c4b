/**
 * @fileoverview Unit tests for decision parsing and the decision engine
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DecisionEngine,
  buildDecisionPrompt,
  interpretDecision,
  parseDecision,
} from './decision-engine.js';
import type { ModelAdapter } from '../providers/base.js';
import type { ActionRecord, Observation } from '../types/decision.types.js';
import { ModelAdapterError } from '../types/errors.js';
import { createTimestamp } from '../types/core.types.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { Severity } from '../types/core.types.js';

function fakeModel(generate: ModelAdapter['generate']): ModelAdapter {
  return {
    generate,
    getModelInfo: () => ({ provider: 'openai', model: 'test-model', temperature: 0, maxTokens: 10 }),
  };
}

function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    userInput: 'What is 2+2?',
    context: {
      conversationHistory: [],
      availableCapabilities: ['calculator'],
      persona: 'personal',
      sessionInfo: {
        messageCount: 1,
        capacity: 20,
        contextKeys: [],
        sessionDurationMs: 0,
        sessionStartedAt: createTimestamp(0),
      },
      relevantMemories: [],
      extras: {},
    },
    timestamp: createTimestamp(0),
    iteration: 0,
    lastAction: null,
    ...overrides,
  };
}

describe('parseDecision()', () => {
  it('parses all four labelled lines', () => {
    const decision = parseDecision(
      [
        'ACTION_TYPE: use_capability',
        'REASONING: Needs arithmetic',
        'DETAILS: {"tool_name": "calculator", "parameters": {"expression": "2+2"}}',
        'CONFIDENCE: 0.9',
      ].join('\n'),
    );

    expect(decision).toMatchObject({
      actionType: 'use_capability',
      reasoning: 'Needs arithmetic',
      details: { capabilityName: 'calculator', parameters: { expression: '2+2' } },
      confidence: 0.9,
      source: 'parsed',
    });
  });

  it('accepts the legacy use_tool spelling and mixed case', () => {
    const decision = parseDecision('ACTION_TYPE: USE_TOOL\nDETAILS: {"tool_name": "weather"}');

    expect(decision.actionType).toBe('use_capability');
    expect(decision.details).toEqual({ capabilityName: 'weather', parameters: {} });
  });

  it('accepts capability_name in place of tool_name', () => {
    const decision = parseDecision('ACTION_TYPE: use_capability\nDETAILS: {"capability_name": "weather"}');

    expect(decision.details).toEqual({ capabilityName: 'weather', parameters: {} });
  });

  it('trims whitespace around labelled lines', () => {
    const decision = parseDecision('  ACTION_TYPE: respond  \n   DETAILS: {"message": "Four, of course."}');

    expect(decision).toMatchObject({ actionType: 'respond', details: { message: 'Four, of course.' } });
  });

  it('uses the defaults when nothing is labelled', () => {
    const decision = parseDecision('Sure thing!');

    expect(decision).toMatchObject({
      actionType: 'respond',
      details: { message: 'I need more information to help you.' },
      reasoning: 'Default fallback decision',
      confidence: 0.5,
      source: 'fallback',
    });
  });

  it('takes non-JSON details as the message', () => {
    const decision = parseDecision('ACTION_TYPE: respond\nDETAILS: Hello there, friend');

    expect(decision.details).toEqual({ message: 'Hello there, friend' });
  });

  it('takes JSON that is not an object as the message', () => {
    const decision = parseDecision('ACTION_TYPE: respond\nDETAILS: [1, 2]');

    expect(decision.details).toEqual({ message: '[1, 2]' });
  });

  it('clamps confidence and ignores non-numeric values', () => {
    expect(parseDecision('ACTION_TYPE: respond\nCONFIDENCE: 1.7').confidence).toBe(1);
    expect(parseDecision('ACTION_TYPE: respond\nCONFIDENCE: -2').confidence).toBe(0);
    expect(parseDecision('ACTION_TYPE: respond\nCONFIDENCE: high').confidence).toBe(0.5);
    expect(parseDecision('ACTION_TYPE: respond\nCONFIDENCE:').confidence).toBe(0.5);
  });

  it('turns an unknown action type into a respond carrying the raw output', () => {
    const raw = 'ACTION_TYPE: dance\nREASONING: Fun';
    const { decision, issue } = interpretDecision(raw);

    expect(decision).toMatchObject({
      actionType: 'respond',
      details: { message: raw },
      reasoning: 'Fun',
      source: 'fallback',
    });
    expect(issue?.message).toBe("Decision parse failed: unknown action type 'dance'");
  });

  it('falls back when details do not match the variant schema', () => {
    const raw = 'ACTION_TYPE: use_capability\nDETAILS: {"tool_name": 42}';

    expect(parseDecision(raw)).toMatchObject({
      actionType: 'respond',
      details: { message: raw },
      source: 'fallback',
    });
  });

  it('fills store_memory defaults and coerces unknown memory types', () => {
    const decision = parseDecision(
      'ACTION_TYPE: store_memory\nDETAILS: {"content": "Likes tea", "memory_type": "user_info"}',
    );

    expect(decision.details).toEqual({ content: 'Likes tea', memoryType: 'fact', importance: 0.7 });
  });

  it('keeps a valid memory type and clamps importance', () => {
    const decision = parseDecision(
      'ACTION_TYPE: store_memory\nDETAILS: {"content": "Prefers mornings", "memory_type": "preference", "importance": 3}',
    );

    expect(decision.details).toEqual({ content: 'Prefers mornings', memoryType: 'preference', importance: 1 });
  });

  it('leaves a clarification without a message empty', () => {
    expect(parseDecision('ACTION_TYPE: ask_clarification\nDETAILS: {}').details).toEqual({ message: null });
  });
});

describe('buildDecisionPrompt()', () => {
  const now = new Date(2024, 0, 2, 3, 4, 5);

  it('includes the persona, time, capabilities and instructions', () => {
    const prompt = buildDecisionPrompt('technical', ['calculator', 'weather'], null, now);

    expect(prompt).toContain('Current technical session: 2024-01-02 03:04:05');
    expect(prompt).toContain('AVAILABLE CAPABILITIES:\n- calculator\n- weather');
    expect(prompt).toContain('ACTION_TYPE: [action_type]');
    expect(prompt).not.toContain('PREVIOUS ACTION:');
  });

  it('omits the capability section when there are none', () => {
    expect(buildDecisionPrompt('personal', [], null, now)).not.toContain('AVAILABLE CAPABILITIES');
  });

  it('shows the previous action result', () => {
    const lastAction: ActionRecord = {
      actionType: 'use_capability',
      parameters: { tool_name: 'calculator' },
      result: '4',
      data: 4,
      success: true,
      error: null,
      timestamp: createTimestamp(0),
      executionTimeMs: 1,
    };

    expect(buildDecisionPrompt('research', [], lastAction, now)).toContain(
      'PREVIOUS ACTION:\nType: use_capability\nSuccess: true\nResult: 4\n',
    );
  });
});

describe('DecisionEngine', () => {
  it('sends the system prompt and the user input', async () => {
    const generate = vi.fn<ModelAdapter['generate']>().mockResolvedValue(
      'ACTION_TYPE: respond\nDETAILS: {"message": "The answer is 4."}',
    );
    const engine = new DecisionEngine({ model: fakeModel(generate) });

    const decision = await engine.decide(observation());

    expect(decision).toMatchObject({ actionType: 'respond', details: { message: 'The answer is 4.' } });
    const [messages] = generate.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0].role).toBe('system');
    expect(messages[1]).toEqual({ role: 'user', content: 'What is 2+2?' });
  });

  it('returns the scripted decision when the model fails', async () => {
    const transport = new MemoryTransport();
    const logger = new Logger({ minLevel: Severity.DEBUG, transports: [transport] });
    const engine = new DecisionEngine({
      model: fakeModel(() => Promise.reject(new ModelAdapterError('OpenAI: network error: down', true))),
      logger,
    });

    const decision = await engine.decide(observation());

    expect(decision).toMatchObject({
      actionType: 'respond',
      details: { message: "I'm having trouble processing your request. Could you please rephrase it?" },
      reasoning: 'Error in decision making process',
      confidence: 0.3,
      source: 'error',
    });
    expect(transport.findByLevel(Severity.ERROR)).toHaveLength(1);
  });

  it('logs a warning when it has to fall back', async () => {
    const transport = new MemoryTransport();
    const logger = new Logger({ minLevel: Severity.DEBUG, transports: [transport] });
    const engine = new DecisionEngine({ model: fakeModel(() => Promise.resolve('ACTION_TYPE: sing')), logger });

    await engine.decide(observation());

    const warnings = transport.findByLevel(Severity.WARN);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe("Decision parse failed: unknown action type 'sing'");
  });
});
