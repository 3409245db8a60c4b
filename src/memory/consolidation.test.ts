/**
 * @fileoverview Unit tests for consolidation heuristics
 */

import { describe, it, expect } from 'vitest';
import {
  chunkMessages,
  evaluateChunk,
  extractTags,
  planConsolidation,
  scoreChunk,
  serializeChunk,
} from './consolidation.js';
import { ConsolidationWeightsSchema } from '../config/settings.js';
import { createTimestamp } from '../types/core.types.js';
import type { Message, MessageRole } from '../types/memory.types.js';

function msg(role: MessageRole, content: string): Message {
  return { role, content, timestamp: createTimestamp(0), metadata: {} };
}

const roles = (chunks: Message[][]) => chunks.map(chunk => chunk.map(m => m.role[0]).join(''));

describe('chunkMessages', () => {
  it('closes a chunk at each assistant reply', () => {
    const chunks = chunkMessages([
      msg('user', 'a'),
      msg('assistant', 'b'),
      msg('user', 'c'),
      msg('assistant', 'd'),
    ]);

    expect(roles(chunks)).toEqual(['ua', 'ua']);
  });

  it('caps chunks at five messages', () => {
    const chunks = chunkMessages(Array.from({ length: 6 }, (_, i) => msg('user', `m${i}`)));

    expect(chunks.map(c => c.length)).toEqual([5, 1]);
  });

  it('does not close on an assistant message that opens a chunk', () => {
    const chunks = chunkMessages([
      msg('user', 'a'),
      msg('assistant', 'b'),
      msg('assistant', 'c'),
      msg('user', 'd'),
      msg('assistant', 'e'),
    ]);

    expect(roles(chunks)).toEqual(['ua', 'aua']);
  });

  it('keeps a trailing partial chunk', () => {
    expect(roles(chunkMessages([msg('user', 'a'), msg('assistant', 'b'), msg('user', 'c')]))).toEqual([
      'ua',
      'u',
    ]);
  });

  it('returns no chunks for no messages', () => {
    expect(chunkMessages([])).toEqual([]);
  });
});

describe('scoreChunk', () => {
  it('gives a plain exchange the base score', () => {
    expect(scoreChunk([msg('user', 'ok'), msg('assistant', 'sure')])).toBeCloseTo(0.5, 10);
  });

  it('adds the personal bonus for a self-disclosure', () => {
    expect(scoreChunk([msg('user', 'My name is Ana'), msg('assistant', 'nice to meet you')])).toBeCloseTo(
      0.7,
      10,
    );
  });

  it('adds the question bonus once', () => {
    expect(scoreChunk([msg('user', 'why? why? why?'), msg('user', 'where is it')])).toBeCloseTo(0.6, 10);
  });

  it('adds length and detail bonuses and caps at 1', () => {
    const long = 'x'.repeat(120);
    const chunk = [
      msg('user', `can you remember this ${long}`),
      msg('assistant', long),
      msg('user', long),
      msg('assistant', long),
    ];

    expect(scoreChunk(chunk)).toBeCloseTo(1, 10);
  });

  it('scores an empty chunk as zero', () => {
    expect(scoreChunk([])).toBe(0);
  });
});

describe('extractTags', () => {
  it('returns matching buckets in bucket order', () => {
    expect(extractTags([msg('user', 'I like green tea.'), msg('user', 'Can you explain why?')])).toEqual([
      'preference',
      'question',
      'information',
    ]);
  });

  it('returns no tags when nothing matches', () => {
    expect(extractTags([msg('user', 'ok'), msg('assistant', 'sure')])).toEqual([]);
  });
});

describe('serializeChunk', () => {
  it('renders role-prefixed lines', () => {
    expect(serializeChunk([msg('user', 'hi'), msg('assistant', 'hello')])).toBe('user: hi\nassistant: hello');
  });
});

describe('planConsolidation', () => {
  const conversation = [
    msg('user', 'My name is Ana'),
    msg('assistant', 'nice to meet you'),
    msg('user', 'ok'),
    msg('assistant', 'sure'),
  ];

  it('keeps only chunks scoring above the threshold', () => {
    const plan = planConsolidation(conversation);

    expect(plan).toHaveLength(1);
    expect(plan[0].content).toBe('user: My name is Ana\nassistant: nice to meet you');
    expect(plan[0].importance).toBeCloseTo(0.7, 10);
    expect(plan[0].tags).toEqual(['personal']);
    expect(plan[0].messageCount).toBe(2);
  });

  it('honours configured weights', () => {
    const weights = ConsolidationWeightsSchema.parse({ persistThreshold: 0.4 });

    expect(planConsolidation(conversation, weights)).toHaveLength(2);
  });

  it('treats the threshold as exclusive', () => {
    expect(evaluateChunk([msg('user', 'ok'), msg('assistant', 'sure')])).toBeNull();
  });
});
