/**
 * @fileoverview Heuristics that decide which short-term messages are worth
 * keeping in long-term memory.
 *
 * Everything here is pure: messages are grouped into exchange-sized chunks,
 * each chunk is scored from cheap lexical cues, and chunks that clear the
 * persistence threshold become drafts for the long-term store.
 *
 * @module mnemos/memory/consolidation
 */

import type { Message } from '../types/memory.types.js';
import { ConsolidationWeightsSchema } from '../config/settings.js';
import type { ConsolidationWeights } from '../config/settings.js';

export const DEFAULT_WEIGHTS: Readonly<ConsolidationWeights> = ConsolidationWeightsSchema.parse({});

/** Cues that a chunk contains a question or a request for help */
export const QUESTION_CUES = ['how', 'what', 'when', 'where', 'why', 'can you', 'help me'] as const;

/** Cues that the user disclosed something about themselves */
export const PERSONAL_CUES = ['my name', 'i am', 'i like', 'i prefer', 'remember'] as const;

export const TAG_BUCKETS: ReadonlyArray<readonly [tag: string, cues: ReadonlyArray<string>]> = [
  ['personal', ['my name', 'i am', 'about me', 'personal']],
  ['preference', ['i like', 'i prefer', 'favorite', "don't like"]],
  ['question', ['how', 'what', 'when', 'where', 'why']],
  ['help', ['help', 'assist', 'support', 'problem']],
  ['information', ['tell me', 'explain', 'describe', 'information']],
  ['task', ['do', 'create', 'make', 'generate', 'write']],
];

/**
 * A chunk that scored high enough to be persisted.
 */
export interface ConsolidationCandidate {
  readonly content: string;
  readonly importance: number;
  readonly tags: ReadonlyArray<string>;
  readonly messageCount: number;
}

/**
 * Case-insensitive substring test against any of `cues`.
 */
export function containsCue(text: string, cues: ReadonlyArray<string>): boolean {
  const lower = text.toLowerCase();
  return cues.some(cue => lower.includes(cue));
}

/**
 * Groups messages in order. A chunk closes after an assistant message once it
 * holds at least `minChunkBeforeAssistantSplit` messages, or when it reaches
 * `maxChunkSize`. A trailing partial chunk is kept.
 */
export function chunkMessages(
  messages: ReadonlyArray<Message>,
  weights: ConsolidationWeights = DEFAULT_WEIGHTS,
): Message[][] {
  const chunks: Message[][] = [];
  let current: Message[] = [];

  for (const message of messages) {
    current.push(message);

    const closesExchange =
      message.role === 'assistant' && current.length >= weights.minChunkBeforeAssistantSplit;

    if (closesExchange || current.length >= weights.maxChunkSize) {
      chunks.push(current);
      current = [];
    }
  }

  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

/**
 * Importance of a chunk in [0, 1]. Each bonus applies at most once.
 */
export function scoreChunk(
  chunk: ReadonlyArray<Message>,
  weights: ConsolidationWeights = DEFAULT_WEIGHTS,
): number {
  if (chunk.length === 0) return 0;

  let score = weights.baseScore;

  if (chunk.length > weights.lengthThreshold) {
    score += weights.lengthBonus;
  }
  if (chunk.some(m => containsCue(m.content, QUESTION_CUES))) {
    score += weights.questionBonus;
  }
  if (chunk.some(m => containsCue(m.content, PERSONAL_CUES))) {
    score += weights.personalBonus;
  }

  const averageLength = chunk.reduce((sum, m) => sum + m.content.length, 0) / chunk.length;
  if (averageLength > weights.detailLengthThreshold) {
    score += weights.detailBonus;
  }

  return Math.min(score, 1);
}

/**
 * Tag buckets whose cues appear anywhere in the chunk, in bucket order.
 */
export function extractTags(chunk: ReadonlyArray<Message>): string[] {
  const text = chunk.map(m => m.content).join(' ');
  return TAG_BUCKETS.filter(([, cues]) => containsCue(text, cues)).map(([tag]) => tag);
}

/**
 * `role: content` lines joined by newlines.
 */
export function serializeChunk(chunk: ReadonlyArray<Message>): string {
  return chunk.map(m => `${m.role}: ${m.content}`).join('\n');
}

/**
 * The candidate for one chunk, or null when it does not score strictly above
 * the persistence threshold.
 */
export function evaluateChunk(
  chunk: ReadonlyArray<Message>,
  weights: ConsolidationWeights = DEFAULT_WEIGHTS,
): ConsolidationCandidate | null {
  const importance = scoreChunk(chunk, weights);
  if (importance <= weights.persistThreshold) {
    return null;
  }
  return {
    content: serializeChunk(chunk),
    importance,
    tags: extractTags(chunk),
    messageCount: chunk.length,
  };
}

/**
 * Chunks `messages` and keeps the candidates worth persisting.
 */
export function planConsolidation(
  messages: ReadonlyArray<Message>,
  weights: ConsolidationWeights = DEFAULT_WEIGHTS,
): ConsolidationCandidate[] {
  return chunkMessages(messages, weights).flatMap(chunk => {
    const candidate = evaluateChunk(chunk, weights);
    return candidate ? [candidate] : [];
  });
}
