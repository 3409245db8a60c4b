/**
 * @fileoverview Memory type definitions.
 *
 * Short-term memory holds the messages of the running session. Long-term
 * memory holds durable records that outlive it, together with user
 * preferences and facts.
 *
 * @module mnemos/types/memory
 */

import { z } from 'zod';
import type { UniqueId, Timestamp } from './core.types.js';

export type MessageRole = 'user' | 'assistant' | 'system';

/**
 * A single conversation turn. Immutable once appended to short-term memory.
 */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Timestamp;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Role/content pair handed to a model adapter.
 */
export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export const MEMORY_TYPES = ['conversation', 'fact', 'preference', 'interaction'] as const;

export type MemoryType = (typeof MEMORY_TYPES)[number];

export const MemoryTypeSchema = z.enum(MEMORY_TYPES);

export function isMemoryType(value: unknown): value is MemoryType {
  return MemoryTypeSchema.safeParse(value).success;
}

/**
 * A durable long-term memory record.
 *
 * @remarks
 * Records are append-only. The only mutation is access bookkeeping
 * (`lastAccessed`, `accessCount`).
 */
export interface MemoryRecord {
  readonly id: UniqueId;
  readonly content: string;
  readonly memoryType: MemoryType;
  /** Heuristic worth of the record, always within [0, 1] */
  readonly importance: number;
  readonly tags: ReadonlyArray<string>;
  readonly createdAt: Timestamp;
  readonly lastAccessed: Timestamp;
  readonly accessCount: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Input for creating a record. The store assigns id and timestamps.
 */
export interface MemoryDraft {
  readonly content: string;
  readonly memoryType: MemoryType;
  readonly importance: number;
  readonly tags: ReadonlyArray<string>;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface Preference {
  readonly key: string;
  readonly value: string;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

export interface Fact {
  readonly id: UniqueId;
  readonly content: string;
  readonly category: string | null;
  readonly confidence: number;
  readonly source: string | null;
  readonly createdAt: Timestamp;
  readonly verified: boolean;
}

export interface FactDraft {
  readonly content: string;
  readonly category: string | null;
  readonly confidence: number;
  readonly source: string | null;
}

export interface MemorySearchOptions {
  readonly limit?: number;
  readonly memoryType?: MemoryType;
  readonly minImportance?: number;
}

export interface MemorySearchHit {
  readonly record: MemoryRecord;
  /** Similarity reported by the index; higher is more relevant */
  readonly relevance: number;
}

/**
 * Returned by a long-term store. `indexed` is false when the record was
 * persisted but could not be added to the similarity index.
 */
export interface StoreReceipt {
  readonly id: UniqueId;
  readonly indexed: boolean;
}

export interface LongTermStats {
  readonly totalMemories: number;
  readonly countsByType: Readonly<Partial<Record<MemoryType, number>>>;
  readonly totalPreferences: number;
  readonly totalFacts: number;
  readonly indexAvailable: boolean;
}

export interface ShortTermSummary {
  readonly messageCount: number;
  readonly capacity: number;
  readonly contextKeys: ReadonlyArray<string>;
  readonly sessionDurationMs: number;
  readonly sessionStartedAt: Timestamp;
}

export interface MemorySummary {
  readonly shortTerm: ShortTermSummary;
  readonly longTerm: LongTermStats;
  readonly consolidationThreshold: number;
}
