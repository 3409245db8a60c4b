/**
 * @fileoverview Contracts for the collaborators behind long-term memory.
 *
 * A {@link RecordStore} is the durable side: append-only records, upserted
 * preferences, facts. A {@link SimilarityIndex} ranks record ids against a
 * free-text query. Either may live out of process, so both are asynchronous.
 *
 * @module mnemos/memory/backends/types
 */

import type { UniqueId } from '../../types/core.types.js';
import type {
  Fact,
  FactDraft,
  MemoryDraft,
  MemoryRecord,
  MemoryType,
  Preference,
} from '../../types/memory.types.js';

export interface RecordStore {
  readonly name: string;

  /** Appends a record; the store assigns the id and timestamps. */
  insert(draft: MemoryDraft): Promise<MemoryRecord>;

  get(id: UniqueId): Promise<MemoryRecord | null>;

  /** Every record, oldest first. */
  list(): Promise<MemoryRecord[]>;

  /** Records for `ids` in the given order; unknown ids are skipped. */
  getMany(ids: ReadonlyArray<UniqueId>): Promise<MemoryRecord[]>;

  /** Access bookkeeping: sets `lastAccessed` to now and increments `accessCount`. */
  touch(id: UniqueId): Promise<void>;

  /** Inserts or replaces the value for `key` in one atomic step. */
  upsertPreference(key: string, value: string): Promise<Preference>;

  getPreference(key: string): Promise<Preference | null>;

  insertFact(draft: FactDraft): Promise<Fact>;

  /** Facts in `category`, highest confidence first. */
  factsByCategory(category: string): Promise<Fact[]>;

  countByType(): Promise<Partial<Record<MemoryType, number>>>;

  countPreferences(): Promise<number>;

  countFacts(): Promise<number>;

  close(): Promise<void>;
}

export interface IndexEntry {
  readonly id: UniqueId;
  readonly content: string;
  readonly memoryType: MemoryType;
  readonly importance: number;
}

export interface IndexQuery {
  readonly limit: number;
  readonly memoryType?: MemoryType | undefined;
  readonly minImportance: number;
}

export interface IndexHit {
  readonly id: UniqueId;
  readonly score: number;
}

export interface SimilarityIndex {
  readonly name: string;

  /** False when the index cannot currently serve requests. */
  isAvailable(): boolean;

  /** Adding an id that is already indexed replaces its entry. */
  add(entry: IndexEntry): Promise<void>;

  /** Ranked hits, most similar first. */
  query(text: string, options: IndexQuery): Promise<IndexHit[]>;
}
