/**
 * @fileoverview Long-term memory facade.
 *
 * Fronts a {@link RecordStore} and a {@link SimilarityIndex}. The index is
 * not durable: on first use every record already in the store is added to
 * it, so memories from earlier sessions are searchable. Writes always
 * reach the store; when the index cannot take a record it stays stored but
 * unretrievable by similarity, and the receipt says so. Reads fail closed:
 * any failure on the search path yields no results.
 *
 * @module mnemos/memory/long-term
 */

import type { UniqueId } from '../types/core.types.js';
import { clampUnit } from '../types/core.types.js';
import type {
  Fact,
  LongTermStats,
  MemoryRecord,
  MemorySearchHit,
  MemorySearchOptions,
  MemoryType,
  StoreReceipt,
} from '../types/memory.types.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import type { IndexEntry, RecordStore, SimilarityIndex } from './backends/types.js';

export const DEFAULT_SEARCH_LIMIT = 5;
export const DEFAULT_IMPORTANCE = 0.5;

export interface StoreMemoryInput {
  readonly content: string;
  readonly memoryType: MemoryType;
  readonly importance?: number;
  readonly tags?: ReadonlyArray<string>;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface StoreFactOptions {
  readonly category?: string | null;
  readonly confidence?: number;
  readonly source?: string | null;
}

export interface LongTermStoreOptions {
  readonly store: RecordStore;
  readonly index: SimilarityIndex;
  readonly logger?: Logger;
}

export class LongTermStore {
  private readonly records: RecordStore;
  private readonly index: SimilarityIndex;
  private readonly logger: Logger;
  private indexLoaded = false;
  private loading: Promise<void> | null = null;

  constructor(options: LongTermStoreOptions) {
    this.records = options.store;
    this.index = options.index;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'memory.long-term' });
  }

  /**
   * Persists a record and offers it to the similarity index.
   *
   * @returns the assigned id; `indexed` is false when indexing failed
   */
  async store(input: StoreMemoryInput): Promise<StoreReceipt> {
    const importance = clampUnit(input.importance ?? DEFAULT_IMPORTANCE, DEFAULT_IMPORTANCE);
    await this.ensureIndexLoaded();

    const record = await this.records.insert({
      content: input.content,
      memoryType: input.memoryType,
      importance,
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
    });

    const indexed = await this.indexRecord(record);
    this.logger.debug('Memory stored', {
      id: record.id,
      memoryType: record.memoryType,
      importance,
      indexed,
    });

    return { id: record.id, indexed };
  }

  /**
   * Ranked records similar to `query`, most relevant first. Each returned
   * record is touched; the records carry their state from before this access.
   */
  async search(query: string, options: MemorySearchOptions = {}): Promise<MemorySearchHit[]> {
    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    if (limit <= 0 || query.trim() === '') {
      return [];
    }

    await this.ensureIndexLoaded();

    if (!this.index.isAvailable()) {
      this.logger.warn('Similarity index unavailable, returning no memories', {
        index: this.index.name,
      });
      return [];
    }

    try {
      const ranked = await this.index.query(query, {
        limit,
        memoryType: options.memoryType,
        minImportance: options.minImportance ?? 0,
      });

      const records = await this.records.getMany(ranked.map(hit => hit.id));
      const byId = new Map<UniqueId, MemoryRecord>(records.map(r => [r.id, r]));

      const hits: MemorySearchHit[] = [];
      for (const { id, score } of ranked) {
        const record = byId.get(id);
        if (record) {
          hits.push({ record, relevance: score });
        }
      }

      for (const hit of hits) {
        await this.records.touch(hit.record.id);
      }

      return hits;
    } catch (error) {
      this.logger.warn('Memory search failed, returning no memories', { query }, error);
      return [];
    }
  }

  async setPreference(key: string, value: string): Promise<void> {
    await this.records.upsertPreference(key, value);
    this.logger.debug('Preference stored', { key });
  }

  async getPreference(key: string): Promise<string | null> {
    const preference = await this.records.getPreference(key);
    return preference?.value ?? null;
  }

  async storeFact(content: string, options: StoreFactOptions = {}): Promise<Fact> {
    return this.records.insertFact({
      content,
      category: options.category ?? null,
      confidence: clampUnit(options.confidence ?? DEFAULT_IMPORTANCE, DEFAULT_IMPORTANCE),
      source: options.source ?? null,
    });
  }

  async factsByCategory(category: string): Promise<Fact[]> {
    return this.records.factsByCategory(category);
  }

  async stats(): Promise<LongTermStats> {
    const countsByType = await this.records.countByType();
    let totalMemories = 0;
    for (const count of Object.values(countsByType)) {
      totalMemories += count ?? 0;
    }

    return {
      totalMemories,
      countsByType,
      totalPreferences: await this.records.countPreferences(),
      totalFacts: await this.records.countFacts(),
      indexAvailable: this.index.isAvailable(),
    };
  }

  async close(): Promise<void> {
    await this.records.close();
  }

  // ============ Private Methods ============

  /** Loads stored records into the index once; retried after a failure. */
  private async ensureIndexLoaded(): Promise<void> {
    if (this.indexLoaded) return;
    this.loading ??= this.loadIndex().then(loaded => {
      this.indexLoaded = loaded;
      this.loading = null;
    });
    await this.loading;
  }

  private async loadIndex(): Promise<boolean> {
    if (!this.index.isAvailable()) {
      return false;
    }

    try {
      const existing = await this.records.list();
      for (const record of existing) {
        await this.index.add(toIndexEntry(record));
      }
      if (existing.length > 0) {
        this.logger.info('Indexed stored memories', { count: existing.length, index: this.index.name });
      }
      return true;
    } catch (error) {
      this.logger.warn('Loading stored memories into the index failed', { index: this.index.name }, error);
      return false;
    }
  }

  private async indexRecord(record: MemoryRecord): Promise<boolean> {
    if (!this.index.isAvailable()) {
      this.logger.warn('Similarity index unavailable, memory stored without indexing', {
        id: record.id,
      });
      return false;
    }

    try {
      await this.index.add(toIndexEntry(record));
      return true;
    } catch (error) {
      this.logger.warn('Indexing failed, memory stored without indexing', { id: record.id }, error);
      return false;
    }
  }
}

function toIndexEntry(record: MemoryRecord): IndexEntry {
  return {
    id: record.id,
    content: record.content,
    memoryType: record.memoryType,
    importance: record.importance,
  };
}
