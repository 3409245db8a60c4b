/**
 * @fileoverview Process-local record store.
 *
 * Used when no database path is configured, and by tests. Ids are sequential
 * integers rendered as strings, like the SQLite store's row ids.
 *
 * @module mnemos/memory/backends/in-memory-store
 */

import type { UniqueId } from '../../types/core.types.js';
import { createTimestamp, createUniqueId } from '../../types/core.types.js';
import type {
  Fact,
  FactDraft,
  MemoryDraft,
  MemoryRecord,
  MemoryType,
  Preference,
} from '../../types/memory.types.js';
import type { RecordStore } from './types.js';

export class InMemoryRecordStore implements RecordStore {
  readonly name = 'in-memory';

  private readonly records = new Map<UniqueId, MemoryRecord>();
  private readonly preferences = new Map<string, Preference>();
  private readonly facts: Fact[] = [];
  private nextRecordId = 1;
  private nextFactId = 1;

  insert(draft: MemoryDraft): Promise<MemoryRecord> {
    const now = createTimestamp();
    const record: MemoryRecord = {
      id: createUniqueId(String(this.nextRecordId++)),
      content: draft.content,
      memoryType: draft.memoryType,
      importance: draft.importance,
      tags: [...draft.tags],
      createdAt: now,
      lastAccessed: now,
      accessCount: 0,
      metadata: { ...draft.metadata },
    };
    this.records.set(record.id, record);
    return Promise.resolve(record);
  }

  get(id: UniqueId): Promise<MemoryRecord | null> {
    return Promise.resolve(this.records.get(id) ?? null);
  }

  list(): Promise<MemoryRecord[]> {
    return Promise.resolve([...this.records.values()]);
  }

  getMany(ids: ReadonlyArray<UniqueId>): Promise<MemoryRecord[]> {
    const found: MemoryRecord[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) found.push(record);
    }
    return Promise.resolve(found);
  }

  touch(id: UniqueId): Promise<void> {
    const record = this.records.get(id);
    if (record) {
      this.records.set(id, {
        ...record,
        lastAccessed: createTimestamp(),
        accessCount: record.accessCount + 1,
      });
    }
    return Promise.resolve();
  }

  upsertPreference(key: string, value: string): Promise<Preference> {
    const now = createTimestamp();
    const existing = this.preferences.get(key);
    const preference: Preference = {
      key,
      value,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.preferences.set(key, preference);
    return Promise.resolve(preference);
  }

  getPreference(key: string): Promise<Preference | null> {
    return Promise.resolve(this.preferences.get(key) ?? null);
  }

  insertFact(draft: FactDraft): Promise<Fact> {
    const fact: Fact = {
      id: createUniqueId(String(this.nextFactId++)),
      content: draft.content,
      category: draft.category,
      confidence: draft.confidence,
      source: draft.source,
      createdAt: createTimestamp(),
      verified: false,
    };
    this.facts.push(fact);
    return Promise.resolve(fact);
  }

  factsByCategory(category: string): Promise<Fact[]> {
    const matching = this.facts
      .filter(f => f.category === category)
      .sort((a, b) => b.confidence - a.confidence);
    return Promise.resolve(matching);
  }

  countByType(): Promise<Partial<Record<MemoryType, number>>> {
    const counts: Partial<Record<MemoryType, number>> = {};
    for (const record of this.records.values()) {
      counts[record.memoryType] = (counts[record.memoryType] ?? 0) + 1;
    }
    return Promise.resolve(counts);
  }

  countPreferences(): Promise<number> {
    return Promise.resolve(this.preferences.size);
  }

  countFacts(): Promise<number> {
    return Promise.resolve(this.facts.length);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
