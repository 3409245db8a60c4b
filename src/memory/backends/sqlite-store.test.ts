/**
 * @fileoverview Unit tests for SqliteRecordStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteRecordStore, getSchemaVersion, openSqliteStore, runMigrations } from './sqlite-store.js';
import { createUniqueId } from '../../types/core.types.js';

describe('SqliteRecordStore', () => {
  let store: SqliteRecordStore;

  beforeEach(() => {
    store = openSqliteStore({ path: ':memory:' });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('migrations', () => {
    it('brings a fresh database to the latest version once', () => {
      const db = new Database(':memory:');
      runMigrations(db);
      runMigrations(db);

      expect(getSchemaVersion(db)).toBe(2);
      db.close();
    });
  });

  describe('records', () => {
    it('assigns sequential ids and round-trips JSON columns', async () => {
      const first = await store.insert({
        content: 'user likes tea',
        memoryType: 'preference',
        importance: 0.8,
        tags: ['preference'],
        metadata: { source: 'test' },
      });
      const second = await store.insert({
        content: 'second',
        memoryType: 'fact',
        importance: 0.5,
        tags: [],
        metadata: {},
      });

      expect(first.id).toBe('1');
      expect(second.id).toBe('2');

      const loaded = await store.get(first.id);
      expect(loaded?.content).toBe('user likes tea');
      expect(loaded?.memoryType).toBe('preference');
      expect(loaded?.tags).toEqual(['preference']);
      expect(loaded?.metadata).toEqual({ source: 'test' });
      expect(loaded?.accessCount).toBe(0);
    });

    it('returns null for unknown or non-numeric ids', async () => {
      expect(await store.get(createUniqueId('42'))).toBeNull();
      expect(await store.get(createUniqueId('not-a-row'))).toBeNull();
    });

    it('loads many records in the requested order', async () => {
      for (const content of ['a', 'b', 'c']) {
        await store.insert({ content, memoryType: 'fact', importance: 0.5, tags: [], metadata: {} });
      }

      const records = await store.getMany([createUniqueId('3'), createUniqueId('9'), createUniqueId('1')]);

      expect(records.map(r => r.content)).toEqual(['c', 'a']);
    });

    it('lists every record oldest first', async () => {
      for (const content of ['a', 'b']) {
        await store.insert({ content, memoryType: 'fact', importance: 0.5, tags: ['t'], metadata: {} });
      }

      const records = await store.list();

      expect(records.map(r => [r.id, r.content, r.tags])).toEqual([
        ['1', 'a', ['t']],
        ['2', 'b', ['t']],
      ]);
    });

    it('touch increments the access count', async () => {
      const record = await store.insert({
        content: 'x',
        memoryType: 'fact',
        importance: 0.5,
        tags: [],
        metadata: {},
      });

      await store.touch(record.id);
      await store.touch(record.id);

      const loaded = await store.get(record.id);
      expect(loaded?.accessCount).toBe(2);
      expect(loaded?.lastAccessed).toBeGreaterThanOrEqual(record.lastAccessed);
    });

    it('counts records by type', async () => {
      await store.insert({ content: 'a', memoryType: 'fact', importance: 0.5, tags: [], metadata: {} });
      await store.insert({ content: 'b', memoryType: 'fact', importance: 0.5, tags: [], metadata: {} });
      await store.insert({ content: 'c', memoryType: 'interaction', importance: 0.7, tags: [], metadata: {} });

      expect(await store.countByType()).toEqual({ fact: 2, interaction: 1 });
    });
  });

  describe('preferences', () => {
    it('upserts by key', async () => {
      const created = await store.upsertPreference('theme', 'light');
      const updated = await store.upsertPreference('theme', 'dark');

      expect(updated.value).toBe('dark');
      expect(updated.createdAt).toBe(created.createdAt);
      expect((await store.getPreference('theme'))?.value).toBe('dark');
      expect(await store.countPreferences()).toBe(1);
    });

    it('returns null for a missing key', async () => {
      expect(await store.getPreference('missing')).toBeNull();
    });
  });

  describe('facts', () => {
    it('lists a category by descending confidence', async () => {
      await store.insertFact({ content: 'low', category: 'geo', confidence: 0.4, source: null });
      await store.insertFact({ content: 'high', category: 'geo', confidence: 0.9, source: 'atlas' });
      await store.insertFact({ content: 'other', category: 'math', confidence: 1, source: null });

      const facts = await store.factsByCategory('geo');

      expect(facts.map(f => f.content)).toEqual(['high', 'low']);
      expect(facts[0].source).toBe('atlas');
      expect(facts[0].verified).toBe(false);
      expect(await store.countFacts()).toBe(3);
    });
  });
});
