/**
 * @fileoverview Unit tests for ShortTermStore
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ShortTermStore } from './short-term.js';
import { ConfigurationError } from '../types/errors.js';

describe('ShortTermStore', () => {
  let store: ShortTermStore;

  beforeEach(() => {
    store = new ShortTermStore(3);
  });

  describe('construction', () => {
    it('defaults to a capacity of 20', () => {
      expect(new ShortTermStore().capacity).toBe(20);
    });

    it('rejects a non-positive or fractional capacity', () => {
      expect(() => new ShortTermStore(0)).toThrow(ConfigurationError);
      expect(() => new ShortTermStore(-1)).toThrow(ConfigurationError);
      expect(() => new ShortTermStore(2.5)).toThrow(ConfigurationError);
    });
  });

  describe('append', () => {
    it('holds min(appended, capacity) messages', () => {
      for (let i = 1; i <= 7; i++) {
        store.add('user', `m${i}`);
        expect(store.size).toBe(Math.min(i, 3));
      }
    });

    it('evicts the oldest message first', () => {
      for (let i = 1; i <= 5; i++) {
        store.add('user', `m${i}`);
      }

      expect(store.all().map(m => m.content)).toEqual(['m3', 'm4', 'm5']);
    });

    it('keeps role, content and metadata', () => {
      const message = store.add('assistant', 'hello', { source: 'test' });

      expect(message.role).toBe('assistant');
      expect(message.metadata).toEqual({ source: 'test' });
      expect(store.all()[0]).toBe(message);
    });
  });

  describe('recent', () => {
    beforeEach(() => {
      store.add('user', 'a');
      store.add('assistant', 'b');
      store.add('user', 'c');
      store.add('assistant', 'd');
    });

    it('returns the last n messages in arrival order', () => {
      expect(store.recent(2).map(m => m.content)).toEqual(['c', 'd']);
    });

    it('returns everything held when n exceeds the size', () => {
      expect(store.recent(10).map(m => m.content)).toEqual(['b', 'c', 'd']);
    });

    it('returns nothing for n <= 0', () => {
      expect(store.recent(0)).toEqual([]);
      expect(store.recent(-2)).toEqual([]);
    });
  });

  it('renders role/content pairs for model input', () => {
    store.add('user', 'hi', { ignored: true });
    store.add('assistant', 'hello');

    expect(store.asContext()).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });

  describe('context map', () => {
    it('stores and reads keyed values', () => {
      store.setContext('user_pref_theme', 'dark');

      expect(store.getContext('user_pref_theme')).toBe('dark');
      expect(store.getContext('missing')).toBeUndefined();
      expect(store.contextSnapshot()).toEqual({ user_pref_theme: 'dark' });
    });
  });

  describe('clear', () => {
    it('empties the buffer and the context map', () => {
      store.add('user', 'a');
      store.setContext('k', 1);

      store.clear();

      expect(store.size).toBe(0);
      expect(store.all()).toEqual([]);
      expect(store.contextSnapshot()).toEqual({});
    });

    it('accepts new messages after clearing a wrapped buffer', () => {
      for (let i = 0; i < 5; i++) store.add('user', `m${i}`);
      store.clear();
      store.add('user', 'fresh');

      expect(store.all().map(m => m.content)).toEqual(['fresh']);
    });
  });

  it('summarises the session', () => {
    store.add('user', 'a');
    store.setContext('topic', 'weather');

    const summary = store.summary();

    expect(summary.messageCount).toBe(1);
    expect(summary.capacity).toBe(3);
    expect(summary.contextKeys).toEqual(['topic']);
    expect(summary.sessionDurationMs).toBeGreaterThanOrEqual(0);
  });

  describe('export / import', () => {
    it('restores messages, context and session start', () => {
      store.add('user', 'a');
      store.add('assistant', 'b');
      store.setContext('k', 'v');
      const snapshot = store.export();

      const restored = new ShortTermStore(3);
      restored.import(JSON.parse(JSON.stringify(snapshot)));

      expect(restored.asContext()).toEqual(store.asContext());
      expect(restored.getContext('k')).toBe('v');
      expect(restored.summary().sessionStartedAt).toBe(snapshot.sessionStartedAt);
    });

    it('keeps only the newest messages that fit', () => {
      const big = new ShortTermStore(5);
      for (let i = 1; i <= 5; i++) big.add('user', `m${i}`);

      store.import(big.export());

      expect(store.all().map(m => m.content)).toEqual(['m3', 'm4', 'm5']);
    });

    it('rejects a malformed snapshot', () => {
      expect(() => store.import({ messages: [{ role: 'robot' }] })).toThrow();
    });
  });
});
