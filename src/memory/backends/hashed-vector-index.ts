/**
 * @fileoverview In-process similarity index.
 *
 * Content is embedded as a signed bag of hashed tokens (FNV-1a into a fixed
 * number of buckets), L2-normalised, and ranked by cosine similarity. It needs
 * no embedding service, so it is the default index; a vector database can be
 * plugged in behind the same {@link SimilarityIndex} contract.
 *
 * @module mnemos/memory/backends/hashed-vector-index
 */

import type { UniqueId } from '../../types/core.types.js';
import type { IndexEntry, IndexHit, IndexQuery, SimilarityIndex } from './types.js';

export const DEFAULT_DIMENSIONS = 256;

interface IndexedVector {
  readonly entry: IndexEntry;
  readonly vector: Float64Array;
  readonly order: number;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Embeds `text` into a unit vector. Text without tokens yields the zero vector.
 */
export function embed(text: string, dimensions: number = DEFAULT_DIMENSIONS): Float64Array {
  const vector = new Float64Array(dimensions);

  for (const token of tokenize(text)) {
    const hash = hashToken(token);
    vector[hash % dimensions] += (hash & 1) === 0 ? 1 : -1;
  }

  let magnitude = 0;
  for (const value of vector) magnitude += value * value;
  magnitude = Math.sqrt(magnitude);

  if (magnitude > 0) {
    for (let i = 0; i < dimensions; i++) vector[i] /= magnitude;
  }
  return vector;
}

function dot(a: Float64Array, b: Float64Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export class HashedVectorIndex implements SimilarityIndex {
  readonly name = 'hashed-vector';

  private readonly vectors = new Map<UniqueId, IndexedVector>();
  private nextOrder = 0;
  private available = true;

  constructor(private readonly dimensions: number = DEFAULT_DIMENSIONS) {}

  get size(): number {
    return this.vectors.size;
  }

  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Marks the index unavailable (or available again). While unavailable,
   * `add` and `query` reject.
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Adding an id that is already indexed replaces its entry in place. */
  add(entry: IndexEntry): Promise<void> {
    if (!this.available) {
      return Promise.reject(new Error(`Similarity index '${this.name}' is unavailable`));
    }
    this.vectors.set(entry.id, {
      entry,
      vector: embed(entry.content, this.dimensions),
      order: this.vectors.get(entry.id)?.order ?? this.nextOrder++,
    });
    return Promise.resolve();
  }

  query(text: string, options: IndexQuery): Promise<IndexHit[]> {
    if (!this.available) {
      return Promise.reject(new Error(`Similarity index '${this.name}' is unavailable`));
    }
    if (options.limit <= 0) {
      return Promise.resolve([]);
    }

    const probe = embed(text, this.dimensions);
    const scored: Array<{ hit: IndexHit; order: number }> = [];

    for (const { entry, vector, order } of this.vectors.values()) {
      if (options.memoryType !== undefined && entry.memoryType !== options.memoryType) continue;
      if (entry.importance < options.minImportance) continue;

      const score = dot(probe, vector);
      if (score > 0) {
        scored.push({ hit: { id: entry.id, score }, order });
      }
    }

    scored.sort((a, b) => b.hit.score - a.hit.score || a.order - b.order);
    return Promise.resolve(scored.slice(0, options.limit).map(s => s.hit));
  }
}
