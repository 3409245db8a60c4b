/**
 * @fileoverview Memory subsystem exports.
 *
 * @module mnemos/memory
 */

export { ShortTermStore, type ShortTermSnapshot } from './short-term.js';
export {
  LongTermStore,
  DEFAULT_IMPORTANCE,
  DEFAULT_SEARCH_LIMIT,
  type LongTermStoreOptions,
  type StoreFactOptions,
  type StoreMemoryInput,
} from './long-term.js';
export {
  MemoryCoordinator,
  RELEVANT_CONTEXT_HEADER,
  PREFERENCE_CONTEXT_PREFIX,
  formatRelevantContext,
  type AssembleContextOptions,
  type ConsolidationReport,
  type CoordinatorEvents,
  type MemoryCoordinatorOptions,
} from './coordinator.js';
export {
  DEFAULT_WEIGHTS,
  PERSONAL_CUES,
  QUESTION_CUES,
  TAG_BUCKETS,
  chunkMessages,
  containsCue,
  evaluateChunk,
  extractTags,
  planConsolidation,
  scoreChunk,
  serializeChunk,
  type ConsolidationCandidate,
} from './consolidation.js';
export type {
  IndexEntry,
  IndexHit,
  IndexQuery,
  RecordStore,
  SimilarityIndex,
} from './backends/types.js';
export { InMemoryRecordStore } from './backends/in-memory-store.js';
export {
  SqliteRecordStore,
  openSqliteStore,
  runMigrations,
  getSchemaVersion,
  MIGRATIONS,
  type Migration,
  type SqliteStoreOptions,
} from './backends/sqlite-store.js';
export { HashedVectorIndex, DEFAULT_DIMENSIONS, embed, tokenize } from './backends/hashed-vector-index.js';
