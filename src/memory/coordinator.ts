/**
 * @fileoverview Memory Coordinator - composes short-term and long-term memory.
 *
 * The coordinator is the only writer of conversation turns. It decides when
 * the short-term buffer is consolidated into long-term records, and it builds
 * the message context handed to the model, prefixed with whatever long-term
 * memories look relevant to the latest exchange.
 *
 * @module mnemos/memory/coordinator
 */

import { EventEmitter } from 'eventemitter3';
import type { UniqueId } from '../types/core.types.js';
import { describeError } from '../types/core.types.js';
import { ConsolidationError } from '../types/errors.js';
import type {
  ChatMessage,
  Fact,
  MemorySearchHit,
  MemorySearchOptions,
  MemorySummary,
  Message,
  MessageRole,
  StoreReceipt,
} from '../types/memory.types.js';
import type { MemorySettings } from '../config/settings.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import type { ShortTermStore } from './short-term.js';
import type { LongTermStore, StoreFactOptions, StoreMemoryInput } from './long-term.js';
import { chunkMessages, evaluateChunk } from './consolidation.js';

export const RELEVANT_CONTEXT_HEADER = 'Relevant context from previous conversations:';

/** Prefix of the short-term context keys that mirror stored preferences */
export const PREFERENCE_CONTEXT_PREFIX = 'user_pref_';

/**
 * Outcome of one consolidation pass.
 */
export interface ConsolidationReport {
  readonly chunks: number;
  readonly stored: number;
  readonly discarded: number;
  readonly failed: number;
  readonly recordIds: ReadonlyArray<UniqueId>;
}

export interface CoordinatorEvents {
  'turn:recorded': (message: Message) => void;
  'consolidation:complete': (report: ConsolidationReport) => void;
  'consolidation:chunk-failed': (error: ConsolidationError) => void;
}

export interface MemoryCoordinatorOptions {
  readonly shortTerm: ShortTermStore;
  readonly longTerm: LongTermStore;
  readonly settings: MemorySettings;
  readonly logger?: Logger;
}

export interface AssembleContextOptions {
  readonly includeRelevant?: boolean;
}

/**
 * Owns the short-term buffer and fronts the long-term store.
 *
 * @example
 * ```typescript
 * const coordinator = new MemoryCoordinator({ shortTerm, longTerm, settings: settings.memory });
 * await coordinator.recordTurn('user', 'My name is Ana');
 * const messages = await coordinator.assembleContext();
 * ```
 */
export class MemoryCoordinator extends EventEmitter<CoordinatorEvents> {
  readonly shortTerm: ShortTermStore;
  readonly longTerm: LongTermStore;
  private readonly settings: MemorySettings;
  private readonly logger: Logger;

  constructor(options: MemoryCoordinatorOptions) {
    super();
    this.shortTerm = options.shortTerm;
    this.longTerm = options.longTerm;
    this.settings = options.settings;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'memory.coordinator' });
  }

  /**
   * Appends a turn to short-term memory. User and assistant turns may trigger
   * consolidation once the buffer holds `consolidationThreshold` messages.
   */
  async recordTurn(
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {},
  ): Promise<Message> {
    const message = this.shortTerm.add(role, content, metadata);
    this.emit('turn:recorded', message);

    if (role !== 'system' && this.shortTerm.size >= this.settings.consolidationThreshold) {
      await this.consolidate();
    }
    return message;
  }

  /**
   * The message list for a model call: an optional synthetic system message
   * carrying relevant long-term memories, then the whole short-term history.
   */
  async assembleContext(options: AssembleContextOptions = {}): Promise<ChatMessage[]> {
    const history = this.shortTerm.asContext();
    if (options.includeRelevant === false) {
      return history;
    }

    const probe = this.shortTerm
      .recent(this.settings.relevantWindow)
      .map(m => m.content)
      .join(' ');

    const hits = await this.longTerm.search(probe, {
      limit: this.settings.relevantLimit,
      minImportance: this.settings.relevanceFloor,
    });

    if (hits.length === 0) {
      return history;
    }

    return [{ role: 'system', content: formatRelevantContext(hits) }, ...history];
  }

  /**
   * Scores the current buffer and stores every chunk worth keeping. A chunk
   * that fails to store is reported and skipped.
   */
  async consolidate(): Promise<ConsolidationReport> {
    const chunks = chunkMessages(this.shortTerm.all(), this.settings.weights);
    const recordIds: UniqueId[] = [];
    let discarded = 0;
    let failed = 0;

    for (const [chunkIndex, chunk] of chunks.entries()) {
      const candidate = evaluateChunk(chunk, this.settings.weights);
      if (candidate === null) {
        discarded++;
        continue;
      }

      try {
        const receipt = await this.longTerm.store({
          content: candidate.content,
          memoryType: 'conversation',
          importance: candidate.importance,
          tags: candidate.tags,
          metadata: {
            messageCount: candidate.messageCount,
            consolidatedAt: new Date().toISOString(),
          },
        });
        recordIds.push(receipt.id);
      } catch (error) {
        failed++;
        const failure = new ConsolidationError(describeError(error), chunkIndex);
        this.logger.error('Chunk consolidation failed', { chunkIndex }, failure);
        this.emit('consolidation:chunk-failed', failure);
      }
    }

    const report: ConsolidationReport = {
      chunks: chunks.length,
      stored: recordIds.length,
      discarded,
      failed,
      recordIds,
    };

    this.logger.info('Consolidation complete', { ...report });
    this.emit('consolidation:complete', report);
    return report;
  }

  async storeMemory(input: StoreMemoryInput): Promise<StoreReceipt> {
    return this.longTerm.store(input);
  }

  async searchMemories(query: string, options: MemorySearchOptions = {}): Promise<MemorySearchHit[]> {
    return this.longTerm.search(query, options);
  }

  /**
   * Persists a preference and mirrors it into the short-term context map.
   */
  async storePreference(key: string, value: string): Promise<void> {
    await this.longTerm.setPreference(key, value);
    this.shortTerm.setContext(`${PREFERENCE_CONTEXT_PREFIX}${key}`, value);
  }

  async getPreference(key: string): Promise<string | null> {
    return this.longTerm.getPreference(key);
  }

  async storeFact(content: string, options: StoreFactOptions = {}): Promise<Fact> {
    return this.longTerm.storeFact(content, options);
  }

  clearShortTerm(): void {
    this.shortTerm.clear();
    this.logger.info('Short-term memory cleared');
  }

  async summary(): Promise<MemorySummary> {
    return {
      shortTerm: this.shortTerm.summary(),
      longTerm: await this.longTerm.stats(),
      consolidationThreshold: this.settings.consolidationThreshold,
    };
  }
}

export function formatRelevantContext(hits: ReadonlyArray<MemorySearchHit>): string {
  const lines = hits.map(hit => `- ${hit.record.content}\n`).join('');
  return `${RELEVANT_CONTEXT_HEADER}\n${lines}`;
}
