/**
 * @fileoverview Assistant - the public entry point of mnemos.
 *
 * Wires settings, memory, capabilities, the model adapter and the control
 * loop into one object with a small surface: `chat` plus memory and status
 * helpers. Only construction can throw; everything after it reports failure
 * through return values and logs.
 *
 * @module mnemos/agent/assistant
 */

import { v4 as uuidv4 } from 'uuid';
import type { AgentPhase, Timestamp, UniqueId } from '../types/core.types.js';
import { createTimestamp, createUniqueId, describeError } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';
import type { Capability, CapabilityUsage } from '../types/capability.types.js';
import type { Persona } from '../types/decision.types.js';
import { PERSONAS, isPersona } from '../types/decision.types.js';
import type { MemorySearchHit, MemorySummary } from '../types/memory.types.js';
import type { AgentSettings, AgentSettingsInput } from '../config/settings.js';
import { resolveSettings } from '../config/settings.js';
import type { Logger } from '../observability/logger.js';
import { createLogger } from '../observability/logger.js';
import type { FetchLike, ModelAdapter, ModelInfo } from '../providers/base.js';
import { createModelAdapter } from '../providers/index.js';
import { CapabilityRegistry } from '../capabilities/registry.js';
import type { RecordStore, SimilarityIndex } from '../memory/backends/types.js';
import { InMemoryRecordStore } from '../memory/backends/in-memory-store.js';
import { HashedVectorIndex } from '../memory/backends/hashed-vector-index.js';
import { openSqliteStore } from '../memory/backends/sqlite-store.js';
import { ShortTermStore } from '../memory/short-term.js';
import { LongTermStore } from '../memory/long-term.js';
import { MemoryCoordinator } from '../memory/coordinator.js';
import { DecisionEngine } from './decision-engine.js';
import { ActionExecutor } from './action-executor.js';
import { ControlLoop } from './control-loop.js';

export const DEFAULT_MEMORY_SEARCH_LIMIT = 5;

export type MemoryScope = 'short_term' | 'long_term' | 'all';

export interface AssistantOptions {
  readonly settings?: AgentSettingsInput;
  /** Replaces the adapter built from `settings.model` */
  readonly model?: ModelAdapter;
  readonly capabilities?: ReadonlyArray<Capability>;
  /** Replaces the store chosen from `settings.memory.dbPath` */
  readonly recordStore?: RecordStore;
  readonly similarityIndex?: SimilarityIndex;
  readonly logger?: Logger;
  /** Transport for the built-in model adapters */
  readonly fetch?: FetchLike;
}

export interface AssistantStatus {
  readonly state: AgentPhase;
  readonly persona: Persona;
  readonly iteration: number;
  readonly maxIterations: number;
  readonly availableCapabilities: ReadonlyArray<string>;
  readonly memorySummary: MemorySummary;
  readonly modelInfo: ModelInfo;
  readonly agentId: UniqueId;
  readonly createdAt: Timestamp;
  readonly totalInteractions: number;
  readonly uptimeMs: number;
}

export interface AssistantStatistics {
  readonly interactions: {
    readonly total: number;
    readonly uptimeHours: number;
  };
  readonly memory: MemorySummary;
  readonly capabilities: ReadonlyArray<CapabilityUsage>;
  readonly agentInfo: {
    readonly id: UniqueId;
    readonly name: string;
    readonly persona: Persona;
    readonly model: ModelInfo;
  };
}

/**
 * @example
 * ```typescript
 * const assistant = createAssistant({
 *   settings: { persona: 'technical', model: { provider: 'gemini', apiKey: process.env.GOOGLE_API_KEY } },
 *   capabilities: [calculator],
 * });
 *
 * const reply = await assistant.chat('What is 17 * 23?');
 * ```
 */
export class Assistant {
  readonly agentId: UniqueId;
  readonly createdAt: Timestamp;
  readonly settings: AgentSettings;

  private readonly logger: Logger;
  private readonly model: ModelAdapter;
  private readonly capabilities: CapabilityRegistry;
  private readonly coordinator: MemoryCoordinator;
  private readonly loop: ControlLoop;
  private totalInteractions: number = 0;
  /** Inputs are processed one at a time, in arrival order */
  private pending: Promise<unknown> = Promise.resolve();

  /**
   * @throws ConfigurationError for invalid settings, an unknown persona or
   * an unsupported model provider
   */
  constructor(options: AssistantOptions = {}) {
    this.settings = resolveSettings(options.settings);
    this.agentId = createUniqueId(uuidv4());
    this.createdAt = createTimestamp();

    this.logger = (options.logger ?? createLogger('mnemos', { minLevel: this.settings.logLevel })).child({
      module: 'agent',
      sessionId: this.agentId,
    });

    const persona = requirePersona(this.settings.persona);

    if (options.model === undefined && this.settings.model.apiKey === undefined) {
      this.logger.warn('No API key configured; model calls will fail until one is provided', {
        provider: this.settings.model.provider,
      });
    }
    this.model = options.model ?? createModelAdapter(this.settings.model, options.fetch);

    const memory = this.settings.memory;
    const recordStore =
      options.recordStore ??
      (memory.dbPath !== undefined ? openSqliteStore({ path: memory.dbPath }) : new InMemoryRecordStore());

    this.coordinator = new MemoryCoordinator({
      shortTerm: new ShortTermStore(memory.shortTermCapacity),
      longTerm: new LongTermStore({
        store: recordStore,
        index: options.similarityIndex ?? new HashedVectorIndex(),
        logger: this.logger,
      }),
      settings: memory,
      logger: this.logger,
    });

    this.capabilities = new CapabilityRegistry({ defaultTimeoutMs: this.settings.capabilityTimeoutMs });
    for (const capability of options.capabilities ?? []) {
      this.capabilities.register(capability);
    }

    this.loop = new ControlLoop({
      coordinator: this.coordinator,
      decisionEngine: new DecisionEngine({ model: this.model, logger: this.logger }),
      executor: new ActionExecutor({
        capabilities: this.capabilities,
        coordinator: this.coordinator,
        model: this.model,
        config: {
          minResponseLength: this.settings.minResponseLength,
          capabilityTimeoutMs: this.settings.capabilityTimeoutMs,
        },
        logger: this.logger,
      }),
      capabilityNames: () => this.capabilities.names(),
      config: {
        maxIterations: this.settings.maxIterations,
        persona,
        observationMemoryLimit: memory.observationMemoryLimit,
      },
      logger: this.logger,
    });

    this.logger.info('Assistant initialized', {
      agentName: this.settings.agentName,
      provider: this.settings.model.provider,
      persona,
      recordStore: recordStore.name,
      capabilities: this.capabilities.names(),
    });
  }

  /**
   * Sends one user message through the control loop. Never rejects: a
   * failure becomes an apology carrying the error message.
   */
  chat(message: string, context: Readonly<Record<string, unknown>> = {}): Promise<string> {
    const reply = this.pending.then(() => this.processChat(message, context));
    this.pending = reply;
    return reply;
  }

  async getStatus(): Promise<AssistantStatus> {
    const loopState = this.loop.getState();
    return {
      state: loopState.phase,
      persona: this.loop.getPersona(),
      iteration: loopState.iteration,
      maxIterations: loopState.maxIterations,
      availableCapabilities: this.capabilities.names(),
      memorySummary: await this.coordinator.summary(),
      modelInfo: this.model.getModelInfo(),
      agentId: this.agentId,
      createdAt: this.createdAt,
      totalInteractions: this.totalInteractions,
      uptimeMs: Date.now() - this.createdAt,
    };
  }

  /**
   * Clears short-term memory. Long-term memory is never deleted from here;
   * `long_term` returns false.
   */
  clearMemory(scope: MemoryScope = 'short_term'): boolean {
    if (scope === 'long_term') {
      this.logger.warn('Long-term memory cannot be cleared through the assistant');
      return false;
    }
    this.coordinator.clearShortTerm();
    return true;
  }

  async storePreference(key: string, value: string): Promise<boolean> {
    try {
      await this.coordinator.storePreference(key, value);
      this.logger.info('Stored user preference', { key });
      return true;
    } catch (error) {
      this.logger.error('Failed to store preference', { key }, error);
      return false;
    }
  }

  async getPreference(key: string): Promise<string | null> {
    try {
      return await this.coordinator.getPreference(key);
    } catch (error) {
      this.logger.error('Failed to read preference', { key }, error);
      return null;
    }
  }

  async searchMemories(query: string, limit: number = DEFAULT_MEMORY_SEARCH_LIMIT): Promise<MemorySearchHit[]> {
    return this.coordinator.searchMemories(query, { limit });
  }

  setPersona(persona: string): boolean {
    if (!isPersona(persona)) {
      this.logger.error('Failed to change persona', {
        persona,
        validPersonas: [...PERSONAS],
      });
      return false;
    }
    this.loop.setPersona(persona);
    this.logger.info('Persona changed', { persona });
    return true;
  }

  getAvailableCapabilities(): string[] {
    return this.capabilities.names();
  }

  /**
   * Registers a capability after construction.
   *
   * @throws ConfigurationError when the name is already taken
   */
  registerCapability(capability: Capability): void {
    this.capabilities.register(capability);
  }

  async getStatistics(): Promise<AssistantStatistics> {
    return {
      interactions: {
        total: this.totalInteractions,
        uptimeHours: (Date.now() - this.createdAt) / 3_600_000,
      },
      memory: await this.coordinator.summary(),
      capabilities: this.capabilities.usage(),
      agentInfo: {
        id: this.agentId,
        name: this.settings.agentName,
        persona: this.loop.getPersona(),
        model: this.model.getModelInfo(),
      },
    };
  }

  /**
   * Waits for queued messages and releases the record store.
   */
  async close(): Promise<void> {
    await this.pending;
    await this.coordinator.longTerm.close();
  }

  // ============ Private Methods ============

  private async processChat(message: string, context: Readonly<Record<string, unknown>>): Promise<string> {
    const startTime = Date.now();
    this.totalInteractions++;
    const interactionId = this.totalInteractions;

    this.logger.debug('Chat request received', {
      interactionId,
      messageLength: message.length,
      userMessage: message.length > 100 ? `${message.slice(0, 100)}...` : message,
    });

    try {
      const outcome = await this.loop.processUserInput(message, {
        ...context,
        interactionId,
        agentId: this.agentId,
        timestamp: new Date().toISOString(),
      });

      this.logger.info('Chat processed', {
        interactionId,
        iterations: outcome.iterations,
        terminated: outcome.terminated,
        responseLength: outcome.response.length,
        durationMs: Date.now() - startTime,
      });
      return outcome.response;
    } catch (error) {
      this.logger.error(
        'Chat processing failed',
        { interactionId, durationMs: Date.now() - startTime },
        error,
      );
      return `I apologize, but I encountered an error: ${describeError(error)}`;
    }
  }
}

export function createAssistant(options: AssistantOptions = {}): Assistant {
  return new Assistant(options);
}

function requirePersona(value: string): Persona {
  if (!isPersona(value)) {
    throw new ConfigurationError(`Invalid persona: ${value}. Valid personas: ${PERSONAS.join(', ')}`);
  }
  return value;
}
