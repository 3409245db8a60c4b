/**
 * @fileoverview Action Executor - the ACTING phase of the control loop.
 *
 * Turns a decision into an {@link ActionRecord}. Execution never throws: a
 * failure of any collaborator becomes a record with `success: false` and a
 * result of the form `Action failed: <message>`.
 *
 * @module mnemos/agent/action-executor
 */

import { createTimestamp, describeError } from '../types/core.types.js';
import type {
  ActionRecord,
  AskClarificationDecision,
  Decision,
  RespondDecision,
  StoreMemoryDecision,
  UseCapabilityDecision,
} from '../types/decision.types.js';
import type { ModelAdapter } from '../providers/base.js';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { MemoryCoordinator } from '../memory/coordinator.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';

export const DEFAULT_CLARIFICATION = 'Could you please provide more details?';

export interface ActionExecutorConfig {
  /** Respond messages shorter than this are synthesised by the model */
  readonly minResponseLength: number;
  readonly capabilityTimeoutMs: number;
}

export const DEFAULT_EXECUTOR_CONFIG: ActionExecutorConfig = {
  minResponseLength: 10,
  capabilityTimeoutMs: 30_000,
};

export interface ActionExecutorOptions {
  readonly capabilities: CapabilityRegistry;
  readonly coordinator: MemoryCoordinator;
  readonly model: ModelAdapter;
  readonly config?: Partial<ActionExecutorConfig>;
  readonly logger?: Logger;
}

/**
 * What a single action handler produces before timing is attached.
 */
interface ActionOutcome {
  readonly result: string;
  readonly data: unknown;
  readonly success: boolean;
  readonly error: string | null;
}

export class ActionExecutor {
  private readonly capabilities: CapabilityRegistry;
  private readonly coordinator: MemoryCoordinator;
  private readonly model: ModelAdapter;
  private readonly config: ActionExecutorConfig;
  private readonly logger: Logger;

  constructor(options: ActionExecutorOptions) {
    this.capabilities = options.capabilities;
    this.coordinator = options.coordinator;
    this.model = options.model;
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...options.config };
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'agent.action' });
  }

  async execute(decision: Decision): Promise<ActionRecord> {
    const startTime = Date.now();

    let outcome: ActionOutcome;
    try {
      outcome = await this.dispatch(decision);
    } catch (error) {
      const message = describeError(error);
      this.logger.error('Action failed', { actionType: decision.actionType }, error);
      outcome = { result: `Action failed: ${message}`, data: null, success: false, error: message };
    }

    const record: ActionRecord = {
      actionType: decision.actionType,
      parameters: { ...decision.details },
      ...outcome,
      timestamp: createTimestamp(),
      executionTimeMs: Date.now() - startTime,
    };

    this.logger.debug('Action executed', {
      actionType: record.actionType,
      success: record.success,
      executionTimeMs: record.executionTimeMs,
    });
    return record;
  }

  // ============ Private Methods ============

  private dispatch(decision: Decision): Promise<ActionOutcome> {
    switch (decision.actionType) {
      case 'use_capability':
        return this.useCapability(decision);
      case 'respond':
        return this.respond(decision);
      case 'store_memory':
        return this.storeMemory(decision);
      case 'ask_clarification':
        return Promise.resolve(this.askClarification(decision));
    }
  }

  private async useCapability(decision: UseCapabilityDecision): Promise<ActionOutcome> {
    const { capabilityName, parameters } = decision.details;
    const invocation = await this.capabilities.invoke(
      capabilityName,
      parameters,
      this.config.capabilityTimeoutMs,
    );

    if (!invocation.success) {
      const message = invocation.error?.message ?? `Capability '${capabilityName}' failed`;
      return { result: message, data: invocation.result, success: false, error: message };
    }

    return {
      result: renderResult(invocation.result),
      data: invocation.result,
      success: true,
      error: null,
    };
  }

  private async respond(decision: RespondDecision): Promise<ActionOutcome> {
    const { message } = decision.details;
    if (message.length >= this.config.minResponseLength) {
      return { result: message, data: null, success: true, error: null };
    }

    const context = await this.coordinator.assembleContext();
    const reply = await this.model.generate(context);
    return { result: reply, data: null, success: true, error: null };
  }

  private async storeMemory(decision: StoreMemoryDecision): Promise<ActionOutcome> {
    const { content, memoryType, importance } = decision.details;
    if (content.trim() === '') {
      const message = 'Cannot store an empty memory';
      return { result: `Action failed: ${message}`, data: null, success: false, error: message };
    }

    const receipt = await this.coordinator.storeMemory({
      content,
      memoryType,
      importance,
      metadata: { source: 'agent_decision' },
    });
    return {
      result: `Stored important information with ID: ${receipt.id}`,
      data: receipt,
      success: true,
      error: null,
    };
  }

  private askClarification(decision: AskClarificationDecision): ActionOutcome {
    const message = decision.details.message ?? DEFAULT_CLARIFICATION;
    return { result: message, data: null, success: true, error: null };
  }
}

/**
 * Text form of a capability payload, as shown to the model and the user.
 */
export function renderResult(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}
