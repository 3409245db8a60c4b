/**
 * @fileoverview Capability Registry - named external operations the agent may invoke.
 *
 * The registry maintains the available capabilities, validates parameters
 * against each capability's schema, dispatches invocations under a timeout
 * and tracks usage metrics. Invocation never throws: every failure comes back
 * as a {@link CapabilityInvocation} carrying an error code.
 *
 * @module mnemos/capabilities/registry
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { z } from 'zod';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId, createTimestamp, describeError } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';
import type { CapabilityErrorCode } from '../types/errors.js';
import type {
  Capability,
  CapabilityEntry,
  CapabilityInvocation,
  CapabilityResult,
  CapabilityUsage,
} from '../types/capability.types.js';

/**
 * Events emitted by the Capability Registry.
 */
export interface CapabilityRegistryEvents {
  'capability:registered': (entry: CapabilityEntry) => void;
  'capability:unregistered': (name: string) => void;
  'capability:invoked': (name: string, executionId: UniqueId) => void;
  'capability:completed': (name: string, executionId: UniqueId, invocation: CapabilityInvocation) => void;
  'capability:failed': (name: string, executionId: UniqueId, invocation: CapabilityInvocation) => void;
}

export interface CapabilityRegistryConfig {
  /** Default timeout for one invocation */
  readonly defaultTimeoutMs: number;
}

export const DEFAULT_REGISTRY_CONFIG: CapabilityRegistryConfig = {
  defaultTimeoutMs: 30_000,
};

/**
 * Central registry for capabilities.
 *
 * @example
 * ```typescript
 * const registry = new CapabilityRegistry({ defaultTimeoutMs: 5_000 });
 * registry.register(calculator);
 * const outcome = await registry.invoke('calculator', { expression: '2 + 2' });
 * ```
 */
export class CapabilityRegistry extends EventEmitter<CapabilityRegistryEvents> {
  private readonly capabilities: Map<string, CapabilityEntry>;
  private readonly config: CapabilityRegistryConfig;

  constructor(config: Partial<CapabilityRegistryConfig> = {}) {
    super();
    this.capabilities = new Map();
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
  }

  /**
   * @throws ConfigurationError if the name is already registered
   */
  register(capability: Capability): void {
    if (this.capabilities.has(capability.name)) {
      throw new ConfigurationError(`Capability '${capability.name}' is already registered`);
    }

    const entry: CapabilityEntry = {
      capability,
      registeredAt: createTimestamp(),
      enabled: true,
      invocationCount: 0,
      lastInvokedAt: null,
      averageDurationMs: 0,
    };

    this.capabilities.set(capability.name, entry);
    this.emit('capability:registered', entry);
  }

  /**
   * @returns true if the capability was removed, false if not found
   */
  unregister(name: string): boolean {
    const existed = this.capabilities.delete(name);
    if (existed) {
      this.emit('capability:unregistered', name);
    }
    return existed;
  }

  get(name: string): Capability | null {
    return this.capabilities.get(name)?.capability ?? null;
  }

  /**
   * Checks if a capability is registered and enabled.
   */
  has(name: string): boolean {
    return this.capabilities.get(name)?.enabled ?? false;
  }

  /**
   * Names of the enabled capabilities, in registration order.
   */
  names(): string[] {
    return this.list().map(c => c.name);
  }

  list(): ReadonlyArray<Capability> {
    const capabilities: Capability[] = [];
    for (const entry of this.capabilities.values()) {
      if (entry.enabled) capabilities.push(entry.capability);
    }
    return capabilities;
  }

  setEnabled(name: string, enabled: boolean): void {
    const entry = this.capabilities.get(name);
    if (entry) {
      this.capabilities.set(name, { ...entry, enabled });
    }
  }

  /**
   * Validates `parameters` and invokes the named capability.
   */
  async invoke(
    name: string,
    parameters: unknown,
    timeoutMs: number = this.config.defaultTimeoutMs,
  ): Promise<CapabilityInvocation> {
    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();

    const entry = this.capabilities.get(name);

    if (!entry) {
      return this.failure(executionId, name, 'CAPABILITY_NOT_FOUND', `Capability '${name}' not found`, startTime);
    }

    if (!entry.enabled) {
      return this.failure(
        executionId,
        name,
        'CAPABILITY_DISABLED',
        `Capability '${name}' is currently disabled`,
        startTime,
      );
    }

    const validation = entry.capability.parameters.safeParse(parameters ?? {});
    if (!validation.success) {
      const issues = validation.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join(', ');
      return this.failure(
        executionId,
        name,
        'VALIDATION_FAILED',
        `Invalid parameters for '${name}': ${issues}`,
        startTime,
      );
    }

    this.emit('capability:invoked', name, executionId);

    let outcome: CapabilityInvocation;
    try {
      const result = await this.executeWithTimeout(entry.capability, toRecord(validation.data), timeoutMs);
      outcome = {
        executionId,
        capabilityName: name,
        success: result.success,
        result: result.result,
        error: result.success
          ? null
          : { code: 'EXECUTION_ERROR', message: result.error ?? `Capability '${name}' reported failure` },
        durationMs: Date.now() - startTime,
        completedAt: createTimestamp(),
      };
    } catch (error) {
      const timedOut = error instanceof CapabilityTimeout;
      outcome = this.buildFailure(
        executionId,
        name,
        timedOut ? 'TIMEOUT' : 'EXECUTION_ERROR',
        describeError(error),
        startTime,
      );
    }

    this.updateMetrics(name, outcome.durationMs);
    this.emit(outcome.success ? 'capability:completed' : 'capability:failed', name, executionId, outcome);
    return outcome;
  }

  getMetrics(name: string): CapabilityEntry | null {
    return this.capabilities.get(name) ?? null;
  }

  /**
   * Usage metrics for every registered capability, enabled or not.
   */
  usage(): CapabilityUsage[] {
    return [...this.capabilities.values()].map(entry => ({
      name: entry.capability.name,
      enabled: entry.enabled,
      invocationCount: entry.invocationCount,
      lastInvokedAt: entry.lastInvokedAt,
      averageDurationMs: entry.averageDurationMs,
    }));
  }

  // ============ Private Methods ============

  private async executeWithTimeout(
    capability: Capability,
    parameters: Readonly<Record<string, unknown>>,
    timeoutMs: number,
  ): Promise<CapabilityResult> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new CapabilityTimeout(`Capability '${capability.name}' timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      Promise.resolve()
        .then(() => capability.invoke(parameters))
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private failure(
    executionId: UniqueId,
    name: string,
    code: CapabilityErrorCode,
    message: string,
    startTime: number,
  ): CapabilityInvocation {
    const outcome = this.buildFailure(executionId, name, code, message, startTime);
    this.emit('capability:failed', name, executionId, outcome);
    return outcome;
  }

  private buildFailure(
    executionId: UniqueId,
    name: string,
    code: CapabilityErrorCode,
    message: string,
    startTime: number,
  ): CapabilityInvocation {
    return {
      executionId,
      capabilityName: name,
      success: false,
      result: null,
      error: { code, message },
      durationMs: Date.now() - startTime,
      completedAt: createTimestamp(),
    };
  }

  private updateMetrics(name: string, durationMs: number): void {
    const entry = this.capabilities.get(name);
    if (!entry) return;

    const newCount = entry.invocationCount + 1;
    const newAverage = (entry.averageDurationMs * entry.invocationCount + durationMs) / newCount;

    this.capabilities.set(name, {
      ...entry,
      invocationCount: newCount,
      lastInvokedAt: createTimestamp(),
      averageDurationMs: newAverage,
    });
  }
}

class CapabilityTimeout extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CapabilityTimeout';
  }
}

function toRecord(value: unknown): Readonly<Record<string, unknown>> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

// ============ Definition Helper ============

export interface CapabilityDefinition<S extends z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly parameters: S;
  readonly handler: (parameters: z.output<S>) => Promise<CapabilityResult> | CapabilityResult;
}

/**
 * Builds a {@link Capability} whose handler receives parameters already
 * parsed by its schema.
 *
 * @example
 * ```typescript
 * const echo = defineCapability({
 *   name: 'echo',
 *   description: 'Repeats the given text',
 *   parameters: z.object({ text: z.string() }),
 *   handler: ({ text }) => ({ success: true, result: text }),
 * });
 * ```
 */
export function defineCapability<S extends z.ZodTypeAny>(definition: CapabilityDefinition<S>): Capability {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    async invoke(parameters) {
      const parsed = definition.parameters.safeParse(parameters);
      if (!parsed.success) {
        return { success: false, result: null, error: parsed.error.message };
      }
      return definition.handler(parsed.data);
    },
  };
}
