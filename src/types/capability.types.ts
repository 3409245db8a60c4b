/**
 * @fileoverview Capability contract.
 *
 * Capabilities are the named external operations the agent may invoke
 * (arithmetic, file access, search, weather...). Their implementations live
 * in the owning application; the core only sees this interface.
 *
 * @module mnemos/types/capability
 */

import type { z } from 'zod';
import type { Timestamp, UniqueId } from './core.types.js';
import type { CapabilityErrorCode } from './errors.js';

/**
 * What a capability returns from `invoke`.
 */
export interface CapabilityResult<T = unknown> {
  readonly success: boolean;
  readonly result: T | null;
  readonly error?: string | null;
}

export interface Capability {
  /** Name the model uses to select this capability */
  readonly name: string;

  readonly description: string;

  /** Parameter schema, checked by the registry before every invocation */
  readonly parameters: z.ZodTypeAny;

  invoke(parameters: Readonly<Record<string, unknown>>): Promise<CapabilityResult>;
}

/**
 * Registry bookkeeping for a registered capability.
 */
export interface CapabilityEntry {
  readonly capability: Capability;
  readonly registeredAt: Timestamp;
  readonly enabled: boolean;
  readonly invocationCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}

/**
 * Outcome of a registry invocation. Never thrown, always returned.
 */
export interface CapabilityInvocation {
  readonly executionId: UniqueId;
  readonly capabilityName: string;
  readonly success: boolean;
  readonly result: unknown;
  readonly error: { readonly code: CapabilityErrorCode; readonly message: string } | null;
  readonly durationMs: number;
  readonly completedAt: Timestamp;
}

export interface CapabilityUsage {
  readonly name: string;
  readonly enabled: boolean;
  readonly invocationCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}
