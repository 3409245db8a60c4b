/**
 * @fileoverview Core type definitions for the mnemos agent runtime.
 *
 * These primitives are shared by the memory subsystem, the control loop and
 * the adapters around them.
 *
 * @module mnemos/types/core
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string, or a store-assigned row id.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of the control loop.
 *
 * The loop follows a strict state machine:
 * IDLE → OBSERVING → DECIDING → ACTING → (DECIDING | REFLECTING) → IDLE
 *
 * @remarks
 * - IDLE: no user input is being processed
 * - OBSERVING: the observation for a new input is being assembled
 * - DECIDING: the model is being asked for the next decision
 * - ACTING: a decision is being executed
 * - REFLECTING: the final response is folded back into memory
 */
export enum AgentPhase {
  IDLE = 'IDLE',
  OBSERVING = 'OBSERVING',
  DECIDING = 'DECIDING',
  ACTING = 'ACTING',
  REFLECTING = 'REFLECTING',
}

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Outcome of a stage that does not throw.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp, defaulting to the current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Clamps a score into the closed unit interval. Non-finite input maps to `fallback`.
 */
export function clampUnit(value: number, fallback: number = 0): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(0, Math.min(1, value));
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
