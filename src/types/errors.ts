/**
 * @fileoverview Error taxonomy.
 *
 * Only {@link ConfigurationError} is ever thrown to a caller, and only while
 * an assistant is being constructed. The other classes describe failures that
 * are recovered inside their stage; they travel as values in results and logs.
 *
 * @module mnemos/types/errors
 */

export class MnemosError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MnemosError';
  }
}

/**
 * Invalid model, persona or settings at construction time.
 */
export class ConfigurationError extends MnemosError {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string> = [],
  ) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Model output that could not be decoded into a decision.
 */
export class DecisionParseError extends MnemosError {
  constructor(
    message: string,
    public readonly rawOutput: string,
  ) {
    super(`Decision parse failed: ${message}`);
    this.name = 'DecisionParseError';
  }
}

export type CapabilityErrorCode =
  | 'CAPABILITY_NOT_FOUND'
  | 'CAPABILITY_DISABLED'
  | 'VALIDATION_FAILED'
  | 'TIMEOUT'
  | 'EXECUTION_ERROR';

/**
 * Missing capability or failed capability invocation.
 */
export class CapabilityError extends MnemosError {
  constructor(
    public readonly code: CapabilityErrorCode,
    public readonly capabilityName: string,
    message: string,
  ) {
    super(message);
    this.name = 'CapabilityError';
  }
}

/**
 * Transport, timeout or credential failure while generating text.
 */
export class ModelAdapterError extends MnemosError {
  constructor(
    message: string,
    public readonly recoverable: boolean,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ModelAdapterError';
  }
}

/**
 * Failure while scoring or storing a consolidation chunk.
 */
export class ConsolidationError extends MnemosError {
  constructor(
    message: string,
    public readonly chunkIndex: number,
  ) {
    super(`Consolidation failed for chunk ${chunkIndex}: ${message}`);
    this.name = 'ConsolidationError';
  }
}
