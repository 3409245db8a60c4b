/**
 * @fileoverview Type exports.
 *
 * @module mnemos/types
 */

export * from './core.types.js';
export * from './errors.js';
export * from './memory.types.js';
export * from './decision.types.js';
export * from './capability.types.js';
