/**
 * @fileoverview Capability registry exports.
 *
 * @module mnemos/capabilities
 */

export {
  CapabilityRegistry,
  DEFAULT_REGISTRY_CONFIG,
  defineCapability,
  type CapabilityDefinition,
  type CapabilityRegistryConfig,
  type CapabilityRegistryEvents,
} from './registry.js';
