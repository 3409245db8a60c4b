/**
 * @fileoverview mnemos - a conversational agent core with layered memory.
 *
 * @example
 * ```typescript
 * import { createAssistant, settingsFromEnv } from 'mnemos';
 *
 * const assistant = createAssistant({ settings: settingsFromEnv(process.env) });
 * console.log(await assistant.chat('Remember that I prefer metric units'));
 * ```
 *
 * @module mnemos
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './memory/index.js';
export * from './capabilities/index.js';
export * from './providers/index.js';
export * from './observability/index.js';
export {
  AgentSettingsSchema,
  ConsolidationWeightsSchema,
  DEFAULT_SETTINGS,
  MemorySettingsSchema,
  ModelSettingsSchema,
  SUPPORTED_PROVIDERS,
  isSupportedProvider,
  resolveSettings,
  settingsFromEnv,
  type AgentSettings,
  type AgentSettingsInput,
  type ConsolidationWeights,
  type MemorySettings,
  type ModelProviderName,
  type ModelSettings,
} from './config/settings.js';
