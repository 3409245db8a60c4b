/**
 * @fileoverview Agent module public exports.
 *
 * @module mnemos/agent
 */

export {
  LifecycleController,
  createLifecycle,
  type LifecycleEvents,
  type LifecycleOptions,
  type PhaseMetadata,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
} from './lifecycle.js';

export {
  ControlLoop,
  DEFAULT_LOOP_CONFIG,
  EXHAUSTED_RESPONSE,
  INTERACTION_CUES,
  INTERACTION_IMPORTANCE,
  shouldStoreInteraction,
  type ControlLoopConfig,
  type ControlLoopEvents,
  type ControlLoopOptions,
  type ControlLoopState,
  type LoopOutcome,
} from './control-loop.js';

export {
  DecisionEngine,
  buildDecisionPrompt,
  errorDecision,
  interpretDecision,
  parseDecision,
  DEFAULT_DECISION_MESSAGE,
  ERROR_DECISION_MESSAGE,
  type DecisionEngineOptions,
  type InterpretedDecision,
} from './decision-engine.js';

export {
  ActionExecutor,
  DEFAULT_CLARIFICATION,
  DEFAULT_EXECUTOR_CONFIG,
  renderResult,
  type ActionExecutorConfig,
  type ActionExecutorOptions,
} from './action-executor.js';

export { buildObservation, withLastAction, type BuildObservationInput } from './observation.js';

export { personaPrompt, capabilitySection, previousActionSection, formatSessionTime } from './prompts.js';

export {
  Assistant,
  createAssistant,
  DEFAULT_MEMORY_SEARCH_LIMIT,
  type AssistantOptions,
  type AssistantStatistics,
  type AssistantStatus,
  type MemoryScope,
} from './assistant.js';
