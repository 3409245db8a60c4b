/**
 * @fileoverview Observation builder - the OBSERVING phase of the control loop.
 *
 * @module mnemos/agent/observation
 */

import { createTimestamp } from '../types/core.types.js';
import type { ActionRecord, Observation, Persona } from '../types/decision.types.js';
import type { MemoryCoordinator } from '../memory/coordinator.js';

export const DEFAULT_OBSERVATION_MEMORY_LIMIT = 3;

export interface BuildObservationInput {
  readonly userInput: string;
  readonly callerContext?: Readonly<Record<string, unknown>>;
  readonly coordinator: MemoryCoordinator;
  readonly persona: Persona;
  readonly capabilityNames: ReadonlyArray<string>;
  readonly memoryLimit?: number;
}

/**
 * Gathers everything the decision stage sees for one user input.
 * The user turn must already be recorded. Long-term search fails closed,
 * so this never rejects on a store or index failure.
 */
export async function buildObservation(input: BuildObservationInput): Promise<Observation> {
  const { coordinator } = input;
  const memoryLimit = input.memoryLimit ?? DEFAULT_OBSERVATION_MEMORY_LIMIT;

  const conversationHistory = await coordinator.assembleContext();
  const relevantMemories =
    memoryLimit > 0 ? await coordinator.searchMemories(input.userInput, { limit: memoryLimit }) : [];

  return {
    userInput: input.userInput,
    context: {
      conversationHistory,
      availableCapabilities: [...input.capabilityNames],
      persona: input.persona,
      sessionInfo: coordinator.shortTerm.summary(),
      relevantMemories,
      extras: { ...input.callerContext },
    },
    timestamp: createTimestamp(),
    iteration: 0,
    lastAction: null,
  };
}

/**
 * Carries an executed action into the next iteration's observation.
 */
export function withLastAction(
  observation: Observation,
  action: ActionRecord,
  iteration: number,
): Observation {
  return { ...observation, lastAction: action, iteration };
}
