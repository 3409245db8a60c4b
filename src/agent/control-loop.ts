/**
 * @fileoverview Control Loop - core execution engine for the agent.
 *
 * Drives one user input through Observe → Decide → Act → Reflect, coordinating
 * the lifecycle controller, the decision engine, the action executor and the
 * memory coordinator.
 *
 * Design Principles:
 * 1. Bounded - at most `maxIterations` decide/act rounds per input
 * 2. Observable - every iteration is emitted and logged
 * 3. Typed state - the only thing carried between iterations is the last action
 *
 * @module mnemos/agent/control-loop
 */

import { EventEmitter } from 'eventemitter3';
import { AgentPhase } from '../types/core.types.js';
import type { ActionRecord, Decision, Observation, Persona } from '../types/decision.types.js';
import { isTerminalAction } from '../types/decision.types.js';
import type { MemoryCoordinator } from '../memory/coordinator.js';
import { containsCue } from '../memory/consolidation.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import { LifecycleController, createLifecycle } from './lifecycle.js';
import type { DecisionEngine } from './decision-engine.js';
import type { ActionExecutor } from './action-executor.js';
import { buildObservation, withLastAction } from './observation.js';
import { ERROR_DECISION_MESSAGE } from './decision-engine.js';

export const EXHAUSTED_RESPONSE = "I apologize, but I couldn't process your request completely.";

/** Inputs containing one of these are kept as long-term interactions */
export const INTERACTION_CUES: ReadonlyArray<string> = [
  'my name',
  'i am',
  'i like',
  'i prefer',
  'remember',
  'important',
];

export const INTERACTION_IMPORTANCE = 0.7;

/**
 * Events emitted by the control loop.
 */
export interface ControlLoopEvents {
  'loop:start': (input: string) => void;
  'loop:iteration': (iteration: number, decision: Decision, action: ActionRecord) => void;
  'loop:complete': (outcome: LoopOutcome) => void;
}

export interface ControlLoopConfig {
  readonly maxIterations: number;
  readonly persona: Persona;
  /** Long-term memories attached to each observation */
  readonly observationMemoryLimit: number;
}

export const DEFAULT_LOOP_CONFIG: ControlLoopConfig = {
  maxIterations: 10,
  persona: 'personal',
  observationMemoryLimit: 3,
};

export interface ControlLoopOptions {
  readonly coordinator: MemoryCoordinator;
  readonly decisionEngine: DecisionEngine;
  readonly executor: ActionExecutor;
  /** Names offered to the model on each input */
  readonly capabilityNames: () => ReadonlyArray<string>;
  readonly config?: Partial<ControlLoopConfig>;
  readonly logger?: Logger;
}

/**
 * Result of processing one user input.
 */
export interface LoopOutcome {
  readonly response: string;
  readonly iterations: number;
  /** `terminal` when a respond or clarification ended the run */
  readonly terminated: 'terminal' | 'exhausted';
  readonly actions: ReadonlyArray<ActionRecord>;
}

export interface ControlLoopState {
  readonly phase: AgentPhase;
  readonly iteration: number;
  readonly maxIterations: number;
}

/**
 * @example
 * ```typescript
 * const loop = new ControlLoop({ coordinator, decisionEngine, executor, capabilityNames: () => registry.names() });
 * loop.on('loop:iteration', (n, decision) => logger.debug('Iteration', { n, action: decision.actionType }));
 *
 * const outcome = await loop.processUserInput('What is 2+2?');
 * console.log(outcome.response);
 * ```
 */
export class ControlLoop extends EventEmitter<ControlLoopEvents> {
  private readonly coordinator: MemoryCoordinator;
  private readonly decisionEngine: DecisionEngine;
  private readonly executor: ActionExecutor;
  private readonly capabilityNames: () => ReadonlyArray<string>;
  private readonly maxIterations: number;
  private readonly observationMemoryLimit: number;
  private readonly logger: Logger;
  private readonly lifecycle: LifecycleController;

  private persona: Persona;
  private currentIteration: number = 0;

  constructor(options: ControlLoopOptions) {
    super();
    const config = { ...DEFAULT_LOOP_CONFIG, ...options.config };
    this.coordinator = options.coordinator;
    this.decisionEngine = options.decisionEngine;
    this.executor = options.executor;
    this.capabilityNames = options.capabilityNames;
    this.maxIterations = config.maxIterations;
    this.observationMemoryLimit = config.observationMemoryLimit;
    this.persona = config.persona;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'agent.loop' });
    this.lifecycle = createLifecycle();

    this.lifecycle.on('transition', (from, to, reason) => {
      this.logger.debug(`Transition: ${from} → ${to}`, { reason });
    });
  }

  getPersona(): Persona {
    return this.persona;
  }

  setPersona(persona: Persona): void {
    this.persona = persona;
  }

  getState(): ControlLoopState {
    return {
      phase: this.lifecycle.getCurrentPhase(),
      iteration: this.currentIteration,
      maxIterations: this.maxIterations,
    };
  }

  /**
   * Runs one user input through the loop.
   *
   * @throws only when a memory collaborator fails outside the stages that
   * recover on their own; the lifecycle is returned to IDLE first
   */
  async processUserInput(
    input: string,
    callerContext: Readonly<Record<string, unknown>> = {},
  ): Promise<LoopOutcome> {
    this.currentIteration = 0;
    this.emit('loop:start', input);

    try {
      const observation = await this.observe(input, callerContext);
      const { response, actions, terminated } = await this.decideAndAct(observation);

      const finalResponse = response === '' ? EXHAUSTED_RESPONSE : response;
      await this.reflect(input, finalResponse);

      const outcome: LoopOutcome = {
        response: finalResponse,
        iterations: this.currentIteration,
        terminated,
        actions,
      };

      this.lifecycle.transition(AgentPhase.IDLE, 'Turn complete');
      this.logger.info('Input processed', {
        iterations: outcome.iterations,
        terminated: outcome.terminated,
        actionTypes: actions.map(a => a.actionType),
      });
      this.emit('loop:complete', outcome);
      return outcome;
    } finally {
      this.lifecycle.reset('Turn abandoned');
    }
  }

  // ============ Phase Execution Methods ============

  private async observe(
    input: string,
    callerContext: Readonly<Record<string, unknown>>,
  ): Promise<Observation> {
    this.lifecycle.transition(AgentPhase.OBSERVING, 'User input received', { inputLength: input.length });

    await this.coordinator.recordTurn('user', input, { ...callerContext });

    return buildObservation({
      userInput: input,
      callerContext,
      coordinator: this.coordinator,
      persona: this.persona,
      capabilityNames: this.capabilityNames(),
      memoryLimit: this.observationMemoryLimit,
    });
  }

  private async decideAndAct(initial: Observation): Promise<{
    response: string;
    actions: ActionRecord[];
    terminated: LoopOutcome['terminated'];
  }> {
    const actions: ActionRecord[] = [];
    let observation = initial;

    while (this.currentIteration < this.maxIterations) {
      this.currentIteration++;
      this.lifecycle.transition(AgentPhase.DECIDING, `Iteration ${this.currentIteration}`);

      const decision = await this.decisionEngine.decide(observation);

      this.lifecycle.transition(AgentPhase.ACTING, `Executing ${decision.actionType}`);
      const action = await this.executor.execute(decision);
      actions.push(action);

      this.emit('loop:iteration', this.currentIteration, decision, action);

      if (isTerminalAction(action.actionType)) {
        if (!action.success) {
          this.logger.warn('Final action failed, answering with an apology', {
            actionType: action.actionType,
            error: action.error,
          });
          return { response: ERROR_DECISION_MESSAGE, actions, terminated: 'terminal' };
        }
        return { response: action.result, actions, terminated: 'terminal' };
      }

      observation = withLastAction(observation, action, this.currentIteration);
    }

    this.logger.warn('Iteration limit reached without a response', { maxIterations: this.maxIterations });
    return { response: '', actions, terminated: 'exhausted' };
  }

  private async reflect(input: string, response: string): Promise<void> {
    this.lifecycle.transition(AgentPhase.REFLECTING, 'Folding response into memory');

    await this.coordinator.recordTurn('assistant', response);

    if (!shouldStoreInteraction(input)) return;

    try {
      const receipt = await this.coordinator.storeMemory({
        content: `User: ${input}\nAssistant: ${response}`,
        memoryType: 'interaction',
        importance: INTERACTION_IMPORTANCE,
        tags: ['user_interaction', this.persona],
      });
      this.logger.debug('Interaction stored', { id: receipt.id, indexed: receipt.indexed });
    } catch (error) {
      this.logger.warn('Failed to store interaction, keeping the response', {}, error);
    }
  }
}

export function shouldStoreInteraction(input: string): boolean {
  return containsCue(input, INTERACTION_CUES);
}
