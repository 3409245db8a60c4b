/**
 * @fileoverview Agent Lifecycle Controller - Manages control-loop phase transitions.
 *
 * The lifecycle controller enforces the loop's state machine, ensuring
 * valid transitions and providing hooks for observability. It is the
 * authoritative source for "what phase is the agent in?"
 *
 * State Machine:
 * ```
 *   IDLE ──► OBSERVING ──► DECIDING ──► ACTING ──► REFLECTING ──► IDLE
 *                              ▲           │
 *                              └───────────┘
 *                         (non-terminal action)
 * ```
 *
 * @module mnemos/agent/lifecycle
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { AgentPhase, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'transition': (from: AgentPhase, to: AgentPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

/**
 * Metadata associated with a phase.
 */
export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly stepNumber: number;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Error during lifecycle operations.
 */
export interface LifecycleError {
  readonly code: 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: AgentPhase;
  readonly attemptedTransition: AgentPhase;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly sessionId: UniqueId;
  readonly currentPhase: AgentPhase;
  readonly previousPhase: AgentPhase | null;
  readonly stepNumber: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
}

/**
 * Entry in the phase history.
 */
export interface PhaseHistoryEntry {
  readonly phase: AgentPhase;
  readonly stepNumber: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

export interface LifecycleOptions {
  readonly sessionId?: UniqueId;
  /** Oldest history entries are dropped beyond this many */
  readonly maxHistory?: number;
}

/**
 * Valid transitions from each phase.
 * This is the authoritative definition of the state machine.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentPhase, ReadonlyArray<AgentPhase>> = new Map([
  [AgentPhase.IDLE, [AgentPhase.OBSERVING]],
  [AgentPhase.OBSERVING, [AgentPhase.DECIDING]],
  [AgentPhase.DECIDING, [AgentPhase.ACTING]],
  [AgentPhase.ACTING, [AgentPhase.DECIDING, AgentPhase.REFLECTING]],
  [AgentPhase.REFLECTING, [AgentPhase.IDLE]],
]);

const DEFAULT_MAX_HISTORY = 200;

/**
 * Manages control-loop phases.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController();
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`Transition: ${from} → ${to}`, { reason });
 * });
 *
 * lifecycle.transition(AgentPhase.OBSERVING, 'User input received');
 * lifecycle.transition(AgentPhase.DECIDING, 'Observation ready');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private readonly sessionId: UniqueId;
  private readonly maxHistory: number;
  private currentPhase: AgentPhase;
  private previousPhase: AgentPhase | null;
  private stepNumber: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry | null;

  constructor(options: LifecycleOptions = {}) {
    super();
    this.sessionId = options.sessionId ?? createUniqueId(uuidv4());
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.currentPhase = AgentPhase.IDLE;
    this.previousPhase = null;
    this.stepNumber = 0;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = null;

    this.enterPhase(AgentPhase.IDLE, 'Session initialized');
  }

  getState(): LifecycleState {
    return {
      sessionId: this.sessionId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      stepNumber: this.stepNumber,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
    };
  }

  getCurrentPhase(): AgentPhase {
    return this.currentPhase;
  }

  getStepNumber(): number {
    return this.stepNumber;
  }

  canTransition(targetPhase: AgentPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Transitions to a new phase.
   *
   * @throws Error if the transition is not part of the state machine
   */
  transition(
    targetPhase: AgentPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    if (!this.canTransition(targetPhase)) {
      const error: LifecycleError = {
        code: 'INVALID_TRANSITION',
        message: `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`,
        phase: this.currentPhase,
        attemptedTransition: targetPhase,
      };
      this.emit('error', error);
      throw new Error(error.message);
    }

    this.moveTo(targetPhase, reason, data);
  }

  /**
   * Returns to IDLE from any phase. Used when a turn is abandoned midway.
   */
  reset(reason: string): void {
    if (this.currentPhase === AgentPhase.IDLE) {
      return;
    }
    this.moveTo(AgentPhase.IDLE, reason, { forced: true });
  }

  // ============ Private Methods ============

  private moveTo(targetPhase: AgentPhase, reason: string, data: Record<string, unknown>): void {
    this.exitPhase();

    this.previousPhase = this.currentPhase;
    this.currentPhase = targetPhase;
    this.lastTransitionAt = createTimestamp();
    this.stepNumber++;

    this.emit('transition', this.previousPhase, this.currentPhase, reason);
    this.enterPhase(targetPhase, reason, data);
  }

  private enterPhase(
    phase: AgentPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    const now = createTimestamp();

    this.currentPhaseEntry = {
      phase,
      stepNumber: this.stepNumber,
      enteredAt: now,
      exitedAt: null,
      reason,
    };

    const metadata: PhaseMetadata = {
      enteredAt: now,
      stepNumber: this.stepNumber,
      reason,
      data,
    };

    this.emit('phase:enter', phase, metadata);
  }

  private exitPhase(): void {
    if (this.currentPhaseEntry) {
      const completedEntry: PhaseHistoryEntry = {
        ...this.currentPhaseEntry,
        exitedAt: createTimestamp(),
      };

      this.phaseHistory.push(completedEntry);
      if (this.phaseHistory.length > this.maxHistory) {
        this.phaseHistory.shift();
      }

      const metadata: PhaseMetadata = {
        enteredAt: this.currentPhaseEntry.enteredAt,
        stepNumber: this.currentPhaseEntry.stepNumber,
        reason: this.currentPhaseEntry.reason,
        data: {},
      };

      this.emit('phase:exit', this.currentPhase, metadata);
      this.currentPhaseEntry = null;
    }
  }
}

export function createLifecycle(options?: LifecycleOptions): LifecycleController {
  return new LifecycleController(options);
}
