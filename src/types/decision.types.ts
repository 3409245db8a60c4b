/**
 * @fileoverview Observation, decision and action types for the control loop.
 *
 * A decision is a tagged union keyed by `actionType`. Model output is decoded
 * into one of the four variants through the versioned DETAILS schemas below;
 * output that cannot be decoded becomes a `respond` decision whose `source`
 * is `fallback`.
 *
 * @module mnemos/types/decision
 */

import { z } from 'zod';
import type { Timestamp } from './core.types.js';
import type {
  ChatMessage,
  MemorySearchHit,
  MemoryType,
  ShortTermSummary,
} from './memory.types.js';

export const PERSONAS = ['personal', 'research', 'technical'] as const;

export type Persona = (typeof PERSONAS)[number];

export const PersonaSchema = z.enum(PERSONAS);

export function isPersona(value: string): value is Persona {
  return (PERSONAS as ReadonlyArray<string>).includes(value);
}

export const ACTION_TYPES = [
  'use_capability',
  'respond',
  'store_memory',
  'ask_clarification',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export function isActionType(value: string): value is ActionType {
  return (ACTION_TYPES as ReadonlyArray<string>).includes(value);
}

/**
 * Actions that end an iteration run with a response for the user.
 */
export function isTerminalAction(actionType: ActionType): boolean {
  return actionType === 'respond' || actionType === 'ask_clarification';
}

/** Version of the DETAILS payload schemas below. */
export const DECISION_SCHEMA_VERSION = 1;

/**
 * How a decision came about.
 * - parsed: decoded from the model output
 * - fallback: the output was missing or malformed and defaults were used
 * - error: the model adapter failed and the scripted fallback was used
 */
export type DecisionSource = 'parsed' | 'fallback' | 'error';

interface DecisionBase {
  readonly reasoning: string;
  /** Always within [0, 1] */
  readonly confidence: number;
  readonly timestamp: Timestamp;
  readonly source: DecisionSource;
  readonly rawOutput: string;
}

export interface RespondDecision extends DecisionBase {
  readonly actionType: 'respond';
  readonly details: { readonly message: string };
}

export interface UseCapabilityDecision extends DecisionBase {
  readonly actionType: 'use_capability';
  readonly details: {
    readonly capabilityName: string;
    readonly parameters: Readonly<Record<string, unknown>>;
  };
}

export interface StoreMemoryDecision extends DecisionBase {
  readonly actionType: 'store_memory';
  readonly details: {
    readonly content: string;
    readonly memoryType: MemoryType;
    readonly importance: number;
  };
}

export interface AskClarificationDecision extends DecisionBase {
  readonly actionType: 'ask_clarification';
  readonly details: { readonly message: string | null };
}

export type Decision =
  | RespondDecision
  | UseCapabilityDecision
  | StoreMemoryDecision
  | AskClarificationDecision;

/**
 * DETAILS payload for `respond`. A missing message asks the executor to
 * synthesise one.
 */
export const RespondDetailsSchema = z
  .object({
    message: z.string().optional(),
  })
  .passthrough();

/**
 * DETAILS payload for `use_capability`. `tool_name` is the name the model
 * prompt uses; `capability_name` is accepted as well.
 */
export const UseCapabilityDetailsSchema = z
  .object({
    tool_name: z.string().optional(),
    capability_name: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const StoreMemoryDetailsSchema = z
  .object({
    content: z.string().optional(),
    message: z.string().optional(),
    memory_type: z.string().optional(),
    importance: z.number().optional(),
  })
  .passthrough();

export const AskClarificationDetailsSchema = z
  .object({
    message: z.string().optional(),
    question: z.string().optional(),
  })
  .passthrough();

/**
 * Everything the decision stage sees for one user input.
 */
export interface ObservationContext {
  readonly conversationHistory: ReadonlyArray<ChatMessage>;
  readonly availableCapabilities: ReadonlyArray<string>;
  readonly persona: Persona;
  readonly sessionInfo: ShortTermSummary;
  readonly relevantMemories: ReadonlyArray<MemorySearchHit>;
  /** Caller-supplied context passed to `chat` */
  readonly extras: Readonly<Record<string, unknown>>;
}

export interface Observation {
  readonly userInput: string;
  readonly context: ObservationContext;
  readonly timestamp: Timestamp;
  /** Iteration that produced `lastAction`; 0 before the first decision */
  readonly iteration: number;
  /** Outcome of the previous iteration, carried into the next decision */
  readonly lastAction: ActionRecord | null;
}

/**
 * The executed form of a decision. The only state carried between iterations.
 */
export interface ActionRecord {
  readonly actionType: ActionType;
  readonly parameters: Readonly<Record<string, unknown>>;
  /** Text rendering of the outcome: the reply, a confirmation or a capability result */
  readonly result: string;
  /** Raw capability payload, null for other actions */
  readonly data: unknown;
  readonly success: boolean;
  readonly error: string | null;
  readonly timestamp: Timestamp;
  readonly executionTimeMs: number;
}
