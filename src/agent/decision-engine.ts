/**
 * @fileoverview Decision Engine - the DECIDING phase of the control loop.
 *
 * The model is asked for four labelled lines:
 *
 * ```
 * ACTION_TYPE: use_capability
 * REASONING: The user wants a sum
 * DETAILS: {"tool_name": "calculator", "parameters": {"expression": "2+2"}}
 * CONFIDENCE: 0.9
 * ```
 *
 * Anything the parser cannot make sense of degrades to a `respond` decision;
 * a failing model call degrades to a fixed apology. Neither path throws.
 *
 * @module mnemos/agent/decision-engine
 */

import { clampUnit, createTimestamp, describeError } from '../types/core.types.js';
import { DecisionParseError } from '../types/errors.js';
import { isMemoryType } from '../types/memory.types.js';
import type { ChatMessage } from '../types/memory.types.js';
import type {
  ActionRecord,
  Decision,
  DecisionSource,
  Observation,
  Persona,
} from '../types/decision.types.js';
import {
  AskClarificationDetailsSchema,
  RespondDetailsSchema,
  StoreMemoryDetailsSchema,
  UseCapabilityDetailsSchema,
  isActionType,
} from '../types/decision.types.js';
import type { ModelAdapter } from '../providers/base.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import {
  DECISION_INSTRUCTIONS,
  capabilitySection,
  personaPrompt,
  previousActionSection,
} from './prompts.js';

export const DEFAULT_DECISION_MESSAGE = 'I need more information to help you.';
export const DEFAULT_DECISION_REASONING = 'Default fallback decision';
export const DEFAULT_DECISION_CONFIDENCE = 0.5;

export const ERROR_DECISION_MESSAGE =
  "I'm having trouble processing your request. Could you please rephrase it?";
export const ERROR_DECISION_REASONING = 'Error in decision making process';
export const ERROR_DECISION_CONFIDENCE = 0.3;

export const DEFAULT_STORE_IMPORTANCE = 0.7;

/** Legacy spelling of `use_capability` still produced by older prompts */
const ACTION_ALIASES: Readonly<Record<string, string>> = {
  use_tool: 'use_capability',
};

/**
 * A decoded decision plus the reason it had to fall back, if it did.
 */
export interface InterpretedDecision {
  readonly decision: Decision;
  readonly issue: DecisionParseError | null;
}

interface ScannedLines {
  actionType: string | null;
  reasoning: string;
  details: Record<string, unknown>;
  confidence: number;
  labelled: boolean;
}

/**
 * System prompt for one decision.
 */
export function buildDecisionPrompt(
  persona: Persona,
  capabilityNames: ReadonlyArray<string>,
  lastAction: ActionRecord | null,
  now: Date = new Date(),
): string {
  return [
    personaPrompt(persona, now),
    capabilitySection(capabilityNames),
    DECISION_INSTRUCTIONS,
    lastAction !== null ? previousActionSection(lastAction) : '',
  ]
    .filter(section => section !== '')
    .join('\n\n');
}

export function parseDecision(raw: string): Decision {
  return interpretDecision(raw).decision;
}

/**
 * Decodes model output into a typed decision, reporting why it fell back.
 */
export function interpretDecision(raw: string): InterpretedDecision {
  const scanned = scanLines(raw);
  const timestamp = createTimestamp();

  const base = {
    reasoning: scanned.reasoning,
    confidence: scanned.confidence,
    timestamp,
    rawOutput: raw,
  };

  const fallback = (reason: string): InterpretedDecision => ({
    decision: {
      ...base,
      actionType: 'respond',
      details: { message: raw },
      source: 'fallback',
    },
    issue: new DecisionParseError(reason, raw),
  });

  if (scanned.actionType === null) {
    const message = RespondDetailsSchema.safeParse(scanned.details);
    const source: DecisionSource = scanned.labelled ? 'parsed' : 'fallback';
    return {
      decision: {
        ...base,
        actionType: 'respond',
        details: { message: message.success ? message.data.message ?? '' : DEFAULT_DECISION_MESSAGE },
        source,
      },
      issue: scanned.labelled ? null : new DecisionParseError('no labelled lines in model output', raw),
    };
  }

  const normalized = scanned.actionType.toLowerCase();
  const actionType = ACTION_ALIASES[normalized] ?? normalized;
  if (!isActionType(actionType)) {
    return fallback(`unknown action type '${scanned.actionType}'`);
  }

  switch (actionType) {
    case 'respond': {
      const details = RespondDetailsSchema.safeParse(scanned.details);
      if (!details.success) return fallback('respond details do not match schema');
      return {
        decision: {
          ...base,
          actionType,
          details: { message: details.data.message ?? '' },
          source: 'parsed',
        },
        issue: null,
      };
    }

    case 'use_capability': {
      const details = UseCapabilityDetailsSchema.safeParse(scanned.details);
      if (!details.success) return fallback('use_capability details do not match schema');
      return {
        decision: {
          ...base,
          actionType,
          details: {
            capabilityName: details.data.tool_name ?? details.data.capability_name ?? '',
            parameters: details.data.parameters ?? {},
          },
          source: 'parsed',
        },
        issue: null,
      };
    }

    case 'store_memory': {
      const details = StoreMemoryDetailsSchema.safeParse(scanned.details);
      if (!details.success) return fallback('store_memory details do not match schema');
      const memoryType = details.data.memory_type;
      return {
        decision: {
          ...base,
          actionType,
          details: {
            content: details.data.content ?? details.data.message ?? '',
            memoryType: isMemoryType(memoryType) ? memoryType : 'fact',
            importance: clampUnit(
              details.data.importance ?? DEFAULT_STORE_IMPORTANCE,
              DEFAULT_STORE_IMPORTANCE,
            ),
          },
          source: 'parsed',
        },
        issue: null,
      };
    }

    case 'ask_clarification': {
      const details = AskClarificationDetailsSchema.safeParse(scanned.details);
      if (!details.success) return fallback('ask_clarification details do not match schema');
      return {
        decision: {
          ...base,
          actionType,
          details: { message: details.data.message ?? details.data.question ?? null },
          source: 'parsed',
        },
        issue: null,
      };
    }
  }
}

export interface DecisionEngineOptions {
  readonly model: ModelAdapter;
  readonly logger?: Logger;
}

/**
 * Asks the model what to do next.
 */
export class DecisionEngine {
  private readonly model: ModelAdapter;
  private readonly logger: Logger;

  constructor(options: DecisionEngineOptions) {
    this.model = options.model;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'agent.decision' });
  }

  async decide(observation: Observation): Promise<Decision> {
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: buildDecisionPrompt(
          observation.context.persona,
          observation.context.availableCapabilities,
          observation.lastAction,
        ),
      },
      { role: 'user', content: observation.userInput },
    ];

    let raw: string;
    try {
      raw = await this.model.generate(messages);
    } catch (error) {
      this.logger.error(
        'Model call failed during decision, using fallback',
        { iteration: observation.iteration },
        error,
      );
      return errorDecision(describeError(error));
    }

    const { decision, issue } = interpretDecision(raw);
    if (issue !== null) {
      this.logger.warn(issue.message, { iteration: observation.iteration });
    }
    this.logger.debug('Decision made', {
      actionType: decision.actionType,
      confidence: decision.confidence,
      source: decision.source,
    });
    return decision;
  }
}

/**
 * The scripted decision used when the model cannot be reached.
 */
export function errorDecision(rawOutput: string = ''): Decision {
  return {
    actionType: 'respond',
    details: { message: ERROR_DECISION_MESSAGE },
    reasoning: ERROR_DECISION_REASONING,
    confidence: ERROR_DECISION_CONFIDENCE,
    timestamp: createTimestamp(),
    source: 'error',
    rawOutput,
  };
}

// ============ Private Helpers ============

function scanLines(raw: string): ScannedLines {
  const scanned: ScannedLines = {
    actionType: null,
    reasoning: DEFAULT_DECISION_REASONING,
    details: { message: DEFAULT_DECISION_MESSAGE },
    confidence: DEFAULT_DECISION_CONFIDENCE,
    labelled: false,
  };

  for (const line of raw.trim().split('\n').map(l => l.trim())) {
    if (line.startsWith('ACTION_TYPE:')) {
      scanned.actionType = valueOf(line);
      scanned.labelled = true;
    } else if (line.startsWith('REASONING:')) {
      scanned.reasoning = valueOf(line);
      scanned.labelled = true;
    } else if (line.startsWith('DETAILS:')) {
      scanned.details = parseDetails(valueOf(line));
      scanned.labelled = true;
    } else if (line.startsWith('CONFIDENCE:')) {
      const text = valueOf(line);
      const value = Number(text);
      if (text !== '' && Number.isFinite(value)) {
        scanned.confidence = clampUnit(value);
      }
      scanned.labelled = true;
    }
  }

  return scanned;
}

function valueOf(line: string): string {
  return line.slice(line.indexOf(':') + 1).trim();
}

/**
 * JSON objects are taken as-is; any other text becomes the message.
 */
function parseDetails(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { message: text };
  }
  return isPlainObject(parsed) ? parsed : { message: text };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
