/**
 * @fileoverview Agent settings.
 *
 * One resolved {@link AgentSettings} object is built when an assistant is
 * constructed and handed to every component that needs a value from it.
 * There is no module-level settings instance.
 *
 * @module mnemos/config/settings
 */

import { z } from 'zod';
import { Severity } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';
import { PersonaSchema } from '../types/decision.types.js';
import { parseSeverity } from '../observability/logger.js';

export const SUPPORTED_PROVIDERS = ['openai', 'gemini'] as const;

export type ModelProviderName = (typeof SUPPORTED_PROVIDERS)[number];

const unit = z.number().min(0).max(1);

export const ConsolidationWeightsSchema = z.object({
  baseScore: unit.default(0.5),
  lengthBonus: unit.default(0.1),
  /** Chunks longer than this many messages get `lengthBonus` */
  lengthThreshold: z.number().int().nonnegative().default(3),
  questionBonus: unit.default(0.1),
  personalBonus: unit.default(0.2),
  detailBonus: unit.default(0.1),
  /** Average message length (characters) above which `detailBonus` applies */
  detailLengthThreshold: z.number().nonnegative().default(100),
  /** Chunks must score strictly above this to be persisted */
  persistThreshold: unit.default(0.5),
  maxChunkSize: z.number().int().positive().default(5),
  minChunkBeforeAssistantSplit: z.number().int().positive().default(2),
});

export type ConsolidationWeights = z.infer<typeof ConsolidationWeightsSchema>;

export const MemorySettingsSchema = z.object({
  shortTermCapacity: z.number().int().positive().default(20),
  consolidationThreshold: z.number().int().positive().default(10),
  /** How many recent messages seed the relevant-memory query */
  relevantWindow: z.number().int().positive().default(3),
  /** Minimum importance of records injected into the decision context */
  relevanceFloor: unit.default(0.6),
  relevantLimit: z.number().int().positive().default(3),
  /** Memories attached to each observation */
  observationMemoryLimit: z.number().int().nonnegative().default(3),
  /** SQLite file for the durable store; omitted means in-process storage */
  dbPath: z.string().min(1).optional(),
  weights: ConsolidationWeightsSchema.default({}),
});

export type MemorySettings = z.infer<typeof MemorySettingsSchema>;

export const ModelSettingsSchema = z.object({
  provider: z.string().default('openai'),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(2000),
  timeoutMs: z.number().int().positive().default(60_000),
});

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

export const AgentSettingsSchema = z.object({
  agentName: z.string().min(1).default('PersonalAssistant'),
  persona: z.string().default('personal'),
  maxIterations: z.number().int().positive().default(10),
  /** Respond messages shorter than this are synthesised by the model */
  minResponseLength: z.number().int().nonnegative().default(10),
  capabilityTimeoutMs: z.number().int().positive().default(30_000),
  logLevel: z.nativeEnum(Severity).default(Severity.INFO),
  model: ModelSettingsSchema.default({}),
  memory: MemorySettingsSchema.default({}),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

export type AgentSettingsInput = z.input<typeof AgentSettingsSchema>;

export const DEFAULT_SETTINGS: Readonly<AgentSettings> = AgentSettingsSchema.parse({});

/**
 * Validates settings over the defaults.
 *
 * @throws ConfigurationError listing every schema issue, or naming an
 * unsupported persona or provider
 */
export function resolveSettings(input: AgentSettingsInput = {}): AgentSettings {
  const parsed = AgentSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigurationError(`invalid settings (${issues.join('; ')})`, issues);
  }

  const settings = parsed.data;

  if (!PersonaSchema.safeParse(settings.persona).success) {
    throw new ConfigurationError(
      `Invalid persona: ${settings.persona}. Valid personas: ${PersonaSchema.options.join(', ')}`,
    );
  }

  if (!isSupportedProvider(settings.model.provider)) {
    throw new ConfigurationError(
      `Unsupported model provider: ${settings.model.provider}. Supported providers: ${SUPPORTED_PROVIDERS.join(', ')}`,
    );
  }

  return settings;
}

export function isSupportedProvider(value: string): value is ModelProviderName {
  return (SUPPORTED_PROVIDERS as ReadonlyArray<string>).includes(value);
}

/**
 * Reads settings overrides from environment variables.
 *
 * | Variable                         | Setting                        |
 * |----------------------------------|--------------------------------|
 * | MNEMOS_AGENT_NAME                | agentName                      |
 * | MNEMOS_PERSONA                   | persona                        |
 * | MNEMOS_MODEL_PROVIDER            | model.provider                 |
 * | MNEMOS_MODEL                     | model.model                    |
 * | MNEMOS_MAX_ITERATIONS            | maxIterations                  |
 * | MNEMOS_LOG_LEVEL                 | logLevel                       |
 * | MNEMOS_DB_PATH                   | memory.dbPath                  |
 * | OPENAI_API_KEY / GOOGLE_API_KEY  | model.apiKey, per provider     |
 *
 * Numeric variables that do not parse are passed through as NaN and rejected
 * by {@link resolveSettings}.
 */
export function settingsFromEnv(env: Readonly<Record<string, string | undefined>>): AgentSettingsInput {
  const provider = env['MNEMOS_MODEL_PROVIDER'] ?? DEFAULT_SETTINGS.model.provider;
  const apiKey = provider === 'gemini' ? env['GOOGLE_API_KEY'] : env['OPENAI_API_KEY'];
  const rawLogLevel = env['MNEMOS_LOG_LEVEL'];
  const logLevel = rawLogLevel !== undefined ? parseSeverity(rawLogLevel) : null;
  const maxIterations = env['MNEMOS_MAX_ITERATIONS'];

  const input: AgentSettingsInput = {
    model: {
      provider,
      ...(env['MNEMOS_MODEL'] !== undefined ? { model: env['MNEMOS_MODEL'] } : {}),
      ...(apiKey !== undefined && apiKey !== '' ? { apiKey } : {}),
    },
    memory: env['MNEMOS_DB_PATH'] !== undefined ? { dbPath: env['MNEMOS_DB_PATH'] } : {},
  };

  return {
    ...input,
    ...(env['MNEMOS_AGENT_NAME'] !== undefined ? { agentName: env['MNEMOS_AGENT_NAME'] } : {}),
    ...(env['MNEMOS_PERSONA'] !== undefined ? { persona: env['MNEMOS_PERSONA'] } : {}),
    ...(maxIterations !== undefined ? { maxIterations: Number(maxIterations) } : {}),
    ...(logLevel !== null ? { logLevel } : {}),
  };
}
