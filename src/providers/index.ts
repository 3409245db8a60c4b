/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './openai.js';
export * from './gemini.js';

import { ConfigurationError } from '../types/errors.js';
import { SUPPORTED_PROVIDERS, isSupportedProvider, type ModelSettings } from '../config/settings.js';
import type { FetchLike, ModelAdapter } from './base.js';
import { OpenAIChatAdapter, OPENAI_DEFAULT_MODEL } from './openai.js';
import { GeminiChatAdapter, GEMINI_DEFAULT_MODEL } from './gemini.js';

/**
 * Create a model adapter for the configured provider.
 *
 * @throws ConfigurationError for an unsupported provider
 */
export function createModelAdapter(settings: ModelSettings, fetchImpl?: FetchLike): ModelAdapter {
  const provider = settings.provider;
  if (!isSupportedProvider(provider)) {
    throw new ConfigurationError(
      `Unsupported model provider: ${provider}. Supported providers: ${SUPPORTED_PROVIDERS.join(', ')}`,
    );
  }

  const common = {
    apiKey: settings.apiKey,
    endpoint: settings.endpoint,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    timeoutMs: settings.timeoutMs,
    fetch: fetchImpl,
  };

  switch (provider) {
    case 'openai':
      return new OpenAIChatAdapter({ ...common, model: settings.model ?? OPENAI_DEFAULT_MODEL });

    case 'gemini':
      return new GeminiChatAdapter({ ...common, model: settings.model ?? GEMINI_DEFAULT_MODEL });
  }
}
