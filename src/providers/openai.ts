/**
 * @fileoverview OpenAI chat completions adapter.
 *
 * Also works against OpenAI-compatible APIs (Azure OpenAI, local servers)
 * through a custom endpoint.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import { z } from 'zod';
import type { ChatMessage } from '../types/memory.types.js';
import { ModelAdapterError } from '../types/errors.js';
import { BaseModelAdapter, trimTrailingSlash, type ProviderConfig } from './base.js';

export const OPENAI_DEFAULT_ENDPOINT = 'https://api.openai.com/v1';
export const OPENAI_DEFAULT_MODEL = 'gpt-4';

/**
 * OpenAI Chat Completion Request.
 */
export interface OpenAIChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  temperature: number;
  max_tokens: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export class OpenAIChatAdapter extends BaseModelAdapter {
  constructor(config: Omit<ProviderConfig, 'provider'>) {
    super({ ...config, provider: 'openai' });
  }

  getName(): string {
    return 'OpenAI';
  }

  createChatRequest(messages: ReadonlyArray<ChatMessage>): OpenAIChatRequest {
    return {
      model: this.config.model,
      messages: messages.map(({ role, content }) => ({ role, content })),
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    };
  }

  async generate(messages: ReadonlyArray<ChatMessage>): Promise<string> {
    const apiKey = this.requireApiKey();
    const endpoint = trimTrailingSlash(this.config.endpoint ?? OPENAI_DEFAULT_ENDPOINT);

    const payload = await this.postJson(
      `${endpoint}/chat/completions`,
      { Authorization: `Bearer ${apiKey}` },
      this.createChatRequest(messages),
    );

    const parsed = ChatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelAdapterError(`${this.getName()}: unexpected response shape`, false);
    }
    return parsed.data.choices[0].message.content ?? '';
  }
}
