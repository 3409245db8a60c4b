/**
 * @fileoverview Google Gemini adapter.
 *
 * System messages become the request's system instruction; user and assistant
 * turns map onto Gemini's `user` and `model` roles.
 *
 * @see https://ai.google.dev/api/generate-content
 */

import { z } from 'zod';
import type { ChatMessage } from '../types/memory.types.js';
import { ModelAdapterError } from '../types/errors.js';
import { BaseModelAdapter, trimTrailingSlash, type ProviderConfig } from './base.js';

export const GEMINI_DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta';
export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';

interface GeminiPart {
  text: string;
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

/**
 * Gemini generateContent request body.
 */
export interface GeminiRequest {
  systemInstruction?: { parts: GeminiPart[] };
  contents: GeminiContent[];
  generationConfig: {
    temperature: number;
    maxOutputTokens: number;
  };
}

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
      }),
    )
    .min(1),
});

export class GeminiChatAdapter extends BaseModelAdapter {
  constructor(config: Omit<ProviderConfig, 'provider'>) {
    super({ ...config, provider: 'gemini' });
  }

  getName(): string {
    return 'Gemini';
  }

  createRequest(messages: ReadonlyArray<ChatMessage>): GeminiRequest {
    const system = messages.filter(m => m.role === 'system').map(m => m.content);
    const contents: GeminiContent[] = messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    return {
      ...(system.length > 0 ? { systemInstruction: { parts: [{ text: system.join('\n\n') }] } } : {}),
      contents,
      generationConfig: {
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxTokens,
      },
    };
  }

  async generate(messages: ReadonlyArray<ChatMessage>): Promise<string> {
    const apiKey = this.requireApiKey();
    const endpoint = trimTrailingSlash(this.config.endpoint ?? GEMINI_DEFAULT_ENDPOINT);

    const payload = await this.postJson(
      `${endpoint}/models/${encodeURIComponent(this.config.model)}:generateContent`,
      { 'x-goog-api-key': apiKey },
      this.createRequest(messages),
    );

    const parsed = GenerateContentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelAdapterError(`${this.getName()}: unexpected response shape`, false);
    }
    return parsed.data.candidates[0].content.parts.map(p => p.text ?? '').join('');
  }
}
