/**
 * @fileoverview Base model adapter.
 *
 * A model adapter turns an ordered list of role/content messages into one
 * completion string. Adapters talk HTTP through an injectable `fetch`, so
 * tests can stand a fake transport in for the provider.
 *
 * @module mnemos/providers/base
 */

import type { ChatMessage } from '../types/memory.types.js';
import { describeError } from '../types/core.types.js';
import { ModelAdapterError } from '../types/errors.js';
import type { ModelProviderName } from '../config/settings.js';

/**
 * The slice of a fetch response an adapter reads.
 */
export interface FetchResponseLike {
  readonly ok: boolean;
  readonly status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface FetchRequestInit {
  readonly method: 'POST';
  readonly headers: Record<string, string>;
  readonly body: string;
  readonly signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchRequestInit) => Promise<FetchResponseLike>;

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  readonly provider: ModelProviderName;
  readonly model: string;
  /** Requests without a key fail as unrecoverable adapter errors */
  readonly apiKey?: string | undefined;
  /** Base URL; each adapter has its provider's public endpoint as default */
  readonly endpoint?: string | undefined;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  readonly fetch?: FetchLike | undefined;
}

export interface ModelInfo {
  readonly provider: ModelProviderName;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface ModelAdapter {
  /**
   * @throws ModelAdapterError on transport, timeout, credential or response-shape failure
   */
  generate(messages: ReadonlyArray<ChatMessage>): Promise<string>;

  getModelInfo(): ModelInfo;
}

/**
 * Abstract base class for HTTP model adapters.
 */
export abstract class BaseModelAdapter implements ModelAdapter {
  readonly provider: ModelProviderName;
  protected readonly config: ProviderConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: ProviderConfig) {
    this.provider = config.provider;
    this.config = config;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Human-readable adapter name, used in error messages.
   */
  abstract getName(): string;

  abstract generate(messages: ReadonlyArray<ChatMessage>): Promise<string>;

  getModelInfo(): ModelInfo {
    return {
      provider: this.provider,
      model: this.config.model,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    };
  }

  protected requireApiKey(): string {
    const key = this.config.apiKey;
    if (key === undefined || key === '') {
      throw new ModelAdapterError(`${this.getName()}: no API key configured`, false);
    }
    return key;
  }

  /**
   * POSTs a JSON body and returns the decoded JSON response.
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown,
  ): Promise<unknown> {
    let response: FetchResponseLike;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new ModelAdapterError(
          `${this.getName()}: request timed out after ${this.config.timeoutMs}ms`,
          true,
        );
      }
      throw new ModelAdapterError(`${this.getName()}: network error: ${describeError(error)}`, true);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new ModelAdapterError(
        `${this.getName()}: request failed with status ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
        isRecoverableStatus(response.status),
        response.status,
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ModelAdapterError(`${this.getName()}: invalid JSON response: ${describeError(error)}`, false);
    }
  }
}

/**
 * Rate limiting and server errors are worth retrying; other client errors,
 * credentials included, are not.
 */
export function isRecoverableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
