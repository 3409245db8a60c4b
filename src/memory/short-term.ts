/**
 * @fileoverview Short-term memory - the bounded message buffer of a session.
 *
 * Messages are kept in arrival order in a fixed-capacity ring. Appending to a
 * full buffer overwrites the oldest message, so the buffer never holds more
 * than `capacity` messages. A small keyed context map rides alongside.
 *
 * @module mnemos/memory/short-term
 */

import { z } from 'zod';
import type { Timestamp } from '../types/core.types.js';
import { createTimestamp } from '../types/core.types.js';
import { ConfigurationError } from '../types/errors.js';
import type {
  ChatMessage,
  Message,
  MessageRole,
  ShortTermSummary,
} from '../types/memory.types.js';

/**
 * Serializable form of a short-term store.
 */
export interface ShortTermSnapshot {
  readonly messages: ReadonlyArray<Message>;
  readonly context: Readonly<Record<string, unknown>>;
  readonly sessionStartedAt: number;
  readonly capacity: number;
}

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
  timestamp: z.number(),
  metadata: z.record(z.unknown()).default({}),
});

const SnapshotSchema = z.object({
  messages: z.array(MessageSchema),
  context: z.record(z.unknown()).default({}),
  sessionStartedAt: z.number(),
  capacity: z.number().int().positive().optional(),
});

export class ShortTermStore {
  readonly capacity: number;

  private readonly ring: Array<Message | undefined>;
  /** Index of the oldest message */
  private head = 0;
  private count = 0;
  private readonly context = new Map<string, unknown>();
  private sessionStartedAt: Timestamp;

  constructor(capacity: number = 20) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError(`short-term capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.ring = new Array<Message | undefined>(capacity).fill(undefined);
    this.sessionStartedAt = createTimestamp();
  }

  get size(): number {
    return this.count;
  }

  /**
   * Appends a message, evicting the oldest when the buffer is full.
   */
  append(message: Message): void {
    const tail = (this.head + this.count) % this.capacity;
    this.ring[tail] = message;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  add(role: MessageRole, content: string, metadata: Record<string, unknown> = {}): Message {
    const message: Message = {
      role,
      content,
      timestamp: createTimestamp(),
      metadata: { ...metadata },
    };
    this.append(message);
    return message;
  }

  /**
   * The last `n` messages in arrival order.
   */
  recent(n: number): Message[] {
    if (n <= 0) return [];
    const take = Math.min(n, this.count);
    const result: Message[] = [];
    for (let i = this.count - take; i < this.count; i++) {
      const message = this.ring[(this.head + i) % this.capacity];
      if (message !== undefined) result.push(message);
    }
    return result;
  }

  all(): Message[] {
    return this.recent(this.count);
  }

  /**
   * The buffer as role/content pairs for model input.
   */
  asContext(): ChatMessage[] {
    return this.all().map(({ role, content }) => ({ role, content }));
  }

  setContext(key: string, value: unknown): void {
    this.context.set(key, value);
  }

  getContext(key: string): unknown {
    return this.context.get(key);
  }

  contextSnapshot(): Record<string, unknown> {
    return Object.fromEntries(this.context);
  }

  /**
   * Empties the buffer and the context map and restarts the session clock.
   */
  clear(): void {
    this.ring.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.context.clear();
    this.sessionStartedAt = createTimestamp();
  }

  summary(): ShortTermSummary {
    return {
      messageCount: this.count,
      capacity: this.capacity,
      contextKeys: [...this.context.keys()],
      sessionDurationMs: Date.now() - this.sessionStartedAt,
      sessionStartedAt: this.sessionStartedAt,
    };
  }

  export(): ShortTermSnapshot {
    return {
      messages: this.all(),
      context: this.contextSnapshot(),
      sessionStartedAt: this.sessionStartedAt,
      capacity: this.capacity,
    };
  }

  /**
   * Replaces the buffer with a snapshot. Only the newest `capacity` messages
   * of the snapshot are kept.
   *
   * @throws ZodError when the snapshot is malformed
   */
  import(snapshot: unknown): void {
    const parsed = SnapshotSchema.parse(snapshot);

    this.ring.fill(undefined);
    this.head = 0;
    this.count = 0;
    for (const message of parsed.messages) {
      this.append({
        role: message.role,
        content: message.content,
        timestamp: createTimestamp(message.timestamp),
        metadata: message.metadata,
      });
    }

    this.context.clear();
    for (const [key, value] of Object.entries(parsed.context)) {
      this.context.set(key, value);
    }
    this.sessionStartedAt = createTimestamp(parsed.sessionStartedAt);
  }
}
