/**
 * @fileoverview Structured logger.
 *
 * Leveled, JSON-serializable log entries written to pluggable transports.
 * Loggers are passed explicitly to every component; `child()` narrows the
 * module name and binds a session id.
 *
 * @module mnemos/observability/logger
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;
  /** Component that wrote the entry, e.g. `memory.coordinator` */
  readonly module: string;
  readonly sessionId: string | null;
  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly durationMs: number | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
}

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly sessionId: string | null;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.DEBUG]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
  [Severity.FATAL]: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'mnemos',
  transports: [],
  sessionId: null,
};

/**
 * Writes formatted lines to the console.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = true) {}

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}`;
    const hasData = Object.keys(entry.data).length > 0;

    switch (entry.level) {
      case Severity.DEBUG:
        if (hasData) console.debug(line, entry.data);
        else console.debug(line);
        break;
      case Severity.INFO:
        if (hasData) console.info(line, entry.data);
        else console.info(line);
        break;
      case Severity.WARN:
        if (hasData) console.warn(line, entry.data);
        else console.warn(line);
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(line, entry.data, entry.error ?? '');
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const duration = entry.durationMs !== null ? ` (${entry.durationMs}ms)` : '';

    if (this.useColors) {
      const color = LEVEL_COLORS[entry.level];
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m${duration}`;
    }

    return `${timestamp} ${level} [${entry.module}]${duration}`;
  }
}

const LEVEL_COLORS: Record<Severity, string> = {
  [Severity.DEBUG]: '\x1b[90m',
  [Severity.INFO]: '\x1b[32m',
  [Severity.WARN]: '\x1b[33m',
  [Severity.ERROR]: '\x1b[31m',
  [Severity.FATAL]: '\x1b[35m',
};

/**
 * Keeps the most recent entries in memory, for tests and debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }

  findByModule(module: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.module === module);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * @example
 * ```typescript
 * const logger = createLogger('agent', { minLevel: Severity.DEBUG });
 * const loopLogger = logger.child({ module: 'agent.loop', sessionId });
 * loopLogger.info('Iteration complete', { iteration: 2 });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config =
      merged.transports.length === 0
        ? { ...merged, transports: [new ConsoleTransport()] }
        : merged;
  }

  get module(): string {
    return this.config.module;
  }

  child(context: { module?: string; sessionId?: string }): Logger {
    return new Logger({
      ...this.config,
      module: context.module ?? this.config.module,
      sessionId: context.sessionId ?? this.config.sessionId,
    });
  }

  isEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.WARN, message, data, error);
  }

  error(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Times an async operation and logs its duration. Failures are logged at
   * ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.log(level, `${label} completed`, undefined, undefined, Date.now() - start);
      return result;
    } catch (error) {
      this.log(Severity.ERROR, `${label} failed`, undefined, error, Date.now() - start);
      throw error;
    }
  }

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      sessionId: this.config.sessionId,
      data: data ?? {},
      error: error === undefined ? null : formatError(error),
      durationMs: durationMs ?? null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error), stack: undefined };
}

/**
 * Parses a level name such as `"info"` or `"WARN"`.
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  for (const level of Object.values(Severity)) {
    if (level === upper) return level;
  }
  return null;
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * A logger that discards everything. Default for components constructed
 * without one.
 */
export function createSilentLogger(module: string = 'mnemos'): Logger {
  return new Logger({ module, transports: [{ name: 'silent', write: () => undefined }] });
}
