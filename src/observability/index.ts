/**
 * @fileoverview Observability module public exports.
 *
 * @module mnemos/observability
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';
