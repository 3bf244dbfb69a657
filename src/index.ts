/**
 * Content preference engine.
 *
 * Topic interests and blocklist per viewer profile, persisted atomically,
 * applied as a deterministic keyword filter over a content feed.
 */

export * from './types/index.js';
export * from './core/errors.js';
export { createLogger, type LoggerConfig } from './core/logger.js';
export { SerialQueue } from './core/serial-queue.js';
export * from './config/index.js';
export * from './taxonomy/index.js';
export * from './storage/index.js';
export * from './registry/index.js';
export * from './filter/index.js';
export * from './feed/index.js';
export {
  createPreferenceEngine,
  createPreferenceEngineAsync,
  type PreferenceEngine,
  type PreferenceEngineOverrides,
} from './engine.js';
