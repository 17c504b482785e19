/**
 * Adaptive LLM Router — Main Exports
 *
 * @module adaptive-llm-router
 */

// Configuration
export { type Config, type Result, ok, err, isOk, isErr, ConfigSchema } from './types/index.js';
export { loadConfig, parseConfig, getConfig, clearConfigCache, reloadConfig, resolveApiKey } from './config/config.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
export { TTLCache } from './utils/cache.js';
export { withTimeout, TimeoutError, isTimeoutError } from './utils/timeout.js';

// Routing core
export * from './ai/index.js';
