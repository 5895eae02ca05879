export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export transport, SSE and serialization utilities
export * from "./utils/index.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Re-export streaming decoders
export * from "./streaming/index.js";

// Configuration and logging
export {
  engineConfigSchema,
  DEFAULT_CONFIG,
  MAX_TIMEOUT_MS,
  resolveConfig,
  configFromEnv,
} from "./config.js";
export type {
  EngineConfig,
  EngineConfigOverrides,
  ProviderSettings,
  BuiltinProvider,
} from "./config.js";
export { makeLogger, makeNoopLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Response cache
export { ResponseCache, cacheKey } from "./cache.js";

// Re-export Dispatcher class and related types
export { Dispatcher } from "./dispatcher.js";
export type {
  DispatcherConfig,
  DispatcherExtras,
  DispatcherStats,
} from "./dispatcher.js";

// ---------------------------------------------------------------------------
// Module-level default dispatcher
// ---------------------------------------------------------------------------

import { configFromEnv } from "./config.js";
import { Dispatcher } from "./dispatcher.js";

let defaultDispatcher: Dispatcher | undefined;

/**
 * Set the module-level default Dispatcher instance.
 */
export function setDefaultDispatcher(dispatcher: Dispatcher): void {
  defaultDispatcher = dispatcher;
}

/**
 * Get the module-level default Dispatcher instance.
 *
 * If none has been set, builds one from the environment and caches it.
 */
export function getDefaultDispatcher(): Dispatcher {
  if (!defaultDispatcher) {
    defaultDispatcher = Dispatcher.fromConfig(configFromEnv());
  }
  return defaultDispatcher;
}

/**
 * Drop the module-level default, cancelling anything it still has running.
 */
export function resetDefaultDispatcher(): void {
  defaultDispatcher?.cancelAll();
  defaultDispatcher = undefined;
}
