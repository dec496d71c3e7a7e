import { createConfiguredLogger, loadGraphConfig, type GraphConfig } from "./config/graphConfig.js";
import { Graph } from "./graph/graph.js";
import type { GraphMode } from "./graph/schemas.js";
import type { StructuredLogger } from "./logger.js";

export * from "./graph/index.js";
export * from "./logger.js";
export * from "./config/graphConfig.js";

export interface CreateGraphOptions {
  readonly mode?: GraphMode;
  readonly logger?: StructuredLogger;
  /** Configuration to fall back on; read from the environment when omitted. */
  readonly config?: GraphConfig;
}

/**
 * Builds a graph, taking the mode and logger from the configuration when the
 * caller does not provide them.
 */
export function createGraph<TValue = unknown>(options: CreateGraphOptions = {}): Graph<TValue> {
  const config = options.config ?? loadGraphConfig();
  const logger = options.logger ?? createConfiguredLogger(config);
  return new Graph<TValue>(options.mode ?? config.defaultMode, logger ? { logger } : {});
}
