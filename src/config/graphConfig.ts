import { GRAPH_MODES, type GraphMode } from "../graph/schemas.js";
import { LOG_LEVELS, StructuredLogger, type LogLevel, type LoggerOptions } from "../logger.js";
import { readEnum, readOptionalEnum, readOptionalString, type EnvSource } from "./env.js";

/** Library settings resolved from the environment. */
export interface GraphConfig {
  /** Mode used by `createGraph` when the caller does not pick one. */
  readonly defaultMode: GraphMode;
  /** Minimum level of the default logger; `null` keeps graphs silent. */
  readonly logLevel: LogLevel | null;
  readonly logFile: string | null;
}

/**
 * Resolves the configuration from `GRAPH_DEFAULT_MODE`, `GRAPH_LOG_LEVEL` and
 * `GRAPH_LOG_FILE`. Unrecognised literals fall back to the defaults.
 */
export function loadGraphConfig(env: EnvSource = process.env): GraphConfig {
  return {
    defaultMode: readEnum("GRAPH_DEFAULT_MODE", GRAPH_MODES, "directed", env),
    logLevel: readOptionalEnum("GRAPH_LOG_LEVEL", LOG_LEVELS, env) ?? null,
    logFile: readOptionalString("GRAPH_LOG_FILE", env) ?? null,
  };
}

/**
 * Builds the logger described by {@link config}, or `undefined` when logging
 * is disabled. {@link overrides} lets hosts redirect the output.
 */
export function createConfiguredLogger(
  config: GraphConfig,
  overrides: Omit<LoggerOptions, "level" | "logFile"> = {},
): StructuredLogger | undefined {
  if (config.logLevel === null) {
    return undefined;
  }
  return new StructuredLogger({ ...overrides, level: config.logLevel, logFile: config.logFile });
}
