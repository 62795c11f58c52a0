import { z } from "zod";

import { GraphEngineError } from "../graph/errors.js";
import { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";
import { readBool, readEnum, type EnvSource } from "./env.js";

export const LOG_THRESHOLDS = ["debug", "info", "warn", "error", "silent"] as const;
export const CLOSURE_STRATEGIES = ["traversal", "condensation"] as const;
export const TRAVERSAL_STRATEGIES = ["bfs", "dfs"] as const;

export type ClosureStrategy = (typeof CLOSURE_STRATEGIES)[number];
export type TraversalStrategy = (typeof TRAVERSAL_STRATEGIES)[number];

const EngineConfigSchema = z
  .object({
    logLevel: z.enum(LOG_THRESHOLDS),
    closureStrategy: z.enum(CLOSURE_STRATEGIES),
    closureTraversal: z.enum(TRAVERSAL_STRATEGIES),
    closureReflexive: z.boolean(),
  })
  .strict();

export type EngineConfig = Readonly<z.infer<typeof EngineConfigSchema>>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  logLevel: "warn",
  closureStrategy: "condensation",
  closureTraversal: "bfs",
  closureReflexive: true,
});

/** Error thrown when explicit configuration overrides are rejected. */
export class EngineConfigError extends GraphEngineError<{ issues: string[] }> {
  constructor(issues: string[]) {
    super(ERROR_CODES.CONFIG_INVALID, `invalid engine configuration (${issues.join("; ")})`, { issues });
    this.name = "EngineConfigError";
  }
}

/**
 * Resolves the engine defaults from the environment. Unknown or malformed
 * variables fall back to {@link DEFAULT_ENGINE_CONFIG}; explicit
 * {@link overrides} are validated strictly and win over the environment.
 */
export function loadEngineConfig(
  env: EnvSource = process.env,
  overrides: Readonly<Partial<Record<keyof EngineConfig, unknown>>> = {},
): EngineConfig {
  const fromEnv: EngineConfig = {
    logLevel: readEnum("GRAPH_ENGINE_LOG_LEVEL", LOG_THRESHOLDS, DEFAULT_ENGINE_CONFIG.logLevel, env),
    closureStrategy: readEnum(
      "GRAPH_ENGINE_CLOSURE_STRATEGY",
      CLOSURE_STRATEGIES,
      DEFAULT_ENGINE_CONFIG.closureStrategy,
      env,
    ),
    closureTraversal: readEnum(
      "GRAPH_ENGINE_CLOSURE_TRAVERSAL",
      TRAVERSAL_STRATEGIES,
      DEFAULT_ENGINE_CONFIG.closureTraversal,
      env,
    ),
    closureReflexive: readBool("GRAPH_ENGINE_CLOSURE_REFLEXIVE", DEFAULT_ENGINE_CONFIG.closureReflexive, env),
  };

  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = EngineConfigSchema.safeParse({ ...fromEnv, ...explicit });
  if (!parsed.success) {
    throw new EngineConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return Object.freeze(parsed.data);
}

/** Builds a logger honouring the configured threshold. */
export function createEngineLogger(
  config: EngineConfig = loadEngineConfig(),
  sink?: (line: string) => void,
): StructuredLogger {
  return new StructuredLogger({ minLevel: config.logLevel, sink });
}
