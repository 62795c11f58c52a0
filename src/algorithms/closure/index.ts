import { z } from "zod";

import { CLOSURE_STRATEGIES, loadEngineConfig, type ClosureStrategy } from "../../config/engine.js";
import type { IndexedGraph } from "../../graph/types.js";
import { parseAlgorithmOptions } from "../options.js";
import { closureByCondensation } from "./condensation.js";
import type { ClosureOptions, ReachabilityMatrix } from "./reachability.js";
import { closureByTraversal } from "./traversalClosure.js";

export * from "./reachability.js";
export * from "./condensation.js";
export * from "./traversalClosure.js";

export interface TransitiveClosureOptions extends ClosureOptions {
  readonly strategy?: ClosureStrategy;
}

const StrategySchema = z.object({ strategy: z.enum(CLOSURE_STRATEGIES).optional() });

/**
 * Computes the reachability matrix with the requested strategy, or the
 * configured default (`GRAPH_ENGINE_CLOSURE_STRATEGY`) when none is given.
 * Both strategies produce identical matrices.
 */
export function transitiveClosure(graph: IndexedGraph, options: TransitiveClosureOptions = {}): ReachabilityMatrix {
  const { strategy } = parseAlgorithmOptions(StrategySchema, { strategy: options.strategy }, "transitiveClosure");
  const config = options.config ?? loadEngineConfig();
  const resolved = { ...options, config };
  return (strategy ?? config.closureStrategy) === "traversal"
    ? closureByTraversal(graph, resolved)
    : closureByCondensation(graph, resolved);
}
