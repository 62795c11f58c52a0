import { z } from "zod";

import { loadEngineConfig, TRAVERSAL_STRATEGIES, type EngineConfig, type TraversalStrategy } from "../../config/engine.js";
import type { StructuredLogger } from "../../logger.js";
import { parseAlgorithmOptions } from "../options.js";

/** Square matrix where `matrix[i][j]` is true iff `j` is reachable from `i`. */
export type ReachabilityMatrix = boolean[][];

export interface ClosureOptions {
  /**
   * When true every diagonal cell is set. When false `(i, i)` only holds if a
   * path of length one or more leads from `i` back to itself.
   */
  readonly reflexive?: boolean;
  /** Traversal used by the repeated-traversal strategy. */
  readonly traversal?: TraversalStrategy;
  /** Source of the defaults for omitted options; read from the environment otherwise. */
  readonly config?: EngineConfig;
  readonly logger?: StructuredLogger;
}

export interface ResolvedClosureOptions {
  readonly reflexive: boolean;
  readonly traversal: TraversalStrategy;
}

const ClosureOptionsSchema = z.object({
  reflexive: z.boolean().optional(),
  traversal: z.enum(TRAVERSAL_STRATEGIES).optional(),
});

/** Validates closure options and fills the gaps from the engine configuration. */
export function resolveClosureOptions(options: ClosureOptions, operation: string): ResolvedClosureOptions {
  const parsed = parseAlgorithmOptions(
    ClosureOptionsSchema,
    { reflexive: options.reflexive, traversal: options.traversal },
    operation,
  );
  const config = options.config ?? loadEngineConfig();
  return {
    reflexive: parsed.reflexive ?? config.closureReflexive,
    traversal: parsed.traversal ?? config.closureTraversal,
  };
}

/** Allocates an all-false {@link size} × {@link size} matrix. */
export function createReachabilityMatrix(size: number): ReachabilityMatrix {
  return Array.from({ length: size }, () => new Array<boolean>(size).fill(false));
}

/** Cell-by-cell comparison; matrices of different sizes are never equal. */
export function reachabilityEquals(left: ReachabilityMatrix, right: ReachabilityMatrix): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every(
    (row, i) => row.length === right[i].length && row.every((cell, j) => cell === right[i][j]),
  );
}

/** Renders each row as a string of `1` and `0` characters, one row per line. */
export function formatReachability(matrix: ReachabilityMatrix): string {
  return matrix.map((row) => row.map((cell) => (cell ? "1" : "0")).join("")).join("\n");
}
