import type { IndexedGraph } from "../../graph/types.js";
import { breadthFirst, depthFirst } from "../traversal.js";
import {
  createReachabilityMatrix,
  resolveClosureOptions,
  type ClosureOptions,
  type ReachabilityMatrix,
} from "./reachability.js";

/**
 * Transitive closure by running a full traversal from every node.
 * O(V·(V+E)) on adjacency lists, O(V³) on matrices. No preconditions.
 */
export function closureByTraversal(graph: IndexedGraph, options: ClosureOptions = {}): ReachabilityMatrix {
  const { reflexive, traversal } = resolveClosureOptions(options, "closureByTraversal");
  const count = graph.nodeCount();
  const matrix = createReachabilityMatrix(count);

  for (let source = 0; source < count; source += 1) {
    const row = matrix[source];
    const walk = traversal === "bfs" ? breadthFirst(graph, source) : depthFirst(graph, source);
    let returnsToSource = false;
    for (const node of walk) {
      row[node] = true;
      if (!reflexive && !returnsToSource && graph.neighbors(node).includes(source)) {
        returnsToSource = true;
      }
    }
    // The walk always yields its own start; keep the diagonal only for real cycles.
    if (!reflexive) {
      row[source] = returnsToSource;
    }
  }

  options.logger?.debug("closure_computed", { strategy: "traversal", traversal, reflexive, nodes: count });
  return matrix;
}
