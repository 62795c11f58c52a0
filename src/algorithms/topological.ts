import { GraphCycleError } from "../graph/errors.js";
import type { IndexedGraph, NodeIndex } from "../graph/types.js";

/**
 * Kahn ordering: every edge `u -> v` places `u` before `v`. Initial sources
 * are queued in ascending index order so the result is deterministic. Throws
 * {@link GraphCycleError} when a cycle (a self-loop included) keeps some
 * nodes from ever reaching in-degree zero.
 */
export function topologicalOrder(graph: IndexedGraph): NodeIndex[] {
  const count = graph.nodeCount();
  const adjacency: NodeIndex[][] = [];
  const indegree = new Array<number>(count).fill(0);
  for (let node = 0; node < count; node += 1) {
    const neighbors = graph.neighbors(node);
    adjacency.push(neighbors);
    for (const neighbor of neighbors) {
      indegree[neighbor] += 1;
    }
  }

  const queue: NodeIndex[] = [];
  for (let node = 0; node < count; node += 1) {
    if (indegree[node] === 0) {
      queue.push(node);
    }
  }

  const order: NodeIndex[] = [];
  let head = 0;
  while (head < queue.length) {
    const current = queue[head];
    head += 1;
    order.push(current);
    for (const neighbor of adjacency[current]) {
      indegree[neighbor] -= 1;
      if (indegree[neighbor] === 0) {
        queue.push(neighbor);
      }
    }
  }

  if (order.length !== count) {
    throw new GraphCycleError(order.length, count);
  }
  return order;
}
