import { z } from "zod";

import { assertNodeIndex, GraphPathError } from "../graph/errors.js";
import type { NodeIndex, WeightedRowGraph } from "../graph/types.js";
import type { StructuredLogger } from "../logger.js";
import { NodeIndexSchema, parseAlgorithmOptions } from "./options.js";

export interface DijkstraOptions {
  /** Relaxations whose cumulative cost exceeds this bound are rejected. */
  readonly maxCost?: number;
  /** Stops the search as soon as this node is popped from the frontier. */
  readonly target?: NodeIndex;
  readonly logger?: StructuredLogger;
}

/**
 * Maps every discovered node to the node it was reached from. The start node
 * maps to `null`.
 */
export type PredecessorMap = Map<NodeIndex, NodeIndex | null>;

export interface ShortestPathTree {
  readonly predecessors: PredecessorMap;
  /** Best known cost of every discovered node. */
  readonly costs: Map<NodeIndex, number>;
  /** Nodes in the order they were settled. */
  readonly settled: NodeIndex[];
}

const DijkstraOptionsSchema = z.object({
  maxCost: z.number().nonnegative().optional(),
  target: NodeIndexSchema.optional(),
});

interface QueueEntry {
  node: NodeIndex;
  priority: number;
}

class MinHeap {
  private readonly data: QueueEntry[] = [];

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    if (this.data.length === 0) {
      return undefined;
    }
    const min = this.data[0];
    const last = this.data.pop();
    if (last !== undefined && this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.data[parent].priority <= this.data[index].priority) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.data[left].priority < this.data[smallest].priority) {
        smallest = left;
      }
      if (right < length && this.data[right].priority < this.data[smallest].priority) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

/**
 * Dijkstra search over weight rows. Cells holding `0` are missing edges, so
 * only positive weights relax distances. The returned tree contains every
 * node discovered before the search stopped, settled or not.
 */
export function shortestPathTree(
  graph: WeightedRowGraph,
  start: NodeIndex,
  options: DijkstraOptions = {},
): ShortestPathTree {
  assertNodeIndex(graph, start, "dijkstra");
  const { maxCost, target } = parseAlgorithmOptions(
    DijkstraOptionsSchema,
    { maxCost: options.maxCost, target: options.target },
    "dijkstra",
  );
  if (target !== undefined) {
    assertNodeIndex(graph, target, "dijkstra");
  }

  const predecessors: PredecessorMap = new Map<NodeIndex, NodeIndex | null>([[start, null]]);
  const costs = new Map<NodeIndex, number>([[start, 0]]);
  const settled: NodeIndex[] = [];
  const settledSet = new Set<NodeIndex>();

  const queue = new MinHeap();
  queue.enqueue({ node: start, priority: 0 });

  for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
    // Stale entry left behind by a later, cheaper relaxation.
    if (settledSet.has(current.node)) {
      continue;
    }
    settledSet.add(current.node);
    settled.push(current.node);

    if (current.node === target) {
      break;
    }

    const row = graph.edges(current.node);
    for (let neighbor = 0; neighbor < row.length; neighbor += 1) {
      const weight = row[neighbor];
      if (weight <= 0) {
        continue;
      }
      const tentative = current.priority + weight;
      if (maxCost !== undefined && tentative > maxCost) {
        continue;
      }
      const known = costs.get(neighbor);
      if (known === undefined || tentative < known) {
        costs.set(neighbor, tentative);
        predecessors.set(neighbor, current.node);
        queue.enqueue({ node: neighbor, priority: tentative });
      }
    }
  }

  options.logger?.debug("dijkstra_completed", {
    start,
    target: target ?? null,
    max_cost: maxCost ?? null,
    settled: settled.length,
    discovered: predecessors.size,
  });

  return { predecessors, costs, settled };
}

/** Runs Dijkstra from {@link start} and returns the predecessor map built so far. */
export function dijkstra(graph: WeightedRowGraph, start: NodeIndex, options: DijkstraOptions = {}): PredecessorMap {
  return shortestPathTree(graph, start, options).predecessors;
}

/**
 * Cheapest path from {@link start} to {@link target}, both endpoints included
 * and listed in walking order. Returns `null` when the target is unreachable.
 */
export function pathTo(
  graph: WeightedRowGraph,
  start: NodeIndex,
  target: NodeIndex,
  options: Pick<DijkstraOptions, "logger"> = {},
): NodeIndex[] | null {
  assertNodeIndex(graph, start, "pathTo");
  assertNodeIndex(graph, target, "pathTo");
  const { predecessors } = shortestPathTree(graph, start, { target, logger: options.logger });

  const path: NodeIndex[] = [target];
  let current = target;
  while (current !== start) {
    const previous = predecessors.get(current);
    if (previous === undefined || previous === null) {
      return null;
    }
    path.push(previous);
    current = previous;
  }
  return path.reverse();
}

/** Sums the weights along {@link path}; every consecutive pair must be joined by an edge. */
export function pathWeight(graph: WeightedRowGraph, path: readonly NodeIndex[]): number {
  let total = 0;
  for (let position = 0; position < path.length; position += 1) {
    assertNodeIndex(graph, path[position], "pathWeight");
    if (position === 0) {
      continue;
    }
    const from = path[position - 1];
    const to = path[position];
    const weight = graph.edges(from)[to];
    if (weight <= 0) {
      throw new GraphPathError(from, to, position);
    }
    total += weight;
  }
  return total;
}
