import { assertNodeIndex } from "../graph/errors.js";
import type { IndexedGraph, NodeIndex } from "../graph/types.js";
import type { TraversalStrategy } from "../config/engine.js";

/**
 * Breadth-first walk from {@link start}. Nodes come out in non-decreasing
 * distance order, ties broken by neighbour order. The start index is checked
 * immediately; the walk itself only advances when the iterator is consumed.
 */
export function breadthFirst(graph: IndexedGraph, start: NodeIndex): IterableIterator<NodeIndex> {
  assertNodeIndex(graph, start, "bfs");
  return walkBreadthFirst(graph, start);
}

/**
 * Depth-first walk from {@link start} in the pre-order of the recursive
 * definition. Frames record the neighbour cursor of every open node so the
 * walk never recurses on the call stack.
 */
export function depthFirst(graph: IndexedGraph, start: NodeIndex): IterableIterator<NodeIndex> {
  assertNodeIndex(graph, start, "dfs");
  return walkDepthFirst(graph, start);
}

/** Runs {@link strategy} to completion and returns every node reachable from {@link start}, start included. */
export function reachableSet(graph: IndexedGraph, start: NodeIndex, strategy: TraversalStrategy = "bfs"): Set<NodeIndex> {
  const walk = strategy === "bfs" ? breadthFirst(graph, start) : depthFirst(graph, start);
  return new Set(walk);
}

function* walkBreadthFirst(graph: IndexedGraph, start: NodeIndex): Generator<NodeIndex, void, undefined> {
  const visited = new Set<NodeIndex>([start]);
  const queue: NodeIndex[] = [start];
  // Advancing a head pointer keeps dequeue O(1) without Array#shift.
  let head = 0;

  while (head < queue.length) {
    const current = queue[head];
    head += 1;
    for (const neighbor of graph.neighbors(current)) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
    yield current;
  }
}

interface DepthFrame {
  readonly neighbors: NodeIndex[];
  cursor: number;
}

function* walkDepthFirst(graph: IndexedGraph, start: NodeIndex): Generator<NodeIndex, void, undefined> {
  const visited = new Set<NodeIndex>([start]);
  const frames: DepthFrame[] = [{ neighbors: graph.neighbors(start), cursor: 0 }];
  yield start;

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.cursor >= frame.neighbors.length) {
      frames.pop();
      continue;
    }
    const next = frame.neighbors[frame.cursor];
    frame.cursor += 1;
    if (visited.has(next)) {
      continue;
    }
    visited.add(next);
    yield next;
    frames.push({ neighbors: graph.neighbors(next), cursor: 0 });
  }
}
