import type { IndexedGraph, NodeIndex } from "../graph/types.js";
import type { StructuredLogger } from "../logger.js";

/**
 * Component label per node. Two nodes belong to the same strongly connected
 * component iff their labels are equal; a label is the discovery index of the
 * component's root, not a sequential component id.
 */
export type SccLabels = number[];

const UNVISITED = -1;

interface TarjanFrame {
  readonly node: NodeIndex;
  readonly neighbors: NodeIndex[];
  cursor: number;
}

/**
 * Tarjan's single-pass decomposition. The depth-first walk keeps its own
 * frame stack, so graph depth is bounded by memory rather than by the call
 * stack. Runs in O(V + E) on adjacency lists and O(V²) on matrices.
 */
export function stronglyConnectedComponents(
  graph: IndexedGraph,
  options: { logger?: StructuredLogger } = {},
): SccLabels {
  const count = graph.nodeCount();
  const ids = new Array<number>(count).fill(UNVISITED);
  const low = new Array<number>(count).fill(0);
  const onStack = new Array<boolean>(count).fill(false);
  const stack: NodeIndex[] = [];
  const frames: TarjanFrame[] = [];
  let nextId = 0;
  let components = 0;

  const enter = (node: NodeIndex): void => {
    ids[node] = nextId;
    low[node] = nextId;
    nextId += 1;
    stack.push(node);
    onStack[node] = true;
    frames.push({ node, neighbors: graph.neighbors(node), cursor: 0 });
  };

  for (let root = 0; root < count; root += 1) {
    if (ids[root] !== UNVISITED) {
      continue;
    }
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const at = frame.node;

      if (frame.cursor < frame.neighbors.length) {
        const neighbor = frame.neighbors[frame.cursor];
        frame.cursor += 1;
        if (ids[neighbor] === UNVISITED) {
          enter(neighbor);
        } else if (onStack[neighbor]) {
          low[at] = Math.min(low[at], ids[neighbor]);
        }
        continue;
      }

      frames.pop();
      if (low[at] === ids[at]) {
        components += 1;
        while (stack.length > 0) {
          const member = stack.pop();
          if (member === undefined) {
            break;
          }
          onStack[member] = false;
          low[member] = ids[at];
          if (member === at) {
            break;
          }
        }
      }

      if (frames.length > 0) {
        const parent = frames[frames.length - 1].node;
        low[parent] = Math.min(low[parent], low[at]);
      }
    }
  }

  options.logger?.debug("scc_computed", { nodes: count, components });
  return low;
}

/** Groups node indices by label; members are listed in ascending index order. */
export function groupComponents(labels: readonly number[]): Map<number, NodeIndex[]> {
  const groups = new Map<number, NodeIndex[]>();
  labels.forEach((label, node) => {
    const members = groups.get(label);
    if (members) {
      members.push(node);
    } else {
      groups.set(label, [node]);
    }
  });
  return groups;
}

/** Number of distinct components described by {@link labels}. */
export function componentCount(labels: readonly number[]): number {
  return new Set(labels).size;
}
