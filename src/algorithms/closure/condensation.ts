import { GraphOptionsError } from "../../graph/errors.js";
import { MatrixGraph } from "../../graph/matrixGraph.js";
import type { IndexedGraph, NodeIndex } from "../../graph/types.js";
import { stronglyConnectedComponents, type SccLabels } from "../tarjan.js";
import { topologicalOrder } from "../topological.js";
import {
  createReachabilityMatrix,
  resolveClosureOptions,
  type ClosureOptions,
  type ReachabilityMatrix,
} from "./reachability.js";

/** Acyclic graph obtained by collapsing every strongly connected component. */
export interface Condensation {
  /** Component id of every original node. Ids are sequential, in order of first member. */
  readonly componentOf: number[];
  /** Original members of every component, ascending. */
  readonly members: NodeIndex[][];
  /** Whether a component contains a cycle: several members, or one member with a self-loop. */
  readonly cyclic: boolean[];
  /** One node per component (its id as value); intra-component edges are dropped. */
  readonly graph: MatrixGraph<number, "directed", "unweighted">;
}

/**
 * Collapses the components described by {@link labels} into a new directed
 * matrix. The input graph is left untouched; identities are remapped through
 * {@link Condensation.componentOf}.
 */
export function condense(graph: IndexedGraph, labels: SccLabels = stronglyConnectedComponents(graph)): Condensation {
  const count = graph.nodeCount();
  if (labels.length !== count) {
    throw new GraphOptionsError("condense", [`labels: expected ${count} entries, received ${labels.length}`]);
  }

  const idByLabel = new Map<number, number>();
  const componentOf: number[] = [];
  const members: NodeIndex[][] = [];
  labels.forEach((label, node) => {
    let id = idByLabel.get(label);
    if (id === undefined) {
      id = members.length;
      idByLabel.set(label, id);
      members.push([]);
    }
    componentOf.push(id);
    members[id].push(node);
  });

  const condensed = MatrixGraph.directedUnweighted<number>();
  members.forEach((_, id) => condensed.addNode(id));
  const cyclic = members.map((group) => group.length > 1);

  for (let node = 0; node < count; node += 1) {
    const from = componentOf[node];
    for (const neighbor of graph.neighbors(node)) {
      const to = componentOf[neighbor];
      if (from !== to) {
        condensed.addEdge(from, to);
      } else if (node === neighbor) {
        cyclic[from] = true;
      }
    }
  }

  return { componentOf, members, cyclic, graph: condensed };
}

/**
 * Purdom's transitive closure: condense the strongly connected components,
 * order the condensed graph topologically, then walk that order backwards so
 * each component unions the reachable sets of its direct successors, which
 * are already complete. The condensed result is finally expanded back to the
 * original indices. O(E + μV) where μ is the number of components.
 */
export function closureByCondensation(graph: IndexedGraph, options: ClosureOptions = {}): ReachabilityMatrix {
  const { reflexive } = resolveClosureOptions(options, "closureByCondensation");
  const count = graph.nodeCount();
  const labels = stronglyConnectedComponents(graph, { logger: options.logger });
  const condensation = condense(graph, labels);
  const order = topologicalOrder(condensation.graph);
  const componentTotal = condensation.members.length;

  const reach = createReachabilityMatrix(componentTotal);
  for (let position = order.length - 1; position >= 0; position -= 1) {
    const component = order[position];
    const row = reach[component];
    for (const successor of condensation.graph.neighbors(component)) {
      row[successor] = true;
      const successorRow = reach[successor];
      for (let other = 0; other < componentTotal; other += 1) {
        if (successorRow[other]) {
          row[other] = true;
        }
      }
    }
  }

  const matrix = createReachabilityMatrix(count);
  for (let source = 0; source < count; source += 1) {
    const sourceComponent = condensation.componentOf[source];
    const componentRow = reach[sourceComponent];
    const row = matrix[source];
    for (let target = 0; target < count; target += 1) {
      const targetComponent = condensation.componentOf[target];
      row[target] =
        sourceComponent === targetComponent ? condensation.cyclic[sourceComponent] : componentRow[targetComponent];
    }
    if (reflexive) {
      row[source] = true;
    }
  }

  options.logger?.debug("closure_computed", {
    strategy: "condensation",
    reflexive,
    nodes: count,
    components: componentTotal,
  });
  return matrix;
}
