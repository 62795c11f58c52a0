import { breadthFirst, depthFirst } from "../algorithms/traversal.js";
import { stronglyConnectedComponents, type SccLabels } from "../algorithms/tarjan.js";
import { assertNodeIndex } from "./errors.js";
import type { Directedness, IndexedGraph, ListEdge, NodeIndex } from "./types.js";

interface ListNode<V, W> {
  readonly value: V;
  readonly edges: ListEdge<W>[];
}

/**
 * Adjacency-list graph suited to sparse data. Every node owns an ordered
 * array of outgoing edges; adding a node is O(1) amortised.
 *
 * Re-adding an existing edge appends a second record rather than replacing
 * the first one. Undirected graphs store both directions on every
 * {@link addEdge} call; an undirected self-loop is stored once.
 */
export class ListGraph<V, D extends Directedness = "undirected", W = number> implements IndexedGraph {
  private readonly nodes: ListNode<V, W>[] = [];
  private readonly link: (from: NodeIndex, to: NodeIndex, weight: W) => void;

  constructor(readonly directedness: D) {
    this.link =
      directedness === "directed"
        ? (from, to, weight) => this.append(from, to, weight)
        : (from, to, weight) => {
            this.append(from, to, weight);
            if (from !== to) {
              this.append(to, from, weight);
            }
          };
  }

  static directed<V, W = number>(): ListGraph<V, "directed", W> {
    return new ListGraph<V, "directed", W>("directed");
  }

  static undirected<V, W = number>(): ListGraph<V, "undirected", W> {
    return new ListGraph<V, "undirected", W>("undirected");
  }

  addNode(value: V): NodeIndex {
    this.nodes.push({ value, edges: [] });
    return this.nodes.length - 1;
  }

  addEdge(from: NodeIndex, to: NodeIndex, weight: W): void {
    assertNodeIndex(this, from, "addEdge");
    assertNodeIndex(this, to, "addEdge");
    this.link(from, to, weight);
  }

  nodeCount(): number {
    return this.nodes.length;
  }

  nodeValue(index: NodeIndex): V {
    assertNodeIndex(this, index, "nodeValue");
    return this.nodes[index].value;
  }

  /** Payloads in index order. */
  values(): V[] {
    return this.nodes.map((node) => node.value);
  }

  /** Outgoing edge records of {@link index}, in insertion order. */
  edges(index: NodeIndex): readonly ListEdge<W>[] {
    assertNodeIndex(this, index, "edges");
    return this.nodes[index].edges;
  }

  neighbors(index: NodeIndex): NodeIndex[] {
    return this.edges(index).map((edge) => edge.to);
  }

  /** Linear in the out-degree of {@link from}. */
  hasEdge(from: NodeIndex, to: NodeIndex): boolean {
    assertNodeIndex(this, to, "hasEdge");
    return this.edges(from).some((edge) => edge.to === to);
  }

  /** Number of stored edge records; an undirected edge counts twice. */
  edgeCount(): number {
    return this.nodes.reduce((total, node) => total + node.edges.length, 0);
  }

  bfs(start: NodeIndex): IterableIterator<NodeIndex> {
    return breadthFirst(this, start);
  }

  dfs(start: NodeIndex): IterableIterator<NodeIndex> {
    return depthFirst(this, start);
  }

  sccs(): SccLabels {
    return stronglyConnectedComponents(this);
  }

  private append(from: NodeIndex, to: NodeIndex, weight: W): void {
    this.nodes[from].edges.push({ weight, to });
  }
}
