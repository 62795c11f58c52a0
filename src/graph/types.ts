/** Dense zero-based identifier issued to a node when it is inserted. */
export type NodeIndex = number;

/** Whether edge insertion writes one cell or both symmetric cells. */
export type Directedness = "directed" | "undirected";

/** Whether matrix edges carry a caller-provided weight or always store `1`. */
export type Weighting = "weighted" | "unweighted";

/**
 * Minimal read-only view every traversal-based algorithm consumes. Both the
 * adjacency list and the adjacency matrix implement it, which lets BFS, DFS,
 * Tarjan and the closure computations stay representation agnostic.
 */
export interface IndexedGraph {
  /** Number of nodes currently stored; valid indices are `[0, nodeCount())`. */
  nodeCount(): number;
  /**
   * Destinations of the outgoing edges of {@link index}. Adjacency lists keep
   * insertion order (duplicates included) while matrices report ascending
   * indices.
   */
  neighbors(index: NodeIndex): NodeIndex[];
}

/**
 * View exposing full weight rows, as stored by the adjacency matrix. A cell
 * holding `0` means "no edge"; positive values are edge weights.
 */
export interface WeightedRowGraph extends IndexedGraph {
  edges(index: NodeIndex): number[];
}

/** Edge record stored by the adjacency list. */
export interface ListEdge<W> {
  readonly weight: W;
  readonly to: NodeIndex;
}
