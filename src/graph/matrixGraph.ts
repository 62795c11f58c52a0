import { dijkstra, pathTo, type DijkstraOptions, type PredecessorMap } from "../algorithms/dijkstra.js";
import { stronglyConnectedComponents, type SccLabels } from "../algorithms/tarjan.js";
import { breadthFirst, depthFirst } from "../algorithms/traversal.js";
import { assertNodeIndex, GraphWeightError } from "./errors.js";
import type { Directedness, NodeIndex, WeightedRowGraph, Weighting } from "./types.js";

/** Extra `addEdge` arguments: weighted matrices require a weight, unweighted ones take none. */
export type EdgeWeightArgs<W extends Weighting> = W extends "weighted" ? [weight: number] : [];

/** Variant tags fixed when the matrix is created. */
export interface MatrixGraphVariant<D extends Directedness, W extends Weighting> {
  readonly directedness: D;
  readonly weighting: W;
}

/**
 * Adjacency-matrix graph stored as one flat row-major array of weights.
 * A cell holding `0` means "no edge", so an edge of weight zero cannot be
 * represented and is rejected by {@link addEdge}.
 *
 * Rows are laid out with a stride that doubles when the node count reaches
 * it. Growth copies every existing cell, which keeps insertion O(N) amortised
 * per node; cells of a new row and column are never written before the node
 * exists, so they start at `0`.
 *
 * Values are indexed by a `Map`, so lookups follow `SameValueZero` equality.
 * Adding a value twice points {@link indexOf} at the newest node while the
 * earlier node keeps its row.
 */
export class MatrixGraph<T, D extends Directedness = "undirected", W extends Weighting = "unweighted">
  implements WeightedRowGraph
{
  private size = 0;
  private stride = 0;
  private cells: number[] = [];
  private readonly nodeValues: T[] = [];
  private readonly lookup = new Map<T, NodeIndex>();
  private readonly write: (from: NodeIndex, to: NodeIndex, weight: number) => void;

  constructor(readonly variant: MatrixGraphVariant<D, W>) {
    this.write =
      variant.directedness === "directed"
        ? (from, to, weight) => this.setCell(from, to, weight)
        : (from, to, weight) => {
            this.setCell(from, to, weight);
            this.setCell(to, from, weight);
          };
  }

  static directedWeighted<T>(): MatrixGraph<T, "directed", "weighted"> {
    return new MatrixGraph<T, "directed", "weighted">({ directedness: "directed", weighting: "weighted" });
  }

  static directedUnweighted<T>(): MatrixGraph<T, "directed", "unweighted"> {
    return new MatrixGraph<T, "directed", "unweighted">({ directedness: "directed", weighting: "unweighted" });
  }

  static undirectedWeighted<T>(): MatrixGraph<T, "undirected", "weighted"> {
    return new MatrixGraph<T, "undirected", "weighted">({ directedness: "undirected", weighting: "weighted" });
  }

  static undirectedUnweighted<T>(): MatrixGraph<T, "undirected", "unweighted"> {
    return new MatrixGraph<T, "undirected", "unweighted">({ directedness: "undirected", weighting: "unweighted" });
  }

  addNode(value: T): NodeIndex {
    if (this.size === this.stride) {
      this.grow(Math.max(1, this.stride * 2));
    }
    const index = this.size;
    this.size += 1;
    this.nodeValues.push(value);
    this.lookup.set(value, index);
    return index;
  }

  /**
   * Stores an edge, overwriting the previous weight of the cell. Undirected
   * matrices write both symmetric cells. Unweighted matrices always store `1`.
   */
  addEdge(from: NodeIndex, to: NodeIndex, ...weight: EdgeWeightArgs<W>): void {
    assertNodeIndex(this, from, "addEdge");
    assertNodeIndex(this, to, "addEdge");
    const provided: readonly number[] = weight;
    const value = this.variant.weighting === "weighted" ? (provided.length > 0 ? provided[0] : Number.NaN) : 1;
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new GraphWeightError(from, to, value);
    }
    this.write(from, to, value);
  }

  /** Weight stored for `from -> to`, `0` when the edge is absent. */
  edgeWeight(this: MatrixGraph<T, D, "weighted">, from: NodeIndex, to: NodeIndex): number {
    return this.cell(from, to, "edgeWeight");
  }

  hasEdge(from: NodeIndex, to: NodeIndex): boolean {
    return this.cell(from, to, "hasEdge") > 0;
  }

  nodeCount(): number {
    return this.size;
  }

  nodeValue(index: NodeIndex): T {
    assertNodeIndex(this, index, "nodeValue");
    return this.nodeValues[index];
  }

  indexOf(value: T): NodeIndex | undefined {
    return this.lookup.get(value);
  }

  /** Payloads in index order. */
  values(): T[] {
    return [...this.nodeValues];
  }

  /** Full row of {@link index}: one weight per node, `0` where no edge exists. */
  edges(index: NodeIndex): number[] {
    assertNodeIndex(this, index, "edges");
    const offset = index * this.stride;
    return this.cells.slice(offset, offset + this.size);
  }

  /** Destinations of {@link index} in ascending order. */
  neighbors(index: NodeIndex): NodeIndex[] {
    const result: NodeIndex[] = [];
    this.edges(index).forEach((weight, to) => {
      if (weight > 0) {
        result.push(to);
      }
    });
    return result;
  }

  /** Snapshot of the matrix as N rows of N weights. */
  toMatrix(): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < this.size; row += 1) {
      rows.push(this.edges(row));
    }
    return rows;
  }

  /**
   * Reverses every edge in place by swapping cells (x, y) and (y, x). Applying
   * it twice restores the matrix; on an undirected matrix nothing changes.
   */
  transpose(): void {
    for (let y = 0; y < this.size; y += 1) {
      for (let x = y + 1; x < this.size; x += 1) {
        const a = x * this.stride + y;
        const b = y * this.stride + x;
        const tmp = this.cells[a];
        this.cells[a] = this.cells[b];
        this.cells[b] = tmp;
      }
    }
  }

  bfs(start: NodeIndex): IterableIterator<NodeIndex> {
    return breadthFirst(this, start);
  }

  dfs(start: NodeIndex): IterableIterator<NodeIndex> {
    return depthFirst(this, start);
  }

  dijkstra(start: NodeIndex, options: DijkstraOptions = {}): PredecessorMap {
    return dijkstra(this, start, options);
  }

  pathTo(start: NodeIndex, target: NodeIndex): NodeIndex[] | null {
    return pathTo(this, start, target);
  }

  sccs(): SccLabels {
    return stronglyConnectedComponents(this);
  }

  private cell(from: NodeIndex, to: NodeIndex, operation: string): number {
    assertNodeIndex(this, from, operation);
    assertNodeIndex(this, to, operation);
    return this.cells[from * this.stride + to];
  }

  private setCell(from: NodeIndex, to: NodeIndex, weight: number): void {
    this.cells[from * this.stride + to] = weight;
  }

  private grow(stride: number): void {
    const next = new Array<number>(stride * stride).fill(0);
    for (let row = 0; row < this.size; row += 1) {
      for (let column = 0; column < this.size; column += 1) {
        next[row * stride + column] = this.cells[row * this.stride + column];
      }
    }
    this.cells = next;
    this.stride = stride;
  }
}

/** Mutates {@link graph} in place into its transpose. */
export function transpose<T, D extends Directedness, W extends Weighting>(graph: MatrixGraph<T, D, W>): void {
  graph.transpose();
}
