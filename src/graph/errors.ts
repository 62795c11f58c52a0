import { ERROR_CODES, type ErrorCode } from "../types.js";
import type { IndexedGraph, NodeIndex } from "./types.js";

/** Base error used by the graph representations and algorithms. */
export class GraphEngineError<D extends Record<string, unknown> = Record<string, unknown>> extends Error {
  public readonly code: ErrorCode;
  public readonly hint?: string;
  public readonly details: D;

  constructor(code: ErrorCode, message: string, details: D, hint?: string) {
    super(message);
    this.name = "GraphEngineError";
    this.code = code;
    this.details = details;
    this.hint = hint;
  }
}

/** Error thrown when an operation references an index outside `[0, nodeCount)`. */
export class GraphIndexError extends GraphEngineError<{ operation: string; index: number; nodeCount: number }> {
  constructor(operation: string, index: number, nodeCount: number) {
    super(
      ERROR_CODES.GRAPH_INDEX_RANGE,
      `${operation}: node index ${index} is out of range (node count ${nodeCount})`,
      { operation, index, nodeCount },
      "only indices returned by addNode are valid",
    );
    this.name = "GraphIndexError";
  }
}

/** Error thrown when a matrix edge weight cannot be stored. */
export class GraphWeightError extends GraphEngineError<{ from: NodeIndex; to: NodeIndex; weight: number }> {
  constructor(from: NodeIndex, to: NodeIndex, weight: number) {
    super(
      ERROR_CODES.GRAPH_WEIGHT,
      `edge ${from} -> ${to}: weight ${weight} is not a positive integer`,
      { from, to, weight },
      "matrix cells reserve 0 for a missing edge; use a weight of at least 1",
    );
    this.name = "GraphWeightError";
  }
}

/** Error thrown when algorithm options fail validation. */
export class GraphOptionsError extends GraphEngineError<{ operation: string; issues: string[] }> {
  constructor(operation: string, issues: string[]) {
    super(ERROR_CODES.GRAPH_INVALID_INPUT, `${operation}: invalid options (${issues.join("; ")})`, {
      operation,
      issues,
    });
    this.name = "GraphOptionsError";
  }
}

/** Error thrown when an ordering is requested on a graph that contains a cycle. */
export class GraphCycleError extends GraphEngineError<{ ordered: number; nodeCount: number }> {
  constructor(ordered: number, nodeCount: number) {
    super(
      ERROR_CODES.GRAPH_CYCLE,
      `topological order requires an acyclic graph; ordered ${ordered} of ${nodeCount} nodes`,
      { ordered, nodeCount },
      "condense strongly connected components first",
    );
    this.name = "GraphCycleError";
  }
}

/** Error thrown when a path contains two consecutive nodes that are not adjacent. */
export class GraphPathError extends GraphEngineError<{ from: NodeIndex; to: NodeIndex; position: number }> {
  constructor(from: NodeIndex, to: NodeIndex, position: number) {
    super(ERROR_CODES.GRAPH_PATH, `path step ${position} (${from} -> ${to}) does not follow an edge`, {
      from,
      to,
      position,
    });
    this.name = "GraphPathError";
  }
}

/** Throws {@link GraphIndexError} unless {@link index} addresses an existing node. */
export function assertNodeIndex(graph: IndexedGraph, index: NodeIndex, operation: string): void {
  const count = graph.nodeCount();
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new GraphIndexError(operation, index, count);
  }
}
