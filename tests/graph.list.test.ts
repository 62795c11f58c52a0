import { describe, it } from "mocha";
import { expect } from "chai";

import { GraphIndexError } from "../src/graph/errors.js";
import { ListGraph } from "../src/graph/listGraph.js";
import { ERROR_CODES } from "../src/types.js";

describe("ListGraph", () => {
  it("issues sequential indices and keeps payloads", () => {
    const graph = ListGraph.directed<string>();
    expect(graph.addNode("a")).to.equal(0);
    expect(graph.addNode("b")).to.equal(1);
    expect(graph.addNode("c")).to.equal(2);
    expect(graph.nodeCount()).to.equal(3);
    expect(graph.nodeValue(1)).to.equal("b");
    expect(graph.values()).to.deep.equal(["a", "b", "c"]);
  });

  it("stores a single record for a directed edge", () => {
    const graph = ListGraph.directed<null>();
    const a = graph.addNode(null);
    const b = graph.addNode(null);
    graph.addEdge(a, b, 1);

    expect(graph.edges(a)).to.deep.equal([{ weight: 1, to: b }]);
    expect(graph.edges(b)).to.deep.equal([]);
    expect(graph.hasEdge(a, b)).to.equal(true);
    expect(graph.hasEdge(b, a)).to.equal(false);
  });

  it("stores both directions for an undirected edge with the same weight", () => {
    const graph = ListGraph.undirected<null>();
    const a = graph.addNode(null);
    const b = graph.addNode(null);
    graph.addEdge(a, b, 7);

    expect(graph.edges(a)).to.deep.equal([{ weight: 7, to: b }]);
    expect(graph.edges(b)).to.deep.equal([{ weight: 7, to: a }]);
    expect(graph.edgeCount()).to.equal(2);
  });

  it("stores an undirected self-loop once", () => {
    const graph = ListGraph.undirected<null>();
    const a = graph.addNode(null);
    graph.addEdge(a, a, 1);
    expect(graph.neighbors(a)).to.deep.equal([a]);
  });

  it("appends duplicates when the same edge is added twice", () => {
    const graph = ListGraph.directed<null, string>();
    const a = graph.addNode(null);
    const b = graph.addNode(null);
    graph.addEdge(a, b, "first");
    graph.addEdge(a, b, "second");

    expect(graph.edges(a).map((edge) => edge.weight)).to.deep.equal(["first", "second"]);
    expect(graph.neighbors(a)).to.deep.equal([b, b]);
  });

  it("lists neighbours in insertion order", () => {
    const graph = ListGraph.directed<null>();
    for (let i = 0; i < 4; i += 1) {
      graph.addNode(null);
    }
    graph.addEdge(0, 3, 1);
    graph.addEdge(0, 1, 1);
    graph.addEdge(0, 2, 1);
    expect(graph.neighbors(0)).to.deep.equal([3, 1, 2]);
  });

  it("rejects edges that reference unknown nodes", () => {
    const graph = ListGraph.directed<null>();
    graph.addNode(null);

    expect(() => graph.addEdge(0, 1, 1)).to.throw(GraphIndexError);
    try {
      graph.addEdge(0, 1, 1);
      expect.fail("addEdge should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphIndexError);
      if (error instanceof GraphIndexError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_INDEX_RANGE);
        expect(error.details).to.deep.equal({ operation: "addEdge", index: 1, nodeCount: 1 });
      }
    }
  });

  it("rejects negative and fractional indices on lookups", () => {
    const graph = ListGraph.undirected<null>();
    graph.addNode(null);
    expect(() => graph.edges(-1)).to.throw(GraphIndexError);
    expect(() => graph.nodeValue(0.5)).to.throw(GraphIndexError);
    expect(() => graph.hasEdge(0, 3)).to.throw(GraphIndexError);
  });
});
