import { describe, it } from "mocha";
import { expect } from "chai";

import { closureByCondensation, condense } from "../src/algorithms/closure/index.js";
import { GraphOptionsError } from "../src/graph/errors.js";
import { bits, buildDirectedMatrix, type EdgePair } from "./helpers/graphs.js";

// a=0, b=1, c=2 form a cycle; a -> d -> e.
const TRIANGLE_WITH_TAIL: EdgePair[] = [
  [1, 0],
  [0, 2],
  [2, 1],
  [0, 3],
  [3, 4],
];

describe("condense", () => {
  it("assigns sequential component ids in order of first member", () => {
    const condensation = condense(buildDirectedMatrix(5, TRIANGLE_WITH_TAIL));

    expect(condensation.componentOf).to.deep.equal([0, 0, 0, 1, 2]);
    expect(condensation.members).to.deep.equal([[0, 1, 2], [3], [4]]);
    expect(condensation.cyclic).to.deep.equal([true, false, false]);
    expect(condensation.graph.values()).to.deep.equal([0, 1, 2]);
    expect(condensation.graph.toMatrix()).to.deep.equal([
      [0, 1, 0],
      [0, 0, 1],
      [0, 0, 0],
    ]);
  });

  it("flags single-node components that carry a self-loop", () => {
    const condensation = condense(
      buildDirectedMatrix(2, [
        [0, 0],
        [0, 1],
      ]),
    );
    expect(condensation.cyclic).to.deep.equal([true, false]);
    expect(condensation.graph.toMatrix()).to.deep.equal([
      [0, 1],
      [0, 0],
    ]);
  });

  it("leaves the input graph untouched", () => {
    const graph = buildDirectedMatrix(5, TRIANGLE_WITH_TAIL);
    const before = graph.toMatrix();
    condense(graph);
    closureByCondensation(graph, { reflexive: true });
    expect(graph.toMatrix()).to.deep.equal(before);
    expect(graph.nodeCount()).to.equal(5);
  });

  it("rejects labels that do not cover every node", () => {
    try {
      condense(buildDirectedMatrix(5, TRIANGLE_WITH_TAIL), [0]);
      expect.fail("condense should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphOptionsError);
      if (error instanceof GraphOptionsError) {
        expect(error.details.issues).to.deep.equal(["labels: expected 5 entries, received 1"]);
      }
    }
  });
});

describe("closureByCondensation", () => {
  it("expands component reachability back to the original nodes", () => {
    const graph = buildDirectedMatrix(5, TRIANGLE_WITH_TAIL);
    expect(closureByCondensation(graph, { reflexive: true })).to.deep.equal(
      bits(["11111", "11111", "11111", "00011", "00001"]),
    );
    expect(closureByCondensation(graph, { reflexive: false })).to.deep.equal(
      bits(["11111", "11111", "11111", "00001", "00000"]),
    );
  });
});
