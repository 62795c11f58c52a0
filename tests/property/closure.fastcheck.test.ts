import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { closureByCondensation, closureByTraversal, formatReachability } from "../../src/algorithms/closure/index.js";
import { DEFAULT_ENGINE_CONFIG } from "../../src/config/engine.js";
import { buildDirectedList, buildDirectedMatrix, type EdgePair } from "../helpers/graphs.js";

/**
 * Random directed graphs of 1 to 50 nodes. Both closure strategies must agree
 * cell for cell, whatever the representation or the diagonal convention.
 */
describe("transitive closure strategies (property-based)", () => {
  const directedGraphArb = fc.integer({ min: 1, max: 50 }).chain((count) =>
    fc.tuple(
      fc.constant(count),
      fc.array(
        fc.tuple(fc.nat({ max: count - 1 }), fc.nat({ max: count - 1 })).map(([from, to]): EdgePair => [from, to]),
        { maxLength: count * 2 },
      ),
    ),
  );

  for (const reflexive of [true, false]) {
    it(`agrees on matrices with reflexive=${reflexive}`, () => {
      fc.assert(
        fc.property(directedGraphArb, ([count, edges]) => {
          const graph = buildDirectedMatrix(count, edges);
          const options = { reflexive, config: DEFAULT_ENGINE_CONFIG };
          const expected = formatReachability(closureByTraversal(graph, { ...options, traversal: "bfs" }));
          expect(formatReachability(closureByTraversal(graph, { ...options, traversal: "dfs" }))).to.equal(expected);
          expect(formatReachability(closureByCondensation(graph, options))).to.equal(expected);
        }),
        { numRuns: 60 },
      );
    });
  }

  it("agrees between adjacency lists and matrices", () => {
    fc.assert(
      fc.property(directedGraphArb, fc.boolean(), ([count, edges], reflexive) => {
        const options = { reflexive, config: DEFAULT_ENGINE_CONFIG };
        const fromList = closureByCondensation(buildDirectedList(count, edges), options);
        const fromMatrix = closureByCondensation(buildDirectedMatrix(count, edges), options);
        expect(fromList).to.deep.equal(fromMatrix);
      }),
      { numRuns: 60 },
    );
  });

  it("keeps every diagonal cell in reflexive mode", () => {
    fc.assert(
      fc.property(directedGraphArb, ([count, edges]) => {
        const matrix = closureByCondensation(buildDirectedMatrix(count, edges), {
          reflexive: true,
          config: DEFAULT_ENGINE_CONFIG,
        });
        for (let node = 0; node < count; node += 1) {
          expect(matrix[node][node]).to.equal(true);
        }
      }),
      { numRuns: 40 },
    );
  });
});
