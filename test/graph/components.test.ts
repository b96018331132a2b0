import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { bfsConnectedComponents } from "../../src/graph/components.js";
import { graphFromRecord } from "../../src/graph/helpers.js";

describe("bfsConnectedComponents", () => {
  it("splits a graph into its components in key order", () => {
    const graph = graphFromRecord({
      A: ["B", "C"],
      B: ["A", "C"],
      C: ["A", "B"],
      D: ["E"],
      E: ["D"],
      F: [],
    });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [
      ["A", "B", "C"],
      ["D", "E"],
      ["F"],
    ]);
  });

  it("orders members by BFS from the seeding key", () => {
    const graph = graphFromRecord({
      C: ["A"],
      A: ["C", "B"],
      B: ["A"],
    });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [["C", "A", "B"]]);
  });

  it("returns no components for an empty graph", () => {
    assert.deepStrictEqual(bfsConnectedComponents(new Map<string, string[]>()), []);
  });

  it("makes an isolated vertex a singleton", () => {
    const graph = graphFromRecord({ A: [], B: [] });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [["A"], ["B"]]);
  });

  it("includes undeclared vertices in the component that reaches them", () => {
    const graph = graphFromRecord({ A: ["X"], B: [] });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [["A", "X"], ["B"]]);
  });

  it("counts an undeclared vertex once when several keys reach it", () => {
    const graph = graphFromRecord({ A: ["X"], B: ["X"] });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [["A", "X"], ["B"]]);
  });

  it("follows edges one way for directed graphs", () => {
    // B reaches A, but A is seeded first and cannot reach B.
    const graph = graphFromRecord({ A: [], B: ["A"] });
    assert.deepStrictEqual(bfsConnectedComponents(graph), [["A"], ["B"]]);
  });

  it("puts every key in exactly one component", () => {
    const graph = graphFromRecord({
      P: ["Q"],
      Q: ["R"],
      R: [],
      S: ["P", "T"],
      T: [],
      U: ["U"],
    });
    const components = bfsConnectedComponents(graph);
    assert.deepStrictEqual(components, [["P", "Q", "R"], ["S", "T"], ["U"]]);
    const members = components.flat();
    assert.equal(new Set(members).size, members.length);
    assert.deepStrictEqual(new Set(members), new Set(graph.keys()));
  });
});
