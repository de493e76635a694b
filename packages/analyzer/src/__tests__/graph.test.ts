import { describe, it, expect } from "vitest";
import {
  adjacencyList,
  createDigraph,
  detectCycles,
  hasCycles,
  inducedSubgraph,
  leaderCandidates,
  reachable,
  stronglyConnectedComponents,
} from "../index.js";

describe("graph construction", () => {
  it("adds nodes named only by edges and drops duplicate edges", () => {
    const g = createDigraph(
      ["a"],
      [
        ["a", "b"],
        ["a", "b"],
        ["b", "c"],
      ]
    );
    expect(g.nodes).toEqual(["a", "b", "c"]);
    expect(g.edges).toEqual([
      { from: "a", to: "b" },
      { from: "b", to: "c" },
    ]);
    expect(adjacencyList(g).get("a")).toEqual(["b"]);
  });
});

describe("algorithms", () => {
  const g = createDigraph(
    ["a", "b", "c", "d"],
    [
      ["a", "b"],
      ["b", "a"],
      ["b", "c"],
      ["c", "d"],
    ]
  );

  it("emits components callees first", () => {
    expect(stronglyConnectedComponents(g)).toEqual([["d"], ["c"], ["b", "a"]]);
  });

  it("detects cycles, including self-edges", () => {
    expect(hasCycles(g)).toBe(true);
    expect(hasCycles(inducedSubgraph(g, new Set(["b", "c", "d"])))).toBe(false);
    expect(hasCycles(createDigraph(["x"], [["x", "x"]]))).toBe(true);
  });

  it("enumerates elementary cycles", () => {
    expect(detectCycles(g)).toEqual([["a", "b"]]);
  });

  it("finds reachable nodes", () => {
    expect([...reachable(g, "c")]).toEqual(["d"]);
    expect([...reachable(g, "a")].sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("finds leader candidates on every cycle", () => {
    const figureEight = createDigraph(
      ["a", "b", "c"],
      [
        ["a", "b"],
        ["b", "a"],
        ["b", "c"],
        ["c", "b"],
      ]
    );
    expect(leaderCandidates(figureEight, ["a", "b", "c"])).toEqual(["b"]);
  });
});
