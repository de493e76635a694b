/**
 * @pegforge/analyzer
 *
 * Static analysis over the grammar IR: nullability, left recursion and
 * leaders, memoization eligibility, compilation order and first sets.
 *
 * @module
 */

export { analyze, type AnalyzeOptions, type GrammarAnalysis } from "./analyze.js";
export { computeNullable, isNullableItem, isNullableAlternative } from "./nullable.js";
export { buildFirstGraph, buildReferenceGraph, leftmostRefs, leftmostRefsOfSequence } from "./first-graph.js";
export { findLeftRecursion, leaderCandidates, type LeftRecursiveCluster } from "./left-recursion.js";
export {
  assignMemoization,
  isMemoizationMode,
  isTrivialRule,
  toMemoizationMode,
  MEMOIZATION_MODES,
} from "./memo.js";
export { computeFirstSets, type FirstSets } from "./first-sets.js";
export { compilationOrder } from "./order.js";
export { lintNullableRepetitions } from "./lints.js";
export { AmbiguousLeftRecursionError } from "./errors.js";
export {
  createDigraph,
  adjacencyList,
  hasEdge,
  inducedSubgraph,
  reachable,
  stronglyConnectedComponents,
  hasCycles,
  detectCycles,
  type Graph,
  type GraphEdge,
} from "./graph.js";
