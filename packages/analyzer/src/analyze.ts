/**
 * The analysis pipeline.
 *
 * Annotates every rule in place (`nullable`, `leftRecursive`, `leader`,
 * `memoize`) and returns a summary for compilers and tooling. Every pass
 * recomputes its flags from scratch, so analyzing twice gives the same
 * result.
 */

import { config, createLogger } from "@pegforge/core";
import type { Logger, MemoizationMode, RichDiagnostic } from "@pegforge/core";
import type { Grammar } from "@pegforge/grammar";
import type { Graph } from "./graph.js";
import { buildFirstGraph, buildReferenceGraph } from "./first-graph.js";
import { computeFirstSets, type FirstSets } from "./first-sets.js";
import { findLeftRecursion, type LeftRecursiveCluster } from "./left-recursion.js";
import { lintNullableRepetitions } from "./lints.js";
import { assignMemoization, toMemoizationMode } from "./memo.js";
import { computeNullable } from "./nullable.js";
import { compilationOrder } from "./order.js";

export interface AnalyzeOptions {
  /** Overrides the `memoization.mode` configuration */
  memoization?: MemoizationMode;
  logger?: Logger;
}

export interface GrammarAnalysis {
  readonly nullable: ReadonlySet<string>;
  /** Leftmost-caller graph */
  readonly firstGraph: Graph;
  /** Every rule reference, leftmost or not */
  readonly referenceGraph: Graph;
  readonly clusters: readonly LeftRecursiveCluster[];
  readonly memoized: ReadonlySet<string>;
  /** Rule names, callees first */
  readonly order: readonly string[];
  readonly firstSets: FirstSets;
  readonly warnings: readonly RichDiagnostic[];
}

/**
 * Analyze a validated grammar.
 *
 * @throws AmbiguousLeftRecursionError when a left-recursive cluster has no leader
 * @throws PegforgeError (PEG4001) for an unknown memoization mode
 */
export function analyze(grammar: Grammar, options: AnalyzeOptions = {}): GrammarAnalysis {
  const logger = options.logger ?? createLogger("analyzer");
  const mode = toMemoizationMode(options.memoization ?? config.get("memoization.mode"));

  const nullable = computeNullable(grammar);
  logger.debug(`nullable rules: ${[...nullable].join(", ") || "(none)"}`);

  const firstGraph = buildFirstGraph(grammar, nullable);
  const clusters = findLeftRecursion(grammar, firstGraph);
  for (const cluster of clusters) {
    logger.debug(`left-recursive cluster {${cluster.rules.join(", ")}} led by ${cluster.leader}`);
  }

  const memoized = assignMemoization(grammar, mode);
  logger.debug(`memoization mode ${mode}: ${memoized.size} of ${grammar.rules.length} rules memoized`);

  const referenceGraph = buildReferenceGraph(grammar);
  const order = compilationOrder(grammar, referenceGraph);
  const firstSets = computeFirstSets(grammar, nullable);
  const warnings = lintNullableRepetitions(grammar, nullable);

  return { nullable, firstGraph, referenceGraph, clusters, memoized, order, firstSets, warnings };
}
