import type { Grammar } from "@pegforge/grammar";
import { stronglyConnectedComponents, type Graph } from "./graph.js";

/**
 * Rules in dependency order: components of the reference graph callees
 * first, members of a component in declaration order.
 */
export function compilationOrder(grammar: Grammar, referenceGraph: Graph): string[] {
  const declared = new Map(grammar.rules.map((r, i): [string, number] => [r.name, i]));
  return stronglyConnectedComponents(referenceGraph).flatMap((scc) =>
    [...scc].sort((a, b) => (declared.get(a) ?? 0) - (declared.get(b) ?? 0))
  );
}
