/**
 * Left-recursive clusters and their leaders.
 *
 * A cluster is a strongly connected component of the leftmost-caller graph
 * that contains a cycle. Its leader runs the seed-growing loop; the leader
 * must lie on every cycle of the cluster so that every left-recursive call
 * passes through it.
 */

import type { Grammar } from "@pegforge/grammar";
import { AmbiguousLeftRecursionError } from "./errors.js";
import { detectCycles, hasCycles, hasEdge, inducedSubgraph, stronglyConnectedComponents, type Graph } from "./graph.js";

export interface LeftRecursiveCluster {
  /** Members in declaration order */
  readonly rules: readonly string[];
  readonly leader: string;
}

/**
 * Members of a component that every cycle passes through: removing such a
 * member leaves the rest of the component acyclic.
 */
export function leaderCandidates(graph: Graph, component: readonly string[]): string[] {
  const members = new Set(component);
  return component.filter((candidate) => {
    const rest = new Set(members);
    rest.delete(candidate);
    return !hasCycles(inducedSubgraph(graph, rest));
  });
}

/**
 * Find left-recursive clusters in `firstGraph`, set `leftRecursive` and
 * `leader` on the rules, and return the clusters in declaration order of
 * their leaders.
 *
 * @throws AmbiguousLeftRecursionError when a cluster has no candidate leader
 */
export function findLeftRecursion(grammar: Grammar, firstGraph: Graph): LeftRecursiveCluster[] {
  const declared = new Map(grammar.rules.map((r, i): [string, number] => [r.name, i]));
  const byDeclaration = (a: string, b: string): number => (declared.get(a) ?? 0) - (declared.get(b) ?? 0);

  for (const rule of grammar.rules) {
    rule.leftRecursive = false;
    rule.leader = false;
  }

  const clusters: LeftRecursiveCluster[] = [];
  for (const scc of stronglyConnectedComponents(firstGraph)) {
    const component = [...scc].sort(byDeclaration);
    const [first] = component;
    if (component.length === 1 && !hasEdge(firstGraph, first, first)) continue;

    const candidates = component.length === 1 ? component : leaderCandidates(firstGraph, component);
    if (candidates.length === 0) {
      const cycles = detectCycles(inducedSubgraph(firstGraph, new Set(component)));
      throw new AmbiguousLeftRecursionError(
        component,
        cycles.map((cycle) => `cycle: ${[...cycle, cycle[0]].join(" -> ")}`),
        "No rule lies on every cycle, which is not supported; inline one of these rules into the others " +
          "so that a single rule is shared by all cycles"
      );
    }

    const leader = candidates[0];
    clusters.push({ rules: component, leader });
    const members = new Set(component);
    for (const rule of grammar.rules) {
      if (!members.has(rule.name)) continue;
      rule.leftRecursive = true;
      rule.leader = rule.name === leader;
    }
  }

  return clusters.sort((a, b) => byDeclaration(a.leader, b.leader));
}
