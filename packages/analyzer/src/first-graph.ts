/**
 * Call graphs over rules.
 *
 * The leftmost-caller graph has an edge L → R when some alternative of L
 * can invoke R before consuming any input: R is referenced after a prefix of
 * nullable items. Left recursion is a cycle in this graph.
 */

import type { Alternative, Grammar, Item } from "@pegforge/grammar";
import { walkItems } from "@pegforge/grammar";
import { createDigraph, type Graph } from "./graph.js";
import { isNullableItem } from "./nullable.js";

/** Rules an item can call at its own starting position. */
export function leftmostRefs(item: Item, nullable: ReadonlySet<string>): string[] {
  switch (item.kind) {
    case "literal":
    case "tokenRef":
    case "cut":
      return [];
    case "ruleRef":
      return [item.name];
    case "opt":
    case "repeat0":
    case "repeat1":
    case "lookahead":
    case "forced":
      return leftmostRefs(item.item, nullable);
    case "gather": {
      const refs = leftmostRefs(item.element, nullable);
      return isNullableItem(item.element, nullable) ? [...refs, ...leftmostRefs(item.separator, nullable)] : refs;
    }
    case "group":
      return item.alternatives.flatMap((a) => leftmostRefsOfSequence(a, nullable));
  }
}

/** Leftmost calls of a sequence: each item's, until the first non-nullable one. */
export function leftmostRefsOfSequence(alternative: Alternative, nullable: ReadonlySet<string>): string[] {
  const refs: string[] = [];
  for (const { item } of alternative.items) {
    refs.push(...leftmostRefs(item, nullable));
    if (!isNullableItem(item, nullable)) break;
  }
  return refs;
}

export function buildFirstGraph(grammar: Grammar, nullable: ReadonlySet<string>): Graph {
  const edges: [string, string][] = [];
  for (const rule of grammar.rules) {
    for (const alternative of rule.alternatives) {
      for (const callee of leftmostRefsOfSequence(alternative, nullable)) edges.push([rule.name, callee]);
    }
  }
  return createDigraph(
    grammar.rules.map((r) => r.name),
    edges
  );
}

/** Every rule reference anywhere in a rule, in or out of leftmost position. */
export function buildReferenceGraph(grammar: Grammar): Graph {
  const edges: [string, string][] = [];
  for (const rule of grammar.rules) {
    walkItems(rule.alternatives, (item) => {
      if (item.kind === "ruleRef") edges.push([rule.name, item.name]);
    });
  }
  return createDigraph(
    grammar.rules.map((r) => r.name),
    edges
  );
}
