/**
 * First sets: the tokens a non-empty match of each rule can start with.
 *
 * Entries are token categories (`NAME`) or literals in grammar notation
 * (`'if'`, `"match"`). Lookaheads consume nothing and contribute nothing.
 */

import type { Alternative, Grammar, Item } from "@pegforge/grammar";
import { formatItem } from "@pegforge/grammar";
import { isNullableItem } from "./nullable.js";

export type FirstSets = ReadonlyMap<string, ReadonlySet<string>>;

function firstOfItem(item: Item, sets: FirstSets, nullable: ReadonlySet<string>): string[] {
  switch (item.kind) {
    case "literal":
      return [formatItem(item)];
    case "tokenRef":
      return [item.category];
    case "ruleRef":
      return [...(sets.get(item.name) ?? [])];
    case "opt":
    case "repeat0":
    case "repeat1":
    case "forced":
      return firstOfItem(item.item, sets, nullable);
    case "gather": {
      const first = firstOfItem(item.element, sets, nullable);
      return isNullableItem(item.element, nullable) ? [...first, ...firstOfItem(item.separator, sets, nullable)] : first;
    }
    case "group":
      return item.alternatives.flatMap((a) => firstOfSequence(a, sets, nullable));
    case "lookahead":
    case "cut":
      return [];
  }
}

function firstOfSequence(alternative: Alternative, sets: FirstSets, nullable: ReadonlySet<string>): string[] {
  const first: string[] = [];
  for (const { item } of alternative.items) {
    first.push(...firstOfItem(item, sets, nullable));
    if (!isNullableItem(item, nullable)) break;
  }
  return first;
}

export function computeFirstSets(grammar: Grammar, nullable: ReadonlySet<string>): Map<string, Set<string>> {
  const sets = new Map<string, Set<string>>(grammar.rules.map((r): [string, Set<string>] => [r.name, new Set()]));
  let changed = true;
  while (changed) {
    changed = false;
    for (const rule of grammar.rules) {
      const set = sets.get(rule.name);
      if (!set) continue;
      for (const alternative of rule.alternatives) {
        for (const entry of firstOfSequence(alternative, sets, nullable)) {
          if (set.has(entry)) continue;
          set.add(entry);
          changed = true;
        }
      }
    }
  }
  return sets;
}
