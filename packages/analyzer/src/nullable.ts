/**
 * Nullability: which rules (and items) can succeed without consuming input.
 */

import type { Alternative, Grammar, Item } from "@pegforge/grammar";

export function isNullableItem(item: Item, nullableRules: ReadonlySet<string>): boolean {
  switch (item.kind) {
    case "literal":
    case "tokenRef":
      return false;
    case "ruleRef":
      return nullableRules.has(item.name);
    case "opt":
    case "repeat0":
    case "lookahead":
    case "cut":
      return true;
    case "repeat1":
    case "forced":
      return isNullableItem(item.item, nullableRules);
    case "gather":
      return isNullableItem(item.element, nullableRules);
    case "group":
      return item.alternatives.some((a) => isNullableAlternative(a, nullableRules));
  }
}

export function isNullableAlternative(alternative: Alternative, nullableRules: ReadonlySet<string>): boolean {
  return alternative.items.every((n) => isNullableItem(n.item, nullableRules));
}

/**
 * Fixpoint over all rules: a rule is nullable when one of its alternatives
 * is. Sets `rule.nullable` and returns the nullable rule names.
 */
export function computeNullable(grammar: Grammar): Set<string> {
  const nullable = new Set<string>();
  let changed = true;
  while (changed) {
    changed = false;
    for (const rule of grammar.rules) {
      if (nullable.has(rule.name)) continue;
      if (rule.alternatives.some((a) => isNullableAlternative(a, nullable))) {
        nullable.add(rule.name);
        changed = true;
      }
    }
  }
  for (const rule of grammar.rules) rule.nullable = nullable.has(rule.name);
  return nullable;
}
