/**
 * Memoization eligibility.
 */

import { DiagnosticBuilder, PEG4001, PegforgeError } from "@pegforge/core";
import type { MemoizationMode } from "@pegforge/core";
import type { Grammar, Rule } from "@pegforge/grammar";

export const MEMOIZATION_MODES: ReadonlyArray<MemoizationMode> = ["all", "non-trivial", "hinted"];

export function isMemoizationMode(value: unknown): value is MemoizationMode {
  return MEMOIZATION_MODES.some((mode) => mode === value);
}

/** Narrow a configured value, raising PEG4001 for anything else. */
export function toMemoizationMode(value: unknown): MemoizationMode {
  if (value === undefined) return "all";
  if (isMemoizationMode(value)) return value;
  throw new PegforgeError(
    new DiagnosticBuilder(PEG4001)
      .withArgs({
        key: "memoization.mode",
        detail: `expected one of ${MEMOIZATION_MODES.map((m) => `"${m}"`).join(", ")}, got ${JSON.stringify(value)}`,
      })
      .build()
  );
}

/** Every alternative is one literal or one token: re-running it costs a single comparison. */
export function isTrivialRule(rule: Rule): boolean {
  return rule.alternatives.every(
    (a) => a.items.length === 1 && (a.items[0].item.kind === "literal" || a.items[0].item.kind === "tokenRef")
  );
}

function shouldMemoize(rule: Rule, mode: MemoizationMode): boolean {
  if (rule.leftRecursive) return true;
  switch (mode) {
    case "all":
      return true;
    case "non-trivial":
      return !isTrivialRule(rule);
    case "hinted":
      return rule.memoHint;
  }
}

/**
 * Set `rule.memoize` for every rule. Left-recursive rules are always
 * memoized; run after {@link findLeftRecursion}.
 */
export function assignMemoization(grammar: Grammar, mode: MemoizationMode): Set<string> {
  const memoized = new Set<string>();
  for (const rule of grammar.rules) {
    rule.memoize = shouldMemoize(rule, mode);
    if (rule.memoize) memoized.add(rule.name);
  }
  return memoized;
}
