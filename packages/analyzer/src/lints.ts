import { DiagnosticBuilder, PEG2002 } from "@pegforge/core";
import type { RichDiagnostic } from "@pegforge/core";
import type { Grammar, Item } from "@pegforge/grammar";
import { formatItem, walkItems } from "@pegforge/grammar";
import { isNullableItem } from "./nullable.js";

/** The part of a repetition that runs once per iteration, if it can match nothing. */
function emptyIteration(item: Item, nullable: ReadonlySet<string>): Item | undefined {
  switch (item.kind) {
    case "repeat0":
    case "repeat1":
      return isNullableItem(item.item, nullable) ? item.item : undefined;
    case "gather":
      return isNullableItem(item.element, nullable) && isNullableItem(item.separator, nullable)
        ? item.element
        : undefined;
    default:
      return undefined;
  }
}

/** PEG2002 for every repetition whose iteration can consume nothing. */
export function lintNullableRepetitions(grammar: Grammar, nullable: ReadonlySet<string>): RichDiagnostic[] {
  const warnings: RichDiagnostic[] = [];
  for (const rule of grammar.rules) {
    walkItems(rule.alternatives, (item) => {
      const empty = emptyIteration(item, nullable);
      if (!empty) return;
      const span =
        empty.kind === "ruleRef" || empty.kind === "tokenRef" || empty.kind === "literal" ? empty.span : rule.span;
      warnings.push(
        new DiagnosticBuilder(PEG2002)
          .at(span)
          .withArgs({ rule: rule.name, item: formatItem(empty) })
          .build()
      );
    });
  }
  return warnings;
}
