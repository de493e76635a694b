/**
 * Canonical grammar notation.
 *
 * The printed form reads back through {@link parseGrammar} to an equal IR,
 * and is what diagnostics, forced-match messages and generated-code comments
 * show.
 */

import type { Alternative, Grammar, Item, NamedItem, Rule } from "./types.js";

function quote(value: string, soft: boolean): string {
  const q = soft ? '"' : "'";
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .split(q)
    .join(`\\${q}`);
  return `${q}${escaped}${q}`;
}

/** Atoms print bare; anything with operators inside is parenthesized when nested. */
function formatAtom(item: Item): string {
  switch (item.kind) {
    case "literal":
    case "ruleRef":
    case "tokenRef":
    case "group":
      return formatItem(item);
    default:
      return `(${formatItem(item)})`;
  }
}

export function formatItem(item: Item): string {
  switch (item.kind) {
    case "literal":
      return quote(item.value, item.soft);
    case "ruleRef":
      return item.name;
    case "tokenRef":
      return item.category;
    case "group":
      return `(${item.alternatives.map(formatAlternative).join(" | ")})`;
    case "opt":
      if (item.item.kind === "group") {
        return `[${item.item.alternatives.map(formatAlternative).join(" | ")}]`;
      }
      return `${formatAtom(item.item)}?`;
    case "repeat0":
      return `${formatAtom(item.item)}*`;
    case "repeat1":
      return `${formatAtom(item.item)}+`;
    case "gather":
      return `${formatAtom(item.separator)}.${formatAtom(item.element)}+`;
    case "lookahead":
      return `${item.positive ? "&" : "!"}${formatAtom(item.item)}`;
    case "cut":
      return "~";
    case "forced":
      return `&&${formatAtom(item.item)}`;
  }
}

export function formatNamedItem(named: NamedItem): string {
  const text = formatItem(named.item);
  if (named.name === undefined) return text;
  return named.type === undefined ? `${named.name}=${text}` : `${named.name}[${named.type}]=${text}`;
}

/** Items and action, without the leading `|`. */
export function formatAlternative(alternative: Alternative): string {
  const items = alternative.items.map(formatNamedItem).join(" ");
  return alternative.action.kind === "custom" ? `${items} { ${alternative.action.code} }` : items;
}

export function formatRule(rule: Rule): string {
  const head = `${rule.name}${rule.type !== undefined ? `[${rule.type}]` : ""}${rule.memoHint ? " (memo)" : ""}`;
  if (rule.alternatives.length === 1) {
    return `${head}: ${formatAlternative(rule.alternatives[0])}`;
  }
  return [`${head}:`, ...rule.alternatives.map((a) => `    | ${formatAlternative(a)}`)].join("\n");
}

export function formatGrammar(grammar: Grammar): string {
  const lines: string[] = [];
  for (const [name, value] of grammar.metas) {
    lines.push(value === undefined ? `@${name}` : `@${name} ${JSON.stringify(value)}`);
  }
  if (lines.length > 0) lines.push("");
  for (const rule of grammar.rules) lines.push(formatRule(rule));
  return lines.join("\n") + "\n";
}
