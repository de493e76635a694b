/**
 * Structural traversal over the item tree.
 */

import type { Alternative, Item, NamedItem } from "./types.js";

/** Direct sub-items of an item, in source order. */
export function childItems(item: Item): Item[] {
  switch (item.kind) {
    case "group":
      return item.alternatives.flatMap((a) => a.items.map((n) => n.item));
    case "opt":
    case "repeat0":
    case "repeat1":
    case "lookahead":
    case "forced":
      return [item.item];
    case "gather":
      return [item.separator, item.element];
    case "literal":
    case "ruleRef":
    case "tokenRef":
    case "cut":
      return [];
  }
}

/** Visit every item under `alternatives`, parents before children. */
export function walkItems(alternatives: readonly Alternative[], visit: (item: Item) => void): void {
  const walk = (item: Item): void => {
    visit(item);
    for (const child of childItems(item)) walk(child);
  };
  for (const alternative of alternatives) {
    for (const named of alternative.items) walk(named.item);
  }
}

/**
 * Rebuild an item bottom-up, replacing each node with `fn(node)` after its
 * children have been rebuilt.
 */
export function mapItem(item: Item, fn: (item: Item) => Item): Item {
  switch (item.kind) {
    case "group":
      return fn({ ...item, alternatives: item.alternatives.map((a) => mapAlternative(a, fn)) });
    case "opt":
    case "repeat0":
    case "repeat1":
    case "forced":
      return fn({ ...item, item: mapItem(item.item, fn) });
    case "lookahead":
      return fn({ ...item, item: mapItem(item.item, fn) });
    case "gather":
      return fn({ ...item, separator: mapItem(item.separator, fn), element: mapItem(item.element, fn) });
    case "literal":
    case "ruleRef":
    case "tokenRef":
    case "cut":
      return fn(item);
  }
}

export function mapAlternative(alternative: Alternative, fn: (item: Item) => Item): Alternative {
  return {
    ...alternative,
    items: alternative.items.map((n): NamedItem => ({ ...n, item: mapItem(n.item, fn) })),
  };
}
