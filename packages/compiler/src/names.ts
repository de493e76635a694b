/**
 * Binding names for alternative items.
 *
 * An unnamed item binds to a name derived from what it matches: the rule
 * name, the lower-cased token category, `literal`, or the helper name of a
 * group, repetition or gather. Within one alternative repeated names get
 * `_1`, `_2`, ... suffixes.
 */

import type { Matcher } from "./types.js";

/** Whether an item produces a value an action can observe. */
export function isValueBearing(matcher: Matcher): boolean {
  switch (matcher.kind) {
    case "lookahead":
    case "cut":
      return false;
    case "optional":
    case "forced":
      return isValueBearing(matcher.matcher);
    default:
      return true;
  }
}

export function defaultBindingName(matcher: Matcher): string | undefined {
  switch (matcher.kind) {
    case "literal":
      return "literal";
    case "token":
      return matcher.category.toLowerCase();
    case "rule":
      return matcher.name;
    case "choice":
    case "repeat":
    case "gather":
      return matcher.name;
    case "optional":
    case "forced":
      return defaultBindingName(matcher.matcher);
    case "lookahead":
    case "cut":
      return undefined;
  }
}

/** Hands out unique names within one alternative. */
export class BindingScope {
  private readonly taken = new Map<string, number>();

  claim(name: string): string {
    const uses = this.taken.get(name);
    if (uses === undefined) {
      this.taken.set(name, 0);
      return name;
    }
    let suffix = uses + 1;
    while (this.taken.has(`${name}_${suffix}`)) suffix++;
    this.taken.set(name, suffix);
    this.taken.set(`${name}_${suffix}`, 0);
    return `${name}_${suffix}`;
  }
}
