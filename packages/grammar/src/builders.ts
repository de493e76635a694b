/**
 * Programmatic grammar construction.
 *
 * @example
 * ```typescript
 * const g = grammar([
 *   rule("expr", [
 *     alt([ref("expr"), lit("+"), ref("term")], "['add', expr, term]"),
 *     alt([ref("term")]),
 *   ]),
 *   rule("term", [[tok("NUMBER")]]),
 * ]);
 * ```
 */

import type { SourceSpan } from "@pegforge/core";
import type {
  Alternative,
  Cut,
  Forced,
  Gather,
  Grammar,
  Group,
  Item,
  Literal,
  Lookahead,
  NamedItem,
  Opt,
  Repeat0,
  Repeat1,
  Rule,
  RuleRef,
  TokenRef,
} from "./types.js";
import { collectKeywords } from "./keywords.js";

export type ItemLike = Item | NamedItem;

function isNamedItem(x: ItemLike): x is NamedItem {
  return !("kind" in x);
}

export function toNamedItem(x: ItemLike): NamedItem {
  return isNamedItem(x) ? x : { item: x };
}

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

/** Hard keyword or operator literal (`'if'`, `'+'`). */
export function lit(value: string, span?: SourceSpan): Literal {
  return span ? { kind: "literal", value, soft: false, span } : { kind: "literal", value, soft: false };
}

/** Soft keyword literal (`"match"`). */
export function soft(value: string, span?: SourceSpan): Literal {
  return span ? { kind: "literal", value, soft: true, span } : { kind: "literal", value, soft: true };
}

export function ref(name: string, span?: SourceSpan): RuleRef {
  return span ? { kind: "ruleRef", name, span } : { kind: "ruleRef", name };
}

export function tok(category: string, span?: SourceSpan): TokenRef {
  return span ? { kind: "tokenRef", category, span } : { kind: "tokenRef", category };
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

export function group(...alternatives: Array<Alternative | ItemLike[]>): Group {
  return { kind: "group", alternatives: alternatives.map(toAlternative) };
}

/** A parenthesized sequence: `(a b c)`. */
export function seq(...items: ItemLike[]): Group {
  return group(alt(items));
}

export function opt(item: Item): Opt {
  return { kind: "opt", item };
}

export function star(item: Item): Repeat0 {
  return { kind: "repeat0", item };
}

export function plus(item: Item): Repeat1 {
  return { kind: "repeat1", item };
}

export function gather(separator: Item, element: Item): Gather {
  return { kind: "gather", separator, element };
}

/** `&e` */
export function lookahead(item: Item): Lookahead {
  return { kind: "lookahead", positive: true, item };
}

/** `!e` */
export function not(item: Item): Lookahead {
  return { kind: "lookahead", positive: false, item };
}

export function cut(): Cut {
  return { kind: "cut" };
}

export function forced(item: Item): Forced {
  return { kind: "forced", item };
}

export function named(name: string, item: Item, type?: string): NamedItem {
  return type === undefined ? { name, item } : { name, item, type };
}

// ---------------------------------------------------------------------------
// Alternatives, rules, grammars
// ---------------------------------------------------------------------------

/**
 * Build an alternative. A string action becomes a custom action; without one
 * the alternative produces its default result.
 */
export function alt(items: ItemLike[], action?: string, span?: SourceSpan): Alternative {
  const namedItems = items.map(toNamedItem);
  const alternative: Alternative = {
    items: namedItems,
    action: action === undefined ? { kind: "default" } : { kind: "custom", code: action },
    commits: namedItems.some((n) => n.item.kind === "cut"),
  };
  return span ? { ...alternative, span } : alternative;
}

function toAlternative(x: Alternative | ItemLike[]): Alternative {
  return Array.isArray(x) ? alt(x) : x;
}

export interface RuleOptions {
  type?: string;
  memo?: boolean;
  span?: SourceSpan;
}

/** Create a rule with fresh (unanalyzed) annotations. */
export function rule(name: string, alternatives: Array<Alternative | ItemLike[]>, options: RuleOptions = {}): Rule {
  const created: Rule = {
    name,
    alternatives: alternatives.map(toAlternative),
    memoHint: options.memo ?? false,
    nullable: false,
    leftRecursive: false,
    leader: false,
    memoize: true,
  };
  return {
    ...created,
    ...(options.type !== undefined ? { type: options.type } : {}),
    ...(options.span !== undefined ? { span: options.span } : {}),
  };
}

export interface GrammarOptions {
  metas?: Record<string, string | undefined>;
  fileName?: string;
  source?: string;
}

/**
 * Assemble a grammar. Hard and soft keywords are collected from the literals.
 */
export function grammar(rules: Rule[], options: GrammarOptions = {}): Grammar {
  const metas = new Map<string, string | undefined>(Object.entries(options.metas ?? {}));
  const { keywords, softKeywords } = collectKeywords(rules);
  return {
    rules,
    metas,
    keywords,
    softKeywords,
    ...(options.fileName !== undefined ? { fileName: options.fileName } : {}),
    ...(options.source !== undefined ? { source: options.source } : {}),
  };
}
