/**
 * Core types for @pegforge/grammar
 *
 * The grammar IR: a grammar owns an ordered list of rules; items refer to
 * rules by name only, resolved to a stable index through a {@link RuleIndex}.
 */

import type { SourceSpan } from "@pegforge/core";

/** Result of a parse attempt: success with a value or failure with expected description. */
export type ParseResult<T> = { ok: true; value: T; pos: number } | { ok: false; pos: number; expected: string };

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

/** A keyword or operator token, e.g. `'if'`, `'+'`, or a soft keyword `"match"`. */
export interface Literal {
  readonly kind: "literal";
  readonly value: string;
  /** Double-quoted in the grammar: a soft keyword when identifier-like. */
  readonly soft: boolean;
  readonly span?: SourceSpan;
}

export interface RuleRef {
  readonly kind: "ruleRef";
  readonly name: string;
  readonly span?: SourceSpan;
}

export interface TokenRef {
  readonly kind: "tokenRef";
  readonly category: string;
  readonly span?: SourceSpan;
}

/** `( a | b )` */
export interface Group {
  readonly kind: "group";
  readonly alternatives: readonly Alternative[];
}

/** `[e]` or `e?` */
export interface Opt {
  readonly kind: "opt";
  readonly item: Item;
}

/** `e*` */
export interface Repeat0 {
  readonly kind: "repeat0";
  readonly item: Item;
}

/** `e+` */
export interface Repeat1 {
  readonly kind: "repeat1";
  readonly item: Item;
}

/** `s.e+`: one or more `e` separated by `s`; separator values are dropped. */
export interface Gather {
  readonly kind: "gather";
  readonly separator: Item;
  readonly element: Item;
}

/** `&e` (positive) or `!e` (negative). */
export interface Lookahead {
  readonly kind: "lookahead";
  readonly positive: boolean;
  readonly item: Item;
}

/** `~` */
export interface Cut {
  readonly kind: "cut";
}

/** `&&e`: failure of `e` is a hard syntax error. */
export interface Forced {
  readonly kind: "forced";
  readonly item: Item;
}

export type Item = Literal | RuleRef | TokenRef | Group | Opt | Repeat0 | Repeat1 | Gather | Lookahead | Cut | Forced;

export type ItemKind = Item["kind"];

// ---------------------------------------------------------------------------
// Alternatives and rules
// ---------------------------------------------------------------------------

/**
 * What an alternative produces once it matches.
 *
 * - `default`: no action written; the item value(s) are the result
 * - `custom`: opaque expression text, interpreted by the backend
 * - `none`: the value is never observed (alternatives under a lookahead)
 */
export type Action = { kind: "none" } | { kind: "default" } | { kind: "custom"; code: string };

export interface NamedItem {
  /** Explicit binding (`name=item`) */
  readonly name?: string;
  /** Declared binding type (`name[type]=item`) */
  readonly type?: string;
  readonly item: Item;
}

export interface Alternative {
  readonly items: readonly NamedItem[];
  readonly action: Action;
  /** True when the alternative contains a cut. */
  readonly commits: boolean;
  readonly span?: SourceSpan;
}

/** Flags the analyzer writes; everything else on a rule is read-only. */
export interface RuleAnnotations {
  nullable: boolean;
  leftRecursive: boolean;
  leader: boolean;
  memoize: boolean;
}

export interface Rule extends RuleAnnotations {
  readonly name: string;
  /** Declared result type, passed through to backends untouched. */
  readonly type?: string;
  readonly alternatives: readonly Alternative[];
  /** `(memo)` written after the rule name */
  readonly memoHint: boolean;
  readonly span?: SourceSpan;
}

export interface Grammar {
  /** Declaration order; the first rule is the start rule. */
  readonly rules: readonly Rule[];
  /** `@name value` directives, e.g. `class`, `header`, `trailer`. */
  readonly metas: ReadonlyMap<string, string | undefined>;
  readonly keywords: ReadonlySet<string>;
  readonly softKeywords: ReadonlySet<string>;
  readonly fileName?: string;
  /** Grammar source text, kept for diagnostics. */
  readonly source?: string;
}

/** Token categories every grammar may reference. */
export const BUILTIN_TOKENS: ReadonlySet<string> = new Set([
  "NAME",
  "NUMBER",
  "STRING",
  "OP",
  "NEWLINE",
  "INDENT",
  "DEDENT",
  "ENDMARKER",
  "KEYWORD",
  "SOFT_KEYWORD",
]);
