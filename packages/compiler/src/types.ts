/**
 * Core types for @pegforge/compiler
 *
 * A compiled grammar is a frozen plan: every rule becomes an ordered list of
 * alternatives, every alternative a sequence of matchers with the names
 * their values bind to. Backends execute or render the plan; they never see
 * the grammar IR.
 */

import type { RichDiagnostic } from "@pegforge/core";
import type { GrammarAnalysis } from "@pegforge/analyzer";

/** How a literal relates to the NAME token category. */
export type KeywordClass = "hard" | "soft" | "none";

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

export interface LiteralMatcher {
  readonly kind: "literal";
  readonly value: string;
  readonly keyword: KeywordClass;
}

export interface TokenMatcher {
  readonly kind: "token";
  readonly category: string;
}

export interface RuleMatcher {
  readonly kind: "rule";
  readonly name: string;
  readonly index: number;
}

/** A parenthesized group; `name` is its helper name (`_tmp_N`). */
export interface ChoiceMatcher {
  readonly kind: "choice";
  readonly name: string;
  readonly alternatives: readonly CompiledAlternative[];
}

export interface OptionalMatcher {
  readonly kind: "optional";
  readonly matcher: Matcher;
}

/** `e*` (min 0) or `e+` (min 1); `name` is `_loop0_N` or `_loop1_N`. */
export interface RepeatMatcher {
  readonly kind: "repeat";
  readonly name: string;
  readonly min: 0 | 1;
  readonly matcher: Matcher;
}

/** `s.e+`; `name` is `_gather_N`. */
export interface GatherMatcher {
  readonly kind: "gather";
  readonly name: string;
  readonly separator: Matcher;
  readonly element: Matcher;
}

export interface LookaheadMatcher {
  readonly kind: "lookahead";
  readonly positive: boolean;
  readonly matcher: Matcher;
}

export interface CutMatcher {
  readonly kind: "cut";
}

export interface ForcedMatcher {
  readonly kind: "forced";
  readonly matcher: Matcher;
  /** What the error message says was expected, in grammar notation */
  readonly expected: string;
}

export type Matcher =
  | LiteralMatcher
  | TokenMatcher
  | RuleMatcher
  | ChoiceMatcher
  | OptionalMatcher
  | RepeatMatcher
  | GatherMatcher
  | LookaheadMatcher
  | CutMatcher
  | ForcedMatcher;

// ---------------------------------------------------------------------------
// Alternatives, rules, grammar
// ---------------------------------------------------------------------------

export interface CompiledItem {
  readonly matcher: Matcher;
  /** Name the item's value binds to; absent for lookahead and cut */
  readonly binding?: string;
  readonly type?: string;
}

/** `custom` actions refer to the grammar's action table by `id`. */
export type CompiledAction = { kind: "none" } | { kind: "default" } | { kind: "custom"; code: string; id: number };

/**
 * `value`: the alternative (or rule) yields a single value; `sequence`: the
 * ordered list of its item values.
 */
export type ResultKind = "value" | "sequence";

export interface CompiledAlternative {
  readonly items: readonly CompiledItem[];
  /** Binding names of the value-bearing items, in order */
  readonly bindings: readonly string[];
  readonly action: CompiledAction;
  /** Index in `items` of the first cut, or -1 */
  readonly cutIndex: number;
  readonly resultKind: ResultKind;
  /** The alternative in grammar notation */
  readonly text: string;
}

export interface CompiledRule {
  readonly name: string;
  readonly index: number;
  readonly type?: string;
  readonly alternatives: readonly CompiledAlternative[];
  readonly resultKind: ResultKind;
  readonly nullable: boolean;
  readonly leftRecursive: boolean;
  readonly leader: boolean;
  readonly memoize: boolean;
}

export interface CompiledGrammar {
  /** Declaration order; `rules[i].index === i` */
  readonly rules: readonly CompiledRule[];
  readonly ruleIndex: ReadonlyMap<string, number>;
  readonly start: number;
  readonly keywords: ReadonlySet<string>;
  readonly softKeywords: ReadonlySet<string>;
  readonly metas: ReadonlyMap<string, string | undefined>;
  /** Distinct custom action code, indexed by `CompiledAction.id` */
  readonly actions: readonly string[];
  readonly analysis: GrammarAnalysis;
  /** Validation and analysis warnings */
  readonly warnings: readonly RichDiagnostic[];
  readonly fileName?: string;
}
