/**
 * Core types for @pegforge/runtime
 */

import type { Token } from "@pegforge/tokenizer";

/**
 * Returned by a parsing procedure that did not match. Any other return value,
 * `null` and `undefined` included, is a successful match.
 */
export const FAIL: unique symbol = Symbol("pegforge.fail");
export type Fail = typeof FAIL;

/** Memo table counters of one parse. */
export interface MemoStats {
  /** Cached outcomes returned without re-evaluation */
  hits: number;
  /** Memoized rule evaluations */
  misses: number;
  /** Seed-growing evaluations of left-recursive leaders */
  growthIterations: number;
}

/** Result of a parse attempt; a failed match is not an exception. */
export type ParseOutcome<T = unknown> =
  | { ok: true; value: T; end: number; stats: MemoStats }
  | { ok: false; furthest: number; token: Token; stats: MemoStats };

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/** What a custom action sees when its alternative matched. */
export interface ActionContext {
  /** Action text as written in the grammar */
  readonly code: string;
  /** Index into `CompiledGrammar.actions` */
  readonly id: number;
  readonly rule: string;
  /** Bound item values by binding name */
  readonly bindings: Readonly<Record<string, unknown>>;
  /** Bound item values in order */
  readonly values: readonly unknown[];
  /** First token of the match */
  readonly start: Token;
  /** Token following the match */
  readonly end: Token;
}

export type ActionHandler = (context: ActionContext) => unknown;

/** Value of a custom action when no handler is installed. */
export interface ActionNode {
  readonly action: string;
  readonly rule: string;
  readonly values: Readonly<Record<string, unknown>>;
}
