/**
 * Memoization & left-recursion engine.
 *
 * Every rule invocation, interpreted or generated, goes through
 * {@link applyRule}. The rule's flags pick the strategy:
 *
 * - leader: seed growing (Warth et al.), the memo entry at the start
 *   position holds the best result so far while the body is re-evaluated;
 * - other left-recursive rules: memoized per growth generation, so an entry
 *   computed against an older seed is never reused;
 * - memoized rules: packrat, with an in-progress marker that turns a
 *   misclassified re-entry into an error instead of endless recursion;
 * - everything else runs its body directly.
 */

import { AmbiguousLeftRecursionError } from "@pegforge/analyzer";
import type { ParseContext } from "./context.js";
import { IN_PROGRESS } from "./memo.js";
import type { MemoEntry } from "./memo.js";
import { FAIL } from "./types.js";

/** The flags of a rule the engine needs. */
export interface EngineRule {
  readonly index: number;
  readonly name: string;
  readonly memoize: boolean;
  readonly leftRecursive: boolean;
  readonly leader: boolean;
}

/** A rule body: matches at `context.pos` and returns a value or {@link FAIL}. */
export type RuleBody = () => unknown;

function record(result: unknown, end: number, generation: number): MemoEntry {
  return result === FAIL ? { state: "failure", generation } : { state: "success", value: result, end, generation };
}

function replay(context: ParseContext, entry: MemoEntry): unknown {
  context.stats.hits++;
  if (entry.state === "success") {
    context.pos = entry.end;
    return entry.value;
  }
  return FAIL;
}

/**
 * Evaluate `body` for `rule` at the context's position. On failure the
 * position is left where it was.
 */
export function applyRule(context: ParseContext, rule: EngineRule, body: RuleBody): unknown {
  if (rule.leader) return growSeed(context, rule, body);
  if (rule.leftRecursive) return memoizePerGeneration(context, rule, body);
  if (rule.memoize) return memoize(context, rule, body);
  const start = context.pos;
  const result = body();
  if (result === FAIL) context.pos = start;
  return result;
}

function memoize(context: ParseContext, rule: EngineRule, body: RuleBody): unknown {
  const start = context.pos;
  const entry = context.memo.get(rule.index, start);
  if (entry !== undefined) {
    if (entry.state === "inProgress") {
      throw new AmbiguousLeftRecursionError(
        [rule.name],
        [`\`${rule.name}\` re-entered itself at token ${start} without consuming input`]
      );
    }
    return replay(context, entry);
  }

  context.stats.misses++;
  context.memo.set(rule.index, start, IN_PROGRESS);
  const result = body();
  if (result === FAIL) context.pos = start;
  context.memo.set(rule.index, start, record(result, context.pos, context.generation));
  return result;
}

// A non-leader member may be entered before its leader (from outside the
// cluster), so it carries no in-progress marker: the leader's memo entry
// is what stops the recursion.
function memoizePerGeneration(context: ParseContext, rule: EngineRule, body: RuleBody): unknown {
  const start = context.pos;
  const entry = context.memo.get(rule.index, start);
  if (entry !== undefined && entry.state !== "inProgress" && entry.generation === context.generation) {
    return replay(context, entry);
  }

  context.stats.misses++;
  const result = body();
  if (result === FAIL) context.pos = start;
  context.memo.set(rule.index, start, record(result, context.pos, context.generation));
  return result;
}

function growSeed(context: ParseContext, rule: EngineRule, body: RuleBody): unknown {
  const start = context.pos;
  const entry = context.memo.get(rule.index, start);
  if (entry !== undefined) return replay(context, entry);

  context.stats.misses++;
  context.memo.set(rule.index, start, { state: "failure", generation: context.generation });

  let recorded = false;
  let best: unknown = FAIL;
  let bestEnd = start;
  for (;;) {
    context.generation++;
    context.stats.growthIterations++;
    context.pos = start;
    const result = body();
    const end = context.pos;
    if (result === FAIL) break;
    // The first success counts even when it is empty; after that only
    // strictly longer matches do.
    if (recorded && end <= bestEnd) break;
    recorded = true;
    best = result;
    bestEnd = end;
    context.memo.set(rule.index, start, { state: "success", value: result, end, generation: context.generation });
  }

  context.pos = bestEnd;
  return best;
}
