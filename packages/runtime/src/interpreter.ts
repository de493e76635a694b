/**
 * Grammar interpreter: executes a compiled grammar over a token array
 * without generating code.
 */

import { createLogger } from "@pegforge/core";
import type { Logger } from "@pegforge/core";
import type { CompiledAlternative, CompiledGrammar, CompiledRule, Matcher } from "@pegforge/compiler";
import { UnknownRuleOrTokenError } from "@pegforge/grammar";
import type { Token } from "@pegforge/tokenizer";
import { actionNode, defaultValue } from "./actions.js";
import { ParseContext } from "./context.js";
import { applyRule } from "./engine.js";
import { ForcedMatchError, ParseError } from "./errors.js";
import { matchesCategory, matchesLiteral } from "./tokens.js";
import { FAIL } from "./types.js";
import type { ActionContext, ActionHandler, ParseOutcome } from "./types.js";

export interface ParserOptions {
  /** Evaluates custom actions; without one they yield an {@link ActionNode} */
  actions?: ActionHandler;
  /** File name the token stream came from, for error spans */
  fileName?: string;
  logger?: Logger;
}

export interface GrammarParser {
  readonly grammar: CompiledGrammar;
  /** Match the start rule (or `start`) at the first token. */
  parse(tokens: readonly Token[], start?: string): ParseOutcome;
  /**
   * Match the start rule and require it to end at ENDMARKER.
   *
   * @throws ParseError at the furthest token reached otherwise
   * @throws ForcedMatchError when a forced item fails
   */
  parseOrThrow(tokens: readonly Token[], start?: string): unknown;
}

// An alternative that failed after passing a cut: its choice fails outright.
const COMMITTED: unique symbol = Symbol("pegforge.committed");

class Interpreter implements GrammarParser {
  private readonly logger: Logger;

  constructor(
    readonly grammar: CompiledGrammar,
    private readonly options: ParserOptions
  ) {
    this.logger = options.logger ?? createLogger("runtime");
  }

  parse(tokens: readonly Token[], start?: string): ParseOutcome {
    const { context, value } = this.run(tokens, start);
    if (value === FAIL) {
      return { ok: false, furthest: context.furthest, token: context.furthestToken, stats: context.stats };
    }
    return { ok: true, value, end: context.pos, stats: context.stats };
  }

  parseOrThrow(tokens: readonly Token[], start?: string): unknown {
    const { context, value } = this.run(tokens, start);
    if (value === FAIL || context.pos < context.tokens.length - 1) {
      throw new ParseError(context.furthestToken, context.furthest, context.fileName);
    }
    return value;
  }

  private run(tokens: readonly Token[], start: string | undefined): { context: ParseContext; value: unknown } {
    const rule = this.startRule(start);
    const context = new ParseContext(tokens, this.options.fileName);
    const value = this.invoke(context, rule);
    const { hits, misses, growthIterations } = context.stats;
    this.logger.debug(
      `${rule.name}: ${value === FAIL ? "no match" : `matched ${context.pos} of ${tokens.length} tokens`}` +
        ` (memo entries ${context.memo.size}, hits ${hits}, misses ${misses}, growth iterations ${growthIterations})`
    );
    return { context, value };
  }

  private startRule(name: string | undefined): CompiledRule {
    if (name === undefined) return this.grammar.rules[this.grammar.start];
    const index = this.grammar.ruleIndex.get(name);
    if (index === undefined) throw new UnknownRuleOrTokenError("<start>", name);
    return this.grammar.rules[index];
  }

  private invoke(context: ParseContext, rule: CompiledRule): unknown {
    return applyRule(context, rule, () => this.choice(context, rule.name, rule.alternatives));
  }

  // -------------------------------------------------------------------------
  // Sequences and choices
  // -------------------------------------------------------------------------

  private choice(context: ParseContext, rule: string, alternatives: readonly CompiledAlternative[]): unknown {
    for (const alternative of alternatives) {
      const result = this.alternative(context, rule, alternative);
      if (result === COMMITTED) return FAIL;
      if (result !== FAIL) return result;
    }
    return FAIL;
  }

  private alternative(context: ParseContext, rule: string, alternative: CompiledAlternative): unknown {
    const start = context.pos;
    const values: unknown[] = [];
    const bindings: Record<string, unknown> = {};
    let committed = false;

    for (const item of alternative.items) {
      if (item.matcher.kind === "cut") {
        committed = true;
        continue;
      }
      const value = this.match(context, rule, item.matcher);
      if (value === FAIL) {
        context.pos = start;
        return committed ? COMMITTED : FAIL;
      }
      if (item.binding !== undefined) {
        values.push(value);
        bindings[item.binding] = value;
      }
    }

    const { action } = alternative;
    switch (action.kind) {
      case "none":
        return null;
      case "default":
        return defaultValue(values);
      case "custom": {
        const actionContext: ActionContext = {
          code: action.code,
          id: action.id,
          rule,
          bindings,
          values,
          start: context.tokenAt(start),
          end: context.tokenAt(context.pos),
        };
        return this.options.actions ? this.options.actions(actionContext) : actionNode(actionContext);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Items
  // -------------------------------------------------------------------------

  private match(context: ParseContext, rule: string, matcher: Matcher): unknown {
    switch (matcher.kind) {
      case "literal": {
        const token = context.peek();
        if (token === undefined || !matchesLiteral(token, matcher.value, matcher.keyword !== "none")) return FAIL;
        context.pos++;
        return token;
      }
      case "token": {
        const token = context.peek();
        if (token === undefined || !matchesCategory(token, matcher.category, this.grammar)) return FAIL;
        context.pos++;
        return token;
      }
      case "rule":
        return this.invoke(context, this.grammar.rules[matcher.index]);
      case "choice":
        return this.choice(context, rule, matcher.alternatives);
      case "optional": {
        const value = this.match(context, rule, matcher.matcher);
        return value === FAIL ? null : value;
      }
      case "repeat":
        return this.repeat(context, rule, matcher.matcher, matcher.min);
      case "gather":
        return this.gather(context, rule, matcher.element, matcher.separator);
      case "lookahead": {
        const start = context.pos;
        const matched = this.match(context, rule, matcher.matcher) !== FAIL;
        context.pos = start;
        return matched === matcher.positive ? null : FAIL;
      }
      case "cut":
        return null;
      case "forced": {
        const value = this.match(context, rule, matcher.matcher);
        if (value === FAIL) {
          throw new ForcedMatchError(matcher.expected, context.tokenAt(context.pos), context.pos, context.fileName);
        }
        return value;
      }
    }
  }

  private repeat(context: ParseContext, rule: string, matcher: Matcher, min: number): unknown {
    const start = context.pos;
    const values: unknown[] = [];
    for (;;) {
      const before = context.pos;
      const value = this.match(context, rule, matcher);
      if (value === FAIL) break;
      if (context.pos === before) {
        // An empty iteration would repeat forever; it only counts when the
        // loop still needs its first element.
        if (values.length < min) values.push(value);
        break;
      }
      values.push(value);
    }
    if (values.length < min) {
      context.pos = start;
      return FAIL;
    }
    return values;
  }

  private gather(context: ParseContext, rule: string, element: Matcher, separator: Matcher): unknown {
    const first = this.match(context, rule, element);
    if (first === FAIL) return FAIL;
    const values: unknown[] = [first];
    for (;;) {
      const before = context.pos;
      if (this.match(context, rule, separator) === FAIL) break;
      const value = this.match(context, rule, element);
      if (value === FAIL || context.pos === before) {
        context.pos = before;
        break;
      }
      values.push(value);
    }
    return values;
  }
}

/**
 * Create an interpreting parser for a compiled grammar.
 *
 * @example
 * ```typescript
 * const parser = createParser(compileSource(source), { actions });
 * const outcome = parser.parse(tokenize("1 + 2\n"));
 * ```
 */
export function createParser(grammar: CompiledGrammar, options: ParserOptions = {}): GrammarParser {
  return new Interpreter(grammar, options);
}
