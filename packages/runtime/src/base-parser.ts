/**
 * Base class of generated parsers.
 *
 * A generated parser has one method per rule and per helper (group,
 * repetition, gather). Methods return the matched value or {@link FAIL}
 * and leave the cursor untouched when they fail. Each call to
 * {@link BaseParser.parse} runs against a fresh {@link ParseContext}, so a
 * parser instance can be reused.
 *
 * @example
 * ```typescript
 * class CalcParser extends BaseParser {
 *   protected readonly keywordTables = { keywords: new Set<string>(), softKeywords: new Set<string>() };
 *   protected startRule(): unknown {
 *     return this.expr();
 *   }
 *   expr(): unknown {
 *     return this.leftRecursiveRule(0, "expr", true, () => {
 *       const mark = this.mark();
 *       alt1: {
 *         const expr = this.expr();
 *         if (expr === FAIL) break alt1;
 *         const literal = this.expect("+");
 *         if (literal === FAIL) break alt1;
 *         const number = this.token("NUMBER");
 *         if (number === FAIL) break alt1;
 *         return [expr, literal, number];
 *       }
 *       this.reset(mark);
 *       return this.token("NUMBER");
 *     });
 *   }
 * }
 * ```
 */

import type { Token } from "@pegforge/tokenizer";
import { ParseContext } from "./context.js";
import { applyRule } from "./engine.js";
import type { RuleBody } from "./engine.js";
import { ForcedMatchError, ParseError } from "./errors.js";
import { matchesCategory, matchesLiteral } from "./tokens.js";
import type { KeywordTables } from "./tokens.js";
import { FAIL } from "./types.js";
import type { Fail, ParseOutcome } from "./types.js";

export abstract class BaseParser {
  private current: ParseContext | undefined;

  protected abstract readonly keywordTables: KeywordTables;

  /** Invoke the start rule. */
  protected abstract startRule(): unknown;

  /** The context of the parse in progress. */
  protected get context(): ParseContext {
    if (this.current === undefined) throw new Error("no parse in progress");
    return this.current;
  }

  parse(tokens: readonly Token[], fileName?: string): ParseOutcome {
    return this.withContext(new ParseContext(tokens, fileName), (context): ParseOutcome => {
      const value = this.startRule();
      if (value === FAIL) {
        return { ok: false, furthest: context.furthest, token: context.furthestToken, stats: context.stats };
      }
      return { ok: true, value, end: context.pos, stats: context.stats };
    });
  }

  /**
   * Parse and require the start rule to end at ENDMARKER.
   *
   * @throws ParseError at the furthest token reached otherwise
   */
  parseOrThrow(tokens: readonly Token[], fileName?: string): unknown {
    return this.withContext(new ParseContext(tokens, fileName), (context) => {
      const value = this.startRule();
      if (value === FAIL || context.pos < context.tokens.length - 1) {
        throw new ParseError(context.furthestToken, context.furthest, context.fileName);
      }
      return value;
    });
  }

  private withContext<T>(context: ParseContext, run: (context: ParseContext) => T): T {
    const previous = this.current;
    this.current = context;
    try {
      return run(context);
    } finally {
      this.current = previous;
    }
  }

  // -------------------------------------------------------------------------
  // Cursor
  // -------------------------------------------------------------------------

  protected mark(): number {
    return this.context.pos;
  }

  protected reset(pos: number): void {
    this.context.pos = pos;
  }

  // -------------------------------------------------------------------------
  // Token primitives
  // -------------------------------------------------------------------------

  /** Match an operator or a hard keyword. */
  protected expect(value: string): Token | Fail {
    return this.consumeIf((token) => matchesLiteral(token, value, this.keywordTables.keywords.has(value)));
  }

  /** Match a soft keyword: a NAME token spelling `value`. */
  protected expectSoft(value: string): Token | Fail {
    return this.consumeIf((token) => matchesLiteral(token, value, true));
  }

  /** Match a token category such as `NAME` or `NUMBER`. */
  protected token(category: string): Token | Fail {
    return this.consumeIf((token) => matchesCategory(token, category, this.keywordTables));
  }

  private consumeIf(test: (token: Token) => boolean): Token | Fail {
    const context = this.context;
    const token = context.peek();
    if (token === undefined || !test(token)) return FAIL;
    context.pos++;
    return token;
  }

  // -------------------------------------------------------------------------
  // Operators
  // -------------------------------------------------------------------------

  /** `[e]` and `e?`: the value, or null. */
  protected optional(match: () => unknown): unknown {
    const value = match();
    return value === FAIL ? null : value;
  }

  /** `&e` (positive) and `!e`: zero-width, null on success. */
  protected lookahead(positive: boolean, match: () => unknown): null | Fail {
    const start = this.mark();
    const matched = match() !== FAIL;
    this.reset(start);
    return matched === positive ? null : FAIL;
  }

  /** `&&e`: the value, or a {@link ForcedMatchError} naming `expected`. */
  protected forced(match: () => unknown, expected: string): unknown {
    const value = match();
    if (value === FAIL) {
      const context = this.context;
      throw new ForcedMatchError(expected, context.tokenAt(context.pos), context.pos, context.fileName);
    }
    return value;
  }

  /** `e*` (min 0) and `e+` (min 1). Stops at the first iteration that consumes nothing. */
  protected repeat(match: () => unknown, min: 0 | 1): unknown[] | Fail {
    const start = this.mark();
    const values: unknown[] = [];
    for (;;) {
      const before = this.mark();
      const value = match();
      if (value === FAIL) break;
      if (this.mark() === before) {
        if (values.length < min) values.push(value);
        break;
      }
      values.push(value);
    }
    if (values.length < min) {
      this.reset(start);
      return FAIL;
    }
    return values;
  }

  /** `s.e+`: one or more elements separated by `s`; only element values are kept. */
  protected gather(element: () => unknown, separator: () => unknown): unknown[] | Fail {
    const first = element();
    if (first === FAIL) return FAIL;
    const values: unknown[] = [first];
    for (;;) {
      const before = this.mark();
      if (separator() === FAIL) break;
      const value = element();
      if (value === FAIL || this.mark() === before) {
        this.reset(before);
        break;
      }
      values.push(value);
    }
    return values;
  }

  // -------------------------------------------------------------------------
  // Engine wrappers
  // -------------------------------------------------------------------------

  /** A memoized rule that is not left-recursive. */
  protected memoRule(index: number, name: string, body: RuleBody): unknown {
    return applyRule(this.context, { index, name, memoize: true, leftRecursive: false, leader: false }, body);
  }

  /** A member of a left-recursive cluster; `leader` runs the seed-growing loop. */
  protected leftRecursiveRule(index: number, name: string, leader: boolean, body: RuleBody): unknown {
    return applyRule(this.context, { index, name, memoize: true, leftRecursive: true, leader }, body);
  }
}
