/**
 * Per-parse state. A context is created for every parse and handed to the
 * engine explicitly, so one compiled grammar or parser instance can serve
 * any number of parses.
 */

import type { Token } from "@pegforge/tokenizer";
import { MemoTable } from "./memo.js";
import type { MemoStats } from "./types.js";

export class ParseContext {
  /** Index of the next token */
  pos = 0;
  /** Highest token index any matcher inspected */
  furthest = 0;
  /** Bumped before every seed-growing evaluation */
  generation = 0;
  readonly memo = new MemoTable();
  readonly stats: MemoStats = { hits: 0, misses: 0, growthIterations: 0 };

  constructor(
    readonly tokens: readonly Token[],
    readonly fileName?: string
  ) {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== "ENDMARKER") {
      throw new TypeError("token stream must end with ENDMARKER");
    }
  }

  mark(): number {
    return this.pos;
  }

  reset(pos: number): void {
    this.pos = pos;
  }

  /** The next token, or undefined past ENDMARKER. Counts as an inspection. */
  peek(): Token | undefined {
    if (this.pos > this.furthest) this.furthest = this.pos;
    return this.pos < this.tokens.length ? this.tokens[this.pos] : undefined;
  }

  /** The token at `pos`, clamped to ENDMARKER. */
  tokenAt(pos: number): Token {
    return this.tokens[Math.min(pos, this.tokens.length - 1)];
  }

  /** Token the parse got stuck on. */
  get furthestToken(): Token {
    return this.tokenAt(this.furthest);
  }
}
