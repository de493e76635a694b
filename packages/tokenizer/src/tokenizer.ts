/**
 * Line- and indentation-aware tokenizer.
 *
 * Produces the token categories pegforge grammars reference (NAME, NUMBER,
 * STRING, OP, NEWLINE, INDENT, DEDENT, ENDMARKER). The same tokenizer reads
 * `.gram` files and the inputs of interpreted parsers.
 */

import { config, DiagnosticBuilder, PEG3001, PegforgeError } from "@pegforge/core";
import type { Token, TokenizeOptions, TokenPosition, TokenType } from "./types.js";

/** Raised for input the tokenizer cannot split into tokens. */
export class TokenizeError extends PegforgeError {
  constructor(
    readonly detail: string,
    readonly position: TokenPosition,
    fileName?: string
  ) {
    super(
      new DiagnosticBuilder(PEG3001)
        .at({ file: fileName, line: position.line, column: position.column })
        .withArgs({ detail })
        .build()
    );
    this.name = "TokenizeError";
  }
}

// Longest first, so that `**=` wins over `**` and `*`.
const OPERATORS: ReadonlyArray<string> = [
  "...",
  "**=",
  "//=",
  ">>=",
  "<<=",
  "===",
  "!==",
  "!=",
  "==",
  "<=",
  ">=",
  "->",
  "=>",
  ":=",
  "**",
  "//",
  "<<",
  ">>",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "@=",
  "?.",
  "??",
  "+",
  "-",
  "*",
  "/",
  "%",
  "@",
  "&",
  "|",
  "^",
  "~",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ":",
  ";",
  ".",
  "=",
  "!",
  "?",
  "$",
];

const OPENING = new Set(["(", "[", "{"]);
const CLOSING = new Set([")", "]", "}"]);

const STRING_START = /(?:[rRbBuUfF]{1,2})?('''|"""|'|"|`)/y;
const IDENTIFIER = /[\p{L}_][\p{L}\p{N}_]*/uy;
const NUMBER =
  /(?:0[xX][0-9a-fA-F_]+|0[bB][01_]+|0[oO][0-7_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d+)?[jJ]?)/y;

function matchAt(pattern: RegExp, source: string, pos: number): RegExpExecArray | null {
  pattern.lastIndex = pos;
  return pattern.exec(source);
}

class Tokenizer {
  private readonly tokens: Token[] = [];
  private readonly indents: number[] = [0];
  private readonly tabSize: number;
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private parenDepth = 0;
  private atLineStart = true;

  constructor(
    private readonly source: string,
    private readonly options: TokenizeOptions
  ) {
    this.tabSize = options.tabSize ?? config.get<number>("tokenizer.tabSize") ?? 8;
  }

  run(): Token[] {
    const { source } = this;
    while (this.pos < source.length) {
      if (this.atLineStart && this.parenDepth === 0) {
        if (!this.readIndentation()) continue;
      }
      const ch = source[this.pos];

      if (ch === " " || ch === "\t" || ch === "\f") {
        this.pos++;
      } else if (ch === "\\" && (source[this.pos + 1] === "\n" || source.startsWith("\r\n", this.pos + 1))) {
        this.pos += source[this.pos + 1] === "\n" ? 2 : 3;
        this.newLine();
      } else if (ch === "#") {
        this.skipToLineEnd();
      } else if (ch === "\n" || ch === "\r") {
        this.readLineEnd();
      } else {
        this.readToken();
      }
    }
    return this.finish();
  }

  private position(offset: number = this.pos): TokenPosition {
    return { line: this.line, column: offset - this.lineStart + 1 };
  }

  private fail(detail: string, position: TokenPosition = this.position()): never {
    throw new TokenizeError(detail, position, this.options.fileName);
  }

  private push(type: TokenType, offset: number, start: TokenPosition): void {
    this.tokens.push({
      type,
      string: this.source.slice(offset, this.pos),
      start,
      end: this.position(),
      offset,
      endOffset: this.pos,
    });
  }

  private newLine(): void {
    this.line++;
    this.lineStart = this.pos;
  }

  private skipToLineEnd(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== "\n" && this.source[this.pos] !== "\r") {
      this.pos++;
    }
  }

  private consumeLineBreak(): void {
    this.pos += this.source.startsWith("\r\n", this.pos) ? 2 : 1;
    this.newLine();
  }

  /**
   * Measure the indentation of a new logical line. Returns false when the
   * line is blank or holds only a comment, after skipping it.
   */
  private readIndentation(): boolean {
    const { source } = this;
    let column = 0;
    let pos = this.pos;
    while (pos < source.length) {
      const ch = source[pos];
      if (ch === " ") column++;
      else if (ch === "\t") column = (Math.floor(column / this.tabSize) + 1) * this.tabSize;
      else if (ch === "\f") column = 0;
      else break;
      pos++;
    }
    this.pos = pos;

    if (pos >= source.length) return false;
    const next = source[pos];
    if (next === "#" || next === "\n" || next === "\r") {
      this.skipToLineEnd();
      if (this.pos < source.length) this.consumeLineBreak();
      return false;
    }

    this.atLineStart = false;
    if (this.options.indentation === false) return true;

    const start = this.position();
    const current = this.indents[this.indents.length - 1];
    if (column > current) {
      this.indents.push(column);
      this.tokens.push({ type: "INDENT", string: "", start, end: start, offset: pos, endOffset: pos });
    } else if (column < current) {
      while (column < this.indents[this.indents.length - 1]) {
        this.indents.pop();
        this.tokens.push({ type: "DEDENT", string: "", start, end: start, offset: pos, endOffset: pos });
      }
      if (column !== this.indents[this.indents.length - 1]) {
        this.fail("unindent does not match any outer indentation level", start);
      }
    }
    return true;
  }

  private readLineEnd(): void {
    if (this.parenDepth > 0 || this.options.newlines === false) {
      this.consumeLineBreak();
      this.atLineStart = this.parenDepth === 0;
      return;
    }
    const offset = this.pos;
    const start = this.position();
    this.pos += this.source.startsWith("\r\n", this.pos) ? 2 : 1;
    this.push("NEWLINE", offset, start);
    this.newLine();
    this.atLineStart = true;
  }

  private readToken(): void {
    const { source } = this;
    const offset = this.pos;
    const start = this.position();

    const str = matchAt(STRING_START, source, offset);
    if (str) {
      this.readString(str[0].length, str[1], start);
      return;
    }

    const ch = source[offset];
    const startsNumber = /\d/.test(ch) || (ch === "." && /\d/.test(source[offset + 1] ?? ""));
    if (startsNumber) {
      const num = matchAt(NUMBER, source, offset);
      if (num) {
        this.pos += num[0].length;
        this.push("NUMBER", offset, start);
        return;
      }
    }

    const ident = matchAt(IDENTIFIER, source, offset);
    if (ident) {
      this.pos += ident[0].length;
      this.push("NAME", offset, start);
      return;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, offset));
    if (op) {
      this.pos += op.length;
      if (OPENING.has(op)) this.parenDepth++;
      else if (CLOSING.has(op) && this.parenDepth > 0) this.parenDepth--;
      this.push("OP", offset, start);
      return;
    }

    this.fail(`unexpected character ${JSON.stringify(ch)}`);
  }

  private readString(openLength: number, quote: string, start: TokenPosition): void {
    const { source } = this;
    const offset = this.pos;
    const multiline = quote.length === 3 || quote === "`";
    this.pos += openLength;

    while (this.pos < source.length) {
      if (source.startsWith(quote, this.pos)) {
        this.pos += quote.length;
        this.push("STRING", offset, start);
        return;
      }
      const ch = source[this.pos];
      if (ch === "\\") {
        this.pos += 2;
        if (source[this.pos - 1] === "\n") this.newLine();
      } else if (ch === "\n" || ch === "\r") {
        if (!multiline) this.fail("unterminated string literal", start);
        this.consumeLineBreak();
      } else {
        this.pos++;
      }
    }
    this.fail("unterminated string literal", start);
  }

  private finish(): Token[] {
    if (this.parenDepth > 0) {
      this.fail("unexpected end of input inside brackets");
    }
    const end = this.position();
    const at = (type: TokenType): Token => ({
      type,
      string: "",
      start: end,
      end,
      offset: this.pos,
      endOffset: this.pos,
    });

    const last = this.tokens[this.tokens.length - 1];
    if (last && this.options.newlines !== false && last.type !== "NEWLINE" && last.type !== "DEDENT") {
      this.tokens.push(at("NEWLINE"));
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.tokens.push(at("DEDENT"));
    }
    this.tokens.push(at("ENDMARKER"));
    return this.tokens;
  }
}

/**
 * Split `source` into tokens, ending with NEWLINE (when the last line has
 * content), pending DEDENTs, and ENDMARKER.
 *
 * @throws TokenizeError on unterminated strings, unknown characters,
 *   inconsistent dedents, or unclosed brackets
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  return new Tokenizer(source, options).run();
}

/** Short human-readable form used in diagnostics: `NAME 'x'`, `NEWLINE`. */
export function describeToken(token: Token): string {
  if (token.string === "" || token.type === "NEWLINE") return token.type;
  return `${token.type} ${JSON.stringify(token.string)}`;
}
