import { describe, it, expect } from "vitest";
import { tokenize, describeToken, TokenizeError } from "../index.js";
import type { Token } from "../index.js";

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => (t.type === "OP" || t.type === "NAME" || t.type === "NUMBER" || t.type === "STRING" ? t.string : t.type));
}

// ---------------------------------------------------------------------------
// Basic tokens
// ---------------------------------------------------------------------------

describe("simple lines", () => {
  it("splits names, numbers and operators", () => {
    const tokens = tokenize("x = 1 + 2.5");
    expect(tokens.map((t) => t.type)).toEqual(["NAME", "OP", "NUMBER", "OP", "NUMBER", "NEWLINE", "ENDMARKER"]);
    expect(kinds(tokens)).toEqual(["x", "=", "1", "+", "2.5", "NEWLINE", "ENDMARKER"]);
  });

  it("records 1-based positions and offsets", () => {
    const [first, second] = tokenize("ab\n  cd", { indentation: false });
    expect(first).toMatchObject({ type: "NAME", string: "ab", start: { line: 1, column: 1 }, end: { line: 1, column: 3 } });
    expect(first.offset).toBe(0);
    expect(first.endOffset).toBe(2);
    expect(second).toMatchObject({ type: "NEWLINE", start: { line: 1, column: 3 } });
  });

  it("matches the longest operator", () => {
    expect(kinds(tokenize("a **= b", { newlines: false }))).toEqual(["a", "**=", "b", "ENDMARKER"]);
    expect(kinds(tokenize("f(x) -> y", { newlines: false }))).toEqual(["f", "(", "x", ")", "->", "y", "ENDMARKER"]);
  });

  it("reads number forms", () => {
    expect(kinds(tokenize("0x1F 10 3.14 .5 1e10", { newlines: false }))).toEqual([
      "0x1F",
      "10",
      "3.14",
      ".5",
      "1e10",
      "ENDMARKER",
    ]);
  });

  it("omits NEWLINE tokens when asked", () => {
    expect(kinds(tokenize("1 +\n2\n", { newlines: false }))).toEqual(["1", "+", "2", "ENDMARKER"]);
  });

  it("produces only ENDMARKER for empty input", () => {
    expect(kinds(tokenize(""))).toEqual(["ENDMARKER"]);
    expect(kinds(tokenize("\n# only a comment\n\n"))).toEqual(["ENDMARKER"]);
  });
});

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

describe("strings", () => {
  it("keeps quotes and escapes in the token text", () => {
    const tokens = tokenize(`'a\\'b' "c"`, { newlines: false });
    expect(kinds(tokens)).toEqual([`'a\\'b'`, `"c"`, "ENDMARKER"]);
    expect(tokens[0].type).toBe("STRING");
  });

  it("reads prefixed and triple-quoted strings across lines", () => {
    const tokens = tokenize(`r'x' '''one\ntwo''' y`, { newlines: false });
    expect(kinds(tokens)).toEqual([`r'x'`, `'''one\ntwo'''`, "y", "ENDMARKER"]);
    expect(tokens[2].start).toEqual({ line: 2, column: 8 });
  });

  it("rejects an unterminated string", () => {
    expect(() => tokenize(`x = 'abc\n`)).toThrow(TokenizeError);
    try {
      tokenize(`x = 'abc\n`);
    } catch (e) {
      expect(e).toBeInstanceOf(TokenizeError);
      if (e instanceof TokenizeError) {
        expect(e.detail).toBe("unterminated string literal");
        expect(e.position).toEqual({ line: 1, column: 5 });
        expect(e.code).toBe(3001);
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Lines and indentation
// ---------------------------------------------------------------------------

describe("indentation", () => {
  it("emits INDENT and DEDENT around nested blocks", () => {
    const src = ["if x:", "    y", "    if z:", "        w", "v", ""].join("\n");
    expect(kinds(tokenize(src))).toEqual([
      "if",
      "x",
      ":",
      "NEWLINE",
      "INDENT",
      "y",
      "NEWLINE",
      "if",
      "z",
      ":",
      "NEWLINE",
      "INDENT",
      "w",
      "NEWLINE",
      "DEDENT",
      "DEDENT",
      "v",
      "NEWLINE",
      "ENDMARKER",
    ]);
  });

  it("closes open blocks at end of input", () => {
    expect(kinds(tokenize("a:\n  b"))).toEqual(["a", ":", "NEWLINE", "INDENT", "b", "NEWLINE", "DEDENT", "ENDMARKER"]);
  });

  it("ignores newlines inside brackets and after a backslash", () => {
    expect(kinds(tokenize("f(1,\n  2)\nx = 1 + \\\n  2\n"))).toEqual([
      "f",
      "(",
      "1",
      ",",
      "2",
      ")",
      "NEWLINE",
      "x",
      "=",
      "1",
      "+",
      "2",
      "NEWLINE",
      "ENDMARKER",
    ]);
  });

  it("skips blank and comment-only lines without tokens", () => {
    expect(kinds(tokenize("a\n\n   # note\nb  # trailing\n"))).toEqual(["a", "NEWLINE", "b", "NEWLINE", "ENDMARKER"]);
  });

  it("rejects a dedent to an unknown level", () => {
    expect(() => tokenize("a:\n    b\n  c\n")).toThrow("unindent does not match any outer indentation level");
  });

  it("rejects an unclosed bracket", () => {
    expect(() => tokenize("f(1, 2")).toThrow(TokenizeError);
  });

  it("rejects an unknown character", () => {
    expect(() => tokenize("a ` b")).toThrow(TokenizeError);
    expect(() => tokenize("a \u00a7 b")).toThrow('unexpected character "\u00a7"');
  });
});

describe("describeToken", () => {
  it("formats tokens for messages", () => {
    const [name, newline] = tokenize("abc");
    expect(describeToken(name)).toBe('NAME "abc"');
    expect(describeToken(newline)).toBe("NEWLINE");
  });
});
