import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "@pegforge/core";
import { compileSource } from "@pegforge/compiler";
import type { CompiledGrammar } from "@pegforge/compiler";
import { UnknownRuleOrTokenError } from "@pegforge/grammar";
import { tokenize } from "@pegforge/tokenizer";
import type { Token } from "@pegforge/tokenizer";
import { actionTable, createParser, ForcedMatchError, isToken, ParseError } from "../index.js";
import type { ActionHandler, GrammarParser } from "../index.js";

function lex(source: string): Token[] {
  return tokenize(source, { newlines: false, indentation: false });
}

function compile(source: string): CompiledGrammar {
  return compileSource(source, { logger: silentLogger, memoization: "all" });
}

function parser(source: string, actions?: ActionHandler): GrammarParser {
  return createParser(compile(source), { actions, logger: silentLogger });
}

/** Replace tokens by their text so values compare as plain data. */
function simplify(value: unknown): unknown {
  if (isToken(value)) return value.string;
  if (Array.isArray(value)) return value.map(simplify);
  return value;
}

const arithmetic = actionTable({
  add: ({ bindings }) => ["add", bindings.expr, bindings.term],
  sub: ({ bindings }) => ["sub", bindings.expr, bindings.term],
  num: ({ bindings }) => (isToken(bindings.n) ? Number(bindings.n.string) : NaN),
});

const EXPR = "expr: expr '+' term { add } | expr '-' term { sub } | term\nterm: n=NUMBER { num }\n";

// ---------------------------------------------------------------------------
// Left recursion
// ---------------------------------------------------------------------------

describe("left recursion", () => {
  it("grows left-associative results", () => {
    const result = parser(EXPR, arithmetic).parseOrThrow(lex("1 + 2 + 3"));
    expect(result).toEqual(["add", ["add", 1, 2], 3]);
  });

  it("mixes operators of one level", () => {
    expect(parser(EXPR, arithmetic).parseOrThrow(lex("1 + 2 - 3"))).toEqual(["sub", ["add", 1, 2], 3]);
  });

  it("counts memo traffic and growth iterations", () => {
    const outcome = parser(EXPR, arithmetic).parse(lex("1 + 2 - 3"));
    expect(outcome.stats).toEqual({ hits: 8, misses: 4, growthIterations: 4 });
  });

  it("reaches the longest unrolling", () => {
    const outcome = parser("sum: sum '+' NUMBER | NUMBER\n").parse(lex("1 + 2 + 3 + 4"));
    expect(outcome).toMatchObject({ ok: true, end: 7 });
  });

  it("grows through an indirect cycle", () => {
    const p = parser("a: b '+' NUMBER | NUMBER\nb: a\n");
    const outcome = p.parse(lex("1 + 2 + 3"));
    expect(outcome.ok && simplify(outcome.value)).toEqual([["1", "+", "2"], "+", "3"]);
  });

  it("grows when a non-leader member is entered first", () => {
    const outcome = parser("a: b '+' NUMBER | NUMBER\nb: a\n").parse(lex("1 + 2 + 3"), "b");
    expect(outcome).toMatchObject({ ok: true, end: 5 });
    expect(outcome.ok && simplify(outcome.value)).toEqual([["1", "+", "2"], "+", "3"]);
  });
});

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

describe("operators", () => {
  it("matches an optional item against empty input", () => {
    const outcome = parser("maybe_comma: ','?\n").parse(lex(""));
    expect(outcome).toMatchObject({ ok: true, value: null, end: 0 });
  });

  it("never fails on an optional item", () => {
    const p = parser("start: [NAME] NUMBER\n");
    expect(simplify(p.parseOrThrow(lex("1")))).toEqual([null, "1"]);
    expect(simplify(p.parseOrThrow(lex("x 1")))).toEqual(["x", "1"]);
  });

  it("never advances on lookahead", () => {
    const p = parser("start: &NAME NAME NUMBER | !NAME NUMBER\n");
    expect(simplify(p.parseOrThrow(lex("x 1")))).toEqual(["x", "1"]);
    expect(simplify(p.parseOrThrow(lex("1")))).toEqual("1");
  });

  it("gathers exactly the elements", () => {
    const p = parser("start: ','.NAME+\n");
    expect(simplify(p.parseOrThrow(lex("a , b , c")))).toEqual(["a", "b", "c"]);
    const trailing = p.parse(lex("a , b ,"));
    expect(trailing).toMatchObject({ ok: true, end: 3 });
    expect(trailing.ok && simplify(trailing.value)).toEqual(["a", "b"]);
  });

  it("collects repetitions", () => {
    const p = parser("start: NUMBER+ NAME*\n");
    expect(simplify(p.parseOrThrow(lex("1 2 x")))).toEqual([["1", "2"], ["x"]]);
    expect(p.parse(lex("x")).ok).toBe(false);
  });

  it("stops a repetition on an empty iteration", () => {
    const p = parser("start: (NAME?)* NUMBER\n");
    expect(simplify(p.parseOrThrow(lex("a b 1")))).toEqual([["a", "b"], "1"]);
  });
});

// ---------------------------------------------------------------------------
// Cut and forced items
// ---------------------------------------------------------------------------

describe("cut", () => {
  it("suppresses the remaining alternatives", () => {
    expect(parser("start: '(' NAME ')' | '(' NUMBER ')'\n").parse(lex("( 1 )")).ok).toBe(true);
    expect(parser("start: '(' ~ NAME ')' | '(' NUMBER ')'\n").parse(lex("( 1 )")).ok).toBe(false);
  });

  it("commits only the enclosing group", () => {
    const p = parser("start: ('+' ~ NAME | '+' NUMBER) | '+' NUMBER\n");
    expect(simplify(p.parseOrThrow(lex("+ 1")))).toEqual(["+", "1"]);
  });
});

describe("forced items", () => {
  const p = parser("a: b | 'let' NAME\nb: c | NAME\nc: 'let' &&'=' | NAME\n");

  it("escape three rule frames", () => {
    expect(() => p.parse(lex("let x"))).toThrow(ForcedMatchError);
  });

  it("report what was expected and where", () => {
    try {
      p.parse(lex("let x"));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ForcedMatchError);
      if (!(error instanceof ForcedMatchError)) return;
      expect(error.message).toBe("[PEG3002] expected '='");
      expect(error.position).toBe(1);
      expect(error.token.string).toBe("x");
      expect(error.diagnostic.span).toMatchObject({ line: 1, column: 5 });
      expect(error.diagnostic.notes).toEqual(['found NAME "x"']);
    }
  });
});

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

describe("keywords", () => {
  const stmt = parser("stmt: \"match\" subject ':' NAME | NAME '=' NUMBER\nsubject: NAME\n");

  it("lets a soft keyword be a name", () => {
    expect(simplify(stmt.parseOrThrow(lex("match = 5")))).toEqual(["match", "=", "5"]);
  });

  it("matches a soft keyword where the grammar asks for it", () => {
    expect(simplify(stmt.parseOrThrow(lex("match x : y")))).toEqual(["match", "x", ":", "y"]);
  });

  it("keeps hard keywords out of NAME", () => {
    const p = parser("start: NAME | 'if' NAME\n");
    expect(simplify(p.parseOrThrow(lex("if x")))).toEqual(["if", "x"]);
    expect(simplify(p.parseOrThrow(lex("x")))).toEqual("x");
  });
});

// ---------------------------------------------------------------------------
// Actions and outcomes
// ---------------------------------------------------------------------------

describe("parse outcomes", () => {
  it("builds action nodes without a handler", () => {
    const outcome = parser("start: n=NUMBER { num }\n").parse(lex("7"));
    expect(outcome).toMatchObject({ ok: true, value: { action: "num", rule: "start" } });
  });

  it("reports the furthest token of a failed match", () => {
    const outcome = parser("sum: sum '+' NUMBER | NUMBER\n").parse(lex("+"));
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.furthest).toBe(0);
    expect(outcome.token.string).toBe("+");
  });

  it("requires parseOrThrow to reach the end", () => {
    const p = parser("sum: sum '+' NUMBER | NUMBER\n");
    expect(p.parse(lex("1 +"))).toMatchObject({ ok: true, end: 1 });
    try {
      p.parseOrThrow(lex("1 +"));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.message).toBe("[PEG3003] invalid syntax");
      expect(error.position).toBe(2);
      expect(error.diagnostic.notes).toEqual(["found ENDMARKER"]);
    }
  });

  it("starts at a named rule", () => {
    const p = parser(EXPR, arithmetic);
    expect(p.parseOrThrow(lex("4"), "term")).toBe(4);
    expect(() => p.parse(lex("4"), "factor")).toThrow(UnknownRuleOrTokenError);
  });

  it("rejects a token stream without ENDMARKER", () => {
    expect(() => parser(EXPR).parse([])).toThrow(TypeError);
  });

  it("gives every parse its own memo table", () => {
    const p = parser(EXPR, arithmetic);
    const first = p.parse(lex("1 + 2 - 3"));
    const second = p.parse(lex("1 + 2 - 3"));
    expect(second.stats).toEqual(first.stats);
  });

  it("logs memo usage of each parse at debug level", () => {
    const lines: string[] = [];
    const logger = createLogger("runtime", { verbose: true, writer: (line) => lines.push(line) });
    createParser(compile("start: NUMBER\n"), { logger }).parse(lex("1"));
    expect(lines).toEqual([
      "[pegforge:runtime] start: matched 1 of 2 tokens (memo entries 1, hits 0, misses 1, growth iterations 0)",
    ]);
  });
});
