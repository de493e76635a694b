import { describe, it, expect } from "vitest";
import { formatAlternative, formatGrammar, formatRule, GrammarSyntaxError, parseGrammar, unquote } from "../index.js";

// ---------------------------------------------------------------------------
// Rules and alternatives
// ---------------------------------------------------------------------------

describe("parseGrammar", () => {
  it("reads rules in declaration order", () => {
    const g = parseGrammar("expr: expr '+' term | term\nterm: NUMBER\n");
    expect(g.rules.map((r) => r.name)).toEqual(["expr", "term"]);
    expect(formatRule(g.rules[0])).toBe("expr:\n    | expr '+' term\n    | term");
    expect(formatRule(g.rules[1])).toBe("term: NUMBER");
  });

  it("turns names that are not rules into token references", () => {
    const g = parseGrammar("expr: expr '+' term | term\nterm: NUMBER\n");
    expect(g.rules[0].alternatives[0].items.map((n) => n.item.kind)).toEqual(["ruleRef", "literal", "ruleRef"]);
    expect(g.rules[1].alternatives[0].items[0].item).toMatchObject({ kind: "tokenRef", category: "NUMBER" });
  });

  it("reads rule types, the memo flag, bindings and actions", () => {
    const g = parseGrammar("start[Node] (memo): a=NAME b[string]=NUMBER? { make(a, b) }\n");
    const [start] = g.rules;
    expect(start.type).toBe("Node");
    expect(start.memoHint).toBe(true);
    expect(start.alternatives[0].action).toEqual({ kind: "custom", code: "make(a, b)" });
    expect(start.alternatives[0].items[1]).toMatchObject({ name: "b", type: "string", item: { kind: "opt" } });
    expect(formatRule(start)).toBe("start[Node] (memo): a=NAME b[string]=NUMBER? { make(a, b) }");
  });

  it("reads every operator", () => {
    const g = parseGrammar("start: ','.NAME+ &'(' !')' ~ &&':' [NAME] NAME* (NAME | NUMBER)+ $\n");
    const [alternative] = g.rules[0].alternatives;
    expect(alternative.items.map((n) => n.item.kind)).toEqual([
      "gather",
      "lookahead",
      "lookahead",
      "cut",
      "forced",
      "opt",
      "repeat0",
      "repeat1",
      "tokenRef",
    ]);
    expect(alternative.commits).toBe(true);
    expect(formatAlternative(alternative)).toBe(
      "','.NAME+ &'(' !')' ~ &&':' NAME? NAME* (NAME | NUMBER)+ ENDMARKER"
    );
  });

  it("reads alternatives on indented continuation lines", () => {
    const source = ["stmt:", "    | 'pass' NEWLINE", "    | expr NEWLINE", "expr: NAME", ""].join("\n");
    const g = parseGrammar(source);
    expect(g.rules[0].alternatives.map(formatAlternative)).toEqual(["'pass' NEWLINE", "expr NEWLINE"]);
  });

  it("continues a one-line rule with more alternatives", () => {
    const source = ["atom: NAME", "    | NUMBER", "    | STRING", ""].join("\n");
    const g = parseGrammar(source);
    expect(g.rules[0].alternatives.map(formatAlternative)).toEqual(["NAME", "NUMBER", "STRING"]);
  });

  it("reads directives", () => {
    const g = parseGrammar('@class MyParser\n@header """\nimport x\n"""\nstart: NAME\n');
    expect(g.metas.get("class")).toBe("MyParser");
    expect(g.metas.get("header")).toBe("\nimport x\n");
  });

  it("collects hard and soft keywords", () => {
    const g = parseGrammar("stmt: 'if' NAME | \"match\" NAME | '+'\n");
    expect([...g.keywords]).toEqual(["if"]);
    expect([...g.softKeywords]).toEqual(["match"]);
  });

  it("records spans with the file name", () => {
    const g = parseGrammar("start: NAME\n", { fileName: "start.gram" });
    expect(g.rules[0].span).toEqual({ file: "start.gram", line: 1, column: 1, endLine: 1, endColumn: 6 });
    expect(g.rules[0].alternatives[0].items[0].item).toMatchObject({ span: { line: 1, column: 8 } });
  });

  it("ignores comments and blank lines", () => {
    const g = parseGrammar("# leading comment\n\nstart: NAME  # trailing\n\n");
    expect(g.rules).toHaveLength(1);
  });

  it("accepts a file with no rules", () => {
    expect(parseGrammar("# nothing here\n").rules).toEqual([]);
  });

  it("prints a grammar that reads back to the same text", () => {
    const source = [
      "@class Calc",
      "",
      "start: expr NEWLINE? $ { expr }",
      "expr:",
      "    | expr '+' ~ term",
      "    | \"neg\" term",
      "    | term",
      "term: NUMBER | '(' &&expr ')' | [args]",
      "args: ','.NAME+",
      "",
    ].join("\n");
    const printed = formatGrammar(parseGrammar(source));
    expect(formatGrammar(parseGrammar(printed))).toBe(printed);
    expect(printed).toContain("term:\n    | NUMBER\n    | '(' &&expr ')'\n    | args?");
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe("parseGrammar errors", () => {
  it("reports the furthest token with what was expected", () => {
    try {
      parseGrammar("start NAME\n");
      expect.unreachable("should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(GrammarSyntaxError);
      if (!(e instanceof GrammarSyntaxError)) return;
      expect(e.detail).toBe(`expected '[' or ':', found NAME "NAME"`);
      expect(e.span).toMatchObject({ line: 1, column: 7 });
      expect(e.code).toBe(1003);
    }
  });

  it("reports an unclosed bracket", () => {
    expect(() => parseGrammar("start: [NAME NUMBER\nother: NAME\n")).toThrow(GrammarSyntaxError);
  });

  it("reports tokenizer errors as syntax errors", () => {
    expect(() => parseGrammar("start: 'unterminated\n")).toThrow(GrammarSyntaxError);
  });

  it("rejects a memo flag with another word", () => {
    expect(() => parseGrammar("start (cache): NAME\n")).toThrow(GrammarSyntaxError);
  });
});

describe("unquote", () => {
  it("processes escapes", () => {
    expect(unquote("'a\\'b'")).toEqual({ value: "a'b", quote: "'" });
    expect(unquote('"tab\\there"')).toEqual({ value: "tab\there", quote: '"' });
  });

  it("keeps raw strings as written", () => {
    expect(unquote('r"\\d"')).toEqual({ value: "\\d", quote: '"' });
  });
});
