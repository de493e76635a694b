import { describe, it, expect } from "vitest";
import {
  checkGrammar,
  grammar,
  parseGrammar,
  rule,
  RuleIndex,
  tok,
  UnknownRuleOrTokenError,
  validateGrammar,
} from "../index.js";

describe("RuleIndex", () => {
  const g = parseGrammar("start: expr NEWLINE\nexpr: term\nterm: NUMBER\n");
  const index = new RuleIndex(g.rules);

  it("maps names to declaration indices", () => {
    expect(index.indexOf("start")).toBe(0);
    expect(index.indexOf("term")).toBe(2);
    expect(index.indexOf("NUMBER")).toBeUndefined();
    expect(index.get("expr")?.name).toBe("expr");
    expect(index.size).toBe(3);
  });

  it("throws for names that are not rules", () => {
    expect(() => index.resolve("factor", "term")).toThrow(UnknownRuleOrTokenError);
  });
});

describe("validateGrammar", () => {
  it("accepts a well-formed grammar", () => {
    const g = parseGrammar("start: expr NEWLINE\nexpr: expr '+' NUMBER | NUMBER\n");
    const { index, warnings } = validateGrammar(g);
    expect(index.names()).toEqual(["start", "expr"]);
    expect(warnings).toEqual([]);
  });

  it("rejects an unknown reference with rule name and position", () => {
    const g = parseGrammar("start: NAME\n    | trem\n", { fileName: "calc.gram" });
    try {
      validateGrammar(g);
      expect.unreachable("should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownRuleOrTokenError);
      if (!(e instanceof UnknownRuleOrTokenError)) return;
      expect(e.ruleName).toBe("start");
      expect(e.reference).toBe("trem");
      expect(e.span).toMatchObject({ file: "calc.gram", line: 2, column: 7 });
      expect(e.message).toBe("[PEG1001] Unknown rule or token `trem` referenced in rule `start`");
    }
  });

  it("accepts token categories registered by the caller", () => {
    const g = parseGrammar("start: TYPE_COMMENT NAME\n");
    expect(() => validateGrammar(g)).toThrow(UnknownRuleOrTokenError);
    expect(() => validateGrammar(g, { extraTokens: ["TYPE_COMMENT"] })).not.toThrow();
  });
});

describe("checkGrammar", () => {
  it("reports duplicate rules", () => {
    const g = grammar([rule("a", [[tok("NAME")]]), rule("a", [[tok("NUMBER")]])]);
    expect(checkGrammar(g).errors.map((e) => e.code)).toEqual([1002]);
  });

  it("reports reserved rule names", () => {
    const g = grammar([rule("_helper", [[tok("NAME")]])]);
    expect(checkGrammar(g).errors.map((e) => e.message)).toEqual(["[PEG1004] Rule name `_helper` is reserved"]);
  });

  it("reports an empty grammar", () => {
    expect(checkGrammar(grammar([])).errors.map((e) => e.code)).toEqual([1005]);
  });

  it("collects every unknown reference", () => {
    const g = parseGrammar("start: foo bar | NAME\n");
    expect(checkGrammar(g).errors.map((e) => (e instanceof UnknownRuleOrTokenError ? e.reference : ""))).toEqual([
      "foo",
      "bar",
    ]);
  });

  it("warns about an alternative shadowed by an earlier prefix", () => {
    const g = parseGrammar("start: NAME | NAME '=' NAME\n");
    const { errors, warnings } = checkGrammar(g);
    expect(errors).toEqual([]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].code).toBe(1006);
    expect(warnings[0].severity).toBe("warning");
    expect(warnings[0].message).toBe("In `start` the alternative `NAME '=' NAME` is never tried");
    expect(warnings[0].notes).toEqual(["`NAME` matches first"]);
  });

  it("checks alternatives inside groups", () => {
    const g = parseGrammar("start: ('a' | 'a' 'b') NAME\n");
    expect(checkGrammar(g).warnings.map((w) => w.message)).toEqual([
      "In `start` the alternative `'a' 'b'` is never tried",
    ]);
  });

  it("does not warn when the longer alternative comes first", () => {
    const g = parseGrammar("start: NAME '=' NAME | NAME\n");
    expect(checkGrammar(g).warnings).toEqual([]);
  });
});
