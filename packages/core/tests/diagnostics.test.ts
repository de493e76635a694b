/**
 * Tests for diagnostic building and rendering
 */

import { describe, it, expect } from "vitest";
import {
  DiagnosticBuilder,
  PegforgeError,
  PEG1001,
  PEG1006,
  PEG3003,
  explainDiagnostic,
  getDiagnosticDescriptor,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
} from "@pegforge/core";

describe("DiagnosticBuilder", () => {
  it("should interpolate every placeholder", () => {
    const diag = new DiagnosticBuilder(PEG1001).withArgs({ name: "trem", rule: "expr" }).build();
    expect(diag.message).toBe("Unknown rule or token `trem` referenced in rule `expr`");
    expect(diag.code).toBe(1001);
    expect(diag.severity).toBe("error");
  });

  it("should copy notes and take the catalog severity", () => {
    const builder = new DiagnosticBuilder(PEG1006)
      .withArgs({ rule: "stmt", alternative: "NAME '=' expr" })
      .note("shadowed by `NAME`");
    const diag = builder.build();
    builder.note("added later");
    expect(diag.message).toBe("In `stmt` the alternative `NAME '=' expr` is never tried");
    expect(diag.notes).toEqual(["shadowed by `NAME`"]);
    expect(diag.severity).toBe("warning");
  });
});

describe("renderDiagnosticCLI", () => {
  it("should render a source excerpt with an underline", () => {
    const diag = new DiagnosticBuilder(PEG1001)
      .at({ file: "expr.gram", line: 1, column: 16, endLine: 1, endColumn: 20 })
      .withArgs({ name: "trem", rule: "expr" })
      .help("Define a rule named `trem` or fix the spelling")
      .build();

    const out = renderDiagnosticCLI(diag, { colors: false, source: "expr: expr '+' trem | term\n" });
    expect(out).toBe(
      [
        "error[PEG1001]: Unknown rule or token `trem` referenced in rule `expr`",
        "  --> expr.gram:1:16",
        "    |",
        "  1 | expr: expr '+' trem | term",
        "    | " + " ".repeat(15) + "^^^^",
        "   = help: Define a rule named `trem` or fix the spelling",
      ].join("\n")
    );
  });

  it("should render without a span", () => {
    const diag = new DiagnosticBuilder(PEG3003).build();
    expect(renderDiagnosticCLI(diag, { colors: false })).toBe("error[PEG3003]: invalid syntax");
  });

  it("should summarize several diagnostics", () => {
    const error = new DiagnosticBuilder(PEG3003).build();
    const warning = new DiagnosticBuilder(PEG1006).withArgs({ rule: "a", alternative: "b" }).build();
    const out = renderDiagnosticsCLI([error, warning, warning], { colors: false });
    expect(out.split("\n").at(-1)).toBe("1 error, 2 warnings generated");
  });
});

describe("catalog", () => {
  it("should look descriptors up by any code spelling", () => {
    expect(getDiagnosticDescriptor(1001)).toBe(PEG1001);
    expect(getDiagnosticDescriptor("PEG1001")).toBe(PEG1001);
    expect(getDiagnosticDescriptor("peg9999")).toBeUndefined();
  });

  it("should explain a code", () => {
    expect(explainDiagnostic("PEG3003")?.startsWith("PEG3003 (error, parse)\n\nNo alternative")).toBe(true);
  });
});

describe("PegforgeError", () => {
  it("should carry its diagnostic and code", () => {
    const err = new PegforgeError(new DiagnosticBuilder(PEG3003).build());
    expect(err.message).toBe("[PEG3003] invalid syntax");
    expect(err.code).toBe(3003);
    expect(err).toBeInstanceOf(Error);
  });
});
