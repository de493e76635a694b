import { describe, it, expect } from "vitest";
import { createLogger } from "@pegforge/core";

describe("createLogger", () => {
  it("should prefix lines with the scope", () => {
    const lines: string[] = [];
    const log = createLogger("analyzer", { verbose: true, writer: (l) => lines.push(l) });
    log.info("3 rules");
    log.child("nullable").debug("fixpoint after 2 passes");
    expect(lines).toEqual(["[pegforge:analyzer] 3 rules", "[pegforge:analyzer:nullable] fixpoint after 2 passes"]);
  });

  it("should drop debug lines unless verbose", () => {
    const lines: string[] = [];
    const log = createLogger("compiler", { verbose: false, writer: (l) => lines.push(l) });
    log.debug("hidden");
    expect(lines).toEqual([]);
  });

  it("should send warnings to the error writer", () => {
    const errors: string[] = [];
    const log = createLogger("cli", { errorWriter: (l) => errors.push(l) });
    log.warn("grammar has no @class");
    expect(errors).toEqual(["[pegforge:cli] warning: grammar has no @class"]);
  });
});
