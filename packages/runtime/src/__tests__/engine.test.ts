import { describe, it, expect } from "vitest";
import { AmbiguousLeftRecursionError } from "@pegforge/analyzer";
import { tokenize } from "@pegforge/tokenizer";
import { applyRule, FAIL, MemoTable, ParseContext } from "../index.js";
import type { EngineRule } from "../index.js";

function context(source = "a b c"): ParseContext {
  return new ParseContext(tokenize(source, { newlines: false, indentation: false }));
}

const plain: EngineRule = { index: 0, name: "plain", memoize: false, leftRecursive: false, leader: false };
const memo: EngineRule = { index: 1, name: "memo", memoize: true, leftRecursive: false, leader: false };
const leader: EngineRule = { index: 2, name: "list", memoize: true, leftRecursive: true, leader: true };

/** Consumes one NAME token. */
function name(ctx: ParseContext): unknown {
  const token = ctx.peek();
  if (token === undefined || token.type !== "NAME") return FAIL;
  ctx.pos++;
  return token.string;
}

// ---------------------------------------------------------------------------
// Packrat memoization
// ---------------------------------------------------------------------------

describe("memoized rules", () => {
  it("evaluate once per position", () => {
    const ctx = context();
    let calls = 0;
    const body = (): unknown => {
      calls++;
      return name(ctx);
    };

    expect(applyRule(ctx, memo, body)).toBe("a");
    expect(ctx.pos).toBe(1);
    ctx.reset(0);
    expect(applyRule(ctx, memo, body)).toBe("a");
    expect(ctx.pos).toBe(1);
    expect(calls).toBe(1);
    expect(ctx.stats).toEqual({ hits: 1, misses: 1, growthIterations: 0 });
  });

  it("cache failures and leave the position alone", () => {
    const ctx = context("1");
    let calls = 0;
    const body = (): unknown => {
      calls++;
      ctx.pos++;
      return FAIL;
    };
    expect(applyRule(ctx, memo, body)).toBe(FAIL);
    expect(applyRule(ctx, memo, body)).toBe(FAIL);
    expect(ctx.pos).toBe(0);
    expect(calls).toBe(1);
  });

  it("reject re-entry at the same position", () => {
    const ctx = context();
    const body = (): unknown => applyRule(ctx, memo, body);
    expect(() => applyRule(ctx, memo, body)).toThrow(AmbiguousLeftRecursionError);
  });

  it("skip the table when memoization is off", () => {
    const ctx = context();
    let calls = 0;
    const body = (): unknown => {
      calls++;
      return name(ctx);
    };
    applyRule(ctx, plain, body);
    ctx.reset(0);
    applyRule(ctx, plain, body);
    expect(calls).toBe(2);
    expect(ctx.memo.size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Seed growing
// ---------------------------------------------------------------------------

describe("leader rules", () => {
  it("grow the seed until the match stops getting longer", () => {
    const ctx = context();
    // list: list NAME | NAME, counting the names
    const body = (): unknown => {
      const left = applyRule(ctx, leader, body);
      if (name(ctx) === FAIL) return FAIL;
      return left === FAIL ? 1 : Number(left) + 1;
    };

    expect(applyRule(ctx, leader, body)).toBe(3);
    expect(ctx.pos).toBe(3);
    expect(ctx.stats.growthIterations).toBe(4);

    ctx.reset(0);
    expect(applyRule(ctx, leader, body)).toBe(3);
    expect(ctx.pos).toBe(3);
    expect(ctx.stats.growthIterations).toBe(4);
  });

  it("keep an empty first match", () => {
    const ctx = context();
    const body = (): unknown => (applyRule(ctx, leader, body) === FAIL ? "empty" : FAIL);
    expect(applyRule(ctx, leader, body)).toBe("empty");
    expect(ctx.pos).toBe(0);
  });

  it("fail when the seed never matches", () => {
    const ctx = context("1");
    const body = (): unknown => {
      const left = applyRule(ctx, leader, body);
      return left === FAIL ? name(ctx) : left;
    };
    expect(applyRule(ctx, leader, body)).toBe(FAIL);
    expect(ctx.pos).toBe(0);
    expect(ctx.stats.growthIterations).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Memo table
// ---------------------------------------------------------------------------

describe("MemoTable", () => {
  it("keys entries by rule and position", () => {
    const table = new MemoTable();
    table.set(0, 3, { state: "failure", generation: 0 });
    table.set(1, 3, { state: "success", value: "x", end: 4, generation: 0 });
    table.set(1, 3, { state: "success", value: "y", end: 5, generation: 1 });

    expect(table.size).toBe(2);
    expect(table.get(1, 3)).toEqual({ state: "success", value: "y", end: 5, generation: 1 });
    expect(table.get(2, 3)).toBeUndefined();
  });
});
