/**
 * Token tests shared by the interpreter and generated parsers.
 */

import type { Token } from "@pegforge/tokenizer";

export interface KeywordTables {
  /** Hard keywords: reserved, never a NAME */
  readonly keywords: ReadonlySet<string>;
  /** Soft keywords: keywords only where the grammar asks for them */
  readonly softKeywords: ReadonlySet<string>;
}

/**
 * Whether `token` belongs to `category`. `NAME` excludes hard keywords,
 * `KEYWORD` and `SOFT_KEYWORD` select NAME tokens spelling a hard or soft
 * keyword, and any other category compares the token type.
 */
export function matchesCategory(token: Token, category: string, tables: KeywordTables): boolean {
  switch (category) {
    case "NAME":
      return token.type === "NAME" && !tables.keywords.has(token.string);
    case "KEYWORD":
      return token.type === "NAME" && tables.keywords.has(token.string);
    case "SOFT_KEYWORD":
      return token.type === "NAME" && tables.softKeywords.has(token.string);
    default:
      return token.type === category;
  }
}

/**
 * Whether `token` spells the literal `value`. Keywords (hard or soft) only
 * match NAME tokens; operators and other literals never match a STRING
 * token whose text happens to be equal.
 */
export function matchesLiteral(token: Token, value: string, keyword: boolean): boolean {
  if (token.string !== value) return false;
  return keyword ? token.type === "NAME" : token.type !== "STRING";
}

export function isToken(value: unknown): value is Token {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    "string" in value &&
    typeof value.type === "string" &&
    typeof value.string === "string"
  );
}
