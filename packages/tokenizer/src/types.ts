/**
 * Core types for @pegforge/tokenizer
 */

/** Token categories the tokenizer produces. */
export type TokenType = "NAME" | "NUMBER" | "STRING" | "OP" | "NEWLINE" | "INDENT" | "DEDENT" | "ENDMARKER";

export const TOKEN_TYPES: ReadonlyArray<TokenType> = [
  "NAME",
  "NUMBER",
  "STRING",
  "OP",
  "NEWLINE",
  "INDENT",
  "DEDENT",
  "ENDMARKER",
];

/** 1-based line and column. */
export interface TokenPosition {
  readonly line: number;
  readonly column: number;
}

export interface Token {
  readonly type: TokenType;
  /** Exact source text of the token (empty for INDENT/DEDENT/ENDMARKER). */
  readonly string: string;
  readonly start: TokenPosition;
  readonly end: TokenPosition;
  /** Offset of the first character in the source. */
  readonly offset: number;
  /** Offset just past the last character. */
  readonly endOffset: number;
}

export interface TokenizeOptions {
  /** File name reported in errors */
  fileName?: string;
  /** Column width of a tab (default: `tokenizer.tabSize` config, else 8) */
  tabSize?: number;
  /** Emit INDENT/DEDENT tokens (default: true) */
  indentation?: boolean;
  /** Emit NEWLINE tokens at the end of logical lines (default: true) */
  newlines?: boolean;
}
