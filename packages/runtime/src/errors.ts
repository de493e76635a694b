import { DiagnosticBuilder, PEG3002, PEG3003, PegforgeError } from "@pegforge/core";
import type { SourceSpan } from "@pegforge/core";
import { describeToken } from "@pegforge/tokenizer";
import type { Token } from "@pegforge/tokenizer";

function spanOf(token: Token, fileName?: string): SourceSpan {
  return {
    file: fileName,
    line: token.start.line,
    column: token.start.column,
    endLine: token.end.line,
    endColumn: token.end.column,
  };
}

/**
 * A forced item (`&&e`) did not match. Unwinds the whole parse: no
 * enclosing choice, repetition or lookahead catches it.
 */
export class ForcedMatchError extends PegforgeError {
  constructor(
    readonly expected: string,
    readonly token: Token,
    /** Token index */
    readonly position: number,
    fileName?: string
  ) {
    super(
      new DiagnosticBuilder(PEG3002)
        .at(spanOf(token, fileName))
        .withArgs({ expected })
        .note(`found ${describeToken(token)}`)
        .build()
    );
    this.name = "ForcedMatchError";
  }
}

/** The start rule did not match the whole token stream. */
export class ParseError extends PegforgeError {
  constructor(
    readonly token: Token,
    /** Index of the furthest token reached */
    readonly position: number,
    fileName?: string
  ) {
    super(
      new DiagnosticBuilder(PEG3003)
        .at(spanOf(token, fileName))
        .note(`found ${describeToken(token)}`)
        .build()
    );
    this.name = "ParseError";
  }
}
