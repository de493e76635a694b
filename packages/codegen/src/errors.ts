import { DiagnosticBuilder, PEG5001, PegforgeError } from "@pegforge/core";
import type { SourceSpan } from "@pegforge/core";

/** The generated module does not parse as TypeScript. */
export class GeneratedSyntaxError extends PegforgeError {
  constructor(
    readonly detail: string,
    readonly span?: SourceSpan,
    /** The offending line of generated code */
    readonly sourceLine?: string
  ) {
    const builder = new DiagnosticBuilder(PEG5001).at(span).withArgs({ detail });
    if (span !== undefined && sourceLine !== undefined) {
      builder.note(`generated line ${span.line}: ${sourceLine.trim()}`);
    }
    super(builder.build());
    this.name = "GeneratedSyntaxError";
  }
}
