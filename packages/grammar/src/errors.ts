import { DiagnosticBuilder, PEG1001, PEG1003, PegforgeError } from "@pegforge/core";
import type { RichDiagnostic, SourceSpan } from "@pegforge/core";

/** A grammar that cannot be compiled. */
export class GrammarError extends PegforgeError {
  constructor(diagnostic: RichDiagnostic) {
    super(diagnostic);
    this.name = "GrammarError";
  }
}

export class GrammarSyntaxError extends GrammarError {
  constructor(
    readonly detail: string,
    readonly span: SourceSpan
  ) {
    super(new DiagnosticBuilder(PEG1003).at(span).withArgs({ detail }).build());
    this.name = "GrammarSyntaxError";
  }
}

/** A name in `ruleName` that is neither a rule nor a known token category. */
export class UnknownRuleOrTokenError extends GrammarError {
  constructor(
    readonly ruleName: string,
    readonly reference: string,
    readonly span?: SourceSpan
  ) {
    const builder = new DiagnosticBuilder(PEG1001).at(span).withArgs({ name: reference, rule: ruleName });
    if (/^[A-Z][A-Z0-9_]*$/.test(reference)) {
      builder.help("Token categories are registered with the `extraTokens` option");
    } else {
      builder.help(`Define a rule named \`${reference}\` or fix the spelling`);
    }
    super(builder.build());
    this.name = "UnknownRuleOrTokenError";
  }
}
